import { describe, expect, it } from "vitest";
import { DEFAULT_SCHEDULER } from "../config/coreConfig";
import type { SchedulerInput, SignalPhaseState } from "../types/signal";
import { SchedulerFaultError } from "../utils/errors";
import {
  compareOutcomes,
  computePhaseDuration,
  initialSignalPhase,
  selectNextLane,
  stepSignalPhase,
  waitingOrder,
} from "./signalScheduler";

const config = DEFAULT_SCHEDULER;

function toMap(values: Record<number, number>): Map<number, number> {
  return new Map(Object.entries(values).map(([lane, value]) => [Number(lane), value]));
}

function input(
  now: number,
  occupancy: Record<number, number>,
  emergencyLane: number | null = null,
  slopes: Record<number, number> = {}
): SchedulerInput {
  return { now, occupancy: toMap(occupancy), slopes: toMap(slopes), emergencyLane };
}

function phaseState(overrides: Partial<SignalPhaseState>): SignalPhaseState {
  return {
    activeLane: 1,
    phaseStart: 0,
    phaseDeadline: 30,
    grantedSeconds: 30,
    lastAdjustmentTime: null,
    lastGreen: { 1: 0 },
    ...overrides,
  };
}

describe("computePhaseDuration", () => {
  it("grants three seconds per vehicle within 15-90 s", () => {
    expect(computePhaseDuration(9, 0, config)).toBe(27);
    expect(computePhaseDuration(2, 0, config)).toBe(15);
    expect(computePhaseDuration(40, 0, config)).toBe(90);
  });

  it("adds the rounded trend adjustment", () => {
    expect(computePhaseDuration(5, 1.2, config)).toBe(20);
    expect(computePhaseDuration(10, 0.5, config)).toBe(32);
    expect(computePhaseDuration(5, -0.6, config)).toBe(15);
  });
});

describe("compareOutcomes", () => {
  it("ranks a forced lane above any score", () => {
    expect(compareOutcomes({ kind: "forced", waited: 120 }, { kind: "scored", score: 1e9 })).toBeGreaterThan(0);
    expect(compareOutcomes({ kind: "scored", score: 1e9 }, { kind: "forced", waited: 120 })).toBeLessThan(0);
  });

  it("ranks forced lanes equal and scored lanes by score", () => {
    expect(compareOutcomes({ kind: "forced", waited: 130 }, { kind: "forced", waited: 160 })).toBe(0);
    expect(compareOutcomes({ kind: "scored", score: 7 }, { kind: "scored", score: 6 })).toBeGreaterThan(0);
    expect(compareOutcomes({ kind: "scored", score: 6 }, { kind: "scored", score: 6 })).toBe(0);
  });
});

describe("waitingOrder", () => {
  it("walks the lanes cyclically after the active one", () => {
    expect(waitingOrder(1, [1, 2, 3, 4])).toEqual([2, 3, 4]);
    expect(waitingOrder(3, [1, 2, 3, 4])).toEqual([4, 1, 2]);
    expect(waitingOrder(1, [1])).toEqual([]);
  });
});

describe("selectNextLane", () => {
  it("keeps the first lane in waiting order on equal scores", () => {
    const state = phaseState({ lastGreen: { 1: 0, 2: 50, 3: 50 } });
    expect(selectNextLane(state, input(60, { 2: 4, 3: 4 }), [1, 2, 3], config).lane).toBe(2);
    expect(selectNextLane(state, input(60, { 2: 4, 3: 5 }), [1, 2, 3], config).lane).toBe(3);

    const fromLaneTwo = phaseState({ activeLane: 2, lastGreen: { 1: 50, 2: 0, 3: 50 } });
    expect(selectNextLane(fromLaneTwo, input(60, { 1: 4, 3: 4 }), [1, 2, 3], config).lane).toBe(3);
  });

  it("scores occupancy, trend and wait", () => {
    const state = phaseState({ lastGreen: { 1: 0, 2: 50, 3: 40 } });
    const { priorities } = selectNextLane(state, input(60, { 2: 4, 3: 1 }, null, { 2: 0.5 }), [1, 2, 3], config);
    expect(priorities).toEqual([
      { lane: 2, outcome: { kind: "scored", score: 7 }, occupancy: 4, slope: 0.5, waited: 10 },
      { lane: 3, outcome: { kind: "scored", score: 5 }, occupancy: 1, slope: 0, waited: 20 },
    ]);
  });

  it("serves a starved lane ahead of a busier one", () => {
    const state = phaseState({ lastGreen: { 1: 0, 2: -100, 3: 50 } });
    expect(selectNextLane(state, input(60, { 2: 0, 3: 100 }), [1, 2, 3], config).lane).toBe(2);
  });

  it("serves starved lanes in waiting order, not by how long they waited", () => {
    const state = phaseState({ lastGreen: { 1: 0, 2: -70, 3: -100 } });
    const next = selectNextLane(state, input(60, { 2: 0, 3: 50 }), [1, 2, 3], config);
    expect(next.lane).toBe(2);
    expect(next.priorities.map((priority) => priority.outcome)).toEqual([
      { kind: "forced", waited: 130 },
      { kind: "forced", waited: 160 },
    ]);

    const fromLaneTwo = phaseState({ activeLane: 2, lastGreen: { 1: -100, 2: 0, 3: -70 } });
    expect(selectNextLane(fromLaneTwo, input(60, {}), [1, 2, 3], config).lane).toBe(3);
  });

  it("re-grants the only lane", () => {
    const state = phaseState({});
    expect(selectNextLane(state, input(60, {}), [1], config)).toEqual({ lane: 1, priorities: [] });
  });
});

describe("stepSignalPhase", () => {
  it("starts on the first lane with a duration from its own demand", () => {
    const step = stepSignalPhase(null, input(0, { 1: 9, 2: 2, 3: 12 }), [1, 2, 3], config);
    expect(step.events).toEqual([{ type: "phase_started", lane: 1, duration: 27, at: 0, reason: "initial" }]);
    expect(step.view.activeLane).toBe(1);
    expect(step.view.remainingSeconds).toBe(27);
    expect(step.view.estimatedWait).toEqual({ 1: 0, 2: 42, 3: 78 });
  });

  it("moves to the only waiting lane when the phase expires", () => {
    const lanes = [1, 2];
    const occupancy = { 1: 9, 2: 2 };
    let step = stepSignalPhase(null, input(0, occupancy), lanes, config);
    for (let now = 1; now < 27; now += 1) {
      step = stepSignalPhase(step.state, input(now, occupancy), lanes, config);
      expect(step.events).toEqual([]);
    }
    expect(step.view.activeLane).toBe(1);
    expect(step.view.remainingSeconds).toBe(1);

    step = stepSignalPhase(step.state, input(27, occupancy), lanes, config);
    expect(step.events).toEqual([{ type: "phase_started", lane: 2, duration: 15, at: 27, reason: "expired" }]);
    expect(step.view.activeLane).toBe(2);
    expect(step.state.lastGreen[2]).toBe(27);
  });

  it("re-grants a single configured lane", () => {
    let step = stepSignalPhase(null, input(0, { 1: 0 }), [1], config);
    step = stepSignalPhase(step.state, input(15, { 1: 0 }), [1], config);
    expect(step.events).toEqual([{ type: "phase_started", lane: 1, duration: 15, at: 15, reason: "expired" }]);
    expect(step.view.nextLane).toBe(1);
  });

  it("trims for an emergency in a waiting lane and honours the cooldown and floor", () => {
    const lanes = [1, 2, 3];
    const occupancy = { 1: 20, 2: 0, 3: 0 };
    let step = stepSignalPhase(null, input(0, occupancy), lanes, config);
    expect(step.view.remainingSeconds).toBe(60);

    step = stepSignalPhase(step.state, input(5, occupancy, 2), lanes, config);
    expect(step.events).toEqual([{ type: "trimmed", kind: "emergency", lane: 1, cut: 20, remaining: 35, at: 5 }]);
    expect(step.state.phaseDeadline).toBe(40);

    step = stepSignalPhase(step.state, input(6, occupancy, 2), lanes, config);
    expect(step.events).toEqual([]);

    step = stepSignalPhase(step.state, input(30, occupancy, 3), lanes, config);
    expect(step.events).toEqual([]);
    expect(step.view.remainingSeconds).toBe(10);
  });

  it("ignores an emergency in the active lane", () => {
    const occupancy = { 1: 20, 2: 0 };
    let step = stepSignalPhase(null, input(0, occupancy), [1, 2], config);
    step = stepSignalPhase(step.state, input(5, occupancy, 1), [1, 2], config);
    expect(step.events).toEqual([]);
    expect(step.view.remainingSeconds).toBe(55);
  });

  it("trims a cleared lane when a waiting lane overflows", () => {
    const lanes = [1, 2];
    let step = stepSignalPhase(null, input(0, { 1: 20, 2: 0 }), lanes, config);
    const cleared = { 1: 1, 2: 12 };

    step = stepSignalPhase(step.state, input(5, cleared), lanes, config);
    expect(step.events).toEqual([]);

    step = stepSignalPhase(step.state, input(10, cleared), lanes, config);
    expect(step.events).toEqual([{ type: "trimmed", kind: "congestion", lane: 1, cut: 10, remaining: 40, at: 10 }]);

    step = stepSignalPhase(step.state, input(20, cleared), lanes, config);
    expect(step.events).toEqual([]);

    step = stepSignalPhase(step.state, input(35, cleared), lanes, config);
    expect(step.events).toEqual([]);
    expect(step.view.remainingSeconds).toBe(15);
  });

  it("prefers the emergency trim when both qualify", () => {
    const lanes = [1, 2];
    let step = stepSignalPhase(null, input(0, { 1: 20, 2: 0 }), lanes, config);
    step = stepSignalPhase(step.state, input(10, { 1: 1, 2: 12 }, 2), lanes, config);
    expect(step.events).toEqual([{ type: "trimmed", kind: "emergency", lane: 1, cut: 20, remaining: 30, at: 10 }]);
  });

  it("resets the cooldown when a new phase starts", () => {
    const lanes = [1, 2];
    const cleared = { 1: 1, 2: 12 };
    let step = stepSignalPhase(null, input(0, { 1: 20, 2: 0 }), lanes, config);
    step = stepSignalPhase(step.state, input(10, cleared), lanes, config);
    step = stepSignalPhase(step.state, input(50, cleared), lanes, config);
    expect(step.events).toEqual([{ type: "phase_started", lane: 2, duration: 36, at: 50, reason: "expired" }]);
    expect(step.state.lastAdjustmentTime).toBeNull();

    step = stepSignalPhase(step.state, input(51, cleared, 1), lanes, config);
    expect(step.events).toEqual([{ type: "trimmed", kind: "emergency", lane: 2, cut: 20, remaining: 15, at: 51 }]);
  });

  it("never lengthens a phase, breaks a floor or trims twice inside a cooldown", () => {
    const lanes = [1, 2, 3];
    let step = stepSignalPhase(null, input(0, { 1: 0, 2: 0, 3: 0 }), lanes, config);
    let previousRemaining = step.view.remainingSeconds;
    let lastTrimAt: number | null = null;

    for (let now = 1; now <= 900; now += 1) {
      const occupancy = { 1: (now * 7) % 23, 2: (now * 5) % 17, 3: (now * 3) % 13 };
      const emergencyLane = now % 7 === 0 ? ((now / 7) % 3) + 1 : null;
      step = stepSignalPhase(step.state, input(now, occupancy, emergencyLane), lanes, config);

      if (step.events.some((event) => event.type === "phase_started")) {
        lastTrimAt = null;
      } else {
        expect(step.view.remainingSeconds).toBeLessThanOrEqual(previousRemaining);
      }
      for (const event of step.events) {
        if (event.type !== "trimmed") {
          continue;
        }
        const floor = event.kind === "emergency" ? config.emergencyFloorSeconds : config.congestionFloorSeconds;
        expect(event.cut).toBeGreaterThan(0);
        expect(event.remaining).toBeGreaterThanOrEqual(floor);
        if (lastTrimAt !== null) {
          expect(now - lastTrimAt).toBeGreaterThanOrEqual(config.cooldownSeconds);
        }
        lastTrimAt = now;
      }
      previousRemaining = step.view.remainingSeconds;
    }
  });

  it("bounds every lane's wait by the starvation ceiling plus one phase", () => {
    const lanes = [1, 2, 3];
    const occupancy = { 1: 25, 2: 25, 3: 0 };
    const greenStarts: Array<{ lane: number; at: number }> = [];
    let step = stepSignalPhase(null, input(0, occupancy), lanes, config);
    greenStarts.push({ lane: step.state.activeLane, at: 0 });

    for (let now = 1; now <= 3000; now += 1) {
      step = stepSignalPhase(step.state, input(now, occupancy), lanes, config);
      step.events.forEach((event) => {
        if (event.type === "phase_started") {
          greenStarts.push({ lane: event.lane, at: event.at });
        }
      });
    }

    expect(greenStarts.slice(0, 7)).toEqual([
      { lane: 1, at: 0 },
      { lane: 2, at: 75 },
      { lane: 3, at: 150 },
      { lane: 1, at: 165 },
      { lane: 2, at: 240 },
      { lane: 3, at: 315 },
      { lane: 1, at: 330 },
    ]);

    const bound = config.starvationCeilingSeconds + config.maxPhaseSeconds;
    for (const lane of lanes) {
      const starts = [0, ...greenStarts.filter((item) => item.lane === lane).map((item) => item.at), 3000];
      for (let index = 1; index < starts.length; index += 1) {
        expect(starts[index] - starts[index - 1]).toBeLessThanOrEqual(bound);
      }
    }
  });

  it("treats a broken phase invariant as fatal", () => {
    const unknownLane = phaseState({ activeLane: 9, phaseDeadline: 100 });
    expect(() => stepSignalPhase(unknownLane, input(1, {}), [1, 2], config)).toThrow(SchedulerFaultError);

    const oversized = phaseState({ grantedSeconds: 200, phaseDeadline: 200 });
    expect(() => stepSignalPhase(oversized, input(1, {}), [1, 2], config)).toThrow(SchedulerFaultError);

    expect(() => initialSignalPhase([], input(0, {}), config)).toThrow(SchedulerFaultError);
  });
});
