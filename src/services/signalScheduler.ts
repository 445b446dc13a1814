import type { SchedulerConfig } from "../config/coreConfig";
import type {
  PriorityBreakdown,
  PriorityOutcome,
  SchedulerEvent,
  SchedulerInput,
  SchedulerStep,
  SignalPhaseState,
  SignalPhaseView,
  TrimKind,
} from "../types/signal";
import { SchedulerFaultError } from "../utils/errors";
import { clamp } from "../utils/geometry";

interface TrimDecision {
  kind: TrimKind;
  cut: number;
  remaining: number;
}

function occupancyOf(input: SchedulerInput, lane: number): number {
  return input.occupancy.get(lane) ?? 0;
}

function slopeOf(input: SchedulerInput, lane: number): number {
  return input.slopes.get(lane) ?? 0;
}

export function computePhaseDuration(occupancy: number, slope: number, config: SchedulerConfig): number {
  const base = occupancy * config.occupancyFactor + Math.round(slope * config.trendFactor);
  return clamp(base, config.minPhaseSeconds, config.maxPhaseSeconds);
}

/** Positive when `a` outranks `b`. Two forced lanes rank equal. */
export function compareOutcomes(a: PriorityOutcome, b: PriorityOutcome): number {
  if (a.kind === "forced" && b.kind === "forced") {
    return 0;
  }
  if (a.kind === "forced") {
    return 1;
  }
  if (b.kind === "forced") {
    return -1;
  }
  return a.score - b.score;
}

export function rankLane(
  lane: number,
  state: SignalPhaseState,
  input: SchedulerInput,
  config: SchedulerConfig
): PriorityBreakdown {
  const occupancy = occupancyOf(input, lane);
  const slope = slopeOf(input, lane);
  const lastGreen = state.lastGreen[lane] ?? input.now - config.starvationCeilingSeconds;
  const waited = input.now - lastGreen;
  const outcome: PriorityOutcome =
    waited >= config.starvationCeilingSeconds
      ? { kind: "forced", waited }
      : { kind: "scored", score: occupancy + 2 * slope + waited / config.waitScale };
  return { lane, outcome, occupancy, slope, waited };
}

/** Waiting lanes in cyclic order, starting with the one after the active lane. */
export function waitingOrder(activeLane: number, laneIds: readonly number[]): number[] {
  const activeIndex = laneIds.indexOf(activeLane);
  return [...laneIds.slice(activeIndex + 1), ...laneIds.slice(0, Math.max(0, activeIndex))].filter(
    (lane) => lane !== activeLane
  );
}

/**
 * Picks the waiting lane to receive the next phase. The first maximum in
 * waiting order wins, so lanes that tie (including several starved ones)
 * are served round-robin. A single configured lane is re-granted.
 */
export function selectNextLane(
  state: SignalPhaseState,
  input: SchedulerInput,
  laneIds: readonly number[],
  config: SchedulerConfig
): { lane: number; priorities: PriorityBreakdown[] } {
  const priorities = waitingOrder(state.activeLane, laneIds).map((lane) =>
    rankLane(lane, state, input, config)
  );
  if (priorities.length === 0) {
    return { lane: state.activeLane, priorities };
  }
  const best = priorities.reduce((leader, candidate) =>
    compareOutcomes(candidate.outcome, leader.outcome) > 0 ? candidate : leader
  );
  return { lane: best.lane, priorities };
}

function startPhase(
  lane: number,
  lastGreen: Record<number, number>,
  input: SchedulerInput,
  config: SchedulerConfig
): SignalPhaseState {
  const duration = computePhaseDuration(occupancyOf(input, lane), slopeOf(input, lane), config);
  return {
    activeLane: lane,
    phaseStart: input.now,
    phaseDeadline: input.now + duration,
    grantedSeconds: duration,
    lastAdjustmentTime: null,
    lastGreen: { ...lastGreen, [lane]: input.now },
  };
}

export function initialSignalPhase(
  laneIds: readonly number[],
  input: SchedulerInput,
  config: SchedulerConfig
): SignalPhaseState {
  const [first] = laneIds;
  if (first === undefined) {
    throw new SchedulerFaultError("Signal scheduler needs at least one lane");
  }
  // Lanes that never held green count as already due once the first phase ends.
  const lastGreen = laneIds.reduce<Record<number, number>>((acc, lane) => {
    acc[lane] = input.now - config.starvationCeilingSeconds;
    return acc;
  }, {});
  return startPhase(first, lastGreen, input, config);
}

function shorten(kind: TrimKind, remaining: number, cut: number, floor: number): TrimDecision | null {
  const next = Math.max(floor, remaining - cut);
  return next < remaining ? { kind, cut: remaining - next, remaining: next } : null;
}

/**
 * Emergency and congestion trims share one cooldown. When the emergency gate
 * is open it is the only trim considered for this frame.
 */
export function evaluateTrim(
  state: SignalPhaseState,
  input: SchedulerInput,
  laneIds: readonly number[],
  config: SchedulerConfig
): TrimDecision | null {
  const { now } = input;
  const cooledDown =
    state.lastAdjustmentTime === null || now - state.lastAdjustmentTime >= config.cooldownSeconds;
  if (!cooledDown) {
    return null;
  }
  const remaining = Math.max(0, state.phaseDeadline - now);

  if (input.emergencyLane !== null && input.emergencyLane !== state.activeLane) {
    return shorten("emergency", remaining, config.emergencyTrimSeconds, config.emergencyFloorSeconds);
  }

  const elapsed = now - state.phaseStart;
  if (elapsed < config.congestionMinHoldSeconds || remaining <= config.congestionFloorSeconds) {
    return null;
  }
  const activeOccupancy = occupancyOf(input, state.activeLane);
  const busiestWaiting = Math.max(
    0,
    ...laneIds.filter((lane) => lane !== state.activeLane).map((lane) => occupancyOf(input, lane))
  );
  if (activeOccupancy <= config.congestionLowThreshold && busiestWaiting >= config.congestionHighThreshold) {
    return shorten("congestion", remaining, config.congestionTrimSeconds, config.congestionFloorSeconds);
  }
  return null;
}

function assertPhaseInvariants(
  state: SignalPhaseState,
  laneIds: readonly number[],
  config: SchedulerConfig
): void {
  if (!laneIds.includes(state.activeLane)) {
    throw new SchedulerFaultError(`Active lane ${state.activeLane} is not a configured lane`);
  }
  const granted = state.grantedSeconds;
  if (!(granted >= config.minPhaseSeconds && granted <= config.maxPhaseSeconds)) {
    throw new SchedulerFaultError(
      `Phase duration ${granted}s outside ${config.minPhaseSeconds}-${config.maxPhaseSeconds}s`
    );
  }
}

/**
 * Red-time estimate for a waiting lane: what is left of the active phase
 * plus the phases of every lane after the active one up to and including
 * it, walking the lanes cyclically in ascending order.
 */
export function estimateWaits(
  state: SignalPhaseState,
  input: SchedulerInput,
  laneIds: readonly number[],
  config: SchedulerConfig
): Record<number, number> {
  const remaining = Math.max(0, state.phaseDeadline - input.now);
  const activeIndex = laneIds.indexOf(state.activeLane);
  return laneIds.reduce<Record<number, number>>((acc, lane, index) => {
    if (lane === state.activeLane) {
      acc[lane] = 0;
      return acc;
    }
    let wait = remaining;
    let cursor = activeIndex;
    while (cursor !== index) {
      cursor = (cursor + 1) % laneIds.length;
      const ahead = laneIds[cursor];
      wait += computePhaseDuration(occupancyOf(input, ahead), slopeOf(input, ahead), config);
    }
    acc[lane] = wait;
    return acc;
  }, {});
}

function buildView(
  state: SignalPhaseState,
  input: SchedulerInput,
  laneIds: readonly number[],
  config: SchedulerConfig
): SignalPhaseView {
  const next = selectNextLane(state, input, laneIds, config);
  return {
    activeLane: state.activeLane,
    remainingSeconds: Math.max(0, state.phaseDeadline - input.now),
    phaseDuration: state.grantedSeconds,
    estimatedWait: estimateWaits(state, input, laneIds, config),
    nextLane: next.lane,
    priorities: next.priorities,
  };
}

/**
 * Advances the signal phase by one frame. The returned state replaces the
 * previous one; nothing else mutates it.
 */
export function stepSignalPhase(
  previous: SignalPhaseState | null,
  input: SchedulerInput,
  laneIds: readonly number[],
  config: SchedulerConfig
): SchedulerStep {
  const events: SchedulerEvent[] = [];
  let state = previous;
  if (!state) {
    state = initialSignalPhase(laneIds, input, config);
    events.push({
      type: "phase_started",
      lane: state.activeLane,
      duration: state.grantedSeconds,
      at: input.now,
      reason: "initial",
    });
  }

  const trim = evaluateTrim(state, input, laneIds, config);
  if (trim) {
    state = { ...state, phaseDeadline: input.now + trim.remaining, lastAdjustmentTime: input.now };
    events.push({
      type: "trimmed",
      kind: trim.kind,
      lane: state.activeLane,
      cut: trim.cut,
      remaining: trim.remaining,
      at: input.now,
    });
  }

  if (input.now >= state.phaseDeadline) {
    const { lane } = selectNextLane(state, input, laneIds, config);
    state = startPhase(lane, state.lastGreen, input, config);
    events.push({
      type: "phase_started",
      lane,
      duration: state.grantedSeconds,
      at: input.now,
      reason: "expired",
    });
  }

  assertPhaseInvariants(state, laneIds, config);
  return { state, events, view: buildView(state, input, laneIds, config) };
}
