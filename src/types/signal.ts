export interface SignalPhaseState {
  activeLane: number;
  phaseStart: number;
  phaseDeadline: number;
  /** duration granted when the phase started, before any trim */
  grantedSeconds: number;
  /** null until the first trim of the current phase */
  lastAdjustmentTime: number | null;
  lastGreen: Record<number, number>;
}

/**
 * A starved lane is ranked above every numeric score. Forced lanes rank
 * equal to each other, so waiting order decides between them.
 */
export type PriorityOutcome =
  | { kind: "forced"; waited: number }
  | { kind: "scored"; score: number };

export interface PriorityBreakdown {
  lane: number;
  outcome: PriorityOutcome;
  occupancy: number;
  slope: number;
  waited: number;
}

export type TrimKind = "emergency" | "congestion";

export type SchedulerEvent =
  | {
      type: "phase_started";
      lane: number;
      duration: number;
      at: number;
      reason: "initial" | "expired";
    }
  | {
      type: "trimmed";
      kind: TrimKind;
      lane: number;
      cut: number;
      remaining: number;
      at: number;
    };

export interface SignalPhaseView {
  activeLane: number;
  remainingSeconds: number;
  phaseDuration: number;
  estimatedWait: Record<number, number>;
  nextLane: number;
  priorities: PriorityBreakdown[];
}

export interface SchedulerInput {
  now: number;
  occupancy: ReadonlyMap<number, number>;
  slopes: ReadonlyMap<number, number>;
  emergencyLane: number | null;
}

export interface SchedulerStep {
  state: SignalPhaseState;
  events: SchedulerEvent[];
  view: SignalPhaseView;
}
