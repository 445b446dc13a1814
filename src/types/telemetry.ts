import type {
  EmergencyState,
  IncidentReport,
  LaneAnalytics,
  SpeedViolation,
} from "./analytics";
import type { SchedulerEvent, SignalPhaseView } from "./signal";

export interface FrameResult {
  frameId: number;
  timestamp: number;
  fps: number;
  lanes: LaneAnalytics[];
  totalVehicles: number;
  incidents: IncidentReport[];
  violations: SpeedViolation[];
  emergency: EmergencyState;
  signal: SignalPhaseView;
  signalEvents: SchedulerEvent[];
  speeds: Record<number, number>;
}

export interface OccupancyHistoryPoint {
  time: string;
  lanes: Record<number, number>;
}

export interface SessionTotals {
  startedAt: number;
  endedAt: number | null;
  uniqueVehicles: number;
  peakOccupancy: number;
  peakAt: number | null;
  incidents: number;
  violations: number;
}

export interface TelemetryState {
  snapshot: FrameResult | null;
  history: OccupancyHistoryPoint[];
  recentViolations: SpeedViolation[];
  session: SessionTotals | null;
}
