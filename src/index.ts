export * from "./types/analytics";
export * from "./types/signal";
export * from "./types/telemetry";
export * from "./config/coreConfig";
export { ENV, readEnv } from "./config/env";
export type { RuntimeEnv } from "./config/env";
export * from "./utils/errors";
export { formatLaneLabel } from "./utils/laneLabels";
export { LaneIndex } from "./services/laneIndex";
export { PositionHistory } from "./services/positionHistory";
export { IncidentDetector } from "./services/incidentDetector";
export type { IncidentCheck } from "./services/incidentDetector";
export { LaneTrendTracker, describeTrend, regressionSlope } from "./services/laneTrend";
export { FlowRateTracker } from "./services/flowRate";
export { congestionStatus, gradeLevelOfService } from "./services/levelOfService";
export { SpeedClassifier } from "./services/speedClassifier";
export {
  compareOutcomes,
  computePhaseDuration,
  estimateWaits,
  evaluateTrim,
  initialSignalPhase,
  rankLane,
  selectNextLane,
  stepSignalPhase,
  waitingOrder,
} from "./services/signalScheduler";
export { SessionAggregator } from "./services/sessionAggregator";
export type { SessionFrame } from "./services/sessionAggregator";
export { formatSessionSummary, formatSessionDuration } from "./services/sessionSummary";
export { closeSession, createCoreState, processFrame, systemClock } from "./services/framePipeline";
export type { Clock, CoreState } from "./services/framePipeline";
export { createTelemetryStore } from "./services/telemetryStore";
export type { TelemetryStore } from "./services/telemetryStore";
export { createTelemetryPublisher, toWireFrame, toWireSession } from "./services/api";
export type { TelemetryPublisher, TelemetryPublisherOptions } from "./services/api";
export { createSimulatedFeed, DEMO_LANES } from "./services/mockData";
export { describeSchedulerEvent, runDemo } from "./demo";
