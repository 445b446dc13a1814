import { resolveCoreConfig } from "../config/coreConfig";
import type { CoreConfig, CoreConfigInput } from "../config/coreConfig";
import { VEHICLE_CLASSES } from "../types/analytics";
import type {
  ClassBreakdown,
  IncidentReport,
  LaneAnalytics,
  SpeedViolation,
  VehicleObservation,
} from "../types/analytics";
import type { SignalPhaseState } from "../types/signal";
import type { FrameResult, SessionTotals } from "../types/telemetry";
import { FrameOrderError, SessionClosedError } from "../utils/errors";
import { getBoxCenter, roundTo } from "../utils/geometry";
import { FlowRateTracker } from "./flowRate";
import { IncidentDetector } from "./incidentDetector";
import { LaneIndex } from "./laneIndex";
import { LaneTrendTracker } from "./laneTrend";
import { congestionStatus, gradeLevelOfService } from "./levelOfService";
import { PositionHistory } from "./positionHistory";
import { SessionAggregator } from "./sessionAggregator";
import { formatTimestamp } from "./sessionSummary";
import { stepSignalPhase } from "./signalScheduler";
import { SpeedClassifier } from "./speedClassifier";

/** Wall-clock source in seconds. */
export type Clock = () => number;

export const systemClock: Clock = () => Date.now() / 1000;

/**
 * Everything the per-frame pass reads and writes. One owner feeds it frames
 * in timestamp order; readers get copies through the telemetry store.
 */
export interface CoreState {
  readonly config: CoreConfig;
  readonly clock: Clock;
  readonly laneIndex: LaneIndex;
  readonly positions: PositionHistory;
  readonly incidents: IncidentDetector;
  readonly trends: LaneTrendTracker;
  readonly flow: FlowRateTracker;
  readonly speed: SpeedClassifier;
  readonly session: SessionAggregator;
  phase: SignalPhaseState | null;
  frameId: number;
  lastFrameAt: number | null;
}

export function createCoreState(input: CoreConfigInput, clock: Clock = systemClock): CoreState {
  const config = resolveCoreConfig(input);
  return {
    config,
    clock,
    laneIndex: new LaneIndex(config.lanes),
    positions: new PositionHistory(config.positionHistorySize, config.metresPerPixel),
    incidents: new IncidentDetector(config.incident),
    trends: new LaneTrendTracker(config.trend),
    flow: new FlowRateTracker(config.flow),
    speed: new SpeedClassifier(config.speed),
    session: new SessionAggregator(clock()),
    phase: null,
    frameId: 0,
    lastFrameAt: null,
  };
}

function emptyBreakdown(): ClassBreakdown {
  return { car: 0, bus: 0, truck: 0, motorbike: 0 };
}

function sumBreakdown(breakdown: ClassBreakdown): number {
  return VEHICLE_CLASSES.reduce((sum, vehicleClass) => sum + breakdown[vehicleClass], 0);
}

/**
 * Runs one frame of tracked vehicles through lane assignment, per-vehicle
 * analytics, per-lane statistics, the signal scheduler and the session
 * counters, in that order.
 */
export function processFrame(
  state: CoreState,
  observations: readonly VehicleObservation[],
  now: number = state.clock()
): FrameResult {
  if (state.session.closed) {
    throw new SessionClosedError();
  }
  if (state.lastFrameAt !== null && !(now > state.lastFrameAt)) {
    throw new FrameOrderError(state.lastFrameAt, now);
  }

  const { config, laneIndex, positions, incidents, trends, flow, speed } = state;
  const frameId = state.frameId + 1;
  const laneIds = laneIndex.laneIds;
  const laneCounts = new Map<number, ClassBreakdown>(laneIds.map((lane) => [lane, emptyBreakdown()]));
  const activeIds = new Set<number>();
  const activeIncidents: IncidentReport[] = [];
  const violations: SpeedViolation[] = [];
  const speeds: Record<number, number> = {};
  let incidentOnsets = 0;
  let emergencyLane: number | null = null;

  for (const vehicle of observations) {
    const centroid = getBoxCenter(vehicle.bbox);
    activeIds.add(vehicle.trackId);
    const lane = laneIndex.resolve(vehicle.trackId, centroid);

    const counts = lane === null ? undefined : laneCounts.get(lane);
    if (counts && VEHICLE_CLASSES.includes(vehicle.vehicleClass)) {
      counts[vehicle.vehicleClass] += 1;
    }

    positions.record(vehicle.trackId, centroid, now);
    const speedKmh = positions.speedKmh(vehicle.trackId);
    speeds[vehicle.trackId] = roundTo(speedKmh, 1);

    if (speed.registerViolation(vehicle.trackId, speedKmh)) {
      violations.push({
        timestamp: formatTimestamp(now),
        frameId,
        trackId: vehicle.trackId,
        lane,
        speedKmh: roundTo(speedKmh, 1),
        vehicleClass: vehicle.vehicleClass,
      });
    }

    if (lane === null) {
      continue;
    }

    // Several candidates in one frame: the last one seen decides the lane.
    if (speed.isEmergencyCandidate(vehicle.vehicleClass, speedKmh)) {
      emergencyLane = lane;
    }

    const check = incidents.update(vehicle.trackId, centroid, lane, now);
    if (check.incident) {
      activeIncidents.push(check.incident);
    }
    if (check.onset) {
      incidentOnsets += 1;
    }

    flow.record(lane, vehicle.trackId, now);
  }

  laneIndex.evictInactive(activeIds);
  positions.evictInactive(activeIds);
  incidents.evictInactive(activeIds);
  speed.evictInactive(activeIds);

  const occupancy = new Map<number, number>();
  const slopes = new Map<number, number>();
  const lanes: LaneAnalytics[] = laneIds.map((lane) => {
    const classBreakdown = laneCounts.get(lane) ?? emptyBreakdown();
    const total = sumBreakdown(classBreakdown);
    trends.record(lane, total);
    const trend = trends.reading(lane);
    occupancy.set(lane, total);
    slopes.set(lane, trend.slope);
    return {
      lane,
      classBreakdown,
      total,
      los: gradeLevelOfService(total),
      trend,
      flowPerMinute: flow.rate(lane, now),
      status: congestionStatus(total),
    };
  });
  const totalVehicles = lanes.reduce((sum, lane) => sum + lane.total, 0);

  const step = stepSignalPhase(
    state.phase,
    { now, occupancy, slopes, emergencyLane },
    laneIds,
    config.scheduler
  );

  state.session.fold({
    now,
    activeIds,
    occupancy: totalVehicles,
    incidentOnsets,
    violations: violations.length,
  });

  const fps = state.lastFrameAt === null ? 0 : roundTo(1 / (now - state.lastFrameAt), 1);
  state.phase = step.state;
  state.frameId = frameId;
  state.lastFrameAt = now;

  return {
    frameId,
    timestamp: now,
    fps,
    lanes,
    totalVehicles,
    incidents: activeIncidents,
    violations,
    emergency: { active: emergencyLane !== null, lane: emergencyLane },
    signal: step.view,
    signalEvents: step.events,
    speeds,
  };
}

export function closeSession(state: CoreState, now: number = state.clock()): SessionTotals {
  return state.session.close(now);
}
