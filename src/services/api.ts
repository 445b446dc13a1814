import axios from "axios";
import type { AxiosAdapter } from "axios";
import { ENV } from "../config/env";
import type { FrameResult, SessionTotals } from "../types/telemetry";
import { formatClock, formatTimestamp } from "./sessionSummary";

export interface TelemetryPublisherOptions {
  baseUrl?: string;
  timeoutMs?: number;
  adapter?: AxiosAdapter;
}

export interface TelemetryPublisher {
  publishFrame: (result: FrameResult) => Promise<boolean>;
  publishSession: (totals: SessionTotals) => Promise<boolean>;
}

function byLane<T>(result: FrameResult, pick: (lane: FrameResult["lanes"][number]) => T): Record<string, T> {
  return result.lanes.reduce<Record<string, T>>((acc, lane) => {
    acc[String(lane.lane)] = pick(lane);
    return acc;
  }, {});
}

function toStringKeys(source: Record<number, number>): Record<string, number> {
  return Object.entries(source).reduce<Record<string, number>>((acc, [key, value]) => {
    acc[key] = value;
    return acc;
  }, {});
}

/** Snake_case payload in the shape the dashboard's status normalizer reads. */
export function toWireFrame(result: FrameResult): Record<string, unknown> {
  return {
    frame_id: result.frameId,
    last_updated: formatTimestamp(result.timestamp),
    fps: result.fps,
    vehicle_count: result.totalVehicles,
    directions: result.lanes.map((lane) => String(lane.lane)),
    lane_counts: byLane(result, (lane) => ({ ...lane.classBreakdown })),
    lane_totals: byLane(result, (lane) => lane.total),
    lane_los: byLane(result, (lane) => lane.los.grade),
    lane_los_color: byLane(result, (lane) => lane.los.color),
    lane_trends: byLane(result, (lane) => lane.trend.glyph),
    lane_trend_sign: byLane(result, (lane) => lane.trend.sign),
    lane_flow: byLane(result, (lane) => lane.flowPerMinute),
    lane_status: byLane(result, (lane) => lane.status),
    incidents: result.incidents.map((incident) => ({
      track_id: incident.trackId,
      lane: incident.lane,
      cx: incident.position.x,
      cy: incident.position.y,
      duration: incident.duration,
    })),
    speeders: result.violations.map((violation) => ({
      timestamp: violation.timestamp,
      frame_id: violation.frameId,
      track_id: violation.trackId,
      lane: violation.lane,
      speed_kmh: violation.speedKmh,
      class: violation.vehicleClass,
    })),
    emergency_active: result.emergency.active,
    emergency_lane: result.emergency.lane,
    current_green: String(result.signal.activeLane),
    next_lane: String(result.signal.nextLane),
    remaining_seconds: Math.floor(result.signal.remainingSeconds),
    lane_wait_times: toStringKeys(result.signal.estimatedWait),
    priorities: result.signal.priorities.map((priority) => ({
      lane: String(priority.lane),
      forced: priority.outcome.kind === "forced",
      score: priority.outcome.kind === "scored" ? priority.outcome.score : null,
      vehicle_count: priority.occupancy,
      waiting_time: priority.waited,
    })),
  };
}

export function toWireSession(totals: SessionTotals): Record<string, unknown> {
  return {
    session_start: formatTimestamp(totals.startedAt),
    session_end: totals.endedAt === null ? null : formatTimestamp(totals.endedAt),
    unique_vehicles: totals.uniqueVehicles,
    peak_count: totals.peakOccupancy,
    peak_time: totals.peakAt === null ? "" : formatClock(totals.peakAt),
    total_incidents: totals.incidents,
    total_violations: totals.violations,
  };
}

export function createTelemetryPublisher(options: TelemetryPublisherOptions = {}): TelemetryPublisher {
  const api = axios.create({
    baseURL: options.baseUrl ?? ENV.apiBaseUrl,
    timeout: options.timeoutMs ?? ENV.apiTimeoutMs,
    ...(options.adapter ? { adapter: options.adapter } : {}),
  });

  async function post(path: string, payload: Record<string, unknown>): Promise<boolean> {
    try {
      await api.post(path, payload);
      return true;
    } catch (error) {
      const detail = axios.isAxiosError(error) ? error.message : error;
      console.warn(`Telemetry API unreachable, ${path} not delivered`, detail);
      return false;
    }
  }

  return {
    publishFrame: (result) => post("/telemetry/frame", toWireFrame(result)),
    publishSession: (totals) => post("/telemetry/session", toWireSession(totals)),
  };
}
