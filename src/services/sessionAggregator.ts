import type { SessionTotals } from "../types/telemetry";
import { SessionClosedError } from "../utils/errors";

export interface SessionFrame {
  now: number;
  activeIds: Iterable<number>;
  occupancy: number;
  incidentOnsets: number;
  violations: number;
}

/** Process-lifetime counters; frozen by close(). */
export class SessionAggregator {
  private readonly vehicleIds = new Set<number>();
  private peakOccupancy = 0;
  private peakAt: number | null = null;
  private incidents = 0;
  private violations = 0;
  private endedAt: number | null = null;

  constructor(private readonly startedAt: number) {}

  fold(frame: SessionFrame): void {
    if (this.endedAt !== null) {
      throw new SessionClosedError();
    }
    for (const trackId of frame.activeIds) {
      this.vehicleIds.add(trackId);
    }
    if (frame.occupancy > this.peakOccupancy) {
      this.peakOccupancy = frame.occupancy;
      this.peakAt = frame.now;
    }
    this.incidents += frame.incidentOnsets;
    this.violations += frame.violations;
  }

  close(now: number): SessionTotals {
    if (this.endedAt === null) {
      this.endedAt = now;
    }
    return this.totals;
  }

  get closed(): boolean {
    return this.endedAt !== null;
  }

  get totals(): SessionTotals {
    return Object.freeze({
      startedAt: this.startedAt,
      endedAt: this.endedAt,
      uniqueVehicles: this.vehicleIds.size,
      peakOccupancy: this.peakOccupancy,
      peakAt: this.peakAt,
      incidents: this.incidents,
      violations: this.violations,
    });
  }
}
