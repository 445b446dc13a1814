import type { IncidentConfig } from "../config/coreConfig";
import type { IncidentReport, Point } from "../types/analytics";
import { getDistance, roundTo } from "../utils/geometry";

interface StillnessRecord {
  position: Point;
  stillSince: number;
  lane: number;
  reported: boolean;
}

export interface IncidentCheck {
  incident: IncidentReport | null;
  /** true only on the frame the vehicle enters the incident state */
  onset: boolean;
}

/**
 * Stopped-vehicle detection. The anchor position moves only when the vehicle
 * travels beyond the tolerance; any such move resets the stillness clock.
 */
export class IncidentDetector {
  private readonly records = new Map<number, StillnessRecord>();

  constructor(private readonly config: IncidentConfig) {}

  update(trackId: number, position: Point, lane: number, now: number): IncidentCheck {
    const previous = this.records.get(trackId);
    if (!previous || getDistance(position, previous.position) > this.config.movementTolerancePx) {
      this.records.set(trackId, { position, stillSince: now, lane, reported: false });
      return { incident: null, onset: false };
    }

    previous.lane = lane;
    const stillFor = now - previous.stillSince;
    if (stillFor < this.config.timeoutSeconds) {
      return { incident: null, onset: false };
    }

    const onset = !previous.reported;
    previous.reported = true;
    return {
      incident: {
        trackId,
        lane,
        position,
        duration: roundTo(stillFor, 1),
      },
      onset,
    };
  }

  evictInactive(activeIds: ReadonlySet<number>): void {
    for (const trackId of this.records.keys()) {
      if (!activeIds.has(trackId)) {
        this.records.delete(trackId);
      }
    }
  }
}
