import type { Point } from "../types/analytics";
import { getDistance } from "../utils/geometry";

interface PositionSample {
  point: Point;
  at: number;
}

const MPS_TO_KMH = 3.6;

/**
 * Bounded per-vehicle centroid history. Speed is the straight-line
 * displacement between the oldest and newest retained samples over their
 * time span, so it lags acceleration by up to `capacity` frames and reads
 * low on curved paths.
 */
export class PositionHistory {
  private readonly samples = new Map<number, PositionSample[]>();

  constructor(
    private readonly capacity: number,
    private readonly metresPerPixel: number
  ) {}

  record(trackId: number, point: Point, now: number): void {
    const history = this.samples.get(trackId) ?? [];
    history.push({ point, at: now });
    if (history.length > this.capacity) {
      history.shift();
    }
    this.samples.set(trackId, history);
  }

  /** km/h; 0 until two samples exist or when no time has elapsed. */
  speedKmh(trackId: number): number {
    const history = this.samples.get(trackId);
    if (!history || history.length < 2) {
      return 0;
    }
    const first = history[0];
    const last = history[history.length - 1];
    const elapsed = last.at - first.at;
    if (elapsed <= 0) {
      return 0;
    }
    const metres = getDistance(first.point, last.point) * this.metresPerPixel;
    return (metres / elapsed) * MPS_TO_KMH;
  }

  evictInactive(activeIds: ReadonlySet<number>): void {
    for (const trackId of this.samples.keys()) {
      if (!activeIds.has(trackId)) {
        this.samples.delete(trackId);
      }
    }
  }
}
