import type { LaneRect, Point } from "../types/analytics";
import { isPointInBox } from "../utils/geometry";

export class LaneIndex {
  private readonly lanes: readonly LaneRect[];
  private readonly lastKnownLane = new Map<number, number>();

  constructor(lanes: readonly LaneRect[]) {
    this.lanes = [...lanes].sort((a, b) => a.id - b.id);
  }

  get laneIds(): number[] {
    return this.lanes.map((lane) => lane.id);
  }

  get laneNames(): Record<number, string | undefined> {
    return this.lanes.reduce<Record<number, string | undefined>>((acc, lane) => {
      acc[lane.id] = lane.name;
      return acc;
    }, {});
  }

  /** Lowest-indexed lane whose rectangle (edges included) holds the point. */
  locate(point: Point): number | null {
    return this.lanes.find((lane) => isPointInBox(point, lane))?.id ?? null;
  }

  /**
   * Like locate, but a vehicle outside every lane keeps the lane it was last
   * seen in, so boundary jitter does not drop it from lane analytics.
   */
  resolve(trackId: number, point: Point): number | null {
    const lane = this.locate(point);
    if (lane !== null) {
      this.lastKnownLane.set(trackId, lane);
      return lane;
    }
    return this.lastKnownLane.get(trackId) ?? null;
  }

  evictInactive(activeIds: ReadonlySet<number>): void {
    for (const trackId of this.lastKnownLane.keys()) {
      if (!activeIds.has(trackId)) {
        this.lastKnownLane.delete(trackId);
      }
    }
  }
}
