import type { SpeedConfig } from "../config/coreConfig";
import type { VehicleClass } from "../types/analytics";

const SPEED_BUCKET_KMH = 10;

export class SpeedClassifier {
  private readonly loggedBuckets = new Map<number, number>();

  constructor(private readonly config: SpeedConfig) {}

  isOverLimit(speedKmh: number): boolean {
    return speedKmh > this.config.limitKmh;
  }

  /**
   * True when an over-limit reading should produce a new violation event.
   * A vehicle is reported again only after its speed moves into another
   * 10 km/h bucket.
   */
  registerViolation(trackId: number, speedKmh: number): boolean {
    if (!this.isOverLimit(speedKmh)) {
      return false;
    }
    const bucket = Math.floor(speedKmh / SPEED_BUCKET_KMH);
    if (this.loggedBuckets.get(trackId) === bucket) {
      return false;
    }
    this.loggedBuckets.set(trackId, bucket);
    return true;
  }

  isEmergencyCandidate(vehicleClass: VehicleClass, speedKmh: number): boolean {
    return this.config.emergencyClasses.includes(vehicleClass) && speedKmh > this.config.emergencyKmh;
  }

  evictInactive(activeIds: ReadonlySet<number>): void {
    for (const trackId of this.loggedBuckets.keys()) {
      if (!activeIds.has(trackId)) {
        this.loggedBuckets.delete(trackId);
      }
    }
  }
}
