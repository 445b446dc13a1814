import type { TrendConfig } from "../config/coreConfig";
import type { TrendReading } from "../types/analytics";

const MIN_SAMPLES = 3;

/** Least-squares slope of samples against their index (0..n-1). */
export function regressionSlope(samples: readonly number[]): number {
  const n = samples.length;
  if (n < MIN_SAMPLES) {
    return 0;
  }
  const meanX = (n - 1) / 2;
  const meanY = samples.reduce((sum, value) => sum + value, 0) / n;
  let numerator = 0;
  let denominator = 0;
  samples.forEach((value, index) => {
    numerator += (index - meanX) * (value - meanY);
    denominator += (index - meanX) ** 2;
  });
  return numerator / denominator;
}

export function describeTrend(slope: number, threshold: number): TrendReading {
  if (slope > threshold) {
    return { slope, direction: "rising", sign: 1, glyph: "↑", asciiGlyph: "^" };
  }
  if (slope < -threshold) {
    return { slope, direction: "falling", sign: -1, glyph: "↓", asciiGlyph: "v" };
  }
  return { slope, direction: "stable", sign: 0, glyph: "→", asciiGlyph: "-" };
}

/**
 * One occupancy sample per lane per frame, kept in a count-bounded window.
 * Wall time plays no part; frame rate changes stretch or squeeze the window.
 */
export class LaneTrendTracker {
  private readonly windows = new Map<number, number[]>();

  constructor(private readonly config: TrendConfig) {}

  record(lane: number, occupancy: number): void {
    const window = this.windows.get(lane) ?? [];
    window.push(occupancy);
    if (window.length > this.config.windowSize) {
      window.shift();
    }
    this.windows.set(lane, window);
  }

  slope(lane: number): number {
    return regressionSlope(this.windows.get(lane) ?? []);
  }

  reading(lane: number): TrendReading {
    return describeTrend(this.slope(lane), this.config.threshold);
  }
}
