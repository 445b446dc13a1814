import type { FlowConfig } from "../config/coreConfig";
import { roundTo } from "../utils/geometry";

interface FlowEntry {
  trackId: number;
  at: number;
}

/**
 * Distinct vehicles seen per lane inside a sliding time horizon, scaled to
 * vehicles per minute. Entries are pruned when the rate is read.
 */
export class FlowRateTracker {
  private readonly entries = new Map<number, FlowEntry[]>();

  constructor(private readonly config: FlowConfig) {}

  record(lane: number, trackId: number, now: number): void {
    const log = this.entries.get(lane) ?? [];
    log.push({ trackId, at: now });
    this.entries.set(lane, log);
  }

  rate(lane: number, now: number): number {
    const log = this.entries.get(lane);
    if (!log) {
      return 0;
    }
    const cutoff = now - this.config.horizonSeconds;
    const firstLive = log.findIndex((entry) => entry.at >= cutoff);
    log.splice(0, firstLive === -1 ? log.length : firstLive);
    const unique = new Set(log.map((entry) => entry.trackId)).size;
    return roundTo(unique / (this.config.horizonSeconds / 60), 1);
  }
}
