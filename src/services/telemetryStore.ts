import { createStore } from "zustand/vanilla";
import type { StoreApi } from "zustand/vanilla";
import type { TelemetryConfig } from "../config/coreConfig";
import { DEFAULT_TELEMETRY } from "../config/coreConfig";
import type { FrameResult, SessionTotals, TelemetryState } from "../types/telemetry";
import { formatClock } from "./sessionSummary";

export interface TelemetryStore {
  store: StoreApi<TelemetryState>;
  publishFrame: (result: FrameResult) => void;
  publishSession: (totals: SessionTotals) => void;
}

function initialTelemetryState(): TelemetryState {
  return {
    snapshot: null,
    history: [],
    recentViolations: [],
    session: null,
  };
}

/**
 * Snapshot holder for readers running beside the frame loop. Each frame is
 * written with a single setState, so a reader sees one whole frame or the
 * previous one.
 */
export function createTelemetryStore(options: Partial<TelemetryConfig> = {}): TelemetryStore {
  const settings: TelemetryConfig = { ...DEFAULT_TELEMETRY, ...options };
  const store = createStore<TelemetryState>()(() => initialTelemetryState());

  const publishFrame = (result: FrameResult) => {
    store.setState((previous) => {
      const history =
        result.frameId % settings.historyEvery === 0
          ? [
              ...previous.history,
              {
                time: formatClock(result.timestamp),
                lanes: result.lanes.reduce<Record<number, number>>((acc, lane) => {
                  acc[lane.lane] = lane.total;
                  return acc;
                }, {}),
              },
            ].slice(-settings.historyLimit)
          : previous.history;
      const recentViolations = result.violations.length
        ? [...previous.recentViolations, ...result.violations].slice(-settings.violationLimit)
        : previous.recentViolations;
      return { snapshot: result, history, recentViolations };
    });
  };

  const publishSession = (totals: SessionTotals) => {
    store.setState({ session: totals });
  };

  return { store, publishFrame, publishSession };
}
