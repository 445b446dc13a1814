import { loadCoreConfigFile, resolveCoreConfig } from "./config/coreConfig";
import type { CoreConfig } from "./config/coreConfig";
import { ENV } from "./config/env";
import type { RuntimeEnv } from "./config/env";
import { createTelemetryPublisher } from "./services/api";
import { closeSession, createCoreState, processFrame } from "./services/framePipeline";
import { createSimulatedFeed, DEMO_LANES } from "./services/mockData";
import { formatClock, formatSessionSummary } from "./services/sessionSummary";
import { createTelemetryStore } from "./services/telemetryStore";
import type { SchedulerEvent } from "./types/signal";
import type { SessionTotals } from "./types/telemetry";
import { formatLaneLabel } from "./utils/laneLabels";

async function loadConfig(env: RuntimeEnv): Promise<CoreConfig> {
  if (env.laneConfigPath) {
    return loadCoreConfigFile(env.laneConfigPath);
  }
  return resolveCoreConfig({ lanes: DEMO_LANES });
}

export function describeSchedulerEvent(
  event: SchedulerEvent,
  laneNames?: Record<number, string | undefined>
): string {
  const lane = formatLaneLabel(event.lane, laneNames);
  if (event.type === "phase_started") {
    return `[${formatClock(event.at)}] GO ${lane} for ${event.duration}s (${event.reason})`;
  }
  const kind = event.kind === "emergency" ? "EMERGENCY DETECTED" : "CONGESTION";
  return `[${formatClock(event.at)}] ${kind} | ${lane} green shortened by ${event.cut.toFixed(0)}s, ${event.remaining.toFixed(0)}s left`;
}

export async function runDemo(env: RuntimeEnv = ENV): Promise<SessionTotals> {
  const config = await loadConfig(env);
  const frameSeconds = 1 / env.demoFps;
  let simulatedNow = Date.now() / 1000;
  const state = createCoreState(config, () => simulatedNow);
  const laneNames = state.laneIndex.laneNames;
  const feed = createSimulatedFeed(config.lanes);
  const telemetry = createTelemetryStore(config.telemetry);
  const publisher = env.publishTelemetry
    ? createTelemetryPublisher({ baseUrl: env.apiBaseUrl, timeoutMs: env.apiTimeoutMs })
    : null;
  const deliveries: Promise<boolean>[] = [];
  const publishEvery = Math.max(1, Math.round(env.demoFps));

  const unsubscribe = telemetry.store.subscribe((current, previous) => {
    const snapshot = current.snapshot;
    if (publisher && snapshot && snapshot !== previous.snapshot && snapshot.frameId % publishEvery === 0) {
      deliveries.push(publisher.publishFrame(snapshot));
    }
  });

  console.info(`Running ${env.demoFrames} simulated frames at ${env.demoFps} fps over ${config.lanes.length} lanes`);
  for (let frame = 0; frame < env.demoFrames; frame += 1) {
    simulatedNow += frameSeconds;
    const result = processFrame(state, feed.nextFrame());
    telemetry.publishFrame(result);
    result.signalEvents.forEach((event) => console.info(describeSchedulerEvent(event, laneNames)));
  }

  const totals = closeSession(state);
  telemetry.publishSession(totals);
  unsubscribe();
  if (publisher) {
    deliveries.push(publisher.publishSession(totals));
  }
  const delivered = await Promise.all(deliveries);
  if (publisher) {
    console.info(`Telemetry delivered ${delivered.filter(Boolean).length}/${delivered.length} payloads`);
  }

  formatSessionSummary(totals).forEach((line) => console.log(line));
  return totals;
}
