function readFlag(value: string | undefined): boolean {
  const normalized = value?.trim().toLowerCase() ?? "";
  return normalized === "1" || normalized === "true" || normalized === "yes";
}

function readPositiveNumber(value: string | undefined, fallback: number): number {
  const parsed = Number(value);
  return value !== undefined && Number.isFinite(parsed) && parsed > 0 ? parsed : fallback;
}

export interface RuntimeEnv {
  apiBaseUrl: string;
  apiTimeoutMs: number;
  publishTelemetry: boolean;
  laneConfigPath: string | null;
  demoFrames: number;
  demoFps: number;
}

export function readEnv(source: NodeJS.ProcessEnv = process.env): RuntimeEnv {
  return {
    apiBaseUrl: source.TELEMETRY_API_URL?.trim() || "http://127.0.0.1:5050/api",
    apiTimeoutMs: readPositiveNumber(source.TELEMETRY_TIMEOUT_MS, 5_000),
    publishTelemetry: readFlag(source.TELEMETRY_PUBLISH),
    laneConfigPath: source.LANE_CONFIG_PATH?.trim() || null,
    demoFrames: Math.floor(readPositiveNumber(source.DEMO_FRAMES, 900)),
    demoFps: readPositiveNumber(source.DEMO_FPS, 15),
  };
}

export const ENV: RuntimeEnv = readEnv();
