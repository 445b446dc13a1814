import { readFile } from "node:fs/promises";
import { VEHICLE_CLASSES } from "../types/analytics";
import type { LaneRect, VehicleClass } from "../types/analytics";
import { ConfigError } from "../utils/errors";

export interface SpeedConfig {
  limitKmh: number;
  emergencyKmh: number;
  emergencyClasses: VehicleClass[];
}

export interface IncidentConfig {
  timeoutSeconds: number;
  movementTolerancePx: number;
}

export interface TrendConfig {
  windowSize: number;
  threshold: number;
}

export interface FlowConfig {
  horizonSeconds: number;
}

export interface SchedulerConfig {
  minPhaseSeconds: number;
  maxPhaseSeconds: number;
  /** green seconds granted per queued vehicle */
  occupancyFactor: number;
  /** green seconds granted per unit of trend slope */
  trendFactor: number;
  /** one priority point per this many seconds waited */
  waitScale: number;
  starvationCeilingSeconds: number;
  emergencyTrimSeconds: number;
  emergencyFloorSeconds: number;
  congestionTrimSeconds: number;
  congestionFloorSeconds: number;
  cooldownSeconds: number;
  congestionMinHoldSeconds: number;
  congestionLowThreshold: number;
  congestionHighThreshold: number;
}

export interface TelemetryConfig {
  historyEvery: number;
  historyLimit: number;
  violationLimit: number;
}

export interface CoreConfig {
  lanes: LaneRect[];
  metresPerPixel: number;
  positionHistorySize: number;
  speed: SpeedConfig;
  incident: IncidentConfig;
  trend: TrendConfig;
  flow: FlowConfig;
  scheduler: SchedulerConfig;
  telemetry: TelemetryConfig;
}

export interface CoreConfigInput {
  lanes: LaneRect[];
  metresPerPixel?: number;
  positionHistorySize?: number;
  speed?: Partial<SpeedConfig>;
  incident?: Partial<IncidentConfig>;
  trend?: Partial<TrendConfig>;
  flow?: Partial<FlowConfig>;
  scheduler?: Partial<SchedulerConfig>;
  telemetry?: Partial<TelemetryConfig>;
}

export const DEFAULT_SPEED: SpeedConfig = {
  limitKmh: 50,
  emergencyKmh: 40,
  emergencyClasses: ["bus", "truck"],
};

export const DEFAULT_INCIDENT: IncidentConfig = {
  timeoutSeconds: 5,
  movementTolerancePx: 15,
};

export const DEFAULT_TREND: TrendConfig = {
  windowSize: 20,
  threshold: 0.15,
};

export const DEFAULT_FLOW: FlowConfig = {
  horizonSeconds: 60,
};

export const DEFAULT_SCHEDULER: SchedulerConfig = {
  minPhaseSeconds: 15,
  maxPhaseSeconds: 90,
  occupancyFactor: 3,
  trendFactor: 4,
  waitScale: 5,
  starvationCeilingSeconds: 120,
  emergencyTrimSeconds: 20,
  emergencyFloorSeconds: 10,
  congestionTrimSeconds: 10,
  congestionFloorSeconds: 15,
  cooldownSeconds: 25,
  congestionMinHoldSeconds: 10,
  congestionLowThreshold: 2,
  congestionHighThreshold: 10,
};

export const DEFAULT_TELEMETRY: TelemetryConfig = {
  historyEvery: 90,
  historyLimit: 40,
  violationLimit: 10,
};

const SCHEDULER_KEYS = [
  "minPhaseSeconds",
  "maxPhaseSeconds",
  "occupancyFactor",
  "trendFactor",
  "waitScale",
  "starvationCeilingSeconds",
  "emergencyTrimSeconds",
  "emergencyFloorSeconds",
  "congestionTrimSeconds",
  "congestionFloorSeconds",
  "cooldownSeconds",
  "congestionMinHoldSeconds",
  "congestionLowThreshold",
  "congestionHighThreshold",
] as const satisfies readonly (keyof SchedulerConfig)[];

const DEFAULT_METRES_PER_PIXEL = 0.05;
const DEFAULT_POSITION_HISTORY = 8;

function collectLaneProblems(lanes: LaneRect[]): string[] {
  const problems: string[] = [];
  if (lanes.length === 0) {
    problems.push("at least one lane is required");
  }
  const seen = new Set<number>();
  lanes.forEach((lane, index) => {
    const label = `lane[${index}]`;
    if (!Number.isInteger(lane.id) || lane.id < 1) {
      problems.push(`${label}.id must be a positive integer`);
    } else if (seen.has(lane.id)) {
      problems.push(`${label}.id ${lane.id} is duplicated`);
    }
    seen.add(lane.id);
    const coords = [lane.x1, lane.y1, lane.x2, lane.y2];
    if (!coords.every(Number.isFinite)) {
      problems.push(`${label} has non-finite coordinates`);
    } else if (lane.x1 >= lane.x2 || lane.y1 >= lane.y2) {
      problems.push(`${label} must satisfy x1 < x2 and y1 < y2`);
    }
  });
  return problems;
}

function requirePositive(problems: string[], path: string, value: number) {
  if (!Number.isFinite(value) || value <= 0) {
    problems.push(`${path} must be a positive number`);
  }
}

function requireNonNegative(problems: string[], path: string, value: number) {
  if (!Number.isFinite(value) || value < 0) {
    problems.push(`${path} must be a non-negative number`);
  }
}

function collectTunableProblems(config: CoreConfig): string[] {
  const problems: string[] = [];
  requirePositive(problems, "metresPerPixel", config.metresPerPixel);
  if (!Number.isInteger(config.positionHistorySize) || config.positionHistorySize < 2) {
    problems.push("positionHistorySize must be an integer of at least 2");
  }

  requirePositive(problems, "speed.limitKmh", config.speed.limitKmh);
  requirePositive(problems, "speed.emergencyKmh", config.speed.emergencyKmh);
  config.speed.emergencyClasses.forEach((item) => {
    if (!VEHICLE_CLASSES.includes(item)) {
      problems.push(`speed.emergencyClasses contains unknown class "${String(item)}"`);
    }
  });

  requirePositive(problems, "incident.timeoutSeconds", config.incident.timeoutSeconds);
  requireNonNegative(problems, "incident.movementTolerancePx", config.incident.movementTolerancePx);

  if (!Number.isInteger(config.trend.windowSize) || config.trend.windowSize < 3) {
    problems.push("trend.windowSize must be an integer of at least 3");
  }
  requireNonNegative(problems, "trend.threshold", config.trend.threshold);
  requirePositive(problems, "flow.horizonSeconds", config.flow.horizonSeconds);

  const scheduler = config.scheduler;
  requirePositive(problems, "scheduler.minPhaseSeconds", scheduler.minPhaseSeconds);
  requirePositive(problems, "scheduler.maxPhaseSeconds", scheduler.maxPhaseSeconds);
  if (scheduler.minPhaseSeconds > scheduler.maxPhaseSeconds) {
    problems.push("scheduler.minPhaseSeconds must not exceed scheduler.maxPhaseSeconds");
  }
  requireNonNegative(problems, "scheduler.occupancyFactor", scheduler.occupancyFactor);
  requireNonNegative(problems, "scheduler.trendFactor", scheduler.trendFactor);
  requirePositive(problems, "scheduler.waitScale", scheduler.waitScale);
  requirePositive(problems, "scheduler.starvationCeilingSeconds", scheduler.starvationCeilingSeconds);
  requirePositive(problems, "scheduler.emergencyTrimSeconds", scheduler.emergencyTrimSeconds);
  requirePositive(problems, "scheduler.congestionTrimSeconds", scheduler.congestionTrimSeconds);
  requireNonNegative(problems, "scheduler.emergencyFloorSeconds", scheduler.emergencyFloorSeconds);
  requireNonNegative(problems, "scheduler.congestionFloorSeconds", scheduler.congestionFloorSeconds);
  if (scheduler.emergencyFloorSeconds > scheduler.maxPhaseSeconds) {
    problems.push("scheduler.emergencyFloorSeconds must not exceed scheduler.maxPhaseSeconds");
  }
  if (scheduler.congestionFloorSeconds > scheduler.maxPhaseSeconds) {
    problems.push("scheduler.congestionFloorSeconds must not exceed scheduler.maxPhaseSeconds");
  }
  requireNonNegative(problems, "scheduler.cooldownSeconds", scheduler.cooldownSeconds);
  requireNonNegative(problems, "scheduler.congestionMinHoldSeconds", scheduler.congestionMinHoldSeconds);
  requireNonNegative(problems, "scheduler.congestionLowThreshold", scheduler.congestionLowThreshold);
  requireNonNegative(problems, "scheduler.congestionHighThreshold", scheduler.congestionHighThreshold);

  if (!Number.isInteger(config.telemetry.historyEvery) || config.telemetry.historyEvery < 1) {
    problems.push("telemetry.historyEvery must be a positive integer");
  }
  if (!Number.isInteger(config.telemetry.historyLimit) || config.telemetry.historyLimit < 1) {
    problems.push("telemetry.historyLimit must be a positive integer");
  }
  if (!Number.isInteger(config.telemetry.violationLimit) || config.telemetry.violationLimit < 1) {
    problems.push("telemetry.violationLimit must be a positive integer");
  }
  return problems;
}

/**
 * Merges overrides over the defaults and validates the result. Lanes come
 * back sorted by id so lookups and cyclic order follow ascending index.
 */
export function resolveCoreConfig(input: CoreConfigInput): CoreConfig {
  const config: CoreConfig = {
    lanes: [...input.lanes].sort((a, b) => a.id - b.id),
    metresPerPixel: input.metresPerPixel ?? DEFAULT_METRES_PER_PIXEL,
    positionHistorySize: input.positionHistorySize ?? DEFAULT_POSITION_HISTORY,
    speed: {
      ...DEFAULT_SPEED,
      ...input.speed,
      emergencyClasses: [...(input.speed?.emergencyClasses ?? DEFAULT_SPEED.emergencyClasses)],
    },
    incident: { ...DEFAULT_INCIDENT, ...input.incident },
    trend: { ...DEFAULT_TREND, ...input.trend },
    flow: { ...DEFAULT_FLOW, ...input.flow },
    scheduler: { ...DEFAULT_SCHEDULER, ...input.scheduler },
    telemetry: { ...DEFAULT_TELEMETRY, ...input.telemetry },
  };

  const problems = [...collectLaneProblems(config.lanes), ...collectTunableProblems(config)];
  if (problems.length > 0) {
    throw new ConfigError(problems);
  }
  return config;
}

function asRecord(value: unknown): Record<string, unknown> | undefined {
  if (!value || typeof value !== "object" || Array.isArray(value)) {
    return undefined;
  }
  return Object.fromEntries(Object.entries(value));
}

function readNumber(record: Record<string, unknown> | undefined, key: string): number | undefined {
  const value = record?.[key];
  return value === undefined || value === null ? undefined : Number(value);
}

function pickNumbers<K extends string>(
  source: unknown,
  keys: readonly K[]
): Partial<Record<K, number>> | undefined {
  const record = asRecord(source);
  if (!record) {
    return undefined;
  }
  return keys.reduce<Partial<Record<K, number>>>((acc, key) => {
    const value = readNumber(record, key);
    if (value !== undefined) {
      acc[key] = value;
    }
    return acc;
  }, {});
}

function normalizeLane(raw: unknown, index: number): LaneRect {
  if (Array.isArray(raw)) {
    const [x1, y1, x2, y2] = raw.map((item) => Number(item));
    return { id: index + 1, x1: x1 ?? NaN, y1: y1 ?? NaN, x2: x2 ?? NaN, y2: y2 ?? NaN };
  }
  const record = asRecord(raw);
  return {
    id: readNumber(record, "id") ?? index + 1,
    x1: readNumber(record, "x1") ?? NaN,
    y1: readNumber(record, "y1") ?? NaN,
    x2: readNumber(record, "x2") ?? NaN,
    y2: readNumber(record, "y2") ?? NaN,
    name: typeof record?.name === "string" ? record.name : undefined,
  };
}

function isVehicleClass(value: unknown): value is VehicleClass {
  return VEHICLE_CLASSES.some((item) => item === value);
}

function normalizeSpeed(raw: unknown): Partial<SpeedConfig> | undefined {
  const record = asRecord(raw);
  if (!record) {
    return undefined;
  }
  const speed: Partial<SpeedConfig> = {
    ...pickNumbers(record, ["limitKmh", "emergencyKmh"] as const),
  };
  if (Array.isArray(record.emergencyClasses)) {
    const classes = record.emergencyClasses.map((item) => String(item).toLowerCase());
    const unknown = classes.filter((item) => !isVehicleClass(item));
    if (unknown.length > 0) {
      throw new ConfigError([`speed.emergencyClasses contains unknown class "${unknown[0]}"`]);
    }
    speed.emergencyClasses = classes.filter(isVehicleClass);
  }
  return speed;
}

/** Turns an untyped (parsed JSON) value into validated configuration. */
export function normalizeCoreConfig(raw: unknown): CoreConfig {
  const record = asRecord(raw);
  if (!record) {
    throw new ConfigError(["configuration must be a JSON object"]);
  }
  const lanes = Array.isArray(record.lanes) ? record.lanes.map(normalizeLane) : [];
  return resolveCoreConfig({
    lanes,
    metresPerPixel: readNumber(record, "metresPerPixel"),
    positionHistorySize: readNumber(record, "positionHistorySize"),
    speed: normalizeSpeed(record.speed),
    incident: pickNumbers(record.incident, ["timeoutSeconds", "movementTolerancePx"] as const),
    trend: pickNumbers(record.trend, ["windowSize", "threshold"] as const),
    flow: pickNumbers(record.flow, ["horizonSeconds"] as const),
    scheduler: pickNumbers(record.scheduler, SCHEDULER_KEYS),
    telemetry: pickNumbers(record.telemetry, ["historyEvery", "historyLimit", "violationLimit"] as const),
  });
}

export async function loadCoreConfigFile(path: string): Promise<CoreConfig> {
  const contents = await readFile(path, "utf8");
  let parsed: unknown;
  try {
    parsed = JSON.parse(contents);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConfigError([`${path} is not valid JSON (${reason})`]);
  }
  return normalizeCoreConfig(parsed);
}
