export class ConfigError extends Error {
  readonly problems: string[];

  constructor(problems: string[]) {
    super(`Invalid lane core configuration: ${problems.join("; ")}`);
    this.name = "ConfigError";
    this.problems = problems;
  }
}

export class FrameOrderError extends Error {
  constructor(previous: number, received: number) {
    super(`Frame timestamp ${received} does not advance past ${previous}`);
    this.name = "FrameOrderError";
  }
}

export class SchedulerFaultError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "SchedulerFaultError";
  }
}

export class SessionClosedError extends Error {
  constructor() {
    super("Session totals are read-only after shutdown");
    this.name = "SessionClosedError";
  }
}
