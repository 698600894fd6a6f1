import { config } from "../config.js";

type LogLevel = "debug" | "info" | "warn" | "error";
type LogThreshold = LogLevel | "silent";

const LEVEL_WEIGHT: Record<LogThreshold, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

export type LogMeta = Record<string, unknown>;

const describeError = (error: unknown): LogMeta => {
  if (error instanceof Error) {
    const code = "code" in error && typeof error.code === "string" ? error.code : undefined;
    return { errorName: error.name, errorMessage: error.message, ...(code ? { errorCode: code } : {}) };
  }
  return { errorMessage: String(error) };
};

const toMeta = (extra: unknown): LogMeta | undefined => {
  if (extra === undefined) {
    return undefined;
  }
  if (extra instanceof Error) {
    return describeError(extra);
  }
  if (typeof extra === "object" && extra !== null && !Array.isArray(extra)) {
    return Object.fromEntries(
      Object.entries(extra).map(([key, value]) => [key, value instanceof Error ? describeError(value) : value]),
    );
  }
  return { detail: extra };
};

export class Logger {
  constructor(
    private readonly scope: string,
    private threshold: LogThreshold,
    private readonly parent: Logger | null = null,
  ) {}

  // Children read the root level.
  get level(): LogThreshold {
    return this.parent ? this.parent.level : this.threshold;
  }

  setLevel(level: LogThreshold): void {
    if (this.parent) {
      this.parent.setLevel(level);
      return;
    }
    this.threshold = level;
  }

  child(scope: string): Logger {
    return new Logger(`${this.scope}:${scope}`, this.threshold, this);
  }

  debug(message: string, extra?: unknown): void {
    this.write("debug", message, extra);
  }

  info(message: string, extra?: unknown): void {
    this.write("info", message, extra);
  }

  warn(message: string, extra?: unknown): void {
    this.write("warn", message, extra);
  }

  error(message: string, extra?: unknown): void {
    this.write("error", message, extra);
  }

  private write(level: LogLevel, message: string, extra: unknown): void {
    if (LEVEL_WEIGHT[level] < LEVEL_WEIGHT[this.level]) {
      return;
    }

    const meta = toMeta(extra);
    const line = `[${new Date().toISOString()}] ${level.toUpperCase()} [${this.scope}] ${message}`;
    const sink = level === "error" ? console.error : level === "warn" ? console.warn : console.log;
    if (meta && Object.keys(meta).length > 0) {
      sink(line, JSON.stringify(meta));
    } else {
      sink(line);
    }
  }
}

export const logger = new Logger("tracker", config.LOG_LEVEL);
