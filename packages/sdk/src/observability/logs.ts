/**
 * Structured JSON logging to stderr
 * stdout belongs to the MCP protocol and to CLI results, so nothing is logged there
 */

export type LogLevel = "debug" | "info" | "warn" | "error";

export const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error"];

export interface LogEvent {
  ts: string;
  level: LogLevel;
  event: string;
  [key: string]: unknown;
}

/** Receives each serialized log line */
export type LogSink = (line: string) => void;

const stderrSink: LogSink = (line) => console.error(line);

export class Logger {
  #minLevel: LogLevel;
  #sink: LogSink;
  #enabled = true;

  constructor(minLevel: LogLevel = "info", sink: LogSink = stderrSink) {
    this.#minLevel = minLevel;
    this.#sink = sink;
  }

  get level(): LogLevel {
    return this.#minLevel;
  }

  private shouldLog(level: LogLevel): boolean {
    return this.#enabled && LOG_LEVELS.indexOf(level) >= LOG_LEVELS.indexOf(this.#minLevel);
  }

  private log(level: LogLevel, event: string, data?: Record<string, unknown>): void {
    if (!this.shouldLog(level)) {
      return;
    }

    const logEvent: LogEvent = {
      ts: new Date().toISOString(),
      level,
      event,
      ...data,
    };

    this.#sink(JSON.stringify(logEvent));
  }

  debug(event: string, data?: Record<string, unknown>): void {
    this.log("debug", event, data);
  }

  info(event: string, data?: Record<string, unknown>): void {
    this.log("info", event, data);
  }

  warn(event: string, data?: Record<string, unknown>): void {
    this.log("warn", event, data);
  }

  error(event: string, data?: Record<string, unknown>): void {
    this.log("error", event, data);
  }

  setEnabled(enabled: boolean): void {
    this.#enabled = enabled;
  }
}

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === "string" && LOG_LEVELS.some((level) => level === value);
}

/**
 * Logger that drops everything, for embedding and tests
 */
export function silentLogger(): Logger {
  const logger = new Logger("error", () => {});
  logger.setEnabled(false);
  return logger;
}

/**
 * Error fields in the shape every log event uses
 */
export function errorFields(err: unknown): { err_code: string; err_message: string } {
  const code =
    err instanceof Error && "code" in err && typeof err.code === "string" ? err.code : "UNKNOWN";
  return {
    err_code: code,
    err_message: err instanceof Error ? err.message : String(err),
  };
}

export const logger = new Logger(process.env.LOG_LEVEL === "debug" ? "debug" : "info");
