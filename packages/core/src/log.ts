/**
 * Leveled logging for filters.
 *
 * Lines go to stderr as `[name] message`, matching what the filters
 * print about their own activity. The threshold comes from each
 * filter's `log_level` setting.
 */

export type LogLevel = "trace" | "debug" | "info" | "warn" | "error";

const LEVEL_ORDER: Record<LogLevel, number> = {
  trace: 0,
  debug: 1,
  info: 2,
  warn: 3,
  error: 4,
};

export const LOG_LEVELS: readonly string[] = Object.keys(LEVEL_ORDER);

/** Check whether a string names a log level. */
export function isLogLevel(value: string): value is LogLevel {
  return Object.hasOwn(LEVEL_ORDER, value);
}

/**
 * Parse a log level setting. Unknown values fall back to "info".
 */
export function parseLogLevel(value: string | undefined): LogLevel {
  const lower = (value ?? "").toLowerCase();
  return isLogLevel(lower) ? lower : "info";
}

export interface Logger {
  readonly name: string;
  readonly level: LogLevel;
  trace: (message: string) => void;
  debug: (message: string) => void;
  info: (message: string) => void;
  warn: (message: string) => void;
  error: (message: string) => void;
  /** Whether a message at `level` would be written. */
  enabled: (level: LogLevel) => boolean;
}

/** Destination for formatted log lines. Defaults to `console.error`. */
export type LogSink = (line: string) => void;

/**
 * Create a logger that writes lines at or above `level`.
 *
 * ```typescript
 * const log = createLogger("redact", "debug");
 * log.info("Redacted 2 match(es): ssn=1, email=1");
 * // stderr: [redact] Redacted 2 match(es): ssn=1, email=1
 * ```
 */
export function createLogger(
  name: string,
  level: LogLevel = "info",
  sink: LogSink = (line) => console.error(line),
): Logger {
  const threshold = LEVEL_ORDER[level];

  function enabled(at: LogLevel): boolean {
    return LEVEL_ORDER[at] >= threshold;
  }

  function write(at: LogLevel, message: string): void {
    if (!enabled(at)) return;
    const tag = at === "info" ? "" : ` ${at.toUpperCase()}`;
    sink(`[${name}]${tag} ${message}`);
  }

  return {
    name,
    level,
    trace: (m) => write("trace", m),
    debug: (m) => write("debug", m),
    info: (m) => write("info", m),
    warn: (m) => write("warn", m),
    error: (m) => write("error", m),
    enabled,
  };
}

/** Render an unknown thrown value as a message. */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
