/**
 * Leveled line logger.
 *
 * Lines look like `[2024-01-01T00:00:00.000Z] [INFO] [mux] Channel closed | {"peer":"a"}`
 * and go to stderr by default, keeping stdout free for record output.
 */

export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

export const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error", "silent"];

export interface Logger {
  debug(message: string, data?: unknown): void;
  info(message: string, data?: unknown): void;
  warn(message: string, data?: unknown): void;
  error(message: string, data?: unknown): void;
  /** Derive a logger with a different category. */
  child(category: string): Logger;
}

export interface LoggerOptions {
  /** Minimum level written. Default: "info" */
  level?: LogLevel;
  /** Tag printed in every line. Default: "linkmux" */
  category?: string;
  /** Line sink. Default: process.stderr */
  write?: (line: string) => void;
  /** Clock, for deterministic output in tests. */
  now?: () => Date;
}

const RANK: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40, silent: 100 };

/** Narrow an arbitrary string to a {@link LogLevel}. */
export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

export function createLogger(opts: LoggerOptions = {}): Logger {
  const level = opts.level ?? "info";
  const category = opts.category ?? "linkmux";
  const write = opts.write ?? ((line: string) => process.stderr.write(line + "\n"));
  const now = opts.now ?? (() => new Date());

  const log = (lvl: Exclude<LogLevel, "silent">, message: string, data?: unknown) => {
    if (RANK[lvl] < RANK[level]) return;
    write(formatLine(now(), lvl, category, message, data));
  };

  return {
    debug: (message, data) => log("debug", message, data),
    info: (message, data) => log("info", message, data),
    warn: (message, data) => log("warn", message, data),
    error: (message, data) => log("error", message, data),
    child: (child) => createLogger({ ...opts, category: child }),
  };
}

/** Logger that drops everything. */
export const silentLogger: Logger = createLogger({ level: "silent" });

function formatLine(
  at: Date,
  level: string,
  category: string,
  message: string,
  data: unknown,
): string {
  let line = `[${at.toISOString()}] [${level.toUpperCase()}] [${category}] ${message}`;
  if (data !== undefined) {
    line += ` | ${serialize(data)}`;
  }
  return line;
}

function serialize(data: unknown): string {
  if (data instanceof Error) {
    return JSON.stringify({ name: data.name, message: data.message });
  }
  try {
    return JSON.stringify(data);
  } catch {
    return "[Unserializable data]";
  }
}
