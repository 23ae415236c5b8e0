/**
 * logger.ts — Levelled structured logger writing to stderr.
 *
 * Modules take a Logger instead of importing a global one, so tests and
 * embedding hosts can hand in their own.
 */

export type LogLevel = "trace" | "debug" | "info" | "warn" | "error";

export type LogFields = Record<string, unknown>;

export interface Logger {
  trace(message: string, fields?: LogFields): void;
  debug(message: string, fields?: LogFields): void;
  info(message: string, fields?: LogFields): void;
  warn(message: string, fields?: LogFields): void;
  error(message: string, fields?: LogFields): void;
  child(fields: LogFields): Logger;
}

export type LoggerOptions = {
  level?: LogLevel;
  json?: boolean;
  /** Defaults to process.stderr. */
  write?: (line: string) => void;
};

export const LOG_LEVELS: readonly LogLevel[] = ["trace", "debug", "info", "warn", "error"];

const levelRank: Record<LogLevel, number> = {
  trace: 0,
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export function createLogger(opts: LoggerOptions = {}, context: LogFields = {}): Logger {
  const minLevel = opts.level ?? "info";
  const write = opts.write ?? ((line: string) => { process.stderr.write(line); });

  const log = (level: LogLevel, message: string, fields?: LogFields): void => {
    if (levelRank[level] < levelRank[minLevel]) return;
    const ts = new Date().toISOString();
    const merged = { ...context, ...fields };

    if (opts.json) {
      write(`${safeJson({ ts, level, message, ...merged })}\n`);
      return;
    }

    const extra = Object.keys(merged).length > 0 ? ` ${safeJson(merged)}` : "";
    write(`${ts} ${level} ${message}${extra}\n`);
  };

  return {
    trace: (message, fields) => log("trace", message, fields),
    debug: (message, fields) => log("debug", message, fields),
    info: (message, fields) => log("info", message, fields),
    warn: (message, fields) => log("warn", message, fields),
    error: (message, fields) => log("error", message, fields),
    child: (fields) => createLogger(opts, { ...context, ...fields }),
  };
}

/** Logger that drops everything. */
export const silentLogger: Logger = createLogger({ write: () => {} });

function safeJson(v: unknown): string {
  try {
    return JSON.stringify(v, (_key, value: unknown) =>
      value instanceof Error ? { name: value.name, message: value.message } : value,
    );
  } catch {
    return '"[unserializable]"';
  }
}
