export type LogLevel = "debug" | "info" | "warn" | "error";

export type LogFields = Record<string, unknown>;

export interface Logger {
  debug(event: string, fields?: LogFields): void;
  info(event: string, fields?: LogFields): void;
  warn(event: string, fields?: LogFields): void;
  error(event: string, fields?: LogFields): void;
  child(bindings: LogFields): Logger;
  isLevelEnabled(level: LogLevel): boolean;
}

export const logLevels: readonly LogLevel[] = ["debug", "info", "warn", "error"];

const levelRank: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3
};

export const isLogLevel = (value: string): value is LogLevel =>
  (logLevels as readonly string[]).includes(value);

export type SerializedError = {
  name: string;
  message: string;
  status?: number;
  stack?: string;
};

export const describeError = (err: unknown, includeStack = false): SerializedError => {
  if (!(err instanceof Error)) {
    return { name: "NonError", message: String(err) };
  }

  const described: SerializedError = { name: err.name || "Error", message: err.message };
  if ("status" in err && typeof err.status === "number") described.status = err.status;
  if (includeStack && typeof err.stack === "string") described.stack = err.stack;
  return described;
};

type LoggerOptions = {
  level?: LogLevel;
  bindings?: LogFields;
};

/**
 * Structured logger writing one JSON object per line through `console`.
 * Fields whose value is an `Error` are serialized with `describeError`
 * (stack traces only when the logger runs at debug level).
 */
export const createLogger = (options: LoggerOptions = {}): Logger => {
  const level = options.level ?? "info";
  const bindings = options.bindings ?? {};

  const isLevelEnabled = (candidate: LogLevel) => levelRank[candidate] >= levelRank[level];

  const serializeFields = (fields: LogFields): LogFields => {
    const serialized: LogFields = {};
    for (const [key, value] of Object.entries(fields)) {
      serialized[key] = value instanceof Error ? describeError(value, level === "debug") : value;
    }
    return serialized;
  };

  const write = (entryLevel: LogLevel, event: string, fields: LogFields = {}) => {
    if (!isLevelEnabled(entryLevel)) return;

    const line = JSON.stringify({ event, level: entryLevel, ...bindings, ...serializeFields(fields) });
    switch (entryLevel) {
      case "debug":
        // eslint-disable-next-line no-console
        console.debug(line);
        break;
      case "info":
        // eslint-disable-next-line no-console
        console.log(line);
        break;
      case "warn":
        // eslint-disable-next-line no-console
        console.warn(line);
        break;
      case "error":
        // eslint-disable-next-line no-console
        console.error(line);
        break;
    }
  };

  return {
    debug: (event, fields) => write("debug", event, fields),
    info: (event, fields) => write("info", event, fields),
    warn: (event, fields) => write("warn", event, fields),
    error: (event, fields) => write("error", event, fields),
    child: (childBindings) => createLogger({ level, bindings: { ...bindings, ...childBindings } }),
    isLevelEnabled
  };
};

/** Logger that drops everything; handy default for library-level components. */
export const silentLogger: Logger = {
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
  child: () => silentLogger,
  isLevelEnabled: () => false
};
