import { config, type LogLevel } from "../config";

type LogMeta = Record<string, unknown>;

const levelPriority: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

const sinks: Record<LogLevel, (line: string) => void> = {
  debug: (line) => console.debug(line),
  info: (line) => console.log(line),
  warn: (line) => console.warn(line),
  error: (line) => console.error(line),
};

/** Errors do not survive JSON.stringify; flatten them to name and message. */
export const normalizeMeta = (meta: LogMeta): LogMeta =>
  Object.fromEntries(
    Object.entries(meta).map(([key, value]) => [
      key,
      value instanceof Error ? { name: value.name, message: value.message } : value,
    ]),
  );

export const formatMessage = (level: LogLevel, scope: string | undefined, message: string, meta?: LogMeta) => {
  const timestamp = new Date().toISOString();
  const prefix = scope ? `[${scope}] ` : "";
  const base = `[${timestamp}] [${level.toUpperCase()}] ${prefix}${message}`;
  if (!meta || Object.keys(meta).length === 0) return base;
  return `${base} ${JSON.stringify(normalizeMeta(meta))}`;
};

const shouldLog = (level: LogLevel): boolean => levelPriority[level] >= levelPriority[config.logLevel];

const createLogger = (scope?: string) => {
  const log = (level: LogLevel, message: string, meta?: LogMeta) => {
    if (!shouldLog(level)) return;
    sinks[level](formatMessage(level, scope, message, meta));
  };
  return {
    debug: (message: string, meta?: LogMeta) => log("debug", message, meta),
    info: (message: string, meta?: LogMeta) => log("info", message, meta),
    warn: (message: string, meta?: LogMeta) => log("warn", message, meta),
    error: (message: string, meta?: LogMeta) => log("error", message, meta),
  };
};

export const logger = createLogger();

export const scopedLogger = (scope: string) => createLogger(scope);

export type Logger = ReturnType<typeof createLogger>;
