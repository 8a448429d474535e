import { inspect } from "node:util";
import { getLogLevel, type LogThreshold } from "../config";

export type LogLevel = "info" | "warn" | "error" | "debug";

export type LogFields = Record<string, unknown>;

export interface Logger {
  child: (fields: LogFields) => Logger;
  debug: (message: string, fields?: LogFields) => void;
  info: (message: string, fields?: LogFields) => void;
  warn: (message: string, fields?: LogFields) => void;
  error: (message: string, error?: unknown, fields?: LogFields) => void;
}

const SEVERITY: Record<LogThreshold, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

const formatError = (error: unknown) => {
  if (!error) {
    return undefined;
  }

  if (error instanceof Error) {
    const code = "code" in error ? error.code : undefined;
    return {
      name: error.name,
      message: error.message,
      ...(typeof code === "string" ? { code } : {}),
      stack: error.stack,
    };
  }

  return typeof error === "object" ? error : inspect(error);
};

const writeLog = (level: LogLevel, message: string, fields: LogFields) => {
  const entry = {
    level,
    message,
    timestamp: new Date().toISOString(),
    ...fields,
  };

  const serialized = JSON.stringify(entry);
  const stream = level === "error" ? process.stderr : process.stdout;
  stream.write(`${serialized}\n`);
};

export const createLogger = (
  base: LogFields = {},
  threshold: LogThreshold = getLogLevel(),
): Logger => {
  const enabled = (level: LogLevel) => SEVERITY[level] >= SEVERITY[threshold];

  return {
    child: (fields: LogFields) => createLogger({ ...base, ...fields }, threshold),
    debug: (message, fields = {}) => {
      if (enabled("debug")) writeLog("debug", message, { ...base, ...fields });
    },
    info: (message, fields = {}) => {
      if (enabled("info")) writeLog("info", message, { ...base, ...fields });
    },
    warn: (message, fields = {}) => {
      if (enabled("warn")) writeLog("warn", message, { ...base, ...fields });
    },
    error: (message, error, fields = {}) => {
      if (!enabled("error")) {
        return;
      }

      const errorField = formatError(error);
      const merged: LogFields = errorField
        ? { ...base, ...fields, error: errorField }
        : { ...base, ...fields };

      writeLog("error", message, merged);
    },
  };
};

export const logger = createLogger();
