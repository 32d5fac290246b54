import type { LogFields, LogLevel, ProviderLogCallback } from "../types/logging";

/** Field key tagging every line with the secret being operated on */
export const LOG_KEY_RESOURCE_ID = "resource_id";

/**
 * Format a log line as `[LEVEL] message key=value ...`.
 * Undefined fields are dropped; values containing whitespace are quoted.
 */
export function formatLogLine(level: LogLevel, message: string, fields: LogFields = {}): string {
  let line = `[${level}] ${message}`;
  for (const [key, value] of Object.entries(fields)) {
    if (value === undefined) continue;
    const text = String(value);
    line += /\s/.test(text) ? ` ${key}=${JSON.stringify(text)}` : ` ${key}=${text}`;
  }
  return line;
}

export const consoleLogCallback: ProviderLogCallback = (message, stream = "stdout") => {
  if (stream === "stderr") {
    console.error(message);
  } else {
    console.log(message);
  }
};

/**
 * Leveled logger bound to a fixed set of fields.
 */
export interface FieldLogger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
  with(fields: LogFields): FieldLogger;
}

export function createFieldLogger(log: ProviderLogCallback, fields: LogFields = {}): FieldLogger {
  const emit = (level: LogLevel, message: string) =>
    log(formatLogLine(level, message, fields), level === "ERROR" ? "stderr" : "stdout");

  return {
    debug: (message) => emit("DEBUG", message),
    info: (message) => emit("INFO", message),
    warn: (message) => emit("WARN", message),
    error: (message) => emit("ERROR", message),
    with: (extra) => createFieldLogger(log, { ...fields, ...extra }),
  };
}
