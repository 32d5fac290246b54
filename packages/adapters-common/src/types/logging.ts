/**
 * Type alias for log callback function.
 * Stream is optional and defaults to "stdout".
 */
export type ProviderLogCallback = (message: string, stream?: "stdout" | "stderr") => void;

export type LogLevel = "DEBUG" | "INFO" | "WARN" | "ERROR";

/**
 * Structured fields appended to a log line as key=value pairs.
 */
export type LogFields = Record<string, string | number | boolean | undefined>;
