import { format } from "node:util";
import { AzureLogger, setLogLevel } from "@azure/logger";
import type { AzureLogLevel } from "@azure/logger";
import type { ProviderLogCallback } from "@azurekv/adapters-common";

const BEGINNING_OF_LINE = /^/gm;

/**
 * Route Azure SDK log output through the provider log callback.
 * Every line is prefixed with "[DEBUG] " so multi-line SDK messages
 * keep a level on each line.
 */
export function forwardSdkLogs(log: ProviderLogCallback, level: AzureLogLevel = "info"): void {
  setLogLevel(level);
  AzureLogger.log = (first?: unknown, ...rest: unknown[]) => {
    log(format(first, ...rest).replace(BEGINNING_OF_LINE, "[DEBUG] "));
  };
}
