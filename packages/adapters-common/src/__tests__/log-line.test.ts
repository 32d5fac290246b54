import { createFieldLogger, formatLogLine } from "../utils/log-line";
import type { ProviderLogCallback } from "../types/logging";

describe("formatLogLine", () => {
  it("should append fields as key=value pairs", () => {
    expect(formatLogLine("INFO", "Created secret", { resource_id: "abc", attempts: 2 })).toBe(
      "[INFO] Created secret resource_id=abc attempts=2"
    );
  });

  it("should quote values containing whitespace and drop undefined ones", () => {
    expect(formatLogLine("WARN", "Slow call", { note: "two words", skipped: undefined })).toBe(
      '[WARN] Slow call note="two words"'
    );
  });
});

describe("createFieldLogger", () => {
  it("should send errors to stderr and everything else to stdout", () => {
    const log = jest.fn<void, Parameters<ProviderLogCallback>>();
    const logger = createFieldLogger(log);

    logger.debug("checking");
    logger.error("failed");

    expect(log).toHaveBeenNthCalledWith(1, "[DEBUG] checking", "stdout");
    expect(log).toHaveBeenNthCalledWith(2, "[ERROR] failed", "stderr");
  });

  it("should merge bound fields", () => {
    const log = jest.fn<void, Parameters<ProviderLogCallback>>();
    const logger = createFieldLogger(log, { name: "s1" }).with({ version: "v2" });

    logger.info("Rotated");

    expect(log).toHaveBeenCalledWith("[INFO] Rotated name=s1 version=v2", "stdout");
  });
});
