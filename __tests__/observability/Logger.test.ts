import { describe, it, expect } from "vitest";
import {
  createLogger,
  resolveLoggerOptions,
  sanitizeForLog,
  summarizeForLog,
} from "../../src/observability/Logger.js";

describe("Logger", () => {
  it("is silent unless the environment enables it", () => {
    expect(resolveLoggerOptions({ env: {} })).toEqual({ enabled: false, level: "silent", prefix: "mantle-chat" });
    expect(resolveLoggerOptions({ env: { MANTLE_CHAT_LOG_LEVEL: "info" } })).toMatchObject({
      enabled: true,
      level: "info",
    });
    expect(resolveLoggerOptions({ env: { MANTLE_CHAT_DEBUG: "1" } })).toMatchObject({
      enabled: true,
      level: "debug",
    });
    expect(resolveLoggerOptions({ env: { MANTLE_CHAT_LOG_LEVEL: "off" } })).toMatchObject({ enabled: false });
  });

  it("writes prefixed lines at or above the configured level", () => {
    const lines: string[] = [];
    const logger = createLogger({ enabled: true, level: "info", sink: (line) => lines.push(line) });

    logger.debug("hidden");
    logger.info("shown", { model: "m1" });
    logger.error("broken");

    expect(lines).toEqual(['[mantle-chat] [INFO] shown {"model":"m1"}', "[mantle-chat] [ERROR] broken"]);
    expect(logger.isEnabled("debug")).toBe(false);
    expect(logger.isEnabled("warn")).toBe(true);
  });

  it("redacts credentials in metadata", () => {
    const lines: string[] = [];
    const logger = createLogger({ enabled: true, level: "debug", sink: (line) => lines.push(line) });

    logger.debug("gateway created", { baseUrl: "https://api.example.test/v1", apiKey: "test-secret" });

    expect(lines).toEqual([
      '[mantle-chat] [DEBUG] gateway created {"baseUrl":"https://api.example.test/v1","apiKey":"[REDACTED]"}',
    ]);
    expect(sanitizeForLog({ token: "abc" })).toBe('{"token":"[REDACTED]"}');
  });

  it("summarizes values briefly", () => {
    expect(summarizeForLog([1, 2, 3])).toBe("Array(3)");
    expect(summarizeForLog({ a: 1, b: 2 })).toBe("Object(keys: a, b)");
    expect(summarizeForLog("x".repeat(5), 3)).toBe("xxx...");
  });
});
