import { describe, it, expect } from "vitest";
import {
  levelToMinLevel,
  normalizeLogLevel,
  resolveLoggerSettings,
  resolveParserOptions,
} from "../config";
import { createLogger } from "../logger";

describe("normalizeLogLevel", () => {
  it("accepts known levels case-insensitively", () => {
    expect(normalizeLogLevel("debug")).toBe("debug");
    expect(normalizeLogLevel(" ERROR ")).toBe("error");
    expect(normalizeLogLevel("silent")).toBe("silent");
  });

  it("falls back for unknown or missing levels", () => {
    expect(normalizeLogLevel(undefined)).toBe("warn");
    expect(normalizeLogLevel("loud")).toBe("warn");
    expect(normalizeLogLevel("", "info")).toBe("info");
  });
});

describe("resolveLoggerSettings", () => {
  it("reads LOGCAT_LOG_LEVEL", () => {
    expect(resolveLoggerSettings({ LOGCAT_LOG_LEVEL: "trace" })).toEqual({ level: "trace" });
    expect(resolveLoggerSettings({})).toEqual({ level: "warn" });
  });
});

describe("levelToMinLevel", () => {
  it("maps to tslog level ids", () => {
    expect(levelToMinLevel("trace")).toBe(1);
    expect(levelToMinLevel("warn")).toBe(4);
    expect(levelToMinLevel("fatal")).toBe(6);
    expect(levelToMinLevel("silent")).toBe(Number.POSITIVE_INFINITY);
  });
});

describe("createLogger", () => {
  it("applies the configured minimum level", () => {
    const logger = createLogger({ level: "error" });
    expect(logger.settings.name).toBe("logcat");
    expect(logger.settings.minLevel).toBe(5);
  });
});

describe("resolveParserOptions", () => {
  it("keeps an injected clock", () => {
    const clock = () => new Date(2001, 0, 1);
    expect(resolveParserOptions({ clock }).clock).toBe(clock);
  });

  it("defaults to the system clock", () => {
    const before = Date.now();
    const now = resolveParserOptions().clock().getTime();
    expect(now).toBeGreaterThanOrEqual(before);
  });
});
