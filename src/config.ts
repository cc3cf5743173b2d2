import type { ParserOptions } from "./types";

export const ALLOWED_LOG_LEVELS = [
  "silent",
  "fatal",
  "error",
  "warn",
  "info",
  "debug",
  "trace",
] as const;

export type LogLevel = (typeof ALLOWED_LOG_LEVELS)[number];

export const LOG_LEVEL_ENV = "LOGCAT_LOG_LEVEL";

const DEFAULT_LOG_LEVEL: LogLevel = "warn";

export interface LoggerSettings {
  level: LogLevel;
}

export interface ResolvedParserOptions {
  clock: () => Date;
}

function isLogLevel(value: string): value is LogLevel {
  return ALLOWED_LOG_LEVELS.some((level) => level === value);
}

export function normalizeLogLevel(level?: string, fallback: LogLevel = DEFAULT_LOG_LEVEL): LogLevel {
  const candidate = (level ?? "").trim().toLowerCase();
  return isLogLevel(candidate) ? candidate : fallback;
}

export function resolveLoggerSettings(env: NodeJS.ProcessEnv = process.env): LoggerSettings {
  return { level: normalizeLogLevel(env[LOG_LEVEL_ENV]) };
}

// tslog ids: trace=1, debug=2, info=3, warn=4, error=5, fatal=6
export function levelToMinLevel(level: LogLevel): number {
  const map: Record<LogLevel, number> = {
    trace: 1,
    debug: 2,
    info: 3,
    warn: 4,
    error: 5,
    fatal: 6,
    silent: Number.POSITIVE_INFINITY,
  };
  return map[level];
}

export function resolveParserOptions(options: ParserOptions = {}): ResolvedParserOptions {
  return { clock: options.clock ?? (() => new Date()) };
}
