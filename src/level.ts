export const LEVELS = ["Verbose", "Debug", "Info", "Warning", "Error", "Fatal"] as const;

export type Level = (typeof LEVELS)[number];

const LEVEL_CODES = ["V", "D", "I", "W", "E", "F"] as const;

export type LevelCode = (typeof LEVEL_CODES)[number];

export function levelRank(level: Level): number {
  return LEVELS.indexOf(level);
}

export function isAtLeast(level: Level, threshold: Level): boolean {
  return levelRank(level) >= levelRank(threshold);
}

export function isDebugOrHigher(level: Level): boolean {
  return isAtLeast(level, "Debug");
}

export function isInfoOrHigher(level: Level): boolean {
  return isAtLeast(level, "Info");
}

export function isWarningOrHigher(level: Level): boolean {
  return isAtLeast(level, "Warning");
}

export function isErrorOrHigher(level: Level): boolean {
  return isAtLeast(level, "Error");
}

/** Single-letter code, as printed by logcat. */
export function levelShort(level: Level): LevelCode {
  return LEVEL_CODES[levelRank(level)];
}

/**
 * Maps the first character of `code` to a level. Returns null for an empty
 * string or an unknown code.
 */
export function levelFromCode(code: string): Level | null {
  const idx = LEVEL_CODES.findIndex((c) => c === code.charAt(0));
  if (idx === -1) return null;
  return LEVELS[idx];
}
