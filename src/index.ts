export { MessageBuilder } from "./builder";
export {
  ALLOWED_LOG_LEVELS,
  LOG_LEVEL_ENV,
  normalizeLogLevel,
  resolveLoggerSettings,
  type LogLevel,
  type LoggerSettings,
} from "./config";
export {
  BuilderError,
  DecodeError,
  describeError,
  type DecodeStage,
  type ErrorCode,
  type ErrorDescription,
  type MessageField,
} from "./error-codes";
export { formatThreadtime } from "./format";
export {
  LEVELS,
  isAtLeast,
  isDebugOrHigher,
  isErrorOrHigher,
  isInfoOrHigher,
  isWarningOrHigher,
  levelFromCode,
  levelRank,
  levelShort,
  type Level,
  type LevelCode,
} from "./level";
export {
  filterByLevel,
  parseThreadtimeLog,
  type DecodedLine,
  type FailedLine,
  type ThreadtimeLogResult,
} from "./log-source";
export { createLogger, getChildLogger, getLogger } from "./logger";
export { LogcatMessage, type MessageFields } from "./message";
export { ThreadtimeParser, parseThreadtime, tryParseThreadtime } from "./threadtime";
export type { DateParts, LineParser, ParserOptions, TimeParts } from "./types";
