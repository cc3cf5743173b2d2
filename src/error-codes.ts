export type ErrorCode =
  | "REJECTED_BANNER"
  | "MISSING_FIELD_BOUNDARY"
  | "MALFORMED_NUMERIC"
  | "UNKNOWN_LEVEL_CODE"
  | "MISSING_TAG_DELIMITER"
  | "INVALID_TIMESTAMP"
  | "FIELD_NOT_SET"
  | "BUILDER_CONSUMED";

export type DecodeStage =
  | "line"
  | "date"
  | "time"
  | "pid"
  | "tid"
  | "level"
  | "tag"
  | "content";

export type MessageField = "level" | "tag" | "content";

export interface ErrorDescription {
  message: string;
  suggestion: string;
}

const ERROR_MAP: Record<ErrorCode, ErrorDescription> = {
  REJECTED_BANNER: {
    message: "Section banner, not a log record",
    suggestion: "Skip lines such as '--------- beginning of main'",
  },
  MISSING_FIELD_BOUNDARY: {
    message: "Expected delimiter after a field was not found",
    suggestion: "Check that the line was captured with 'logcat -v threadtime'",
  },
  MALFORMED_NUMERIC: {
    message: "Numeric field could not be parsed",
    suggestion: "Check the date, time, process id and thread id columns",
  },
  UNKNOWN_LEVEL_CODE: {
    message: "Level is not one of V, D, I, W, E, F",
    suggestion: "Check the priority column of the line",
  },
  MISSING_TAG_DELIMITER: {
    message: "No ':' after the tag",
    suggestion: "The line may be a continuation of a previous message",
  },
  INVALID_TIMESTAMP: {
    message: "Date or time is outside the calendar range",
    suggestion: "Check month, day and time values against the current year",
  },
  FIELD_NOT_SET: {
    message: "A mandatory message field was never set",
    suggestion: "Set level, tag and content before calling build()",
  },
  BUILDER_CONSUMED: {
    message: "The builder already produced a message",
    suggestion: "Create a new MessageBuilder for each message",
  },
};

function isErrorCode(code: string): code is ErrorCode {
  return Object.hasOwn(ERROR_MAP, code);
}

export function describeError(code: string): ErrorDescription {
  if (isErrorCode(code)) return ERROR_MAP[code];
  return {
    message: `Unknown error: ${code}`,
    suggestion: "See the error code for details",
  };
}

export class DecodeError extends Error {
  readonly code: ErrorCode;
  readonly stage: DecodeStage;
  readonly input: string;

  constructor(code: ErrorCode, stage: DecodeStage, detail: string, input: string) {
    super(`invalid ${stage}: ${detail}: ${input}`);
    this.name = "DecodeError";
    this.code = code;
    this.stage = stage;
    this.input = input;
  }
}

export class BuilderError extends Error {
  readonly code: ErrorCode;
  readonly field: MessageField | null;

  constructor(code: "FIELD_NOT_SET", field: MessageField);
  constructor(code: "BUILDER_CONSUMED");
  constructor(code: ErrorCode, field?: MessageField) {
    super(field ? `field not set: \`${field}\`` : describeError(code).message);
    this.name = "BuilderError";
    this.code = code;
    this.field = field ?? null;
  }
}
