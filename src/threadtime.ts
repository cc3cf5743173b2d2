import { DateTime } from "luxon";
import { MessageBuilder } from "./builder";
import { resolveParserOptions, type ResolvedParserOptions } from "./config";
import { DecodeError, type DecodeStage } from "./error-codes";
import { levelFromCode, type Level } from "./level";
import type { LogcatMessage } from "./message";
import type { LineParser, ParserOptions } from "./types";

const MAX_UNSIGNED = 0xffffffff;
const MIN_SIGNED = -0x80000000;
const MAX_SIGNED = 0x7fffffff;

// -------------------------------------------------------------------------
// Field helpers
// -------------------------------------------------------------------------

function parseUnsigned(text: string): number | null {
  if (!/^\+?[0-9]+$/.test(text)) return null;
  const value = Number(text);
  return value <= MAX_UNSIGNED ? value : null;
}

function parseSigned(text: string): number | null {
  if (!/^[+-]?[0-9]+$/.test(text)) return null;
  const value = Number(text);
  return value >= MIN_SIGNED && value <= MAX_SIGNED ? value : null;
}

/** Splits at the first whitespace character, dropping that character. */
function splitAtWhitespace(text: string): [string, string] | null {
  const match = /\s/.exec(text);
  if (!match) return null;
  return [text.slice(0, match.index), text.slice(match.index + match[0].length)];
}

function takeField(rest: string, stage: DecodeStage, name: string): [string, string] {
  const trimmed = rest.trimStart();
  const parts = splitAtWhitespace(trimmed);
  if (!parts) {
    throw new DecodeError("MISSING_FIELD_BOUNDARY", stage, `no groups after ${name}`, trimmed);
  }
  return parts;
}

// -------------------------------------------------------------------------
// Parser
// -------------------------------------------------------------------------

interface PartialMessage {
  dateToken: string;
  timeToken: string;
  month: number;
  day: number;
  hour: number;
  minute: number;
  second: number;
  millisecond: number;
  pid: number;
  tid: number;
  level: Level;
  tag: string;
}

function emptyPartial(): PartialMessage {
  return {
    dateToken: "",
    timeToken: "",
    month: 0,
    day: 0,
    hour: 0,
    minute: 0,
    second: 0,
    millisecond: 0,
    pid: 0,
    tid: 0,
    level: "Verbose",
    tag: "",
  };
}

/**
 * Decodes lines of `logcat -v threadtime` output:
 *
 *   mm-dd hh:mm:ss.mmm pid tid level tag: content
 *
 * Fields are read left to right; each stage skips leading whitespace and
 * hands the unread remainder to the next one.
 */
export class ThreadtimeParser implements LineParser {
  private readonly options: ResolvedParserOptions;
  private msg: PartialMessage = emptyPartial();

  constructor(options: ParserOptions = {}) {
    this.options = resolveParserOptions(options);
  }

  parse(line: string): LogcatMessage {
    if (line.startsWith("-")) {
      throw new DecodeError("REJECTED_BANNER", "line", "section banner", line);
    }

    this.msg = emptyPartial();
    let rest = this.parseDate(line);
    rest = this.parseTime(rest);
    rest = this.parsePid(rest);
    rest = this.parseTid(rest);
    rest = this.parseLevel(rest);
    rest = this.parseTag(rest);
    return this.parseContent(rest);
  }

  private parseDate(rest: string): string {
    const [monthDay, after] = takeField(rest, "date", "date");
    const dash = monthDay.indexOf("-");
    if (dash === -1) {
      throw new DecodeError("MISSING_FIELD_BOUNDARY", "date", "'-' not found", monthDay);
    }
    const month = parseUnsigned(monthDay.slice(0, dash));
    const day = parseUnsigned(monthDay.slice(dash + 1));
    if (month === null || day === null) {
      throw new DecodeError("MALFORMED_NUMERIC", "date", "expected mm-dd", monthDay);
    }
    this.msg.dateToken = monthDay;
    this.msg.month = month;
    this.msg.day = day;
    return after;
  }

  private parseTime(rest: string): string {
    const [time, after] = takeField(rest, "time", "time");
    const groups = time.split(/[:.]/).map(parseUnsigned);
    if (groups.length !== 4) {
      throw new DecodeError("MALFORMED_NUMERIC", "time", "expected hh:mm:ss.mmm", time);
    }
    const [hour, minute, second, millisecond] = groups;
    if (hour === null || minute === null || second === null || millisecond === null) {
      throw new DecodeError("MALFORMED_NUMERIC", "time", "expected hh:mm:ss.mmm", time);
    }
    this.msg.timeToken = time;
    this.msg.hour = hour;
    this.msg.minute = minute;
    this.msg.second = second;
    this.msg.millisecond = millisecond;
    return after;
  }

  private parsePid(rest: string): string {
    const [pid, after] = takeField(rest, "pid", "process id");
    const value = parseSigned(pid);
    if (value === null) {
      throw new DecodeError("MALFORMED_NUMERIC", "pid", "invalid process id", pid);
    }
    this.msg.pid = value;
    return after;
  }

  private parseTid(rest: string): string {
    const [tid, after] = takeField(rest, "tid", "thread id");
    const value = parseSigned(tid);
    if (value === null) {
      throw new DecodeError("MALFORMED_NUMERIC", "tid", "invalid thread id", tid);
    }
    this.msg.tid = value;
    return after;
  }

  private parseLevel(rest: string): string {
    const [token, after] = takeField(rest, "level", "level");
    const level = levelFromCode(token);
    if (level === null) {
      throw new DecodeError("UNKNOWN_LEVEL_CODE", "level", "expected one of V, D, I, W, E, F", token);
    }
    this.msg.level = level;
    return after;
  }

  private parseTag(rest: string): string {
    const trimmed = rest.trimStart();
    const colon = trimmed.indexOf(":");
    if (colon === -1) {
      throw new DecodeError("MISSING_TAG_DELIMITER", "tag", "missing ':' after tag", trimmed);
    }
    this.msg.tag = trimmed.slice(0, colon).trimEnd();

    // Skips one character, normally the space after ':'. Content written
    // directly after the colon loses its first character.
    const after = trimmed.slice(colon + 1);
    const first = after.codePointAt(0);
    if (first === undefined) return after;
    return after.slice(String.fromCodePoint(first).length);
  }

  private parseContent(rest: string): LogcatMessage {
    const { msg } = this;
    const year = DateTime.fromJSDate(this.options.clock()).year;
    const dateTime = DateTime.fromObject(
      {
        year,
        month: msg.month,
        day: msg.day,
        hour: msg.hour,
        minute: msg.minute,
        second: msg.second,
        millisecond: msg.millisecond,
      },
      { zone: "utc" },
    );
    // luxon accepts 24:00:00.000 as the end of a day; logcat never prints it
    if (!dateTime.isValid || msg.hour > 23) {
      throw new DecodeError(
        "INVALID_TIMESTAMP",
        "content",
        "date or time out of range",
        `${msg.dateToken} ${msg.timeToken}`,
      );
    }

    return new MessageBuilder()
      .level(msg.level)
      .tag(msg.tag)
      .content(rest)
      .dateTime(dateTime)
      .processId(msg.pid)
      .threadId(msg.tid)
      .build();
  }
}

// -------------------------------------------------------------------------
// Entry points
// -------------------------------------------------------------------------

/** Decodes one threadtime line. Throws {@link DecodeError} on malformed input. */
export function parseThreadtime(line: string, options: ParserOptions = {}): LogcatMessage {
  return new ThreadtimeParser(options).parse(line);
}

export function tryParseThreadtime(line: string, options: ParserOptions = {}): LogcatMessage | null {
  try {
    return parseThreadtime(line, options);
  } catch (err: unknown) {
    if (err instanceof DecodeError) return null;
    throw err;
  }
}
