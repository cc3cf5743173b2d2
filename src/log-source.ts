import { DecodeError } from "./error-codes";
import { isAtLeast, type Level } from "./level";
import { getChildLogger } from "./logger";
import type { LogcatMessage } from "./message";
import { ThreadtimeParser } from "./threadtime";
import type { ParserOptions } from "./types";

export interface DecodedLine {
  lineNumber: number;
  message: LogcatMessage;
}

export interface FailedLine {
  lineNumber: number;
  line: string;
  error: DecodeError;
}

export interface ThreadtimeLogResult {
  messages: DecodedLine[];
  failures: FailedLine[];
}

/**
 * Decodes every non-empty line of `source` on its own. Lines that fail to
 * decode, banners included, are reported in `failures`.
 */
export function parseThreadtimeLog(source: string, options: ParserOptions = {}): ThreadtimeLogResult {
  const log = getChildLogger("threadtime");
  const parser = new ThreadtimeParser(options);
  const messages: DecodedLine[] = [];
  const failures: FailedLine[] = [];

  const lines = source.split("\n");
  for (let i = 0; i < lines.length; i++) {
    const line = lines[i].endsWith("\r") ? lines[i].slice(0, -1) : lines[i];
    if (!line.trim()) continue;

    try {
      messages.push({ lineNumber: i + 1, message: parser.parse(line) });
    } catch (err: unknown) {
      if (!(err instanceof DecodeError)) throw err;
      log.debug(`skipped line ${i + 1}`, { code: err.code, stage: err.stage, input: err.input });
      failures.push({ lineNumber: i + 1, line, error: err });
    }
  }

  return { messages, failures };
}

export function filterByLevel(messages: LogcatMessage[], threshold: Level): LogcatMessage[] {
  return messages.filter((m) => isAtLeast(m.level, threshold));
}
