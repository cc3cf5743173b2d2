import type { LogcatMessage } from "../message";

export interface DateParts {
  year: number;
  month: number;
  day: number;
}

export interface TimeParts {
  hour: number;
  minute: number;
  second: number;
  millisecond: number;
}

export interface ParserOptions {
  /** Read once per line to supply the year, which threadtime output omits. */
  clock?: () => Date;
}

export interface LineParser {
  parse(line: string): LogcatMessage;
}
