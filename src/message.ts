import type { DateTime } from "luxon";
import type { Level } from "./level";
import type { DateParts, TimeParts } from "./types";

export interface MessageFields {
  level: Level;
  tag: string;
  content: string;
  dateTime: DateTime | null;
  processId: number | null;
  threadId: number | null;
}

/**
 * One decoded logcat record. Instances are frozen; build new ones with
 * {@link MessageBuilder}.
 */
export class LogcatMessage {
  readonly level: Level;
  readonly tag: string;
  readonly content: string;

  /** Wall-clock date and time; the year comes from the parser's clock. */
  readonly dateTime: DateTime | null;
  readonly processId: number | null;
  readonly threadId: number | null;

  constructor(fields: MessageFields) {
    this.level = fields.level;
    this.tag = fields.tag;
    this.content = fields.content;
    this.dateTime = fields.dateTime;
    this.processId = fields.processId;
    this.threadId = fields.threadId;
    Object.freeze(this);
  }

  get date(): DateParts | null {
    if (!this.dateTime) return null;
    const { year, month, day } = this.dateTime;
    return { year, month, day };
  }

  get time(): TimeParts | null {
    if (!this.dateTime) return null;
    const { hour, minute, second, millisecond } = this.dateTime;
    return { hour, minute, second, millisecond };
  }
}
