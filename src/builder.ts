import type { DateTime } from "luxon";
import { BuilderError } from "./error-codes";
import type { Level } from "./level";
import { LogcatMessage } from "./message";

/**
 * Collects message fields one at a time, in any order. `build()` checks the
 * mandatory fields (level, tag, content) and can succeed only once.
 */
export class MessageBuilder {
  private levelValue: Level | null = null;
  private tagValue: string | null = null;
  private contentValue: string | null = null;

  private dateTimeValue: DateTime | null = null;
  private processIdValue: number | null = null;
  private threadIdValue: number | null = null;

  private consumed = false;

  level(value: Level): this {
    this.levelValue = value;
    return this;
  }

  tag(value: string): this {
    this.tagValue = value;
    return this;
  }

  content(value: string): this {
    this.contentValue = value;
    return this;
  }

  dateTime(value: DateTime): this {
    this.dateTimeValue = value;
    return this;
  }

  processId(value: number): this {
    this.processIdValue = value;
    return this;
  }

  threadId(value: number): this {
    this.threadIdValue = value;
    return this;
  }

  build(): LogcatMessage {
    if (this.consumed) throw new BuilderError("BUILDER_CONSUMED");
    if (this.levelValue === null) throw new BuilderError("FIELD_NOT_SET", "level");
    if (this.tagValue === null) throw new BuilderError("FIELD_NOT_SET", "tag");
    if (this.contentValue === null) throw new BuilderError("FIELD_NOT_SET", "content");

    this.consumed = true;
    return new LogcatMessage({
      level: this.levelValue,
      tag: this.tagValue,
      content: this.contentValue,
      dateTime: this.dateTimeValue,
      processId: this.processIdValue,
      threadId: this.threadIdValue,
    });
  }
}
