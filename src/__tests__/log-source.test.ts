import { describe, it, expect } from "vitest";
import { filterByLevel, parseThreadtimeLog } from "../log-source";
import { parseThreadtime } from "../threadtime";

const clock = () => new Date(2024, 5, 15);

describe("parseThreadtimeLog", () => {
  const source = [
    "--------- beginning of main",
    "12-31 0:0:0.0 1 1 I tag: one\r",
    "",
    "   ",
    "not a line",
    "12-31 0:0:0.0 2 3 E tag: two",
    "",
  ].join("\n");

  it("decodes each line on its own", () => {
    const { messages } = parseThreadtimeLog(source, { clock });
    expect(messages.map((m) => m.lineNumber)).toEqual([2, 6]);
    expect(messages.map((m) => m.message.content)).toEqual(["one", "two"]);
    expect(messages[1].message.processId).toBe(2);
    expect(messages[1].message.threadId).toBe(3);
  });

  it("reports failures with their line numbers", () => {
    const { failures } = parseThreadtimeLog(source, { clock });
    expect(failures.map((f) => f.lineNumber)).toEqual([1, 5]);
    expect(failures[0].error.code).toBe("REJECTED_BANNER");
    expect(failures[1].error.code).toBe("MISSING_FIELD_BOUNDARY");
    expect(failures[1].line).toBe("not a line");
  });

  it("returns nothing for empty input", () => {
    expect(parseThreadtimeLog("", { clock })).toEqual({ messages: [], failures: [] });
  });
});

describe("filterByLevel", () => {
  it("keeps messages at or above the threshold", () => {
    const messages = ["V", "D", "I", "W", "E", "F"].map((code) =>
      parseThreadtime(`12-31 0:0:0.0 1 1 ${code} tag: ${code}`, { clock }),
    );
    expect(filterByLevel(messages, "Warning").map((m) => m.content)).toEqual(["W", "E", "F"]);
    expect(filterByLevel(messages, "Verbose")).toHaveLength(6);
  });
});
