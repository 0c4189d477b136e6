import { describe, expect, it } from "vitest";
import { formatDay, parseDeadline, toDay } from "./dates";

describe("parseDeadline", () => {
  it("parses strict YYYY-MM-DD", () => {
    const d = parseDeadline("2025-08-10");
    expect(d && formatDay(d)).toBe("2025-08-10");
  });

  it("trims surrounding whitespace", () => {
    const d = parseDeadline(" 2025-08-10 ");
    expect(d && formatDay(d)).toBe("2025-08-10");
  });

  it.each([["not-a-date"], ["2025-8-1"], ["2025-02-30"], ["10/08/2025"], [""]])(
    "treats %j as no deadline",
    (value) => {
      expect(parseDeadline(value)).toBeNull();
    }
  );

  it("treats non-strings as no deadline", () => {
    expect(parseDeadline(undefined)).toBeNull();
    expect(parseDeadline(null)).toBeNull();
    expect(parseDeadline(20250810)).toBeNull();
  });
});

describe("toDay", () => {
  it("accepts a date string", () => {
    expect(formatDay(toDay("2025-08-10"))).toBe("2025-08-10");
  });

  it("drops the time of day", () => {
    const d = toDay(new Date(2025, 7, 10, 17, 45));
    expect(formatDay(d)).toBe("2025-08-10");
    expect(d.hour()).toBe(0);
  });
});
