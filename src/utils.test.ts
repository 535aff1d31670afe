import { describe, it, expect } from "vitest";
import { TimeoutError, formatDuration, formatValue, toCount, truncate, withTimeout } from "./utils.js";

describe("withTimeout", () => {
  it("resolves when the promise settles first", async () => {
    await expect(withTimeout(Promise.resolve(42), 1000)).resolves.toBe(42);
  });

  it("rejects with TimeoutError when the deadline passes", async () => {
    const never = new Promise<never>(() => {});
    await expect(withTimeout(never, 10, "too slow")).rejects.toThrow(TimeoutError);
  });
});

describe("formatDuration", () => {
  it("picks a unit", () => {
    expect(formatDuration(0)).toBe("<1ms");
    expect(formatDuration(42.4)).toBe("42ms");
    expect(formatDuration(1500)).toBe("1.50s");
    expect(formatDuration(90000)).toBe("1.5m");
  });
});

describe("truncate", () => {
  it("keeps short strings", () => {
    expect(truncate("abc", 5)).toBe("abc");
  });

  it("cuts long strings to the limit including the ellipsis", () => {
    expect(truncate("abcdefghij", 8)).toBe("abcde...");
  });
});

describe("formatValue", () => {
  it("renders cells", () => {
    expect(formatValue(null)).toBe("null");
    expect(formatValue(undefined)).toBe("null");
    expect(formatValue(7)).toBe("7");
    expect(formatValue(1.23456)).toBe("1.235");
    expect(formatValue(2.5)).toBe("2.5");
    expect(formatValue(10n)).toBe("10");
    expect(formatValue(new Date("2024-01-02T03:04:05.000Z"))).toBe("2024-01-02T03:04:05.000Z");
    expect(formatValue(Buffer.from("abc"))).toBe("<3 bytes>");
    expect(formatValue({ a: 1 })).toBe('{"a":1}');
    expect(formatValue("text")).toBe("text");
  });
});

describe("toCount", () => {
  it("accepts what drivers return for COUNT(*)", () => {
    expect(toCount(5)).toBe(5);
    expect(toCount(12n)).toBe(12);
    expect(toCount("31")).toBe(31);
    expect(toCount("n/a")).toBe(0);
    expect(toCount(null)).toBe(0);
  });
});
