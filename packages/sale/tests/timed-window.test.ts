import { describe, it, expect } from "vitest";
import { TimedWindow } from "../src/timed-window.js";
import { SaleError } from "../src/types.js";

describe("TimedWindow", () => {
  const window = new TimedWindow({ start: 100, end: 200 });

  it("is open on both bounds", () => {
    expect(window.isOpen(99)).toBe(false);
    expect(window.isOpen(100)).toBe(true);
    expect(window.isOpen(200)).toBe(true);
    expect(window.isOpen(201)).toBe(false);
  });

  it("has started from the start and expired after the end", () => {
    expect(window.hasStarted(99)).toBe(false);
    expect(window.hasStarted(100)).toBe(true);
    expect(window.hasExpired(200)).toBe(false);
    expect(window.hasExpired(201)).toBe(true);
  });

  it("withEnd returns a new window", () => {
    const longer = window.withEnd(300);

    expect(longer.toJSON()).toEqual({ start: 100, end: 300 });
    expect(window.end).toBe(200);
  });

  it("rejects an end at or before the start", () => {
    expect(() => new TimedWindow({ start: 100, end: 100 })).toThrow(SaleError);
    expect(() => window.withEnd(50)).toThrow("must be after its start");
  });

  it("rejects fractional bounds", () => {
    expect(() => new TimedWindow({ start: 0.5, end: 10 })).toThrow("integer unix seconds");
  });
});
