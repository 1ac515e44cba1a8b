/**
 * Runtime type guard tests for @vestline/types
 *
 * Validates that guards narrow correctly for valid inputs
 * and reject invalid / malformed inputs at system boundaries.
 */
import { describe, it, expect } from "vitest";
import {
  isAccountId,
  isAmountString,
  isTransactional,
  isEventSource,
  isEventMetadata,
  isDomainEvent,
} from "../src/guards.js";
import { MAX_AMOUNT } from "../src/financial.js";

// =============================================================================
// Financial guards
// =============================================================================

describe("isAccountId", () => {
  it("accepts a non-empty string", () => {
    expect(isAccountId("alice")).toBe(true);
  });

  it("rejects blank strings", () => {
    expect(isAccountId("")).toBe(false);
    expect(isAccountId("   ")).toBe(false);
  });

  it("rejects non-strings", () => {
    expect(isAccountId(42)).toBe(false);
    expect(isAccountId(null)).toBe(false);
  });
});

describe("isAmountString", () => {
  it("accepts zero and plain integers", () => {
    expect(isAmountString("0")).toBe(true);
    expect(isAmountString("1000")).toBe(true);
  });

  it("accepts MAX_AMOUNT", () => {
    expect(isAmountString(MAX_AMOUNT.toString())).toBe(true);
  });

  it("rejects values above MAX_AMOUNT", () => {
    expect(isAmountString((MAX_AMOUNT + 1n).toString())).toBe(false);
  });

  it("rejects negatives, decimals and leading zeros", () => {
    expect(isAmountString("-1")).toBe(false);
    expect(isAmountString("1.5")).toBe(false);
    expect(isAmountString("007")).toBe(false);
  });

  it("rejects non-strings", () => {
    expect(isAmountString(10)).toBe(false);
    expect(isAmountString(10n)).toBe(false);
  });
});

// =============================================================================
// Collaborator guards
// =============================================================================

describe("isTransactional", () => {
  it("accepts objects with a begin method", () => {
    const component = {
      begin: () => ({ commit: () => undefined, rollback: () => undefined }),
    };
    expect(isTransactional(component)).toBe(true);
  });

  it("rejects objects without begin", () => {
    expect(isTransactional({ commit: () => undefined })).toBe(false);
  });

  it("rejects a non-function begin", () => {
    expect(isTransactional({ begin: true })).toBe(false);
  });
});

// =============================================================================
// Event guards
// =============================================================================

const validMetadata = {
  eventId: "evt-1",
  timestamp: "2025-01-01T00:00:00.000Z",
  actor: "admin",
  correlationId: "corr-1",
  source: "vesting",
};

describe("isEventSource", () => {
  it("accepts known sources", () => {
    for (const source of ["vesting", "sale", "ledger"]) {
      expect(isEventSource(source)).toBe(true);
    }
  });

  it("rejects unknown sources", () => {
    expect(isEventSource("vault")).toBe(false);
  });
});

describe("isEventMetadata", () => {
  it("accepts valid metadata", () => {
    expect(isEventMetadata(validMetadata)).toBe(true);
  });

  it("rejects an unknown source", () => {
    expect(isEventMetadata({ ...validMetadata, source: "other" })).toBe(false);
  });

  it("rejects missing correlationId", () => {
    const { correlationId: _omit, ...rest } = validMetadata;
    expect(isEventMetadata(rest)).toBe(false);
  });

  it("rejects null", () => {
    expect(isEventMetadata(null)).toBe(false);
  });
});

describe("isDomainEvent", () => {
  it("accepts a valid event", () => {
    expect(
      isDomainEvent({
        type: "vesting.allocation.created",
        metadata: validMetadata,
        payload: { index: 0 },
      }),
    ).toBe(true);
  });

  it("rejects a null payload", () => {
    expect(
      isDomainEvent({ type: "x", metadata: validMetadata, payload: null }),
    ).toBe(false);
  });

  it("rejects invalid metadata", () => {
    expect(isDomainEvent({ type: "x", metadata: {}, payload: {} })).toBe(false);
  });
});
