/**
 * Property-based tests for hash chain integrity.
 *
 * 1. Any N events → valid chain
 * 2. Remove any middle event → broken chain
 * 3. Modify any payload → broken chain
 */

import { describe, it, expect } from "vitest";
import fc from "fast-check";
import type { DomainEvent } from "@vestline/types";
import { InMemoryEventStore } from "../src/in-memory-store.js";
import { verifyHashChain } from "../src/hash-chain.js";

// =============================================================================
// Arbitraries
// =============================================================================

const arbDomainEvent: fc.Arbitrary<DomainEvent> = fc.record({
  type: fc.constantFrom(
    "vesting.allocation.created",
    "vesting.reward.claimed",
    "sale.contribution.accepted",
    "sale.finalized",
  ),
  metadata: fc.record({
    eventId: fc.uuid(),
    timestamp: fc.constant("2026-01-01T00:00:00.000Z"),
    actor: fc.constantFrom("admin", "alice", "bob"),
    correlationId: fc.uuid(),
    source: fc.constantFrom("vesting" as const, "sale" as const, "ledger" as const),
  }),
  payload: fc.dictionary(
    fc.constantFrom("amount", "beneficiary", "index"),
    fc.oneof(fc.integer(), fc.string()),
  ),
});

// =============================================================================
// Tests
// =============================================================================

describe("hash chain property tests", () => {
  it("any N events produce a valid chain", () => {
    fc.assert(
      fc.property(fc.array(arbDomainEvent, { minLength: 1, maxLength: 20 }), (events) => {
        const store = new InMemoryEventStore();
        store.append("stream", events);

        const result = store.verifyIntegrity();
        expect(result.valid).toBe(true);
        expect(result.lastVerifiedPosition).toBe(events.length);
      }),
      { numRuns: 50 },
    );
  });

  it("removing any event from the middle breaks the chain", () => {
    fc.assert(
      fc.property(
        fc.array(arbDomainEvent, { minLength: 3, maxLength: 10 }),
        fc.nat(),
        (events, removeIndex) => {
          const store = new InMemoryEventStore();
          store.append("stream", events);

          const all = store.readAll();
          const idx = 1 + (removeIndex % (all.length - 2));
          const tampered = [...all.slice(0, idx), ...all.slice(idx + 1)];

          expect(verifyHashChain(tampered).valid).toBe(false);
        },
      ),
      { numRuns: 30 },
    );
  });

  it("modifying any event payload breaks the chain", () => {
    fc.assert(
      fc.property(
        fc.array(arbDomainEvent, { minLength: 2, maxLength: 8 }),
        fc.nat(),
        (events, modifyIndex) => {
          const store = new InMemoryEventStore();
          store.append("stream", events);

          const all = [...store.readAll()];
          const idx = modifyIndex % all.length;
          const original = all[idx];
          if (original === undefined) return;
          all[idx] = {
            ...original,
            event: { ...original.event, payload: { ...original.event.payload, tampered: true } },
          };

          expect(verifyHashChain(all).valid).toBe(false);
        },
      ),
      { numRuns: 30 },
    );
  });

  it("appending to separate streams still produces a valid global chain", () => {
    fc.assert(
      fc.property(
        fc.array(arbDomainEvent, { minLength: 1, maxLength: 5 }),
        fc.array(arbDomainEvent, { minLength: 1, maxLength: 5 }),
        (eventsA, eventsB) => {
          const store = new InMemoryEventStore();
          store.append("stream-a", eventsA);
          store.append("stream-b", eventsB);

          expect(store.verifyIntegrity().valid).toBe(true);
        },
      ),
      { numRuns: 30 },
    );
  });
});
