/**
 * Property-based tests for VestingLedger.
 *
 * 1. Exact distribution: everything allocated is released, whichever intervals are skipped
 * 2. No double claim between advancements
 * 3. The interval counter is monotonic and bounded
 */

import { describe, it, expect } from "vitest";
import fc from "fast-check";
import { MAX_AMOUNT, ManualClock } from "@vestline/types";
import { VestingLedger } from "../src/vesting-ledger.js";

const UNLOCK = 2_000_000;
const DURATION = 60;

const arbAmount = fc.bigInt({ min: 0n, max: MAX_AMOUNT });
const arbIntervals = fc.integer({ min: 1, max: 24 });

function newLedger(numIntervals: number): { clock: ManualClock; vesting: VestingLedger } {
  const clock = new ManualClock(UNLOCK - 1);
  const vesting = new VestingLedger({
    administrator: "admin",
    schedule: { unlockDate: UNLOCK, intervalDuration: DURATION, numIntervals },
    clock,
  });
  return { clock, vesting };
}

describe("vesting property tests", () => {
  it("releases exactly the allocation when the final interval is claimed", () => {
    fc.assert(
      fc.property(
        arbAmount,
        arbIntervals,
        fc.array(fc.boolean(), { minLength: 24, maxLength: 24 }),
        (amount, numIntervals, claimPattern) => {
          const { clock, vesting } = newLedger(numIntervals);
          vesting.createAllocation("admin", "alice", amount);

          let released = 0n;
          for (let k = 1; k <= numIntervals; k++) {
            clock.set(UNLOCK + (k - 1) * DURATION + 1);
            expect(vesting.advanceInterval("admin")).toBe(true);
            if (k === numIntervals || claimPattern[k - 1] === true) {
              released += vesting.claim("admin", 0).amount;
            }
          }

          expect(released).toBe(amount);
          expect(vesting.allocation(0).remainingBalance).toBe(0n);
        },
      ),
      { numRuns: 200 },
    );
  });

  it("a second claim in the same interval releases nothing", () => {
    fc.assert(
      fc.property(arbAmount, arbIntervals, (amount, numIntervals) => {
        const { clock, vesting } = newLedger(numIntervals);
        vesting.createAllocation("admin", "alice", amount);
        clock.set(UNLOCK + 1);
        vesting.advanceInterval("admin");

        const first = vesting.claim("admin", 0);
        const remaining = vesting.allocation(0).remainingBalance;
        const second = vesting.claim("admin", 0);

        expect(first.shouldRelease).toBe(true);
        expect(second.shouldRelease).toBe(false);
        expect(vesting.allocation(0).remainingBalance).toBe(remaining);
      }),
      { numRuns: 100 },
    );
  });

  it("the interval never decreases and never exceeds numIntervals", () => {
    fc.assert(
      fc.property(
        arbIntervals,
        fc.array(fc.integer({ min: 0, max: 3 * DURATION }), { maxLength: 60 }),
        (numIntervals, steps) => {
          const { clock, vesting } = newLedger(numIntervals);
          let previous = vesting.currentInterval;

          for (const step of steps) {
            clock.advance(step);
            const advanced = vesting.advanceInterval("admin");
            const current = vesting.currentInterval;

            expect(current).toBe(advanced ? previous + 1 : previous);
            expect(current).toBeLessThanOrEqual(numIntervals);
            previous = current;
          }
        },
      ),
      { numRuns: 100 },
    );
  });
});
