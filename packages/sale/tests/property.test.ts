/**
 * Property-based tests for SaleController.
 *
 * 1. totalRaised never exceeds capacity, whatever is attempted
 * 2. Issued supply is always (rate + administratorRate) × totalRaised
 * 3. Admission is exactly the conjunction of its conditions
 */

import { describe, it, expect } from "vitest";
import fc from "fast-check";
import { SaleError } from "../src/types.js";
import { END, START, setup } from "./helpers.js";

const arbContributor = fc.constantFrom("alice", "bob", "carol");

describe("sale property tests", () => {
  it("never raises more than the cap and issues exactly the rate", () => {
    fc.assert(
      fc.property(
        fc.bigInt({ min: 1n, max: 500n }),
        fc.array(
          fc.record({ contributor: arbContributor, amount: fc.bigInt({ min: -5n, max: 150n }) }),
          { maxLength: 40 },
        ),
        (capacity, attempts) => {
          const { sale, rewards, clock } = setup({ capacity });
          clock.set(START);

          for (const { contributor, amount } of attempts) {
            try {
              sale.acceptContribution(contributor, amount);
            } catch (err) {
              expect(err).toBeInstanceOf(SaleError);
            }
            expect(sale.totalRaised).toBeLessThanOrEqual(capacity);
          }

          expect(rewards.totalSupply).toBe(sale.totalRaised * 6n);
        },
      ),
      { numRuns: 100 },
    );
  });

  it("admits exactly when every condition holds", () => {
    fc.assert(
      fc.property(
        fc.bigInt({ min: 3n, max: 100n }),
        fc.integer({ min: START - 50, max: END + 50 }),
        arbContributor,
        fc.bigInt({ min: -2n, max: 1200n }),
        (earlier, now, contributor, amount) => {
          const { sale, rewards, allowlist, clock } = setup({ minContribution: 3n });
          clock.set(START);
          sale.acceptContribution("alice", earlier);
          clock.set(now);

          const expected =
            now >= START &&
            now <= END &&
            sale.totalRaised + amount <= 1000n &&
            allowlist.isAuthorized(contributor) &&
            amount > 0n &&
            amount >= 3n &&
            amount + rewards.balanceOf(contributor) / 5n <= 100n;

          expect(sale.checkAdmission(contributor, amount).admitted).toBe(expected);
        },
      ),
      { numRuns: 300 },
    );
  });
});
