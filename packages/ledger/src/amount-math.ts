/**
 * @vestline/ledger — Checked amount arithmetic.
 *
 * All amounts are bigint integers in [0, MAX_AMOUNT].
 *
 * Rules:
 * - No floating-point operations
 * - A result above MAX_AMOUNT is an OVERFLOW
 * - A result below zero is an UNDERFLOW
 * - Division by zero throws; division otherwise truncates toward zero
 */

import { MAX_AMOUNT, isAmountString } from "@vestline/types";
import type { Amount, AmountString } from "@vestline/types";
import { AmountError } from "./types.js";

// ─── Validation ──────────────────────────────────────────────────────────

/**
 * Throw unless `value` is a valid amount.
 */
export function assertAmount(value: bigint, label = "amount"): void {
  if (value < 0n) {
    throw new AmountError("INVALID_AMOUNT", `${label} must not be negative, got ${value.toString()}`);
  }
  if (value > MAX_AMOUNT) {
    throw new AmountError("INVALID_AMOUNT", `${label} exceeds the maximum amount`);
  }
}

// ─── Arithmetic ──────────────────────────────────────────────────────────

export function checkedAdd(a: Amount, b: Amount): Amount {
  const sum = a + b;
  if (sum > MAX_AMOUNT) {
    throw new AmountError("OVERFLOW", `${a.toString()} + ${b.toString()} overflows`);
  }
  return sum;
}

export function checkedSub(a: Amount, b: Amount): Amount {
  if (b > a) {
    throw new AmountError("UNDERFLOW", `${a.toString()} - ${b.toString()} underflows`);
  }
  return a - b;
}

export function checkedMul(a: Amount, b: Amount): Amount {
  const product = a * b;
  if (product > MAX_AMOUNT) {
    throw new AmountError("OVERFLOW", `${a.toString()} * ${b.toString()} overflows`);
  }
  return product;
}

/**
 * Integer division, truncating.
 */
export function checkedDiv(a: Amount, b: Amount): Amount {
  if (b === 0n) {
    throw new AmountError("DIVISION_BY_ZERO", `${a.toString()} / 0`);
  }
  return a / b;
}

/**
 * `a * b / c`, with the multiplication checked before the division.
 */
export function mulDiv(a: Amount, b: Amount, c: Amount): Amount {
  return checkedDiv(checkedMul(a, b), c);
}

// ─── Serialization ───────────────────────────────────────────────────────

export function toAmountString(value: Amount): AmountString {
  assertAmount(value);
  return value.toString();
}

/**
 * Parse a decimal integer string into an amount.
 *
 * "1000" → 1000n
 */
export function parseAmountString(value: string): Amount {
  if (!isAmountString(value)) {
    throw new AmountError("INVALID_AMOUNT", `Invalid amount string: "${value}"`);
  }
  return BigInt(value);
}

/**
 * Render an amount scaled by `decimals` for display.
 *
 * 1050n with decimals=2 → "10.50"
 */
export function formatUnits(value: Amount, decimals: number): string {
  if (decimals === 0) {
    return value.toString();
  }
  const str = value.toString().padStart(decimals + 1, "0");
  return `${str.slice(0, str.length - decimals)}.${str.slice(str.length - decimals)}`;
}
