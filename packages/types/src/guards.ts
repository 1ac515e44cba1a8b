/**
 * Runtime Type Guards
 *
 * Narrowing functions for shared domain types.
 * Used at system boundaries (deserialized snapshots, configuration,
 * collaborators supplied by the host).
 */

import type { AccountId, AmountString } from "./financial.js";
import { MAX_AMOUNT } from "./financial.js";
import type { Transactional } from "./collaborators.js";
import type { DomainEvent, EventMetadata, EventSource } from "./event.js";

// =============================================================================
// Financial guards
// =============================================================================

const AMOUNT_PATTERN = /^(0|[1-9]\d*)$/;

export function isAccountId(value: unknown): value is AccountId {
  return typeof value === "string" && value.trim().length > 0;
}

/**
 * A base-10 integer string in [0, MAX_AMOUNT], without leading zeros.
 */
export function isAmountString(value: unknown): value is AmountString {
  return (
    typeof value === "string" &&
    AMOUNT_PATTERN.test(value) &&
    BigInt(value) <= MAX_AMOUNT
  );
}

// =============================================================================
// Collaborator guards
// =============================================================================

export function isTransactional(value: object): value is Transactional {
  return "begin" in value && typeof value.begin === "function";
}

// =============================================================================
// Event guards
// =============================================================================

const EVENT_SOURCES = new Set<string>(["vesting", "sale", "ledger"]);

export function isEventSource(value: unknown): value is EventSource {
  return typeof value === "string" && EVENT_SOURCES.has(value);
}

export function isEventMetadata(value: unknown): value is EventMetadata {
  if (value === null || typeof value !== "object") return false;
  const v = value as Record<string, unknown>;
  return (
    typeof v.eventId === "string" &&
    typeof v.timestamp === "string" &&
    typeof v.actor === "string" &&
    typeof v.correlationId === "string" &&
    isEventSource(v.source)
  );
}

export function isDomainEvent(value: unknown): value is DomainEvent {
  if (value === null || typeof value !== "object") return false;
  const v = value as Record<string, unknown>;
  return (
    typeof v.type === "string" &&
    isEventMetadata(v.metadata) &&
    v.payload !== null &&
    typeof v.payload === "object"
  );
}
