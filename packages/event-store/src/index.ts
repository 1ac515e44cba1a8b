/**
 * @vestline/event-store — Append-only, hash-chained audit persistence.
 *
 * Provides:
 * - EventStore interface for append-only event streams
 * - InMemoryEventStore with a SHA-256 hash chain
 * - AuditTrail, a transaction-aware recorder for the sale core
 * - The catalogue of audit event types and payloads
 *
 * @packageDocumentation
 */

// Core types
export type {
  StoredEvent,
  HashedStoredEvent,
  AppendResult,
  EventStore,
  EventStoreErrorCode,
  IntegrityError,
  EventStoreIntegrityResult,
} from "./types.js";
export { EventStoreError } from "./types.js";

// Hash chain
export { computeEventHash, verifyHashChain, GENESIS_HASH } from "./hash-chain.js";

// Implementations
export { InMemoryEventStore } from "./in-memory-store.js";
export type { InMemoryEventStoreOptions } from "./in-memory-store.js";

// Audit trail
export { AuditTrail } from "./audit-trail.js";
export type { AuditTrailOptions } from "./audit-trail.js";

// Event catalogue
export { SALE_EVENTS } from "./sale-events.js";
export type {
  SaleEventType,
  SaleEventPayloads,
  AllocationCreatedPayload,
  IntervalAdvancedPayload,
  RewardClaimedPayload,
  ContributionAcceptedPayload,
  RewardIssuedPayload,
  BonusAllocatedPayload,
  VestingReleasedPayload,
  SaleFinalizedPayload,
  SettingChangedPayload,
  AdministratorTransferredPayload,
} from "./sale-events.js";
