/**
 * @vestline/event-store — In-memory EventStore implementation.
 *
 * Stores events in plain arrays. Suitable for:
 * - Unit and integration tests
 * - Short-lived processes
 *
 * Properties:
 * - O(1) append (amortized)
 * - Append has no side effects beyond the log itself
 * - No durability guarantees
 */

import { SystemClock } from "@vestline/types";
import type { Clock, DomainEvent } from "@vestline/types";
import type {
  AppendResult,
  EventStore,
  EventStoreIntegrityResult,
  HashedStoredEvent,
  StoredEvent,
} from "./types.js";
import { EventStoreError } from "./types.js";
import { computeEventHash, GENESIS_HASH, verifyHashChain } from "./hash-chain.js";

export interface InMemoryEventStoreOptions {
  /** Source of `appendedAt`. Default: wall clock */
  readonly clock?: Clock;
}

/**
 * In-memory event store.
 *
 * All events are stored in two data structures:
 * - Per-stream arrays (indexed by streamId) for stream reads
 * - Global array for readAll and integrity checks
 */
export class InMemoryEventStore implements EventStore {
  private readonly _streams = new Map<string, HashedStoredEvent[]>();

  private readonly _globalLog: HashedStoredEvent[] = [];

  private readonly _clock: Clock;

  private _nextGlobalPosition = 1;

  /** Hash of the last appended event (for chain linking) */
  private _lastHash: string = GENESIS_HASH;

  constructor(options?: InMemoryEventStoreOptions) {
    this._clock = options?.clock ?? new SystemClock();
  }

  // ─── Append ─────────────────────────────────────────────────────────

  append(streamId: string, events: readonly DomainEvent[]): AppendResult {
    this._validateStreamId(streamId);

    if (events.length === 0) {
      throw new EventStoreError(
        "EMPTY_APPEND",
        "Cannot append zero events",
        streamId,
      );
    }

    let stream = this._streams.get(streamId);
    const currentVersion = stream !== undefined ? stream.length : 0;

    if (stream === undefined) {
      stream = [];
      this._streams.set(streamId, stream);
    }

    const fromVersion = currentVersion + 1;
    const storedEvents: HashedStoredEvent[] = [];
    const appendedAt = new Date(this._clock.now() * 1000).toISOString();

    events.forEach((event, i) => {
      const base: StoredEvent = {
        event: {
          type: event.type,
          metadata: event.metadata,
          payload: event.payload,
        },
        streamId,
        version: fromVersion + i,
        globalPosition: this._nextGlobalPosition++,
        appendedAt,
      };

      const previousHash = this._lastHash;
      const stored: HashedStoredEvent = {
        ...base,
        hash: computeEventHash(base, previousHash),
        previousHash,
      };
      this._lastHash = stored.hash;
      storedEvents.push(stored);
    });

    stream.push(...storedEvents);
    this._globalLog.push(...storedEvents);

    return {
      streamId,
      fromVersion,
      toVersion: fromVersion + events.length - 1,
      count: events.length,
    };
  }

  // ─── Read ───────────────────────────────────────────────────────────

  read(streamId: string): readonly HashedStoredEvent[] {
    this._validateStreamId(streamId);
    return [...(this._streams.get(streamId) ?? [])];
  }

  readAll(): readonly HashedStoredEvent[] {
    return [...this._globalLog];
  }

  // ─── Query ──────────────────────────────────────────────────────────

  streamVersion(streamId: string): number {
    return this._streams.get(streamId)?.length ?? 0;
  }

  globalPosition(): number {
    return this._nextGlobalPosition - 1;
  }

  // ─── Integrity ──────────────────────────────────────────────────────

  verifyIntegrity(): EventStoreIntegrityResult {
    return verifyHashChain(this._globalLog);
  }

  // ─── Internal ───────────────────────────────────────────────────────

  private _validateStreamId(streamId: string): void {
    if (streamId.length === 0) {
      throw new EventStoreError(
        "INVALID_STREAM_ID",
        "Stream ID must be a non-empty string",
      );
    }
  }
}
