/**
 * AuditTrail — records audit events into an EventStore.
 *
 * Outside a unit of work, `record()` appends immediately.
 * Inside one, events are held back and appended on the outermost commit,
 * so an operation that fails part-way leaves no trace in the log.
 * Every event recorded inside a unit of work shares one correlationId.
 *
 * Units of work nest: an inner rollback drops only the inner events,
 * an outer rollback drops everything.
 */

import { randomUUID } from "node:crypto";
import type {
  AccountId,
  Clock,
  DomainEvent,
  EventSource,
  Transactional,
  UnitOfWork,
} from "@vestline/types";
import type { EventStore, HashedStoredEvent } from "./types.js";
import type { SaleEventPayloads, SaleEventType } from "./sale-events.js";

export interface AuditTrailOptions {
  readonly store: EventStore;
  readonly clock: Clock;
  /** Event and correlation id source. Default: random UUIDs */
  readonly generateId?: (() => string) | undefined;
}

interface PendingEvent {
  readonly streamId: string;
  readonly event: DomainEvent;
}

export class AuditTrail implements Transactional {
  private readonly store: EventStore;
  private readonly clock: Clock;
  private readonly generateId: () => string;
  private readonly pending: PendingEvent[] = [];
  private depth = 0;
  private correlationId: string | undefined;

  constructor(options: AuditTrailOptions) {
    this.store = options.store;
    this.clock = options.clock;
    this.generateId = options.generateId ?? randomUUID;
  }

  /**
   * Record one audit event on the `source` stream.
   */
  record<T extends SaleEventType>(
    source: EventSource,
    actor: AccountId,
    type: T,
    payload: SaleEventPayloads[T],
  ): void {
    const event: DomainEvent = {
      type,
      metadata: {
        eventId: this.generateId(),
        timestamp: new Date(this.clock.now() * 1000).toISOString(),
        actor,
        correlationId: this.correlationId ?? this.generateId(),
        source,
      },
      payload,
    };

    if (this.depth > 0) {
      this.pending.push({ streamId: source, event });
    } else {
      this.store.append(source, [event]);
    }
  }

  begin(): UnitOfWork {
    const mark = this.pending.length;
    if (this.depth === 0) {
      this.correlationId = this.generateId();
    }
    this.depth++;

    let settled = false;
    const settle = (): boolean => {
      if (settled) return false;
      settled = true;
      this.depth--;
      return true;
    };

    return {
      commit: () => {
        if (settle() && this.depth === 0) {
          this.flush();
        }
      },
      rollback: () => {
        if (!settle()) return;
        this.pending.length = mark;
        if (this.depth === 0) {
          this.correlationId = undefined;
        }
      },
    };
  }

  /**
   * Events held back by open units of work.
   */
  get pendingCount(): number {
    return this.pending.length;
  }

  /**
   * Recorded events, optionally limited to one stream and/or one type.
   */
  history(filter?: {
    readonly source?: EventSource;
    readonly type?: SaleEventType;
  }): readonly HashedStoredEvent[] {
    const events =
      filter?.source !== undefined
        ? this.store.read(filter.source)
        : this.store.readAll();
    const type = filter?.type;
    return type !== undefined ? events.filter((e) => e.event.type === type) : events;
  }

  private flush(): void {
    const batch = this.pending.splice(0, this.pending.length);
    this.correlationId = undefined;
    for (const { streamId, event } of batch) {
      this.store.append(streamId, [event]);
    }
  }
}
