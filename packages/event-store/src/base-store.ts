/**
 * @ledgerbook/event-store — Shared stream index.
 *
 * Every EventStore serves reads from the same in-memory index of
 * per-stream arrays. Subclasses decide what "durable" means by
 * implementing persist(); the index only changes after persist() returns.
 */

import type { DomainEvent } from "@ledgerbook/types";
import type { EventStore, StoredEvent } from "./types.js";
import { EventStoreError } from "./types.js";

export abstract class BaseEventStore implements EventStore {
  private readonly _streams = new Map<string, StoredEvent[]>();

  /**
   * Make the events durable. Throwing aborts the append with the index
   * untouched.
   */
  protected abstract persist(events: readonly StoredEvent[]): void;

  append(streamId: string, events: readonly DomainEvent[]): void {
    validateStreamId(streamId);
    if (events.length === 0) {
      throw new EventStoreError("EMPTY_APPEND", "Cannot append zero events", streamId);
    }

    const fromVersion = this.streamVersion(streamId) + 1;
    const appendedAt = new Date().toISOString();
    const stored: StoredEvent[] = events.map((event, i) => ({
      event: {
        type: event.type,
        metadata: event.metadata,
        payload: event.payload,
      },
      streamId,
      version: fromVersion + i,
      appendedAt,
    }));

    this.persist(stored);
    this.index(stored);
  }

  read(streamId: string): readonly StoredEvent[] {
    validateStreamId(streamId);
    return [...(this._streams.get(streamId) ?? [])];
  }

  streamVersion(streamId: string): number {
    return this._streams.get(streamId)?.length ?? 0;
  }

  /** Add already-durable events to the index. */
  protected index(events: readonly StoredEvent[]): void {
    for (const stored of events) {
      let stream = this._streams.get(stored.streamId);
      if (stream === undefined) {
        stream = [];
        this._streams.set(stored.streamId, stream);
      }
      stream.push(stored);
    }
  }
}

function validateStreamId(streamId: string): void {
  if (streamId.length === 0) {
    throw new EventStoreError("INVALID_STREAM_ID", "Stream ID must be a non-empty string");
  }
}
