/**
 * @ledgerbook/event-store — Core types.
 *
 * A store holds named streams of domain events. Streams only grow: an
 * event, once appended, is never rewritten or removed, and its version
 * is its 1-based position in the stream.
 */

import type { DomainEvent, EventMetadata } from "@ledgerbook/types";

// =============================================================================
// Stored Event
// =============================================================================

/**
 * A domain event plus where and when the store put it.
 */
export interface StoredEvent {
  readonly event: Readonly<{
    readonly type: string;
    readonly metadata: EventMetadata;
    readonly payload: Readonly<Record<string, unknown>>;
  }>;

  readonly streamId: string;

  /** 1-based, contiguous within the stream */
  readonly version: number;

  readonly appendedAt: string;
}

// =============================================================================
// Event Store Interface
// =============================================================================

export interface EventStore {
  /**
   * Append events to a stream in one durable write. A failed append
   * leaves both the stream and its backing storage unchanged.
   *
   * @throws EventStoreError for an empty stream id or an empty batch
   */
  append(streamId: string, events: readonly DomainEvent[]): void;

  /** Every event of a stream, oldest first; empty for an unknown stream. */
  read(streamId: string): readonly StoredEvent[];

  /** Version of the last event in the stream, or 0. */
  streamVersion(streamId: string): number;
}

// =============================================================================
// Errors
// =============================================================================

export type EventStoreErrorCode = "INVALID_STREAM_ID" | "EMPTY_APPEND";

export class EventStoreError extends Error {
  constructor(
    public readonly code: EventStoreErrorCode,
    message: string,
    public readonly streamId?: string,
  ) {
    super(message);
    this.name = "EventStoreError";
  }
}
