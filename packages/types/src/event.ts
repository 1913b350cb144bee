/**
 * Event Types
 *
 * Every change to the book is captured as a DomainEvent and written to
 * the journal before it is applied. Replaying the journal rebuilds the
 * book.
 *
 * Rules:
 * - Events are immutable after creation
 * - Every event has metadata (who, when)
 * - Events are replayable: same events → same state
 */

/**
 * Metadata common to all domain events.
 */
export interface EventMetadata {
  /** Unique event ID */
  readonly eventId: string;

  /** ISO 8601 timestamp */
  readonly timestamp: string;

  /** Who or what caused this event */
  readonly actor: string;

  /** ID for grouping related events */
  readonly correlationId: string;
}

/**
 * A domain event, discriminated by `type`.
 */
export interface DomainEvent {
  /** Event type identifier (e.g., "transaction.created") */
  readonly type: string;

  readonly metadata: EventMetadata;

  /** Event-specific payload (opaque to the store, typed by consumers) */
  readonly payload: Readonly<Record<string, unknown>>;
}
