/**
 * EventJournal — the Book's journal, backed by an EventStore.
 *
 * Each BookEvent becomes one DomainEvent on a single stream. The store
 * append is the write-ahead step: if it throws, the Book applies nothing.
 */

import { randomUUID } from "node:crypto";
import type { Book, BookEvent, Journal } from "@ledgerbook/ledger";
import { decodeEvent, encodeEvent } from "@ledgerbook/ledger";
import type { DomainEvent } from "@ledgerbook/types";
import type { EventStore } from "@ledgerbook/event-store";

export const BOOK_STREAM = "book";

export interface EventJournalOptions {
  readonly store: EventStore;
  readonly actor: string;
  /** Groups the events written by one session (default: a fresh UUID) */
  readonly correlationId?: string | undefined;
  readonly streamId?: string | undefined;
  readonly newId?: (() => string) | undefined;
  readonly now?: (() => Date) | undefined;
}

export class EventJournal implements Journal {
  private readonly _store: EventStore;
  private readonly _actor: string;
  private readonly _correlationId: string;
  private readonly _streamId: string;
  private readonly _newId: () => string;
  private readonly _now: () => Date;

  constructor(options: EventJournalOptions) {
    this._store = options.store;
    this._actor = options.actor;
    this._newId = options.newId ?? randomUUID;
    this._correlationId = options.correlationId ?? this._newId();
    this._streamId = options.streamId ?? BOOK_STREAM;
    this._now = options.now ?? (() => new Date());
  }

  get streamId(): string {
    return this._streamId;
  }

  /** Number of events in the journal. */
  get version(): number {
    return this._store.streamVersion(this._streamId);
  }

  record(event: BookEvent): void {
    const { type, payload } = encodeEvent(event);
    const domainEvent: DomainEvent = {
      type,
      metadata: {
        eventId: this._newId(),
        timestamp: this._now().toISOString(),
        actor: this._actor,
        correlationId: this._correlationId,
      },
      payload,
    };
    this._store.append(this._streamId, [domainEvent]);
  }

  /**
   * Apply every journaled event to the book, in order.
   *
   * @returns the number of events replayed
   * @throws LedgerError("CORRUPT_JOURNAL") for an event that does not decode
   */
  replayInto(book: Book): number {
    const events = this._store.read(this._streamId);
    for (const stored of events) {
      book.apply(decodeEvent(stored.event.type, stored.event.payload));
    }
    return events.length;
  }
}
