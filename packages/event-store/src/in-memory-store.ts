/**
 * @ledgerbook/event-store — In-memory EventStore implementation.
 *
 * Suitable for unit tests and short-lived processes. All state is lost
 * on process exit.
 *
 * Properties:
 * - O(1) append (amortized)
 * - O(n) read (where n = number of events in the stream)
 * - Synchronous subscription dispatch
 * - No durability guarantees
 */

import { BaseEventStore } from "./base-store.js";

export class InMemoryEventStore extends BaseEventStore {
  protected persist(): void {
    // Memory is the only storage
  }
}
