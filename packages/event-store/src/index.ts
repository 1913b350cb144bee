/**
 * @ledgerbook/event-store — Append-only event persistence.
 *
 * Provides:
 * - EventStore interface for append-only event streams
 * - InMemoryEventStore for tests and development
 * - JsonlEventStore for durable file-based persistence
 * - SnapshotStore for hash-verified backups
 *
 * @packageDocumentation
 */

// Core types
export type { StoredEvent, EventStore, EventStoreErrorCode } from "./types.js";
export { EventStoreError } from "./types.js";

// Implementations
export { BaseEventStore } from "./base-store.js";
export { InMemoryEventStore } from "./in-memory-store.js";
export { JsonlEventStore, isStoredEvent } from "./jsonl-store.js";
export type { JsonlEventStoreOptions } from "./jsonl-store.js";

// Snapshot store
export type {
  StoredSnapshot,
  SnapshotInfo,
  SaveSnapshotOptions,
  SnapshotStore,
  SnapshotStoreOptions,
} from "./snapshot-store.js";
export {
  InMemorySnapshotStore,
  FileSnapshotStore,
  SnapshotIntegrityError,
  computeSnapshotHash,
  isStoredSnapshot,
  readSnapshotFile,
  verifySnapshotIntegrity,
} from "./snapshot-store.js";
