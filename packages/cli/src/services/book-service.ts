/**
 * BookService — Composition root for the CLI.
 *
 * Wires a Book to its journal and backup store, replays the journal on
 * open, and owns the backup lifecycle: create, list, restore, delete and
 * import. Commands talk to the Book through this service; they never
 * open stores themselves.
 */

import { existsSync } from "node:fs";
import {
  Book,
  ConflictError,
  LedgerError,
  NotFoundError,
  ValidationError,
  isBookSnapshot,
  systemClock,
} from "@ledgerbook/ledger";
import type { BookSnapshot, Clock } from "@ledgerbook/ledger";
import {
  FileSnapshotStore,
  JsonlEventStore,
  computeSnapshotHash,
  readSnapshotFile,
} from "@ledgerbook/event-store";
import type {
  EventStore,
  SnapshotInfo,
  SnapshotStore,
  StoredSnapshot,
} from "@ledgerbook/event-store";
import type { AppConfig } from "../config.js";
import { storagePaths } from "../config.js";
import type { Logger } from "../logger.js";
import { EventJournal } from "./event-journal.js";

// =============================================================================
// Configuration
// =============================================================================

export interface BookServiceOptions {
  readonly eventStore: EventStore;
  readonly snapshots: SnapshotStore;
  readonly logger: Logger;
  readonly actor: string;
  readonly clock?: Clock | undefined;
  readonly newId?: (() => string) | undefined;
}

export interface RestoredBackup {
  /** Journal version the backup was taken at */
  readonly version: number;
  readonly snapshot: BookSnapshot;
  /** The book as it stood just before the restore */
  readonly safetyBackup: SnapshotInfo;
}

// =============================================================================
// Service
// =============================================================================

export class BookService {
  readonly book: Book;

  private readonly _journal: EventJournal;
  private readonly _snapshots: SnapshotStore;
  private readonly _logger: Logger;

  constructor(options: BookServiceOptions) {
    this._logger = options.logger.child({ component: "book-service" });
    this._snapshots = options.snapshots;
    const clock = options.clock ?? systemClock;
    this._journal = new EventJournal({
      store: options.eventStore,
      actor: options.actor,
      newId: options.newId,
      now: () => clock.now(),
    });
    this.book = new Book({ journal: this._journal, clock });

    const replayed = this._journal.replayInto(this.book);
    this._logger.debug(
      { events: replayed, transactions: this.book.transactionCount },
      "Journal replayed",
    );
  }

  /**
   * Open the on-disk book described by the configuration.
   */
  static open(config: AppConfig, logger: Logger): BookService {
    const paths = storagePaths(config);
    const eventStore = new JsonlEventStore({ filePath: paths.journalFile });
    if (eventStore.skippedLines > 0) {
      logger.warn(
        { file: paths.journalFile, skippedLines: eventStore.skippedLines },
        "Ignored unreadable journal lines",
      );
    }

    return new BookService({
      eventStore,
      snapshots: new FileSnapshotStore(paths.backupDir),
      logger,
      actor: config.LEDGERBOOK_ACTOR,
    });
  }

  /** Number of events in the journal. */
  get journalVersion(): number {
    return this._journal.version;
  }

  // ─── Backups ──────────────────────────────────────────────────────────

  /**
   * Save the current book, tagged with the journal version it reflects.
   * A backup already holding this book at this version is returned as it
   * is.
   *
   * @throws ConflictError (BACKUP_EXISTS) if a different book, such as an
   *   imported one, already occupies the version
   */
  createBackup(): SnapshotInfo {
    const streamId = this._journal.streamId;
    const version = this._journal.version;
    const snapshot = this.book.snapshot();

    const existing = this._snapshots.loadAtVersion(streamId, version);
    if (existing !== undefined) {
      if (!sameBook(existing.state, snapshot)) {
        throw new ConflictError(
          "BACKUP_EXISTS",
          `A different backup is already stored at journal version ${String(version)}`,
        );
      }
      this._logger.debug({ version }, "Backup already up to date");
      return info(existing);
    }

    const saved = this._snapshots.save({ streamId, version, state: snapshot });
    this._logger.info(
      { version: saved.version, stateHash: saved.stateHash },
      "Backup created",
    );
    return info(saved);
  }

  listBackups(): readonly SnapshotInfo[] {
    return this._snapshots.list(this._journal.streamId);
  }

  /**
   * Replace the book with a backup: the latest one, or the one taken at
   * `version`. The current book is backed up first, and the restore is
   * journaled like any other change.
   *
   * @throws NotFoundError if there is no such backup
   * @throws SnapshotIntegrityError if the backup fails hash verification
   */
  restoreBackup(version?: number): RestoredBackup {
    const streamId = this._journal.streamId;
    const stored = version === undefined
      ? this._snapshots.load(streamId)
      : this._snapshots.loadAtVersion(streamId, version);

    if (stored === undefined) {
      throw version === undefined
        ? new NotFoundError("backup", null, "No backups found")
        : new NotFoundError("backup", version, `No backup at version ${String(version)}`);
    }
    if (!isBookSnapshot(stored.state)) {
      throw new LedgerError(
        "INVALID_SNAPSHOT",
        `Backup at version ${String(stored.version)} does not hold a book`,
      );
    }

    const safetyBackup = this.createBackup();
    this.book.restore(stored.state);
    this._logger.info(
      {
        version: stored.version,
        safetyVersion: safetyBackup.version,
        journalVersion: this._journal.version,
      },
      "Backup restored",
    );
    return { version: stored.version, snapshot: this.book.snapshot(), safetyBackup };
  }

  /**
   * @throws NotFoundError if there is no backup at `version`
   */
  deleteBackup(version: number): void {
    if (!this._snapshots.delete(this._journal.streamId, version)) {
      throw new NotFoundError("backup", version, `No backup at version ${String(version)}`);
    }
    this._logger.info({ version }, "Backup deleted");
  }

  /**
   * Add a backup file written by another book, keeping its version and
   * hash. The file must verify and hold a book of this journal's stream.
   *
   * @throws ValidationError if the file is missing or holds something else
   * @throws SnapshotIntegrityError if the file does not parse or verify
   * @throws ConflictError (BACKUP_EXISTS) if its version is already taken
   */
  importBackup(filePath: string): SnapshotInfo {
    if (!existsSync(filePath)) {
      throw new ValidationError("file", `No such file: ${filePath}`);
    }
    const snapshot = readSnapshotFile(filePath);

    const streamId = this._journal.streamId;
    if (snapshot.streamId !== streamId) {
      throw new ValidationError(
        "file",
        `Backup belongs to stream "${snapshot.streamId}", expected "${streamId}"`,
      );
    }
    if (!isBookSnapshot(snapshot.state)) {
      throw new ValidationError("file", "Backup does not hold a book");
    }
    if (this._snapshots.loadAtVersion(streamId, snapshot.version) !== undefined) {
      throw new ConflictError(
        "BACKUP_EXISTS",
        `A backup is already stored at journal version ${String(snapshot.version)}`,
      );
    }

    this._snapshots.put(snapshot);
    this._logger.info(
      { file: filePath, version: snapshot.version, stateHash: snapshot.stateHash },
      "Backup imported",
    );
    return info(snapshot);
  }
}

function info(snapshot: StoredSnapshot): SnapshotInfo {
  return {
    streamId: snapshot.streamId,
    version: snapshot.version,
    createdAt: snapshot.createdAt,
    stateHash: snapshot.stateHash,
  };
}

/** Same accounts, transactions and id counters; when each was captured does not matter. */
function sameBook(stored: unknown, current: BookSnapshot): boolean {
  if (!isBookSnapshot(stored)) return false;
  const content = ({ createdAt: _createdAt, ...rest }: BookSnapshot) => rest;
  return computeSnapshotHash(content(stored)) === computeSnapshotHash(content(current));
}
