/**
 * @ledgerbook/event-store — Snapshot Store.
 *
 * Snapshots are point-in-time captures of aggregate state, tagged with
 * the event position they were taken at. Each one carries a SHA-256 hash
 * of its canonical JSON state so tampering or bit rot is detected before
 * the state is used.
 *
 * Design principles:
 * - The event log is the source of truth; snapshots are supplementary
 * - Multiple snapshots per stream are allowed
 * - A snapshot that fails verification is refused, never repaired
 */

import {
  existsSync,
  mkdirSync,
  readFileSync,
  readdirSync,
  renameSync,
  unlinkSync,
  writeFileSync,
} from "node:fs";
import { join } from "node:path";
import { createHash } from "node:crypto";
import { canonicalize } from "json-canonicalize";

// =============================================================================
// Types
// =============================================================================

/**
 * Compute a SHA-256 hash of the canonical JSON representation of a state.
 */
export function computeSnapshotHash(state: unknown): string {
  const canonical = canonicalize(state);
  return createHash("sha256").update(canonical).digest("hex");
}

export interface StoredSnapshot<TState = unknown> {
  readonly streamId: string;

  /** The event version this snapshot was taken at */
  readonly version: number;

  readonly state: TState;

  readonly createdAt: string;

  /** SHA-256 hash of the canonical state */
  readonly stateHash: string;
}

/** A snapshot without its state, for listings. */
export type SnapshotInfo = Omit<StoredSnapshot, "state">;

export interface SaveSnapshotOptions {
  readonly streamId: string;
  readonly version: number;
  readonly state: unknown;
}

/**
 * A stored snapshot does not match its hash, or cannot be read at all.
 * streamId and version are unknown for a file that does not parse.
 */
export class SnapshotIntegrityError extends Error {
  constructor(
    message: string,
    public readonly streamId?: string,
    public readonly version?: number,
  ) {
    super(message);
    this.name = "SnapshotIntegrityError";
  }
}

/**
 * @returns true if the hash is present and matches the state
 */
export function verifySnapshotIntegrity(snapshot: StoredSnapshot): boolean {
  if (snapshot.stateHash === "") {
    return false;
  }
  return snapshot.stateHash === computeSnapshotHash(snapshot.state);
}

function assertIntegrity(snapshot: StoredSnapshot): StoredSnapshot {
  if (!verifySnapshotIntegrity(snapshot)) {
    throw new SnapshotIntegrityError(
      `Snapshot ${snapshot.streamId}@${String(snapshot.version)} failed hash verification`,
      snapshot.streamId,
      snapshot.version,
    );
  }
  return snapshot;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === "object" && !Array.isArray(value);
}

export function isStoredSnapshot(value: unknown): value is StoredSnapshot {
  if (!isRecord(value)) return false;
  return (
    typeof value.streamId === "string" &&
    typeof value.version === "number" &&
    "state" in value &&
    typeof value.createdAt === "string" &&
    typeof value.stateHash === "string"
  );
}

/**
 * Snapshot persistence.
 *
 * load() and loadAtVersion() verify the hash and throw
 * SnapshotIntegrityError on mismatch.
 */
export interface SnapshotStore {
  /**
   * Hash and save a state, replacing any existing snapshot for the same
   * stream and version.
   */
  save(options: SaveSnapshotOptions): StoredSnapshot;

  /**
   * Store an already-hashed snapshot as it is, keeping its createdAt.
   *
   * @throws SnapshotIntegrityError if the hash does not match the state
   */
  put(snapshot: StoredSnapshot): void;

  /** The most recent snapshot, or undefined if none exists. */
  load(streamId: string): StoredSnapshot | undefined;

  loadAtVersion(streamId: string, version: number): StoredSnapshot | undefined;

  /** Snapshots of a stream, oldest version first. */
  list(streamId: string): readonly SnapshotInfo[];

  /** @returns false if there was no snapshot at that version */
  delete(streamId: string, version: number): boolean;
}

function describe(snapshot: StoredSnapshot): SnapshotInfo {
  return {
    streamId: snapshot.streamId,
    version: snapshot.version,
    createdAt: snapshot.createdAt,
    stateHash: snapshot.stateHash,
  };
}

function build(options: SaveSnapshotOptions, now: () => Date): StoredSnapshot {
  return {
    streamId: options.streamId,
    version: options.version,
    state: options.state,
    createdAt: now().toISOString(),
    stateHash: computeSnapshotHash(options.state),
  };
}

export interface SnapshotStoreOptions {
  /** Timestamp source for createdAt (default: system time) */
  readonly now?: () => Date;
}

// =============================================================================
// In-Memory Implementation
// =============================================================================

export class InMemorySnapshotStore implements SnapshotStore {
  /** streamId → version-sorted snapshots */
  private readonly _snapshots = new Map<string, StoredSnapshot[]>();
  private readonly _now: () => Date;

  constructor(options: SnapshotStoreOptions = {}) {
    this._now = options.now ?? (() => new Date());
  }

  save(options: SaveSnapshotOptions): StoredSnapshot {
    const snapshot = build(options, this._now);
    this._store(snapshot);
    return snapshot;
  }

  put(snapshot: StoredSnapshot): void {
    this._store(assertIntegrity(snapshot));
  }

  load(streamId: string): StoredSnapshot | undefined {
    const latest = this._snapshots.get(streamId)?.at(-1);
    return latest === undefined ? undefined : assertIntegrity(latest);
  }

  loadAtVersion(streamId: string, version: number): StoredSnapshot | undefined {
    const snapshot = this._snapshots.get(streamId)?.find((s) => s.version === version);
    return snapshot === undefined ? undefined : assertIntegrity(snapshot);
  }

  list(streamId: string): readonly SnapshotInfo[] {
    return (this._snapshots.get(streamId) ?? []).map(describe);
  }

  delete(streamId: string, version: number): boolean {
    const snapshots = this._snapshots.get(streamId) ?? [];
    const index = snapshots.findIndex((s) => s.version === version);
    if (index < 0) {
      return false;
    }
    snapshots.splice(index, 1);
    return true;
  }

  /** Insert in version order, replacing a snapshot at the same version. */
  private _store(snapshot: StoredSnapshot): void {
    let snapshots = this._snapshots.get(snapshot.streamId);
    if (snapshots === undefined) {
      snapshots = [];
      this._snapshots.set(snapshot.streamId, snapshots);
    }

    const existingIndex = snapshots.findIndex((s) => s.version === snapshot.version);
    if (existingIndex >= 0) {
      snapshots.splice(existingIndex, 1);
    }

    const insertIndex = snapshots.findIndex((s) => s.version > snapshot.version);
    if (insertIndex >= 0) {
      snapshots.splice(insertIndex, 0, snapshot);
    } else {
      snapshots.push(snapshot);
    }
  }
}

// =============================================================================
// File-Based Implementation
// =============================================================================

/**
 * Stores each snapshot as a JSON file:
 *   <baseDir>/<streamId>/<version>.json
 *
 * Files are written to a temporary name and renamed into place, so a
 * crash never leaves a half-written snapshot under a version name.
 */
export class FileSnapshotStore implements SnapshotStore {
  private readonly _baseDir: string;
  private readonly _now: () => Date;

  constructor(baseDir: string, options: SnapshotStoreOptions = {}) {
    this._baseDir = baseDir;
    this._now = options.now ?? (() => new Date());
    mkdirSync(this._baseDir, { recursive: true });
  }

  get baseDir(): string {
    return this._baseDir;
  }

  save(options: SaveSnapshotOptions): StoredSnapshot {
    const snapshot = build(options, this._now);
    this._write(snapshot);
    return snapshot;
  }

  put(snapshot: StoredSnapshot): void {
    this._write(assertIntegrity(snapshot));
  }

  load(streamId: string): StoredSnapshot | undefined {
    const latest = this._listVersions(streamId).at(-1);
    return latest === undefined ? undefined : this.loadAtVersion(streamId, latest);
  }

  loadAtVersion(streamId: string, version: number): StoredSnapshot | undefined {
    const snapshot = this._readSnapshot(streamId, version);
    return snapshot === undefined ? undefined : assertIntegrity(snapshot);
  }

  list(streamId: string): readonly SnapshotInfo[] {
    const infos: SnapshotInfo[] = [];
    for (const version of this._listVersions(streamId)) {
      const snapshot = this._readSnapshot(streamId, version);
      if (snapshot !== undefined) infos.push(describe(snapshot));
    }
    return infos;
  }

  delete(streamId: string, version: number): boolean {
    const filePath = this._snapshotPath(streamId, version);
    if (!existsSync(filePath)) {
      return false;
    }
    unlinkSync(filePath);
    return true;
  }

  // ─── Internal ───────────────────────────────────────────────────────

  private _write(snapshot: StoredSnapshot): void {
    mkdirSync(this._streamDir(snapshot.streamId), { recursive: true });

    const filePath = this._snapshotPath(snapshot.streamId, snapshot.version);
    const tmpPath = `${filePath}.tmp`;

    writeFileSync(tmpPath, JSON.stringify(snapshot, null, 2), "utf-8");
    renameSync(tmpPath, filePath);
  }

  private _streamDir(streamId: string): string {
    // Sanitize stream ID for filesystem use
    const safe = streamId.replace(/[^a-zA-Z0-9_.-]/g, "_");
    return join(this._baseDir, safe);
  }

  private _snapshotPath(streamId: string, version: number): string {
    return join(this._streamDir(streamId), `${String(version)}.json`);
  }

  private _listVersions(streamId: string): number[] {
    const dir = this._streamDir(streamId);
    if (!existsSync(dir)) {
      return [];
    }

    const versions: number[] = [];
    for (const file of readdirSync(dir)) {
      const match = /^(\d+)\.json$/.exec(file);
      if (match?.[1] !== undefined) {
        versions.push(Number(match[1]));
      }
    }
    return versions.sort((a, b) => a - b);
  }

  private _readSnapshot(streamId: string, version: number): StoredSnapshot | undefined {
    const filePath = this._snapshotPath(streamId, version);
    if (!existsSync(filePath)) {
      return undefined;
    }
    const label = `Snapshot ${streamId}@${String(version)}`;
    return parseSnapshot(readFileSync(filePath, "utf-8"), label, streamId, version);
  }
}

// =============================================================================
// Snapshot Files
// =============================================================================

/**
 * Parse the JSON form of a stored snapshot. Unparseable content is an
 * integrity failure, not a missing snapshot. The hash is not checked.
 */
function parseSnapshot(
  content: string,
  label: string,
  streamId?: string,
  version?: number,
): StoredSnapshot {
  let parsed: unknown;
  try {
    parsed = JSON.parse(content);
  } catch (error) {
    throw new SnapshotIntegrityError(
      `${label} is not valid JSON: ${error instanceof Error ? error.message : String(error)}`,
      streamId,
      version,
    );
  }

  if (!isStoredSnapshot(parsed)) {
    throw new SnapshotIntegrityError(`${label} is missing required fields`, streamId, version);
  }
  return parsed;
}

/**
 * Read and verify a snapshot file written by a FileSnapshotStore,
 * wherever it now lives.
 *
 * @throws SnapshotIntegrityError if the file does not parse or fails
 * hash verification
 */
export function readSnapshotFile(filePath: string): StoredSnapshot {
  const snapshot = parseSnapshot(readFileSync(filePath, "utf-8"), `Snapshot file ${filePath}`);
  return assertIntegrity(snapshot);
}
