/**
 * @ledgerbook/event-store — File-based JSONL EventStore implementation.
 *
 * Stores events as one JSON object per line in a `.jsonl` file.
 *
 * Crash safety:
 * - Each append flushes to disk via fsync before returning
 * - Partial writes (torn lines) are detected and skipped on load
 * - The file is the source of truth; in-memory state is derived
 *
 * File format:
 * Each line is a JSON object with the StoredEvent shape:
 * {"event":{...},"streamId":"...","version":1,"appendedAt":"..."}
 */

import {
  appendFileSync,
  closeSync,
  existsSync,
  fsyncSync,
  mkdirSync,
  openSync,
  readFileSync,
} from "node:fs";
import { dirname } from "node:path";
import { isEventMetadata } from "@ledgerbook/types";
import { BaseEventStore } from "./base-store.js";
import type { StoredEvent } from "./types.js";

export interface JsonlEventStoreOptions {
  /** Path to the JSONL file */
  readonly filePath: string;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === "object" && !Array.isArray(value);
}

/** Validate one parsed line. */
export function isStoredEvent(value: unknown): value is StoredEvent {
  if (!isRecord(value) || !isRecord(value.event)) return false;
  const { event } = value;
  return (
    typeof event.type === "string" &&
    isEventMetadata(event.metadata) &&
    isRecord(event.payload) &&
    typeof value.streamId === "string" &&
    typeof value.version === "number" &&
    typeof value.appendedAt === "string"
  );
}

/**
 * File-based JSONL event store.
 *
 * The in-memory index is rebuilt from the file on construction.
 */
export class JsonlEventStore extends BaseEventStore {
  private readonly _filePath: string;
  private _skippedLines = 0;

  /** The file ends in a torn line; the next write must start a new one. */
  private _tornTail = false;

  /**
   * If the file exists, events are loaded from it; otherwise it is
   * created on first append. The parent directory is created if needed.
   */
  constructor(options: JsonlEventStoreOptions) {
    super();
    this._filePath = options.filePath;
    mkdirSync(dirname(this._filePath), { recursive: true });
    this._loadFromFile();
  }

  get filePath(): string {
    return this._filePath;
  }

  /** Lines ignored on load because they were torn or malformed. */
  get skippedLines(): number {
    return this._skippedLines;
  }

  /** All lines of one append go out in a single write followed by fsync. */
  protected persist(events: readonly StoredEvent[]): void {
    const lines = events.map((e) => JSON.stringify(e) + "\n").join("");
    const data = this._tornTail ? "\n" + lines : lines;
    const fd = openSync(this._filePath, "a");
    try {
      appendFileSync(fd, data, "utf-8");
      fsyncSync(fd);
    } finally {
      closeSync(fd);
    }
    this._tornTail = false;
  }

  private _loadFromFile(): void {
    if (!existsSync(this._filePath)) {
      return;
    }

    const content = readFileSync(this._filePath, "utf-8");
    this._tornTail = content.length > 0 && !content.endsWith("\n");
    const loaded: StoredEvent[] = [];

    for (const line of content.split("\n")) {
      const trimmed = line.trim();
      if (trimmed.length === 0) continue;

      const parsed = parseLine(trimmed);
      if (parsed === undefined) {
        this._skippedLines++;
        continue;
      }
      loaded.push(parsed);
    }

    this.index(loaded);
  }
}

function parseLine(line: string): StoredEvent | undefined {
  let value: unknown;
  try {
    value = JSON.parse(line);
  } catch {
    // Torn write from an unclean shutdown
    return undefined;
  }
  return isStoredEvent(value) ? value : undefined;
}
