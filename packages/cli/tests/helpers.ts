import { stripVTControlCharacters } from "node:util";
import pino from "pino";
import type { Clock } from "@ledgerbook/ledger";
import type { EventStore, SnapshotStore } from "@ledgerbook/event-store";
import { InMemoryEventStore, InMemorySnapshotStore } from "@ledgerbook/event-store";
import type { Logger } from "../src/logger.js";
import type { Output } from "../src/output.js";
import { run } from "../src/program.js";
import { BookService } from "../src/services/book-service.js";

/** Collects output lines with colors removed. */
export class CapturedOutput implements Output {
  readonly lines: string[] = [];
  readonly errors: string[] = [];

  out(line: string): void {
    this.lines.push(...stripVTControlCharacters(line).split("\n"));
  }

  err(line: string): void {
    this.errors.push(...stripVTControlCharacters(line).split("\n"));
  }

  clear(): void {
    this.lines.length = 0;
    this.errors.length = 0;
  }
}

/** Advances one second per reading. */
export class SteppingClock implements Clock {
  private _ms: number;

  constructor(start = "2025-03-10T12:00:00.000Z") {
    this._ms = Date.parse(start);
  }

  now(): Date {
    const current = new Date(this._ms);
    this._ms += 1000;
    return current;
  }
}

export function sequentialIds(prefix = "evt"): () => string {
  let next = 0;
  return () => `${prefix}-${String(++next)}`;
}

/** A logger that writes its JSON lines into an array. */
export function capturingLogger(): { logger: Logger; records: () => Record<string, unknown>[] } {
  const lines: string[] = [];
  const logger = pino({ level: "debug" }, { write: (line: string) => lines.push(line) });
  return {
    logger,
    records: () =>
      lines.map((line) => {
        const parsed: unknown = JSON.parse(line);
        return parsed !== null && typeof parsed === "object" ? { ...parsed } : {};
      }),
  };
}

export const silentLogger = (): Logger => pino({ level: "silent" });

export interface Harness {
  readonly service: BookService;
  readonly eventStore: EventStore;
  readonly snapshots: SnapshotStore;
  readonly output: CapturedOutput;
  exec(...args: string[]): Promise<number>;
}

export function createHarness(
  options: { eventStore?: EventStore; snapshots?: SnapshotStore; logger?: Logger } = {},
): Harness {
  const eventStore = options.eventStore ?? new InMemoryEventStore();
  const snapshots = options.snapshots
    ?? new InMemorySnapshotStore({ now: () => new Date("2025-03-10T18:00:00.000Z") });
  const logger = options.logger ?? silentLogger();
  const service = new BookService({
    eventStore,
    snapshots,
    logger,
    actor: "test",
    clock: new SteppingClock(),
    newId: sequentialIds(),
  });
  const output = new CapturedOutput();

  return {
    service,
    eventStore,
    snapshots,
    output,
    exec: (...args) => run(args, { service: () => service, output }, logger),
  };
}

/** Cells of a rendered table row: runs of two or more spaces separate them. */
export function cells(line: string | undefined): string[] {
  return (line ?? "").trim().split(/\s{2,}/);
}
