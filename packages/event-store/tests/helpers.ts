import { mkdtempSync, rmSync } from "node:fs";
import { join } from "node:path";
import { tmpdir } from "node:os";
import type { DomainEvent } from "@ledgerbook/types";

let sequence = 0;

export function makeEvent(
  type: string,
  payload: Record<string, unknown> = {},
): DomainEvent {
  sequence++;
  return {
    type,
    metadata: {
      eventId: `evt-${String(sequence)}`,
      timestamp: "2025-03-10T12:00:00.000Z",
      actor: "test",
      correlationId: `corr-${String(sequence)}`,
    },
    payload,
  };
}

export function makeEvents(count: number, type = "company.added"): DomainEvent[] {
  return Array.from({ length: count }, (_, i) => makeEvent(type, { id: i + 1 }));
}

/** A fresh temporary directory and a function that removes it. */
export function tempDir(prefix: string): { dir: string; cleanup: () => void } {
  const dir = mkdtempSync(join(tmpdir(), `ledgerbook-${prefix}-`));
  return { dir, cleanup: () => rmSync(dir, { recursive: true, force: true }) };
}
