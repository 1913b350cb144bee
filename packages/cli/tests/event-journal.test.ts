/**
 * Tests for EventJournal: encoding book events into the event store and
 * replaying them into a fresh book.
 */

import { describe, it, expect } from "vitest";
import { Book, LedgerError, companyEndpoint, userEndpoint } from "@ledgerbook/ledger";
import { InMemoryEventStore } from "@ledgerbook/event-store";
import { BOOK_STREAM, EventJournal } from "../src/services/event-journal.js";
import { SteppingClock, sequentialIds } from "./helpers.js";

const fixedNow = (): Date => new Date("2025-03-10T09:30:00.000Z");

describe("EventJournal.record", () => {
  it("appends one domain event per book change", () => {
    const store = new InMemoryEventStore();
    const journal = new EventJournal({
      store,
      actor: "tester",
      correlationId: "session-1",
      newId: sequentialIds(),
      now: fixedNow,
    });
    const book = new Book({ journal, clock: new SteppingClock() });

    const company = book.addCompany({ name: "Acme Ltd" });
    const [stored] = store.read(BOOK_STREAM);

    expect(journal.version).toBe(1);
    expect(stored?.event.type).toBe("company.added");
    expect(stored?.event.metadata).toEqual({
      eventId: "evt-1",
      timestamp: "2025-03-10T09:30:00.000Z",
      actor: "tester",
      correlationId: "session-1",
    });
    expect(stored?.event.payload).toEqual({ company });
  });

  it("draws a correlation id for the session when none is given", () => {
    const store = new InMemoryEventStore();
    const journal = new EventJournal({ store, actor: "tester", newId: sequentialIds(), now: fixedNow });
    const book = new Book({ journal });

    book.addCompany({ name: "Acme Ltd" });
    book.addCompany({ name: "Beta Co" });

    const metadata = store.read(BOOK_STREAM).map((e) => e.event.metadata);
    expect(metadata.map((m) => m.correlationId)).toEqual(["evt-1", "evt-1"]);
    expect(metadata.map((m) => m.eventId)).toEqual(["evt-2", "evt-3"]);
  });

  it("writes to a custom stream", () => {
    const store = new InMemoryEventStore();
    const journal = new EventJournal({ store, actor: "tester", streamId: "books/main" });
    new Book({ journal }).addCompany({ name: "Acme Ltd" });

    expect(journal.streamId).toBe("books/main");
    expect(store.streamVersion("books/main")).toBe(1);
    expect(store.streamVersion(BOOK_STREAM)).toBe(0);
  });

  it("leaves the book untouched when the store refuses the write", () => {
    class FullDisk extends InMemoryEventStore {
      protected override persist(): void {
        throw new Error("disk full");
      }
    }
    const journal = new EventJournal({ store: new FullDisk(), actor: "tester" });
    const book = new Book({ journal });

    expect(() => book.addCompany({ name: "Acme Ltd" })).toThrow("disk full");
    expect(book.listCompanies()).toEqual([]);
    expect(journal.version).toBe(0);
  });
});

describe("EventJournal.replayInto", () => {
  it("rebuilds accounts, transactions and balances", () => {
    const store = new InMemoryEventStore();
    const writer = new Book({
      journal: new EventJournal({ store, actor: "tester" }),
      clock: new SteppingClock(),
    });
    const acme = writer.addCompany({ name: "Acme Ltd" });
    const dana = writer.addUser({ name: "Dana", companyId: acme.id });
    writer.deposit(companyEndpoint(acme.id), "1000.00");
    writer.createTransaction({
      date: "2025-03-01",
      amount: "250.00",
      from: companyEndpoint(acme.id),
      to: userEndpoint(dana.id),
    });
    writer.deleteTransaction(1);
    writer.updateUser(dana.id, { role: "Clerk" });

    const reader = new Book();
    const replayed = new EventJournal({ store, actor: "tester" }).replayInto(reader);

    expect(replayed).toBe(6);
    expect(reader.listCompanies()).toEqual(writer.listCompanies());
    expect(reader.listUsers()).toEqual(writer.listUsers());
    expect(reader.listTransactions()).toEqual(writer.listTransactions());
    expect(reader.getBalance(companyEndpoint(acme.id))).toBe("-250.00");
    expect(reader.getBalance(userEndpoint(dana.id))).toBe("250.00");
  });

  it("replays nothing from an empty stream", () => {
    const journal = new EventJournal({ store: new InMemoryEventStore(), actor: "tester" });
    expect(journal.replayInto(new Book())).toBe(0);
  });

  it("rejects an event whose payload does not decode", () => {
    const store = new InMemoryEventStore();
    store.append(BOOK_STREAM, [
      {
        type: "company.added",
        metadata: {
          eventId: "evt-1",
          timestamp: "2025-03-10T09:30:00.000Z",
          actor: "tester",
          correlationId: "corr-1",
        },
        payload: { company: { name: "No id" } },
      },
    ]);

    try {
      new EventJournal({ store, actor: "tester" }).replayInto(new Book());
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(LedgerError);
      if (error instanceof LedgerError) expect(error.code).toBe("CORRUPT_JOURNAL");
    }
  });
});
