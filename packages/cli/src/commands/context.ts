import type { Endpoint } from "@ledgerbook/types";
import { endpointKey } from "@ledgerbook/ledger";
import type { Book } from "@ledgerbook/ledger";
import type { Output } from "../output.js";
import type { BookService } from "../services/book-service.js";

export interface CommandContext {
  /** Opened on first use, so --help never touches the data directory */
  readonly service: () => BookService;
  readonly output: Output;
}

/** "Acme Ltd (company:1)", or "Cash" for the cash pool. */
export function describeEndpoint(book: Book, endpoint: Endpoint): string {
  const name = book.nameOf(endpoint);
  return endpoint.kind === "cash" ? name : `${name} (${endpointKey(endpoint)})`;
}
