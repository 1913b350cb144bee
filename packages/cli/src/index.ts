/**
 * @ledgerbook/cli — Command-line interface for Ledgerbook.
 *
 * @packageDocumentation
 */

export { createProgram, run } from "./program.js";
export type { CommandContext } from "./commands/context.js";
export { BookService } from "./services/book-service.js";
export type { BookServiceOptions, RestoredBackup } from "./services/book-service.js";
export { EventJournal, BOOK_STREAM } from "./services/event-journal.js";
export type { EventJournalOptions } from "./services/event-journal.js";
export { loadConfig, storagePaths, ConfigSchema } from "./config.js";
export type { AppConfig, StoragePaths } from "./config.js";
export { createLogger } from "./logger.js";
export type { Output } from "./output.js";
export { consoleOutput, renderTable, renderFields } from "./output.js";
