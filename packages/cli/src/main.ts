/**
 * @ledgerbook/cli — Entry point.
 *
 * Loads config, creates the logger and runs one command.
 */

import { loadConfig } from "./config.js";
import { createLogger } from "./logger.js";
import { consoleOutput } from "./output.js";
import { run } from "./program.js";
import { BookService } from "./services/book-service.js";

async function main(): Promise<void> {
  const config = loadConfig();
  const logger = createLogger(config);

  let service: BookService | undefined;
  process.exitCode = await run(
    process.argv.slice(2),
    {
      service: () => (service ??= BookService.open(config, logger)),
      output: consoleOutput,
    },
    logger,
  );
}

main().catch((err: unknown) => {
  // eslint-disable-next-line no-console
  console.error("Fatal startup error:", err);
  process.exitCode = 1;
});
