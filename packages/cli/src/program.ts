/**
 * @ledgerbook/cli — Program.
 *
 * Builds the commander tree and runs one invocation against a context.
 * run() never exits the process; it returns the exit code.
 */

import { readFileSync } from "node:fs";
import { Command, CommanderError } from "commander";
import { LedgerError } from "@ledgerbook/ledger";
import { EventStoreError, SnapshotIntegrityError } from "@ledgerbook/event-store";
import { registerAccountCommands } from "./commands/account.js";
import { registerBackupCommands } from "./commands/backup.js";
import { registerCompanyCommands } from "./commands/company.js";
import type { CommandContext } from "./commands/context.js";
import { registerReportCommands } from "./commands/report.js";
import { registerTransactionCommands } from "./commands/transaction.js";
import { registerUserCommands } from "./commands/user.js";
import type { Logger } from "./logger.js";
import { failure } from "./output.js";

function readVersion(): string {
  const pkg: unknown = JSON.parse(readFileSync(new URL("../package.json", import.meta.url), "utf-8"));
  if (pkg !== null && typeof pkg === "object" && "version" in pkg && typeof pkg.version === "string") {
    return pkg.version;
  }
  return "0.0.0";
}

export function createProgram(ctx: CommandContext): Command {
  // Settings must be in place before subcommands are added; they inherit them.
  const program = new Command()
    .name("ledgerbook")
    .description("Bookkeeping for companies, users and the cash pool")
    .version(readVersion(), "-v, --version")
    .exitOverride()
    .configureOutput({
      writeOut: (text) => {
        ctx.output.out(text.trimEnd());
      },
      writeErr: (text) => {
        ctx.output.err(text.trimEnd());
      },
    });

  registerCompanyCommands(program, ctx);
  registerUserCommands(program, ctx);
  registerTransactionCommands(program, ctx);
  registerAccountCommands(program, ctx);
  registerReportCommands(program, ctx);
  registerBackupCommands(program, ctx);

  return program;
}

/** Errors caused by the request rather than by the program. */
function isUserError(error: unknown): error is Error {
  return (
    error instanceof LedgerError ||
    error instanceof EventStoreError ||
    error instanceof SnapshotIntegrityError
  );
}

/**
 * Run one command line (without the node and script arguments).
 *
 * @returns the process exit code
 */
export async function run(
  args: readonly string[],
  ctx: CommandContext,
  logger: Logger,
): Promise<number> {
  const program = createProgram(ctx);
  try {
    await program.parseAsync([...args], { from: "user" });
    return 0;
  } catch (error) {
    if (error instanceof CommanderError) {
      // commander has already written its message
      return error.exitCode;
    }
    if (isUserError(error)) {
      failure(ctx.output, error.message);
      return 1;
    }
    logger.error({ err: error }, "Command failed");
    return 1;
  }
}
