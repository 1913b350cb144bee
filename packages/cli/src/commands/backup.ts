import type { Command } from "commander";
import type { SnapshotInfo } from "@ledgerbook/event-store";
import { parseCount } from "../arguments.js";
import { renderTable, success } from "../output.js";
import type { CommandContext } from "./context.js";

const HASH_PREFIX = 12;

const describeBackup = (b: SnapshotInfo): string =>
  `journal version ${String(b.version)} (sha256 ${b.stateHash.slice(0, HASH_PREFIX)})`;

export function registerBackupCommands(program: Command, ctx: CommandContext): void {
  const backup = program.command("backup").description("Save and restore hash-verified backups");

  backup
    .command("create")
    .description("Save the current book")
    .action(() => {
      const saved = ctx.service().createBackup();
      success(ctx.output, `Backup saved at ${describeBackup(saved)}`);
    });

  backup
    .command("list")
    .description("List backups, oldest first")
    .action(() => {
      const backups = ctx.service().listBackups();
      if (backups.length === 0) {
        ctx.output.out("No backups");
        return;
      }
      const lines = renderTable(
        [{ header: "Version", align: "right" }, { header: "Created" }, { header: "SHA-256" }],
        backups.map((b) => [String(b.version), b.createdAt, b.stateHash.slice(0, HASH_PREFIX)]),
      );
      for (const line of lines) ctx.output.out(line);
    });

  backup
    .command("restore")
    .description("Replace the book with a backup (default: the latest), backing up the current book first")
    .argument("[version]", "journal version of the backup")
    .action((version: string | undefined) => {
      const restored = ctx.service().restoreBackup(
        version === undefined ? undefined : parseCount(version, "version"),
      );
      const { snapshot } = restored;
      success(ctx.output, `Current book backed up at ${describeBackup(restored.safetyBackup)}`);
      success(
        ctx.output,
        `Restored backup from journal version ${String(restored.version)}: ` +
          `${String(snapshot.companies.length)} companies, ${String(snapshot.users.length)} users, ` +
          `${String(snapshot.transactions.length)} transactions`,
      );
    });
  backup
    .command("delete")
    .description("Delete one backup")
    .argument("<version>", "journal version of the backup")
    .action((version: string) => {
      const parsed = parseCount(version, "version");
      ctx.service().deleteBackup(parsed);
      success(ctx.output, `Deleted backup at journal version ${String(parsed)}`);
    });

  backup
    .command("import")
    .description("Add a backup file saved by another book")
    .argument("<file>", "path of the backup file")
    .action((file: string) => {
      const imported = ctx.service().importBackup(file);
      success(ctx.output, `Imported backup at ${describeBackup(imported)}`);
    });
}
