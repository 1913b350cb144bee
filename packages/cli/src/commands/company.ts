import type { Command } from "commander";
import { ValidationError } from "@ledgerbook/ledger";
import type { CompanyChanges } from "@ledgerbook/ledger";
import { parseId } from "../arguments.js";
import { renderTable, success } from "../output.js";
import type { CommandContext } from "./context.js";

interface CompanyOptions {
  readonly address?: string;
  readonly phone?: string;
  readonly email?: string;
}

interface CompanyUpdateOptions extends CompanyOptions {
  readonly name?: string;
}

export function registerCompanyCommands(program: Command, ctx: CommandContext): void {
  const company = program.command("company").description("Manage company accounts");

  company
    .command("add")
    .description("Add a company")
    .argument("<name>", "company name (unique)")
    .option("--address <address>", "postal address")
    .option("--phone <phone>", "phone number")
    .option("--email <email>", "email address")
    .action((name: string, options: CompanyOptions) => {
      const added = ctx.service().book.addCompany({
        name,
        address: options.address,
        phone: options.phone,
        email: options.email,
      });
      success(ctx.output, `Added company #${String(added.id)} ${added.name}`);
    });

  company
    .command("list")
    .description("List companies by name")
    .action(() => {
      const companies = ctx.service().book.listCompanies();
      if (companies.length === 0) {
        ctx.output.out("No companies");
        return;
      }
      const lines = renderTable(
        [
          { header: "ID", align: "right" },
          { header: "Name" },
          { header: "Phone" },
          { header: "Email" },
          { header: "Balance", align: "right" },
        ],
        companies.map((c) => [String(c.id), c.name, c.phone, c.email, c.balance]),
      );
      for (const line of lines) ctx.output.out(line);
    });

  company
    .command("update")
    .description("Change a company's details")
    .argument("<id>", "company id")
    .option("--name <name>", "new name")
    .option("--address <address>", "postal address")
    .option("--phone <phone>", "phone number")
    .option("--email <email>", "email address")
    .action((id: string, options: CompanyUpdateOptions) => {
      const changes: CompanyChanges = {
        name: options.name,
        address: options.address,
        phone: options.phone,
        email: options.email,
      };
      if (Object.values(changes).every((v) => v === undefined)) {
        throw new ValidationError("changes", "Nothing to update; pass at least one of --name, --address, --phone, --email");
      }
      const updated = ctx.service().book.updateCompany(parseId(id, "company id"), changes);
      success(ctx.output, `Updated company #${String(updated.id)} ${updated.name}`);
    });

  company
    .command("remove")
    .description("Remove a company no transaction refers to")
    .argument("<id>", "company id")
    .action((id: string) => {
      const removed = ctx.service().book.removeCompany(parseId(id, "company id"));
      success(ctx.output, `Removed company #${String(removed.id)} ${removed.name}`);
    });
}
