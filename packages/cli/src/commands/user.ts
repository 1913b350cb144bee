import type { Command } from "commander";
import { ValidationError } from "@ledgerbook/ledger";
import type { UserChanges } from "@ledgerbook/ledger";
import { parseId } from "../arguments.js";
import { renderTable, success } from "../output.js";
import type { CommandContext } from "./context.js";

interface UserOptions {
  readonly company?: string;
  readonly email?: string;
  readonly role?: string;
  readonly department?: string;
}

interface UserUpdateOptions {
  readonly name?: string;
  /** false when --no-company is given */
  readonly company?: string | false;
  readonly email?: string;
  readonly role?: string;
  readonly department?: string;
}

function companyChange(value: string | false | undefined): number | null | undefined {
  if (value === undefined) return undefined;
  return value === false ? null : parseId(value, "company id");
}

export function registerUserCommands(program: Command, ctx: CommandContext): void {
  const user = program.command("user").description("Manage user accounts");

  user
    .command("add")
    .description("Add a user")
    .argument("<name>", "user name")
    .option("--company <id>", "company the user belongs to")
    .option("--email <email>", "email address")
    .option("--role <role>", "role")
    .option("--department <department>", "department")
    .action((name: string, options: UserOptions) => {
      const added = ctx.service().book.addUser({
        name,
        companyId: options.company === undefined ? null : parseId(options.company, "company id"),
        email: options.email,
        role: options.role,
        department: options.department,
      });
      success(ctx.output, `Added user #${String(added.id)} ${added.name}`);
    });

  user
    .command("list")
    .description("List users by name")
    .option("--company <id>", "only users of this company")
    .action((options: { readonly company?: string }) => {
      const book = ctx.service().book;
      const users = book.listUsers({
        companyId: options.company === undefined ? undefined : parseId(options.company, "company id"),
      });
      if (users.length === 0) {
        ctx.output.out("No users");
        return;
      }
      const lines = renderTable(
        [
          { header: "ID", align: "right" },
          { header: "Name" },
          { header: "Company" },
          { header: "Role" },
          { header: "Department" },
          { header: "Balance", align: "right" },
        ],
        users.map((u) => [
          String(u.id),
          u.name,
          u.companyId === null ? "-" : (book.getCompany(u.companyId)?.name ?? "-"),
          u.role,
          u.department,
          u.balance,
        ]),
      );
      for (const line of lines) ctx.output.out(line);
    });

  user
    .command("update")
    .description("Change a user's details")
    .argument("<id>", "user id")
    .option("--name <name>", "new name")
    .option("--company <id>", "move the user to this company")
    .option("--no-company", "detach the user from their company")
    .option("--email <email>", "email address")
    .option("--role <role>", "role")
    .option("--department <department>", "department")
    .action((id: string, options: UserUpdateOptions) => {
      const changes: UserChanges = {
        name: options.name,
        companyId: companyChange(options.company),
        email: options.email,
        role: options.role,
        department: options.department,
      };
      if (Object.values(changes).every((v) => v === undefined)) {
        throw new ValidationError(
          "changes",
          "Nothing to update; pass at least one of --name, --company, --no-company, --email, --role, --department",
        );
      }
      const updated = ctx.service().book.updateUser(parseId(id, "user id"), changes);
      success(ctx.output, `Updated user #${String(updated.id)} ${updated.name}`);
    });

  user
    .command("remove")
    .description("Remove a user no transaction refers to")
    .argument("<id>", "user id")
    .action((id: string) => {
      const removed = ctx.service().book.removeUser(parseId(id, "user id"));
      success(ctx.output, `Removed user #${String(removed.id)} ${removed.name}`);
    });
}
