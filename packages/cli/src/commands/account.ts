import type { Command } from "commander";
import { parseAccountEndpoint } from "@ledgerbook/ledger";
import { renderTable } from "../output.js";
import type { CommandContext } from "./context.js";
import { describeEndpoint } from "./context.js";

export function registerAccountCommands(program: Command, ctx: CommandContext): void {
  program
    .command("balance")
    .description("Show an account's current balance")
    .argument("<account>", "company:<id> or user:<id>")
    .action((account: string) => {
      const book = ctx.service().book;
      const endpoint = parseAccountEndpoint(account);
      const balance = book.getBalance(endpoint);
      ctx.output.out(`${describeEndpoint(book, endpoint)}: ${balance}`);
    });

  program
    .command("ledger")
    .description("Show an account's ledger with running balances, newest first")
    .argument("<account>", "company:<id> or user:<id>")
    .action((account: string) => {
      const book = ctx.service().book;
      const statement = book.statement(parseAccountEndpoint(account));

      ctx.output.out(`Ledger for ${describeEndpoint(book, statement.account)}`);
      if (statement.lines.length === 0) {
        ctx.output.out("No transactions");
      } else {
        const lines = renderTable(
          [
            { header: "Date" },
            { header: "Description" },
            { header: "Counterparty" },
            { header: "Debit", align: "right" },
            { header: "Credit", align: "right" },
            { header: "Balance", align: "right" },
          ],
          statement.lines.map((line) => [
            line.date,
            line.description,
            line.counterpartyName,
            line.direction === "debit" ? line.amount : "",
            line.direction === "credit" ? line.amount : "",
            line.balanceAfter,
          ]),
        );
        for (const line of lines) ctx.output.out(line);
      }
      ctx.output.out(`Current balance: ${statement.balance}`);
    });
}
