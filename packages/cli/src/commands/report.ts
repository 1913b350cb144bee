import type { Command } from "commander";
import { ConsistencyError, ValidationError, endpointKey } from "@ledgerbook/ledger";
import type { Book } from "@ledgerbook/ledger";
import { renderFields, renderTable, success } from "../output.js";
import type { Output } from "../output.js";
import type { CommandContext } from "./context.js";

const SECTIONS = ["companies", "users"] as const;
type Section = (typeof SECTIONS)[number];

function isSection(value: string): value is Section {
  return SECTIONS.some((s) => s === value);
}

export function registerReportCommands(program: Command, ctx: CommandContext): void {
  program
    .command("report")
    .description("Show balance totals, or rank companies or users by balance")
    .argument("[section]", `one of ${SECTIONS.join(", ")}`)
    .action((section: string | undefined) => {
      const book = ctx.service().book;
      if (section === undefined) {
        printTotals(book, ctx.output);
        return;
      }
      if (!isSection(section)) {
        throw new ValidationError(
          "section",
          `Unknown report "${section}". Expected ${SECTIONS.join(" or ")}`,
        );
      }
      const lines = section === "companies" ? companyRanking(book) : userRanking(book);
      for (const line of lines) ctx.output.out(line);
    });

  program
    .command("verify")
    .description("Recompute every balance from the transactions and compare")
    .action(() => {
      const report = ctx.service().book.verify();
      if (!report.consistent) {
        for (const d of report.discrepancies) {
          ctx.output.err(
            `${d.name} (${endpointKey(d.account)}): stored ${d.stored}, replayed ${d.replayed}`,
          );
        }
        throw new ConsistencyError(report.discrepancies);
      }
      success(ctx.output, `All ${String(report.checkedAccounts)} account balances match their ledgers`);
    });
}

function printTotals(book: Book, output: Output): void {
  const totals = book.totals();
  const summary = book.summary();
  const lines = renderFields([
    ["Companies", String(book.listCompanies().length)],
    ["Users", String(book.listUsers().length)],
    ["Company balances", totals.companyTotal],
    ["User balances", totals.userTotal],
    ["Grand total", totals.grandTotal],
    ["Cash position", totals.cashPosition],
    ["Transactions", String(summary.count)],
    ["Total amount", summary.totalAmount],
    ["Average amount", summary.averageAmount],
  ]);
  for (const line of lines) output.out(line);
}

function companyRanking(book: Book): string[] {
  const companies = book.companiesByBalance();
  if (companies.length === 0) return ["No companies"];
  return renderTable(
    [{ header: "Company" }, { header: "Email" }, { header: "Balance", align: "right" }],
    companies.map((c) => [c.name, c.email === "" ? "-" : c.email, c.balance]),
  );
}

function userRanking(book: Book): string[] {
  const users = book.usersByBalance();
  if (users.length === 0) return ["No users"];
  return renderTable(
    [{ header: "Name" }, { header: "Company" }, { header: "Balance", align: "right" }],
    users.map((u) => [
      u.name,
      u.companyId === null ? "No company" : (book.getCompany(u.companyId)?.name ?? "No company"),
      u.balance,
    ]),
  );
}
