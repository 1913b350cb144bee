import type { Command } from "commander";
import { NotFoundError, parseAccountEndpoint, parseEndpoint } from "@ledgerbook/ledger";
import type { Book, TransactionReceipt } from "@ledgerbook/ledger";
import type { Transaction } from "@ledgerbook/types";
import { parseAmountArg, parseId, parseCount } from "../arguments.js";
import type { Output } from "../output.js";
import { renderFields, renderTable, success } from "../output.js";
import type { CommandContext } from "./context.js";
import { describeEndpoint } from "./context.js";

interface CreateOptions {
  readonly from: string;
  readonly to: string;
  readonly amount: string;
  readonly date?: string;
  readonly description?: string;
  readonly reference?: string;
}

interface ListOptions {
  readonly limit?: string;
  readonly asc?: boolean;
  readonly search?: string;
}

function printBalances(output: Output, book: Book, receipt: TransactionReceipt): void {
  const { transaction, balances } = receipt;
  if (balances.from !== undefined) {
    output.out(`  ${book.nameOf(transaction.from)} balance: ${balances.from}`);
  }
  if (balances.to !== undefined) {
    output.out(`  ${book.nameOf(transaction.to)} balance: ${balances.to}`);
  }
}

function transactionRows(book: Book, transactions: readonly Transaction[]): string[] {
  return renderTable(
    [
      { header: "ID", align: "right" },
      { header: "Date" },
      { header: "Type" },
      { header: "From" },
      { header: "To" },
      { header: "Amount", align: "right" },
      { header: "Description" },
    ],
    transactions.map((t) => [
      String(t.id),
      t.date,
      book.describeTransfer(t),
      book.nameOf(t.from),
      book.nameOf(t.to),
      t.amount,
      t.description,
    ]),
  );
}

export function registerTransactionCommands(program: Command, ctx: CommandContext): void {
  const tx = program.command("tx").description("Record, inspect and delete transactions");

  tx
    .command("create")
    .description("Move money between accounts or the cash pool")
    .requiredOption("--from <endpoint>", "company:<id>, user:<id> or cash")
    .requiredOption("--to <endpoint>", "company:<id>, user:<id> or cash")
    .requiredOption("--amount <amount>", "amount, e.g. 1,250.50")
    .option("--date <date>", "YYYY-MM-DD (default: today)")
    .option("--description <text>", "description")
    .option("--reference <text>", "reference")
    .action((options: CreateOptions) => {
      const book = ctx.service().book;
      const receipt = book.createTransaction({
        from: parseEndpoint(options.from, "from"),
        to: parseEndpoint(options.to, "to"),
        amount: parseAmountArg(options.amount),
        date: options.date,
        description: options.description,
        reference: options.reference,
      });
      const { transaction } = receipt;
      success(
        ctx.output,
        `Recorded transaction #${String(transaction.id)}: ${transaction.amount} from ${book.nameOf(transaction.from)} to ${book.nameOf(transaction.to)}`,
      );
      printBalances(ctx.output, book, receipt);
    });

  tx
    .command("delete")
    .description("Delete a transaction and reverse its balance changes")
    .argument("<id>", "transaction id")
    .action((id: string) => {
      const deleted = ctx.service().book.deleteTransaction(parseId(id, "transaction id"));
      success(ctx.output, `Deleted transaction #${String(deleted.id)} (${deleted.amount})`);
    });

  tx
    .command("list")
    .description("List transactions, newest first")
    .option("--limit <n>", "show at most n transactions")
    .option("--asc", "oldest first")
    .option("--search <term>", "match description, reference or account name")
    .action((options: ListOptions) => {
      const book = ctx.service().book;
      const limit = options.limit === undefined ? undefined : parseCount(options.limit, "limit");
      const order = options.asc === true ? "asc" : "desc";

      let transactions: Transaction[];
      if (options.search === undefined) {
        transactions = book.listTransactions({ order, limit });
      } else {
        const found = book.searchTransactions(options.search);
        const ordered = order === "asc" ? found.reverse() : found;
        transactions = limit === undefined ? ordered : ordered.slice(0, limit);
      }

      if (transactions.length === 0) {
        ctx.output.out("No transactions");
        return;
      }
      for (const line of transactionRows(book, transactions)) ctx.output.out(line);
    });

  tx
    .command("show")
    .description("Show one transaction")
    .argument("<id>", "transaction id")
    .action((id: string) => {
      const book = ctx.service().book;
      const transactionId = parseId(id, "transaction id");
      const transaction = book.getTransaction(transactionId);
      if (transaction === undefined) {
        throw new NotFoundError("transaction", transactionId);
      }
      const lines = renderFields([
        ["ID", String(transaction.id)],
        ["Date", transaction.date],
        ["Type", book.describeTransfer(transaction)],
        ["From", describeEndpoint(book, transaction.from)],
        ["To", describeEndpoint(book, transaction.to)],
        ["Amount", transaction.amount],
        ["Description", transaction.description],
        ["Reference", transaction.reference],
        ["Recorded", transaction.createdAt],
      ]);
      for (const line of lines) ctx.output.out(line);
    });

  program
    .command("deposit")
    .description("Bring cash into an account")
    .argument("<account>", "company:<id> or user:<id>")
    .argument("<amount>", "amount, e.g. 1,250.50")
    .option("--description <text>", "description (default: Cash Deposit)")
    .action((account: string, amount: string, options: { readonly description?: string }) => {
      const book = ctx.service().book;
      const receipt = book.deposit(parseAccountEndpoint(account), parseAmountArg(amount), options.description);
      const { transaction } = receipt;
      success(
        ctx.output,
        `Deposited ${transaction.amount} to ${book.nameOf(transaction.to)} (transaction #${String(transaction.id)})`,
      );
      printBalances(ctx.output, book, receipt);
    });

  program
    .command("withdraw")
    .description("Pay cash out of an account")
    .argument("<account>", "company:<id> or user:<id>")
    .argument("<amount>", "amount, e.g. 1,250.50")
    .option("--description <text>", "description (default: Cash Withdrawal)")
    .action((account: string, amount: string, options: { readonly description?: string }) => {
      const book = ctx.service().book;
      const receipt = book.withdraw(parseAccountEndpoint(account), parseAmountArg(amount), options.description);
      const { transaction } = receipt;
      success(
        ctx.output,
        `Withdrew ${transaction.amount} from ${book.nameOf(transaction.from)} (transaction #${String(transaction.id)})`,
      );
      printBalances(ctx.output, book, receipt);
    });
}
