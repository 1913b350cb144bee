/**
 * @ledgerbook/cli — Output.
 *
 * Commands write through an Output rather than the console so the whole
 * program can run in-process with captured output.
 */

import chalk from "chalk";

export interface Output {
  /** A line of command output (stdout) */
  out(line: string): void;
  /** A line of diagnostics (stderr) */
  err(line: string): void;
}

export const consoleOutput: Output = {
  out: (line) => {
    process.stdout.write(line + "\n");
  },
  err: (line) => {
    process.stderr.write(line + "\n");
  },
};

export function success(output: Output, message: string): void {
  output.out(chalk.green("✓ ") + message);
}

export function failure(output: Output, message: string): void {
  output.err(chalk.red(`Error: ${message}`));
}

// =============================================================================
// Tables
// =============================================================================

export type Align = "left" | "right";

export interface Column {
  readonly header: string;
  readonly align?: Align;
}

/**
 * Render rows as aligned text columns separated by two spaces, with a
 * bold header and a dashed rule beneath it. Trailing spaces are trimmed.
 */
export function renderTable(
  columns: readonly Column[],
  rows: readonly (readonly string[])[],
): string[] {
  const widths = columns.map((column, i) =>
    Math.max(column.header.length, ...rows.map((row) => (row[i] ?? "").length)),
  );

  const line = (cells: readonly string[]): string =>
    columns
      .map((column, i) => {
        const width = widths[i] ?? 0;
        const cell = cells[i] ?? "";
        return column.align === "right" ? cell.padStart(width) : cell.padEnd(width);
      })
      .join("  ")
      .trimEnd();

  return [
    chalk.bold(line(columns.map((c) => c.header))),
    widths.map((w) => "-".repeat(w)).join("  "),
    ...rows.map((row) => line(row)),
  ];
}

/** Label/value pairs with the labels padded to a common width. */
export function renderFields(fields: readonly (readonly [string, string])[]): string[] {
  const width = Math.max(0, ...fields.map(([label]) => label.length));
  return fields.map(([label, value]) =>
    value === ""
      ? chalk.gray(`${label}:`)
      : `${chalk.gray(`${label}:`.padEnd(width + 1))} ${value}`,
  );
}
