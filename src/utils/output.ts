import chalk from 'chalk';

/**
 * Console output helpers for the omstore CLI
 */

export function info(message: string): void {
  console.log(chalk.cyan(message));
}

export function success(message: string): void {
  console.log(chalk.green(message));
}

export function warn(message: string): void {
  console.log(chalk.yellow(message));
}

export function error(message: string): void {
  console.log(chalk.red(message));
}

export function dim(message: string): void {
  console.log(chalk.dim(message));
}

export function blank(): void {
  console.log('');
}

/**
 * Section title underlined to its own width
 */
export function header(title: string): void {
  blank();
  console.log(chalk.bold.cyan(title));
  console.log(chalk.dim('='.repeat(title.length)));
}

export function keyValue(key: string, value: string): void {
  console.log(`${chalk.dim(`${key}:`)} ${value}`);
}

export type Cell = string | number;

function formatRow(cells: Cell[], widths: number[]): string {
  return cells
    .map((cell, i) => {
      const text = String(cell);
      // Numbers right-aligned
      return typeof cell === 'number' ? text.padStart(widths[i] ?? 0) : text.padEnd(widths[i] ?? 0);
    })
    .join('  ');
}

/**
 * Print a bold heading row, a rule, then the rows. Column widths fit the
 * widest cell.
 */
export function table(headings: string[], rows: Cell[][]): void {
  const widths = headings.map((heading, i) =>
    Math.max(heading.length, ...rows.map((row) => String(row[i] ?? '').length))
  );
  const ruleWidth = widths.reduce((total, width) => total + width, 0) + 2 * (widths.length - 1);

  console.log(chalk.bold(formatRow(headings, widths)));
  console.log(chalk.dim('-'.repeat(ruleWidth)));
  for (const row of rows) {
    console.log(formatRow(row, widths));
  }
}

/**
 * Pretty-printed JSON
 */
export function json(value: unknown): void {
  console.log(JSON.stringify(value, null, 2));
}

/**
 * Message of a thrown value, for CLI error output
 */
export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
