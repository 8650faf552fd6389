/**
 * Output formatting utilities for CLI
 */

import chalk from 'chalk';
import { isCatalogError, type Producibility } from '@tessera/shared';

export type Cell = string | number | null | undefined;

export function heading(text: string): void {
  console.log(chalk.bold.cyan(`\n${text}`));
  console.log(chalk.dim('─'.repeat(Math.min(text.length + 4, 60))));
}

export function field(label: string, value: Cell): void {
  const display = value === null || value === undefined ? chalk.dim('—') : String(value);
  console.log(`  ${chalk.gray(label.padEnd(18))} ${display}`);
}

export function success(text: string): void {
  console.log(chalk.green(`✓ ${text}`));
}

export function error(text: string): void {
  console.error(chalk.red(`✗ ${text}`));
}

export function warn(text: string): void {
  console.log(chalk.yellow(`! ${text}`));
}

export function json(data: unknown): void {
  console.log(JSON.stringify(data, null, 2));
}

export function producibilityColor(producibility: Producibility): string {
  if (producibility.kind === 'unlimited') return chalk.blue('unlimited');
  if (producibility.units === 0) return chalk.red('0');
  if (producibility.units < 5) return chalk.yellow(String(producibility.units));
  return chalk.green(String(producibility.units));
}

/**
 * Column widths for a table, from the header and the longest cell
 */
export function columnWidths(rows: readonly Record<string, Cell>[], cols: readonly string[]): number[] {
  return cols.map((c) => Math.max(c.length, ...rows.map((r) => visibleLength(String(r[c] ?? '')))));
}

// eslint-disable-next-line no-control-regex
const ANSI = /\u001b\[[0-9;]*m/g;

function visibleLength(text: string): number {
  return text.replace(ANSI, '').length;
}

function pad(text: string, width: number): string {
  return text + ' '.repeat(Math.max(0, width - visibleLength(text)));
}

export function table(rows: readonly Record<string, Cell>[], columns?: string[]): void {
  const first = rows[0];
  if (!first) {
    console.log(chalk.dim('  No results'));
    return;
  }

  const cols = columns ?? Object.keys(first);
  const widths = columnWidths(rows, cols);

  // Header
  const header = cols.map((c, i) => pad(c, widths[i] ?? 0)).join('  ');
  console.log(chalk.bold(`  ${header}`));
  console.log(chalk.dim(`  ${widths.map((w) => '─'.repeat(w)).join('──')}`));

  // Rows
  for (const row of rows) {
    const line = cols.map((c, i) => pad(String(row[c] ?? ''), widths[i] ?? 0)).join('  ');
    console.log(`  ${line}`);
  }
}

/**
 * Print a failure and exit. Known errors get their message only.
 */
export function fail(err: unknown): never {
  if (isCatalogError(err)) {
    error(`${err.userMessage} (${err.code})`);
    console.error(chalk.dim(`  ${err.message}`));
  } else if (err instanceof Error) {
    error(err.message);
  } else {
    error(String(err));
  }
  process.exit(1);
}
