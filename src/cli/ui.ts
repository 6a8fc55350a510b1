/**
 * CLI UI Components - terminal output for the view-index command
 */

import chalk from 'chalk';
import ora from 'ora';

// ============================================================================
// Colors & Styles
// ============================================================================

export const colors = {
  secondary: chalk.gray,
  error: chalk.red,
  warning: chalk.yellow,
  info: chalk.blue,
  muted: chalk.dim,
  highlight: chalk.bold.white,
};

// ============================================================================
// Spinners
// ============================================================================

export function createSpinner(text: string) {
  return ora({
    text: colors.secondary(text),
    spinner: 'dots',
    color: 'cyan',
  });
}

// ============================================================================
// Messages
// ============================================================================

export function printError(message: string): void {
  console.error(colors.error('✗ Error: ') + message);
}

export function printInfo(message: string): void {
  console.log(colors.info('ℹ ') + message);
}

export function printWarning(message: string): void {
  console.log(colors.warning('⚠ ') + message);
}

// ============================================================================
// Tables
// ============================================================================

export function printTable(headers: string[], rows: string[][]): void {
  const widths = headers.map((h, i) => Math.max(h.length, ...rows.map((r) => (r[i] || '').length)));

  const headerRow = headers.map((h, i) => h.padEnd(widths[i])).join(colors.muted(' │ '));
  console.log(colors.highlight(headerRow));

  const separator = widths.map((w) => '─'.repeat(w)).join(colors.muted('─┼─'));
  console.log(colors.muted(separator));

  for (const row of rows) {
    const rowStr = row.map((cell, i) => (cell || '').padEnd(widths[i])).join(colors.muted(' │ '));
    console.log(rowStr);
  }
}
