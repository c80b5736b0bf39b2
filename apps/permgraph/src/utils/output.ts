/**
 * Output formatting utilities
 */

import type { TriState } from '@permgraph/core';
import chalk from 'chalk';

export type OutputFormat = 'json' | 'table';

let outputFormat: OutputFormat = 'table';
let quietMode = false;
let verboseMode = false;

export function isOutputFormat(value: unknown): value is OutputFormat {
  return value === 'json' || value === 'table';
}

export function setOutputFormat(format: OutputFormat): void {
  outputFormat = format;
}

export function getOutputFormat(): OutputFormat {
  return outputFormat;
}

export function setQuietMode(quiet: boolean): void {
  quietMode = quiet;
}

export function setVerboseMode(verbose: boolean): void {
  verboseMode = verbose;
}

export function isQuiet(): boolean {
  return quietMode;
}

export function isVerbose(): boolean {
  return verboseMode;
}

/**
 * Print JSON output
 */
export function printJson(data: unknown): void {
  console.log(JSON.stringify(data, null, 2));
}

export function printTable(headers: string[], rows: string[][]): void {
  const columnWidths: number[] = headers.map((h) => stripAnsi(h).length);

  for (const row of rows) {
    for (let i = 0; i < row.length; i++) {
      const len = stripAnsi(row[i] ?? '').length;
      if (len > (columnWidths[i] ?? 0)) {
        columnWidths[i] = len;
      }
    }
  }

  console.log(headers.map((h, i) => chalk.bold(padRight(h, columnWidths[i]))).join('  ').trimEnd());
  console.log(columnWidths.map((w) => '-'.repeat(w)).join('  '));

  for (const row of rows) {
    console.log(row.map((cell, i) => padRight(cell, columnWidths[i])).join('  ').trimEnd());
  }
}

/**
 * Strip ANSI escape codes for width calculation
 */
function stripAnsi(str: string): string {
  // biome-ignore lint/suspicious/noControlCharactersInRegex: ANSI escape codes use control characters
  return str.replace(/\x1B\[[0-9;]*[a-zA-Z]/g, '');
}

function padRight(str: string, width: number): string {
  const padding = Math.max(0, width - stripAnsi(str).length);
  return str + ' '.repeat(padding);
}

/**
 * Print data as JSON, or as a table in table mode
 */
export function printData<T>(
  data: T[],
  tableConfig: {
    headers: string[];
    getRow: (item: T) => string[];
  }
): void {
  if (outputFormat === 'json') {
    printJson(data);
    return;
  }
  printTable(tableConfig.headers, data.map(tableConfig.getRow));
}

export function formatResult(result: TriState): string {
  switch (result) {
    case 'TRUE':
      return chalk.green(result);
    case 'FALSE':
      return chalk.red(result);
    case 'UNDEFINED':
      return chalk.gray(result);
  }
}

export function formatValue(value: boolean): string {
  return value ? chalk.green('true') : chalk.red('false');
}

/**
 * Print success message
 */
export function success(message: string): void {
  if (!quietMode) {
    console.log(chalk.green('✓'), message);
  }
}

/**
 * Print error message
 */
export function error(message: string): void {
  console.error(chalk.red('✗'), message);
}

/**
 * Print warning message
 */
export function warn(message: string): void {
  if (!quietMode) {
    console.warn(chalk.yellow('⚠'), message);
  }
}

/**
 * Print info message
 */
export function info(message: string): void {
  if (!quietMode) {
    console.log(chalk.blue('ℹ'), message);
  }
}

/**
 * Print verbose message (only if verbose mode)
 */
export function verbose(message: string): void {
  if (verboseMode) {
    console.log(chalk.gray('▸'), chalk.gray(message));
  }
}
