/**
 * Console output helpers for the CLI
 */

import chalk from 'chalk';
import ora, { type Ora } from 'ora';
import { isDataverError } from '../errors.js';
import { shortFingerprint } from '../fingerprint/index.js';
import type { DanglingAncestorError } from '../errors.js';
import type { DatasetVersion, Tag } from '../schema.js';

/**
 * Create a simple spinner
 */
export function createSpinner(text: string): Ora {
  return ora({ text }).start();
}

/**
 * Show a success message with checkmark
 */
export function success(message: string): void {
  console.log(chalk.green('✓') + ' ' + message);
}

/**
 * Show a warning message
 */
export function warning(message: string): void {
  console.log(chalk.yellow('⚠') + ' ' + message);
}

/**
 * Show an error message
 */
export function error(message: string): void {
  console.log(chalk.red('✗') + ' ' + message);
}

export function printJson(value: unknown): void {
  console.log(JSON.stringify(value, null, 2));
}

/**
 * One line per version: short fingerprint, name, tags, id, date.
 */
export function formatVersionLine(version: DatasetVersion, tags: readonly Tag[] = []): string {
  const labels = tags
    .filter((t) => t.datasetId === version.id)
    .map((t) => t.label);
  const tagText = labels.length > 0 ? ' ' + chalk.yellow(`[${labels.join(', ')}]`) : '';
  const date = version.createdAt.split('T')[0];
  return [
    chalk.cyan(shortFingerprint(version.fingerprint)),
    chalk.bold(version.name) + tagText,
    chalk.dim(version.id),
    chalk.dim(date),
  ].join('  ');
}

export function reportDangling(dangling: readonly DanglingAncestorError[]): void {
  for (const entry of dangling) {
    warning(`Missing ancestor ${entry.ancestorId} (referenced by ${entry.referencedBy})`);
  }
}

/**
 * Print an error and exit. Stack traces only with DEBUG set.
 */
export function handleError(err: unknown): never {
  if (isDataverError(err)) {
    error(`${err.message} ${chalk.dim(`(${err.code})`)}`);
  } else if (err instanceof Error) {
    error(err.message);
  } else {
    error('An unexpected error occurred');
  }
  if (process.env.DEBUG && err instanceof Error) {
    console.error(err.stack);
  }
  process.exit(1);
}
