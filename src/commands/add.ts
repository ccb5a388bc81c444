/**
 * dataver add / derive / update — Record dataset versions from JSON files
 *
 * Input files hold a JSON array of row objects.
 */

import chalk from 'chalk';
import { readRowsFile } from '../engine/index.js';
import { shortFingerprint } from '../fingerprint/index.js';
import type { DatasetVersion } from '../schema.js';
import { createSpinner, printJson } from '../cli/output.js';
import { openInitialized, type RepoOptions } from './shared.js';

interface AddOptions extends RepoOptions {
  tag?: string;
  parent?: string[];
  description?: string;
  author?: string;
  json?: boolean;
}

interface DeriveOptions extends RepoOptions {
  name?: string;
  tag?: string;
  description?: string;
  author?: string;
  json?: boolean;
}

interface UpdateOptions extends RepoOptions {
  description?: string;
  parent?: string[];
  json?: boolean;
}

export async function addCommand(name: string, file: string, options: AddOptions): Promise<void> {
  const repository = await openInitialized(options);
  const version = await withSpinner(`Recording ${name}...`, async () =>
    repository.createDataset(name, await readRowsFile(file), {
      tag: options.tag,
      parents: options.parent,
      description: options.description,
      author: options.author,
    }),
  );
  report(version, options.json, 'Recorded');
}

export async function deriveCommand(source: string, file: string, options: DeriveOptions): Promise<void> {
  const repository = await openInitialized(options);
  const version = await withSpinner(`Deriving from ${source}...`, async () =>
    repository.deriveDataset(source, await readRowsFile(file), {
      name: options.name,
      tag: options.tag,
      description: options.description,
      author: options.author,
    }),
  );
  report(version, options.json, 'Derived');
}

export async function updateCommand(ref: string, file: string, options: UpdateOptions): Promise<void> {
  const repository = await openInitialized(options);
  const version = await withSpinner(`Updating ${ref}...`, async () =>
    repository.updateDataset(ref, await readRowsFile(file), {
      description: options.description,
      parents: options.parent,
    }),
  );
  report(version, options.json, 'Updated');
}

async function withSpinner<T>(text: string, fn: () => Promise<T>): Promise<T> {
  const spinner = createSpinner(text);
  try {
    const result = await fn();
    spinner.stop();
    return result;
  } catch (err) {
    spinner.fail(text.replace(/\.\.\.$/, ' failed'));
    throw err;
  }
}

function report(version: DatasetVersion, json: boolean | undefined, verb: string): void {
  if (json) {
    printJson(version);
    return;
  }
  console.log(
    chalk.green('✓') +
      ` ${verb} ${chalk.bold(version.name)}@${chalk.cyan(shortFingerprint(version.fingerprint))}` +
      chalk.dim(` (${version.shape.rowCount} rows × ${version.shape.columnCount} columns)`),
  );
  console.log(chalk.dim(`  id: ${version.id}`));
  if (version.parentIds.length > 0) {
    console.log(chalk.dim(`  parents: ${version.parentIds.join(', ')}`));
  }
}
