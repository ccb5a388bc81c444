/**
 * dataver tag / untag / tag-log — Manage tags
 */

import chalk from 'chalk';
import { InvalidReferenceError } from '../errors.js';
import { parseReference } from '../resolver/index.js';
import type { TagHistoryEntry } from '../schema.js';
import { printJson, success } from '../cli/output.js';
import { openInitialized, type RepoOptions } from './shared.js';

interface TagLogOptions extends RepoOptions {
  name?: string;
  label?: string;
  json?: boolean;
}

export async function tagCommand(ref: string, label: string, options: RepoOptions): Promise<void> {
  const repository = await openInitialized(options);
  const tag = await repository.tag(ref, label);
  success(`Tagged ${chalk.bold(`${tag.name}:${tag.label}`)} → ${tag.datasetId}`);
}

export async function untagCommand(ref: string, options: RepoOptions): Promise<void> {
  const parsed = parseReference(ref);
  if (parsed.kind !== 'tag') {
    throw new InvalidReferenceError(ref, 'untag expects <name>:<tag>');
  }
  const repository = await openInitialized(options);
  const tag = await repository.untag(parsed.name, parsed.label);
  success(`Removed tag ${chalk.bold(`${tag.name}:${tag.label}`)}`);
}

export async function tagLogCommand(options: TagLogOptions): Promise<void> {
  const repository = await openInitialized(options);
  const entries = await repository.tagHistory({ name: options.name, label: options.label });

  if (options.json) {
    printJson(entries);
    return;
  }

  if (entries.length === 0) {
    console.log(chalk.dim('No tag changes recorded.'));
    return;
  }

  for (const entry of entries) {
    console.log(formatEntry(entry));
  }
}

function formatEntry(entry: TagHistoryEntry): string {
  const target =
    entry.previousDatasetId && entry.datasetId
      ? `${entry.previousDatasetId} → ${entry.datasetId}`
      : (entry.datasetId ?? entry.previousDatasetId ?? '');
  return [
    chalk.dim(entry.at),
    chalk.yellow(entry.action.padEnd(8)),
    chalk.bold(`${entry.name}:${entry.label}`),
    target,
  ].join('  ');
}
