/**
 * dataver rename / describe — Edit version metadata
 */

import chalk from 'chalk';
import { success } from '../cli/output.js';
import { openInitialized, type RepoOptions } from './shared.js';

interface DescribeOptions extends RepoOptions {
  clear?: boolean;
}

export async function renameCommand(ref: string, newName: string, options: RepoOptions): Promise<void> {
  const repository = await openInitialized(options);
  const version = await repository.rename(ref, newName);
  success(`Renamed ${version.id} to ${chalk.bold(version.name)}`);
}

export async function describeCommand(
  ref: string,
  text: string | undefined,
  options: DescribeOptions,
): Promise<void> {
  const repository = await openInitialized(options);
  const description = options.clear ? null : (text ?? null);
  const version = await repository.describe(ref, description);
  success(
    version.description === null
      ? `Cleared description of ${version.id}`
      : `Updated description of ${version.id}`,
  );
}
