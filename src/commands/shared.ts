/**
 * Helpers shared by the CLI commands
 */

import { warning } from '../cli/output.js';
import { isInitialized, resolveRepoRoot } from '../config.js';
import { NotFoundError, ValidationError } from '../errors.js';
import { openRepository } from '../repository/index.js';
import type { Repository } from '../repository/index.js';
import type { Row } from '../types.js';

export interface RepoOptions {
  /** Repository directory; defaults to $DATAVER_REPO, then ./.dataver */
  repo?: string;
}

/**
 * Open an existing repository. Only `init` creates one.
 */
export async function openInitialized(options: RepoOptions): Promise<Repository<Row[]>> {
  const root = resolveRepoRoot(options.repo);
  if (!isInitialized(root)) {
    throw new NotFoundError(`No dataver repository at ${root}. Run \`dataver init\` first.`);
  }
  return openRepository(root, {
    onReleaseError: (err) => warning(err.message),
  });
}

/**
 * Commander collector for repeatable options (`-p a -p b`).
 */
export function collect(value: string, previous: string[] = []): string[] {
  return [...previous, value];
}

export function parsePositiveInt(value: string | undefined, flag: string): number | undefined {
  if (value === undefined) return undefined;
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new ValidationError(`${flag} must be a positive integer, got '${value}'`);
  }
  return parsed;
}
