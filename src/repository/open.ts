/**
 * Repository handles.
 *
 * Opening is idempotent: an existing directory is attached to as-is, a
 * missing one is created with default config and empty metadata. Each call
 * returns an independent handle, so several repositories can be open in one
 * process.
 */

import { initializeRepository, resolveRepoRoot } from '../config.js';
import { JsonTableEngine } from '../engine/index.js';
import type { DataverConfig } from '../schema.js';
import { MetadataStore } from '../store/index.js';
import type { DataEngine, Row } from '../types.js';
import { Repository, type RepositoryOptions } from './repository.js';

export interface OpenRepositoryOptions extends RepositoryOptions {
  /** Settings written to config.json when the repository is created */
  init?: Partial<DataverConfig>;
  /** Per-handle overrides of the stored config; not persisted */
  overrides?: Partial<DataverConfig>;
  /** Clock, for deterministic timestamps in tests */
  now?: () => Date;
  /** Base for the default .dataver location */
  cwd?: string;
}

/**
 * Open a repository backed by a caller-supplied data engine.
 */
export async function openRepositoryWith<TData>(
  engine: DataEngine<TData>,
  root?: string,
  options: OpenRepositoryOptions = {},
): Promise<Repository<TData>> {
  const repoRoot = resolveRepoRoot(root, options.cwd);
  const stored = await initializeRepository(repoRoot, options.init);
  const config: DataverConfig = { ...stored, ...options.overrides };

  const store = new MetadataStore({
    root: repoRoot,
    tagPolicy: config.tagPolicy,
    lockTimeoutMs: config.lockTimeoutMs,
    staleLockMs: config.staleLockMs,
    now: options.now,
  });
  await store.init();

  return new Repository(repoRoot, config, store, engine, {
    onReleaseError: options.onReleaseError,
  });
}

/**
 * Open a repository that stores row arrays as JSON objects under
 * <root>/objects.
 */
export async function openRepository(
  root?: string,
  options: OpenRepositoryOptions = {},
): Promise<Repository<Row[]>> {
  const repoRoot = resolveRepoRoot(root, options.cwd);
  return openRepositoryWith(new JsonTableEngine(repoRoot), repoRoot, options);
}
