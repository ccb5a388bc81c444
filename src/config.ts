/**
 * Dataver Configuration
 *
 * Manages <repo>/config.json. The repository root defaults to $DATAVER_REPO,
 * then .dataver/ in the current directory.
 */

import { readFile, writeFile, mkdir } from 'node:fs/promises';
import { existsSync } from 'node:fs';
import { join, resolve } from 'node:path';
import { userInfo } from 'node:os';
import { CorruptStateError } from './errors.js';
import { DataverConfigSchema, type DataverConfig } from './schema.js';

/** Directory name for a repository created in the working directory */
export const DATAVER_DIR = '.dataver';

export const CONFIG_FILE = 'config.json';
export const METADATA_FILE = 'metadata.json';
export const LOCK_FILE = 'metadata.lock';
export const OBJECTS_DIR = 'objects';

export const REPO_ENV_VAR = 'DATAVER_REPO';
export const AUTHOR_ENV_VAR = 'DATAVER_AUTHOR';

/**
 * Default configuration for new repositories.
 */
export function defaultConfig(): DataverConfig {
  return DataverConfigSchema.parse({});
}

/**
 * Resolve the repository root directory.
 */
export function resolveRepoRoot(root?: string, cwd?: string): string {
  if (root) return resolve(root);
  const fromEnv = process.env[REPO_ENV_VAR];
  if (fromEnv) return resolve(fromEnv);
  return join(resolve(cwd ?? process.cwd()), DATAVER_DIR);
}

export function configPath(root: string): string {
  return join(root, CONFIG_FILE);
}

/**
 * Check if a repository exists at the given root.
 */
export function isInitialized(root: string): boolean {
  return existsSync(configPath(root));
}

/**
 * Load config.json, falling back to defaults when the file is absent.
 * Fields missing from an older file take their default values.
 */
export async function loadConfig(root: string): Promise<DataverConfig> {
  const path = configPath(root);
  if (!existsSync(path)) {
    return defaultConfig();
  }

  const raw = await readFile(path, 'utf-8');
  let data: unknown;
  try {
    data = JSON.parse(raw);
  } catch (err) {
    throw new CorruptStateError(path, err instanceof Error ? err.message : String(err));
  }

  const parsed = DataverConfigSchema.safeParse(data);
  if (!parsed.success) {
    throw new CorruptStateError(path, parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; '));
  }
  return parsed.data;
}

export async function saveConfig(config: DataverConfig, root: string): Promise<void> {
  await mkdir(root, { recursive: true });
  await writeFile(configPath(root), JSON.stringify(config, null, 2) + '\n', 'utf-8');
}

/**
 * Create the repository directory and config if missing.
 * Existing config is loaded, never overwritten.
 */
export async function initializeRepository(
  root: string,
  overrides?: Partial<DataverConfig>,
): Promise<DataverConfig> {
  await mkdir(join(root, OBJECTS_DIR), { recursive: true });
  if (isInitialized(root)) {
    return loadConfig(root);
  }
  const config = DataverConfigSchema.parse({ ...overrides });
  await saveConfig(config, root);
  return config;
}

/**
 * Author recorded on new versions when the caller gives none.
 */
export function defaultAuthor(config: DataverConfig): string {
  if (config.author) return config.author;
  const fromEnv = process.env[AUTHOR_ENV_VAR];
  if (fromEnv) return fromEnv;
  try {
    return userInfo().username || 'unknown';
  } catch {
    // userInfo throws when the uid has no passwd entry (some containers)
    return 'unknown';
  }
}
