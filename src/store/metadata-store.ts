/**
 * Metadata Record Store
 *
 * Durable table of dataset versions, the tag index and the tag history log,
 * kept in <root>/metadata.json.
 *
 * Writes: every mutation runs in a transaction that takes the repository
 * lock, re-reads the file, applies changes in memory and writes a temp file
 * that is renamed over metadata.json. A transaction that throws writes
 * nothing.
 * Reads: no lock; rename is atomic, so a reader sees either the previous or
 * the next complete state.
 */

import { readFile, writeFile, mkdir, rename, rm } from 'node:fs/promises';
import { existsSync } from 'node:fs';
import { join } from 'node:path';
import { randomBytes } from 'node:crypto';
import { LOCK_FILE, METADATA_FILE } from '../config.js';
import { CorruptStateError } from '../errors.js';
import {
  MetadataStateSchema,
  emptyMetadataState,
  type DatasetVersion,
  type MetadataState,
  type Tag,
  type TagHistoryEntry,
  type TagPolicy,
} from '../schema.js';
import type { ListFilter, TagHistoryFilter } from '../types.js';
import { FileLock } from './lock.js';
import { MetadataSnapshot } from './snapshot.js';
import {
  StoreTransaction,
  type CreateVersionInput,
  type DeleteResult,
  type UpdateVersionInput,
} from './transaction.js';

export interface MetadataStoreOptions {
  /** Repository root directory */
  root: string;
  tagPolicy?: TagPolicy;
  lockTimeoutMs?: number;
  staleLockMs?: number;
  /** Clock, for deterministic timestamps in tests */
  now?: () => Date;
}

export class MetadataStore {
  readonly root: string;
  readonly path: string;
  private readonly lock: FileLock;
  private readonly tagPolicy: TagPolicy;
  private readonly now: () => Date;

  constructor(options: MetadataStoreOptions) {
    this.root = options.root;
    this.path = join(options.root, METADATA_FILE);
    this.lock = new FileLock(join(options.root, LOCK_FILE), {
      timeoutMs: options.lockTimeoutMs,
      staleMs: options.staleLockMs,
    });
    this.tagPolicy = options.tagPolicy ?? 'overwrite';
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Create an empty metadata.json if none exists. Safe to call repeatedly.
   */
  async init(): Promise<void> {
    await mkdir(this.root, { recursive: true });
    if (existsSync(this.path)) return;
    await this.lock.withLock(async () => {
      if (!existsSync(this.path)) {
        await this.writeState(emptyMetadataState());
      }
    });
  }

  /**
   * Run `fn` as one atomic unit under the repository lock. State is
   * written once, after `fn` resolves; commit hooks then run in order.
   * If `fn` or the write throws, rollback hooks run instead, still under
   * the lock, and the error is rethrown.
   */
  async transaction<T>(fn: (tx: StoreTransaction) => T | Promise<T>): Promise<T> {
    return this.lock.withLock(async () => {
      const state = await this.readState();
      const tx = new StoreTransaction(state, this.tagPolicy, this.now);

      let result: T;
      try {
        result = await fn(tx);
        if (tx.dirty) {
          await this.writeState(state);
        }
      } catch (err) {
        for (const hook of tx.afterRollback) {
          await hook();
        }
        throw err;
      }

      for (const hook of tx.afterCommit) {
        await hook();
      }
      return result;
    });
  }

  // ─── Reads ─────────────────────────────────────────────────

  /**
   * Load one consistent copy of the whole store.
   */
  async snapshot(): Promise<MetadataSnapshot> {
    return new MetadataSnapshot(await this.readState());
  }

  async get(id: string): Promise<DatasetVersion | null> {
    return (await this.snapshot()).get(id);
  }

  async all(): Promise<DatasetVersion[]> {
    return (await this.snapshot()).all();
  }

  async list(filter?: ListFilter): Promise<DatasetVersion[]> {
    return (await this.snapshot()).list(filter);
  }

  async tags(): Promise<Tag[]> {
    return (await this.snapshot()).tags();
  }

  async tagsFor(id: string): Promise<Tag[]> {
    return (await this.snapshot()).tagsFor(id);
  }

  async tagHistory(filter?: TagHistoryFilter): Promise<TagHistoryEntry[]> {
    return (await this.snapshot()).tagHistory(filter);
  }

  // ─── Single-step writes ────────────────────────────────────

  async create(input: CreateVersionInput): Promise<DatasetVersion> {
    return this.transaction((tx) => tx.create(input));
  }

  async update(id: string, input: UpdateVersionInput): Promise<DatasetVersion> {
    return this.transaction((tx) => tx.update(id, input));
  }

  async setDescription(id: string, description: string | null): Promise<DatasetVersion> {
    return this.transaction((tx) => tx.setDescription(id, description));
  }

  async rename(id: string, newName: string): Promise<DatasetVersion> {
    return this.transaction((tx) => tx.rename(id, newName));
  }

  async delete(id: string, options?: { force?: boolean }): Promise<DeleteResult> {
    return this.transaction((tx) => tx.delete(id, options?.force ?? false));
  }

  async addTag(id: string, label: string): Promise<Tag> {
    return this.transaction((tx) => tx.addTag(id, label));
  }

  async removeTag(name: string, label: string): Promise<Tag> {
    return this.transaction((tx) => tx.removeTag(name, label));
  }

  // ─── Persistence ───────────────────────────────────────────

  private async readState(): Promise<MetadataState> {
    if (!existsSync(this.path)) {
      return emptyMetadataState();
    }

    const raw = await readFile(this.path, 'utf-8');
    let data: unknown;
    try {
      data = JSON.parse(raw);
    } catch (err) {
      throw new CorruptStateError(this.path, err instanceof Error ? err.message : String(err));
    }

    const parsed = MetadataStateSchema.safeParse(data);
    if (!parsed.success) {
      throw new CorruptStateError(
        this.path,
        parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; '),
      );
    }
    return parsed.data;
  }

  /**
   * Temp file + rename, so metadata.json is never observed half-written.
   */
  private async writeState(state: MetadataState): Promise<void> {
    await mkdir(this.root, { recursive: true });
    const tempPath = `${this.path}.tmp.${randomBytes(4).toString('hex')}`;
    const content = JSON.stringify(state, null, 2) + '\n';

    try {
      await writeFile(tempPath, content, 'utf-8');
      await rename(tempPath, this.path);
    } catch (err) {
      await rm(tempPath, { force: true });
      throw new Error(
        `Metadata save failed: ${err instanceof Error ? err.message : String(err)}`,
        { cause: err },
      );
    }
  }
}
