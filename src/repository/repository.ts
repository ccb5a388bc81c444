/**
 * Dataset Repository
 *
 * The single write path over a dataver repository directory. Each write is
 * one store transaction: resolve references and run every check that can
 * refuse the write, then hand data to the engine, fingerprint its profile
 * and persist. Data stored for a write that then fails is released again
 * unless a committed version shares it. Reads resolve references against
 * one snapshot and answer lineage queries from the same snapshot.
 */

import { defaultAuthor } from '../config.js';
import { DataEngineError, NotFoundError } from '../errors.js';
import { fingerprint } from '../fingerprint/index.js';
import { LineageGraph, type LineageResult, type RootsResult } from '../lineage/index.js';
import { parseReference, preferredRef, resolveReference } from '../resolver/index.js';
import type { DataverConfig, DatasetVersion, Tag, TagHistoryEntry } from '../schema.js';
import {
  MetadataStore,
  type DeleteResult,
  type MetadataSnapshot,
  type StoreTransaction,
} from '../store/index.js';
import type { DataEngine, DatasetProfile, ListFilter, TagHistoryFilter } from '../types.js';
import {
  validateDatasetName,
  validateDescription,
  validateTagLabel,
} from '../validation/index.js';

export interface CreateDatasetOptions {
  /** Tag to assign in the same transaction */
  tag?: string;
  /** References to parent versions */
  parents?: string[];
  description?: string;
  author?: string;
}

export interface DeriveDatasetOptions {
  /** Defaults to the source's name */
  name?: string;
  tag?: string;
  description?: string;
  author?: string;
}

export interface UpdateDatasetOptions {
  /** Omit to keep the current description */
  description?: string | null;
  /** References replacing the current parents; omit to keep them */
  parents?: string[];
}

export interface DeleteOptions {
  force?: boolean;
}

export interface DatasetDeleteResult extends DeleteResult {
  /** Set when the delete committed but its data could not be freed */
  releaseError?: DataEngineError;
}

export interface RepositoryOptions {
  /**
   * Receives release failures that do not fail the write: freeing replaced
   * data after an update, or cleaning up after a write that failed.
   * Defaults to a process warning.
   */
  onReleaseError?: (err: DataEngineError) => void;
}

/** A version together with the tags pointing at it */
export interface DatasetInfo {
  version: DatasetVersion;
  tags: Tag[];
  ref: string;
}

interface Ingested {
  dataPointer: string;
  profile: DatasetProfile;
  fingerprint: string;
}

export class Repository<TData> {
  readonly root: string;
  readonly config: DataverConfig;
  readonly store: MetadataStore;
  private readonly engine: DataEngine<TData>;
  private readonly onReleaseError: (err: DataEngineError) => void;

  constructor(
    root: string,
    config: DataverConfig,
    store: MetadataStore,
    engine: DataEngine<TData>,
    options: RepositoryOptions = {},
  ) {
    this.root = root;
    this.config = config;
    this.store = store;
    this.engine = engine;
    this.onReleaseError = options.onReleaseError ?? ((err) => process.emitWarning(err));
  }

  // ─── Writes ────────────────────────────────────────────────

  async createDataset(
    name: string,
    data: TData,
    options: CreateDatasetOptions = {},
  ): Promise<DatasetVersion> {
    validateDatasetName(name);
    validateDescription(options.description);
    if (options.tag !== undefined) validateTagLabel(options.tag);

    return this.store.transaction(async (tx) => {
      const snapshot = tx.snapshot();
      const parentIds = (options.parents ?? []).map((ref) => resolveReference(snapshot, ref));
      if (options.tag !== undefined) {
        tx.checkTagAssignable(name, options.tag);
      }
      const ingested = await this.ingest(tx, data);

      const version = tx.create({
        name,
        fingerprint: ingested.fingerprint,
        dataPointer: ingested.dataPointer,
        shape: ingested.profile.shape,
        stats: ingested.profile.stats,
        parentIds,
        description: options.description ?? null,
        author: options.author ?? defaultAuthor(this.config),
      });

      if (options.tag !== undefined) {
        tx.addTag(version.id, options.tag);
      }
      return version;
    });
  }

  /**
   * Create a version whose single parent is `sourceRef`.
   */
  async deriveDataset(
    sourceRef: string,
    data: TData,
    options: DeriveDatasetOptions = {},
  ): Promise<DatasetVersion> {
    const source = await this.get(sourceRef);
    return this.createDataset(options.name ?? source.name, data, {
      parents: [source.id],
      tag: options.tag,
      description: options.description,
      author: options.author,
    });
  }

  /**
   * Replace a version's data. id, name, tags and parents are kept unless
   * `parents` is given; the old data pointer is released if nothing else
   * uses it.
   */
  async updateDataset(
    ref: string,
    data: TData,
    options: UpdateDatasetOptions = {},
  ): Promise<DatasetVersion> {
    validateDescription(options.description);

    return this.store.transaction(async (tx) => {
      const snapshot = tx.snapshot();
      const id = resolveReference(snapshot, ref);
      const previous = this.requireIn(snapshot, id);
      const parentIds =
        options.parents === undefined
          ? undefined
          : tx.checkReplacementParents(id, options.parents.map((p) => resolveReference(snapshot, p)));
      const ingested = await this.ingest(tx, data);

      const version = tx.update(id, {
        fingerprint: ingested.fingerprint,
        dataPointer: ingested.dataPointer,
        shape: ingested.profile.shape,
        stats: ingested.profile.stats,
        description: options.description,
        parentIds,
      });

      if (previous.dataPointer !== version.dataPointer) {
        this.releaseIfUnused(tx, previous.dataPointer);
      }
      return version;
    });
  }

  /**
   * Delete a version. A failure to free its data does not undo the delete;
   * it is returned as `releaseError`.
   */
  async delete(ref: string, options: DeleteOptions = {}): Promise<DatasetDeleteResult> {
    const failed: { releaseError?: DataEngineError } = {};
    const result = await this.store.transaction((tx) => {
      const id = resolveReference(tx.snapshot(), ref);
      const deleted = tx.delete(id, options.force ?? false);
      this.releaseIfUnused(tx, deleted.deleted.dataPointer, (err) => {
        failed.releaseError = err;
      });
      return deleted;
    });
    return failed.releaseError ? { ...result, releaseError: failed.releaseError } : result;
  }

  async tag(ref: string, label: string): Promise<Tag> {
    validateTagLabel(label);
    return this.store.transaction((tx) => {
      const id = resolveReference(tx.snapshot(), ref);
      return tx.addTag(id, label);
    });
  }

  async untag(name: string, label: string): Promise<Tag> {
    return this.store.transaction((tx) => tx.removeTag(name, label));
  }

  async rename(ref: string, newName: string): Promise<DatasetVersion> {
    validateDatasetName(newName);
    return this.store.transaction((tx) => {
      const id = resolveReference(tx.snapshot(), ref);
      return tx.rename(id, newName);
    });
  }

  async describe(ref: string, description: string | null): Promise<DatasetVersion> {
    validateDescription(description);
    return this.store.transaction((tx) => {
      const id = resolveReference(tx.snapshot(), ref);
      return tx.setDescription(id, description);
    });
  }

  // ─── Reads ─────────────────────────────────────────────────

  async resolve(ref: string): Promise<string> {
    return resolveReference(await this.store.snapshot(), ref);
  }

  async get(ref: string): Promise<DatasetVersion> {
    const snapshot = await this.store.snapshot();
    return this.requireIn(snapshot, resolveReference(snapshot, ref));
  }

  /**
   * Version plus its tags and preferred reference, read from one snapshot.
   */
  async info(ref: string): Promise<DatasetInfo> {
    const snapshot = await this.store.snapshot();
    const version = this.requireIn(snapshot, resolveReference(snapshot, ref));
    const tags = snapshot.tagsFor(version.id);
    return { version, tags, ref: preferredRef(version, tags) };
  }

  async listDatasets(filter?: ListFilter): Promise<DatasetVersion[]> {
    return this.store.list(filter);
  }

  async tags(): Promise<Tag[]> {
    return this.store.tags();
  }

  async tagHistory(filter?: TagHistoryFilter): Promise<TagHistoryEntry[]> {
    return this.store.tagHistory(filter);
  }

  async parentsOf(ref: string): Promise<LineageResult> {
    return this.withLineage(ref, (graph, id) => graph.parentsOf(id));
  }

  /**
   * A raw id is taken as-is, so the children of a force-deleted version
   * can still be found.
   */
  async childrenOf(ref: string): Promise<DatasetVersion[]> {
    const snapshot = await this.store.snapshot();
    const parsed = parseReference(ref);
    const id = parsed.kind === 'id' ? parsed.id : resolveReference(snapshot, ref);
    return new LineageGraph(snapshot).childrenOf(id);
  }

  async ancestors(ref: string): Promise<LineageResult> {
    return this.withLineage(ref, (graph, id) => graph.ancestors(id));
  }

  async descendants(ref: string): Promise<DatasetVersion[]> {
    return this.withLineage(ref, (graph, id) => graph.descendants(id));
  }

  async roots(ref: string): Promise<RootsResult> {
    return this.withLineage(ref, (graph, id) => graph.roots(id));
  }

  async parentByName(ref: string, parentName: string): Promise<DatasetVersion> {
    return this.withLineage(ref, (graph, id) => graph.parentByName(id, parentName));
  }

  // ─── Internals ─────────────────────────────────────────────

  private async withLineage<T>(ref: string, fn: (graph: LineageGraph, id: string) => T): Promise<T> {
    const snapshot = await this.store.snapshot();
    const id = resolveReference(snapshot, ref);
    return fn(new LineageGraph(snapshot), id);
  }

  /**
   * Store data through the engine and fingerprint what it reports. Must run
   * before `tx` is modified: the stored data is released if the
   * transaction fails and no committed version already uses it.
   */
  private async ingest(tx: StoreTransaction, data: TData): Promise<Ingested> {
    let dataPointer: string;
    try {
      dataPointer = await this.engine.store(data);
    } catch (err) {
      throw new DataEngineError('store', undefined, err);
    }
    this.releaseOnRollback(tx, dataPointer);

    let profile: DatasetProfile;
    try {
      profile = await this.engine.profile(dataPointer, { sampleSize: this.config.sampleSize });
    } catch (err) {
      throw new DataEngineError('profile', dataPointer, err);
    }

    return {
      dataPointer,
      profile,
      fingerprint: fingerprint(profile.shape, profile.sample),
    };
  }

  /**
   * Queue release of a data pointer once the transaction commits, if no
   * remaining version references it. The write has already committed when
   * this runs, so failures go to `onError` instead of being thrown.
   */
  private releaseIfUnused(
    tx: StoreTransaction,
    dataPointer: string,
    onError: (err: DataEngineError) => void = this.onReleaseError,
  ): void {
    if (!this.engine.release) return;
    if (this.isReferenced(tx.snapshot(), dataPointer)) return;

    tx.onCommit(async () => {
      const err = await this.release(dataPointer);
      if (err) onError(err);
    });
  }

  private releaseOnRollback(tx: StoreTransaction, dataPointer: string): void {
    if (!this.engine.release) return;
    if (this.isReferenced(tx.snapshot(), dataPointer)) return;

    tx.onRollback(async () => {
      const err = await this.release(dataPointer);
      if (err) this.onReleaseError(err);
    });
  }

  /** Free a pointer, returning the failure rather than throwing it */
  private async release(dataPointer: string): Promise<DataEngineError | undefined> {
    if (!this.engine.release) return undefined;
    try {
      await this.engine.release(dataPointer);
      return undefined;
    } catch (err) {
      return new DataEngineError('release', dataPointer, err);
    }
  }

  private isReferenced(snapshot: MetadataSnapshot, dataPointer: string): boolean {
    return snapshot.all().some((v) => v.dataPointer === dataPointer);
  }

  private requireIn(snapshot: MetadataSnapshot, id: string): DatasetVersion {
    const version = snapshot.get(id);
    if (!version) {
      throw new NotFoundError(`Dataset with ID '${id}' not found`);
    }
    return version;
  }
}
