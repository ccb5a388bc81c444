/**
 * Store Transaction
 *
 * In-memory mutations over one freshly read copy of metadata.json. A
 * transaction is only ever handed out by MetadataStore.transaction(), which
 * holds the repository lock and persists the state once the callback
 * returns; if the callback throws, none of these changes reach disk.
 */

import { randomUUID } from 'node:crypto';
import {
  DuplicateTagError,
  HasChildrenError,
  NotFoundError,
  ValidationError,
} from '../errors.js';
import { descendantIds } from '../lineage/traverse.js';
import type {
  DatasetStats,
  DatasetVersion,
  MetadataState,
  ShapeDescriptor,
  Tag,
  TagPolicy,
} from '../schema.js';
import {
  validateDatasetName,
  validateDescription,
  validateTagLabel,
} from '../validation/index.js';
import { MetadataSnapshot } from './snapshot.js';

export interface CreateVersionInput {
  name: string;
  fingerprint: string;
  dataPointer: string;
  shape: ShapeDescriptor;
  stats?: DatasetStats;
  parentIds?: string[];
  description?: string | null;
  author: string;
}

export interface UpdateVersionInput {
  fingerprint: string;
  dataPointer: string;
  shape: ShapeDescriptor;
  /** Replaces the current stats; omit to clear them */
  stats?: DatasetStats;
  /** Omit to keep the current description */
  description?: string | null;
  /** Omit to keep the current parents */
  parentIds?: string[];
}

export interface DeleteResult {
  deleted: DatasetVersion;
  /** Children left holding a dangling parent entry (forced deletes only) */
  orphanedChildIds: string[];
  removedTags: Tag[];
}

/** Remove duplicates, keeping the first occurrence. */
function orderedSet(ids: readonly string[]): string[] {
  return [...new Set(ids)];
}

export class StoreTransaction {
  private changed = false;
  private readonly commitHooks: Array<() => Promise<void>> = [];
  private readonly rollbackHooks: Array<() => Promise<void>> = [];

  constructor(
    private readonly state: MetadataState,
    private readonly tagPolicy: TagPolicy,
    private readonly now: () => Date,
  ) {}

  /** Whether anything needs writing */
  get dirty(): boolean {
    return this.changed;
  }

  /** Hooks queued by onCommit, in order */
  get afterCommit(): ReadonlyArray<() => Promise<void>> {
    return this.commitHooks;
  }

  /** Hooks queued by onRollback, in order */
  get afterRollback(): ReadonlyArray<() => Promise<void>> {
    return this.rollbackHooks;
  }

  /**
   * View of the state as modified so far in this transaction.
   */
  snapshot(): MetadataSnapshot {
    return new MetadataSnapshot(structuredClone(this.state));
  }

  /**
   * Run `hook` after the state has been written, still under the lock.
   */
  onCommit(hook: () => Promise<void>): void {
    this.commitHooks.push(hook);
  }

  /**
   * Run `hook` if the transaction fails, before the lock is released.
   * A throwing hook replaces the original error, so hooks should not throw.
   */
  onRollback(hook: () => Promise<void>): void {
    this.rollbackHooks.push(hook);
  }

  create(input: CreateVersionInput): DatasetVersion {
    validateDatasetName(input.name);
    validateDescription(input.description);

    const parentIds = orderedSet(input.parentIds ?? []);
    for (const parentId of parentIds) {
      if (!this.find(parentId)) {
        throw new NotFoundError(`Parent dataset with ID '${parentId}' not found`);
      }
    }

    let id = randomUUID();
    while (this.find(id)) {
      id = randomUUID();
    }

    const timestamp = this.timestamp();
    const version: DatasetVersion = {
      id,
      name: input.name,
      fingerprint: input.fingerprint,
      description: input.description ?? null,
      author: input.author,
      createdAt: timestamp,
      updatedAt: timestamp,
      parentIds,
      dataPointer: input.dataPointer,
      shape: input.shape,
    };
    if (input.stats !== undefined) {
      version.stats = input.stats;
    }
    this.state.datasets.push(version);
    this.changed = true;
    return { ...version };
  }

  /**
   * Replace a version's data identity in place. id, name and tags never
   * change; parents change only when `parentIds` is given.
   */
  update(id: string, input: UpdateVersionInput): DatasetVersion {
    validateDescription(input.description);
    const version = this.require(id);

    if (input.parentIds !== undefined) {
      version.parentIds = this.checkReplacementParents(id, input.parentIds);
    }

    version.fingerprint = input.fingerprint;
    version.dataPointer = input.dataPointer;
    version.shape = input.shape;
    if (input.stats !== undefined) {
      version.stats = input.stats;
    } else {
      delete version.stats;
    }
    if (input.description !== undefined) {
      version.description = input.description;
    }
    version.updatedAt = this.timestamp();
    this.changed = true;
    return { ...version };
  }

  setDescription(id: string, description: string | null): DatasetVersion {
    validateDescription(description);
    const version = this.require(id);
    version.description = description;
    version.updatedAt = this.timestamp();
    this.changed = true;
    return { ...version };
  }

  /**
   * Rename a version. Its tags move from (old, label) to (new, label),
   * subject to the tag policy if the new key is already taken.
   */
  rename(id: string, newName: string): DatasetVersion {
    validateDatasetName(newName);
    const version = this.require(id);
    const oldName = version.name;
    if (oldName === newName) return { ...version };

    const at = this.timestamp();
    const moving = this.state.tags.filter((t) => t.datasetId === id && t.name === oldName);

    for (const tag of moving) {
      const displaced = this.state.tags.find(
        (t) => t.name === newName && t.label === tag.label && t.datasetId !== id,
      );
      if (displaced && this.tagPolicy === 'reject') {
        throw new DuplicateTagError(newName, tag.label, displaced.datasetId);
      }
      this.state.tags = this.state.tags.filter((t) => t !== displaced);
      tag.name = newName;
      this.state.tagHistory.push({
        name: newName,
        label: tag.label,
        action: 'move',
        datasetId: id,
        previousDatasetId: displaced?.datasetId ?? null,
        previousAssignedAt: displaced?.assignedAt ?? null,
        at,
      });
    }

    version.name = newName;
    version.updatedAt = at;
    this.changed = true;
    return { ...version };
  }

  /**
   * Delete a version. Without `force`, fails with HasChildrenError while
   * any version lists it as a parent. With `force`, children keep the
   * now-dangling parent entry. Tags pointing at it are always removed.
   */
  delete(id: string, force = false): DeleteResult {
    const version = this.require(id);
    const childIds = this.state.datasets
      .filter((d) => d.parentIds.includes(id))
      .map((d) => d.id);
    if (childIds.length > 0 && !force) {
      throw new HasChildrenError(id, childIds);
    }

    const at = this.timestamp();
    const removedTags = this.state.tags.filter((t) => t.datasetId === id);
    for (const tag of removedTags) {
      this.state.tagHistory.push({
        name: tag.name,
        label: tag.label,
        action: 'purge',
        datasetId: null,
        previousDatasetId: id,
        previousAssignedAt: tag.assignedAt,
        at,
      });
    }

    this.state.tags = this.state.tags.filter((t) => t.datasetId !== id);
    this.state.datasets = this.state.datasets.filter((d) => d.id !== id);
    this.changed = true;

    return { deleted: version, orphanedChildIds: childIds, removedTags };
  }

  /**
   * Point (version name, label) at `id`. Re-tagging the same version is a
   * no-op. If the tag points elsewhere, the tag policy decides between
   * overwriting (logged as a reassignment) and DuplicateTagError.
   */
  addTag(id: string, label: string): Tag {
    validateTagLabel(label);
    const version = this.require(id);
    const existing = this.checkTagAssignable(version.name, label, id);

    if (existing?.datasetId === id) {
      return { ...existing };
    }

    const at = this.timestamp();
    const tag: Tag = { name: version.name, label, datasetId: id, assignedAt: at };
    this.state.tags = this.state.tags.filter((t) => t !== existing);
    this.state.tags.push(tag);
    this.state.tagHistory.push({
      name: version.name,
      label,
      action: existing ? 'reassign' : 'assign',
      datasetId: id,
      previousDatasetId: existing?.datasetId ?? null,
      previousAssignedAt: existing?.assignedAt ?? null,
      at,
    });
    this.changed = true;
    return { ...tag };
  }

  removeTag(name: string, label: string): Tag {
    const existing = this.state.tags.find((t) => t.name === name && t.label === label);
    if (!existing) {
      throw new NotFoundError(`Tag '${label}' not found for dataset '${name}'`);
    }

    this.state.tags = this.state.tags.filter((t) => t !== existing);
    this.state.tagHistory.push({
      name,
      label,
      action: 'remove',
      datasetId: null,
      previousDatasetId: existing.datasetId,
      previousAssignedAt: existing.assignedAt,
      at: this.timestamp(),
    });
    this.changed = true;
    return existing;
  }

  /**
   * Throw DuplicateTagError if the tag policy would refuse pointing
   * (name, label) at `id`. Leave `id` out for a version not yet created.
   * Returns the tag currently holding the key, if any.
   */
  checkTagAssignable(name: string, label: string, id?: string): Tag | undefined {
    const existing = this.state.tags.find((t) => t.name === name && t.label === label);
    if (existing && existing.datasetId !== id && this.tagPolicy === 'reject') {
      throw new DuplicateTagError(name, label, existing.datasetId);
    }
    return existing;
  }

  /**
   * The ordered, de-duplicated parent list `update` would store for `id`.
   * Throws if any of them is missing, `id` itself or one of its descendants.
   */
  checkReplacementParents(id: string, requested: readonly string[]): string[] {
    const parentIds = orderedSet(requested);
    const below = descendantIds(this.snapshot(), id);

    for (const parentId of parentIds) {
      if (parentId === id) {
        throw new ValidationError(`Dataset ${id} cannot be its own parent`);
      }
      if (!this.find(parentId)) {
        throw new NotFoundError(`Parent dataset with ID '${parentId}' not found`);
      }
      if (below.has(parentId)) {
        throw new ValidationError(
          `Dataset ${parentId} descends from ${id}; using it as a parent would create a cycle`,
        );
      }
    }
    return parentIds;
  }

  private find(id: string): DatasetVersion | undefined {
    return this.state.datasets.find((d) => d.id === id);
  }

  private require(id: string): DatasetVersion {
    const version = this.find(id);
    if (!version) {
      throw new NotFoundError(`Dataset with ID '${id}' not found`);
    }
    return version;
  }

  private timestamp(): string {
    return this.now().toISOString();
  }
}
