/**
 * Breadth-first lineage walks over a metadata snapshot.
 *
 * Parents are expanded in `parentIds` order and children in creation order,
 * so listings are reproducible. The visited set guarantees termination even
 * if a hand-edited metadata file contains a cycle.
 */

import { DanglingAncestorError } from '../errors.js';
import type { DatasetVersion } from '../schema.js';
import type { MetadataSnapshot } from '../store/snapshot.js';

export interface LineageResult {
  /** Versions that resolved, in traversal order */
  versions: DatasetVersion[];
  /** One entry per (missing parent, referencing child) pair */
  dangling: DanglingAncestorError[];
}

export function walkAncestors(snapshot: MetadataSnapshot, startId: string): LineageResult {
  const versions: DatasetVersion[] = [];
  const dangling: DanglingAncestorError[] = [];
  const visited = new Set<string>([startId]);
  const reported = new Set<string>();
  const queue: string[] = [startId];

  while (queue.length > 0) {
    const currentId = queue.shift();
    if (currentId === undefined) break;
    const current = snapshot.get(currentId);
    if (!current) continue;

    for (const parentId of current.parentIds) {
      const parent = snapshot.get(parentId);
      if (!parent) {
        const edge = `${parentId}->${currentId}`;
        if (!reported.has(edge)) {
          reported.add(edge);
          dangling.push(new DanglingAncestorError(parentId, currentId));
        }
        continue;
      }
      if (visited.has(parentId)) continue;
      visited.add(parentId);
      versions.push(parent);
      queue.push(parentId);
    }
  }

  return { versions, dangling };
}

/**
 * Map of parent id → child versions, children in creation order.
 * Includes entries for parent ids that no longer exist.
 */
export function buildChildIndex(snapshot: MetadataSnapshot): Map<string, DatasetVersion[]> {
  const index = new Map<string, DatasetVersion[]>();
  for (const version of snapshot.all()) {
    for (const parentId of version.parentIds) {
      const children = index.get(parentId);
      if (children) {
        children.push(version);
      } else {
        index.set(parentId, [version]);
      }
    }
  }
  return index;
}

export function walkDescendants(snapshot: MetadataSnapshot, startId: string): DatasetVersion[] {
  const childIndex = buildChildIndex(snapshot);
  const result: DatasetVersion[] = [];
  const visited = new Set<string>([startId]);
  const queue: string[] = [startId];

  while (queue.length > 0) {
    const currentId = queue.shift();
    if (currentId === undefined) break;

    for (const child of childIndex.get(currentId) ?? []) {
      if (visited.has(child.id)) continue;
      visited.add(child.id);
      result.push(child);
      queue.push(child.id);
    }
  }

  return result;
}

export function descendantIds(snapshot: MetadataSnapshot, startId: string): Set<string> {
  return new Set(walkDescendants(snapshot, startId).map((d) => d.id));
}
