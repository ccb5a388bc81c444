/**
 * Lineage Graph
 *
 * Parent/child queries derived on demand from a metadata snapshot; nothing
 * here is persisted. A parent id whose record was force-deleted is reported
 * as a DanglingAncestorError alongside the parents that did resolve.
 */

import { DanglingAncestorError, NotFoundError } from '../errors.js';
import type { DatasetVersion } from '../schema.js';
import type { MetadataSnapshot } from '../store/snapshot.js';
import { buildChildIndex, walkAncestors, walkDescendants, type LineageResult } from './traverse.js';

export interface RootsResult {
  /** Parentless ancestors reached from the version */
  roots: DatasetVersion[];
  dangling: DanglingAncestorError[];
}

export class LineageGraph {
  constructor(private readonly snapshot: MetadataSnapshot) {}

  parentsOf(id: string): LineageResult {
    const version = this.require(id);
    const versions: DatasetVersion[] = [];
    const dangling: DanglingAncestorError[] = [];

    for (const parentId of version.parentIds) {
      const parent = this.snapshot.get(parentId);
      if (parent) {
        versions.push(parent);
      } else {
        dangling.push(new DanglingAncestorError(parentId, id));
      }
    }

    return { versions, dangling };
  }

  /**
   * Versions listing `id` as a parent. Works for ids that were
   * force-deleted too, since children keep the dangling entry.
   */
  childrenOf(id: string): DatasetVersion[] {
    return buildChildIndex(this.snapshot).get(id) ?? [];
  }

  ancestors(id: string): LineageResult {
    this.require(id);
    return walkAncestors(this.snapshot, id);
  }

  descendants(id: string): DatasetVersion[] {
    this.require(id);
    return walkDescendants(this.snapshot, id);
  }

  roots(id: string): RootsResult {
    const { versions, dangling } = this.ancestors(id);
    return {
      roots: versions.filter((v) => v.parentIds.length === 0),
      dangling,
    };
  }

  /**
   * First direct parent with the given name, in parentIds order.
   */
  parentByName(id: string, name: string): DatasetVersion {
    const match = this.parentsOf(id).versions.find((p) => p.name === name);
    if (!match) {
      throw new NotFoundError(`No parent with name '${name}' found for dataset ${id}`);
    }
    return match;
  }

  private require(id: string): DatasetVersion {
    const version = this.snapshot.get(id);
    if (!version) {
      throw new NotFoundError(`Dataset with ID '${id}' not found`);
    }
    return version;
  }
}
