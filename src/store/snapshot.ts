/**
 * Read-only view over one consistent copy of metadata.json.
 *
 * The resolver and the lineage graph work against a snapshot so that a
 * multi-step query never mixes records from two different writes.
 */

import type { DatasetVersion, MetadataState, Tag, TagHistoryEntry } from '../schema.js';
import type { ListFilter, TagHistoryFilter } from '../types.js';

export class MetadataSnapshot {
  private readonly byId: Map<string, DatasetVersion>;
  private readonly order: Map<string, number>;

  constructor(private readonly state: MetadataState) {
    this.byId = new Map(state.datasets.map((d) => [d.id, d]));
    this.order = new Map(state.datasets.map((d, i) => [d.id, i]));
  }

  get(id: string): DatasetVersion | null {
    return this.byId.get(id) ?? null;
  }

  has(id: string): boolean {
    return this.byId.has(id);
  }

  /** All versions in creation order */
  all(): DatasetVersion[] {
    return this.sortByCreation([...this.state.datasets]);
  }

  versionsNamed(name: string): DatasetVersion[] {
    return this.all().filter((d) => d.name === name);
  }

  findTag(name: string, label: string): Tag | null {
    return this.state.tags.find((t) => t.name === name && t.label === label) ?? null;
  }

  tags(): Tag[] {
    return [...this.state.tags];
  }

  /** Tags pointing at a version, oldest assignment first */
  tagsFor(id: string): Tag[] {
    return this.state.tags
      .filter((t) => t.datasetId === id)
      .sort((a, b) => a.assignedAt.localeCompare(b.assignedAt));
  }

  /** Ids of versions listing `id` as a parent, in creation order */
  childIdsOf(id: string): string[] {
    return this.all()
      .filter((d) => d.parentIds.includes(id))
      .map((d) => d.id);
  }

  /**
   * Filter versions: substring on name, exact tag label, AND-combined.
   * Ordered by createdAt ascending, insertion order breaking ties.
   */
  list(filter: ListFilter = {}): DatasetVersion[] {
    let results = this.all();

    if (filter.name) {
      const needle = filter.name;
      results = results.filter((d) => d.name.includes(needle));
    }

    if (filter.tag) {
      const label = filter.tag;
      const tagged = new Set(
        this.state.tags.filter((t) => t.label === label).map((t) => t.datasetId),
      );
      results = results.filter((d) => tagged.has(d.id));
    }

    if (filter.limit !== undefined && filter.limit > 0) {
      results = results.slice(0, filter.limit);
    }

    return results;
  }

  tagHistory(filter: TagHistoryFilter = {}): TagHistoryEntry[] {
    return this.state.tagHistory.filter(
      (e) =>
        (filter.name === undefined || e.name === filter.name) &&
        (filter.label === undefined || e.label === filter.label) &&
        (filter.datasetId === undefined ||
          e.datasetId === filter.datasetId ||
          e.previousDatasetId === filter.datasetId),
    );
  }

  private sortByCreation(versions: DatasetVersion[]): DatasetVersion[] {
    return versions.sort((a, b) => {
      const byTime = a.createdAt.localeCompare(b.createdAt);
      if (byTime !== 0) return byTime;
      return (this.order.get(a.id) ?? 0) - (this.order.get(b.id) ?? 0);
    });
  }
}
