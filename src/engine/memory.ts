/**
 * In-memory data engine. Tables live in a Map keyed by content hash;
 * useful for embedding dataver in a process that already holds its data,
 * and for tests.
 */

import { profileRows } from '../fingerprint/index.js';
import type { DataEngine, DatasetProfile, Row, SampleOptions } from '../types.js';
import { contentHash } from './rows.js';

const POINTER_PREFIX = 'memory://';

export class InMemoryTableEngine implements DataEngine<Row[]> {
  private tables: Map<string, Row[]> = new Map();

  async store(rows: Row[]): Promise<string> {
    const pointer = `${POINTER_PREFIX}${contentHash(rows)}`;
    if (!this.tables.has(pointer)) {
      this.tables.set(pointer, structuredClone(rows));
    }
    return pointer;
  }

  async profile(pointer: string, options: SampleOptions): Promise<DatasetProfile> {
    return profileRows(this.require(pointer), options.sampleSize);
  }

  async release(pointer: string): Promise<void> {
    this.tables.delete(pointer);
  }

  async load(pointer: string): Promise<Row[]> {
    return structuredClone(this.require(pointer));
  }

  has(pointer: string): boolean {
    return this.tables.has(pointer);
  }

  /** Number of stored tables */
  count(): number {
    return this.tables.size;
  }

  private require(pointer: string): Row[] {
    const rows = this.tables.get(pointer);
    if (!rows) {
      throw new Error(`No table stored at ${pointer}`);
    }
    return rows;
  }
}
