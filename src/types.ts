/**
 * Dataver — Core Type Definitions
 */

import type { DatasetStats, ShapeDescriptor } from './schema.js';

export type {
  ColumnType,
  ColumnDescriptor,
  ShapeDescriptor,
  ColumnStats,
  DatasetStats,
  DatasetVersion,
  Tag,
  TagAction,
  TagHistoryEntry,
  TagPolicy,
  DataverConfig,
  MetadataState,
} from './schema.js';

// ─── Tabular data ────────────────────────────────────────────

export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue };

/** A single row, keyed by column name */
export type Row = Record<string, JsonValue>;

/** 64-character lowercase SHA-256 hex digest */
export type Fingerprint = string;

/**
 * Bounded, deterministically selected rows used for fingerprinting.
 * `head` holds the first rows, `tail` the last rows, each in table order.
 */
export interface Sample {
  head: Row[];
  tail: Row[];
}

/** What a data engine reports about a stored table */
export interface DatasetProfile {
  shape: ShapeDescriptor;
  sample: Sample;
  /** Optional summary statistics; stored on the version, never hashed */
  stats?: DatasetStats;
}

// ─── Data engine collaborator ────────────────────────────────

export interface SampleOptions {
  /** Rows to take from each end */
  sampleSize: number;
}

/**
 * The external engine that owns row data. The core never reads rows
 * itself; it only stores the pointer and fingerprints the profile.
 */
export interface DataEngine<TData> {
  /** Persist data and return an opaque pointer to it */
  store(data: TData): Promise<string>;
  /** Report shape and a bounded sample for a stored table */
  profile(pointer: string, options: SampleOptions): Promise<DatasetProfile>;
  /** Free storage once no version references the pointer */
  release?(pointer: string): Promise<void>;
}

// ─── Queries ─────────────────────────────────────────────────

export interface ListFilter {
  /** Substring match on dataset name */
  name?: string;
  /** Exact match on tag label */
  tag?: string;
  limit?: number;
}

export interface TagHistoryFilter {
  name?: string;
  label?: string;
  datasetId?: string;
}
