/**
 * Persisted Schemas
 *
 * zod schemas for everything dataver writes to disk: version records,
 * the tag index, the tag history log and the repository config. Types are
 * inferred from the schemas so the on-disk shape and the in-memory shape
 * cannot drift apart.
 */

import { z } from 'zod';

/** Schema version of metadata.json */
export const METADATA_SCHEMA_VERSION = 1;

// ─── Shape ───────────────────────────────────────────────────

export const ColumnTypeSchema = z.enum([
  'string',
  'integer',
  'float',
  'boolean',
  'json',
  'null',
  'mixed',
]);

export type ColumnType = z.infer<typeof ColumnTypeSchema>;

export const ColumnDescriptorSchema = z.object({
  name: z.string(),
  type: ColumnTypeSchema,
});

export type ColumnDescriptor = z.infer<typeof ColumnDescriptorSchema>;

/** Ordered column list plus row and column counts. */
export const ShapeDescriptorSchema = z.object({
  columns: z.array(ColumnDescriptorSchema),
  rowCount: z.number().int().nonnegative(),
  columnCount: z.number().int().nonnegative(),
});

export type ShapeDescriptor = z.infer<typeof ShapeDescriptorSchema>;

// ─── Stats ───────────────────────────────────────────────────

export const ColumnStatsSchema = z.object({
  name: z.string(),
  nullCount: z.number().int().nonnegative(),
  /** 0-100; 0 for an empty table */
  nullPercentage: z.number().min(0).max(100),
  /** Distinct values, null included */
  uniqueCount: z.number().int().nonnegative(),
});

export type ColumnStats = z.infer<typeof ColumnStatsSchema>;

/** Summary statistics reported by the data engine; not fingerprinted */
export const DatasetStatsSchema = z.object({
  rowCount: z.number().int().nonnegative(),
  columnCount: z.number().int().nonnegative(),
  /** In column order */
  columns: z.array(ColumnStatsSchema),
});

export type DatasetStats = z.infer<typeof DatasetStatsSchema>;

// ─── Records ─────────────────────────────────────────────────

export const DatasetVersionSchema = z.object({
  /** UUID v4, assigned once */
  id: z.string().uuid(),
  /** Dataset family name */
  name: z.string(),
  /** SHA-256 hex digest of shape + sample */
  fingerprint: z.string().regex(/^[a-f0-9]{64}$/),
  description: z.string().nullable(),
  author: z.string(),
  createdAt: z.string(),
  updatedAt: z.string(),
  /** Ordered set of parent version ids */
  parentIds: z.array(z.string()),
  /** Opaque handle owned by the data engine */
  dataPointer: z.string(),
  shape: ShapeDescriptorSchema,
  /** Absent when the engine reports none */
  stats: DatasetStatsSchema.optional(),
});

export type DatasetVersion = z.infer<typeof DatasetVersionSchema>;

export const TagSchema = z.object({
  name: z.string(),
  label: z.string(),
  datasetId: z.string(),
  assignedAt: z.string(),
});

export type Tag = z.infer<typeof TagSchema>;

export const TagActionSchema = z.enum(['assign', 'reassign', 'remove', 'purge', 'move']);

export type TagAction = z.infer<typeof TagActionSchema>;

/**
 * One line of the append-only tag audit log.
 * `previous*` fields describe the pointer this action replaced or removed.
 */
export const TagHistoryEntrySchema = z.object({
  name: z.string(),
  label: z.string(),
  action: TagActionSchema,
  datasetId: z.string().nullable(),
  previousDatasetId: z.string().nullable(),
  previousAssignedAt: z.string().nullable(),
  at: z.string(),
});

export type TagHistoryEntry = z.infer<typeof TagHistoryEntrySchema>;

/** Full contents of metadata.json */
export const MetadataStateSchema = z.object({
  schemaVersion: z.literal(METADATA_SCHEMA_VERSION),
  /** Insertion-ordered */
  datasets: z.array(DatasetVersionSchema),
  tags: z.array(TagSchema),
  tagHistory: z.array(TagHistoryEntrySchema),
});

export type MetadataState = z.infer<typeof MetadataStateSchema>;

export function emptyMetadataState(): MetadataState {
  return {
    schemaVersion: METADATA_SCHEMA_VERSION,
    datasets: [],
    tags: [],
    tagHistory: [],
  };
}

// ─── Config ──────────────────────────────────────────────────

export const TagPolicySchema = z.enum(['overwrite', 'reject']);

export type TagPolicy = z.infer<typeof TagPolicySchema>;

export const DataverConfigSchema = z.object({
  version: z.string().default('0.1.0'),
  /** Rows taken from each end of a dataset for fingerprinting */
  sampleSize: z.number().int().positive().default(5),
  /** What addTag does when (name, label) already points elsewhere */
  tagPolicy: TagPolicySchema.default('overwrite'),
  lockTimeoutMs: z.number().int().positive().default(5000),
  /** Lock files older than this are treated as abandoned */
  staleLockMs: z.number().int().positive().default(30000),
  author: z.string().optional(),
});

export type DataverConfig = z.infer<typeof DataverConfigSchema>;
