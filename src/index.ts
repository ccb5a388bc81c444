/**
 * Dataver — local versioning and lineage for tabular datasets
 *
 * Public API for programmatic usage.
 */

// Core types
export type {
  JsonValue,
  Row,
  Fingerprint,
  Sample,
  DatasetProfile,
  SampleOptions,
  DataEngine,
  ListFilter,
  TagHistoryFilter,
  ColumnType,
  ColumnDescriptor,
  ShapeDescriptor,
  DatasetVersion,
  Tag,
  TagAction,
  TagHistoryEntry,
  TagPolicy,
  DataverConfig,
  MetadataState,
} from './types.js';

// Schemas
export {
  METADATA_SCHEMA_VERSION,
  DatasetVersionSchema,
  ShapeDescriptorSchema,
  TagSchema,
  TagHistoryEntrySchema,
  MetadataStateSchema,
  DataverConfigSchema,
  emptyMetadataState,
} from './schema.js';

// Errors
export {
  DataverError,
  NotFoundError,
  AmbiguousReferenceError,
  InvalidReferenceError,
  HasChildrenError,
  DanglingAncestorError,
  DuplicateTagError,
  ValidationError,
  LockTimeoutError,
  CorruptStateError,
  DataEngineError,
  isDataverError,
  type DataverErrorCode,
} from './errors.js';

// Config
export {
  DATAVER_DIR,
  defaultConfig,
  resolveRepoRoot,
  isInitialized,
  loadConfig,
  saveConfig,
  initializeRepository,
  defaultAuthor,
} from './config.js';

// Fingerprint Engine
export {
  fingerprint,
  shortFingerprint,
  canonicalize,
  canonicalFingerprintInput,
  selectSample,
  profileRows,
  describeShape,
  describeStats,
  DEFAULT_SAMPLE_SIZE,
  SHORT_FINGERPRINT_LENGTH,
} from './fingerprint/index.js';

// Metadata Record Store
export {
  MetadataStore,
  MetadataSnapshot,
  StoreTransaction,
  FileLock,
  type MetadataStoreOptions,
  type CreateVersionInput,
  type UpdateVersionInput,
  type DeleteResult,
} from './store/index.js';

// Reference Resolver
export {
  parseReference,
  resolveReference,
  preferredRef,
  fullRef,
  type ParsedReference,
} from './resolver/index.js';

// Lineage Graph
export { LineageGraph, type LineageResult, type RootsResult } from './lineage/index.js';

// Repository
export {
  Repository,
  openRepository,
  openRepositoryWith,
  type OpenRepositoryOptions,
  type CreateDatasetOptions,
  type DeriveDatasetOptions,
  type UpdateDatasetOptions,
  type DeleteOptions,
  type DatasetDeleteResult,
  type RepositoryOptions,
  type DatasetInfo,
} from './repository/index.js';

// Data engines
export { InMemoryTableEngine, JsonTableEngine, readRowsFile } from './engine/index.js';

// Validation
export {
  validateDatasetName,
  validateTagLabel,
  validateDescription,
} from './validation/index.js';
