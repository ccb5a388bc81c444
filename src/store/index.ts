/**
 * Metadata storage
 */

export { MetadataStore, type MetadataStoreOptions } from './metadata-store.js';
export {
  StoreTransaction,
  type CreateVersionInput,
  type UpdateVersionInput,
  type DeleteResult,
} from './transaction.js';
export { MetadataSnapshot } from './snapshot.js';
export { FileLock, type FileLockOptions } from './lock.js';
