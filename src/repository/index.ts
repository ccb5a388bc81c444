export {
  Repository,
  type CreateDatasetOptions,
  type DeriveDatasetOptions,
  type UpdateDatasetOptions,
  type DeleteOptions,
  type DatasetDeleteResult,
  type RepositoryOptions,
  type DatasetInfo,
} from './repository.js';
export { openRepository, openRepositoryWith, type OpenRepositoryOptions } from './open.js';
