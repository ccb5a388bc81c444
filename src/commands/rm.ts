/**
 * dataver rm — Delete a dataset version
 */

import { success, warning } from '../cli/output.js';
import { openInitialized, type RepoOptions } from './shared.js';

interface RmOptions extends RepoOptions {
  force?: boolean;
}

export async function rmCommand(ref: string, options: RmOptions): Promise<void> {
  const repository = await openInitialized(options);
  const result = await repository.delete(ref, { force: options.force });

  success(`Deleted ${result.deleted.name} (${result.deleted.id})`);
  if (result.removedTags.length > 0) {
    warning(`Removed tags: ${result.removedTags.map((t) => `${t.name}:${t.label}`).join(', ')}`);
  }
  for (const childId of result.orphanedChildIds) {
    warning(`Child ${childId} now has a missing parent`);
  }
  if (result.releaseError) {
    warning(`Stored data was not freed: ${result.releaseError.message}`);
  }
}
