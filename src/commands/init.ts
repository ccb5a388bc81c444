/**
 * dataver init — Create a repository
 */

import chalk from 'chalk';
import { isInitialized, resolveRepoRoot } from '../config.js';
import { TagPolicySchema, type DataverConfig } from '../schema.js';
import { openRepository } from '../repository/index.js';
import { createSpinner, warning } from '../cli/output.js';
import { parsePositiveInt, type RepoOptions } from './shared.js';
import { ValidationError } from '../errors.js';

interface InitOptions extends RepoOptions {
  tagPolicy?: string;
  sampleSize?: string;
  author?: string;
}

export async function initCommand(options: InitOptions): Promise<void> {
  const root = resolveRepoRoot(options.repo);
  console.log();

  if (isInitialized(root)) {
    warning(`Repository already initialized at ${root}`);
    return;
  }

  const settings: Partial<DataverConfig> = {};
  if (options.tagPolicy !== undefined) {
    const policy = TagPolicySchema.safeParse(options.tagPolicy);
    if (!policy.success) {
      throw new ValidationError(`--tag-policy must be one of: ${TagPolicySchema.options.join(', ')}`);
    }
    settings.tagPolicy = policy.data;
  }
  const sampleSize = parsePositiveInt(options.sampleSize, '--sample-size');
  if (sampleSize !== undefined) settings.sampleSize = sampleSize;
  if (options.author) settings.author = options.author;

  const spinner = createSpinner('Initializing repository...');
  try {
    const repository = await openRepository(root, { init: settings });
    spinner.succeed(`Created ${repository.root}`);
  } catch (err) {
    spinner.fail('Failed to initialize repository');
    throw err;
  }

  console.log();
  console.log(chalk.dim('  Next steps:'));
  console.log(chalk.dim(`  ${chalk.white('dataver add <name> <file>')}   Record a first dataset version`));
  console.log(chalk.dim(`  ${chalk.white('dataver list')}                Show recorded versions`));
  console.log();
}
