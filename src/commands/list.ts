/**
 * dataver list — List dataset versions
 */

import chalk from 'chalk';
import { formatVersionLine, printJson } from '../cli/output.js';
import { openInitialized, parsePositiveInt, type RepoOptions } from './shared.js';

interface ListOptions extends RepoOptions {
  name?: string;
  tag?: string;
  limit?: string;
  json?: boolean;
}

export async function listCommand(options: ListOptions): Promise<void> {
  const repository = await openInitialized(options);
  const versions = await repository.listDatasets({
    name: options.name,
    tag: options.tag,
    limit: parsePositiveInt(options.limit, '--limit'),
  });

  if (options.json) {
    printJson(versions);
    return;
  }

  if (versions.length === 0) {
    console.log(chalk.dim('No dataset versions yet. Record one with:'));
    console.log();
    console.log(`    ${chalk.cyan('dataver add <name> <file.json>')}`);
    console.log();
    return;
  }

  const tags = await repository.tags();
  for (const version of versions) {
    console.log(formatVersionLine(version, tags));
  }
  console.log(chalk.dim(`\n${versions.length} version(s)`));
}
