/**
 * dataver show — Show one dataset version
 */

import chalk from 'chalk';
import { printJson } from '../cli/output.js';
import { openInitialized, type RepoOptions } from './shared.js';

interface ShowOptions extends RepoOptions {
  json?: boolean;
}

export async function showCommand(ref: string, options: ShowOptions): Promise<void> {
  const repository = await openInitialized(options);
  const { version, tags, ref: preferred } = await repository.info(ref);

  if (options.json) {
    printJson({ ...version, tags: tags.map((t) => t.label), ref: preferred });
    return;
  }

  console.log();
  console.log(chalk.bold(preferred));
  console.log(`  ${chalk.dim('id:')}          ${version.id}`);
  console.log(`  ${chalk.dim('fingerprint:')} ${version.fingerprint}`);
  console.log(`  ${chalk.dim('shape:')}       ${version.shape.rowCount} rows × ${version.shape.columnCount} columns`);
  console.log(`  ${chalk.dim('columns:')}     ${version.shape.columns.map((c) => `${c.name}:${c.type}`).join(', ')}`);
  console.log(`  ${chalk.dim('author:')}      ${version.author}`);
  console.log(`  ${chalk.dim('created:')}     ${version.createdAt}`);
  if (version.updatedAt !== version.createdAt) {
    console.log(`  ${chalk.dim('updated:')}     ${version.updatedAt}`);
  }
  if (tags.length > 0) {
    console.log(`  ${chalk.dim('tags:')}        ${tags.map((t) => t.label).join(', ')}`);
  }
  if (version.parentIds.length > 0) {
    console.log(`  ${chalk.dim('parents:')}     ${version.parentIds.join(', ')}`);
  }
  if (version.stats) {
    console.log(`  ${chalk.dim('stats:')}`);
    for (const column of version.stats.columns) {
      console.log(
        `    ${column.name}: ${column.nullCount} null (${column.nullPercentage.toFixed(1)}%), ${column.uniqueCount} unique`,
      );
    }
  }
  if (version.description) {
    console.log();
    console.log(`  ${version.description}`);
  }
  console.log();
}
