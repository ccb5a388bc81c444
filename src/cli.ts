#!/usr/bin/env node

/**
 * Dataver CLI
 *
 * Local versioning and lineage for tabular datasets.
 *
 * Usage:
 *   dataver init                        Create a repository
 *   dataver add <name> <file>           Record a dataset version
 *   dataver derive <source> <file>      Record a version derived from another
 *   dataver list                        List versions
 *   dataver show <ref>                  Show one version
 *   dataver lineage <ref>               Parents, ancestors and descendants
 */

import { Command } from 'commander';
import { createRequire } from 'node:module';
import {
  initCommand,
  addCommand,
  deriveCommand,
  updateCommand,
  rmCommand,
  tagCommand,
  untagCommand,
  tagLogCommand,
  showCommand,
  listCommand,
  lineageCommand,
  renameCommand,
  describeCommand,
} from './commands/index.js';
import { collect } from './commands/shared.js';
import { handleError } from './cli/output.js';

// Get version from package.json
const require = createRequire(import.meta.url);
const { version } = require('../package.json');

/**
 * Route command failures through handleError so every command exits the
 * same way.
 */
function run<A extends unknown[]>(fn: (...args: A) => Promise<void>): (...args: A) => Promise<void> {
  return async (...args: A) => {
    try {
      await fn(...args);
    } catch (err) {
      handleError(err);
    }
  };
}

const REPO_OPTION = ['-r, --repo <path>', 'Repository directory (default: $DATAVER_REPO or ./.dataver)'] as const;

const program = new Command();

program
  .name('dataver')
  .description('Local versioning and lineage for tabular datasets')
  .version(version);

// ─── dataver init ────────────────────────────────────────────

program
  .command('init')
  .description('Create a repository')
  .option(...REPO_OPTION)
  .option('--tag-policy <policy>', 'What tagging an already-used label does: overwrite | reject')
  .option('--sample-size <n>', 'Rows taken from each end of a table for fingerprinting')
  .option('--author <name>', 'Default author for new versions')
  .action(run(initCommand));

// ─── dataver add ─────────────────────────────────────────────

program
  .command('add <name> <file>')
  .description('Record a dataset version from a JSON array of rows')
  .option(...REPO_OPTION)
  .option('-t, --tag <label>', 'Tag the new version')
  .option('-p, --parent <ref>', 'Parent version (repeatable)', collect)
  .option('-d, --description <text>', 'Description')
  .option('-a, --author <name>', 'Author')
  .option('--json', 'Output as JSON')
  .action(run(addCommand));

// ─── dataver derive ──────────────────────────────────────────

program
  .command('derive <source> <file>')
  .description('Record a version whose parent is <source>')
  .option(...REPO_OPTION)
  .option('-n, --name <name>', 'Name for the new version (default: the source name)')
  .option('-t, --tag <label>', 'Tag the new version')
  .option('-d, --description <text>', 'Description')
  .option('-a, --author <name>', 'Author')
  .option('--json', 'Output as JSON')
  .action(run(deriveCommand));

// ─── dataver update ──────────────────────────────────────────

program
  .command('update <ref> <file>')
  .description("Replace a version's data in place")
  .option(...REPO_OPTION)
  .option('-d, --description <text>', 'New description')
  .option('-p, --parent <ref>', 'Replacement parent (repeatable)', collect)
  .option('--json', 'Output as JSON')
  .action(run(updateCommand));

// ─── dataver rm ──────────────────────────────────────────────

program
  .command('rm <ref>')
  .description('Delete a version')
  .option(...REPO_OPTION)
  .option('-f, --force', 'Delete even if other versions derive from it')
  .action(run(rmCommand));

// ─── dataver tag / untag / tag-log ───────────────────────────

program
  .command('tag <ref> <label>')
  .description('Point <name>:<label> at a version')
  .option(...REPO_OPTION)
  .action(run(tagCommand));

program
  .command('untag <name:label>')
  .description('Remove a tag')
  .option(...REPO_OPTION)
  .action(run(untagCommand));

program
  .command('tag-log')
  .description('Show the history of tag changes')
  .option(...REPO_OPTION)
  .option('-n, --name <name>', 'Only tags on this dataset name')
  .option('-l, --label <label>', 'Only this tag label')
  .option('--json', 'Output as JSON')
  .action(run(tagLogCommand));

// ─── dataver show / list / lineage ───────────────────────────

program
  .command('show <ref>')
  .description('Show one version')
  .option(...REPO_OPTION)
  .option('--json', 'Output as JSON')
  .action(run(showCommand));

program
  .command('list')
  .alias('ls')
  .description('List versions, oldest first')
  .option(...REPO_OPTION)
  .option('-n, --name <text>', 'Only names containing <text>')
  .option('-t, --tag <label>', 'Only versions carrying this tag label')
  .option('--limit <n>', 'Maximum number of versions')
  .option('--json', 'Output as JSON')
  .action(run(listCommand));

program
  .command('lineage <ref>')
  .description('Show parents, ancestors, children and descendants')
  .option(...REPO_OPTION)
  .option('--json', 'Output as JSON')
  .action(run(lineageCommand));

// ─── dataver rename / describe ───────────────────────────────

program
  .command('rename <ref> <new-name>')
  .description('Rename a version; its tags move with it')
  .option(...REPO_OPTION)
  .action(run(renameCommand));

program
  .command('describe <ref> [text]')
  .description('Set or clear the description of a version')
  .option(...REPO_OPTION)
  .option('--clear', 'Remove the description')
  .action(run(describeCommand));

program.parseAsync().catch(handleError);
