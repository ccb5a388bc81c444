/**
 * dataver lineage — Parents, ancestors and descendants of a version
 */

import chalk from 'chalk';
import type { DanglingAncestorError } from '../errors.js';
import { LineageGraph } from '../lineage/index.js';
import { resolveReference } from '../resolver/index.js';
import { formatVersionLine, printJson, reportDangling } from '../cli/output.js';
import { openInitialized, type RepoOptions } from './shared.js';

interface LineageOptions extends RepoOptions {
  json?: boolean;
}

function danglingJson(dangling: readonly DanglingAncestorError[]) {
  return dangling.map((d) => ({ ancestorId: d.ancestorId, referencedBy: d.referencedBy }));
}

export async function lineageCommand(ref: string, options: LineageOptions): Promise<void> {
  const repository = await openInitialized(options);
  // One snapshot for all four queries
  const snapshot = await repository.store.snapshot();
  const id = resolveReference(snapshot, ref);
  const graph = new LineageGraph(snapshot);
  const parents = graph.parentsOf(id);
  const ancestors = graph.ancestors(id);
  const children = graph.childrenOf(id);
  const descendants = graph.descendants(id);

  if (options.json) {
    printJson({
      id,
      parents: parents.versions.map((v) => v.id),
      ancestors: ancestors.versions.map((v) => v.id),
      children: children.map((v) => v.id),
      descendants: descendants.map((v) => v.id),
      dangling: danglingJson(ancestors.dangling),
    });
    return;
  }

  const tags = snapshot.tags();
  const section = (title: string, versions: typeof children) => {
    console.log(chalk.bold(title));
    if (versions.length === 0) {
      console.log(chalk.dim('  (none)'));
    }
    for (const version of versions) {
      console.log('  ' + formatVersionLine(version, tags));
    }
  };

  section('Parents', parents.versions);
  section('Ancestors', ancestors.versions);
  section('Children', children);
  section('Descendants', descendants);
  reportDangling(ancestors.dangling);
}
