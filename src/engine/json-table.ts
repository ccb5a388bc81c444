/**
 * JSON Table Engine
 *
 * Stores each table as a JSON array of rows, content-addressed under
 * <root>/objects/<first 2 hex chars>/<remaining hex>.json. Identical tables
 * share one object. Pointers are relative to the repository root so a
 * repository directory can be moved.
 */

import { readFile, writeFile, mkdir, rename, rm, unlink } from 'node:fs/promises';
import { existsSync } from 'node:fs';
import { dirname, join, relative, resolve, sep } from 'node:path';
import { randomBytes } from 'node:crypto';
import { OBJECTS_DIR } from '../config.js';
import { profileRows } from '../fingerprint/index.js';
import type { DataEngine, DatasetProfile, Row, SampleOptions } from '../types.js';
import { contentHash, parseRows } from './rows.js';

/**
 * Relative object path for a content hash.
 * Example: "abc123…" -> objects/ab/c123….json
 */
export function objectPointer(hash: string): string {
  return [OBJECTS_DIR, hash.slice(0, 2), `${hash.slice(2)}.json`].join('/');
}

export class JsonTableEngine implements DataEngine<Row[]> {
  private readonly root: string;

  constructor(root: string) {
    this.root = resolve(root);
  }

  async store(rows: Row[]): Promise<string> {
    const pointer = objectPointer(contentHash(rows));
    const path = this.resolvePointer(pointer);
    if (existsSync(path)) {
      return pointer;
    }

    await mkdir(dirname(path), { recursive: true });
    const tempPath = `${path}.tmp.${randomBytes(4).toString('hex')}`;
    try {
      await writeFile(tempPath, JSON.stringify(rows), 'utf-8');
      await rename(tempPath, path);
    } catch (err) {
      await rm(tempPath, { force: true });
      throw err;
    }
    return pointer;
  }

  async profile(pointer: string, options: SampleOptions): Promise<DatasetProfile> {
    return profileRows(await this.load(pointer), options.sampleSize);
  }

  async release(pointer: string): Promise<void> {
    try {
      await unlink(this.resolvePointer(pointer));
    } catch (err) {
      // Already released by an earlier delete
      if (!(err instanceof Error && 'code' in err && err.code === 'ENOENT')) throw err;
    }
  }

  async load(pointer: string): Promise<Row[]> {
    const raw = await readFile(this.resolvePointer(pointer), 'utf-8');
    return parseRows(JSON.parse(raw), pointer);
  }

  /**
   * Map a pointer to an absolute path, refusing anything outside objects/.
   */
  resolvePointer(pointer: string): string {
    const objectsRoot = join(this.root, OBJECTS_DIR);
    const path = resolve(this.root, pointer);
    const rel = relative(objectsRoot, path);
    if (!rel || rel.startsWith('..') || rel.split(sep).includes('..')) {
      throw new Error(`Pointer ${pointer} is outside ${objectsRoot}`);
    }
    return path;
  }
}

/**
 * Read a JSON file holding an array of row objects.
 */
export async function readRowsFile(path: string): Promise<Row[]> {
  const raw = await readFile(path, 'utf-8');
  let data: unknown;
  try {
    data = JSON.parse(raw);
  } catch (err) {
    throw new Error(`${path} is not valid JSON: ${err instanceof Error ? err.message : String(err)}`);
  }
  return parseRows(data, path);
}
