/**
 * Row parsing and content hashing shared by the bundled data engines.
 */

import { createHash } from 'node:crypto';
import { z } from 'zod';
import { canonicalize } from '../fingerprint/index.js';
import type { JsonValue, Row } from '../types.js';

export const JsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number(),
    z.boolean(),
    z.null(),
    z.array(JsonValueSchema),
    z.record(z.string(), JsonValueSchema),
  ]),
);

export const RowsSchema = z.array(z.record(z.string(), JsonValueSchema));

/**
 * Validate untyped input (parsed JSON) as a list of rows.
 */
export function parseRows(data: unknown, source: string): Row[] {
  const parsed = RowsSchema.safeParse(data);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue && issue.path.length > 0 ? ` at [${issue.path.join('.')}]` : '';
    throw new Error(`${source} is not an array of row objects${where}: ${issue?.message ?? 'invalid'}`);
  }
  return parsed.data;
}

/**
 * Full-content SHA-256 of a table, used to content-address stored tables.
 * Unlike the fingerprint this reads every row; it runs inside the engine,
 * which owns the data anyway.
 */
export function contentHash(rows: readonly Row[]): string {
  return createHash('sha256').update(canonicalize([...rows]), 'utf8').digest('hex');
}
