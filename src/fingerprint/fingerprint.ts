/**
 * Fingerprint Engine
 *
 * Derives a dataset's content identity from its shape and a bounded sample
 * instead of its full contents, so the cost of versioning does not grow
 * with table size. Two tables that agree on shape, first rows and last rows
 * but differ in the middle share a fingerprint; that collision is accepted.
 *
 * Canonical form, in this field order:
 *   rows:<n>|cols:<n>|schema:[[name,type],...]|head:[[cells],...]|tail:[[cells],...]
 * Cells are serialised in column order; object keys inside cells are sorted.
 */

import { createHash } from 'node:crypto';
import type { ShapeDescriptor } from '../schema.js';
import type { Fingerprint, JsonValue, Row, Sample } from '../types.js';
import { cellOf } from './cells.js';

/** Length of the human-facing fingerprint prefix */
export const SHORT_FINGERPRINT_LENGTH = 7;

/**
 * Canonicalize a JSON value so equal values always serialise identically,
 * regardless of object key order.
 */
export function canonicalize(value: JsonValue | undefined): string {
  if (value === null || value === undefined) {
    return 'null';
  }

  if (typeof value === 'string') {
    return JSON.stringify(value);
  }

  if (typeof value === 'number' || typeof value === 'boolean') {
    return String(value);
  }

  if (Array.isArray(value)) {
    return '[' + value.map(canonicalize).join(',') + ']';
  }

  const keys = Object.keys(value).sort();
  const pairs = keys.map((key) => `${JSON.stringify(key)}:${canonicalize(value[key])}`);
  return '{' + pairs.join(',') + '}';
}

function rowCells(row: Row, shape: ShapeDescriptor): JsonValue[] {
  return shape.columns.map((column) => cellOf(row, column.name) ?? null);
}

/**
 * Build the canonical byte sequence fed to the hash.
 */
export function canonicalFingerprintInput(shape: ShapeDescriptor, sample: Sample): string {
  const schema: JsonValue[] = shape.columns.map((c) => [c.name, c.type]);
  const head: JsonValue[] = sample.head.map((row) => rowCells(row, shape));
  const tail: JsonValue[] = sample.tail.map((row) => rowCells(row, shape));

  return [
    `rows:${shape.rowCount}`,
    `cols:${shape.columnCount}`,
    `schema:${canonicalize(schema)}`,
    `head:${canonicalize(head)}`,
    `tail:${canonicalize(tail)}`,
  ].join('|');
}

/**
 * Compute the fingerprint of a dataset from its shape and sample.
 * Deterministic and side-effect free; degenerate input still hashes.
 */
export function fingerprint(shape: ShapeDescriptor, sample: Sample): Fingerprint {
  return createHash('sha256')
    .update(canonicalFingerprintInput(shape, sample), 'utf8')
    .digest('hex');
}

export function shortFingerprint(fp: Fingerprint): string {
  return fp.slice(0, SHORT_FINGERPRINT_LENGTH);
}
