/**
 * Shape inference and sample selection over in-memory rows.
 *
 * Used by the bundled data engines to answer `profile()`. Sampling takes
 * the first and last `sampleSize` rows; a table no longer than that
 * contributes the same rows to both halves.
 */

import { ValidationError } from '../errors.js';
import type {
  ColumnDescriptor,
  ColumnStats,
  ColumnType,
  DatasetStats,
  ShapeDescriptor,
} from '../schema.js';
import type { DatasetProfile, JsonValue, Row, Sample } from '../types.js';
import { cellOf } from './cells.js';
import { canonicalize } from './fingerprint.js';

export const DEFAULT_SAMPLE_SIZE = 5;

export function selectSample(rows: readonly Row[], sampleSize: number = DEFAULT_SAMPLE_SIZE): Sample {
  if (!Number.isInteger(sampleSize) || sampleSize < 1) {
    throw new ValidationError(`Sample size must be a positive integer, got ${sampleSize}`);
  }
  return {
    head: rows.slice(0, sampleSize),
    tail: rows.slice(Math.max(0, rows.length - sampleSize)),
  };
}

export function inferCellType(value: JsonValue | undefined): ColumnType {
  if (value === null || value === undefined) return 'null';
  if (typeof value === 'boolean') return 'boolean';
  if (typeof value === 'number') return Number.isInteger(value) ? 'integer' : 'float';
  if (typeof value === 'string') return 'string';
  return 'json';
}

/**
 * Combine two observed types for the same column. Nulls defer to the other
 * side and integer widens to float; anything else disagreeing is `mixed`.
 */
export function mergeColumnTypes(a: ColumnType, b: ColumnType): ColumnType {
  if (a === b) return a;
  if (a === 'null') return b;
  if (b === 'null') return a;
  if ((a === 'integer' && b === 'float') || (a === 'float' && b === 'integer')) {
    return 'float';
  }
  return 'mixed';
}

/**
 * Infer the ordered column list. Column order is first appearance across
 * rows unless `columnOrder` is given.
 */
export function inferColumns(rows: readonly Row[], columnOrder?: readonly string[]): ColumnDescriptor[] {
  const names: string[] = columnOrder ? [...columnOrder] : [];
  const seen = new Set(names);

  if (!columnOrder) {
    for (const row of rows) {
      for (const key of Object.keys(row)) {
        if (!seen.has(key)) {
          seen.add(key);
          names.push(key);
        }
      }
    }
  }

  return names.map((name) => {
    let type: ColumnType = 'null';
    for (const row of rows) {
      type = mergeColumnTypes(type, inferCellType(cellOf(row, name)));
      if (type === 'mixed') break;
    }
    return { name, type };
  });
}

export function describeShape(rows: readonly Row[], columnOrder?: readonly string[]): ShapeDescriptor {
  const columns = inferColumns(rows, columnOrder);
  return {
    columns,
    rowCount: rows.length,
    columnCount: columns.length,
  };
}

/**
 * Per-column null and distinct-value counts. A missing cell counts as
 * null, and null is one of the distinct values.
 */
export function describeStats(rows: readonly Row[], columns: readonly ColumnDescriptor[]): DatasetStats {
  const columnStats = columns.map((column): ColumnStats => {
    let nullCount = 0;
    const distinct = new Set<string>();
    for (const row of rows) {
      const cell = cellOf(row, column.name) ?? null;
      if (cell === null) nullCount++;
      distinct.add(canonicalize(cell));
    }
    return {
      name: column.name,
      nullCount,
      nullPercentage: rows.length === 0 ? 0 : (nullCount / rows.length) * 100,
      uniqueCount: distinct.size,
    };
  });

  return {
    rowCount: rows.length,
    columnCount: columns.length,
    columns: columnStats,
  };
}

export function profileRows(
  rows: readonly Row[],
  sampleSize: number = DEFAULT_SAMPLE_SIZE,
  columnOrder?: readonly string[],
): DatasetProfile {
  const shape = describeShape(rows, columnOrder);
  return {
    shape,
    sample: selectSample(rows, sampleSize),
    stats: describeStats(rows, shape.columns),
  };
}
