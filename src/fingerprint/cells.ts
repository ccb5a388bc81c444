import type { JsonValue, Row } from '../types.js';

/**
 * A row's cell for `name`. Only own properties count, so `constructor`
 * and the other Object.prototype members read as missing.
 */
export function cellOf(row: Row, name: string): JsonValue | undefined {
  return Object.hasOwn(row, name) ? row[name] : undefined;
}
