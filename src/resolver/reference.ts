/**
 * Reference grammar and resolution.
 *
 *   <uuid>               a version id
 *   <name>:<label>       the version a tag points at
 *   <name>@<hexprefix>   the single version of <name> whose fingerprint
 *                        starts with the prefix
 *
 * Forms are tried in that order. Dataset names cannot contain ':' or '@',
 * so the first separator found is always the real one.
 */

import {
  AmbiguousReferenceError,
  InvalidReferenceError,
  NotFoundError,
} from '../errors.js';
import { shortFingerprint } from '../fingerprint/index.js';
import type { DatasetVersion, Tag } from '../schema.js';
import type { MetadataSnapshot } from '../store/snapshot.js';

export const UUID_PATTERN = /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/i;

export type ParsedReference =
  | { kind: 'id'; id: string }
  | { kind: 'tag'; name: string; label: string }
  | { kind: 'hash'; name: string; prefix: string };

function splitOnce(ref: string, separator: string): [string, string] {
  const index = ref.indexOf(separator);
  return [ref.slice(0, index), ref.slice(index + 1)];
}

export function parseReference(ref: string): ParsedReference {
  const trimmed = ref.trim();
  if (!trimmed) {
    throw new InvalidReferenceError(ref, 'reference is empty');
  }

  if (UUID_PATTERN.test(trimmed)) {
    return { kind: 'id', id: trimmed.toLowerCase() };
  }

  if (trimmed.includes(':')) {
    const [name, label] = splitOnce(trimmed, ':');
    if (!name || !label) {
      throw new InvalidReferenceError(ref, 'expected <name>:<tag>');
    }
    return { kind: 'tag', name, label };
  }

  if (trimmed.includes('@')) {
    const [name, prefix] = splitOnce(trimmed, '@');
    if (!name || !prefix) {
      throw new InvalidReferenceError(ref, 'expected <name>@<hash-prefix>');
    }
    return { kind: 'hash', name, prefix: prefix.toLowerCase() };
  }

  throw new InvalidReferenceError(ref);
}

/**
 * Resolve a reference to a version id against one snapshot.
 */
export function resolveReference(snapshot: MetadataSnapshot, ref: string): string {
  const parsed = parseReference(ref);

  switch (parsed.kind) {
    case 'id': {
      if (!snapshot.has(parsed.id)) {
        throw new NotFoundError(`Dataset with ID '${parsed.id}' not found`);
      }
      return parsed.id;
    }

    case 'tag': {
      const tag = snapshot.findTag(parsed.name, parsed.label);
      if (!tag) {
        throw new NotFoundError(`Tag '${parsed.label}' not found for dataset '${parsed.name}'`);
      }
      return tag.datasetId;
    }

    case 'hash': {
      const matches = snapshot
        .versionsNamed(parsed.name)
        .filter((v) => v.fingerprint.startsWith(parsed.prefix));

      if (matches.length === 0) {
        throw new NotFoundError(
          `No version of '${parsed.name}' has a fingerprint starting with '${parsed.prefix}'`,
        );
      }
      if (matches.length > 1) {
        throw new AmbiguousReferenceError(ref, matches.map((m) => m.id));
      }
      return matches[0].id;
    }
  }
}

/**
 * Preferred human reference: first tag, else name@short-fingerprint.
 */
export function preferredRef(version: DatasetVersion, tags: readonly Tag[]): string {
  const tag = tags.find((t) => t.datasetId === version.id && t.name === version.name);
  if (tag) {
    return `${version.name}:${tag.label}`;
  }
  return `${version.name}@${shortFingerprint(version.fingerprint)}`;
}

/** Full reference carrying the whole fingerprint */
export function fullRef(version: DatasetVersion): string {
  return `${version.name}@${version.fingerprint}`;
}
