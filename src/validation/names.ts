/**
 * Input validation for dataset names, tag labels and descriptions.
 *
 * Names and labels are restricted to [a-zA-Z0-9_-], which keeps ':' and '@'
 * free for the reference grammar.
 */

import { ValidationError } from '../errors.js';

export const VALID_NAME_PATTERN = /^[a-zA-Z0-9_-]+$/;
export const MAX_NAME_LENGTH = 100;
export const MAX_TAG_LENGTH = 50;
export const MAX_DESCRIPTION_LENGTH = 10_000;

export function validateDatasetName(name: string): void {
  if (!name) {
    throw new ValidationError('Dataset name cannot be empty');
  }
  if (!VALID_NAME_PATTERN.test(name)) {
    throw new ValidationError(
      `Invalid dataset name '${name}'. Only alphanumeric, underscore, and dash allowed.`,
    );
  }
  if (name.length > MAX_NAME_LENGTH) {
    throw new ValidationError(
      `Dataset name too long (${name.length} chars, max ${MAX_NAME_LENGTH})`,
    );
  }
}

export function validateTagLabel(label: string): void {
  if (!label) {
    throw new ValidationError('Tag name cannot be empty');
  }
  if (!VALID_NAME_PATTERN.test(label)) {
    throw new ValidationError(
      `Invalid tag name '${label}'. Only alphanumeric, underscore, and dash allowed.`,
    );
  }
  if (label.length > MAX_TAG_LENGTH) {
    throw new ValidationError(
      `Tag name too long (${label.length} chars, max ${MAX_TAG_LENGTH})`,
    );
  }
}

export function validateDescription(description: string | null | undefined): void {
  if (description && description.length > MAX_DESCRIPTION_LENGTH) {
    throw new ValidationError(
      `Description too long (${description.length} chars, max ${MAX_DESCRIPTION_LENGTH})`,
    );
  }
}
