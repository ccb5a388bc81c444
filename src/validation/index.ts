export {
  VALID_NAME_PATTERN,
  MAX_NAME_LENGTH,
  MAX_TAG_LENGTH,
  MAX_DESCRIPTION_LENGTH,
  validateDatasetName,
  validateTagLabel,
  validateDescription,
} from './names.js';
