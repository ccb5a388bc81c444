export {
  UUID_PATTERN,
  parseReference,
  resolveReference,
  preferredRef,
  fullRef,
  type ParsedReference,
} from './reference.js';
