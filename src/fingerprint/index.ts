export {
  SHORT_FINGERPRINT_LENGTH,
  canonicalize,
  canonicalFingerprintInput,
  fingerprint,
  shortFingerprint,
} from './fingerprint.js';

export {
  DEFAULT_SAMPLE_SIZE,
  selectSample,
  inferCellType,
  mergeColumnTypes,
  inferColumns,
  describeShape,
  describeStats,
  profileRows,
} from './profile.js';

export { cellOf } from './cells.js';
