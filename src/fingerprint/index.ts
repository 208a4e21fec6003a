export { type BKMatch, BKTree } from "./bk-tree";
export {
  type Fingerprint,
  fingerprintSlice,
  hammingDistance,
  parseFingerprint,
} from "./fingerprint";
export {
  type FingerprintGroup,
  FingerprintIndex,
  type FingerprintIndexOptions,
  type GroupMatch,
  type IndexedItem,
  type IndexMatch,
  type InsertOutcome,
} from "./fingerprint-index";
export { MultiIndexHash } from "./multi-index";
