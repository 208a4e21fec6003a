export {
  type CandidateSourceItem,
  type GenerateOptions,
  type GenerationResult,
  type GenerationStats,
  assertThreshold,
  generateCandidates,
} from "./candidate-generator";
export {
  type DeleteResult,
  DuplicateEngine,
  type FindDuplicatesOptions,
  type FindDuplicatesResult,
  type FindWarning,
  type IngestRejection,
  type IngestResult,
  type IntegrityReport,
  type IntegrityWarning,
} from "./engine";
export {
  type ReconcileOptions,
  type ReconcileResult,
  Reconciler,
  type ReconcilerStore,
  type ReconcileWarning,
  type ReconcileWarningCode,
} from "./reconciler";
