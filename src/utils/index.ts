export {
  ConstraintViolationError,
  FingerprintError,
  IntegrityAnomalyError,
  InvalidArgumentError,
  InvalidTransitionError,
  isRetryable,
  LedgerError,
  type LedgerErrorCode,
  NotFoundError,
  toLedgerError,
  TransientStorageError,
} from "./errors";
export { canonicalPair, isUnderRoot, pairKey } from "./pairs";
export { calculateDelay, DEFAULT_RETRY_OPTIONS, withRetry } from "./retry";
