/**
 * Error types for the relation ledger
 *
 * Every failure that crosses the store boundary is a LedgerError with a
 * stable `code`, so callers can branch without string matching.
 */

import Database from "better-sqlite3";
import type { Pair } from "@/types";

export type LedgerErrorCode =
  | "NOT_FOUND"
  | "CONSTRAINT_VIOLATION"
  | "TRANSIENT_STORAGE"
  | "INTEGRITY_ANOMALY"
  | "INVALID_TRANSITION"
  | "INVALID_FINGERPRINT"
  | "INVALID_ARGUMENT"
  | "STORAGE_FAILURE";

export class LedgerError extends Error {
  constructor(
    message: string,
    public readonly code: LedgerErrorCode,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "LedgerError";
  }
}

export class NotFoundError extends LedgerError {
  constructor(message: string) {
    super(message, "NOT_FOUND");
    this.name = "NotFoundError";
  }
}

export class ConstraintViolationError extends LedgerError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, "CONSTRAINT_VIOLATION", options);
    this.name = "ConstraintViolationError";
  }
}

/** I/O or locking failure; safe to retry */
export class TransientStorageError extends LedgerError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, "TRANSIENT_STORAGE", options);
    this.name = "TransientStorageError";
  }
}

export class IntegrityAnomalyError extends LedgerError {
  constructor(
    message: string,
    public readonly orphanCount: number,
    public readonly samples: Pair[] = [],
  ) {
    super(message, "INTEGRITY_ANOMALY");
    this.name = "IntegrityAnomalyError";
  }
}

export class InvalidTransitionError extends LedgerError {
  constructor(message: string) {
    super(message, "INVALID_TRANSITION");
    this.name = "InvalidTransitionError";
  }
}

export class FingerprintError extends LedgerError {
  constructor(message: string) {
    super(message, "INVALID_FINGERPRINT");
    this.name = "FingerprintError";
  }
}

export class InvalidArgumentError extends LedgerError {
  constructor(message: string) {
    super(message, "INVALID_ARGUMENT");
    this.name = "InvalidArgumentError";
  }
}

const TRANSIENT_SQLITE_CODES = ["SQLITE_BUSY", "SQLITE_LOCKED", "SQLITE_IOERR"];

/**
 * Map a thrown value onto the ledger taxonomy.
 * SQLite extended codes are matched by prefix (SQLITE_IOERR_WRITE, SQLITE_CONSTRAINT_FOREIGNKEY, ...).
 */
export function toLedgerError(error: unknown): LedgerError {
  if (error instanceof LedgerError) {
    return error;
  }

  if (error instanceof Database.SqliteError) {
    if (TRANSIENT_SQLITE_CODES.some((code) => error.code.startsWith(code))) {
      return new TransientStorageError(error.message, { cause: error });
    }
    if (error.code.startsWith("SQLITE_CONSTRAINT")) {
      return new ConstraintViolationError(error.message, { cause: error });
    }
  }

  const message = error instanceof Error ? error.message : String(error);
  return new LedgerError(message, "STORAGE_FAILURE", { cause: error });
}

export function isRetryable(error: unknown): boolean {
  return toLedgerError(error) instanceof TransientStorageError;
}
