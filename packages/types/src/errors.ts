/**
 * Ledger Errors
 *
 * One base class with a machine-readable code, one subclass per failure
 * family. Callers branch on `code` (or instanceof), never on message text.
 */

export type LedgerErrorCode =
  | "EVIDENCE_MISSING"
  | "DETERMINISM"
  | "INTEGRITY"
  | "DUPLICATE_STATE"
  | "GOVERNANCE"
  | "EXECUTION";

export class LedgerError extends Error {
  public readonly code: LedgerErrorCode;
  public readonly details: Readonly<Record<string, unknown>> | undefined;

  constructor(
    code: LedgerErrorCode,
    message: string,
    details?: Readonly<Record<string, unknown>>,
  ) {
    super(message);
    this.name = "LedgerError";
    this.code = code;
    this.details = details;
  }
}

/** A required file, field or key is absent. */
export class EvidenceMissingError extends LedgerError {
  constructor(message: string, details?: Readonly<Record<string, unknown>>) {
    super("EVIDENCE_MISSING", message, details);
    this.name = "EvidenceMissingError";
  }
}

/** Input cannot be put in canonical order. */
export class DeterminismError extends LedgerError {
  constructor(message: string, details?: Readonly<Record<string, unknown>>) {
    super("DETERMINISM", message, details);
    this.name = "DeterminismError";
  }
}

/** A recomputed hash or signature disagrees with the stored one. */
export class IntegrityError extends LedgerError {
  constructor(message: string, details?: Readonly<Record<string, unknown>>) {
    super("INTEGRITY", message, details);
    this.name = "IntegrityError";
  }
}

/** The candidate state is already the chain tip. */
export class DuplicateStateError extends LedgerError {
  constructor(message: string, details?: Readonly<Record<string, unknown>>) {
    super("DUPLICATE_STATE", message, details);
    this.name = "DuplicateStateError";
  }
}

/** Invalid vote, premature tally, bad parameters or illegal transition. */
export class GovernanceError extends LedgerError {
  constructor(message: string, details?: Readonly<Record<string, unknown>>) {
    super("GOVERNANCE", message, details);
    this.name = "GovernanceError";
  }
}

/** An approved append could not be carried out. */
export class ExecutionError extends LedgerError {
  constructor(message: string, details?: Readonly<Record<string, unknown>>) {
    super("EXECUTION", message, details);
    this.name = "ExecutionError";
  }
}

export function isLedgerError(value: unknown): value is LedgerError {
  return value instanceof LedgerError;
}

/**
 * Message text of any thrown value.
 */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
