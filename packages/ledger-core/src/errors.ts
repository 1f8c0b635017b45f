import type { ZodError } from 'zod';

/**
 * Failure categories reported per event in a batch result
 */
export type ErrorKind = 'validation' | 'persistence' | 'duplicate_key' | 'serialization';

/**
 * Base class for every error the ledger classifies
 */
export abstract class AlertLedgerError extends Error {
  abstract readonly kind: ErrorKind;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * Malformed or incomplete incoming alert event
 */
export class ValidationError extends AlertLedgerError {
  readonly kind = 'validation';

  /** Individual problems, one per offending field */
  readonly issues: string[];

  constructor(message: string, issues: string[] = [message]) {
    super(message);
    this.issues = issues;
  }

  /**
   * One issue per zod problem, prefixed with the offending path
   */
  static fromZodError(error: ZodError): ValidationError {
    const issues = error.errors.map((issue) =>
      issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message,
    );
    return new ValidationError(issues.join('; '), issues);
  }
}

/**
 * Store operation failed for infrastructure reasons
 */
export class PersistenceError extends AlertLedgerError {
  readonly kind = 'persistence';
}

/**
 * Insert rejected because the fingerprint is already stored.
 * Raised when two batches race to create the same alert.
 */
export class DuplicateKeyError extends AlertLedgerError {
  readonly kind = 'duplicate_key';

  readonly fingerprint: string;

  constructor(fingerprint: string, options?: { cause?: unknown }) {
    super(`alert with fingerprint ${fingerprint} already exists`, options);
    this.fingerprint = fingerprint;
  }
}

/**
 * Labels or annotations could not be encoded for storage
 */
export class SerializationError extends AlertLedgerError {
  readonly kind = 'serialization';
}

/**
 * Error detail as carried in a batch result
 */
export interface OutcomeError {
  kind: ErrorKind;
  message: string;
}

/**
 * Classify any thrown value. Unclassified failures count as persistence
 * errors, since everything outside validation happens at the store.
 */
export function toOutcomeError(error: unknown): OutcomeError {
  if (error instanceof AlertLedgerError) {
    return { kind: error.kind, message: error.message };
  }
  if (error instanceof Error) {
    return { kind: 'persistence', message: error.message };
  }
  return { kind: 'persistence', message: String(error) };
}
