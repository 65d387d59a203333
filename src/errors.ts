/**
 * Pipeline error taxonomy.
 *
 * Five failure categories cross module boundaries. Each has a concrete
 * error class so callers can branch on `instanceof` or on `kind`:
 *
 * - `ExtractionAmbiguity`: an anchor invariant below the confidence threshold.
 *   Not fatal; resolved by a human before the workflow proceeds.
 * - `VerificationViolation`: the phase verifier found drift or contradiction.
 * - `GenerationFailure`: a generation call failed after bounded retries.
 * - `SchemaValidationFailure`: output did not match the requested structure.
 * - `EntryConditionFailure`: a phase's prerequisites are unmet.
 *
 * @packageDocumentation
 */

/**
 * Discriminator shared by every pipeline error.
 */
export type PipelineErrorKind =
  | 'ExtractionAmbiguity'
  | 'VerificationViolation'
  | 'GenerationFailure'
  | 'SchemaValidationFailure'
  | 'EntryConditionFailure';

/**
 * Base class for the pipeline taxonomy.
 */
export abstract class PipelineError extends Error {
  public abstract readonly kind: PipelineErrorKind;
  /** Additional details for display. */
  public readonly details: string | undefined;
  /** The underlying cause, if any. */
  public override readonly cause: Error | undefined;

  constructor(message: string, options?: { details?: string; cause?: Error }) {
    super(message);
    this.details = options?.details;
    this.cause = options?.cause;
  }
}

/**
 * An anchor invariant is ambiguous, or a clarification selection is invalid.
 */
export class ExtractionAmbiguityError extends PipelineError {
  public readonly kind = 'ExtractionAmbiguity' as const;
  /** Properties of the invariants involved. */
  public readonly invariants: readonly string[];

  constructor(message: string, invariants: readonly string[], options?: { details?: string }) {
    super(message, options);
    this.name = 'ExtractionAmbiguityError';
    this.invariants = invariants;
  }
}

/**
 * Blocking verification violations remain unresolved.
 */
export class VerificationViolationError extends PipelineError {
  public readonly kind = 'VerificationViolation' as const;
  /** Invariants with unresolved blocking violations. */
  public readonly invariants: readonly string[];

  constructor(message: string, invariants: readonly string[]) {
    super(message);
    this.name = 'VerificationViolationError';
    this.invariants = invariants;
  }
}

/**
 * A generation call failed after all retries.
 */
export class GenerationFailureError extends PipelineError {
  public readonly kind = 'GenerationFailure' as const;
  /** Stage whose generation failed. */
  public readonly stage: string;
  /** Number of attempts made. */
  public readonly attempts: number;

  constructor(
    message: string,
    stage: string,
    attempts: number,
    options?: { details?: string; cause?: Error }
  ) {
    super(message, options);
    this.name = 'GenerationFailureError';
    this.stage = stage;
    this.attempts = attempts;
  }
}

/**
 * Output does not conform to the requested structure.
 */
export class SchemaValidationError extends PipelineError {
  public readonly kind = 'SchemaValidationFailure' as const;
  /** Schema the data was checked against. */
  public readonly schema: string;
  /** Individual validation issues, `path: message`. */
  public readonly issues: readonly string[];

  constructor(message: string, schema: string, issues: readonly string[]) {
    super(message, { details: issues.join('\n') });
    this.name = 'SchemaValidationError';
    this.schema = schema;
    this.issues = issues;
  }
}

/**
 * A phase's prerequisites are unmet.
 */
export class EntryConditionError extends PipelineError {
  public readonly kind = 'EntryConditionFailure' as const;
  /** Phase that could not start. */
  public readonly phase: string;
  /** Identifier of the unmet condition. */
  public readonly condition: string;

  constructor(message: string, phase: string, condition: string) {
    super(message);
    this.name = 'EntryConditionError';
    this.phase = phase;
    this.condition = condition;
  }
}

/**
 * Type guard for pipeline errors.
 */
export function isPipelineError(error: unknown): error is PipelineError {
  return error instanceof PipelineError;
}
