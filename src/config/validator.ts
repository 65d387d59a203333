/**
 * Semantic validation for configuration values.
 *
 * Parsing guarantees types; this module checks that values make sense
 * together: thresholds within range, retry bounds non-negative, delays
 * ordered, the legacy cut-off a real date.
 *
 * @packageDocumentation
 */

import type { Config } from './types.js';

/**
 * Error class for semantic validation errors.
 */
export class ConfigValidationError extends Error {
  /** Array of validation failure details. */
  public readonly errors: ValidationError[];

  /**
   * Creates a new ConfigValidationError.
   *
   * @param message - Summary error message.
   * @param errors - Array of specific validation errors.
   */
  constructor(message: string, errors: ValidationError[]) {
    super(message);
    this.name = 'ConfigValidationError';
    this.errors = errors;
  }
}

/**
 * Individual validation error details.
 */
export interface ValidationError {
  /** The field path that failed validation. */
  field: string;
  /** The invalid value that was provided. */
  value: unknown;
  /** Human-readable description of the validation failure. */
  message: string;
}

/**
 * Result of a validation operation.
 */
export interface ValidationResult {
  valid: boolean;
  errors: ValidationError[];
}

function checkNonNegativeInteger(
  errors: ValidationError[],
  field: string,
  value: number
): void {
  if (!Number.isInteger(value) || value < 0) {
    errors.push({ field, value, message: `${field} must be a non-negative integer` });
  }
}

function checkPositive(errors: ValidationError[], field: string, value: number): void {
  if (!Number.isFinite(value) || value <= 0) {
    errors.push({ field, value, message: `${field} must be a positive number` });
  }
}

/**
 * Validates a configuration, collecting every problem.
 *
 * @param config - Parsed configuration.
 * @returns Validation result with all errors found.
 */
export function validateConfig(config: Config): ValidationResult {
  const errors: ValidationError[] = [];
  const { generation, anchor, verification, context, workflow } = config;

  checkPositive(errors, 'generation.timeout_ms', generation.timeout_ms);
  checkNonNegativeInteger(errors, 'generation.max_retries', generation.max_retries);
  if (generation.retry_base_delay_ms < 0) {
    errors.push({
      field: 'generation.retry_base_delay_ms',
      value: generation.retry_base_delay_ms,
      message: 'generation.retry_base_delay_ms must be non-negative',
    });
  }
  if (generation.retry_max_delay_ms < generation.retry_base_delay_ms) {
    errors.push({
      field: 'generation.retry_max_delay_ms',
      value: generation.retry_max_delay_ms,
      message: 'generation.retry_max_delay_ms must be >= generation.retry_base_delay_ms',
    });
  }
  if (generation.jitter_factor < 0 || generation.jitter_factor > 1) {
    errors.push({
      field: 'generation.jitter_factor',
      value: generation.jitter_factor,
      message: 'generation.jitter_factor must be between 0 and 1',
    });
  }

  if (anchor.confidence_threshold <= 0 || anchor.confidence_threshold > 1) {
    errors.push({
      field: 'anchor.confidence_threshold',
      value: anchor.confidence_threshold,
      message: 'anchor.confidence_threshold must be in (0, 1]',
    });
  }
  checkNonNegativeInteger(errors, 'anchor.extraction_retries', anchor.extraction_retries);
  checkPositive(errors, 'anchor.token_budget', anchor.token_budget);

  checkNonNegativeInteger(
    errors,
    'verification.max_corrective_retries',
    verification.max_corrective_retries
  );

  checkPositive(errors, 'context.token_budget', context.token_budget);

  if (!Number.isInteger(workflow.work_item_batch_size) || workflow.work_item_batch_size < 1) {
    errors.push({
      field: 'workflow.work_item_batch_size',
      value: workflow.work_item_batch_size,
      message: 'workflow.work_item_batch_size must be a positive integer',
    });
  }
  if (Number.isNaN(Date.parse(workflow.legacy_fallback_until))) {
    errors.push({
      field: 'workflow.legacy_fallback_until',
      value: workflow.legacy_fallback_until,
      message: 'workflow.legacy_fallback_until must be an ISO date',
    });
  }

  return { valid: errors.length === 0, errors };
}

/**
 * Validates a configuration and throws on any error.
 *
 * @param config - Parsed configuration.
 * @throws ConfigValidationError listing every problem.
 */
export function assertConfigValid(config: Config): void {
  const result = validateConfig(config);
  if (!result.valid) {
    const lines = result.errors.map((e) => `  - ${e.field}: ${e.message}`).join('\n');
    throw new ConfigValidationError(
      `Configuration validation failed with ${String(result.errors.length)} error(s):\n${lines}`,
      result.errors
    );
  }
}
