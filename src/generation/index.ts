/**
 * Generation capability: backend contract, schema validation and retry.
 *
 * @packageDocumentation
 */

export type {
  BackendError,
  CancelledError,
  GenerationBackend,
  GenerationError,
  GenerationErrorKind,
  GenerationRequest,
  GenerationResult,
  RateLimitError,
  SchemaError,
  TimeoutError,
  TransientError,
} from './types.js';
export {
  createBackendError,
  createCancelledError,
  createFailureResult,
  createRateLimitError,
  createSchemaError,
  createSuccessResult,
  createTimeoutError,
  createTransientError,
  describeForFeedback,
  isRetryableError,
} from './types.js';

export { SCHEMA_NAMES, STAGE_SCHEMAS } from './schemas.js';
export type { SchemaName, SchemaTypes, StageSchema } from './schemas.js';

export {
  DEFAULT_SCHEMA_DIR,
  SchemaLoadError,
  SchemaRegistry,
  formatSchemaIssues,
} from './schema-registry.js';
export type { SchemaCheck } from './schema-registry.js';

export {
  DEFAULT_RETRY_CONFIG,
  calculateBackoffDelay,
  defaultSleep,
  validateRetryConfig,
  withRetry,
} from './retry.js';
export type { RetryAttemptInfo, RetryConfig, RetryResult, WithRetryOptions } from './retry.js';

export { withTimeout } from './timeout.js';
export { extractJSON, renderPrompt } from './prompt.js';
export { ValidatedGenerator, createValidatedGenerator } from './validated.js';
export type { GenerationInput, ValidatedGeneratorOptions } from './validated.js';
export { CommandBackend, parseRetryAfter } from './command-backend.js';
export type { CommandBackendOptions } from './command-backend.js';
export { ScriptedBackend, sequence } from './scripted-backend.js';
export type { ScriptedHandler, ScriptedReply } from './scripted-backend.js';
