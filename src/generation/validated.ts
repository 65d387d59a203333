/**
 * Generate, validate against the requested schema, retry.
 *
 * @packageDocumentation
 */

import type { StageDataByStage } from '../workflow/outputs.js';
import type { StageId } from '../workflow/ids.js';
import { createSilentLogger, type Logger } from '../utils/logger.js';
import type { SchemaRegistry, SchemaCheck } from './schema-registry.js';
import { STAGE_SCHEMAS, type SchemaName, type SchemaTypes } from './schemas.js';
import {
  withRetry,
  type RetryAttemptInfo,
  type RetryConfig,
  type RetryResult,
  type WithRetryOptions,
} from './retry.js';
import { withTimeout } from './timeout.js';
import {
  createBackendError,
  createFailureResult,
  describeForFeedback,
  type GenerationBackend,
  type GenerationRequest,
  type GenerationResult,
} from './types.js';

export interface ValidatedGeneratorOptions {
  readonly retry?: Partial<RetryConfig>;
  /** Per-call deadline. */
  readonly timeoutMs?: number;
  readonly sleep?: (ms: number) => Promise<void>;
  readonly random?: () => number;
  readonly logger?: Logger;
}

/**
 * Request without schema; the schema comes from the call.
 */
export type GenerationInput = Omit<GenerationRequest, 'schema' | 'task'> & {
  readonly task?: string;
};

const DEFAULT_TIMEOUT_MS = 120000;

/**
 * Wraps a backend so every result is schema-valid typed data or a typed
 * failure. Schema failures are retried with the issues appended as feedback.
 */
export class ValidatedGenerator {
  private readonly backend: GenerationBackend;
  private readonly registry: SchemaRegistry;
  private readonly options: ValidatedGeneratorOptions;
  private readonly logger: Logger;

  constructor(
    backend: GenerationBackend,
    registry: SchemaRegistry,
    options: ValidatedGeneratorOptions = {}
  ) {
    this.backend = backend;
    this.registry = registry;
    this.options = options;
    this.logger = options.logger ?? createSilentLogger('ValidatedGenerator');
  }

  get backendName(): string {
    return this.backend.name;
  }

  /**
   * Generates data conforming to a named schema.
   */
  generate<N extends SchemaName>(
    schema: N,
    input: GenerationInput
  ): Promise<RetryResult<SchemaTypes[N]>> {
    return this.run(
      { ...input, schema, task: input.task ?? schema },
      (data, raw) => this.registry.validate(schema, data, raw)
    );
  }

  /**
   * Generates a stage's output.
   */
  generateStage<S extends StageId>(
    stage: S,
    input: GenerationInput
  ): Promise<RetryResult<StageDataByStage[S]>> {
    return this.run(
      { ...input, schema: STAGE_SCHEMAS[stage], task: input.task ?? stage },
      (data, raw) => this.registry.validateStage(stage, data, raw)
    );
  }

  private run<T>(
    request: GenerationRequest,
    validate: (data: unknown, raw: string) => SchemaCheck<T>
  ): Promise<RetryResult<T>> {
    const retryOptions: WithRetryOptions = {
      config: this.options.retry ?? {},
      onRetry: (info: RetryAttemptInfo): void => {
        this.logger.warn('generation_retry', {
          task: request.task,
          attempt: info.attempt,
          totalAttempts: info.totalAttempts,
          delayMs: info.delayMs,
          error: info.previousError.kind,
        });
      },
      ...(this.options.sleep !== undefined ? { sleep: this.options.sleep } : {}),
      ...(this.options.random !== undefined ? { random: this.options.random } : {}),
    };

    return withRetry<T>(async (attempt, previous) => {
      const feedback =
        previous !== undefined
          ? [...request.feedback, describeForFeedback(previous)]
          : request.feedback;
      this.logger.debug('generation_attempt', { task: request.task, attempt });

      const result = await withTimeout<unknown>(
        (signal) => this.callBackend({ ...request, feedback, signal }),
        this.options.timeoutMs ?? DEFAULT_TIMEOUT_MS,
        request.signal
      );
      if (!result.success) {
        return result;
      }

      const check = validate(result.data, result.raw);
      if (!check.success) {
        this.logger.warn('generation_schema_mismatch', {
          task: request.task,
          schema: request.schema,
          issues: check.error.issues,
        });
        return createFailureResult<T>(check.error);
      }
      return { success: true, data: check.data, raw: result.raw };
    }, retryOptions);
  }

  private async callBackend(request: GenerationRequest): Promise<GenerationResult<unknown>> {
    try {
      return await this.backend.generate(request);
    } catch (error) {
      const cause = error instanceof Error ? error : new Error(String(error));
      return createFailureResult(
        createBackendError(`Backend '${this.backend.name}' threw: ${cause.message}`, false, {
          cause,
        })
      );
    }
  }
}

/**
 * Creates a {@link ValidatedGenerator}.
 */
export function createValidatedGenerator(
  backend: GenerationBackend,
  registry: SchemaRegistry,
  options: ValidatedGeneratorOptions = {}
): ValidatedGenerator {
  return new ValidatedGenerator(backend, registry, options);
}
