/**
 * Pipeline state persistence.
 *
 * The whole state is written after every transition as versioned JSON,
 * atomically (temp file then rename). Loading validates the file against the
 * `pipeline-state` schema and rebuilds the artifact store.
 *
 * @packageDocumentation
 */

import type { SchemaRegistry } from '../generation/schema-registry.js';
import { fromData } from '../store/store.js';
import { isRecord } from '../utils/guards.js';
import { isNotFoundError, safeReadFile, writeFileAtomic } from '../utils/safe-fs.js';
import { PIPELINE_STATE_VERSION } from './state.js';
import type { PersistedPipelineState, PipelineState } from './types.js';

export type StatePersistenceErrorType =
  | 'parse_error'
  | 'schema_error'
  | 'file_error'
  | 'validation_error'
  | 'corruption_error';

export class StatePersistenceError extends Error {
  public readonly errorType: StatePersistenceErrorType;
  public readonly details: string | undefined;
  public override readonly cause: Error | undefined;

  constructor(
    message: string,
    errorType: StatePersistenceErrorType,
    options?: { details?: string | undefined; cause?: Error | undefined }
  ) {
    super(message);
    this.name = 'StatePersistenceError';
    this.errorType = errorType;
    this.details = options?.details;
    this.cause = options?.cause;
  }
}

const toError = (error: unknown): Error =>
  error instanceof Error ? error : new Error(String(error));

/**
 * Snapshot written to disk: the store becomes plain data.
 */
export function toPersisted(state: PipelineState, now: Date = new Date()): PersistedPipelineState {
  const { store, ...rest } = state;
  return { ...rest, store: store.toData(), persistedAt: now.toISOString() };
}

/**
 * Rebuilds a live state from a snapshot.
 *
 * @throws StatePersistenceError (corruption_error) when the stored artifacts
 * cannot be restored.
 */
export function fromPersisted(data: PersistedPipelineState): PipelineState {
  const { store, persistedAt: _persistedAt, ...rest } = data;
  try {
    return { ...rest, store: fromData(store) };
  } catch (error) {
    const cause = toError(error);
    throw new StatePersistenceError(
      `Stored artifacts could not be restored: ${cause.message}`,
      'corruption_error',
      { cause }
    );
  }
}

export function serializeState(state: PipelineState, now: Date = new Date()): string {
  return `${JSON.stringify(toPersisted(state, now), null, 2)}\n`;
}

function majorOf(version: string): string {
  return version.split('.')[0] ?? '';
}

/**
 * Parses and validates persisted JSON.
 *
 * @throws StatePersistenceError for invalid JSON (parse_error), a shape the
 * schema rejects (schema_error), an incompatible version (validation_error)
 * or unrestorable artifacts (corruption_error).
 */
export function deserializeState(json: string, registry: SchemaRegistry): PipelineState {
  let data: unknown;
  try {
    data = JSON.parse(json);
  } catch (error) {
    const cause = toError(error);
    throw new StatePersistenceError(`Failed to parse state JSON: ${cause.message}`, 'parse_error', {
      cause,
      details: 'The file does not contain valid JSON',
    });
  }

  if (isRecord(data) && typeof data.version === 'string') {
    if (majorOf(data.version) !== majorOf(PIPELINE_STATE_VERSION)) {
      throw new StatePersistenceError(
        `Unsupported state version ${data.version}; expected ${PIPELINE_STATE_VERSION}`,
        'validation_error'
      );
    }
  }

  const check = registry.validate('pipeline-state', data, json);
  if (!check.success) {
    throw new StatePersistenceError('State file does not match the pipeline-state schema', 'schema_error', {
      details: check.error.issues.join('\n'),
    });
  }
  return fromPersisted(check.data);
}

/**
 * Writes the state atomically.
 *
 * @throws StatePersistenceError (file_error) if the file cannot be written.
 */
export async function saveState(
  state: PipelineState,
  filePath: string,
  now: Date = new Date()
): Promise<void> {
  try {
    await writeFileAtomic(filePath, serializeState(state, now));
  } catch (error) {
    const cause = toError(error);
    throw new StatePersistenceError(
      `Failed to save state to "${filePath}": ${cause.message}`,
      'file_error',
      { cause }
    );
  }
}

/**
 * Loads and validates a state file.
 *
 * @throws StatePersistenceError when the file is missing, empty or invalid.
 */
export async function loadState(filePath: string, registry: SchemaRegistry): Promise<PipelineState> {
  let content: string;
  try {
    content = await safeReadFile(filePath);
  } catch (error) {
    const cause = toError(error);
    if (isNotFoundError(error)) {
      throw new StatePersistenceError(`State file not found: "${filePath}"`, 'file_error', {
        cause,
        details: 'Start a run first',
      });
    }
    throw new StatePersistenceError(
      `Failed to read state file "${filePath}": ${cause.message}`,
      'file_error',
      { cause }
    );
  }

  if (content.trim() === '') {
    throw new StatePersistenceError(`State file "${filePath}" is empty`, 'corruption_error');
  }
  return deserializeState(content, registry);
}
