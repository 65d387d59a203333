/**
 * JSON Schema registry for generation outputs and persisted state.
 *
 * Schemas are loaded from `schemas/*.schema.json` at run time and compiled
 * with ajv into type guards.
 *
 * @packageDocumentation
 */

import * as path from 'node:path';
import { fileURLToPath } from 'node:url';
import { Ajv, type ErrorObject, type SchemaObject, type ValidateFunction } from 'ajv';
import { safeReadFile } from '../utils/safe-fs.js';
import { isRecord } from '../utils/guards.js';
import type { StageDataByStage } from '../workflow/outputs.js';
import type { StageId } from '../workflow/ids.js';
import { SCHEMA_NAMES, STAGE_SCHEMAS, type SchemaName, type SchemaTypes } from './schemas.js';
import { createSchemaError, type SchemaError } from './types.js';

/**
 * Directory holding the bundled schema files.
 */
export const DEFAULT_SCHEMA_DIR = fileURLToPath(new URL('../../schemas/', import.meta.url));

/**
 * Error thrown when a schema file is missing or not a JSON object.
 */
export class SchemaLoadError extends Error {
  public readonly schema: string;
  public override readonly cause: Error | undefined;

  constructor(schema: string, message: string, cause?: Error) {
    super(`Failed to load schema '${schema}': ${message}`);
    this.name = 'SchemaLoadError';
    this.schema = schema;
    this.cause = cause;
  }
}

export type SchemaCheck<T> =
  | { readonly success: true; readonly data: T }
  | { readonly success: false; readonly error: SchemaError };

type Validators = { [N in SchemaName]: ValidateFunction<SchemaTypes[N]> };
type StageValidators = { [S in StageId]: ValidateFunction<StageDataByStage[S]> };

/**
 * Formats ajv errors as `path: message` lines.
 */
export function formatSchemaIssues(errors: readonly ErrorObject[] | null | undefined): string[] {
  return (errors ?? []).map((error) => {
    const location = error.instancePath === '' ? '(root)' : error.instancePath;
    return `${location}: ${error.message ?? error.keyword}`;
  });
}

/**
 * Compiled validators for every schema.
 *
 * @example
 * ```typescript
 * const registry = await SchemaRegistry.load();
 * const check = registry.validate('capabilities', parsed, raw);
 * if (check.success) {
 *   console.log(check.data.capabilities.length);
 * }
 * ```
 */
export class SchemaRegistry {
  private readonly validators: Validators;
  private readonly stageValidators: StageValidators;

  private constructor(sources: Readonly<Record<SchemaName, SchemaObject>>) {
    const ajv = new Ajv({ allErrors: true, strict: false });
    const compile = <N extends SchemaName>(name: N): ValidateFunction<SchemaTypes[N]> =>
      ajv.compile<SchemaTypes[N]>(sources[name]);

    this.validators = {
      'concept-anchor': compile('concept-anchor'),
      'idea-analysis': compile('idea-analysis'),
      'risk-assessment': compile('risk-assessment'),
      'pivot-strategy': compile('pivot-strategy'),
      'validation-verdict': compile('validation-verdict'),
      'scope-boundaries': compile('scope-boundaries'),
      capabilities: compile('capabilities'),
      'system-traits': compile('system-traits'),
      'design-mockups': compile('design-mockups'),
      'architecture-decisions': compile('architecture-decisions'),
      'work-items': compile('work-items'),
      'work-item-ordering': compile('work-item-ordering'),
      'verification-findings': compile('verification-findings'),
      'pipeline-state': compile('pipeline-state'),
    };

    const v = this.validators;
    this.stageValidators = {
      'concept-anchor': v['concept-anchor'],
      'idea-analysis': v['idea-analysis'],
      'risk-assessment': v['risk-assessment'],
      'pivot-strategy': v['pivot-strategy'],
      'validation-verdict': v['validation-verdict'],
      'scope-boundaries': v['scope-boundaries'],
      'capability-model': v.capabilities,
      'system-traits': v['system-traits'],
      'design-mockups': v['design-mockups'],
      'architecture-decisions': v['architecture-decisions'],
      'work-item-generation': v['work-items'],
      'work-item-ordering': v['work-item-ordering'],
    };
  }

  /**
   * Loads and compiles every schema file.
   *
   * @param schemaDir - Directory containing `<name>.schema.json` files.
   * @throws SchemaLoadError if a file is missing or malformed.
   */
  static async load(schemaDir: string = DEFAULT_SCHEMA_DIR): Promise<SchemaRegistry> {
    const entries = await Promise.all(
      SCHEMA_NAMES.map(async (name): Promise<[SchemaName, SchemaObject]> => {
        const file = path.join(schemaDir, `${name}.schema.json`);
        let parsed: SchemaObject;
        try {
          parsed = JSON.parse(await safeReadFile(file));
        } catch (error) {
          const cause = error instanceof Error ? error : new Error(String(error));
          throw new SchemaLoadError(name, cause.message, cause);
        }
        if (!isRecord(parsed)) {
          throw new SchemaLoadError(name, 'schema must be a JSON object');
        }
        return [name, parsed];
      })
    );

    const sources = new Map(entries);
    const complete: Record<SchemaName, SchemaObject> = {
      'concept-anchor': requireSource(sources, 'concept-anchor'),
      'idea-analysis': requireSource(sources, 'idea-analysis'),
      'risk-assessment': requireSource(sources, 'risk-assessment'),
      'pivot-strategy': requireSource(sources, 'pivot-strategy'),
      'validation-verdict': requireSource(sources, 'validation-verdict'),
      'scope-boundaries': requireSource(sources, 'scope-boundaries'),
      capabilities: requireSource(sources, 'capabilities'),
      'system-traits': requireSource(sources, 'system-traits'),
      'design-mockups': requireSource(sources, 'design-mockups'),
      'architecture-decisions': requireSource(sources, 'architecture-decisions'),
      'work-items': requireSource(sources, 'work-items'),
      'work-item-ordering': requireSource(sources, 'work-item-ordering'),
      'verification-findings': requireSource(sources, 'verification-findings'),
      'pipeline-state': requireSource(sources, 'pipeline-state'),
    };
    return new SchemaRegistry(complete);
  }

  /**
   * Validates data against a named schema.
   *
   * @param name - Schema name.
   * @param data - Parsed output.
   * @param raw - Raw text, kept on failure for escalation.
   */
  validate<N extends SchemaName>(name: N, data: unknown, raw = ''): SchemaCheck<SchemaTypes[N]> {
    const validator: ValidateFunction<SchemaTypes[N]> = this.validators[name];
    if (validator(data)) {
      return { success: true, data };
    }
    return {
      success: false,
      error: createSchemaError(name, formatSchemaIssues(validator.errors), raw),
    };
  }

  /**
   * Validates a stage output against the stage's schema.
   */
  validateStage<S extends StageId>(
    stage: S,
    data: unknown,
    raw = ''
  ): SchemaCheck<StageDataByStage[S]> {
    const validator: ValidateFunction<StageDataByStage[S]> = this.stageValidators[stage];
    if (validator(data)) {
      return { success: true, data };
    }
    return {
      success: false,
      error: createSchemaError(STAGE_SCHEMAS[stage], formatSchemaIssues(validator.errors), raw),
    };
  }
}

function requireSource(
  sources: ReadonlyMap<SchemaName, SchemaObject>,
  name: SchemaName
): SchemaObject {
  const source = sources.get(name);
  if (source === undefined) {
    throw new SchemaLoadError(name, 'schema file was not loaded');
  }
  return source;
}
