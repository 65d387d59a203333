/**
 * Environment variable overrides for configuration.
 *
 * THROUGHLINE_<SECTION>_<FIELD> variables override values from
 * throughline.toml. Override precedence: env > config file > defaults.
 *
 * @packageDocumentation
 */

import type { Config } from './types.js';

/**
 * Type for environment record (matching process.env structure).
 */
export type EnvRecord = Record<string, string | undefined>;

/**
 * Error class for environment variable coercion errors.
 */
export class EnvCoercionError extends Error {
  /** The environment variable name that failed coercion. */
  public readonly envVar: string;
  /** The raw value from the environment variable. */
  public readonly rawValue: string;
  /** The expected type for the value. */
  public readonly expectedType: string;

  /**
   * Creates a new EnvCoercionError.
   *
   * @param envVar - The environment variable name.
   * @param rawValue - The raw string value from the environment.
   * @param expectedType - The type the value should be coerced to.
   * @param message - Optional detailed error message.
   */
  constructor(envVar: string, rawValue: string, expectedType: string, message?: string) {
    super(
      message ??
        `Cannot coerce environment variable '${envVar}' value '${rawValue}' to ${expectedType}`
    );
    this.name = 'EnvCoercionError';
    this.envVar = envVar;
    this.rawValue = rawValue;
    this.expectedType = expectedType;
  }
}

/**
 * One supported variable and how it changes the configuration.
 */
type EnvMapping =
  | {
      readonly type: 'string';
      readonly description: string;
      readonly apply: (config: Config, value: string) => Config;
    }
  | {
      readonly type: 'number';
      readonly description: string;
      readonly apply: (config: Config, value: number) => Config;
    }
  | {
      readonly type: 'boolean';
      readonly description: string;
      readonly apply: (config: Config, value: boolean) => Config;
    };

const ENV_VAR_MAPPINGS: Readonly<Record<string, EnvMapping>> = {
  THROUGHLINE_GENERATION_COMMAND: {
    type: 'string',
    description: 'Shell command used by the command generation backend',
    apply: (c, v) => ({ ...c, generation: { ...c.generation, command: v } }),
  },
  THROUGHLINE_GENERATION_TIMEOUT_MS: {
    type: 'number',
    description: 'Per-call generation timeout in milliseconds',
    apply: (c, v) => ({ ...c, generation: { ...c.generation, timeout_ms: v } }),
  },
  THROUGHLINE_GENERATION_MAX_RETRIES: {
    type: 'number',
    description: 'Retries for transient generation failures',
    apply: (c, v) => ({ ...c, generation: { ...c.generation, max_retries: v } }),
  },
  THROUGHLINE_GENERATION_RETRY_BASE_DELAY_MS: {
    type: 'number',
    description: 'Base backoff delay in milliseconds',
    apply: (c, v) => ({ ...c, generation: { ...c.generation, retry_base_delay_ms: v } }),
  },
  THROUGHLINE_ANCHOR_CONFIDENCE_THRESHOLD: {
    type: 'number',
    description: 'Confidence below which an anchor invariant needs clarification',
    apply: (c, v) => ({ ...c, anchor: { ...c.anchor, confidence_threshold: v } }),
  },
  THROUGHLINE_VERIFICATION_MAX_CORRECTIVE_RETRIES: {
    type: 'number',
    description: 'Automatic stage re-runs after a blocking violation',
    apply: (c, v) => ({
      ...c,
      verification: { ...c.verification, max_corrective_retries: v },
    }),
  },
  THROUGHLINE_CONTEXT_TOKEN_BUDGET: {
    type: 'number',
    description: 'Token budget for upstream context sections',
    apply: (c, v) => ({ ...c, context: { ...c.context, token_budget: v } }),
  },
  THROUGHLINE_WORKFLOW_DESIGN_INTEGRATION: {
    type: 'boolean',
    description: 'Enable the design-mockup stage',
    apply: (c, v) => ({ ...c, workflow: { ...c.workflow, design_integration: v } }),
  },
  THROUGHLINE_PATHS_STATE: {
    type: 'string',
    description: 'Pipeline state file',
    apply: (c, v) => ({ ...c, paths: { ...c.paths, state: v } }),
  },
  THROUGHLINE_DEBUG: {
    type: 'boolean',
    description: 'Enable debug logging',
    apply: (c, v) => ({ ...c, logging: { ...c.logging, debug: v } }),
  },
};

/**
 * Coerces a string to a finite number.
 */
function coerceToNumber(value: string, envVar: string): number {
  const trimmed = value.trim();
  const num = Number(trimmed);
  if (trimmed === '' || !Number.isFinite(num)) {
    throw new EnvCoercionError(envVar, value, 'number');
  }
  return num;
}

/**
 * Coerces a string to a boolean.
 */
function coerceToBoolean(value: string, envVar: string): boolean {
  const truthy = ['true', '1', 'yes', 'on'];
  const falsy = ['false', '0', 'no', 'off'];
  const lower = value.trim().toLowerCase();

  if (truthy.includes(lower)) {
    return true;
  }
  if (falsy.includes(lower)) {
    return false;
  }

  throw new EnvCoercionError(
    envVar,
    value,
    'boolean',
    `Cannot coerce '${envVar}' value '${value}' to boolean. Expected one of: ${[...truthy, ...falsy].join(', ')}`
  );
}

function applyMapping(config: Config, mapping: EnvMapping, value: string, envVar: string): Config {
  switch (mapping.type) {
    case 'string':
      return mapping.apply(config, value);
    case 'number':
      return mapping.apply(config, coerceToNumber(value, envVar));
    case 'boolean':
      return mapping.apply(config, coerceToBoolean(value, envVar));
  }
}

/**
 * Result of applying environment variable overrides.
 */
export interface EnvOverrideResult {
  /** Configuration with the overrides applied. */
  config: Config;
  /** Environment variables that were applied. */
  appliedVars: string[];
  /** Coercion errors, when collected instead of thrown. */
  errors: EnvCoercionError[];
}

/**
 * Applies environment overrides and reports what was applied.
 *
 * @param config - Base configuration.
 * @param env - Environment to read.
 * @param options - With `collectErrors`, invalid values are skipped and reported.
 * @returns The overridden configuration plus the applied variables.
 * @throws EnvCoercionError on an invalid value unless collectErrors is set.
 */
export function readEnvOverrides(
  config: Config,
  env: EnvRecord = process.env,
  options: { collectErrors?: boolean } = {}
): EnvOverrideResult {
  const { collectErrors = false } = options;
  let result = config;
  const appliedVars: string[] = [];
  const errors: EnvCoercionError[] = [];

  for (const [envVar, mapping] of Object.entries(ENV_VAR_MAPPINGS)) {
    const value = env[envVar];
    if (value === undefined || value === '') {
      continue;
    }

    try {
      result = applyMapping(result, mapping, value, envVar);
      appliedVars.push(envVar);
    } catch (error) {
      if (error instanceof EnvCoercionError && collectErrors) {
        errors.push(error);
      } else {
        throw error;
      }
    }
  }

  return { config: result, appliedVars, errors };
}

/**
 * Applies environment overrides to a configuration.
 *
 * @param config - The base configuration.
 * @param env - The environment to read (defaults to process.env).
 * @returns The configuration with environment overrides applied.
 * @throws EnvCoercionError if a variable cannot be coerced.
 */
export function applyEnvOverrides(config: Config, env: EnvRecord = process.env): Config {
  return readEnvOverrides(config, env).config;
}

/**
 * Documentation for every supported variable.
 */
export function getEnvVarDocumentation(): Record<string, { description: string; type: string }> {
  const docs: Record<string, { description: string; type: string }> = {};
  for (const [envVar, mapping] of Object.entries(ENV_VAR_MAPPINGS)) {
    docs[envVar] = { description: mapping.description, type: mapping.type };
  }
  return docs;
}
