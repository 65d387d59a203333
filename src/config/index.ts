/**
 * Configuration module for throughline.toml.
 *
 * Override precedence: env > config file > defaults
 *
 * @packageDocumentation
 */

import * as path from 'node:path';
import { safeReadFile, isNotFoundError } from '../utils/safe-fs.js';
import { parseConfig } from './parser.js';
import { applyEnvOverrides, type EnvRecord } from './env.js';
import { assertConfigValid } from './validator.js';
import type { Config } from './types.js';

export { ConfigParseError, getDefaultConfig, parseConfig } from './parser.js';
export type {
  AnchorConfig,
  Config,
  ContextConfig,
  GenerationConfig,
  LoggingConfig,
  NotificationConfig,
  NotificationHook,
  NotificationHooks,
  PathConfig,
  VerificationConfig,
  VerificationMode,
  WorkflowConfig,
} from './types.js';
export {
  DEFAULT_ANCHOR,
  DEFAULT_CONFIG,
  DEFAULT_CONTEXT,
  DEFAULT_GENERATION,
  DEFAULT_LOGGING,
  DEFAULT_NOTIFICATIONS,
  DEFAULT_PATHS,
  DEFAULT_VERIFICATION,
  DEFAULT_WORKFLOW,
} from './defaults.js';
export { ConfigValidationError, validateConfig, assertConfigValid } from './validator.js';
export type { ValidationError, ValidationResult } from './validator.js';
export {
  EnvCoercionError,
  readEnvOverrides,
  applyEnvOverrides,
  getEnvVarDocumentation,
} from './env.js';
export type { EnvOverrideResult, EnvRecord } from './env.js';

/** Name of the configuration file looked up in the project root. */
export const CONFIG_FILE_NAME = 'throughline.toml';

/**
 * Loads throughline.toml from a project root (defaults when absent),
 * applies environment overrides and validates the result.
 *
 * @param projectRoot - Directory containing throughline.toml.
 * @param env - Environment to read overrides from.
 * @returns The effective configuration.
 * @throws ConfigParseError, EnvCoercionError or ConfigValidationError.
 */
export async function loadConfig(
  projectRoot: string,
  env: EnvRecord = process.env
): Promise<Config> {
  let content = '';
  try {
    content = await safeReadFile(path.join(projectRoot, CONFIG_FILE_NAME));
  } catch (error) {
    if (!isNotFoundError(error)) {
      throw error;
    }
  }

  const config = applyEnvOverrides(parseConfig(content), env);
  assertConfigValid(config);
  return config;
}
