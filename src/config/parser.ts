/**
 * TOML configuration parser for throughline.toml.
 *
 * @packageDocumentation
 */

import * as TOML from '@iarna/toml';
import {
  DEFAULT_ANCHOR,
  DEFAULT_CONTEXT,
  DEFAULT_GENERATION,
  DEFAULT_LOGGING,
  DEFAULT_PATHS,
  DEFAULT_VERIFICATION,
  DEFAULT_WORKFLOW,
} from './defaults.js';
import type {
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
import { isRecord } from '../utils/guards.js';
import { isPhaseId, type PhaseId } from '../workflow/ids.js';

/**
 * Error class for configuration parsing errors.
 */
export class ConfigParseError extends Error {
  /** The original error that caused the parse failure, if any. */
  public override readonly cause: Error | undefined;

  /**
   * Creates a new ConfigParseError.
   *
   * @param message - Descriptive error message.
   * @param cause - The underlying error, if any.
   */
  constructor(message: string, cause?: Error) {
    super(message);
    this.name = 'ConfigParseError';
    this.cause = cause;
  }
}

/**
 * Validates that a value is a string.
 *
 * @param value - Value to validate.
 * @param fieldPath - Path to the field for error messages.
 * @returns The validated string.
 * @throws ConfigParseError if value is not a string.
 */
function validateString(value: unknown, fieldPath: string): string {
  if (typeof value !== 'string') {
    throw new ConfigParseError(
      `Invalid type for '${fieldPath}': expected string, got ${typeof value}`
    );
  }
  return value;
}

/**
 * Validates that a value is a number.
 *
 * @param value - Value to validate.
 * @param fieldPath - Path to the field for error messages.
 * @returns The validated number.
 * @throws ConfigParseError if value is not a number.
 */
function validateNumber(value: unknown, fieldPath: string): number {
  if (typeof value !== 'number') {
    throw new ConfigParseError(
      `Invalid type for '${fieldPath}': expected number, got ${typeof value}`
    );
  }
  return value;
}

/**
 * Validates that a value is a boolean.
 *
 * @param value - Value to validate.
 * @param fieldPath - Path to the field for error messages.
 * @returns The validated boolean.
 * @throws ConfigParseError if value is not a boolean.
 */
function validateBoolean(value: unknown, fieldPath: string): boolean {
  if (typeof value !== 'boolean') {
    throw new ConfigParseError(
      `Invalid type for '${fieldPath}': expected boolean, got ${typeof value}`
    );
  }
  return value;
}

function validateMode(value: unknown, fieldPath: string): VerificationMode {
  const mode = validateString(value, fieldPath);
  if (mode !== 'single' && mode !== 'multi-pass') {
    throw new ConfigParseError(
      `Invalid value for '${fieldPath}': expected 'single' or 'multi-pass', got '${mode}'`
    );
  }
  return mode;
}

function validatePhaseList(value: unknown, fieldPath: string): PhaseId[] {
  if (!Array.isArray(value)) {
    throw new ConfigParseError(
      `Invalid type for '${fieldPath}': expected array, got ${typeof value}`
    );
  }
  return value.map((item: unknown, index) => {
    if (!isPhaseId(item)) {
      throw new ConfigParseError(
        `Invalid value for '${fieldPath}[${String(index)}]': unknown phase '${String(item)}'`
      );
    }
    return item;
  });
}

/**
 * Reads an optional sub-table.
 *
 * @param parent - The enclosing table.
 * @param key - Key of the sub-table.
 * @param fieldPath - Path for error messages.
 * @returns The table, or undefined when absent.
 */
function readTable(
  parent: Record<string, unknown>,
  key: string,
  fieldPath: string
): Record<string, unknown> | undefined {
  const value = parent[key];
  if (value === undefined) {
    return undefined;
  }
  if (!isRecord(value)) {
    throw new ConfigParseError(`Invalid type for '${fieldPath}': expected table`);
  }
  return value;
}

function parseGeneration(raw: Record<string, unknown> | undefined): GenerationConfig {
  const result: GenerationConfig = { ...DEFAULT_GENERATION };
  if (raw === undefined) {
    return result;
  }

  if ('command' in raw) {
    result.command = validateString(raw.command, 'generation.command');
  }
  if ('timeout_ms' in raw) {
    result.timeout_ms = validateNumber(raw.timeout_ms, 'generation.timeout_ms');
  }
  if ('max_retries' in raw) {
    result.max_retries = validateNumber(raw.max_retries, 'generation.max_retries');
  }
  if ('retry_base_delay_ms' in raw) {
    result.retry_base_delay_ms = validateNumber(
      raw.retry_base_delay_ms,
      'generation.retry_base_delay_ms'
    );
  }
  if ('retry_max_delay_ms' in raw) {
    result.retry_max_delay_ms = validateNumber(
      raw.retry_max_delay_ms,
      'generation.retry_max_delay_ms'
    );
  }
  if ('jitter_factor' in raw) {
    result.jitter_factor = validateNumber(raw.jitter_factor, 'generation.jitter_factor');
  }

  return result;
}

function parseAnchor(raw: Record<string, unknown> | undefined): AnchorConfig {
  const result: AnchorConfig = { ...DEFAULT_ANCHOR };
  if (raw === undefined) {
    return result;
  }

  if ('confidence_threshold' in raw) {
    result.confidence_threshold = validateNumber(
      raw.confidence_threshold,
      'anchor.confidence_threshold'
    );
  }
  if ('extraction_retries' in raw) {
    result.extraction_retries = validateNumber(
      raw.extraction_retries,
      'anchor.extraction_retries'
    );
  }
  if ('token_budget' in raw) {
    result.token_budget = validateNumber(raw.token_budget, 'anchor.token_budget');
  }

  return result;
}

function parseVerification(raw: Record<string, unknown> | undefined): VerificationConfig {
  const result: VerificationConfig = {
    ...DEFAULT_VERIFICATION,
    multi_pass_phases: [...DEFAULT_VERIFICATION.multi_pass_phases],
  };
  if (raw === undefined) {
    return result;
  }

  if ('max_corrective_retries' in raw) {
    result.max_corrective_retries = validateNumber(
      raw.max_corrective_retries,
      'verification.max_corrective_retries'
    );
  }
  if ('default_mode' in raw) {
    result.default_mode = validateMode(raw.default_mode, 'verification.default_mode');
  }
  if ('multi_pass_phases' in raw) {
    result.multi_pass_phases = validatePhaseList(
      raw.multi_pass_phases,
      'verification.multi_pass_phases'
    );
  }

  return result;
}

function parseContext(raw: Record<string, unknown> | undefined): ContextConfig {
  const result: ContextConfig = { ...DEFAULT_CONTEXT };
  if (raw !== undefined && 'token_budget' in raw) {
    result.token_budget = validateNumber(raw.token_budget, 'context.token_budget');
  }
  return result;
}

function parseWorkflow(raw: Record<string, unknown> | undefined): WorkflowConfig {
  const result: WorkflowConfig = { ...DEFAULT_WORKFLOW };
  if (raw === undefined) {
    return result;
  }

  if ('design_integration' in raw) {
    result.design_integration = validateBoolean(
      raw.design_integration,
      'workflow.design_integration'
    );
  }
  if ('work_item_batch_size' in raw) {
    result.work_item_batch_size = validateNumber(
      raw.work_item_batch_size,
      'workflow.work_item_batch_size'
    );
  }
  if ('legacy_fallback_until' in raw) {
    // TOML local dates parse to Date objects; accept both spellings.
    const value = raw.legacy_fallback_until;
    result.legacy_fallback_until =
      value instanceof Date
        ? value.toISOString().slice(0, 10)
        : validateString(value, 'workflow.legacy_fallback_until');
  }

  return result;
}

function parsePaths(raw: Record<string, unknown> | undefined): PathConfig {
  const result: PathConfig = { ...DEFAULT_PATHS };
  if (raw === undefined) {
    return result;
  }

  if ('state' in raw) {
    result.state = validateString(raw.state, 'paths.state');
  }
  if ('reports' in raw) {
    result.reports = validateString(raw.reports, 'paths.reports');
  }
  if ('tracker' in raw) {
    result.tracker = validateString(raw.tracker, 'paths.tracker');
  }
  if ('output' in raw) {
    result.output = validateString(raw.output, 'paths.output');
  }

  return result;
}

/**
 * Parses a notification hook. Incomplete hooks are ignored.
 *
 * @param raw - Raw TOML value for a single hook.
 * @param hookName - Name of the hook for error messages.
 * @returns Validated hook, or undefined when command or enabled is missing.
 */
function parseNotificationHook(raw: unknown, hookName: string): NotificationHook | undefined {
  if (!isRecord(raw)) {
    return undefined;
  }
  if (!('command' in raw) || !('enabled' in raw)) {
    return undefined;
  }

  return {
    command: validateString(raw.command, `notifications.hooks.${hookName}.command`),
    enabled: validateBoolean(raw.enabled, `notifications.hooks.${hookName}.enabled`),
  };
}

function parseNotifications(raw: Record<string, unknown> | undefined): NotificationConfig {
  const hooks: NotificationHooks = {};
  const hooksRaw = raw !== undefined ? readTable(raw, 'hooks', 'notifications.hooks') : undefined;
  if (hooksRaw === undefined) {
    return { hooks };
  }

  const onGate = parseNotificationHook(hooksRaw.on_gate, 'on_gate');
  if (onGate !== undefined) {
    hooks.on_gate = onGate;
  }
  const onComplete = parseNotificationHook(hooksRaw.on_complete, 'on_complete');
  if (onComplete !== undefined) {
    hooks.on_complete = onComplete;
  }
  const onEscalation = parseNotificationHook(hooksRaw.on_escalation, 'on_escalation');
  if (onEscalation !== undefined) {
    hooks.on_escalation = onEscalation;
  }

  return { hooks };
}

function parseLogging(raw: Record<string, unknown> | undefined): LoggingConfig {
  const result: LoggingConfig = { ...DEFAULT_LOGGING };
  if (raw !== undefined && 'debug' in raw) {
    result.debug = validateBoolean(raw.debug, 'logging.debug');
  }
  return result;
}

/**
 * Parses a TOML string into a validated Config object.
 *
 * @param tomlContent - Raw TOML content as a string.
 * @returns Configuration with defaults applied for missing fields.
 * @throws ConfigParseError for invalid TOML syntax or invalid field types.
 *
 * @example
 * ```typescript
 * const config = parseConfig(`
 * [anchor]
 * confidence_threshold = 0.8
 * `);
 * console.log(config.anchor.confidence_threshold); // 0.8
 * ```
 */
export function parseConfig(tomlContent: string): Config {
  let parsed: Record<string, unknown>;

  try {
    parsed = TOML.parse(tomlContent);
  } catch (error) {
    const tomlError = error instanceof Error ? error : new Error(String(error));
    throw new ConfigParseError(`Invalid TOML syntax: ${tomlError.message}`, tomlError);
  }

  return {
    generation: parseGeneration(readTable(parsed, 'generation', 'generation')),
    anchor: parseAnchor(readTable(parsed, 'anchor', 'anchor')),
    verification: parseVerification(readTable(parsed, 'verification', 'verification')),
    context: parseContext(readTable(parsed, 'context', 'context')),
    workflow: parseWorkflow(readTable(parsed, 'workflow', 'workflow')),
    paths: parsePaths(readTable(parsed, 'paths', 'paths')),
    notifications: parseNotifications(readTable(parsed, 'notifications', 'notifications')),
    logging: parseLogging(readTable(parsed, 'logging', 'logging')),
  };
}

/**
 * Returns a fresh copy of the default configuration.
 */
export function getDefaultConfig(): Config {
  return parseConfig('');
}
