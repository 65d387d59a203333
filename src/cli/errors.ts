/**
 * CLI errors and recovery suggestions.
 *
 * @packageDocumentation
 */

import { LegacyFallbackExpiredError } from '../assembly/assembler.js';
import { ConfigParseError, ConfigValidationError, EnvCoercionError } from '../config/index.js';
import { isPipelineError } from '../errors.js';
import { TrackerError } from '../tracker/types.js';
import { GateDecisionError, WorkflowStateError } from '../workflow/engine.js';
import { StatePersistenceError } from '../workflow/persistence.js';

/**
 * Wrong or missing command-line input.
 */
export class CliUsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CliUsageError';
  }
}

/**
 * Kinds of failure the CLI offers suggestions for.
 */
export type ErrorType = 'usage' | 'config' | 'state' | 'gate' | 'pipeline' | 'tracker' | 'unknown';

export interface Suggestion {
  text: string;
  /** Command to run, when there is one. */
  action?: string;
}

const ERROR_SUGGESTIONS: Readonly<Record<ErrorType, readonly Suggestion[]>> = {
  usage: [{ text: 'See the usage of the command', action: 'throughline help <command>' }],
  config: [
    { text: 'Check throughline.toml against the documented keys' },
    { text: 'Check THROUGHLINE_* environment variables', action: 'env | grep THROUGHLINE_' },
  ],
  state: [
    { text: 'Check the state file named in the message' },
    { text: 'Start a new run', action: 'throughline start <idea-file> --force' },
  ],
  gate: [
    { text: 'See which gate is open and what it expects', action: 'throughline status' },
  ],
  pipeline: [
    { text: 'Review the gate reason', action: 'throughline status' },
    { text: 'Retry the failed stage', action: 'throughline resume approve' },
  ],
  tracker: [{ text: 'Check the tracker file named in the message' }],
  unknown: [{ text: 'Run again with THROUGHLINE_DEBUG=true for structured logs on stderr' }],
};

/**
 * Classifies an error for suggestions.
 */
export function classifyError(error: unknown): ErrorType {
  if (error instanceof CliUsageError) {
    return 'usage';
  }
  if (
    error instanceof ConfigParseError ||
    error instanceof ConfigValidationError ||
    error instanceof EnvCoercionError
  ) {
    return 'config';
  }
  if (error instanceof StatePersistenceError || error instanceof LegacyFallbackExpiredError) {
    return 'state';
  }
  if (error instanceof GateDecisionError || error instanceof WorkflowStateError) {
    return 'gate';
  }
  if (isPipelineError(error)) {
    return 'pipeline';
  }
  if (error instanceof TrackerError) {
    return 'tracker';
  }
  return 'unknown';
}

export function getSuggestions(errorType: ErrorType): readonly Suggestion[] {
  return ERROR_SUGGESTIONS[errorType];
}

/**
 * Renders an error with its suggestions, one per line.
 */
export function formatErrorWithSuggestions(error: unknown): string {
  const message = error instanceof Error ? error.message : String(error);
  const lines = [`Error: ${message}`];
  const suggestions = getSuggestions(classifyError(error));
  if (suggestions.length > 0) {
    lines.push('', 'Suggestions:');
    for (const suggestion of suggestions) {
      lines.push(
        suggestion.action !== undefined
          ? `  - ${suggestion.text}: ${suggestion.action}`
          : `  - ${suggestion.text}`
      );
    }
  }
  return lines.join('\n');
}
