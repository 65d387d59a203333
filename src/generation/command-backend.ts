/**
 * Generation backend that runs a configured shell command.
 *
 * The rendered prompt goes to the command's stdin; the first JSON object
 * on stdout is the output.
 *
 * @packageDocumentation
 */

import { execa } from 'execa';
import { extractJSON, renderPrompt } from './prompt.js';
import {
  createBackendError,
  createCancelledError,
  createFailureResult,
  createRateLimitError,
  createSchemaError,
  createSuccessResult,
  createTimeoutError,
  createTransientError,
  type GenerationBackend,
  type GenerationRequest,
  type GenerationResult,
} from './types.js';

export interface CommandBackendOptions {
  /** Shell command, run with `sh -c`. */
  readonly command: string;
  readonly timeoutMs: number;
  readonly cwd?: string;
}

/** Exit status `EX_TEMPFAIL`: the command asks to be retried. */
const EXIT_TEMPFAIL = 75;
/** Shell status for a command that was not found. */
const EXIT_NOT_FOUND = 127;

const RETRY_AFTER_PATTERN = /retry[- ]after[:= ]\s*(\d+)\s*(ms|s)?/i;

/**
 * Parses a retry-after hint from stderr, in milliseconds.
 */
export function parseRetryAfter(stderr: string): number | undefined {
  const match = RETRY_AFTER_PATTERN.exec(stderr);
  if (match?.[1] === undefined) {
    return undefined;
  }
  const value = parseInt(match[1], 10);
  return match[2]?.toLowerCase() === 'ms' ? value : value * 1000;
}

export class CommandBackend implements GenerationBackend {
  public readonly name = 'command';
  private readonly options: CommandBackendOptions;

  constructor(options: CommandBackendOptions) {
    this.options = options;
  }

  async generate(request: GenerationRequest): Promise<GenerationResult<unknown>> {
    const result = await execa('sh', ['-c', this.options.command], {
      input: renderPrompt(request),
      timeout: this.options.timeoutMs,
      reject: false,
      ...(this.options.cwd !== undefined ? { cwd: this.options.cwd } : {}),
      ...(request.signal !== undefined ? { cancelSignal: request.signal } : {}),
    });

    if (result.isCanceled) {
      return createFailureResult(createCancelledError());
    }
    if (result.timedOut) {
      return createFailureResult(
        createTimeoutError(
          `Command timed out after ${String(this.options.timeoutMs)}ms`,
          this.options.timeoutMs
        )
      );
    }

    const stdout = String(result.stdout);
    const stderr = String(result.stderr);

    if (result.exitCode !== 0) {
      if (/rate.?limit/i.test(stderr)) {
        return createFailureResult(
          createRateLimitError(`Rate limited: ${stderr.trim()}`, parseRetryAfter(stderr))
        );
      }
      if (result.exitCode === EXIT_TEMPFAIL) {
        return createFailureResult(createTransientError(`Temporary failure: ${stderr.trim()}`));
      }
      const exitCode = result.exitCode ?? -1;
      return createFailureResult(
        createBackendError(
          `Generation command failed with exit code ${String(exitCode)}: ${stderr.trim() || '(no stderr)'}`,
          exitCode !== EXIT_NOT_FOUND && result.exitCode !== undefined,
          { exitCode }
        )
      );
    }

    const json = extractJSON(stdout);
    if (json === null) {
      return createFailureResult(
        createSchemaError(request.schema, ['(root): no JSON object found in output'], stdout)
      );
    }

    const data: unknown = JSON.parse(json);
    return createSuccessResult(data, stdout);
  }
}
