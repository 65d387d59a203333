/**
 * Notification hooks.
 *
 * Runs the shell commands configured for workflow events. Identifiers are
 * substituted into the command line; free text (the gate reason) is only
 * passed through the environment.
 *
 * @packageDocumentation
 */

import { execa } from 'execa';
import type { NotificationHook, NotificationHooks } from '../config/types.js';
import { createSilentLogger, type Logger } from '../utils/logger.js';
import type { PhaseId, StageId } from './ids.js';

export type HookEvent = 'gate' | 'complete' | 'escalation';

/**
 * Values available to a hook command.
 */
export interface HookVariables {
  readonly runId: string;
  readonly phase?: PhaseId;
  readonly stage?: StageId;
  readonly reason?: string;
  readonly timestamp: string;
}

const HOOK_TIMEOUT_MS = 5000;

/**
 * Replaces `{runId}`, `{phase}`, `{stage}` and `{timestamp}`.
 */
export function substituteVariables(command: string, variables: HookVariables): string {
  return command
    .replace(/\{runId\}/g, variables.runId)
    .replace(/\{phase\}/g, variables.phase ?? '')
    .replace(/\{stage\}/g, variables.stage ?? '')
    .replace(/\{timestamp\}/g, variables.timestamp);
}

/**
 * Environment passed to every hook.
 */
export function hookEnvironment(event: HookEvent, variables: HookVariables): Record<string, string> {
  return {
    THROUGHLINE_EVENT: event,
    THROUGHLINE_RUN_ID: variables.runId,
    THROUGHLINE_PHASE: variables.phase ?? '',
    THROUGHLINE_STAGE: variables.stage ?? '',
    THROUGHLINE_REASON: variables.reason ?? '',
    THROUGHLINE_TIMESTAMP: variables.timestamp,
  };
}

/**
 * Runs configured hooks. A failing hook is logged and never fails the run.
 */
export class NotificationHooksExecutor {
  private readonly hooks: NotificationHooks;
  private readonly cwd: string;
  private readonly logger: Logger;

  constructor(hooks: NotificationHooks, options: { cwd?: string; logger?: Logger } = {}) {
    this.hooks = hooks;
    this.cwd = options.cwd ?? process.cwd();
    this.logger = options.logger ?? createSilentLogger('NotificationHooks');
  }

  onGate(variables: HookVariables): Promise<boolean> {
    return this.execute('gate', this.hooks.on_gate, variables);
  }

  onComplete(variables: HookVariables): Promise<boolean> {
    return this.execute('complete', this.hooks.on_complete, variables);
  }

  onEscalation(variables: HookVariables): Promise<boolean> {
    return this.execute('escalation', this.hooks.on_escalation, variables);
  }

  private async execute(
    event: HookEvent,
    hook: NotificationHook | undefined,
    variables: HookVariables
  ): Promise<boolean> {
    if (hook === undefined || !hook.enabled || hook.command.trim() === '') {
      return false;
    }

    const result = await execa('sh', ['-c', substituteVariables(hook.command, variables)], {
      cwd: this.cwd,
      env: hookEnvironment(event, variables),
      reject: false,
      timeout: HOOK_TIMEOUT_MS,
    });

    if (result.failed) {
      this.logger.warn('hook_failed', {
        event,
        exitCode: result.exitCode ?? null,
        timedOut: result.timedOut,
        stderr: String(result.stderr).trim(),
      });
      return false;
    }
    this.logger.debug('hook_executed', { event });
    return true;
  }
}
