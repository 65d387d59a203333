/**
 * Resume command: answers the open gate, or continues a cancelled run.
 */

import type { ClarificationSelection } from '../../anchor/types.js';
import { isStageId } from '../../workflow/ids.js';
import type { GateDecision, OverrideRequest } from '../../workflow/types.js';
import { flagValue, flagValues, parseArgs, type ParsedArgs } from '../args.js';
import { CliUsageError } from '../errors.js';
import { createEngine, loadRunState } from '../operations.js';
import type { CliCommandResult, CliContext } from '../types.js';
import { exitCodeFor, formatOutcome } from '../utils/display.js';

const VALUE_FLAGS = ['feedback', 'stage', 'select', 'ack'];

/**
 * Parses `invariant=option`.
 */
export function parseSelection(text: string): ClarificationSelection {
  const equals = text.indexOf('=');
  const invariant = equals === -1 ? '' : text.slice(0, equals).trim();
  const option = equals === -1 ? '' : text.slice(equals + 1).trim();
  if (invariant === '' || option === '') {
    throw new CliUsageError(`--select takes <invariant>=<option>, got "${text}"`);
  }
  return { invariant, option };
}

/**
 * Parses `invariant:stage:reason`. The reason may itself contain colons.
 */
export function parseOverride(text: string): OverrideRequest {
  const [invariant = '', stage = '', ...rest] = text.split(':');
  const reason = rest.join(':').trim();
  if (invariant.trim() === '' || reason === '') {
    throw new CliUsageError(`--ack takes <invariant>:<stage>:<reason>, got "${text}"`);
  }
  const stageId = stage.trim();
  if (!isStageId(stageId)) {
    throw new CliUsageError(`Unknown stage "${stage}" in --ack`);
  }
  return { invariant: invariant.trim(), stage: stageId, reason };
}

/**
 * Builds a gate decision from `resume` arguments.
 */
export function parseDecision(name: string, parsed: ParsedArgs): GateDecision {
  switch (name) {
    case 'approve':
      return { type: 'approve' };
    case 'request-changes': {
      const feedback = flagValue(parsed, 'feedback');
      if (feedback === undefined || feedback.trim() === '') {
        throw new CliUsageError('request-changes needs --feedback <text>');
      }
      const stage = flagValue(parsed, 'stage');
      if (stage === undefined) {
        return { type: 'request-changes', feedback };
      }
      if (!isStageId(stage)) {
        throw new CliUsageError(`Unknown stage "${stage}"`);
      }
      return { type: 'request-changes', feedback, stage };
    }
    case 'resolve': {
      const selections = flagValues(parsed, 'select').map(parseSelection);
      if (selections.length === 0) {
        throw new CliUsageError('resolve needs at least one --select <invariant>=<option>');
      }
      return { type: 'resolve-ambiguity', selections };
    }
    case 'override': {
      const acks = flagValues(parsed, 'ack').map(parseOverride);
      if (acks.length === 0) {
        throw new CliUsageError('override needs at least one --ack <invariant>:<stage>:<reason>');
      }
      return { type: 'override-violation', acks };
    }
    default:
      throw new CliUsageError(
        `Unknown decision "${name}"; use approve, request-changes, resolve or override`
      );
  }
}

export async function handleResumeCommand(context: CliContext): Promise<CliCommandResult> {
  const parsed = parseArgs(context.args, VALUE_FLAGS);
  const name = parsed.positionals[0];
  const decision = name !== undefined ? parseDecision(name, parsed) : undefined;

  const state = await loadRunState(context);
  const engine = await createEngine(context);
  const outcome =
    decision !== undefined
      ? await engine.resume(state, decision, context.signal)
      : await engine.run(state, context.signal);

  console.log(formatOutcome(outcome, state, context.config.paths.output));
  return { exitCode: exitCodeFor(outcome) };
}
