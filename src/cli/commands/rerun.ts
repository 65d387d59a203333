/**
 * Rerun command: re-enters a phase after upstream artifacts changed.
 */

import { PHASE_IDS, isPhaseId } from '../../workflow/ids.js';
import { parseArgs } from '../args.js';
import { CliUsageError } from '../errors.js';
import { createEngine, loadRunState } from '../operations.js';
import type { CliCommandResult, CliContext } from '../types.js';
import { exitCodeFor, formatOutcome } from '../utils/display.js';

export async function handleRerunCommand(context: CliContext): Promise<CliCommandResult> {
  const phase = parseArgs(context.args).positionals[0];
  if (phase === undefined || !isPhaseId(phase)) {
    throw new CliUsageError(`Name the phase to re-run: one of ${PHASE_IDS.join(', ')}`);
  }

  const state = await loadRunState(context);
  const engine = await createEngine(context);
  const outcome = await engine.rerunFrom(state, phase, context.signal);

  console.log(formatOutcome(outcome, state, context.config.paths.output));
  return { exitCode: exitCodeFor(outcome) };
}
