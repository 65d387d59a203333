/**
 * Status command: phase progress, open gate and artifact counts.
 */

import { parseArgs } from '../args.js';
import { loadRunState } from '../operations.js';
import type { CliCommandResult, CliContext } from '../types.js';
import { formatStatus } from '../utils/display.js';

export async function handleStatusCommand(context: CliContext): Promise<CliCommandResult> {
  const parsed = parseArgs(context.args);
  const state = await loadRunState(context);

  if (parsed.switches.has('json')) {
    console.log(
      JSON.stringify(
        {
          runId: state.runId,
          status: state.status,
          phases: state.phases,
          gate: state.gate,
          updatedAt: state.updatedAt,
        },
        null,
        2
      )
    );
  } else {
    console.log(formatStatus(state));
  }
  return { exitCode: 0 };
}
