/**
 * Diff command: what needs attention in the stored artifacts.
 */

import { diffFromStore, formatDiffContext, summarizeDiff } from '../../diff/diff.js';
import { parseArgs } from '../args.js';
import { loadRunState } from '../operations.js';
import type { CliCommandResult, CliContext } from '../types.js';

export async function handleDiffCommand(context: CliContext): Promise<CliCommandResult> {
  const parsed = parseArgs(context.args);
  const diff = diffFromStore((await loadRunState(context)).store);

  if (parsed.switches.has('json')) {
    console.log(JSON.stringify(diff, null, 2));
  } else {
    console.log(`${formatDiffContext(diff)}\n\n${summarizeDiff(diff)}`);
  }
  return { exitCode: 0 };
}
