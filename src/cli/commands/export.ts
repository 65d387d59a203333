/**
 * Export command: pushes the work items of a completed run to the tracker file.
 */

import * as path from 'node:path';
import { exportToTracker } from '../../tracker/export.js';
import { FileTracker } from '../../tracker/file-tracker.js';
import { flagValue, parseArgs } from '../args.js';
import { CliUsageError } from '../errors.js';
import { loadRunState } from '../operations.js';
import type { CliCommandResult, CliContext } from '../types.js';

export async function handleExportCommand(context: CliContext): Promise<CliCommandResult> {
  const parsed = parseArgs(context.args, ['tracker']);
  const state = await loadRunState(context);
  if (state.specification === null) {
    throw new CliUsageError(`Only a completed run can be exported; the run is ${state.status}`);
  }

  const trackerFlag = flagValue(parsed, 'tracker');
  const trackerPath =
    trackerFlag !== undefined ? path.resolve(context.projectRoot, trackerFlag) : context.config.paths.tracker;
  const tracker = new FileTracker(trackerPath, context.now !== undefined ? { now: context.now } : {});

  const result = await exportToTracker(state.specification, tracker, {
    plain: parsed.switches.has('plain-labels'),
    omitAcceptanceCriteria: parsed.switches.has('no-criteria'),
    logger: context.logger.child('TrackerExport'),
  });

  const lines = [
    `Exported to ${trackerPath}: ${String(result.created.length)} created, ${String(result.skipped.length)} already tracked`,
    ...result.skipped.map((item) => `  ${item.id}: ${item.status}`),
  ];
  return { exitCode: 0, message: lines.join('\n') };
}
