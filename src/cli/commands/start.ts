/**
 * Start command: creates a run from an idea file.
 */

import * as path from 'node:path';
import { safeExists, safeReadFile } from '../../utils/safe-fs.js';
import { parseArgs } from '../args.js';
import { CliUsageError } from '../errors.js';
import { createEngine } from '../operations.js';
import type { CliCommandResult, CliContext } from '../types.js';
import { exitCodeFor, formatOutcome } from '../utils/display.js';

export async function handleStartCommand(context: CliContext): Promise<CliCommandResult> {
  const parsed = parseArgs(context.args);
  const ideaFile = parsed.positionals[0];
  if (ideaFile === undefined) {
    throw new CliUsageError('Name the idea file: throughline start <idea-file>');
  }

  const statePath = context.config.paths.state;
  if (!parsed.switches.has('force') && (await safeExists(statePath))) {
    throw new CliUsageError(`A run already exists at ${statePath}; pass --force to start over`);
  }

  const idea = await safeReadFile(path.resolve(context.projectRoot, ideaFile));
  const engine = await createEngine(context);
  const { state, outcome } = await engine.start(idea, context.signal);

  console.log(formatOutcome(outcome, state, context.config.paths.output));
  return { exitCode: exitCodeFor(outcome) };
}
