/**
 * Assemble command: builds the Resolved Specification from the current store.
 *
 * Works on unfinished runs too, so a human can read the plan so far.
 */

import * as path from 'node:path';
import { assembleSpecification, serializeSpecification } from '../../assembly/assembler.js';
import { renderSpecificationMarkdown } from '../../assembly/markdown.js';
import { writeFileAtomic } from '../../utils/safe-fs.js';
import { flagValue, parseArgs } from '../args.js';
import { CliUsageError } from '../errors.js';
import { loadRunState } from '../operations.js';
import type { CliCommandResult, CliContext } from '../types.js';

export async function handleAssembleCommand(context: CliContext): Promise<CliCommandResult> {
  const parsed = parseArgs(context.args, ['format', 'output']);
  const format = flagValue(parsed, 'format') ?? 'json';
  if (format !== 'json' && format !== 'markdown') {
    throw new CliUsageError(`Unknown format "${format}"; use json or markdown`);
  }

  const state = await loadRunState(context);
  if (state.anchor === null) {
    throw new CliUsageError('The concept anchor is not confirmed yet; nothing to assemble');
  }

  const specification = assembleSpecification(
    state.store,
    state.anchor,
    state.outputs['work-item-ordering']?.data.order ?? [],
    {
      legacy: state.legacy,
      legacyUntil: context.config.workflow.legacy_fallback_until,
      logger: context.logger.child('SpecificationAssembler'),
      ...(context.now !== undefined ? { now: context.now() } : {}),
    }
  );
  const text =
    format === 'json' ? serializeSpecification(specification) : `${renderSpecificationMarkdown(specification)}\n`;

  const output = flagValue(parsed, 'output');
  if (output === undefined) {
    process.stdout.write(text);
    return { exitCode: 0 };
  }
  const target = path.resolve(context.projectRoot, output);
  await writeFileAtomic(target, text);
  return { exitCode: 0, message: `Specification written to ${target}` };
}
