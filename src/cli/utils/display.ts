/**
 * Plain-text rendering of run state and outcomes.
 */

import { PHASE_IDS, PHASE_TITLES, STAGE_TITLES } from '../../workflow/ids.js';
import type { ArtifactType } from '../../store/types.js';
import type { RunOutcome } from '../../workflow/engine.js';
import { failedStages } from '../../workflow/state.js';
import type { GateKind, GateState, PipelineState } from '../../workflow/types.js';

const NEXT_STEPS: Readonly<Record<GateKind, readonly string[]>> = {
  'anchor-review': [
    'throughline resume approve',
    'throughline resume resolve --select <invariant>=<option>',
    'throughline resume request-changes --feedback <text>',
  ],
  'phase-review': [
    'throughline resume approve',
    'throughline resume request-changes --feedback <text> [--stage <stage>]',
    'throughline resume override --ack <invariant>:<stage>:<reason>',
  ],
  escalation: [
    'throughline resume approve              (retry the stage)',
    'throughline resume request-changes --feedback <text>',
  ],
  'entry-condition': ['throughline resume override --ack <condition>:<stage>:<reason>'],
};

/**
 * Clarification choices still open on the anchor candidate, one line each.
 */
export function formatClarifications(state: PipelineState): string[] {
  const invariants = state.anchorCandidate?.invariants ?? [];
  return invariants
    .filter((invariant) => invariant.userConfirmed !== true && (invariant.clarificationOptions?.length ?? 0) > 0)
    .map((invariant) => `  ${invariant.property}: ${(invariant.clarificationOptions ?? []).join(' | ')}`);
}

export function formatGate(gate: GateState, state: PipelineState): string {
  const lines = [`Waiting at ${gate.kind} gate (${PHASE_TITLES[gate.phase]}): ${gate.reason}`];
  if (gate.stage !== undefined) {
    lines.push(`Stage: ${STAGE_TITLES[gate.stage]}`);
  }
  if (gate.kind === 'anchor-review') {
    const clarifications = formatClarifications(state);
    if (clarifications.length > 0) {
      lines.push('Ambiguous invariants:', ...clarifications);
    }
  }
  lines.push('Next:', ...NEXT_STEPS[gate.kind].map((step) => `  ${step}`));
  return lines.join('\n');
}

export function formatOutcome(outcome: RunOutcome, state: PipelineState, outputPath: string): string {
  switch (outcome.status) {
    case 'complete':
      return [
        `Run complete: ${String(outcome.specification.workItems.length)} work item(s) in the resolved specification`,
        `Written to ${outputPath}`,
      ].join('\n');
    case 'cancelled':
      return 'Run cancelled; continue with "throughline resume"';
    case 'suspended':
      return outcome.error !== undefined
        ? `${formatGate(outcome.gate, state)}\nError: ${outcome.error.message}`
        : formatGate(outcome.gate, state);
  }
}

/**
 * Multi-line status report.
 */
export function formatStatus(state: PipelineState): string {
  const lines = [`Run ${state.runId}: ${state.status}`, `Updated: ${state.updatedAt}`, '', 'Phases:'];
  for (const phase of PHASE_IDS) {
    const phaseState = state.phases[phase];
    const override = phaseState.entryOverride !== undefined ? ' (entry overridden)' : '';
    lines.push(`  ${PHASE_TITLES[phase]}: ${phaseState.status}${override}`);
  }

  const failed = failedStages(state);
  if (failed.length > 0) {
    lines.push('', 'Failed stages:');
    for (const stage of failed) {
      lines.push(`  ${STAGE_TITLES[stage]}: ${state.stages[stage].error ?? 'unknown error'}`);
    }
  }

  const count = (type: ArtifactType): number =>
    state.store.current(type).length;
  lines.push(
    '',
    `Artifacts: ${String(count('capability'))} capabilities, ${String(count('decision'))} decisions, ` +
      `${String(count('entity'))} entities, ${String(count('work-item'))} work items`
  );

  if (state.gate !== null) {
    lines.push('', formatGate(state.gate, state));
  }
  return lines.join('\n');
}

/**
 * Exit code for a run outcome: 0 at a gate or when complete, 2 when a
 * stage escalated with an error, 130 when cancelled.
 */
export function exitCodeFor(outcome: RunOutcome): number {
  if (outcome.status === 'cancelled') {
    return 130;
  }
  return outcome.status === 'suspended' && outcome.error !== undefined ? 2 : 0;
}
