/**
 * Declarative stage graph.
 *
 * Phases run in order; each lists its stages in order. A stage with a
 * `when` predicate runs only when the predicate holds over the accumulated
 * state; otherwise it is skipped, produces nothing and counts as not
 * required downstream.
 *
 * @packageDocumentation
 */

import type { Config } from '../config/types.js';
import { isDiffEmpty, needsWorkItems, type Diff } from '../diff/diff.js';
import { PHASE_IDS, type PhaseId, type StageId } from './ids.js';
import type { PipelineState } from './types.js';

/**
 * What predicates and entry conditions read.
 */
export interface PredicateView {
  readonly state: PipelineState;
  readonly diff: Diff;
  readonly config: Config;
}

export type StagePredicate = (view: PredicateView) => boolean;

export const and =
  (...predicates: readonly StagePredicate[]): StagePredicate =>
  (view) =>
    predicates.every((predicate) => predicate(view));

export const or =
  (...predicates: readonly StagePredicate[]): StagePredicate =>
  (view) =>
    predicates.some((predicate) => predicate(view));

export const not =
  (predicate: StagePredicate): StagePredicate =>
  (view) =>
    !predicate(view);

export const riskIsHigh: StagePredicate = ({ state }) =>
  state.outputs['risk-assessment']?.data.riskLevel === 'high';

export const hasUserFacingInterface: StagePredicate = ({ state }) =>
  state.outputs['idea-analysis']?.data.hasUserFacingInterface === true;

export const designIntegrationEnabled: StagePredicate = ({ config }) =>
  config.workflow.design_integration;

export const diffIsEmpty: StagePredicate = ({ diff }) => isDiffEmpty(diff);

export const workItemsNeeded: StagePredicate = ({ diff }) => needsWorkItems(diff);

export const hasPriorOutput =
  (stage: StageId): StagePredicate =>
  ({ state }) =>
    state.outputs[stage] !== undefined;

export const stageSkipped =
  (stage: StageId): StagePredicate =>
  ({ state }) =>
    state.stages[stage].status === 'skipped';

export interface StageNode {
  readonly stage: StageId;
  readonly when?: StagePredicate;
  /** Recorded on the stage when `when` is false. */
  readonly skipReason?: string;
}

/**
 * A prerequisite checked before a phase's first stage runs.
 */
export interface EntryCondition {
  readonly id: string;
  readonly description: string;
  readonly check: StagePredicate;
  /** Stage re-run when the human asks for changes at the entry gate. */
  readonly remedyStage: StageId;
}

export interface PhaseNode {
  readonly phase: PhaseId;
  readonly stages: readonly StageNode[];
  readonly entry?: EntryCondition;
}

/**
 * @example
 * ```typescript
 * WORKFLOW_GRAPH.find((node) => node.phase === 'architecture')?.stages[0]?.stage; // 'design-mockups'
 * ```
 */
export const WORKFLOW_GRAPH: readonly PhaseNode[] = [
  {
    phase: 'validation',
    stages: [
      { stage: 'concept-anchor' },
      { stage: 'idea-analysis' },
      { stage: 'risk-assessment' },
      {
        stage: 'pivot-strategy',
        when: riskIsHigh,
        skipReason: 'risk level is not high',
      },
      { stage: 'validation-verdict' },
    ],
  },
  {
    phase: 'scope',
    entry: {
      id: 'verdict-go-or-pivot',
      description: 'the validation verdict is GO or PIVOT',
      check: ({ state }) => {
        const verdict = state.outputs['validation-verdict']?.data.verdict;
        return verdict === 'GO' || verdict === 'PIVOT';
      },
      remedyStage: 'validation-verdict',
    },
    stages: [{ stage: 'scope-boundaries' }, { stage: 'capability-model' }, { stage: 'system-traits' }],
  },
  {
    phase: 'architecture',
    entry: {
      id: 'has-capabilities',
      description: 'at least one active capability exists',
      check: ({ state }) => state.store.current('capability').length > 0,
      remedyStage: 'capability-model',
    },
    stages: [
      {
        stage: 'design-mockups',
        when: and(hasUserFacingInterface, designIntegrationEnabled),
        skipReason: 'no user-facing interface or design integration disabled',
      },
      {
        stage: 'architecture-decisions',
        when: not(and(diffIsEmpty, hasPriorOutput('architecture-decisions'))),
        skipReason: 'diff is empty; prior decisions reused',
      },
    ],
  },
  {
    phase: 'work-items',
    entry: {
      id: 'all-capabilities-covered',
      description: 'every active capability is served by a decision',
      check: ({ diff }) => diff.uncovered.length === 0,
      remedyStage: 'architecture-decisions',
    },
    stages: [
      {
        stage: 'work-item-generation',
        when: or(workItemsNeeded, not(hasPriorOutput('work-item-generation'))),
        skipReason: 'no capability needs work items; prior work items reused',
      },
      {
        stage: 'work-item-ordering',
        when: or(
          not(stageSkipped('work-item-generation')),
          not(hasPriorOutput('work-item-ordering'))
        ),
        skipReason: 'work items unchanged; prior ordering reused',
      },
    ],
  },
];

const NODES = new Map(WORKFLOW_GRAPH.map((node) => [node.phase, node]));

export function phaseNode(phase: PhaseId): PhaseNode {
  const node = NODES.get(phase);
  if (node === undefined) {
    throw new Error(`No graph node for phase '${phase}'`);
  }
  return node;
}

/**
 * Stages of each phase, in order.
 */
export const PHASE_STAGES: Readonly<Record<PhaseId, readonly StageId[]>> = {
  validation: phaseNode('validation').stages.map((node) => node.stage),
  scope: phaseNode('scope').stages.map((node) => node.stage),
  architecture: phaseNode('architecture').stages.map((node) => node.stage),
  'work-items': phaseNode('work-items').stages.map((node) => node.stage),
};

const STAGE_PHASE = new Map<StageId, PhaseId>(
  PHASE_IDS.flatMap((phase) => PHASE_STAGES[phase].map((stage): [StageId, PhaseId] => [stage, phase]))
);

/**
 * Phase a stage belongs to.
 */
export function phaseOf(stage: StageId): PhaseId {
  const phase = STAGE_PHASE.get(stage);
  if (phase === undefined) {
    throw new Error(`Stage '${stage}' is not in the workflow graph`);
  }
  return phase;
}

/**
 * Phase after the given one, or undefined after the last.
 */
export function nextPhase(phase: PhaseId): PhaseId | undefined {
  return PHASE_IDS[PHASE_IDS.indexOf(phase) + 1];
}

/**
 * Stages of a phase and all later phases.
 */
export function stagesFrom(phase: PhaseId): StageId[] {
  return PHASE_IDS.slice(PHASE_IDS.indexOf(phase)).flatMap((id) => [...PHASE_STAGES[id]]);
}
