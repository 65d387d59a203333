/**
 * Construction and small updates of the pipeline state.
 *
 * @packageDocumentation
 */

import { randomUUID } from 'node:crypto';
import { ArtifactStore } from '../store/store.js';
import { PHASE_IDS, STAGE_IDS, type PhaseId, type StageId } from './ids.js';
import type { PhaseState, PipelineState, StageState } from './types.js';

/**
 * Version of the persisted state layout.
 */
export const PIPELINE_STATE_VERSION = '1.0.0';

export const PENDING_STAGE: StageState = {
  status: 'pending',
  attempts: 0,
  correctiveRetries: 0,
  feedback: [],
};

export const NOT_STARTED_PHASE: PhaseState = { status: 'not-started' };

export interface CreateStateOptions {
  readonly runId?: string;
  readonly now?: Date;
  readonly store?: ArtifactStore;
}

/**
 * A fresh state for an idea: every phase not started, every stage pending.
 */
export function createInitialState(idea: string, options: CreateStateOptions = {}): PipelineState {
  const timestamp = (options.now ?? new Date()).toISOString();
  const phases: Record<PhaseId, PhaseState> = {
    validation: NOT_STARTED_PHASE,
    scope: NOT_STARTED_PHASE,
    architecture: NOT_STARTED_PHASE,
    'work-items': NOT_STARTED_PHASE,
  };
  const stages: Record<StageId, StageState> = {
    'concept-anchor': PENDING_STAGE,
    'idea-analysis': PENDING_STAGE,
    'risk-assessment': PENDING_STAGE,
    'pivot-strategy': PENDING_STAGE,
    'validation-verdict': PENDING_STAGE,
    'scope-boundaries': PENDING_STAGE,
    'capability-model': PENDING_STAGE,
    'system-traits': PENDING_STAGE,
    'design-mockups': PENDING_STAGE,
    'architecture-decisions': PENDING_STAGE,
    'work-item-generation': PENDING_STAGE,
    'work-item-ordering': PENDING_STAGE,
  };

  return {
    version: PIPELINE_STATE_VERSION,
    runId: options.runId ?? randomUUID(),
    idea,
    status: 'running',
    anchor: null,
    anchorCandidate: null,
    phases,
    stages,
    outputs: {},
    store: options.store ?? new ArtifactStore(),
    gate: null,
    context: null,
    specification: null,
    legacy: {},
    decisions: [],
    createdAt: timestamp,
    updatedAt: timestamp,
  };
}

/**
 * First phase that is neither complete nor skipped.
 */
export function currentPhase(state: PipelineState): PhaseId | undefined {
  return PHASE_IDS.find((phase) => {
    const status = state.phases[phase].status;
    return status !== 'complete' && status !== 'skipped';
  });
}

/**
 * Stages whose latest run failed.
 */
export function failedStages(state: PipelineState): StageId[] {
  return STAGE_IDS.filter((stage) => state.stages[stage].status === 'failed');
}
