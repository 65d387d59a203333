/**
 * Workflow engine state types.
 *
 * A single versioned state object is passed by reference through the
 * engine and persisted in full after every transition.
 *
 * @packageDocumentation
 */

import type { AnchorCandidate, ClarificationSelection, ConceptAnchor } from '../anchor/types.js';
import type { ResolvedContext, ResolvedSpecification } from '../assembly/types.js';
import type { ArtifactStore } from '../store/store.js';
import type { ArtifactStoreData } from '../store/types.js';
import type { PhaseVerificationReport } from '../verification/types.js';
import type { PhaseId, StageId } from './ids.js';
import type { StageOutputs } from './outputs.js';

/**
 * Stage lifecycle. `skipped` marks a stage whose predicate was false; it
 * produced nothing and counts as not required downstream.
 */
export type StageStatus =
  | 'pending'
  | 'running'
  | 'completed'
  | 'blocked-on-approval'
  | 'failed'
  | 'skipped';

export type PhaseStatus = 'not-started' | 'in-progress' | 'awaiting-gate' | 'complete' | 'skipped';

export interface StageState {
  readonly status: StageStatus;
  /** Generation attempts made by the latest run. */
  readonly attempts: number;
  /** Re-runs triggered by blocking violations since the phase started. */
  readonly correctiveRetries: number;
  /** Corrective feedback for the next run. */
  readonly feedback: readonly string[];
  readonly skipReason?: string;
  readonly error?: string;
}

export interface PhaseState {
  readonly status: PhaseStatus;
  readonly report?: PhaseVerificationReport;
  /** Reason given when a human overrode an unmet entry condition. */
  readonly entryOverride?: string;
}

export type GateKind = 'anchor-review' | 'phase-review' | 'escalation' | 'entry-condition';

/**
 * An open suspension point awaiting a human decision.
 */
export interface GateState {
  readonly kind: GateKind;
  readonly phase: PhaseId;
  /** Stage that escalated, for escalation gates. */
  readonly stage?: StageId;
  readonly reason: string;
  /** Unmet condition, for entry-condition gates. */
  readonly condition?: string;
  /** Raw generation output shown for manual correction. */
  readonly rawOutput?: string;
  readonly openedAt: string;
}

/**
 * Acknowledgement of one violation, or of an unmet entry condition.
 */
export interface OverrideRequest {
  readonly invariant: string;
  readonly stage: StageId;
  readonly reason: string;
}

export type GateDecision =
  | { readonly type: 'approve' }
  | {
      readonly type: 'request-changes';
      readonly feedback: string;
      /** Stage to re-run. Defaults to the gate's stage, or the phase's last completed stage. */
      readonly stage?: StageId;
      /** Hand-corrected anchor, at anchor gates only. */
      readonly anchor?: AnchorCandidate;
    }
  | { readonly type: 'resolve-ambiguity'; readonly selections: readonly ClarificationSelection[] }
  | { readonly type: 'override-violation'; readonly acks: readonly OverrideRequest[] };

export type GateDecisionType = GateDecision['type'];

export interface GateDecisionRecord {
  readonly gate: GateKind;
  readonly phase: PhaseId;
  readonly decision: GateDecision;
  readonly decidedAt: string;
}

/**
 * Overall run status.
 *
 * - running: the engine is advancing.
 * - suspended: a gate is open.
 * - cancelled: an abort signal stopped the run; resumable.
 * - complete: the specification is assembled.
 */
export type RunStatus = 'running' | 'suspended' | 'cancelled' | 'complete';

export interface PipelineState {
  readonly version: string;
  readonly runId: string;
  readonly idea: string;
  status: RunStatus;
  /** Confirmed anchor. Frozen once set. */
  anchor: ConceptAnchor | null;
  /** Extracted anchor awaiting review. */
  anchorCandidate: AnchorCandidate | null;
  phases: Record<PhaseId, PhaseState>;
  stages: Record<StageId, StageState>;
  outputs: StageOutputs;
  /** Only the engine writes to the store. */
  store: ArtifactStore;
  gate: GateState | null;
  context: ResolvedContext | null;
  specification: ResolvedSpecification | null;
  /** Raw text kept for stages that predate structured output. */
  legacy: Partial<Record<StageId, string>>;
  decisions: GateDecisionRecord[];
  readonly createdAt: string;
  updatedAt: string;
}

/**
 * The state as written to disk.
 */
export type PersistedPipelineState = Omit<PipelineState, 'store'> & {
  readonly store: ArtifactStoreData;
  readonly persistedAt: string;
};
