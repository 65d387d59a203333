/**
 * Structured outputs of each stage.
 *
 * Every output carries a required `summary` written by the producing stage;
 * downstream contexts use it instead of truncated prose. Outputs that
 * deliberately deviate from an anchor invariant say so in `overrides`.
 *
 * @packageDocumentation
 */

import type { AnchorCandidate, InvariantOverride } from '../anchor/types.js';
import type { CapabilityCategory } from '../store/types.js';
import type { StageId } from './ids.js';

export interface Overridable {
  /** Deliberate, justified deviations from anchor invariants. */
  readonly overrides?: readonly InvariantOverride[];
}

export interface IdeaAnalysis extends Overridable {
  readonly summary: string;
  readonly problem: string;
  readonly targetUsers: readonly string[];
  /** Feeds the design-mockups predicate. */
  readonly hasUserFacingInterface: boolean;
}

export type RiskLevel = 'low' | 'medium' | 'high';

export interface Risk {
  readonly risk: string;
  readonly severity: RiskLevel;
  readonly mitigation: string;
}

export interface RiskAssessment extends Overridable {
  readonly summary: string;
  /** Overall level; `high` enables the pivot-strategy stage. */
  readonly riskLevel: RiskLevel;
  readonly risks: readonly Risk[];
}

export interface PivotOption {
  readonly direction: string;
  readonly rationale: string;
}

export interface PivotStrategy extends Overridable {
  readonly summary: string;
  readonly pivots: readonly PivotOption[];
  readonly recommended: string;
}

export type Verdict = 'GO' | 'PIVOT' | 'NO-GO';

export interface ValidationVerdict extends Overridable {
  readonly summary: string;
  readonly verdict: Verdict;
  readonly rationale: string;
}

export interface ScopeBoundaries extends Overridable {
  readonly summary: string;
  readonly inScope: readonly string[];
  readonly outOfScope: readonly string[];
}

/**
 * Drafts name themselves with a batch-local `ref`; links may use refs from
 * the same output or IDs of current artifacts.
 */
export interface CapabilityDraft {
  readonly ref: string;
  readonly name: string;
  readonly description: string;
  readonly category: CapabilityCategory;
  readonly summary: string;
  readonly supersedes?: string;
}

export interface CapabilityModel extends Overridable {
  readonly summary: string;
  readonly capabilities: readonly CapabilityDraft[];
}

export interface SystemTrait {
  readonly name: string;
  readonly requirement: string;
}

export interface SystemTraits extends Overridable {
  readonly summary: string;
  readonly traits: readonly SystemTrait[];
}

export interface MockupScreen {
  readonly name: string;
  readonly purpose: string;
  readonly elements: readonly string[];
}

export interface DesignMockups extends Overridable {
  readonly summary: string;
  readonly screens: readonly MockupScreen[];
}

export interface DecisionDraft {
  readonly ref: string;
  readonly title: string;
  readonly decision: string;
  readonly rationale: string;
  readonly alternatives?: readonly string[];
  /** Capability IDs or refs. */
  readonly serves: readonly string[];
  readonly summary: string;
  readonly supersedes?: string;
}

export interface EntityDraft {
  readonly ref: string;
  readonly name: string;
  readonly description: string;
  readonly attributes: readonly string[];
  /** Decision IDs or refs. */
  readonly serves: readonly string[];
  readonly summary: string;
  readonly supersedes?: string;
}

export interface ArchitectureDecisions extends Overridable {
  readonly summary: string;
  readonly decisions: readonly DecisionDraft[];
  readonly entities: readonly EntityDraft[];
}

export interface WorkItemDraft {
  readonly ref: string;
  readonly title: string;
  readonly description: string;
  readonly acceptanceCriteria: readonly string[];
  /** Capability IDs. */
  readonly implements: readonly string[];
  /** Work item refs or IDs. */
  readonly dependsOn?: readonly string[];
  readonly summary: string;
  /** Current work item this one replaces. */
  readonly supersedes?: string;
}

export interface WorkItemBatch extends Overridable {
  readonly summary: string;
  readonly workItems: readonly WorkItemDraft[];
}

export interface WorkItemOrdering extends Overridable {
  readonly summary: string;
  /** Work item IDs, first to last. */
  readonly order: readonly string[];
  readonly rationale: string;
}

/**
 * Output data shape per stage.
 */
export interface StageDataByStage {
  'concept-anchor': AnchorCandidate;
  'idea-analysis': IdeaAnalysis;
  'risk-assessment': RiskAssessment;
  'pivot-strategy': PivotStrategy;
  'validation-verdict': ValidationVerdict;
  'scope-boundaries': ScopeBoundaries;
  'capability-model': CapabilityModel;
  'system-traits': SystemTraits;
  'design-mockups': DesignMockups;
  'architecture-decisions': ArchitectureDecisions;
  'work-item-generation': WorkItemBatch;
  'work-item-ordering': WorkItemOrdering;
}

/**
 * A finished stage result, tagged by stage.
 */
export type StageOutputOf<S extends StageId> = {
  readonly stage: S;
  readonly data: StageDataByStage[S];
  readonly attempt: number;
  readonly producedAt: string;
  /** Artifacts committed from this output. */
  readonly artifactIds: readonly string[];
};

type StageOutputMap = { [K in StageId]: StageOutputOf<K> };

/**
 * Output of any stage, discriminated by `stage`.
 */
export type StageOutput = StageOutputMap[StageId];

/**
 * Latest output per stage.
 */
export type StageOutputs = { [S in StageId]?: StageOutputOf<S> };

/**
 * Records an output as its stage's latest.
 */
export function setStageOutput<S extends StageId>(
  outputs: { [K in S]?: StageOutputOf<K> },
  output: StageOutputOf<S>
): void {
  outputs[output.stage] = output;
}

/**
 * Short summary of any stage output. The anchor candidate has no summary
 * field; its goal stands in.
 */
export function summaryOf(output: StageOutput): string {
  if (output.stage === 'concept-anchor') {
    return output.data.goal;
  }
  return output.data.summary;
}

type OverrideReader<S extends StageId> = (data: StageDataByStage[S]) => readonly InvariantOverride[];

const declared = (data: Overridable): readonly InvariantOverride[] => data.overrides ?? [];

const OVERRIDE_READERS: { [S in StageId]: OverrideReader<S> } = {
  'concept-anchor': () => [],
  'idea-analysis': declared,
  'risk-assessment': declared,
  'pivot-strategy': declared,
  'validation-verdict': declared,
  'scope-boundaries': declared,
  'capability-model': declared,
  'system-traits': declared,
  'design-mockups': declared,
  'architecture-decisions': declared,
  'work-item-generation': declared,
  'work-item-ordering': declared,
};

/**
 * Overrides declared by any stage output.
 */
export function overridesOf<S extends StageId>(output: StageOutputOf<S>): readonly InvariantOverride[] {
  const read = OVERRIDE_READERS[output.stage];
  return read(output.data);
}
