/**
 * Phase and stage identifiers.
 *
 * @packageDocumentation
 */

/**
 * Phases in execution order. Each ends in a decision gate.
 */
export const PHASE_IDS = ['validation', 'scope', 'architecture', 'work-items'] as const;

export type PhaseId = (typeof PHASE_IDS)[number];

/**
 * Stages in execution order across all phases.
 */
export const STAGE_IDS = [
  'concept-anchor',
  'idea-analysis',
  'risk-assessment',
  'pivot-strategy',
  'validation-verdict',
  'scope-boundaries',
  'capability-model',
  'system-traits',
  'design-mockups',
  'architecture-decisions',
  'work-item-generation',
  'work-item-ordering',
] as const;

export type StageId = (typeof STAGE_IDS)[number];

const PHASE_ID_SET: ReadonlySet<string> = new Set(PHASE_IDS);
const STAGE_ID_SET: ReadonlySet<string> = new Set(STAGE_IDS);

/**
 * Type guard for phase identifiers.
 */
export function isPhaseId(value: unknown): value is PhaseId {
  return typeof value === 'string' && PHASE_ID_SET.has(value);
}

/**
 * Type guard for stage identifiers.
 */
export function isStageId(value: unknown): value is StageId {
  return typeof value === 'string' && STAGE_ID_SET.has(value);
}

/**
 * Display names for phases.
 */
export const PHASE_TITLES: Readonly<Record<PhaseId, string>> = {
  validation: 'Validation (WHY)',
  scope: 'Scope (WHAT)',
  architecture: 'Architecture (HOW)',
  'work-items': 'Work Items (STORIES)',
};

/**
 * Display names for stages.
 */
export const STAGE_TITLES: Readonly<Record<StageId, string>> = {
  'concept-anchor': 'Concept Anchor',
  'idea-analysis': 'Idea Analysis',
  'risk-assessment': 'Risk Assessment',
  'pivot-strategy': 'Pivot Strategy',
  'validation-verdict': 'Validation Verdict',
  'scope-boundaries': 'Scope Boundaries',
  'capability-model': 'Capability Model',
  'system-traits': 'System Traits',
  'design-mockups': 'Design Mockups',
  'architecture-decisions': 'Architecture Decisions',
  'work-item-generation': 'Work Item Generation',
  'work-item-ordering': 'Work Item Ordering',
};
