/**
 * What each stage reads from upstream.
 *
 * @packageDocumentation
 */

import type { StageId } from '../workflow/ids.js';

/**
 * Artifact selections a stage can ask for.
 *
 * - `capabilities`: every current capability.
 * - `capabilities-needing-decisions`: uncovered capabilities.
 * - `capabilities-needing-work-items`: covered capabilities with no work item.
 * - `decisions`: current decisions, affected ones flagged.
 * - `decisions-for-work`: decisions serving capabilities that need work items.
 * - `entities`: current entities, affected ones flagged.
 * - `work-items`: current work items.
 */
export type ArtifactSelection =
  | 'capabilities'
  | 'capabilities-needing-decisions'
  | 'capabilities-needing-work-items'
  | 'decisions'
  | 'decisions-for-work'
  | 'entities'
  | 'work-items';

export interface StageScope {
  /** Upstream stages whose summaries are included, nearest first. */
  readonly upstream: readonly StageId[];
  readonly artifacts: readonly ArtifactSelection[];
  /** Include the diff section. */
  readonly diff: boolean;
}

export const STAGE_SCOPES: Readonly<Record<StageId, StageScope>> = {
  'concept-anchor': { upstream: [], artifacts: [], diff: false },
  'idea-analysis': { upstream: [], artifacts: [], diff: false },
  'risk-assessment': { upstream: ['idea-analysis'], artifacts: [], diff: false },
  'pivot-strategy': { upstream: ['risk-assessment', 'idea-analysis'], artifacts: [], diff: false },
  'validation-verdict': {
    upstream: ['pivot-strategy', 'risk-assessment', 'idea-analysis'],
    artifacts: [],
    diff: false,
  },
  'scope-boundaries': {
    upstream: ['validation-verdict', 'pivot-strategy', 'idea-analysis'],
    artifacts: [],
    diff: false,
  },
  'capability-model': {
    upstream: ['scope-boundaries', 'validation-verdict', 'idea-analysis'],
    artifacts: ['capabilities'],
    diff: false,
  },
  'system-traits': {
    upstream: ['capability-model', 'scope-boundaries'],
    artifacts: ['capabilities'],
    diff: false,
  },
  'design-mockups': {
    upstream: ['capability-model', 'scope-boundaries', 'idea-analysis'],
    artifacts: ['capabilities'],
    diff: false,
  },
  'architecture-decisions': {
    upstream: ['design-mockups', 'system-traits', 'capability-model', 'scope-boundaries'],
    artifacts: ['capabilities-needing-decisions', 'decisions', 'entities'],
    diff: true,
  },
  'work-item-generation': {
    upstream: ['architecture-decisions', 'system-traits', 'capability-model'],
    artifacts: ['capabilities-needing-work-items', 'decisions-for-work', 'work-items'],
    diff: true,
  },
  'work-item-ordering': {
    upstream: ['work-item-generation', 'architecture-decisions'],
    artifacts: ['work-items'],
    diff: false,
  },
};
