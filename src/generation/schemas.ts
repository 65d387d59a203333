/**
 * Schema names and the data type each one validates.
 *
 * @packageDocumentation
 */

import type { StageDataByStage } from '../workflow/outputs.js';
import type { StageId } from '../workflow/ids.js';
import type { PersistedPipelineState } from '../workflow/types.js';
import type { VerificationFindings } from '../verification/types.js';

export const SCHEMA_NAMES = [
  'concept-anchor',
  'idea-analysis',
  'risk-assessment',
  'pivot-strategy',
  'validation-verdict',
  'scope-boundaries',
  'capabilities',
  'system-traits',
  'design-mockups',
  'architecture-decisions',
  'work-items',
  'work-item-ordering',
  'verification-findings',
  'pipeline-state',
] as const;

export type SchemaName = (typeof SCHEMA_NAMES)[number];

/**
 * Data type guaranteed by each schema.
 */
export interface SchemaTypes {
  'concept-anchor': StageDataByStage['concept-anchor'];
  'idea-analysis': StageDataByStage['idea-analysis'];
  'risk-assessment': StageDataByStage['risk-assessment'];
  'pivot-strategy': StageDataByStage['pivot-strategy'];
  'validation-verdict': StageDataByStage['validation-verdict'];
  'scope-boundaries': StageDataByStage['scope-boundaries'];
  capabilities: StageDataByStage['capability-model'];
  'system-traits': StageDataByStage['system-traits'];
  'design-mockups': StageDataByStage['design-mockups'];
  'architecture-decisions': StageDataByStage['architecture-decisions'];
  'work-items': StageDataByStage['work-item-generation'];
  'work-item-ordering': StageDataByStage['work-item-ordering'];
  'verification-findings': VerificationFindings;
  'pipeline-state': PersistedPipelineState;
}

/**
 * Output schema of each stage.
 */
export const STAGE_SCHEMAS = {
  'concept-anchor': 'concept-anchor',
  'idea-analysis': 'idea-analysis',
  'risk-assessment': 'risk-assessment',
  'pivot-strategy': 'pivot-strategy',
  'validation-verdict': 'validation-verdict',
  'scope-boundaries': 'scope-boundaries',
  'capability-model': 'capabilities',
  'system-traits': 'system-traits',
  'design-mockups': 'design-mockups',
  'architecture-decisions': 'architecture-decisions',
  'work-item-generation': 'work-items',
  'work-item-ordering': 'work-item-ordering',
} as const satisfies Record<StageId, SchemaName>;

/**
 * Schema of a stage, typed so the validated data is the stage's data.
 */
export type StageSchema<S extends StageId> = (typeof STAGE_SCHEMAS)[S];
