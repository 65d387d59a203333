/**
 * Generation instruction per stage.
 *
 * Stages that write artifacts see the current ones with their IDs and emit
 * only new artifacts or revisions; a revision names the replaced ID in
 * `supersedes`.
 *
 * @packageDocumentation
 */

import { ANCHOR_INSTRUCTION } from '../anchor/extractor.js';
import type { StageId } from './ids.js';

const INCREMENTAL =
  'Existing artifacts are listed with their IDs. Emit only new artifacts and revisions; a revision names the ID it replaces in "supersedes". Never repeat an unchanged artifact.';

const OVERRIDES =
  'If the output must deviate from an anchor invariant, record the deviation in "overrides" with the reason and the user impact.';

export const STAGE_INSTRUCTIONS: Readonly<Record<StageId, string>> = {
  'concept-anchor': ANCHOR_INSTRUCTION,
  'idea-analysis': [
    'Analyse the original request: the problem it solves and who it is for.',
    'Say whether the product has a user-facing interface.',
    OVERRIDES,
  ].join('\n'),
  'risk-assessment': [
    'Assess the risks of building this product as the anchor describes it.',
    'Rate each risk and the overall level low, medium or high, with a mitigation per risk.',
    OVERRIDES,
  ].join('\n'),
  'pivot-strategy': [
    'The risk level is high. Propose pivots that keep every anchor invariant and recommend one.',
    OVERRIDES,
  ].join('\n'),
  'validation-verdict': [
    'Give a verdict: GO, PIVOT or NO-GO, with the rationale.',
    OVERRIDES,
  ].join('\n'),
  'scope-boundaries': [
    'List what is in scope and what is out of scope. The anchor non-goals are always out of scope.',
    OVERRIDES,
  ].join('\n'),
  'capability-model': [
    'List the capabilities the product needs, each with a short summary and a category.',
    'Keep the identity features of the anchor; do not replace them with generic equivalents.',
    INCREMENTAL,
    OVERRIDES,
  ].join('\n'),
  'system-traits': [
    'List the system traits (performance, privacy, availability and the like) the capabilities require.',
    OVERRIDES,
  ].join('\n'),
  'design-mockups': [
    'Describe the screens of the user-facing interface and the elements on each.',
    OVERRIDES,
  ].join('\n'),
  'architecture-decisions': [
    'Record architecture decisions that serve the listed capabilities, and the entities each decision needs.',
    'Every capability needing a decision must be served by at least one decision. Revise decisions flagged as needing revision.',
    INCREMENTAL,
    OVERRIDES,
  ].join('\n'),
  'work-item-generation': [
    'Write work items for the listed capabilities. Each names the capability IDs it implements and has acceptance criteria.',
    'Replace work items flagged as needing revision.',
    INCREMENTAL,
    OVERRIDES,
  ].join('\n'),
  'work-item-ordering': [
    'Order every listed work item so that dependencies come first. Use the work item IDs.',
    OVERRIDES,
  ].join('\n'),
};
