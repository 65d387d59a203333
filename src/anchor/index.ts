/**
 * Concept Anchor: extraction, clarification, confirmation and rendering.
 *
 * @packageDocumentation
 */

export type {
  AnchorCandidate,
  AnchorInvariant,
  AnchorValidationIssue,
  AnchorValidationResult,
  ClarificationSelection,
  ConceptAnchor,
  IdentityFeature,
  InvariantOverride,
} from './types.js';
export {
  MAX_CLARIFICATION_OPTIONS,
  MIN_CLARIFICATION_OPTIONS,
  formatAnchorIssues,
  validateAnchor,
  validateOverrides,
} from './validate.js';
export { confirmAnchor, getAmbiguousInvariants, resolveAmbiguity } from './clarification.js';
export { ANCHOR_HEADING, formatAmbiguities, formatAnchorContext } from './format.js';
export { ANCHOR_INSTRUCTION, extractAnchor } from './extractor.js';
export type { AnchorExtractionResult, ExtractAnchorOptions } from './extractor.js';
