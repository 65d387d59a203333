/**
 * Resolved Specification Assembler.
 *
 * @packageDocumentation
 */

export {
  LegacyFallbackExpiredError,
  assembleContext,
  assembleSpecification,
  attachWorkItems,
  compareArtifactIds,
  serializeSpecification,
} from './assembler.js';
export type { AssembleContextOptions } from './assembler.js';
export { renderSpecificationMarkdown } from './markdown.js';
export type {
  LegacyPlaceholder,
  ResolvedContext,
  ResolvedDecision,
  ResolvedEntity,
  ResolvedSpecification,
  ResolvedWorkItem,
} from './types.js';
