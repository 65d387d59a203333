/**
 * Context Assembler.
 *
 * @packageDocumentation
 */

export {
  artifactLine,
  assembleStageContext,
  estimateTokens,
  renderOutputDigest,
} from './assembler.js';
export type { ContextSection, StageContext, StageContextInput } from './assembler.js';
export { STAGE_SCOPES } from './scope.js';
export type { ArtifactSelection, StageScope } from './scope.js';
