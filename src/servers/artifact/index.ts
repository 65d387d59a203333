/**
 * Artifact server MCP package.
 *
 * Serves the Resolved Specification and stored artifacts to execution
 * agents, read-only.
 *
 * @packageDocumentation
 */

export { ARTIFACT_TOOLS, createArtifactServer, startArtifactServer } from './server.js';
export {
  ARTIFACT_TOOL_NAMES,
  SpecificationUnavailableError,
  ToolArgumentError,
  WorkItemNotFoundError,
  type ArtifactServerConfig,
  type ArtifactToolName,
  type GetArtifactResult,
  type GetSpecificationResult,
  type GetWorkItemResult,
  type ListUncoveredResult,
} from './types.js';
