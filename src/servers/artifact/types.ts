/**
 * Types for the artifact MCP server.
 *
 * @packageDocumentation
 */

import type { ResolvedSpecification, ResolvedWorkItem } from '../../assembly/types.js';
import type { SchemaRegistry } from '../../generation/schema-registry.js';
import type { Artifact, ArtifactStatus, CapabilityArtifact } from '../../store/types.js';
import type { Logger } from '../../utils/logger.js';

/**
 * Names of the tools the server provides. All are read-only.
 */
export const ARTIFACT_TOOL_NAMES = [
  'get_specification',
  'get_work_item',
  'get_artifact',
  'list_uncovered',
] as const;

export type ArtifactToolName = (typeof ARTIFACT_TOOL_NAMES)[number];

export interface ArtifactServerConfig {
  /** Pipeline state file to serve from. Read again on every call. */
  readonly statePath: string;
  /** Defaults to the bundled schemas. */
  readonly registry?: SchemaRegistry;
  readonly debug?: boolean;
  readonly logger?: Logger;
}

export interface GetSpecificationResult {
  readonly runId: string;
  readonly specification: ResolvedSpecification;
}

export interface GetWorkItemResult {
  readonly runId: string;
  readonly workItem: ResolvedWorkItem;
}

export interface GetArtifactResult {
  readonly artifact: Artifact;
  readonly status: ArtifactStatus;
}

export interface ListUncoveredResult {
  readonly uncovered: readonly CapabilityArtifact[];
}

/**
 * The run has not produced a Resolved Specification yet.
 */
export class SpecificationUnavailableError extends Error {
  public readonly runStatus: string;

  constructor(runStatus: string) {
    super(`No resolved specification yet; the run is ${runStatus}`);
    this.name = 'SpecificationUnavailableError';
    this.runStatus = runStatus;
  }
}

export class WorkItemNotFoundError extends Error {
  public readonly workItemId: string;

  constructor(workItemId: string) {
    super(`Work item not found in the specification: '${workItemId}'`);
    this.name = 'WorkItemNotFoundError';
    this.workItemId = workItemId;
  }
}

/**
 * Tool arguments that do not match the tool's input schema.
 */
export class ToolArgumentError extends Error {
  public readonly tool: string;

  constructor(tool: string, message: string) {
    super(`Invalid arguments for ${tool}: ${message}`);
    this.name = 'ToolArgumentError';
    this.tool = tool;
  }
}
