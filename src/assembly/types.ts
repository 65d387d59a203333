/**
 * Resolved Context and Resolved Specification.
 *
 * Two shapes with different lifecycles: the context is input to work-item
 * generation and never contains work items; the specification is terminal
 * output and always has them (possibly none). Every reference is resolved
 * to the full artifact, so consumers never see a bare ID.
 *
 * @packageDocumentation
 */

import type { ConceptAnchor } from '../anchor/types.js';
import type {
  CapabilityArtifact,
  DecisionArtifact,
  EntityArtifact,
  WorkItemArtifact,
} from '../store/types.js';
import type { StageId } from '../workflow/ids.js';

/**
 * Raw text from an upstream stage that has no structured output.
 */
export interface LegacyPlaceholder {
  /** `LEGACY-<stage>`. */
  readonly id: string;
  readonly stage: StageId;
  readonly text: string;
  /** ISO date after which this fallback is refused. */
  readonly removeAfter: string;
}

export interface ResolvedDecision {
  readonly decision: DecisionArtifact;
  readonly serves: readonly CapabilityArtifact[];
}

export interface ResolvedEntity {
  readonly entity: EntityArtifact;
  readonly serves: readonly DecisionArtifact[];
}

export interface ResolvedContext {
  readonly anchor: ConceptAnchor;
  readonly capabilities: readonly CapabilityArtifact[];
  readonly decisions: readonly ResolvedDecision[];
  readonly entities: readonly ResolvedEntity[];
  /** Capabilities with no covering active decision. */
  readonly uncovered: readonly CapabilityArtifact[];
  readonly legacy: readonly LegacyPlaceholder[];
}

export interface ResolvedWorkItem {
  readonly workItem: WorkItemArtifact;
  readonly implements: readonly CapabilityArtifact[];
  readonly dependsOn: readonly WorkItemArtifact[];
  /** 1-based position in the final order. */
  readonly position: number;
}

export interface ResolvedSpecification extends ResolvedContext {
  readonly workItems: readonly ResolvedWorkItem[];
}
