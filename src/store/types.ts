/**
 * Type definitions for the structured artifact store.
 *
 * Artifacts live in an append-only arena indexed by ID. Supersession is a
 * separate link table, so the stored content of an artifact never changes;
 * the `supersededBy` field seen by readers is composed from that table.
 *
 * @packageDocumentation
 */

import type { InvariantOverride } from '../anchor/types.js';
import type { PhaseId, StageId } from '../workflow/ids.js';

/**
 * Kinds of structured artifact.
 */
export type ArtifactType = 'capability' | 'decision' | 'entity' | 'work-item';

/**
 * Valid artifact types.
 */
export const ARTIFACT_TYPES: readonly ArtifactType[] = [
  'capability',
  'decision',
  'entity',
  'work-item',
] as const;

/**
 * ID prefixes minted per artifact type.
 */
export const ARTIFACT_ID_PREFIXES: Readonly<Record<ArtifactType, string>> = {
  capability: 'CAP',
  decision: 'DEC',
  entity: 'ENT',
  'work-item': 'WI',
};

export type CapabilityCategory = 'functional' | 'non-functional' | 'operational';

export interface CapabilityFields {
  readonly name: string;
  readonly description: string;
  readonly category: CapabilityCategory;
}

export interface DecisionFields {
  readonly title: string;
  readonly decision: string;
  readonly rationale: string;
  readonly alternatives?: readonly string[];
}

export interface EntityFields {
  readonly name: string;
  readonly description: string;
  readonly attributes: readonly string[];
}

export interface WorkItemFields {
  readonly title: string;
  readonly description: string;
  readonly acceptanceCriteria: readonly string[];
  /** IDs of work items that must be done first. */
  readonly dependsOn: readonly string[];
}

/**
 * Type-specific field shapes.
 */
export interface ArtifactFieldsByType {
  capability: CapabilityFields;
  decision: DecisionFields;
  entity: EntityFields;
  'work-item': WorkItemFields;
}

/**
 * Where an artifact came from.
 */
export interface Provenance {
  readonly stage: StageId;
  /** Attempt of the producing stage (1-based). */
  readonly attempt: number;
  /** True for partial results kept after a cancelled stage. */
  readonly incomplete: boolean;
}

/**
 * Immutable stored content of an artifact.
 */
export type ArtifactRecordOf<T extends ArtifactType> = {
  readonly id: string;
  readonly type: T;
  readonly fields: ArtifactFieldsByType[T];
  /** Short structured summary used in downstream contexts. */
  readonly summary: string;
  /** Artifacts this one satisfies: capabilities for decisions, decisions for entities. */
  readonly serves: readonly string[];
  /** Capabilities a work item implements. */
  readonly implements: readonly string[];
  /** ID of the artifact this one replaced. */
  readonly supersedes?: string;
  readonly sourcePhase: PhaseId;
  readonly createdAt: string;
  readonly provenance: Provenance;
  readonly overrides?: readonly InvariantOverride[];
};

export type ArtifactRecord = { [T in ArtifactType]: ArtifactRecordOf<T> }[ArtifactType];

/**
 * An artifact as seen by readers: stored content plus its supersession link.
 */
export type Artifact = ArtifactRecord & {
  /** Set once and never cleared. */
  readonly supersededBy: string | null;
};

export type ArtifactOfType<T extends ArtifactType> = Extract<Artifact, { type: T }>;
export type CapabilityArtifact = ArtifactOfType<'capability'>;
export type DecisionArtifact = ArtifactOfType<'decision'>;
export type EntityArtifact = ArtifactOfType<'entity'>;
export type WorkItemArtifact = ArtifactOfType<'work-item'>;

/**
 * Input for appending an artifact. IDs and timestamps are assigned by the store.
 */
export type ArtifactInput = {
  [T in ArtifactType]: {
    readonly type: T;
    readonly fields: ArtifactFieldsByType[T];
    readonly summary: string;
    readonly serves?: readonly string[];
    readonly implements?: readonly string[];
    readonly sourcePhase: PhaseId;
    readonly provenance: Provenance;
    readonly overrides?: readonly InvariantOverride[];
  };
}[ArtifactType];

/**
 * Derived status. Never stored.
 *
 * - `superseded`: a newer artifact replaced this one.
 * - `incomplete`: partial result of a cancelled stage.
 * - `implemented` / `covered` / `uncovered`: capability coverage by current
 *   work items and decisions.
 * - `active`: any other current artifact.
 */
export type ArtifactStatus =
  | 'superseded'
  | 'incomplete'
  | 'implemented'
  | 'covered'
  | 'uncovered'
  | 'active';

/**
 * Query filter. Fields combine with AND.
 */
export interface ArtifactFilter {
  readonly type?: ArtifactType;
  readonly status?: ArtifactStatus;
  readonly sourcePhase?: PhaseId;
  /** Include superseded artifacts. Defaults to false. */
  readonly includeSuperseded?: boolean;
}

/**
 * One validation problem with an artifact input.
 */
export interface ArtifactValidationIssue {
  readonly field: string;
  readonly message: string;
}

/**
 * Serializable store contents.
 */
export interface ArtifactStoreData {
  readonly version: string;
  readonly artifacts: readonly Artifact[];
}

/**
 * Type guard narrowing an artifact to a given type.
 */
export function isArtifactOfType<T extends ArtifactType>(
  artifact: Artifact,
  type: T
): artifact is ArtifactOfType<T> {
  return artifact.type === type;
}
