/**
 * Structured artifact store module.
 *
 * Append and supersede only; status is derived from links on read.
 *
 * @packageDocumentation
 */

export type {
  Artifact,
  ArtifactFieldsByType,
  ArtifactFilter,
  ArtifactInput,
  ArtifactOfType,
  ArtifactRecord,
  ArtifactRecordOf,
  ArtifactStatus,
  ArtifactStoreData,
  ArtifactType,
  ArtifactValidationIssue,
  CapabilityArtifact,
  CapabilityCategory,
  CapabilityFields,
  DecisionArtifact,
  DecisionFields,
  EntityArtifact,
  EntityFields,
  Provenance,
  WorkItemArtifact,
  WorkItemFields,
} from './types.js';
export { ARTIFACT_ID_PREFIXES, ARTIFACT_TYPES, isArtifactOfType } from './types.js';

export {
  ARTIFACT_STORE_VERSION,
  ArtifactNotFoundError,
  ArtifactStore,
  ArtifactValidationError,
  DuplicateArtifactIdError,
  InvalidSupersedeError,
  UnresolvedReferenceError,
  fromData,
  validateArtifactInput,
} from './store.js';
export type { ArtifactStoreOptions } from './store.js';

export { commitBatch, validateBatch } from './commit.js';
export type { CommitResult, PendingArtifact } from './commit.js';

export { capabilityInput, decisionInput, entityInput, workItemInput } from './builders.js';
