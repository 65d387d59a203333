/**
 * Append-only structured artifact store.
 *
 * @packageDocumentation
 */

import type {
  Artifact,
  ArtifactFilter,
  ArtifactInput,
  ArtifactOfType,
  ArtifactRecord,
  ArtifactStatus,
  ArtifactStoreData,
  ArtifactType,
  ArtifactValidationIssue,
} from './types.js';
import { ARTIFACT_ID_PREFIXES, ARTIFACT_TYPES, isArtifactOfType } from './types.js';
import { isNonEmptyString } from '../utils/guards.js';
import { createSilentLogger, type Logger } from '../utils/logger.js';

/**
 * Current schema version for serialized stores.
 */
export const ARTIFACT_STORE_VERSION = '1.0.0';

/**
 * Error thrown when an artifact input fails validation.
 */
export class ArtifactValidationError extends Error {
  /** Individual validation issues. */
  public readonly issues: readonly ArtifactValidationIssue[];

  constructor(message: string, issues: readonly ArtifactValidationIssue[]) {
    super(message);
    this.name = 'ArtifactValidationError';
    this.issues = issues;
  }
}

/**
 * Error thrown when an artifact ID does not exist.
 */
export class ArtifactNotFoundError extends Error {
  public readonly artifactId: string;

  constructor(artifactId: string) {
    super(`Artifact not found: ${artifactId}`);
    this.name = 'ArtifactNotFoundError';
    this.artifactId = artifactId;
  }
}

/**
 * Error thrown when restoring an artifact whose ID is already taken.
 */
export class DuplicateArtifactIdError extends Error {
  public readonly artifactId: string;

  constructor(artifactId: string) {
    super(`Duplicate artifact ID: ${artifactId}`);
    this.name = 'DuplicateArtifactIdError';
    this.artifactId = artifactId;
  }
}

/**
 * Error thrown when a supersede operation is not allowed.
 */
export class InvalidSupersedeError extends Error {
  public readonly artifactId: string;
  public readonly reason: string;

  constructor(artifactId: string, reason: string) {
    super(`Cannot supersede artifact ${artifactId}: ${reason}`);
    this.name = 'InvalidSupersedeError';
    this.artifactId = artifactId;
    this.reason = reason;
  }
}

/**
 * Error thrown when a link or reference names an unknown artifact.
 */
export class UnresolvedReferenceError extends Error {
  /** The ID that could not be resolved. */
  public readonly reference: string;
  /** The artifact (or draft) holding the reference. */
  public readonly referencedFrom: string;

  constructor(reference: string, referencedFrom: string, detail?: string) {
    super(
      `Unresolved reference '${reference}' from '${referencedFrom}'${detail !== undefined ? `: ${detail}` : ''}`
    );
    this.name = 'UnresolvedReferenceError';
    this.reference = reference;
    this.referencedFrom = referencedFrom;
  }
}

/**
 * Which artifact types each link may point at.
 */
export const LINK_TARGETS: Readonly<
  Record<ArtifactType, { serves: ArtifactType | null; implements: ArtifactType | null }>
> = {
  capability: { serves: null, implements: null },
  decision: { serves: 'capability', implements: null },
  entity: { serves: 'decision', implements: null },
  'work-item': { serves: null, implements: 'capability' },
};

/**
 * Frozen copy of an input's content, so callers keep no handle on stored
 * fields.
 */
function copyContent(input: ArtifactInput): ArtifactInput {
  const overrides =
    input.overrides !== undefined
      ? { overrides: Object.freeze(input.overrides.map((o) => Object.freeze({ ...o }))) }
      : {};
  const provenance = Object.freeze({ ...input.provenance });

  switch (input.type) {
    case 'capability':
      return { ...input, ...overrides, provenance, fields: Object.freeze({ ...input.fields }) };
    case 'decision': {
      const { alternatives } = input.fields;
      const fields = Object.freeze({
        ...input.fields,
        ...(alternatives !== undefined ? { alternatives: Object.freeze([...alternatives]) } : {}),
      });
      return { ...input, ...overrides, provenance, fields };
    }
    case 'entity':
      return {
        ...input,
        ...overrides,
        provenance,
        fields: Object.freeze({
          ...input.fields,
          attributes: Object.freeze([...input.fields.attributes]),
        }),
      };
    case 'work-item':
      return {
        ...input,
        ...overrides,
        provenance,
        fields: Object.freeze({
          ...input.fields,
          acceptanceCriteria: Object.freeze([...input.fields.acceptanceCriteria]),
          dependsOn: Object.freeze([...input.fields.dependsOn]),
        }),
      };
  }
}

/**
 * Options for creating an ArtifactStore.
 */
export interface ArtifactStoreOptions {
  /** Clock used for `createdAt`. */
  readonly now?: () => Date;
  readonly logger?: Logger;
}

/**
 * Append-only store of capabilities, decisions, entities and work items.
 *
 * Artifacts are never updated in place. Change is a new artifact that
 * supersedes the old one; the link is recorded once and never cleared, so
 * "current" queries stop returning the old artifact for good. Status is
 * derived from links on every read.
 *
 * @example
 * ```typescript
 * const store = new ArtifactStore();
 * const cap = store.append({
 *   type: 'capability',
 *   fields: { name: 'Invite members', description: '...', category: 'functional' },
 *   summary: 'Members invite other members',
 *   sourcePhase: 'scope',
 *   provenance: { stage: 'capability-model', attempt: 1, incomplete: false },
 * });
 * console.log(cap.id); // "CAP-001"
 * ```
 */
export class ArtifactStore {
  private readonly records: ArtifactRecord[] = [];
  private readonly positions = new Map<string, number>();
  private readonly supersededBy = new Map<string, string>();
  private readonly idCounters = new Map<ArtifactType, number>();
  private readonly now: () => Date;
  private readonly logger: Logger;

  constructor(options: ArtifactStoreOptions = {}) {
    this.now = options.now ?? ((): Date => new Date());
    this.logger = options.logger ?? createSilentLogger('ArtifactStore');
  }

  /**
   * Number of artifacts ever appended, superseded ones included.
   */
  get size(): number {
    return this.records.length;
  }

  /**
   * Appends a new artifact with a minted ID.
   *
   * @param input - Artifact content.
   * @returns The stored artifact.
   * @throws ArtifactValidationError if required fields are empty.
   * @throws UnresolvedReferenceError if a link names an unknown or wrongly typed artifact.
   */
  append(input: ArtifactInput): Artifact {
    return this.appendRecord(input, undefined);
  }

  /**
   * Supersedes an artifact with a new one of the same type.
   *
   * @param oldId - ID of the artifact being replaced.
   * @param input - Content of the replacement.
   * @returns The previous artifact (now superseded) and the new one.
   * @throws ArtifactNotFoundError if oldId does not exist.
   * @throws InvalidSupersedeError if oldId is already superseded or the types differ.
   */
  supersede(oldId: string, input: ArtifactInput): { previous: Artifact; next: Artifact } {
    const previousRecord = this.getRecord(oldId);
    if (previousRecord === undefined) {
      throw new ArtifactNotFoundError(oldId);
    }
    if (this.supersededBy.has(oldId)) {
      throw new InvalidSupersedeError(oldId, 'artifact is already superseded');
    }
    if (previousRecord.type !== input.type) {
      throw new InvalidSupersedeError(
        oldId,
        `type mismatch: '${previousRecord.type}' cannot be replaced by '${input.type}'`
      );
    }

    const next = this.appendRecord(input, oldId);
    this.supersededBy.set(oldId, next.id);
    this.logger.info('artifact_superseded', { previous: oldId, next: next.id });

    return { previous: this.compose(previousRecord), next };
  }

  /**
   * Restores a previously serialized artifact, keeping its ID and link.
   *
   * Used when loading persisted state. Counters advance past restored IDs.
   *
   * @throws DuplicateArtifactIdError if the ID already exists.
   */
  restore(artifact: Artifact): void {
    if (this.positions.has(artifact.id)) {
      throw new DuplicateArtifactIdError(artifact.id);
    }

    const { supersededBy, ...record } = artifact;
    this.positions.set(record.id, this.records.length);
    this.records.push(Object.freeze(record));
    if (supersededBy !== null) {
      this.supersededBy.set(record.id, supersededBy);
    }
    this.advanceCounter(record.type, record.id);
  }

  has(id: string): boolean {
    return this.positions.has(id);
  }

  /**
   * Gets an artifact by ID, superseded or not.
   */
  getById(id: string): Artifact | undefined {
    const record = this.getRecord(id);
    return record !== undefined ? this.compose(record) : undefined;
  }

  /**
   * Gets an artifact by ID.
   *
   * @throws ArtifactNotFoundError if the ID does not exist.
   */
  require(id: string): Artifact {
    const artifact = this.getById(id);
    if (artifact === undefined) {
      throw new ArtifactNotFoundError(id);
    }
    return artifact;
  }

  isSuperseded(id: string): boolean {
    return this.supersededBy.has(id);
  }

  /**
   * Current (non-superseded) artifacts of one type, in append order.
   */
  current<T extends ArtifactType>(type: T): ArtifactOfType<T>[] {
    const result: ArtifactOfType<T>[] = [];
    for (const artifact of this.history()) {
      if (artifact.supersededBy === null && isArtifactOfType(artifact, type)) {
        result.push(artifact);
      }
    }
    return result;
  }

  /**
   * Every artifact of one type (or all types) including superseded ones.
   */
  history<T extends ArtifactType>(type?: T): Artifact[] {
    const all = this.records.map((record) => this.compose(record));
    return type === undefined ? all : all.filter((a) => a.type === type);
  }

  /**
   * Every artifact of one type including superseded ones, narrowed.
   */
  historyOf<T extends ArtifactType>(type: T): ArtifactOfType<T>[] {
    const result: ArtifactOfType<T>[] = [];
    for (const artifact of this.history()) {
      if (isArtifactOfType(artifact, type)) {
        result.push(artifact);
      }
    }
    return result;
  }

  /**
   * Queries artifacts. Filters combine with AND.
   *
   * @example
   * ```typescript
   * store.query({ type: 'capability', status: 'uncovered' });
   * ```
   */
  query(filter: ArtifactFilter): Artifact[] {
    return this.history().filter((artifact) => {
      if (filter.type !== undefined && artifact.type !== filter.type) {
        return false;
      }
      if (filter.sourcePhase !== undefined && artifact.sourcePhase !== filter.sourcePhase) {
        return false;
      }
      if (
        filter.includeSuperseded !== true &&
        filter.status !== 'superseded' &&
        artifact.supersededBy !== null
      ) {
        return false;
      }
      if (filter.status !== undefined && this.deriveStatus(artifact.id) !== filter.status) {
        return false;
      }
      return true;
    });
  }

  /**
   * Derives the status of an artifact from the current link graph.
   *
   * @throws ArtifactNotFoundError if the ID does not exist.
   */
  deriveStatus(id: string): ArtifactStatus {
    const artifact = this.require(id);
    if (artifact.supersededBy !== null) {
      return 'superseded';
    }
    if (artifact.provenance.incomplete) {
      return 'incomplete';
    }
    if (artifact.type !== 'capability') {
      return 'active';
    }
    if (this.current('work-item').some((item) => item.implements.includes(id))) {
      return 'implemented';
    }
    if (this.current('decision').some((decision) => decision.serves.includes(id))) {
      return 'covered';
    }
    return 'uncovered';
  }

  /**
   * Exports the store contents.
   */
  toData(): ArtifactStoreData {
    return {
      version: ARTIFACT_STORE_VERSION,
      artifacts: this.history(),
    };
  }

  private getRecord(id: string): ArtifactRecord | undefined {
    const position = this.positions.get(id);
    return position !== undefined ? this.records[position] : undefined;
  }

  private compose(record: ArtifactRecord): Artifact {
    return Object.freeze({ ...record, supersededBy: this.supersededBy.get(record.id) ?? null });
  }

  private appendRecord(input: ArtifactInput, supersedes: string | undefined): Artifact {
    const issues = validateArtifactInput(input);
    if (issues.length > 0) {
      const lines = issues.map((i) => `  - ${i.field}: ${i.message}`).join('\n');
      throw new ArtifactValidationError(
        `Artifact validation failed with ${String(issues.length)} error(s):\n${lines}`,
        issues
      );
    }

    this.checkLinks(input, this.peekId(input.type));
    const id = this.mintId(input.type);

    const base = {
      ...copyContent(input),
      id,
      createdAt: this.now().toISOString(),
      serves: Object.freeze([...(input.serves ?? [])]),
      implements: Object.freeze([...(input.implements ?? [])]),
    };
    const record: ArtifactRecord = supersedes !== undefined ? { ...base, supersedes } : base;

    this.positions.set(id, this.records.length);
    this.records.push(Object.freeze(record));
    this.logger.debug('artifact_appended', { id, type: input.type });

    return this.compose(record);
  }

  private checkLinks(input: ArtifactInput, id: string): void {
    const targets = LINK_TARGETS[input.type];
    const links: [keyof typeof targets, readonly string[]][] = [
      ['serves', input.serves ?? []],
      ['implements', input.implements ?? []],
    ];

    for (const [link, ids] of links) {
      const expected = targets[link];
      for (const ref of ids) {
        if (expected === null) {
          throw new UnresolvedReferenceError(ref, id, `${input.type} artifacts have no '${link}' links`);
        }
        const target = this.getRecord(ref);
        if (target === undefined) {
          throw new UnresolvedReferenceError(ref, id);
        }
        if (target.type !== expected) {
          throw new UnresolvedReferenceError(
            ref,
            id,
            `'${link}' must reference a ${expected}, got ${target.type}`
          );
        }
      }
    }
  }

  private peekId(type: ArtifactType): string {
    const next = (this.idCounters.get(type) ?? 0) + 1;
    return `${ARTIFACT_ID_PREFIXES[type]}-${String(next).padStart(3, '0')}`;
  }

  private mintId(type: ArtifactType): string {
    const id = this.peekId(type);
    this.idCounters.set(type, (this.idCounters.get(type) ?? 0) + 1);
    return id;
  }

  private advanceCounter(type: ArtifactType, id: string): void {
    const match = /-(\d+)$/.exec(id);
    if (match?.[1] === undefined || !id.startsWith(`${ARTIFACT_ID_PREFIXES[type]}-`)) {
      return;
    }
    const value = parseInt(match[1], 10);
    if (value > (this.idCounters.get(type) ?? 0)) {
      this.idCounters.set(type, value);
    }
  }
}

/**
 * Validates the required content of an artifact input.
 *
 * @param input - Artifact input.
 * @returns Validation issues; empty when valid.
 */
export function validateArtifactInput(input: ArtifactInput): ArtifactValidationIssue[] {
  const issues: ArtifactValidationIssue[] = [];
  const required = (field: string, value: string): void => {
    if (!isNonEmptyString(value)) {
      issues.push({ field, message: 'must be a non-empty string' });
    }
  };

  if (!ARTIFACT_TYPES.includes(input.type)) {
    issues.push({ field: 'type', message: `unknown artifact type '${String(input.type)}'` });
    return issues;
  }

  required('summary', input.summary);

  switch (input.type) {
    case 'capability':
      required('fields.name', input.fields.name);
      required('fields.description', input.fields.description);
      break;
    case 'decision':
      required('fields.title', input.fields.title);
      required('fields.decision', input.fields.decision);
      break;
    case 'entity':
      required('fields.name', input.fields.name);
      break;
    case 'work-item':
      required('fields.title', input.fields.title);
      required('fields.description', input.fields.description);
      break;
  }

  for (const [index, override] of (input.overrides ?? []).entries()) {
    required(`overrides[${String(index)}].invariant`, override.invariant);
    required(`overrides[${String(index)}].reason`, override.reason);
  }

  return issues;
}

/**
 * Rebuilds a store from serialized data.
 *
 * @param data - Output of {@link ArtifactStore.toData}.
 * @param options - Store options.
 * @returns The restored store.
 */
export function fromData(data: ArtifactStoreData, options: ArtifactStoreOptions = {}): ArtifactStore {
  const store = new ArtifactStore(options);
  for (const artifact of data.artifacts) {
    store.restore(artifact);
  }
  return store;
}
