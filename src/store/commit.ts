/**
 * Commits a finished stage result to the artifact store.
 *
 * Generation output names its artifacts with local refs (e.g. `cap-invite`)
 * so items in the same batch can point at each other before IDs exist.
 * Committing validates the whole batch first, then appends in dependency
 * order and rewrites refs to minted IDs. Nothing is written when any item
 * is invalid.
 *
 * @packageDocumentation
 */

import type { Artifact, ArtifactInput, ArtifactType } from './types.js';
import {
  ArtifactValidationError,
  InvalidSupersedeError,
  LINK_TARGETS,
  UnresolvedReferenceError,
  validateArtifactInput,
  type ArtifactStore,
} from './store.js';

/**
 * One artifact awaiting commit.
 */
export interface PendingArtifact {
  /** Batch-local reference. */
  readonly ref: string;
  /** ID of a current artifact this one replaces. */
  readonly supersedes?: string;
  /** Content whose links may use batch refs or existing IDs. */
  readonly input: ArtifactInput;
}

/**
 * Result of a commit.
 */
export interface CommitResult {
  /** Batch ref to minted ID. */
  readonly ids: ReadonlyMap<string, string>;
  /** Committed artifacts in append order. */
  readonly artifacts: readonly Artifact[];
}

type LinkKind = 'serves' | 'implements' | 'dependsOn';

interface Link {
  readonly kind: LinkKind;
  readonly ref: string;
}

function linksOf(pending: PendingArtifact): Link[] {
  const { input } = pending;
  const links: Link[] = [
    ...(input.serves ?? []).map((ref): Link => ({ kind: 'serves', ref })),
    ...(input.implements ?? []).map((ref): Link => ({ kind: 'implements', ref })),
  ];
  if (input.type === 'work-item') {
    links.push(...input.fields.dependsOn.map((ref): Link => ({ kind: 'dependsOn', ref })));
  }
  return links;
}

function expectedTarget(type: ArtifactType, kind: LinkKind): ArtifactType | null {
  return kind === 'dependsOn' ? 'work-item' : LINK_TARGETS[type][kind];
}

/**
 * Orders a batch so every item follows the batch items it references.
 *
 * @throws UnresolvedReferenceError on a reference cycle inside the batch.
 */
function orderBatch(batch: readonly PendingArtifact[]): PendingArtifact[] {
  const byRef = new Map(batch.map((p) => [p.ref, p]));
  const ordered: PendingArtifact[] = [];
  const state = new Map<string, 'visiting' | 'done'>();

  const visit = (pending: PendingArtifact): void => {
    const mark = state.get(pending.ref);
    if (mark === 'done') {
      return;
    }
    if (mark === 'visiting') {
      throw new UnresolvedReferenceError(pending.ref, pending.ref, 'reference cycle in batch');
    }
    state.set(pending.ref, 'visiting');
    for (const { ref } of linksOf(pending)) {
      const dependency = byRef.get(ref);
      if (dependency !== undefined) {
        visit(dependency);
      }
    }
    state.set(pending.ref, 'done');
    ordered.push(pending);
  };

  for (const pending of batch) {
    visit(pending);
  }
  return ordered;
}

function checkLink(
  store: ArtifactStore,
  byRef: ReadonlyMap<string, PendingArtifact>,
  pending: PendingArtifact,
  { kind, ref }: Link
): void {
  const expected = expectedTarget(pending.input.type, kind);
  if (expected === null) {
    throw new UnresolvedReferenceError(
      ref,
      pending.ref,
      `${pending.input.type} artifacts have no '${kind}' links`
    );
  }

  const local = byRef.get(ref);
  let actual: ArtifactType;
  if (local !== undefined) {
    actual = local.input.type;
  } else {
    const target = store.getById(ref);
    if (target === undefined) {
      throw new UnresolvedReferenceError(ref, pending.ref);
    }
    if (target.supersededBy !== null) {
      throw new UnresolvedReferenceError(ref, pending.ref, 'artifact is superseded');
    }
    actual = target.type;
  }

  if (actual !== expected) {
    throw new UnresolvedReferenceError(
      ref,
      pending.ref,
      `'${kind}' must reference a ${expected}, got ${actual}`
    );
  }
}

/**
 * Checks a batch against the store without writing anything. Every check
 * the store makes on append or supersede is made here first.
 *
 * @throws ArtifactValidationError, UnresolvedReferenceError or InvalidSupersedeError.
 */
export function validateBatch(store: ArtifactStore, batch: readonly PendingArtifact[]): void {
  const byRef = new Map<string, PendingArtifact>();
  for (const pending of batch) {
    if (byRef.has(pending.ref)) {
      throw new ArtifactValidationError(`Duplicate ref '${pending.ref}' in batch`, [
        { field: 'ref', message: `duplicate ref '${pending.ref}'` },
      ]);
    }
    byRef.set(pending.ref, pending);
  }

  const replaced = new Map<string, string>();
  for (const pending of batch) {
    const issues = validateArtifactInput(pending.input);
    if (issues.length > 0) {
      const lines = issues.map((i) => `  - ${i.field}: ${i.message}`).join('\n');
      throw new ArtifactValidationError(`Invalid artifact '${pending.ref}':\n${lines}`, issues);
    }

    for (const link of linksOf(pending)) {
      checkLink(store, byRef, pending, link);
    }

    const { supersedes } = pending;
    if (supersedes !== undefined) {
      const target = store.getById(supersedes);
      if (target === undefined) {
        throw new UnresolvedReferenceError(supersedes, pending.ref);
      }
      if (target.supersededBy !== null) {
        throw new InvalidSupersedeError(supersedes, 'artifact is already superseded');
      }
      if (target.type !== pending.input.type) {
        throw new InvalidSupersedeError(
          supersedes,
          `type mismatch: '${target.type}' cannot be replaced by '${pending.input.type}'`
        );
      }
      const rival = replaced.get(supersedes);
      if (rival !== undefined) {
        throw new InvalidSupersedeError(
          supersedes,
          `'${rival}' and '${pending.ref}' both replace it in one batch`
        );
      }
      replaced.set(supersedes, pending.ref);
    }
  }

  orderBatch(batch);
}

function rewrite(input: ArtifactInput, ids: ReadonlyMap<string, string>): ArtifactInput {
  const resolve = (ref: string): string => ids.get(ref) ?? ref;
  const links = {
    serves: (input.serves ?? []).map(resolve),
    implements: (input.implements ?? []).map(resolve),
  };

  if (input.type === 'work-item') {
    return {
      ...input,
      ...links,
      fields: { ...input.fields, dependsOn: input.fields.dependsOn.map(resolve) },
    };
  }
  return { ...input, ...links };
}

/**
 * Validates and commits a batch.
 *
 * @param store - Target store.
 * @param batch - Pending artifacts from one finished stage result.
 * @returns Ref-to-ID map and the committed artifacts.
 */
export function commitBatch(store: ArtifactStore, batch: readonly PendingArtifact[]): CommitResult {
  validateBatch(store, batch);

  const ids = new Map<string, string>();
  const artifacts: Artifact[] = [];

  for (const pending of orderBatch(batch)) {
    const input = rewrite(pending.input, ids);
    const artifact =
      pending.supersedes !== undefined
        ? store.supersede(pending.supersedes, input).next
        : store.append(input);
    ids.set(pending.ref, artifact.id);
    artifacts.push(artifact);
  }

  return { ids, artifacts };
}
