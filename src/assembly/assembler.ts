/**
 * Resolved Specification Assembler.
 *
 * Pure reader of the artifact store. Resolves every cross-artifact ID into
 * the full artifact so consumers never parse upstream text to follow a
 * reference. No generation calls and no clock reads beyond the legacy
 * cutoff check; the same store state always yields the same output.
 *
 * @packageDocumentation
 */

import type { ConceptAnchor } from '../anchor/types.js';
import { UnresolvedReferenceError, type ArtifactStore } from '../store/store.js';
import {
  isArtifactOfType,
  type ArtifactOfType,
  type ArtifactType,
  type CapabilityArtifact,
  type DecisionArtifact,
  type WorkItemArtifact,
} from '../store/types.js';
import { isRecord } from '../utils/guards.js';
import { createSilentLogger, type Logger } from '../utils/logger.js';
import { STAGE_IDS, type StageId } from '../workflow/ids.js';
import type {
  LegacyPlaceholder,
  ResolvedContext,
  ResolvedDecision,
  ResolvedEntity,
  ResolvedSpecification,
  ResolvedWorkItem,
} from './types.js';

/**
 * Raw upstream text was offered after the legacy fallback cutoff.
 */
export class LegacyFallbackExpiredError extends Error {
  public readonly stage: StageId;
  public readonly removeAfter: string;

  constructor(stage: StageId, removeAfter: string) {
    super(
      `Stage '${stage}' has only unstructured output and the legacy fallback ended on ${removeAfter}; re-run the stage`
    );
    this.name = 'LegacyFallbackExpiredError';
    this.stage = stage;
    this.removeAfter = removeAfter;
  }
}

export interface AssembleContextOptions {
  /** Raw text of stages without structured output. */
  readonly legacy?: Partial<Record<StageId, string>>;
  /** ISO date; legacy text is refused after it. */
  readonly legacyUntil?: string;
  readonly now?: Date;
  readonly logger?: Logger;
}

/**
 * Orders artifact IDs by prefix, then by number.
 *
 * @example
 * ```typescript
 * ['WI-010', 'WI-002'].sort(compareArtifactIds); // ['WI-002', 'WI-010']
 * ```
 */
export function compareArtifactIds(a: string, b: string): number {
  const split = (id: string): [string, number] => {
    const match = /^(.*?)-(\d+)$/.exec(id);
    return match?.[1] !== undefined && match[2] !== undefined
      ? [match[1], parseInt(match[2], 10)]
      : [id, 0];
  };
  const [prefixA, numberA] = split(a);
  const [prefixB, numberB] = split(b);
  if (prefixA !== prefixB) {
    return prefixA < prefixB ? -1 : 1;
  }
  if (numberA !== numberB) {
    return numberA - numberB;
  }
  return a < b ? -1 : a > b ? 1 : 0;
}

const byId = <T extends { readonly id: string }>(items: readonly T[]): T[] =>
  [...items].sort((a, b) => compareArtifactIds(a.id, b.id));

function resolveCapability(store: ArtifactStore, ref: string, from: string): CapabilityArtifact {
  const artifact = store.getById(ref);
  if (artifact === undefined || !isArtifactOfType(artifact, 'capability')) {
    throw new UnresolvedReferenceError(ref, from, 'expected a capability');
  }
  return artifact;
}

function resolveDecision(store: ArtifactStore, ref: string, from: string): DecisionArtifact {
  const artifact = store.getById(ref);
  if (artifact === undefined || !isArtifactOfType(artifact, 'decision')) {
    throw new UnresolvedReferenceError(ref, from, 'expected a decision');
  }
  return artifact;
}

function storedOfType<T extends ArtifactType>(
  store: ArtifactStore | undefined,
  ref: string,
  type: T
): ArtifactOfType<T> | undefined {
  const artifact = store?.getById(ref);
  return artifact !== undefined && isArtifactOfType(artifact, type) ? artifact : undefined;
}

/**
 * Follows `supersededBy` from a replaced work item to the successor in the
 * set, or falls back to the stored item itself.
 */
function successorIn(
  store: ArtifactStore | undefined,
  ref: string,
  items: ReadonlyMap<string, WorkItemArtifact>
): WorkItemArtifact | undefined {
  const stored = storedOfType(store, ref, 'work-item');
  let next = stored?.supersededBy ?? null;
  const seen = new Set<string>([ref]);
  while (next !== null && !seen.has(next)) {
    seen.add(next);
    const successor = items.get(next);
    if (successor !== undefined) {
      return successor;
    }
    next = store?.getById(next)?.supersededBy ?? null;
  }
  return stored;
}

function legacyPlaceholders(options: AssembleContextOptions, logger: Logger): LegacyPlaceholder[] {
  const legacy = options.legacy ?? {};
  const removeAfter = options.legacyUntil ?? '';
  const today = (options.now ?? new Date()).toISOString().slice(0, 10);
  const placeholders: LegacyPlaceholder[] = [];

  for (const stage of STAGE_IDS) {
    const text = legacy[stage];
    if (text === undefined) {
      continue;
    }
    if (removeAfter !== '' && today > removeAfter) {
      throw new LegacyFallbackExpiredError(stage, removeAfter);
    }
    logger.warn('legacy_placeholder_used', { stage, removeAfter });
    placeholders.push({ id: `LEGACY-${stage}`, stage, text: text.trim(), removeAfter });
  }
  return placeholders;
}

/**
 * Assembles the Resolved Context: the anchor and every current capability,
 * decision and entity with its references resolved. Never contains work items.
 *
 * @throws UnresolvedReferenceError if a link names an unknown artifact.
 * @throws LegacyFallbackExpiredError if legacy text is offered after the cutoff.
 */
export function assembleContext(
  store: ArtifactStore,
  anchor: ConceptAnchor,
  options: AssembleContextOptions = {}
): ResolvedContext {
  const logger = options.logger ?? createSilentLogger('SpecificationAssembler');

  const capabilities = byId(store.current('capability'));
  const decisions: ResolvedDecision[] = byId(store.current('decision')).map((decision) => ({
    decision,
    serves: [...decision.serves]
      .sort(compareArtifactIds)
      .map((ref) => resolveCapability(store, ref, decision.id)),
  }));
  const entities: ResolvedEntity[] = byId(store.current('entity')).map((entity) => ({
    entity,
    serves: [...entity.serves]
      .sort(compareArtifactIds)
      .map((ref) => resolveDecision(store, ref, entity.id)),
  }));

  const covered = new Set(decisions.flatMap((resolved) => resolved.decision.serves));
  const uncovered = capabilities.filter((capability) => !covered.has(capability.id));

  const context: ResolvedContext = {
    anchor,
    capabilities,
    decisions,
    entities,
    uncovered,
    legacy: legacyPlaceholders(options, logger),
  };

  logger.info('context_assembled', {
    capabilities: capabilities.length,
    decisions: decisions.length,
    entities: entities.length,
    uncovered: uncovered.map((capability) => capability.id),
  });
  return context;
}

/**
 * Attaches work items to a Resolved Context.
 *
 * Work items are placed in the given order; any not named there follow in ID
 * order. Links resolve against the context and the given set first. With a
 * store, a link to a replaced capability resolves to the stored artifact
 * (its `supersededBy` set) and a dependency on a replaced work item to its
 * current successor in the set.
 *
 * @throws UnresolvedReferenceError for a reference that cannot be resolved.
 */
export function attachWorkItems(
  context: ResolvedContext,
  workItems: readonly WorkItemArtifact[],
  order: readonly string[] = [],
  store?: ArtifactStore
): ResolvedSpecification {
  const capabilities = new Map(context.capabilities.map((capability) => [capability.id, capability]));
  const items = new Map(workItems.map((item) => [item.id, item]));

  const ordered: WorkItemArtifact[] = [];
  const placed = new Set<string>();
  for (const id of order) {
    const item = items.get(id);
    if (item === undefined) {
      throw new UnresolvedReferenceError(id, 'work-item-ordering');
    }
    if (!placed.has(id)) {
      placed.add(id);
      ordered.push(item);
    }
  }
  ordered.push(...byId(workItems.filter((item) => !placed.has(item.id))));

  const resolved = ordered.map((workItem, index): ResolvedWorkItem => ({
    workItem,
    implements: [...workItem.implements].sort(compareArtifactIds).map((ref) => {
      const capability = capabilities.get(ref) ?? storedOfType(store, ref, 'capability');
      if (capability === undefined) {
        throw new UnresolvedReferenceError(ref, workItem.id, 'not a known capability');
      }
      return capability;
    }),
    dependsOn: [...workItem.fields.dependsOn].sort(compareArtifactIds).map((ref) => {
      const dependency = items.get(ref) ?? successorIn(store, ref, items);
      if (dependency === undefined) {
        throw new UnresolvedReferenceError(ref, workItem.id, 'not a known work item');
      }
      return dependency;
    }),
    position: index + 1,
  }));

  return { ...context, workItems: resolved };
}

/**
 * Assembles the full specification from the store's current state.
 */
export function assembleSpecification(
  store: ArtifactStore,
  anchor: ConceptAnchor,
  order: readonly string[] = [],
  options: AssembleContextOptions = {}
): ResolvedSpecification {
  return attachWorkItems(
    assembleContext(store, anchor, options),
    store.current('work-item'),
    order,
    store
  );
}

/**
 * Canonical JSON: object keys sorted, two-space indent, trailing newline.
 * Identical inputs give byte-identical output.
 */
export function serializeSpecification(value: ResolvedContext | ResolvedSpecification): string {
  const canonical = JSON.stringify(
    value,
    (_key, entry: unknown) =>
      isRecord(entry)
        ? Object.fromEntries(
            Object.entries(entry).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
          )
        : entry,
    2
  );
  return `${canonical}\n`;
}
