/**
 * Diff Engine.
 *
 * Computes what needs attention from the artifact graph instead of choosing
 * a mode. The behaviour that follows is emergent:
 *
 * - every capability uncovered: first run
 * - some uncovered, nothing affected: incremental
 * - affected decisions: revision
 * - empty: nothing to regenerate
 *
 * @packageDocumentation
 */

import type { ArtifactStore } from '../store/store.js';
import type {
  CapabilityArtifact,
  DecisionArtifact,
  EntityArtifact,
  WorkItemArtifact,
} from '../store/types.js';
import { sortedUnique } from '../utils/guards.js';

/**
 * Artifact lists the diff is computed from, superseded ones included.
 */
export interface DiffInput {
  readonly capabilities: readonly CapabilityArtifact[];
  readonly decisions: readonly DecisionArtifact[];
  readonly entities: readonly EntityArtifact[];
  readonly workItems: readonly WorkItemArtifact[];
}

/**
 * What needs attention. Every list holds sorted IDs.
 */
export interface Diff {
  /** Active capabilities no active decision serves. */
  readonly uncovered: readonly string[];
  readonly supersededCapabilities: readonly string[];
  /** Active decisions serving a superseded capability. */
  readonly affectedDecisions: readonly string[];
  /** Active entities serving an affected decision. */
  readonly affectedEntities: readonly string[];
  /** Active work items implementing a superseded capability. */
  readonly affectedWorkItems: readonly string[];
  /** Covered active capabilities no active work item implements. */
  readonly unimplemented: readonly string[];
}

const isActive = (artifact: { readonly supersededBy: string | null }): boolean =>
  artifact.supersededBy === null;

/**
 * Computes the diff. Pure.
 *
 * @example
 * ```typescript
 * const diff = computeDiff({ capabilities, decisions: [], entities: [], workItems: [] });
 * diff.uncovered; // every active capability
 * ```
 */
export function computeDiff(input: DiffInput): Diff {
  const activeCapabilities = input.capabilities.filter(isActive).map((c) => c.id);
  const superseded = new Set(input.capabilities.filter((c) => !isActive(c)).map((c) => c.id));
  const activeDecisions = input.decisions.filter(isActive);

  const served = new Set(activeDecisions.flatMap((decision) => decision.serves));
  const uncovered = activeCapabilities.filter((id) => !served.has(id));

  const affectedDecisions = activeDecisions
    .filter((decision) => decision.serves.some((id) => superseded.has(id)))
    .map((decision) => decision.id);
  const affectedDecisionSet = new Set(affectedDecisions);

  const affectedEntities = input.entities
    .filter(isActive)
    .filter((entity) => entity.serves.some((id) => affectedDecisionSet.has(id)))
    .map((entity) => entity.id);

  const activeWorkItems = input.workItems.filter(isActive);
  const affectedWorkItems = activeWorkItems
    .filter((item) => item.implements.some((id) => superseded.has(id)))
    .map((item) => item.id);

  const implemented = new Set(activeWorkItems.flatMap((item) => item.implements));
  const unimplemented = activeCapabilities.filter(
    (id) => served.has(id) && !implemented.has(id)
  );

  return {
    uncovered: sortedUnique(uncovered),
    supersededCapabilities: sortedUnique(superseded),
    affectedDecisions: sortedUnique(affectedDecisions),
    affectedEntities: sortedUnique(affectedEntities),
    affectedWorkItems: sortedUnique(affectedWorkItems),
    unimplemented: sortedUnique(unimplemented),
  };
}

/**
 * Computes the diff over the full history of a store.
 */
export function diffFromStore(store: ArtifactStore): Diff {
  return computeDiff({
    capabilities: store.historyOf('capability'),
    decisions: store.historyOf('decision'),
    entities: store.historyOf('entity'),
    workItems: store.historyOf('work-item'),
  });
}

/**
 * True when nothing is uncovered and nothing is affected.
 */
export function isDiffEmpty(diff: Diff): boolean {
  return (
    diff.uncovered.length === 0 &&
    diff.affectedDecisions.length === 0 &&
    diff.affectedEntities.length === 0 &&
    diff.affectedWorkItems.length === 0
  );
}

/**
 * True when some capability still needs work items, or existing ones
 * implement superseded capabilities.
 */
export function needsWorkItems(diff: Diff): boolean {
  return (
    diff.uncovered.length > 0 ||
    diff.unimplemented.length > 0 ||
    diff.affectedWorkItems.length > 0
  );
}

/**
 * True when existing architecture needs revision.
 */
export function needsRevision(diff: Diff): boolean {
  return diff.affectedDecisions.length > 0 || diff.affectedEntities.length > 0;
}

function count(n: number, singular: string, plural: string): string {
  return `${String(n)} ${n === 1 ? singular : plural}`;
}

/**
 * One-line human summary.
 */
export function summarizeDiff(diff: Diff): string {
  const parts: string[] = [];
  if (diff.uncovered.length > 0) {
    parts.push(count(diff.uncovered.length, 'uncovered capability', 'uncovered capabilities'));
  }
  if (diff.unimplemented.length > 0) {
    parts.push(
      count(diff.unimplemented.length, 'capability needs work items', 'capabilities need work items')
    );
  }
  if (diff.affectedDecisions.length > 0) {
    parts.push(count(diff.affectedDecisions.length, 'affected decision', 'affected decisions'));
  }
  if (diff.affectedEntities.length > 0) {
    parts.push(count(diff.affectedEntities.length, 'affected entity', 'affected entities'));
  }
  if (diff.affectedWorkItems.length > 0) {
    parts.push(count(diff.affectedWorkItems.length, 'affected work item', 'affected work items'));
  }
  return parts.length > 0 ? parts.join(', ') : 'No changes needed';
}

export const DIFF_HEADING = '## What Needs Attention';

/**
 * Renders the diff as a context section.
 */
export function formatDiffContext(diff: Diff): string {
  const rows: [string, readonly string[]][] = [
    ['Uncovered capabilities (need decisions)', diff.uncovered],
    ['Superseded capabilities', diff.supersededCapabilities],
    ['Affected decisions (serve superseded capabilities)', diff.affectedDecisions],
    ['Affected entities', diff.affectedEntities],
    ['Affected work items', diff.affectedWorkItems],
    ['Capabilities without work items', diff.unimplemented],
  ];
  const lines = rows
    .filter(([, ids]) => ids.length > 0)
    .map(([label, ids]) => `- ${label}: ${ids.join(', ')}`);

  return [DIFF_HEADING, '', ...(lines.length > 0 ? lines : ['Nothing changed since the last run.'])].join(
    '\n'
  );
}
