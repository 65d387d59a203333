/**
 * Turns structured stage output into pending artifacts for the store.
 *
 * @packageDocumentation
 */

import type { InvariantOverride } from '../anchor/types.js';
import type { PendingArtifact } from '../store/commit.js';
import type { Provenance } from '../store/types.js';
import type { StageId } from './ids.js';
import type { StageOutputOf, WorkItemBatch, WorkItemDraft } from './outputs.js';

function withOverrides(
  overrides: readonly InvariantOverride[] | undefined
): { overrides?: readonly InvariantOverride[] } {
  return overrides !== undefined && overrides.length > 0 ? { overrides } : {};
}

function withSupersedes(supersedes: string | undefined): { supersedes?: string } {
  return supersedes !== undefined ? { supersedes } : {};
}

type Drafter<S extends StageId> = (output: StageOutputOf<S>, provenance: Provenance) => PendingArtifact[];

const none = (): PendingArtifact[] => [];

const DRAFTERS: { [S in StageId]: Drafter<S> } = {
  'concept-anchor': none,
  'idea-analysis': none,
  'risk-assessment': none,
  'pivot-strategy': none,
  'validation-verdict': none,
  'scope-boundaries': none,
  'capability-model': ({ data }, provenance) => {
    const extra = withOverrides(data.overrides);
    return data.capabilities.map((draft): PendingArtifact => ({
      ref: draft.ref,
      ...withSupersedes(draft.supersedes),
      input: {
        type: 'capability',
        fields: { name: draft.name, description: draft.description, category: draft.category },
        summary: draft.summary,
        sourcePhase: 'scope',
        provenance,
        ...extra,
      },
    }));
  },
  'system-traits': none,
  'design-mockups': none,
  'architecture-decisions': ({ data }, provenance) => {
    const extra = withOverrides(data.overrides);
    const decisions = data.decisions.map(
      (draft): PendingArtifact => ({
        ref: draft.ref,
        ...withSupersedes(draft.supersedes),
        input: {
          type: 'decision',
          fields: {
            title: draft.title,
            decision: draft.decision,
            rationale: draft.rationale,
            ...(draft.alternatives !== undefined ? { alternatives: draft.alternatives } : {}),
          },
          summary: draft.summary,
          serves: draft.serves,
          sourcePhase: 'architecture',
          provenance,
          ...extra,
        },
      })
    );
    const entities = data.entities.map(
      (draft): PendingArtifact => ({
        ref: draft.ref,
        ...withSupersedes(draft.supersedes),
        input: {
          type: 'entity',
          fields: {
            name: draft.name,
            description: draft.description,
            attributes: draft.attributes,
          },
          summary: draft.summary,
          serves: draft.serves,
          sourcePhase: 'architecture',
          provenance,
          ...extra,
        },
      })
    );
    return [...decisions, ...entities];
  },
  'work-item-generation': ({ data }, provenance) => {
    const extra = withOverrides(data.overrides);
    return data.workItems.map((draft): PendingArtifact => ({
      ref: draft.ref,
      ...withSupersedes(draft.supersedes),
      input: {
        type: 'work-item',
        fields: {
          title: draft.title,
          description: draft.description,
          acceptanceCriteria: draft.acceptanceCriteria,
          dependsOn: draft.dependsOn ?? [],
        },
        summary: draft.summary,
        implements: draft.implements,
        sourcePhase: 'work-items',
        provenance,
        ...extra,
      },
    }));
  },
  'work-item-ordering': none,
};

/**
 * Pending artifacts described by a stage output. Stages that produce no
 * artifacts give an empty list.
 *
 * @param incomplete - Marks partial results kept after cancellation.
 */
export function pendingArtifacts<S extends StageId>(
  output: StageOutputOf<S>,
  incomplete = false
): PendingArtifact[] {
  const drafter = DRAFTERS[output.stage];
  return drafter(output, { stage: output.stage, attempt: output.attempt, incomplete });
}

/**
 * Merges work-item batches into one output. Refs are prefixed with the
 * batch number so batches cannot collide; links to refs of the same batch
 * follow.
 */
export function mergeWorkItemBatches(batches: readonly WorkItemBatch[]): WorkItemBatch {
  const workItems: WorkItemDraft[] = [];
  const overrides: InvariantOverride[] = [];

  batches.forEach((batch, index) => {
    const prefix = `b${String(index + 1)}.`;
    const local = new Set(batch.workItems.map((item) => item.ref));
    const rename = (ref: string): string => (local.has(ref) ? `${prefix}${ref}` : ref);

    for (const item of batch.workItems) {
      workItems.push({
        ...item,
        ref: rename(item.ref),
        ...(item.dependsOn !== undefined ? { dependsOn: item.dependsOn.map(rename) } : {}),
      });
    }
    overrides.push(...(batch.overrides ?? []));
  });

  return {
    summary: batches.map((batch) => batch.summary).join(' '),
    workItems,
    ...(overrides.length > 0 ? { overrides } : {}),
  };
}

/**
 * Splits capability IDs into batches of at most `size`.
 */
export function batchCapabilities(ids: readonly string[], size: number): string[][] {
  const step = Math.max(1, Math.floor(size));
  const batches: string[][] = [];
  for (let start = 0; start < ids.length; start += step) {
    batches.push(ids.slice(start, start + step));
  }
  return batches;
}
