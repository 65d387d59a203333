/**
 * Builders for artifact inputs with sensible provenance.
 *
 * Used by dry runs and tests to populate a store without a generation backend.
 *
 * @packageDocumentation
 */

import type { ArtifactInput, CapabilityCategory, Provenance } from './types.js';
import type { StageId } from '../workflow/ids.js';

function provenanceFor(stage: StageId, incomplete = false): Provenance {
  return { stage, attempt: 1, incomplete };
}

export function capabilityInput(
  name: string,
  options: { description?: string; category?: CapabilityCategory; summary?: string } = {}
): ArtifactInput {
  return {
    type: 'capability',
    fields: {
      name,
      description: options.description ?? `${name} capability`,
      category: options.category ?? 'functional',
    },
    summary: options.summary ?? name,
    sourcePhase: 'scope',
    provenance: provenanceFor('capability-model'),
  };
}

export function decisionInput(
  title: string,
  serves: readonly string[],
  options: { decision?: string; rationale?: string; summary?: string } = {}
): ArtifactInput {
  return {
    type: 'decision',
    fields: {
      title,
      decision: options.decision ?? title,
      rationale: options.rationale ?? 'chosen for fit',
    },
    summary: options.summary ?? title,
    serves,
    sourcePhase: 'architecture',
    provenance: provenanceFor('architecture-decisions'),
  };
}

export function entityInput(
  name: string,
  serves: readonly string[],
  attributes: readonly string[] = []
): ArtifactInput {
  return {
    type: 'entity',
    fields: { name, description: `${name} entity`, attributes },
    summary: name,
    serves,
    sourcePhase: 'architecture',
    provenance: provenanceFor('architecture-decisions'),
  };
}

export function workItemInput(
  title: string,
  implementsIds: readonly string[],
  options: { dependsOn?: readonly string[]; incomplete?: boolean } = {}
): ArtifactInput {
  return {
    type: 'work-item',
    fields: {
      title,
      description: `${title} work`,
      acceptanceCriteria: [`${title} is done`],
      dependsOn: options.dependsOn ?? [],
    },
    summary: title,
    implements: implementsIds,
    sourcePhase: 'work-items',
    provenance: provenanceFor('work-item-generation', options.incomplete ?? false),
  };
}
