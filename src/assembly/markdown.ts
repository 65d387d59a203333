/**
 * Markdown rendering of a Resolved Specification for human export.
 *
 * @packageDocumentation
 */

import { formatAnchorContext } from '../anchor/format.js';
import type { CapabilityArtifact } from '../store/types.js';
import { STAGE_TITLES } from '../workflow/ids.js';
import type { ResolvedSpecification } from './types.js';

const ref = (capability: CapabilityArtifact): string =>
  `${capability.id} (${capability.fields.name})`;

export function renderSpecificationMarkdown(spec: ResolvedSpecification): string {
  const out: string[] = ['# Resolved Specification', '', formatAnchorContext(spec.anchor), ''];

  out.push('## Capabilities', '');
  for (const capability of spec.capabilities) {
    out.push(`### ${capability.id}: ${capability.fields.name}`, '');
    out.push(capability.fields.description, '');
    out.push(`- Category: ${capability.fields.category}`, '');
  }

  if (spec.uncovered.length > 0) {
    out.push('## Uncovered Capabilities', '');
    out.push(...spec.uncovered.map((capability) => `- ${ref(capability)}`), '');
  }

  if (spec.decisions.length > 0) {
    out.push('## Architecture Decisions', '');
    for (const { decision, serves } of spec.decisions) {
      out.push(`### ${decision.id}: ${decision.fields.title}`, '');
      out.push(decision.fields.decision, '');
      out.push(`- Rationale: ${decision.fields.rationale}`);
      if (decision.fields.alternatives !== undefined && decision.fields.alternatives.length > 0) {
        out.push(`- Alternatives: ${decision.fields.alternatives.join('; ')}`);
      }
      out.push(`- Serves: ${serves.map(ref).join(', ')}`, '');
    }
  }

  if (spec.entities.length > 0) {
    out.push('## Entities', '');
    for (const { entity, serves } of spec.entities) {
      out.push(`### ${entity.id}: ${entity.fields.name}`, '');
      out.push(entity.fields.description, '');
      if (entity.fields.attributes.length > 0) {
        out.push(`- Attributes: ${entity.fields.attributes.join(', ')}`);
      }
      out.push(`- Serves: ${serves.map((decision) => decision.id).join(', ')}`, '');
    }
  }

  out.push('## Work Items', '');
  if (spec.workItems.length === 0) {
    out.push('None.', '');
  }
  for (const { workItem, implements: caps, dependsOn, position } of spec.workItems) {
    const flag = workItem.provenance.incomplete ? ' (incomplete)' : '';
    out.push(`### ${String(position)}. ${workItem.id}: ${workItem.fields.title}${flag}`, '');
    out.push(workItem.fields.description, '');
    out.push(`- Implements: ${caps.map(ref).join(', ')}`);
    if (dependsOn.length > 0) {
      out.push(`- Depends on: ${dependsOn.map((item) => item.id).join(', ')}`);
    }
    out.push('- Acceptance criteria:');
    out.push(...workItem.fields.acceptanceCriteria.map((criterion) => `  - ${criterion}`), '');
  }

  if (spec.legacy.length > 0) {
    out.push('## Unstructured Inputs', '');
    for (const placeholder of spec.legacy) {
      out.push(
        `### ${placeholder.id}: ${STAGE_TITLES[placeholder.stage]} (until ${placeholder.removeAfter})`,
        '',
        placeholder.text,
        ''
      );
    }
  }

  return `${out.join('\n').trimEnd()}\n`;
}
