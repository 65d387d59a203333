/**
 * Text rendering of the anchor for generation contexts and review.
 *
 * @packageDocumentation
 */

import type { AnchorCandidate, AnchorInvariant } from './types.js';

export const ANCHOR_HEADING = '## Concept Anchor (MUST HONOR)';

/**
 * Renders the anchor block placed first in every stage context.
 */
export function formatAnchorContext(anchor: AnchorCandidate): string {
  const lines = [ANCHOR_HEADING, '', '### Intent', `**Goal:** ${anchor.goal}`];

  if (anchor.explicitConstraints.length > 0) {
    lines.push('', '**Explicit Constraints:**');
    lines.push(...anchor.explicitConstraints.map((constraint) => `- ${constraint}`));
  }

  if (anchor.invariants.length > 0) {
    lines.push('', '### Invariants (MUST preserve)');
    for (const invariant of anchor.invariants) {
      lines.push(`- **${invariant.property}**: ${invariant.value}`);
      lines.push(`  - Source: "${invariant.source}"`);
    }
  }

  if (anchor.identityFeatures.length > 0) {
    lines.push('', '### Identity Features (do NOT genericize)');
    for (const feature of anchor.identityFeatures) {
      lines.push(`- **${feature.feature}**`);
      lines.push(`  - Risk: ${feature.whyDistinctive}`);
    }
  }

  if (anchor.nonGoals.length > 0) {
    lines.push('', '### Non-Goals (do NOT add these)');
    lines.push(...anchor.nonGoals.map((nonGoal) => `- ${nonGoal}`));
  }

  return lines.join('\n');
}

/**
 * Renders ambiguous invariants with numbered options for a human.
 */
export function formatAmbiguities(invariants: readonly AnchorInvariant[]): string {
  return invariants
    .map((invariant) => {
      const options = (invariant.clarificationOptions ?? []).map(
        (option, index) => `  ${String(index + 1)}. ${option}`
      );
      return [
        `${invariant.property} (confidence ${invariant.confidence.toFixed(2)}): ${invariant.value}`,
        `  ${invariant.ambiguity ?? 'No explanation given.'}`,
        ...options,
      ].join('\n');
    })
    .join('\n\n');
}
