import { describe, it, expect } from 'vitest';
import { ambiguousCandidate, seedlingCandidate } from '../testing/fixtures.js';
import { getAmbiguousInvariants } from './clarification.js';
import { formatAmbiguities, formatAnchorContext } from './format.js';

describe('formatAnchorContext', () => {
  it('should render every anchor section in order', () => {
    expect(formatAnchorContext(seedlingCandidate())).toBe(
      [
        '## Concept Anchor (MUST HONOR)',
        '',
        '### Intent',
        '**Goal:** Let members of an existing gardening club swap seedlings with each other.',
        '',
        '**Explicit Constraints:**',
        '- Members only',
        '',
        '### Invariants (MUST preserve)',
        '- **community_model**: closed community of existing club members',
        '  - Source: "Only for people already in our club"',
        '- **exchange_model**: swaps without money',
        '  - Source: "members swap seedlings, no selling"',
        '',
        '### Identity Features (do NOT genericize)',
        '- **Swaps between neighbours who already know each other**',
        '  - Risk: Tends to turn into a generic public marketplace',
        '',
        '### Non-Goals (do NOT add these)',
        '- Public sign-up',
        '- Payments',
      ].join('\n')
    );
  });

  it('should omit empty sections', () => {
    const text = formatAnchorContext({
      goal: 'Track seed stock.',
      explicitConstraints: [],
      nonGoals: [],
      invariants: [],
      identityFeatures: [],
    });

    expect(text).toBe('## Concept Anchor (MUST HONOR)\n\n### Intent\n**Goal:** Track seed stock.');
  });
});

describe('formatAmbiguities', () => {
  it('should number the options', () => {
    const ambiguous = getAmbiguousInvariants(ambiguousCandidate(), 0.7);

    expect(formatAmbiguities(ambiguous)).toBe(
      [
        'season (confidence 0.40): spring',
        '  The request does not say when swaps happen.',
        '  1. spring only',
        '  2. all year',
      ].join('\n')
    );
  });
});
