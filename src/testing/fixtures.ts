/**
 * Shared test data: a closed-community seedling swap.
 *
 * @packageDocumentation
 */

import type { AnchorCandidate, ConceptAnchor } from '../anchor/types.js';

export const SEEDLING_IDEA =
  'A seedling swap for our gardening club. Only for people already in our club; ' +
  'members swap seedlings, no selling.';

export function seedlingCandidate(): AnchorCandidate {
  return {
    goal: 'Let members of an existing gardening club swap seedlings with each other.',
    explicitConstraints: ['Members only'],
    nonGoals: ['Public sign-up', 'Payments'],
    invariants: [
      {
        property: 'community_model',
        value: 'closed community of existing club members',
        source: 'Only for people already in our club',
        confidence: 0.95,
      },
      {
        property: 'exchange_model',
        value: 'swaps without money',
        source: 'members swap seedlings, no selling',
        confidence: 0.9,
      },
    ],
    identityFeatures: [
      {
        feature: 'Swaps between neighbours who already know each other',
        whyDistinctive: 'Tends to turn into a generic public marketplace',
      },
    ],
  };
}

/**
 * The same candidate with an ambiguous invariant appended.
 */
export function ambiguousCandidate(): AnchorCandidate {
  const candidate = seedlingCandidate();
  return {
    ...candidate,
    invariants: [
      ...candidate.invariants,
      {
        property: 'season',
        value: 'spring',
        source: 'seedlings',
        confidence: 0.4,
        ambiguity: 'The request does not say when swaps happen.',
        clarificationOptions: ['spring only', 'all year'],
      },
    ],
  };
}

export function seedlingAnchor(confirmedAt = '2026-03-01T12:00:00.000Z'): ConceptAnchor {
  return { ...seedlingCandidate(), confirmed: true, confirmedAt };
}
