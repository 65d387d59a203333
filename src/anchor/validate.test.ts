import { describe, it, expect } from 'vitest';
import { ambiguousCandidate, seedlingCandidate } from '../testing/fixtures.js';
import type { AnchorCandidate } from './types.js';
import { formatAnchorIssues, validateAnchor, validateOverrides } from './validate.js';

const withInvariant = (
  patch: Partial<AnchorCandidate['invariants'][number]>
): AnchorCandidate => {
  const candidate = seedlingCandidate();
  const [first, ...rest] = candidate.invariants;
  if (first === undefined) {
    throw new Error('fixture has no invariants');
  }
  return { ...candidate, invariants: [{ ...first, ...patch }, ...rest] };
};

describe('validateAnchor', () => {
  it('should accept a complete candidate as an unconfirmed anchor', () => {
    const result = validateAnchor(seedlingCandidate(), 0.7);

    expect(result.valid).toBe(true);
    if (result.valid) {
      expect(result.anchor.confirmed).toBe(false);
      expect(result.anchor.goal).toBe(seedlingCandidate().goal);
    }
  });

  it('should accept an ambiguous invariant that explains itself', () => {
    expect(validateAnchor(ambiguousCandidate(), 0.7).valid).toBe(true);
  });

  it('should require a source quote', () => {
    const result = validateAnchor(withInvariant({ source: '  ' }), 0.7);

    expect(result).toEqual({
      valid: false,
      issues: [{ path: 'invariants[0].source', message: 'source must quote the original request' }],
    });
  });

  it('should reject confidence outside [0, 1]', () => {
    const result = validateAnchor(withInvariant({ confidence: 1.2 }), 0.7);

    expect(result.valid).toBe(false);
    if (!result.valid) {
      expect(formatAnchorIssues(result.issues)).toEqual([
        'invariants[0].confidence: confidence must be within [0, 1], got 1.2',
      ]);
    }
  });

  it('should require ambiguity text and 2-3 options below the threshold', () => {
    const result = validateAnchor(
      withInvariant({ confidence: 0.5, clarificationOptions: ['only one'] }),
      0.7
    );

    expect(result.valid).toBe(false);
    if (!result.valid) {
      expect(result.issues.map((issue) => issue.path)).toEqual([
        'invariants[0].ambiguity',
        'invariants[0].clarificationOptions',
      ]);
    }
  });

  it('should reject more than three options', () => {
    const result = validateAnchor(
      withInvariant({
        confidence: 0.5,
        ambiguity: 'unclear',
        clarificationOptions: ['a', 'b', 'c', 'd'],
      }),
      0.7
    );

    expect(result.valid).toBe(false);
  });

  it('should treat the threshold as exclusive', () => {
    expect(validateAnchor(withInvariant({ confidence: 0.7 }), 0.7).valid).toBe(true);
  });

  it('should reject an empty goal and duplicate invariants', () => {
    const candidate = seedlingCandidate();
    const first = candidate.invariants[0];
    if (first === undefined) {
      throw new Error('fixture has no invariants');
    }

    const result = validateAnchor(
      { ...candidate, goal: '', invariants: [...candidate.invariants, first] },
      0.7
    );

    expect(result.valid).toBe(false);
    if (!result.valid) {
      expect(formatAnchorIssues(result.issues)).toEqual([
        'goal: goal must not be empty',
        "invariants[2].property: duplicate invariant 'community_model'",
      ]);
    }
  });
});

describe('validateOverrides', () => {
  it('should accept overrides of known invariants with a reason', () => {
    expect(
      validateOverrides(seedlingCandidate(), [
        { invariant: 'community_model', reason: 'Guests may look.', userImpact: 'Read-only.' },
      ])
    ).toEqual([]);
  });

  it('should flag unknown invariants and missing reasons', () => {
    const issues = validateOverrides(seedlingCandidate(), [
      { invariant: 'pricing', reason: '', userImpact: '' },
    ]);

    expect(formatAnchorIssues(issues)).toEqual([
      "overrides[0].invariant: unknown invariant 'pricing'",
      'overrides[0].reason: an override needs a reason',
    ]);
  });
});
