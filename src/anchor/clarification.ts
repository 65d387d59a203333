/**
 * Human clarification and confirmation of the anchor.
 *
 * @packageDocumentation
 */

import { ExtractionAmbiguityError } from '../errors.js';
import { DEFAULT_ANCHOR } from '../config/defaults.js';
import type {
  AnchorCandidate,
  AnchorInvariant,
  ClarificationSelection,
  ConceptAnchor,
} from './types.js';

/**
 * Invariants still awaiting a human choice: below the threshold and not yet
 * confirmed.
 */
export function getAmbiguousInvariants(
  anchor: AnchorCandidate,
  threshold: number
): AnchorInvariant[] {
  return anchor.invariants.filter(
    (invariant) => invariant.confidence < threshold && invariant.userConfirmed !== true
  );
}

function isConfirmed(anchor: AnchorCandidate): boolean {
  return 'confirmed' in anchor && anchor.confirmed === true;
}

/**
 * Applies the human's choices to ambiguous invariants.
 *
 * Each selected invariant takes the chosen option as its value, confidence
 * 1.0 and `userConfirmed`; its ambiguity text and options are dropped.
 *
 * @throws ExtractionAmbiguityError for an unknown invariant, an option the
 * invariant does not offer, a repeated selection, or a confirmed anchor.
 */
export function resolveAmbiguity(
  anchor: AnchorCandidate,
  selections: readonly ClarificationSelection[]
): AnchorCandidate {
  if (isConfirmed(anchor)) {
    throw new ExtractionAmbiguityError(
      'The anchor is confirmed and can no longer change',
      selections.map((selection) => selection.invariant)
    );
  }

  const chosen = new Map<string, string>();
  for (const selection of selections) {
    if (chosen.has(selection.invariant)) {
      throw new ExtractionAmbiguityError(
        `Invariant '${selection.invariant}' was selected more than once`,
        [selection.invariant]
      );
    }
    const invariant = anchor.invariants.find((item) => item.property === selection.invariant);
    if (invariant === undefined) {
      throw new ExtractionAmbiguityError(`Unknown invariant '${selection.invariant}'`, [
        selection.invariant,
      ]);
    }
    const options = invariant.clarificationOptions ?? [];
    if (!options.includes(selection.option)) {
      throw new ExtractionAmbiguityError(
        `'${selection.option}' is not an option for invariant '${selection.invariant}'`,
        [selection.invariant],
        { details: options.length > 0 ? `Options: ${options.join(' | ')}` : 'No options offered' }
      );
    }
    chosen.set(selection.invariant, selection.option);
  }

  return {
    ...anchor,
    invariants: anchor.invariants.map((invariant): AnchorInvariant => {
      const option = chosen.get(invariant.property);
      if (option === undefined) {
        return invariant;
      }
      return {
        property: invariant.property,
        value: option,
        source: invariant.source,
        confidence: 1,
        userConfirmed: true,
      };
    }),
  };
}

function deepFreeze<T>(value: T): T {
  if (typeof value === 'object' && value !== null && !Object.isFrozen(value)) {
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
    Object.freeze(value);
  }
  return value;
}

/**
 * Confirms the anchor. The result is deeply frozen; it is never altered
 * afterwards.
 *
 * @throws ExtractionAmbiguityError while any invariant is still ambiguous.
 */
export function confirmAnchor(
  anchor: AnchorCandidate,
  now: Date = new Date(),
  threshold: number = DEFAULT_ANCHOR.confidence_threshold
): ConceptAnchor {
  const ambiguous = getAmbiguousInvariants(anchor, threshold);
  if (ambiguous.length > 0) {
    throw new ExtractionAmbiguityError(
      `Resolve ${String(ambiguous.length)} ambiguous invariant(s) before confirming`,
      ambiguous.map((invariant) => invariant.property)
    );
  }

  const confirmed: ConceptAnchor = {
    goal: anchor.goal,
    explicitConstraints: [...anchor.explicitConstraints],
    nonGoals: [...anchor.nonGoals],
    invariants: anchor.invariants.map((invariant) => ({ ...invariant })),
    identityFeatures: anchor.identityFeatures.map((feature) => ({ ...feature })),
    confirmed: true,
    confirmedAt: now.toISOString(),
  };
  return deepFreeze(confirmed);
}
