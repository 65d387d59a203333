/**
 * Concept Anchor types.
 *
 * The anchor is a small structured distillation of the original request.
 * It is extracted once, clarified by a human where ambiguous, then frozen
 * and passed unchanged to every later stage.
 *
 * @packageDocumentation
 */

/**
 * A constraint the final plan must honour.
 */
export interface AnchorInvariant {
  /**
   * Name of the constrained property.
   * @example "community_model"
   */
  readonly property: string;
  /**
   * Required value.
   * @example "closed community of existing members"
   */
  readonly value: string;
  /** Quote from the original request that establishes the invariant. */
  readonly source: string;
  /** Extraction confidence in [0, 1]. */
  readonly confidence: number;
  /** Why the invariant is uncertain. Required below the confidence threshold. */
  readonly ambiguity?: string;
  /** Two or three candidate values offered to the human. */
  readonly clarificationOptions?: readonly string[];
  /** Set once a human selected a clarification option. */
  readonly userConfirmed?: boolean;
}

/**
 * A distinctive element of the idea that generic generation tends to replace.
 */
export interface IdentityFeature {
  readonly feature: string;
  readonly whyDistinctive: string;
}

/**
 * The frozen distillation of the original request.
 */
export interface ConceptAnchor {
  /** One-sentence goal. */
  readonly goal: string;
  readonly explicitConstraints: readonly string[];
  readonly nonGoals: readonly string[];
  readonly invariants: readonly AnchorInvariant[];
  readonly identityFeatures: readonly IdentityFeature[];
  /** True once a human confirmed the anchor; it is read-only from then on. */
  readonly confirmed: boolean;
  readonly confirmedAt?: string;
}

/**
 * A deliberate, justified deviation from an anchor invariant.
 *
 * Overrides travel with the artifact or stage output that deviates; the
 * anchor itself never changes.
 */
export interface InvariantOverride {
  /** Property of the overridden invariant. */
  readonly invariant: string;
  readonly reason: string;
  readonly userImpact: string;
}

/**
 * A human's answer to one ambiguous invariant.
 */
export interface ClarificationSelection {
  readonly invariant: string;
  /** One of the invariant's clarification options, verbatim. */
  readonly option: string;
}

/**
 * One problem found by anchor validation.
 */
export interface AnchorValidationIssue {
  /** Path to the offending field, e.g. `invariants[2].source`. */
  readonly path: string;
  readonly message: string;
}

/**
 * Outcome of validating an extracted anchor.
 */
export type AnchorValidationResult =
  | { readonly valid: true; readonly anchor: ConceptAnchor }
  | { readonly valid: false; readonly issues: readonly AnchorValidationIssue[] };

/**
 * Anchor content as produced by extraction, before human confirmation.
 */
export type AnchorCandidate = Omit<ConceptAnchor, 'confirmed' | 'confirmedAt'>;
