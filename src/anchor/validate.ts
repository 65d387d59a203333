/**
 * Programmatic checks on extracted anchors and declared overrides.
 *
 * Schema validation guarantees shape; these checks cover content rules a
 * JSON Schema cannot express cleanly.
 *
 * @packageDocumentation
 */

import { isNonEmptyString } from '../utils/guards.js';
import type {
  AnchorCandidate,
  AnchorInvariant,
  AnchorValidationIssue,
  AnchorValidationResult,
  InvariantOverride,
} from './types.js';

/** Bounds on the number of clarification options for an ambiguous invariant. */
export const MIN_CLARIFICATION_OPTIONS = 2;
export const MAX_CLARIFICATION_OPTIONS = 3;

function checkInvariant(
  invariant: AnchorInvariant,
  index: number,
  threshold: number
): AnchorValidationIssue[] {
  const issues: AnchorValidationIssue[] = [];
  const at = `invariants[${String(index)}]`;

  if (!isNonEmptyString(invariant.property)) {
    issues.push({ path: `${at}.property`, message: 'property must not be empty' });
  }
  if (!isNonEmptyString(invariant.value)) {
    issues.push({ path: `${at}.value`, message: 'value must not be empty' });
  }
  if (!isNonEmptyString(invariant.source)) {
    issues.push({
      path: `${at}.source`,
      message: 'source must quote the original request',
    });
  }
  if (!Number.isFinite(invariant.confidence) || invariant.confidence < 0 || invariant.confidence > 1) {
    issues.push({
      path: `${at}.confidence`,
      message: `confidence must be within [0, 1], got ${String(invariant.confidence)}`,
    });
    return issues;
  }

  if (invariant.confidence < threshold && invariant.userConfirmed !== true) {
    if (!isNonEmptyString(invariant.ambiguity)) {
      issues.push({
        path: `${at}.ambiguity`,
        message: `confidence ${String(invariant.confidence)} is below ${String(threshold)}; explain the ambiguity`,
      });
    }
    const options = (invariant.clarificationOptions ?? []).filter(isNonEmptyString);
    if (
      options.length < MIN_CLARIFICATION_OPTIONS ||
      options.length > MAX_CLARIFICATION_OPTIONS
    ) {
      issues.push({
        path: `${at}.clarificationOptions`,
        message: `an ambiguous invariant needs ${String(MIN_CLARIFICATION_OPTIONS)}-${String(MAX_CLARIFICATION_OPTIONS)} clarification options, got ${String(options.length)}`,
      });
    } else if (new Set(options).size !== options.length) {
      issues.push({
        path: `${at}.clarificationOptions`,
        message: 'clarification options must be distinct',
      });
    }
  }

  return issues;
}

/**
 * Validates an extracted anchor candidate.
 *
 * @param candidate - Schema-valid extraction output.
 * @param threshold - Confidence below which an invariant counts as ambiguous.
 * @returns The unconfirmed anchor, or every issue found.
 */
export function validateAnchor(
  candidate: AnchorCandidate,
  threshold: number
): AnchorValidationResult {
  const issues: AnchorValidationIssue[] = [];

  if (!isNonEmptyString(candidate.goal)) {
    issues.push({ path: 'goal', message: 'goal must not be empty' });
  }

  const seen = new Set<string>();
  candidate.invariants.forEach((invariant, index) => {
    issues.push(...checkInvariant(invariant, index, threshold));
    if (seen.has(invariant.property)) {
      issues.push({
        path: `invariants[${String(index)}].property`,
        message: `duplicate invariant '${invariant.property}'`,
      });
    }
    seen.add(invariant.property);
  });

  candidate.identityFeatures.forEach((feature, index) => {
    if (!isNonEmptyString(feature.feature)) {
      issues.push({
        path: `identityFeatures[${String(index)}].feature`,
        message: 'feature must not be empty',
      });
    }
  });

  if (issues.length > 0) {
    return { valid: false, issues };
  }
  return { valid: true, anchor: { ...candidate, confirmed: false } };
}

/**
 * Checks that each override names an existing invariant and gives a reason.
 */
export function validateOverrides(
  anchor: AnchorCandidate,
  overrides: readonly InvariantOverride[]
): AnchorValidationIssue[] {
  const known = new Set(anchor.invariants.map((invariant) => invariant.property));
  const issues: AnchorValidationIssue[] = [];

  overrides.forEach((override, index) => {
    const at = `overrides[${String(index)}]`;
    if (!known.has(override.invariant)) {
      issues.push({
        path: `${at}.invariant`,
        message: `unknown invariant '${override.invariant}'`,
      });
    }
    if (!isNonEmptyString(override.reason)) {
      issues.push({ path: `${at}.reason`, message: 'an override needs a reason' });
    }
  });

  return issues;
}

/**
 * Renders issues as `path: message` lines, used as corrective feedback.
 */
export function formatAnchorIssues(issues: readonly AnchorValidationIssue[]): string[] {
  return issues.map((issue) => `${issue.path}: ${issue.message}`);
}
