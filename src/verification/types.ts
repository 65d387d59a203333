/**
 * Types for phase-boundary verification.
 *
 * @packageDocumentation
 */

import type { InvariantOverride } from '../anchor/types.js';
import type { PhaseId, StageId } from '../workflow/ids.js';
import type { VerificationMode } from '../config/types.js';

/**
 * Severity of a violation.
 *
 * - blocking: the producing stage is re-run with the violation as feedback,
 *   then escalated; no phase transition until resolved or overridden.
 * - warning: surfaced at the gate, never auto-resolved.
 */
export type ViolationSeverity = 'blocking' | 'warning';

export interface InvariantViolation {
  /** Property of the violated anchor invariant. */
  readonly invariant: string;
  readonly violation: string;
  /** Stage whose output violates the invariant. */
  readonly stage: StageId;
  readonly severity: ViolationSeverity;
  readonly suggestedFix?: string;
  /** Set when a matching output override downgraded a blocking finding. */
  readonly downgradedBy?: InvariantOverride;
}

export interface GenericizedFeature {
  /** The identity feature that was lost. */
  readonly feature: string;
  /** What replaced it. */
  readonly genericReplacement: string;
  readonly stage: StageId;
  /** Quote from the stage output. */
  readonly evidence: string;
}

/**
 * Human acknowledgement of a violation.
 */
export interface OverrideAck {
  readonly invariant: string;
  readonly stage: StageId;
  readonly reason: string;
  readonly acknowledgedAt: string;
}

export type VerificationCheck = 'single' | 'invariant-compliance' | 'genericization' | 'internal-consistency';

/**
 * Findings returned by one verification call.
 */
export interface VerificationFindings {
  readonly honored: readonly string[];
  readonly violations: readonly {
    readonly invariant: string;
    readonly violation: string;
    readonly stage: StageId;
    readonly severity: ViolationSeverity;
    readonly suggestedFix?: string;
  }[];
  readonly preserved: readonly string[];
  readonly genericized: readonly GenericizedFeature[];
  readonly warnings: readonly string[];
  /** Checker's confidence in [0, 1]. */
  readonly confidence: number;
}

/**
 * Phase verification report. Never mutated; overrides produce a new report.
 */
export interface PhaseVerificationReport {
  readonly phase: PhaseId;
  readonly mode: VerificationMode;
  /** No blocking violation. Derived, see {@link unresolvedBlocking}. */
  readonly passed: boolean;
  readonly invariantsHonored: readonly string[];
  readonly invariantsViolated: readonly InvariantViolation[];
  readonly identityPreserved: readonly string[];
  readonly identityGenericized: readonly GenericizedFeature[];
  readonly warnings: readonly string[];
  readonly confidenceScore: number;
  /** Checks that contributed, in run order. */
  readonly checks: readonly VerificationCheck[];
  readonly overrides: readonly OverrideAck[];
  readonly createdAt: string;
}
