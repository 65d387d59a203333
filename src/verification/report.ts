/**
 * Reading and overriding phase verification reports.
 *
 * @packageDocumentation
 */

import { VerificationViolationError } from '../errors.js';
import { createSilentLogger, type Logger } from '../utils/logger.js';
import { PHASE_TITLES, type StageId } from '../workflow/ids.js';
import type { InvariantViolation, OverrideAck, PhaseVerificationReport } from './types.js';

const isAcknowledged = (violation: InvariantViolation, overrides: readonly OverrideAck[]): boolean =>
  overrides.some((ack) => ack.invariant === violation.invariant && ack.stage === violation.stage);

/**
 * Blocking violations without an override acknowledgement.
 */
export function unresolvedBlocking(report: PhaseVerificationReport): InvariantViolation[] {
  return report.invariantsViolated.filter(
    (violation) => violation.severity === 'blocking' && !isAcknowledged(violation, report.overrides)
  );
}

/**
 * True when the phase may transition: every blocking violation is acknowledged.
 */
export function canProceed(report: PhaseVerificationReport): boolean {
  return unresolvedBlocking(report).length === 0;
}

/**
 * Records a human override. Returns a new report; the given one is untouched.
 *
 * Warnings and blocking violations can both be overridden.
 *
 * @throws VerificationViolationError if the report has no such violation.
 */
export function applyOverride(
  report: PhaseVerificationReport,
  ack: Omit<OverrideAck, 'acknowledgedAt'>,
  now: Date = new Date(),
  logger: Logger = createSilentLogger('PhaseVerifier')
): PhaseVerificationReport {
  const violation = report.invariantsViolated.find(
    (candidate) => candidate.invariant === ack.invariant && candidate.stage === ack.stage
  );
  if (violation === undefined) {
    throw new VerificationViolationError(
      `No violation of '${ack.invariant}' was reported for stage '${ack.stage}'`,
      [ack.invariant]
    );
  }
  if (ack.reason.trim() === '') {
    throw new VerificationViolationError(
      `Overriding '${ack.invariant}' needs a reason`,
      [ack.invariant]
    );
  }

  const overrides = [...report.overrides, { ...ack, acknowledgedAt: now.toISOString() }];
  logger.warn('violation_overridden', {
    phase: report.phase,
    invariant: ack.invariant,
    stage: ack.stage,
    severity: violation.severity,
    reason: ack.reason,
  });

  return {
    ...report,
    overrides,
    passed: report.invariantsViolated.every(
      (candidate) => candidate.severity !== 'blocking' || isAcknowledged(candidate, overrides)
    ),
  };
}

/**
 * Unresolved blocking violations grouped by the stage that must re-run,
 * phrased as corrective feedback.
 */
export function correctiveFeedback(report: PhaseVerificationReport): Map<StageId, string[]> {
  const byStage = new Map<StageId, string[]>();
  for (const violation of unresolvedBlocking(report)) {
    const line =
      `Violates invariant '${violation.invariant}': ${violation.violation}` +
      (violation.suggestedFix !== undefined ? ` Suggested fix: ${violation.suggestedFix}` : '');
    byStage.set(violation.stage, [...(byStage.get(violation.stage) ?? []), line]);
  }
  return byStage;
}

/**
 * Plain-text summary for the decision gate.
 *
 * @example
 * ```typescript
 * formatReportSummary(report);
 * // Scope (WHAT) verification: FAILED (confidence 0.80, single)
 * // Blocking:
 * // - community_model in capability-model: Adds open public registration
 * ```
 */
export function formatReportSummary(report: PhaseVerificationReport): string {
  const unresolved = unresolvedBlocking(report);
  const status = unresolved.length === 0 ? 'PASSED' : 'FAILED';
  const lines = [
    `${PHASE_TITLES[report.phase]} verification: ${status} (confidence ${report.confidenceScore.toFixed(2)}, ${report.checks.join(' + ')})`,
  ];

  if (unresolved.length > 0) {
    lines.push('Blocking:');
    lines.push(...unresolved.map((v) => `- ${v.invariant} in ${v.stage}: ${v.violation}`));
  }

  const warned = report.invariantsViolated.filter((v) => !unresolved.includes(v));
  if (warned.length > 0) {
    lines.push('Warnings:');
    lines.push(
      ...warned.map((v) => {
        const tag = isAcknowledged(v, report.overrides)
          ? ' [overridden]'
          : v.downgradedBy !== undefined
            ? ' [declared override]'
            : '';
        return `- ${v.invariant} in ${v.stage}: ${v.violation}${tag}`;
      })
    );
  }

  if (report.identityGenericized.length > 0) {
    lines.push('Genericized:');
    lines.push(
      ...report.identityGenericized.map(
        (flag) => `- ${flag.feature} -> ${flag.genericReplacement} (${flag.stage})`
      )
    );
  }

  if (report.warnings.length > 0) {
    lines.push('Notes:');
    lines.push(...report.warnings.map((warning) => `- ${warning}`));
  }

  if (report.invariantsHonored.length > 0) {
    lines.push(`Honored: ${report.invariantsHonored.join(', ')}`);
  }
  return lines.join('\n');
}
