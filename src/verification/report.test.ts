import { describe, it, expect } from 'vitest';
import { VerificationViolationError } from '../errors.js';
import { Logger } from '../utils/logger.js';
import {
  applyOverride,
  canProceed,
  correctiveFeedback,
  formatReportSummary,
  unresolvedBlocking,
} from './report.js';
import type { PhaseVerificationReport } from './types.js';

function failedScope(): PhaseVerificationReport {
  return {
    phase: 'scope',
    mode: 'single',
    passed: false,
    invariantsHonored: ['exchange_model'],
    invariantsViolated: [
      {
        invariant: 'community_model',
        violation: 'Adds open public registration',
        stage: 'capability-model',
        severity: 'blocking',
        suggestedFix: 'Invite existing members only',
      },
    ],
    identityPreserved: [],
    identityGenericized: [],
    warnings: [],
    confidenceScore: 0.8,
    checks: ['single'],
    overrides: [],
    createdAt: '2026-03-02T09:00:00.000Z',
  };
}

const ack = {
  invariant: 'community_model',
  stage: 'capability-model',
  reason: 'The club voted to admit neighbours',
} as const;

describe('applyOverride', () => {
  it('should return a new report and leave the original untouched', () => {
    const report = failedScope();
    const lines: string[] = [];
    const logger = new Logger({ component: 'test', sink: (line) => lines.push(line) });

    const overridden = applyOverride(report, ack, new Date('2026-03-02T10:00:00.000Z'), logger);

    expect(report.overrides).toEqual([]);
    expect(canProceed(report)).toBe(false);
    expect(overridden.overrides).toEqual([
      { ...ack, acknowledgedAt: '2026-03-02T10:00:00.000Z' },
    ]);
    expect(overridden.passed).toBe(true);
    expect(canProceed(overridden)).toBe(true);
    expect(unresolvedBlocking(overridden)).toEqual([]);
    expect(lines.map((line): unknown => JSON.parse(line))).toContainEqual(
      expect.objectContaining({ level: 'warn', event: 'violation_overridden' })
    );
  });

  it('should reject an override for a violation that was not reported', () => {
    expect(() =>
      applyOverride(failedScope(), { ...ack, stage: 'system-traits' })
    ).toThrow(VerificationViolationError);
  });

  it('should require a reason', () => {
    expect(() => applyOverride(failedScope(), { ...ack, reason: '  ' })).toThrow(
      "Overriding 'community_model' needs a reason"
    );
  });
});

describe('correctiveFeedback', () => {
  it('should group unresolved blocking violations by stage', () => {
    expect(correctiveFeedback(failedScope())).toEqual(
      new Map([
        [
          'capability-model',
          [
            "Violates invariant 'community_model': Adds open public registration Suggested fix: Invite existing members only",
          ],
        ],
      ])
    );
  });

  it('should be empty once the violation is overridden', () => {
    expect(correctiveFeedback(applyOverride(failedScope(), ack)).size).toBe(0);
  });
});

describe('formatReportSummary', () => {
  it('should list blocking violations first', () => {
    expect(formatReportSummary(failedScope())).toBe(
      [
        'Scope (WHAT) verification: FAILED (confidence 0.80, single)',
        'Blocking:',
        '- community_model in capability-model: Adds open public registration',
        'Honored: exchange_model',
      ].join('\n')
    );
  });

  it('should mark overridden violations', () => {
    const overridden = applyOverride(failedScope(), ack);

    expect(formatReportSummary(overridden)).toBe(
      [
        'Scope (WHAT) verification: PASSED (confidence 0.80, single)',
        'Warnings:',
        '- community_model in capability-model: Adds open public registration [overridden]',
        'Honored: exchange_model',
      ].join('\n')
    );
  });
});
