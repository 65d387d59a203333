/**
 * Phase-Boundary Verifier.
 *
 * Runs once per phase, after its stages and before its gate. Each check is
 * an independent generation call that sees only the frozen anchor plus the
 * phase's own outputs and artifacts. Multi-pass findings are merged by a
 * deterministic synthesis, never by another generation call.
 *
 * @packageDocumentation
 */

import { formatAnchorContext } from '../anchor/format.js';
import type { ConceptAnchor, InvariantOverride } from '../anchor/types.js';
import type { VerificationMode } from '../config/types.js';
import { artifactLine } from '../context/assembler.js';
import type { GenerationError } from '../generation/types.js';
import type { ValidatedGenerator } from '../generation/validated.js';
import type { Artifact } from '../store/types.js';
import { sortedUnique } from '../utils/guards.js';
import { createSilentLogger, type Logger } from '../utils/logger.js';
import { PHASE_TITLES, STAGE_TITLES, type PhaseId, type StageId } from '../workflow/ids.js';
import { overridesOf, type StageOutput } from '../workflow/outputs.js';
import type {
  GenericizedFeature,
  InvariantViolation,
  PhaseVerificationReport,
  VerificationCheck,
  VerificationFindings,
  ViolationSeverity,
} from './types.js';

export interface VerifyPhaseInput {
  readonly phase: PhaseId;
  readonly anchor: ConceptAnchor;
  /** This phase's current artifacts only. */
  readonly artifacts: readonly Artifact[];
  /** This phase's stage outputs only. */
  readonly outputs: readonly StageOutput[];
  readonly mode: VerificationMode;
  readonly generator: ValidatedGenerator;
  readonly signal?: AbortSignal;
  readonly now?: () => Date;
  readonly logger?: Logger;
}

export type VerifyPhaseResult =
  | { readonly success: true; readonly report: PhaseVerificationReport }
  | {
      readonly success: false;
      /** Check whose generation failed. */
      readonly check: VerificationCheck;
      readonly error: GenerationError;
      readonly attempts: number;
    };

export interface CheckFindings {
  readonly check: VerificationCheck;
  readonly findings: VerificationFindings;
}

const MULTI_PASS_CHECKS = ['invariant-compliance', 'genericization', 'internal-consistency'] as const;

const FINDINGS_FORMAT = [
  'Report findings as JSON:',
  '- honored: invariant properties the outputs respect',
  '- violations: {invariant, violation, stage, severity, suggestedFix?}; severity is "blocking" when an output contradicts an invariant and "warning" when it is merely silent or vague',
  '- preserved / genericized: identity features kept, or replaced by a generic pattern ({feature, genericReplacement, stage, evidence})',
  '- warnings: anything else a reviewer should see',
  '- confidence: your confidence in these findings, from 0 to 1',
  'Outputs may deliberately deviate from an invariant when they declare an override; report the violation anyway.',
].join('\n');

/**
 * Instruction for each check.
 */
export const CHECK_INSTRUCTIONS: Readonly<Record<VerificationCheck, string>> = {
  single: [
    'You are an independent reviewer. Compare the phase outputs against the concept anchor.',
    'For each invariant decide whether it is honored or violated.',
    'For each identity feature decide whether it is preserved or genericized.',
    'Flag non-goals that crept in as features and contradictions between the outputs.',
    FINDINGS_FORMAT,
  ].join('\n'),
  'invariant-compliance': [
    'You are an independent reviewer checking invariant compliance only.',
    'For each anchor invariant and explicit constraint, find evidence in the outputs that it is honored or violated.',
    'Leave preserved and genericized empty.',
    FINDINGS_FORMAT,
  ].join('\n'),
  genericization: [
    'You are an independent reviewer checking for genericization only.',
    'For each identity feature, decide whether the outputs keep it or replace it with a generic pattern; quote the evidence.',
    'Leave honored and violations empty.',
    FINDINGS_FORMAT,
  ].join('\n'),
  'internal-consistency': [
    'You are an independent reviewer checking consistency between the outputs of this phase.',
    'Report contradictions between sibling outputs as violations of the invariant they bear on, or as warnings when none applies.',
    'Leave preserved and genericized empty.',
    FINDINGS_FORMAT,
  ].join('\n'),
};

/**
 * Renders the bounded verification input: anchor, outputs, artifacts.
 */
export function renderVerificationContext(
  phase: PhaseId,
  anchor: ConceptAnchor,
  outputs: readonly StageOutput[],
  artifacts: readonly Artifact[]
): string {
  const parts = [formatAnchorContext(anchor), `## Phase Under Review: ${PHASE_TITLES[phase]}`];
  for (const output of outputs) {
    parts.push(
      `### ${STAGE_TITLES[output.stage]} (${output.stage})\n\n\`\`\`json\n${JSON.stringify(output.data, null, 2)}\n\`\`\``
    );
  }
  if (artifacts.length > 0) {
    parts.push(`### Artifacts\n\n${artifacts.map((artifact) => artifactLine(artifact)).join('\n')}`);
  }
  return parts.join('\n\n');
}

const SEVERITY_RANK: Readonly<Record<ViolationSeverity, number>> = { warning: 0, blocking: 1 };

/**
 * Overrides declared by a stage, on its output or on artifacts it produced.
 */
function declaredOverrides(
  stage: StageId,
  outputs: readonly StageOutput[],
  artifacts: readonly Artifact[]
): InvariantOverride[] {
  return [
    ...outputs.filter((output) => output.stage === stage).flatMap((output) => overridesOf(output)),
    ...artifacts
      .filter((artifact) => artifact.provenance.stage === stage)
      .flatMap((artifact) => artifact.overrides ?? []),
  ];
}

/**
 * Merges check findings into one report.
 *
 * Violations are deduplicated by invariant and stage, keeping the highest
 * severity. Honored and preserved lists are the union across checks minus
 * anything another check flagged. Confidence is the lowest reported.
 * Blocking violations covered by an override the producing stage declared
 * are downgraded to warnings.
 */
export function synthesizeFindings(
  phase: PhaseId,
  mode: VerificationMode,
  results: readonly CheckFindings[],
  context: { outputs: readonly StageOutput[]; artifacts: readonly Artifact[]; now: Date }
): PhaseVerificationReport {
  const violations = new Map<string, InvariantViolation>();
  const genericized = new Map<string, GenericizedFeature>();

  for (const { findings } of results) {
    for (const found of findings.violations) {
      const key = `${found.invariant}\u0000${found.stage}`;
      const existing = violations.get(key);
      if (existing === undefined || SEVERITY_RANK[found.severity] > SEVERITY_RANK[existing.severity]) {
        violations.set(key, found);
      }
    }
    for (const flag of findings.genericized) {
      const key = `${flag.feature}\u0000${flag.stage}`;
      if (!genericized.has(key)) {
        genericized.set(key, flag);
      }
    }
  }

  const invariantsViolated = [...violations.values()].map((violation): InvariantViolation => {
    if (violation.severity !== 'blocking') {
      return violation;
    }
    const override = declaredOverrides(violation.stage, context.outputs, context.artifacts).find(
      (candidate) => candidate.invariant === violation.invariant
    );
    return override !== undefined
      ? { ...violation, severity: 'warning', downgradedBy: override }
      : violation;
  });
  const identityGenericized = [...genericized.values()];

  const violated = new Set(invariantsViolated.map((violation) => violation.invariant));
  const lost = new Set(identityGenericized.map((flag) => flag.feature));
  const all = results.map((result) => result.findings);

  const warnings = [...new Set(all.flatMap((findings) => findings.warnings))];
  for (const violation of invariantsViolated) {
    if (violation.downgradedBy !== undefined) {
      warnings.push(
        `Violation of '${violation.invariant}' in ${violation.stage} downgraded by declared override: ${violation.downgradedBy.reason}`
      );
    }
  }

  return {
    phase,
    mode,
    passed: !invariantsViolated.some((violation) => violation.severity === 'blocking'),
    invariantsHonored: sortedUnique(all.flatMap((findings) => findings.honored)).filter(
      (invariant) => !violated.has(invariant)
    ),
    invariantsViolated,
    identityPreserved: sortedUnique(all.flatMap((findings) => findings.preserved)).filter(
      (feature) => !lost.has(feature)
    ),
    identityGenericized,
    warnings,
    confidenceScore: all.length > 0 ? Math.min(...all.map((findings) => findings.confidence)) : 0,
    checks: results.map((result) => result.check),
    overrides: [],
    createdAt: context.now.toISOString(),
  };
}

/**
 * Verifies one phase against the anchor.
 *
 * Multi-pass checks run concurrently; if any fails, the first failure in
 * check order is returned and no report is produced.
 */
export async function verifyPhase(input: VerifyPhaseInput): Promise<VerifyPhaseResult> {
  const logger = input.logger ?? createSilentLogger('PhaseVerifier');
  const now = input.now ?? ((): Date => new Date());
  const checks: readonly VerificationCheck[] =
    input.mode === 'multi-pass' ? MULTI_PASS_CHECKS : ['single'];
  const context = renderVerificationContext(input.phase, input.anchor, input.outputs, input.artifacts);

  logger.info('verification_started', { phase: input.phase, mode: input.mode, checks });

  const results = await Promise.all(
    checks.map(async (check) => ({
      check,
      result: await input.generator.generate('verification-findings', {
        task: `verify:${check}`,
        instruction: CHECK_INSTRUCTIONS[check],
        context,
        feedback: [],
        ...(input.signal !== undefined ? { signal: input.signal } : {}),
      }),
    }))
  );

  const findings: CheckFindings[] = [];
  for (const { check, result } of results) {
    if (!result.success) {
      logger.error('verification_failed', {
        phase: input.phase,
        check,
        error: result.error.kind,
        message: result.error.message,
      });
      return { success: false, check, error: result.error, attempts: result.attempts };
    }
    findings.push({ check, findings: result.data });
  }

  const report = synthesizeFindings(input.phase, input.mode, findings, {
    outputs: input.outputs,
    artifacts: input.artifacts,
    now: now(),
  });

  logger.info('verification_completed', {
    phase: input.phase,
    passed: report.passed,
    violations: report.invariantsViolated.length,
    genericized: report.identityGenericized.length,
    confidence: report.confidenceScore,
  });
  return { success: true, report };
}
