import { describe, it, expect, beforeAll } from 'vitest';
import { ANCHOR_HEADING } from '../anchor/format.js';
import type { InvariantOverride } from '../anchor/types.js';
import { SchemaRegistry } from '../generation/schema-registry.js';
import { ScriptedBackend, sequence } from '../generation/scripted-backend.js';
import { createBackendError } from '../generation/types.js';
import { createValidatedGenerator } from '../generation/validated.js';
import { seedlingAnchor } from '../testing/fixtures.js';
import type { StageOutput } from '../workflow/outputs.js';
import { canProceed, unresolvedBlocking } from './report.js';
import type { VerificationFindings } from './types.js';
import { verifyPhase } from './verifier.js';

const noSleep = (): Promise<void> => Promise.resolve();
const fixedNow = (): Date => new Date('2026-03-02T09:00:00.000Z');

const empty: VerificationFindings = {
  honored: [],
  violations: [],
  preserved: [],
  genericized: [],
  warnings: [],
  confidence: 1,
};

function capabilityModel(overrides?: readonly InvariantOverride[]): StageOutput {
  return {
    stage: 'capability-model',
    data: {
      summary: 'Listings and open sign-up.',
      capabilities: [
        {
          ref: 'signup',
          name: 'Open public registration',
          description: 'Anyone can create an account.',
          category: 'functional',
          summary: 'Open public registration',
        },
      ],
      ...(overrides !== undefined ? { overrides } : {}),
    },
    attempt: 1,
    producedAt: '2026-03-02T08:00:00.000Z',
    artifactIds: [],
  };
}

const openRegistration: VerificationFindings = {
  ...empty,
  honored: ['community_model', 'exchange_model'],
  violations: [
    {
      invariant: 'community_model',
      violation: 'Adds open public registration',
      stage: 'capability-model',
      severity: 'blocking',
      suggestedFix: 'Invite existing members only',
    },
  ],
  confidence: 0.8,
};

describe('verifyPhase', () => {
  let registry: SchemaRegistry;

  beforeAll(async () => {
    registry = await SchemaRegistry.load();
  });

  it('should report a blocking violation when a closed community gains public registration', async () => {
    const backend = new ScriptedBackend({ 'verify:single': sequence({ data: openRegistration }) });
    const generator = createValidatedGenerator(backend, registry, { sleep: noSleep });

    const result = await verifyPhase({
      phase: 'scope',
      anchor: seedlingAnchor(),
      artifacts: [],
      outputs: [capabilityModel()],
      mode: 'single',
      generator,
      now: fixedNow,
    });

    expect(result.success).toBe(true);
    if (!result.success) return;
    const { report } = result;
    expect(report.passed).toBe(false);
    expect(report.invariantsHonored).toEqual(['exchange_model']);
    expect(unresolvedBlocking(report).map((v) => v.invariant)).toEqual(['community_model']);
    expect(canProceed(report)).toBe(false);
    expect(report.checks).toEqual(['single']);
    expect(report.createdAt).toBe('2026-03-02T09:00:00.000Z');
  });

  it('should send only the anchor and this phase to the checker', async () => {
    const backend = new ScriptedBackend({ 'verify:single': sequence({ data: empty }) });
    const generator = createValidatedGenerator(backend, registry, { sleep: noSleep });

    await verifyPhase({
      phase: 'scope',
      anchor: seedlingAnchor(),
      artifacts: [],
      outputs: [capabilityModel()],
      mode: 'single',
      generator,
    });

    const context = backend.calls[0]?.context ?? '';
    expect(backend.calls).toHaveLength(1);
    expect(backend.calls[0]?.schema).toBe('verification-findings');
    expect(context.startsWith(ANCHOR_HEADING)).toBe(true);
    expect(context).toContain('## Phase Under Review: Scope (WHAT)');
    expect(context).toContain('### Capability Model (capability-model)');
    expect(context).toContain('"name": "Open public registration"');
  });

  it('should merge multi-pass findings deterministically', async () => {
    const backend = new ScriptedBackend({
      'verify:invariant-compliance': sequence({
        data: {
          ...empty,
          honored: ['community_model', 'exchange_model'],
          violations: [
            {
              invariant: 'community_model',
              violation: 'Does not mention membership checks',
              stage: 'capability-model',
              severity: 'warning',
            },
          ],
          confidence: 0.9,
        },
      }),
      'verify:genericization': sequence({
        data: {
          ...empty,
          genericized: [
            {
              feature: 'Swaps between neighbours who already know each other',
              genericReplacement: 'marketplace listings',
              stage: 'capability-model',
              evidence: 'Listings and open sign-up.',
            },
          ],
          confidence: 0.7,
        },
      }),
      'verify:internal-consistency': sequence({
        data: {
          ...empty,
          preserved: ['Swaps between neighbours who already know each other'],
          violations: [
            {
              invariant: 'community_model',
              violation: 'Scope says members only, capabilities add sign-up',
              stage: 'capability-model',
              severity: 'blocking',
            },
          ],
          warnings: ['Scope and capabilities disagree on sign-up'],
          confidence: 0.85,
        },
      }),
    });
    const generator = createValidatedGenerator(backend, registry, { sleep: noSleep });

    const result = await verifyPhase({
      phase: 'scope',
      anchor: seedlingAnchor(),
      artifacts: [],
      outputs: [capabilityModel()],
      mode: 'multi-pass',
      generator,
    });

    expect(result.success).toBe(true);
    if (!result.success) return;
    const { report } = result;
    expect(report.checks).toEqual(['invariant-compliance', 'genericization', 'internal-consistency']);
    expect(report.invariantsViolated).toEqual([
      {
        invariant: 'community_model',
        violation: 'Scope says members only, capabilities add sign-up',
        stage: 'capability-model',
        severity: 'blocking',
      },
    ]);
    expect(report.invariantsHonored).toEqual(['exchange_model']);
    expect(report.identityPreserved).toEqual([]);
    expect(report.identityGenericized).toHaveLength(1);
    expect(report.warnings).toEqual(['Scope and capabilities disagree on sign-up']);
    expect(report.confidenceScore).toBe(0.7);
    expect(report.passed).toBe(false);
  });

  it('should downgrade a violation the producing stage declared an override for', async () => {
    const backend = new ScriptedBackend({ 'verify:single': sequence({ data: openRegistration }) });
    const generator = createValidatedGenerator(backend, registry, { sleep: noSleep });
    const override = {
      invariant: 'community_model',
      reason: 'The club asked to admit neighbours',
      userImpact: 'Neighbours can join without an invitation',
    };

    const result = await verifyPhase({
      phase: 'scope',
      anchor: seedlingAnchor(),
      artifacts: [],
      outputs: [capabilityModel([override])],
      mode: 'single',
      generator,
    });

    expect(result.success).toBe(true);
    if (!result.success) return;
    expect(result.report.passed).toBe(true);
    expect(result.report.invariantsViolated[0]?.severity).toBe('warning');
    expect(result.report.invariantsViolated[0]?.downgradedBy).toEqual(override);
    expect(result.report.warnings).toEqual([
      "Violation of 'community_model' in capability-model downgraded by declared override: The club asked to admit neighbours",
    ]);
  });

  it('should return the failing check instead of passing silently', async () => {
    const backend = new ScriptedBackend({
      'verify:invariant-compliance': sequence({ data: empty }),
      'verify:genericization': sequence({ error: createBackendError('checker offline', false) }),
      'verify:internal-consistency': sequence({ data: empty }),
    });
    const generator = createValidatedGenerator(backend, registry, { sleep: noSleep });

    const result = await verifyPhase({
      phase: 'scope',
      anchor: seedlingAnchor(),
      artifacts: [],
      outputs: [capabilityModel()],
      mode: 'multi-pass',
      generator,
    });

    expect(result.success).toBe(false);
    if (result.success) return;
    expect(result.check).toBe('genericization');
    expect(result.error.kind).toBe('BackendError');
  });
});
