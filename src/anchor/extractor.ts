/**
 * Concept Anchor extraction.
 *
 * One generation call constrained to distillation of the request. A
 * candidate that fails programmatic validation is re-extracted with the
 * issues as feedback; if it still fails, the raw output is escalated to a
 * human. A guessed or minimal anchor is never produced.
 *
 * @packageDocumentation
 */

import { createSilentLogger, type Logger } from '../utils/logger.js';
import type { ValidatedGenerator } from '../generation/validated.js';
import { getAmbiguousInvariants } from './clarification.js';
import type { AnchorCandidate, AnchorInvariant, AnchorValidationIssue } from './types.js';
import { formatAnchorIssues, validateAnchor } from './validate.js';

export interface ExtractAnchorOptions {
  /** Confidence below which an invariant is ambiguous. */
  readonly threshold: number;
  /** Re-extractions after a validation failure. */
  readonly retries?: number;
  /** Human feedback from a rejected earlier candidate. */
  readonly feedback?: readonly string[];
  readonly signal?: AbortSignal;
  readonly logger?: Logger;
}

export type AnchorExtractionResult =
  | {
      readonly status: 'extracted';
      readonly candidate: AnchorCandidate;
      /** Invariants needing a human choice before confirmation. */
      readonly ambiguous: readonly AnchorInvariant[];
      readonly attempts: number;
    }
  | {
      readonly status: 'escalated';
      readonly reason: string;
      readonly issues: readonly string[];
      /** Output of the last attempt, shown for manual correction. */
      readonly rawOutput: string;
      readonly attempts: number;
    }
  | { readonly status: 'cancelled'; readonly attempts: number };

export const ANCHOR_INSTRUCTION = [
  'Distil the request below into a concept anchor. Do not design, improve or extend it.',
  'State the goal in one sentence, in the requester\'s terms.',
  'List constraints the request states or clearly implies, and what it does not ask for.',
  'Record each invariant with an exact quote from the request as its source.',
  'When an invariant is uncertain, give a confidence below 0.7, explain the ambiguity and offer 2-3 concrete options.',
  'List the features that make this request different from the generic version of the idea.',
].join('\n');

/**
 * Extracts an anchor candidate from the original idea.
 */
export async function extractAnchor(
  idea: string,
  generator: ValidatedGenerator,
  options: ExtractAnchorOptions
): Promise<AnchorExtractionResult> {
  const logger = options.logger ?? createSilentLogger('AnchorExtractor');
  const totalAttempts = (options.retries ?? 1) + 1;
  const context = `## Original Request\n\n${idea.trim()}`;

  let feedback: string[] = [...(options.feedback ?? [])];
  let lastIssues: readonly AnchorValidationIssue[] = [];
  let lastRaw = '';
  let attempts = 0;

  for (let attempt = 1; attempt <= totalAttempts; attempt++) {
    attempts = attempt;
    const result = await generator.generateStage('concept-anchor', {
      instruction: ANCHOR_INSTRUCTION,
      context,
      feedback,
      ...(options.signal !== undefined ? { signal: options.signal } : {}),
    });

    if (!result.success) {
      if (result.error.kind === 'CancelledError') {
        return { status: 'cancelled', attempts };
      }
      logger.error('anchor_generation_failed', {
        error: result.error.kind,
        message: result.error.message,
      });
      return {
        status: 'escalated',
        reason: `Anchor generation failed: ${result.error.message}`,
        issues: result.error.kind === 'SchemaError' ? result.error.issues : [],
        rawOutput: result.error.kind === 'SchemaError' ? result.error.raw : '',
        attempts,
      };
    }

    const validation = validateAnchor(result.data, options.threshold);
    if (validation.valid) {
      const ambiguous = getAmbiguousInvariants(result.data, options.threshold);
      logger.info('anchor_extracted', {
        invariants: result.data.invariants.length,
        identityFeatures: result.data.identityFeatures.length,
        ambiguous: ambiguous.map((invariant) => invariant.property),
        attempts,
      });
      return { status: 'extracted', candidate: result.data, ambiguous, attempts };
    }

    lastIssues = validation.issues;
    lastRaw = result.raw;
    logger.warn('anchor_validation_failed', {
      attempt,
      issues: formatAnchorIssues(validation.issues),
    });
    feedback = [
      ...feedback,
      `The previous anchor was rejected:\n${formatAnchorIssues(validation.issues)
        .map((line) => `- ${line}`)
        .join('\n')}`,
    ];
  }

  return {
    status: 'escalated',
    reason: `Anchor failed validation after ${String(attempts)} attempt(s)`,
    issues: formatAnchorIssues(lastIssues),
    rawOutput: lastRaw,
    attempts,
  };
}
