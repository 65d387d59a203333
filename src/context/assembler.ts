/**
 * Context Assembler.
 *
 * Builds each stage's generation context from the frozen anchor, structured
 * summaries of upstream outputs and artifacts selected by the diff. Full
 * upstream prose is never forwarded.
 *
 * @packageDocumentation
 */

import { formatAnchorContext } from '../anchor/format.js';
import type { AnchorCandidate } from '../anchor/types.js';
import { formatDiffContext, type Diff } from '../diff/diff.js';
import type { ArtifactStore } from '../store/store.js';
import type { Artifact, CapabilityArtifact } from '../store/types.js';
import { createSilentLogger, type Logger } from '../utils/logger.js';
import { STAGE_TITLES, type StageId } from '../workflow/ids.js';
import { summaryOf, type StageOutput, type StageOutputs } from '../workflow/outputs.js';
import { STAGE_SCOPES, type ArtifactSelection } from './scope.js';

/**
 * One block of context text.
 */
export interface ContextSection {
  readonly id: string;
  readonly text: string;
  /** Higher survives longer when over budget. */
  readonly priority: number;
  /** Never dropped. */
  readonly protected: boolean;
}

export interface StageContext {
  readonly stage: StageId;
  /** Included sections, in order. The anchor is always first. */
  readonly sections: readonly ContextSection[];
  readonly text: string;
  readonly tokenEstimate: number;
  /** IDs of sections dropped to fit the budget. */
  readonly omitted: readonly string[];
}

export interface StageContextInput {
  readonly anchor: AnchorCandidate;
  readonly stage: StageId;
  readonly store: ArtifactStore;
  readonly diff: Diff;
  readonly stageOutputs: StageOutputs;
  /** Budget for everything but the anchor. */
  readonly tokenBudget: number;
  readonly anchorTokenBudget: number;
  /** Verifier violations, validation errors and human change requests. */
  readonly feedback?: readonly string[];
  /** Original request text. */
  readonly idea?: string;
  /** Raw text of upstream stages without structured output. */
  readonly legacy?: Partial<Record<StageId, string>>;
  /** Restricts capability selections to these IDs. */
  readonly focus?: readonly string[];
  readonly logger?: Logger;
}

/**
 * Rough token estimate: four characters per token.
 */
export function estimateTokens(text: string): number {
  return Math.ceil(text.length / 4);
}

const PRIORITY = {
  diff: 80,
  artifacts: 70,
  /** Nearest upstream summary; each further stage loses 10. */
  upstream: 50,
} as const;

/**
 * One line per artifact, from its summary.
 *
 * @example
 * ```typescript
 * artifactLine(decision); // "DEC-001 [decision] Invite tokens (serves: CAP-001)"
 * ```
 */
export function artifactLine(artifact: Artifact, flag?: string): string {
  let line = `${artifact.id} [${artifact.type}] ${artifact.summary}`;
  if (artifact.serves.length > 0) {
    line += ` (serves: ${artifact.serves.join(', ')})`;
  }
  if (artifact.implements.length > 0) {
    line += ` (implements: ${artifact.implements.join(', ')})`;
  }
  if (artifact.type === 'work-item' && artifact.fields.dependsOn.length > 0) {
    line += ` (depends on: ${artifact.fields.dependsOn.join(', ')})`;
  }
  if (artifact.provenance.incomplete) {
    line += ' [incomplete]';
  }
  if (flag !== undefined) {
    line += ` [${flag}]`;
  }
  return line;
}

/**
 * Summary plus the few structured fields downstream stages rely on.
 */
export function renderOutputDigest(output: StageOutput): string {
  const lines = [summaryOf(output)];
  switch (output.stage) {
    case 'idea-analysis':
      lines.push(`Target users: ${output.data.targetUsers.join('; ')}`);
      break;
    case 'risk-assessment':
      lines.push(`Risk level: ${output.data.riskLevel}`);
      break;
    case 'pivot-strategy':
      lines.push(`Recommended pivot: ${output.data.recommended}`);
      break;
    case 'validation-verdict':
      lines.push(`Verdict: ${output.data.verdict}`);
      break;
    case 'scope-boundaries':
      lines.push(`In scope: ${output.data.inScope.join('; ')}`);
      lines.push(`Out of scope: ${output.data.outOfScope.join('; ')}`);
      break;
    case 'system-traits':
      lines.push(...output.data.traits.map((trait) => `- ${trait.name}: ${trait.requirement}`));
      break;
    case 'work-item-ordering':
      lines.push(`Order: ${output.data.order.join(', ')}`);
      break;
    default:
      break;
  }
  return lines.join('\n');
}

const section = (
  id: string,
  title: string,
  body: string,
  priority: number,
  isProtected = false
): ContextSection => ({
  id,
  text: `## ${title}\n\n${body}`,
  priority,
  protected: isProtected,
});

interface Selected {
  readonly title: string;
  readonly artifacts: readonly Artifact[];
  /** IDs marked as needing revision. */
  readonly flagged?: readonly string[];
}

function select(selection: ArtifactSelection, input: StageContextInput): Selected {
  const { store, diff } = input;
  const focus = input.focus !== undefined ? new Set(input.focus) : undefined;
  const inFocus = (cap: CapabilityArtifact): boolean => focus === undefined || focus.has(cap.id);
  const byIds = (ids: readonly string[]): CapabilityArtifact[] => {
    const wanted = new Set(ids);
    return store.current('capability').filter((cap) => wanted.has(cap.id) && inFocus(cap));
  };
  const needingWork = (): CapabilityArtifact[] => byIds(diff.unimplemented);

  switch (selection) {
    case 'capabilities':
      return { title: 'Capabilities', artifacts: store.current('capability').filter(inFocus) };
    case 'capabilities-needing-decisions':
      return { title: 'Capabilities Needing Decisions', artifacts: byIds(diff.uncovered) };
    case 'capabilities-needing-work-items':
      return { title: 'Capabilities Needing Work Items', artifacts: needingWork() };
    case 'decisions':
      return {
        title: 'Decisions',
        artifacts: store.current('decision'),
        flagged: diff.affectedDecisions,
      };
    case 'decisions-for-work': {
      const capIds = new Set(needingWork().map((cap) => cap.id));
      return {
        title: 'Decisions For This Work',
        artifacts: store
          .current('decision')
          .filter((decision) => decision.serves.some((id) => capIds.has(id))),
      };
    }
    case 'entities':
      return {
        title: 'Entities',
        artifacts: store.current('entity'),
        flagged: diff.affectedEntities,
      };
    case 'work-items':
      return {
        title: 'Work Items',
        artifacts: store.current('work-item'),
        flagged: diff.affectedWorkItems,
      };
  }
}

function artifactSection(
  selection: ArtifactSelection,
  input: StageContextInput,
  priority: number
): ContextSection | undefined {
  const { title, artifacts, flagged = [] } = select(selection, input);
  if (artifacts.length === 0) {
    return undefined;
  }
  const revise = new Set(flagged);
  const body = artifacts
    .map((artifact) => artifactLine(artifact, revise.has(artifact.id) ? 'needs revision' : undefined))
    .join('\n');
  return section(`artifacts:${selection}`, title, body, priority);
}

/**
 * Assembles the context for one stage.
 *
 * The anchor is placed first, verbatim, and never counted against or cut to
 * the budget. Feedback and the original request are protected. Other
 * sections are dropped whole, lowest priority first, until the rest fits.
 */
export function assembleStageContext(input: StageContextInput): StageContext {
  const logger = input.logger ?? createSilentLogger('ContextAssembler');
  const scope = STAGE_SCOPES[input.stage];

  const anchorSection: ContextSection = {
    id: 'anchor',
    text: formatAnchorContext(input.anchor),
    priority: Number.POSITIVE_INFINITY,
    protected: true,
  };
  const anchorTokens = estimateTokens(anchorSection.text);
  if (anchorTokens > input.anchorTokenBudget) {
    logger.warn('anchor_over_budget', {
      stage: input.stage,
      tokens: anchorTokens,
      budget: input.anchorTokenBudget,
    });
  }

  const candidates: ContextSection[] = [];

  if (input.idea !== undefined && input.idea.trim() !== '') {
    candidates.push(section('idea', 'Original Request', input.idea.trim(), 0, true));
  }

  const feedback = input.feedback ?? [];
  if (feedback.length > 0) {
    candidates.push(
      section(
        'feedback',
        'Corrective Feedback (MUST ADDRESS)',
        feedback.map((item) => `- ${item}`).join('\n'),
        0,
        true
      )
    );
  }

  if (scope.diff) {
    candidates.push({ id: 'diff', text: formatDiffContext(input.diff), priority: PRIORITY.diff, protected: false });
  }

  scope.artifacts.forEach((selection, index) => {
    const built = artifactSection(selection, input, PRIORITY.artifacts - index);
    if (built !== undefined) {
      candidates.push(built);
    }
  });

  scope.upstream.forEach((stage, index) => {
    const priority = PRIORITY.upstream - index * 10;
    const output: StageOutput | undefined = input.stageOutputs[stage];
    if (output !== undefined) {
      candidates.push(
        section(`upstream:${stage}`, STAGE_TITLES[stage], renderOutputDigest(output), priority)
      );
      return;
    }
    const legacy = input.legacy?.[stage];
    if (legacy !== undefined) {
      logger.warn('legacy_fallback_used', { stage: input.stage, upstream: stage });
      candidates.push(
        section(`upstream:${stage}`, `${STAGE_TITLES[stage]} (unstructured)`, legacy.trim(), priority)
      );
    }
  });

  const omitted = new Set<string>();
  const total = (): number =>
    candidates
      .filter((candidate) => !omitted.has(candidate.id))
      .reduce((sum, candidate) => sum + estimateTokens(candidate.text), 0);

  const droppable = candidates
    .map((candidate, position) => ({ candidate, position }))
    .filter(({ candidate }) => !candidate.protected)
    .sort((a, b) => a.candidate.priority - b.candidate.priority || b.position - a.position);

  for (const { candidate } of droppable) {
    if (total() <= input.tokenBudget) {
      break;
    }
    omitted.add(candidate.id);
  }

  if (omitted.size > 0) {
    logger.info('context_sections_omitted', { stage: input.stage, omitted: [...omitted] });
  }
  if (total() > input.tokenBudget) {
    logger.warn('context_over_budget', {
      stage: input.stage,
      tokens: total(),
      budget: input.tokenBudget,
    });
  }

  const sections = [anchorSection, ...candidates.filter((candidate) => !omitted.has(candidate.id))];
  const text = sections.map((item) => item.text).join('\n\n');

  return {
    stage: input.stage,
    sections,
    text,
    tokenEstimate: estimateTokens(text),
    omitted: candidates.filter((candidate) => omitted.has(candidate.id)).map((c) => c.id),
  };
}
