/**
 * Workflow engine.
 *
 * Drives phases and stages through the declarative graph. Every transition
 * is persisted before the next one starts, so a run can stop at any point
 * (a decision gate, an abort, a crash) and continue from the saved state.
 * Decision gates never wait in process: the engine suspends and returns,
 * and {@link WorkflowEngine.resume} re-enters with the human's decision.
 *
 * Only the engine writes to the artifact store, and only finished results.
 *
 * @packageDocumentation
 */

import { confirmAnchor, getAmbiguousInvariants, resolveAmbiguity } from '../anchor/clarification.js';
import { extractAnchor } from '../anchor/extractor.js';
import type { AnchorCandidate, ConceptAnchor } from '../anchor/types.js';
import { formatAnchorIssues, validateAnchor, validateOverrides } from '../anchor/validate.js';
import {
  LegacyFallbackExpiredError,
  assembleContext,
  assembleSpecification,
  serializeSpecification,
  type AssembleContextOptions,
} from '../assembly/assembler.js';
import type { ResolvedSpecification } from '../assembly/types.js';
import type { Config } from '../config/types.js';
import { assembleStageContext, type StageContext } from '../context/assembler.js';
import { diffFromStore } from '../diff/diff.js';
import {
  EntryConditionError,
  ExtractionAmbiguityError,
  GenerationFailureError,
  SchemaValidationError,
  VerificationViolationError,
  type PipelineError,
} from '../errors.js';
import { STAGE_SCHEMAS } from '../generation/schemas.js';
import type { GenerationError } from '../generation/types.js';
import type { ValidatedGenerator } from '../generation/validated.js';
import { commitBatch, type CommitResult } from '../store/commit.js';
import {
  ArtifactValidationError,
  InvalidSupersedeError,
  UnresolvedReferenceError,
} from '../store/store.js';
import { sortedUnique } from '../utils/guards.js';
import { createSilentLogger, type Logger } from '../utils/logger.js';
import { writeFileAtomic } from '../utils/safe-fs.js';
import {
  applyOverride,
  canProceed,
  correctiveFeedback,
  unresolvedBlocking,
} from '../verification/report.js';
import { saveReport } from '../verification/report-storage.js';
import type { PhaseVerificationReport } from '../verification/types.js';
import { verifyPhase } from '../verification/verifier.js';
import { batchCapabilities, mergeWorkItemBatches, pendingArtifacts } from './drafts.js';
import {
  PHASE_STAGES,
  nextPhase,
  phaseNode,
  phaseOf,
  stagesFrom,
  type EntryCondition,
  type PredicateView,
} from './graph.js';
import type { NotificationHooksExecutor } from './hooks.js';
import { PHASE_IDS, PHASE_TITLES, type PhaseId, type StageId } from './ids.js';
import { STAGE_INSTRUCTIONS } from './instructions.js';
import {
  overridesOf,
  setStageOutput,
  type StageOutput,
  type StageOutputOf,
  type WorkItemBatch,
} from './outputs.js';
import { saveState } from './persistence.js';
import { NOT_STARTED_PHASE, createInitialState, currentPhase } from './state.js';
import type {
  GateDecision,
  GateDecisionType,
  GateKind,
  GateState,
  PhaseState,
  PhaseStatus,
  PipelineState,
  StageState,
} from './types.js';

/**
 * A decision that does not apply to the open gate, or no gate is open.
 */
export class GateDecisionError extends Error {
  public readonly gate: GateKind | null;
  public readonly decision: GateDecisionType;

  constructor(message: string, gate: GateKind | null, decision: GateDecisionType) {
    super(message);
    this.name = 'GateDecisionError';
    this.gate = gate;
    this.decision = decision;
  }
}

/**
 * An operation the run's current state does not allow.
 */
export class WorkflowStateError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'WorkflowStateError';
  }
}

export type RunOutcome =
  | { readonly status: 'suspended'; readonly gate: GateState; readonly error?: PipelineError }
  | { readonly status: 'complete'; readonly specification: ResolvedSpecification }
  | { readonly status: 'cancelled' };

export interface WorkflowEngineOptions {
  readonly generator: ValidatedGenerator;
  readonly config: Config;
  readonly hooks?: NotificationHooksExecutor;
  readonly logger?: Logger;
  readonly now?: () => Date;
}

interface Suspension {
  readonly gate: GateState;
  readonly error?: PipelineError;
}

type Decided = Suspension | 'continue';

type GeneratedStageId = Exclude<StageId, 'concept-anchor' | 'work-item-generation'>;

function phaseWith(
  previous: PhaseState,
  status: PhaseStatus,
  report?: PhaseVerificationReport
): PhaseState {
  return {
    status,
    ...(report !== undefined ? { report } : {}),
    ...(previous.entryOverride !== undefined ? { entryOverride: previous.entryOverride } : {}),
  };
}

function pendingStage(previous: StageState, feedback: readonly string[] = previous.feedback): StageState {
  return {
    status: 'pending',
    attempts: 0,
    correctiveRetries: previous.correctiveRetries,
    feedback,
  };
}

const suspension = (gate: GateState, error: PipelineError | undefined): Suspension =>
  error !== undefined ? { gate, error } : { gate };

/**
 * Drives a pipeline run.
 *
 * @example
 * ```typescript
 * const engine = new WorkflowEngine({ generator, config });
 * const { state, outcome } = await engine.start(idea);
 * if (outcome.status === 'suspended') {
 *   await engine.resume(state, { type: 'approve' });
 * }
 * ```
 */
export class WorkflowEngine {
  private readonly generator: ValidatedGenerator;
  private readonly config: Config;
  private readonly hooks: NotificationHooksExecutor | undefined;
  private readonly logger: Logger;
  private readonly now: () => Date;

  constructor(options: WorkflowEngineOptions) {
    this.generator = options.generator;
    this.config = options.config;
    this.hooks = options.hooks;
    this.logger = options.logger ?? createSilentLogger('WorkflowEngine');
    this.now = options.now ?? ((): Date => new Date());
  }

  /**
   * Creates a run for an idea and drives it to the first suspension.
   *
   * @throws WorkflowStateError for an empty idea.
   */
  async start(
    idea: string,
    signal?: AbortSignal
  ): Promise<{ state: PipelineState; outcome: RunOutcome }> {
    if (idea.trim() === '') {
      throw new WorkflowStateError('The idea is empty');
    }
    const state = createInitialState(idea.trim(), { now: this.now() });
    this.logger.info('run_created', { runId: state.runId });
    await this.persist(state);
    const outcome = await this.run(state, signal);
    return { state, outcome };
  }

  /**
   * Advances until the next gate, completion or cancellation.
   */
  async run(state: PipelineState, signal?: AbortSignal): Promise<RunOutcome> {
    if (state.status === 'complete' && state.specification !== null) {
      return { status: 'complete', specification: state.specification };
    }
    if (state.gate !== null) {
      return { status: 'suspended', gate: state.gate };
    }

    state.status = 'running';
    this.logger.info('run_started', { runId: state.runId, phase: currentPhase(state) ?? null });

    for (;;) {
      if (signal?.aborted === true) {
        return this.cancel(state);
      }
      const phase = currentPhase(state);
      if (phase === undefined) {
        return this.complete(state);
      }
      const outcome = await this.advance(state, phase, signal);
      if (outcome !== undefined) {
        return outcome;
      }
    }
  }

  /**
   * Applies a decision to the open gate and continues the run.
   *
   * @throws GateDecisionError if the decision does not apply to the gate.
   * @throws ExtractionAmbiguityError for an invalid clarification, or an
   * approval while invariants are still ambiguous.
   * @throws VerificationViolationError for an override naming no reported violation.
   */
  async resume(
    state: PipelineState,
    decision: GateDecision,
    signal?: AbortSignal
  ): Promise<RunOutcome> {
    const gate = state.gate;
    if (gate === null) {
      throw new GateDecisionError('No decision gate is open', null, decision.type);
    }

    let decided: Decided;
    switch (gate.kind) {
      case 'anchor-review':
        decided = this.decideAnchor(state, gate, decision);
        break;
      case 'phase-review':
        decided = await this.decidePhase(state, gate, decision);
        break;
      case 'escalation':
        decided = this.decideEscalation(state, gate, decision);
        break;
      case 'entry-condition':
        decided = this.decideEntry(state, gate, decision);
        break;
    }

    state.decisions.push({
      gate: gate.kind,
      phase: gate.phase,
      decision,
      decidedAt: this.timestamp(),
    });
    this.logger.info('gate_decided', { kind: gate.kind, phase: gate.phase, decision: decision.type });

    if (decided !== 'continue') {
      state.gate = decided.gate;
      state.status = 'suspended';
      await this.persist(state);
      return { status: 'suspended', ...decided };
    }

    state.gate = null;
    state.status = 'running';
    await this.persist(state);
    return this.run(state, signal);
  }

  /**
   * Re-runs a phase and everything after it. Outputs and artifacts are
   * kept, so stages whose inputs did not change are skipped through the
   * diff. The confirmed anchor is never re-extracted.
   *
   * @throws WorkflowStateError before the anchor is confirmed.
   */
  async rerunFrom(state: PipelineState, phase: PhaseId, signal?: AbortSignal): Promise<RunOutcome> {
    if (state.anchor === null) {
      throw new WorkflowStateError('Confirm the concept anchor before re-running a phase');
    }

    for (const stage of stagesFrom(phase)) {
      if (stage !== 'concept-anchor') {
        state.stages[stage] = { status: 'pending', attempts: 0, correctiveRetries: 0, feedback: [] };
      }
    }
    for (const id of PHASE_IDS.slice(PHASE_IDS.indexOf(phase))) {
      state.phases[id] = NOT_STARTED_PHASE;
    }
    state.gate = null;
    state.context = null;
    state.status = 'running';
    this.logger.info('rerun_requested', { runId: state.runId, phase });
    await this.persist(state);
    return this.run(state, signal);
  }

  // -- phases ---------------------------------------------------------------

  private async advance(
    state: PipelineState,
    phase: PhaseId,
    signal: AbortSignal | undefined
  ): Promise<RunOutcome | undefined> {
    const node = phaseNode(phase);

    if (state.phases[phase].status === 'not-started') {
      const entry = node.entry;
      if (
        entry !== undefined &&
        state.phases[phase].entryOverride === undefined &&
        !entry.check(this.view(state))
      ) {
        return this.suspend(state, this.entryGate(phase, entry), 'gate');
      }
      if (phase === 'work-items') {
        const context = this.assembled(() =>
          assembleContext(state.store, this.requireAnchor(state), this.assemblyOptions(state))
        );
        if (context instanceof Error) {
          return this.assemblyFailed(state, 'work-item-generation', context);
        }
        state.context = context;
      }
      state.phases[phase] = phaseWith(state.phases[phase], 'in-progress');
      this.logger.info('phase_started', { phase });
      await this.persist(state);
    }

    for (const stageNode of node.stages) {
      const { stage } = stageNode;
      const current = state.stages[stage];
      if (current.status === 'completed' || current.status === 'skipped') {
        continue;
      }
      if (stageNode.when !== undefined && !stageNode.when(this.view(state))) {
        const skipReason = stageNode.skipReason ?? 'condition not met';
        state.stages[stage] = {
          status: 'skipped',
          attempts: 0,
          correctiveRetries: current.correctiveRetries,
          feedback: [],
          skipReason,
        };
        this.logger.info('stage_skipped', { stage, reason: skipReason });
        await this.persist(state);
        continue;
      }

      const outcome = await this.executeStage(state, stage, signal);
      if (outcome !== undefined) {
        return outcome;
      }
    }

    return this.finishPhase(state, phase, signal);
  }

  private entryGate(phase: PhaseId, entry: EntryCondition): Suspension {
    const error = new EntryConditionError(
      `${PHASE_TITLES[phase]} cannot start: ${entry.description} does not hold`,
      phase,
      entry.id
    );
    return {
      gate: {
        kind: 'entry-condition',
        phase,
        reason: error.message,
        condition: entry.id,
        openedAt: this.timestamp(),
      },
      error,
    };
  }

  private async finishPhase(
    state: PipelineState,
    phase: PhaseId,
    signal: AbortSignal | undefined
  ): Promise<RunOutcome | undefined> {
    const stages = PHASE_STAGES[phase];

    if (stages.every((stage) => state.stages[stage].status === 'skipped')) {
      state.phases[phase] = phaseWith(state.phases[phase], 'skipped');
      this.logger.info('phase_skipped', { phase });
      await this.persist(state);
      return undefined;
    }

    const outputs = stages.flatMap((stage): StageOutput[] => {
      const output = state.outputs[stage];
      return output !== undefined && state.stages[stage].status === 'completed' ? [output] : [];
    });
    const mode = this.config.verification.multi_pass_phases.includes(phase)
      ? 'multi-pass'
      : this.config.verification.default_mode;

    const verification = await verifyPhase({
      phase,
      anchor: this.requireAnchor(state),
      artifacts: state.store.query({ sourcePhase: phase }),
      outputs,
      mode,
      generator: this.generator,
      now: this.now,
      logger: this.logger.child('PhaseVerifier'),
      ...(signal !== undefined ? { signal } : {}),
    });

    if (!verification.success) {
      if (verification.error.kind === 'CancelledError') {
        return this.cancel(state);
      }
      const error = new GenerationFailureError(
        `Verification check '${verification.check}' failed: ${verification.error.message}`,
        `verify:${verification.check}`,
        verification.attempts
      );
      return this.suspend(
        state,
        { gate: { kind: 'escalation', phase, reason: error.message, openedAt: this.timestamp() }, error },
        'escalation'
      );
    }

    const report = verification.report;
    const blocking = unresolvedBlocking(report);
    if (blocking.length > 0 && this.retryCorrectively(state, phase, report)) {
      await this.persist(state);
      return undefined;
    }

    const reportPath = await saveReport(report, this.config.paths.reports);
    state.phases[phase] = phaseWith(state.phases[phase], 'awaiting-gate', report);
    this.logger.info('phase_verified', { phase, passed: report.passed, reportPath });

    const passed = canProceed(report);
    const reason = passed
      ? `${PHASE_TITLES[phase]} verification passed; approve to continue`
      : `${String(blocking.length)} blocking violation(s) remain after corrective retries`;
    const error = passed
      ? undefined
      : new VerificationViolationError(reason, sortedUnique(blocking.map((v) => v.invariant)));
    return this.suspend(
      state,
      suspension({ kind: 'phase-review', phase, reason, openedAt: this.timestamp() }, error),
      'gate'
    );
  }

  /**
   * Resets the stages blamed for blocking violations, with the violations
   * as feedback, unless one of them has used up its corrective retries.
   * Later stages of the phase are reset too, since they read the output.
   */
  private retryCorrectively(
    state: PipelineState,
    phase: PhaseId,
    report: PhaseVerificationReport
  ): boolean {
    const feedback = correctiveFeedback(report);
    const stages = PHASE_STAGES[phase];
    const targets = stages.filter((stage) => feedback.has(stage) && stage !== 'concept-anchor');
    const limit = this.config.verification.max_corrective_retries;
    const first = targets[0];
    if (first === undefined || targets.some((stage) => state.stages[stage].correctiveRetries >= limit)) {
      return false;
    }

    for (const stage of stages.slice(stages.indexOf(first))) {
      const previous = state.stages[stage];
      const lines = feedback.get(stage);
      state.stages[stage] =
        lines !== undefined
          ? {
              status: 'pending',
              attempts: 0,
              correctiveRetries: previous.correctiveRetries + 1,
              feedback: lines,
            }
          : pendingStage(previous, []);
    }
    state.phases[phase] = phaseWith(state.phases[phase], 'in-progress');
    this.logger.warn('corrective_retry', {
      phase,
      stages: targets,
      invariants: sortedUnique(unresolvedBlocking(report).map((v) => v.invariant)),
    });
    return true;
  }

  // -- stages ---------------------------------------------------------------

  private async executeStage(
    state: PipelineState,
    stage: StageId,
    signal: AbortSignal | undefined
  ): Promise<RunOutcome | undefined> {
    const previous = state.stages[stage];
    state.stages[stage] = {
      status: 'running',
      attempts: previous.attempts,
      correctiveRetries: previous.correctiveRetries,
      feedback: previous.feedback,
    };
    this.logger.info('stage_started', { stage, feedback: previous.feedback.length });
    await this.persist(state);

    switch (stage) {
      case 'concept-anchor':
        return this.runAnchorStage(state, signal);
      case 'work-item-generation':
        return this.runWorkItemStage(state, signal);
      default:
        return this.runGeneratedStage(state, stage, signal);
    }
  }

  private async runAnchorStage(
    state: PipelineState,
    signal: AbortSignal | undefined
  ): Promise<RunOutcome | undefined> {
    const previous = state.stages['concept-anchor'];
    const result = await extractAnchor(state.idea, this.generator, {
      threshold: this.config.anchor.confidence_threshold,
      retries: this.config.anchor.extraction_retries,
      feedback: previous.feedback,
      logger: this.logger.child('AnchorExtractor'),
      ...(signal !== undefined ? { signal } : {}),
    });

    switch (result.status) {
      case 'cancelled':
        state.stages['concept-anchor'] = pendingStage(previous);
        return this.cancel(state);
      case 'escalated': {
        const error =
          result.issues.length > 0
            ? new SchemaValidationError(result.reason, 'concept-anchor', result.issues)
            : new GenerationFailureError(result.reason, 'concept-anchor', result.attempts);
        return this.escalate(state, 'concept-anchor', error, result.rawOutput, result.attempts);
      }
      case 'extracted':
        this.setAnchorCandidate(state, result.candidate, result.attempts);
        return this.suspend(state, this.anchorGate(state, result.candidate), 'gate');
    }
  }

  private async runGeneratedStage<S extends GeneratedStageId>(
    state: PipelineState,
    stage: S,
    signal: AbortSignal | undefined
  ): Promise<RunOutcome | undefined> {
    const context = this.stageContext(state, stage);
    const result = await this.generator.generateStage(stage, {
      instruction: STAGE_INSTRUCTIONS[stage],
      context: context.text,
      feedback: state.stages[stage].feedback,
      ...(signal !== undefined ? { signal } : {}),
    });
    if (!result.success) {
      return this.generationFailed(state, stage, result.error, result.attempts);
    }

    const output: StageOutputOf<S> = {
      stage,
      data: result.data,
      attempt: result.attempts,
      producedAt: this.timestamp(),
      artifactIds: [],
    };
    return this.commitOutput(state, output);
  }

  /**
   * Work items are generated in batches of capabilities that still need
   * them. Finished batches are kept when a later one fails or the run is
   * cancelled, flagged incomplete.
   */
  private async runWorkItemStage(
    state: PipelineState,
    signal: AbortSignal | undefined
  ): Promise<RunOutcome | undefined> {
    const stage = 'work-item-generation';
    const diff = diffFromStore(state.store);
    const batches =
      diff.unimplemented.length > 0
        ? batchCapabilities(diff.unimplemented, this.config.workflow.work_item_batch_size)
        : [[]];
    const finished: WorkItemBatch[] = [];
    let attempts = 0;

    for (const [index, focus] of batches.entries()) {
      if (signal?.aborted === true) {
        this.keepPartialBatches(state, finished, attempts);
        state.stages[stage] = pendingStage(state.stages[stage]);
        return this.cancel(state);
      }

      const context = this.stageContext(state, stage, focus);
      const result = await this.generator.generateStage(stage, {
        instruction: STAGE_INSTRUCTIONS[stage],
        context: context.text,
        feedback: state.stages[stage].feedback,
        ...(signal !== undefined ? { signal } : {}),
      });
      attempts += result.attempts;
      if (!result.success) {
        this.keepPartialBatches(state, finished, attempts);
        return this.generationFailed(state, stage, result.error, attempts);
      }
      finished.push(result.data);
      this.logger.info('work_item_batch_completed', {
        batch: index + 1,
        of: batches.length,
        workItems: result.data.workItems.length,
      });
    }

    const output: StageOutputOf<'work-item-generation'> = {
      stage,
      data: mergeWorkItemBatches(finished),
      attempt: attempts,
      producedAt: this.timestamp(),
      artifactIds: [],
    };
    return this.commitOutput(state, output);
  }

  private keepPartialBatches(
    state: PipelineState,
    finished: readonly WorkItemBatch[],
    attempts: number
  ): void {
    if (finished.length === 0) {
      return;
    }
    const partial: StageOutputOf<'work-item-generation'> = {
      stage: 'work-item-generation',
      data: mergeWorkItemBatches(finished),
      attempt: attempts,
      producedAt: this.timestamp(),
      artifactIds: [],
    };
    const issues = this.reviewOutput(state, partial);
    if (issues.length > 0) {
      this.logger.warn('partial_batches_dropped', { batches: finished.length, reason: issues.join('; ') });
      return;
    }
    const committed = this.tryCommit(state, partial, true);
    if (committed instanceof Error) {
      this.logger.warn('partial_batches_dropped', {
        batches: finished.length,
        reason: committed.message,
      });
      return;
    }
    this.logger.info('partial_batches_kept', {
      batches: finished.length,
      artifacts: committed.artifacts.map((artifact) => artifact.id),
    });
  }

  /**
   * Checks an output against the anchor and the store before anything is
   * written: every override must name a known invariant with a reason, and
   * no work item may implement a capability that no decision covers.
   */
  private reviewOutput<S extends StageId>(state: PipelineState, output: StageOutputOf<S>): string[] {
    const issues: string[] =
      state.anchor !== null
        ? formatAnchorIssues(validateOverrides(state.anchor, overridesOf(output)))
        : [];

    const uncovered = new Set(diffFromStore(state.store).uncovered);
    for (const { ref, input } of pendingArtifacts(output)) {
      if (input.type !== 'work-item') {
        continue;
      }
      for (const id of (input.implements ?? []).filter((capability) => uncovered.has(capability))) {
        issues.push(`${ref}: implements ${id}, which no decision covers`);
      }
    }
    return issues;
  }

  /**
   * Runs an assembly step. Reference and legacy cutoff failures are
   * returned, anything else is thrown.
   */
  private assembled<T>(assemble: () => T): T | UnresolvedReferenceError | LegacyFallbackExpiredError {
    try {
      return assemble();
    } catch (error) {
      if (error instanceof UnresolvedReferenceError || error instanceof LegacyFallbackExpiredError) {
        return error;
      }
      throw error;
    }
  }

  private assemblyFailed(
    state: PipelineState,
    stage: StageId,
    error: UnresolvedReferenceError | LegacyFallbackExpiredError
  ): Promise<RunOutcome> {
    const message = `Specification could not be assembled: ${error.message}`;
    return this.escalate(
      state,
      stage,
      new SchemaValidationError(message, STAGE_SCHEMAS[stage], [error.message]),
      undefined,
      state.stages[stage].attempts
    );
  }

  /**
   * Commits an output's artifacts. Store rejections are returned, anything
   * else is thrown.
   */
  private tryCommit<S extends StageId>(
    state: PipelineState,
    output: StageOutputOf<S>,
    incomplete: boolean
  ): CommitResult | ArtifactValidationError | UnresolvedReferenceError | InvalidSupersedeError {
    try {
      return commitBatch(state.store, pendingArtifacts(output, incomplete));
    } catch (error) {
      if (
        error instanceof ArtifactValidationError ||
        error instanceof UnresolvedReferenceError ||
        error instanceof InvalidSupersedeError
      ) {
        return error;
      }
      throw error;
    }
  }

  private async commitOutput<S extends StageId>(
    state: PipelineState,
    output: StageOutputOf<S>
  ): Promise<RunOutcome | undefined> {
    const { stage } = output;
    const raw = JSON.stringify(output.data, null, 2);

    const issues = this.reviewOutput(state, output);
    if (issues.length > 0) {
      const message = `Output of '${stage}' was rejected: ${issues.join('; ')}`;
      return this.escalate(
        state,
        stage,
        new SchemaValidationError(message, STAGE_SCHEMAS[stage], issues),
        raw,
        output.attempt
      );
    }

    const committed = this.tryCommit(state, output, false);
    if (committed instanceof Error) {
      const message = `Output of '${stage}' could not be committed: ${committed.message}`;
      return this.escalate(
        state,
        stage,
        new SchemaValidationError(message, STAGE_SCHEMAS[stage], [committed.message]),
        raw,
        output.attempt
      );
    }

    const previousOrdering = state.outputs['work-item-ordering'];
    const recorded: StageOutputOf<S> = {
      ...output,
      artifactIds: committed.artifacts.map((artifact) => artifact.id),
    };
    setStageOutput(state.outputs, recorded);

    const unknown = stage === 'work-item-ordering' ? this.unknownOrderedItems(state) : [];
    if (unknown.length > 0) {
      if (previousOrdering !== undefined) {
        setStageOutput(state.outputs, previousOrdering);
      } else {
        delete state.outputs['work-item-ordering'];
      }
      const message = `Ordering names work items that are not current: ${unknown.join(', ')}`;
      return this.escalate(
        state,
        stage,
        new SchemaValidationError(message, STAGE_SCHEMAS[stage], [message]),
        raw,
        output.attempt
      );
    }

    delete state.legacy[stage];
    state.stages[stage] = {
      status: 'completed',
      attempts: output.attempt,
      correctiveRetries: state.stages[stage].correctiveRetries,
      feedback: [],
    };
    this.logger.info('stage_completed', {
      stage,
      attempts: output.attempt,
      artifacts: recorded.artifactIds,
    });
    await this.persist(state);
    return undefined;
  }

  /**
   * IDs in the recorded ordering that are not current work items.
   */
  private unknownOrderedItems(state: PipelineState): string[] {
    const ordering = state.outputs['work-item-ordering'];
    if (ordering === undefined) {
      return [];
    }
    const current = new Set(state.store.current('work-item').map((item) => item.id));
    return ordering.data.order.filter((id) => !current.has(id));
  }

  private generationFailed(
    state: PipelineState,
    stage: StageId,
    error: GenerationError,
    attempts: number
  ): Promise<RunOutcome> {
    if (error.kind === 'CancelledError') {
      state.stages[stage] = pendingStage(state.stages[stage]);
      return this.cancel(state);
    }
    if (error.kind === 'SchemaError') {
      return this.escalate(
        state,
        stage,
        new SchemaValidationError(error.message, error.schema, error.issues),
        error.raw,
        attempts
      );
    }
    const failure = new GenerationFailureError(
      `Stage '${stage}' failed after ${String(attempts)} attempt(s): ${error.message}`,
      stage,
      attempts,
      error.cause !== undefined ? { cause: error.cause } : {}
    );
    return this.escalate(state, stage, failure, undefined, attempts);
  }

  private escalate(
    state: PipelineState,
    stage: StageId,
    error: PipelineError,
    rawOutput: string | undefined,
    attempts: number
  ): Promise<RunOutcome> {
    const previous = state.stages[stage];
    state.stages[stage] = {
      status: 'failed',
      attempts,
      correctiveRetries: previous.correctiveRetries,
      feedback: previous.feedback,
      error: error.message,
    };
    this.logger.error('stage_failed', { stage, kind: error.kind, message: error.message, attempts });

    const gate: GateState = {
      kind: 'escalation',
      phase: phaseOf(stage),
      stage,
      reason: error.message,
      openedAt: this.timestamp(),
      ...(rawOutput !== undefined && rawOutput !== '' ? { rawOutput } : {}),
    };
    return this.suspend(state, { gate, error }, 'escalation');
  }

  private stageContext(state: PipelineState, stage: StageId, focus?: readonly string[]): StageContext {
    return assembleStageContext({
      anchor: this.requireAnchor(state),
      stage,
      store: state.store,
      diff: diffFromStore(state.store),
      stageOutputs: state.outputs,
      tokenBudget: this.config.context.token_budget,
      anchorTokenBudget: this.config.anchor.token_budget,
      feedback: state.stages[stage].feedback,
      legacy: state.legacy,
      logger: this.logger.child('ContextAssembler'),
      ...(stage === 'idea-analysis' ? { idea: state.idea } : {}),
      ...(focus !== undefined ? { focus } : {}),
    });
  }

  // -- anchor ---------------------------------------------------------------

  private setAnchorCandidate(state: PipelineState, candidate: AnchorCandidate, attempt?: number): void {
    state.anchorCandidate = candidate;
    setStageOutput(state.outputs, {
      stage: 'concept-anchor',
      data: candidate,
      attempt: attempt ?? state.outputs['concept-anchor']?.attempt ?? 0,
      producedAt: this.timestamp(),
      artifactIds: [],
    });
    const previous = state.stages['concept-anchor'];
    state.stages['concept-anchor'] = {
      status: 'blocked-on-approval',
      attempts: attempt ?? previous.attempts,
      correctiveRetries: previous.correctiveRetries,
      feedback: [],
    };
  }

  private anchorGate(state: PipelineState, candidate: AnchorCandidate): Suspension {
    const ambiguous = getAmbiguousInvariants(candidate, this.config.anchor.confidence_threshold);
    const gate: GateState = {
      kind: 'anchor-review',
      phase: 'validation',
      stage: 'concept-anchor',
      reason:
        ambiguous.length > 0
          ? `Resolve ${String(ambiguous.length)} ambiguous invariant(s): ${ambiguous
              .map((invariant) => invariant.property)
              .join(', ')}`
          : 'Review and confirm the concept anchor',
      openedAt: state.gate?.openedAt ?? this.timestamp(),
    };
    const error =
      ambiguous.length > 0
        ? new ExtractionAmbiguityError(
            gate.reason,
            ambiguous.map((invariant) => invariant.property)
          )
        : undefined;
    return suspension(gate, error);
  }

  private requireAnchor(state: PipelineState): ConceptAnchor {
    if (state.anchor === null) {
      throw new WorkflowStateError('The concept anchor is not confirmed');
    }
    return state.anchor;
  }

  private acceptCorrectedAnchor(
    state: PipelineState,
    gate: GateState,
    candidate: AnchorCandidate
  ): Suspension {
    const validation = validateAnchor(candidate, this.config.anchor.confidence_threshold);
    if (!validation.valid) {
      throw new GateDecisionError(
        `The corrected anchor is invalid: ${formatAnchorIssues(validation.issues).join('; ')}`,
        gate.kind,
        'request-changes'
      );
    }
    this.setAnchorCandidate(state, candidate);
    this.logger.info('anchor_corrected', { invariants: candidate.invariants.length });
    return this.anchorGate(state, candidate);
  }

  // -- decisions ------------------------------------------------------------

  private decideAnchor(state: PipelineState, gate: GateState, decision: GateDecision): Decided {
    const candidate = state.anchorCandidate;
    if (candidate === null) {
      throw new GateDecisionError('There is no anchor candidate to review', gate.kind, decision.type);
    }

    switch (decision.type) {
      case 'resolve-ambiguity': {
        const resolved = resolveAmbiguity(candidate, decision.selections);
        this.setAnchorCandidate(state, resolved);
        this.logger.info('ambiguity_resolved', {
          invariants: decision.selections.map((selection) => selection.invariant),
        });
        return this.anchorGate(state, resolved);
      }
      case 'approve': {
        const anchor = confirmAnchor(candidate, this.now(), this.config.anchor.confidence_threshold);
        state.anchor = anchor;
        state.anchorCandidate = null;
        const previous = state.stages['concept-anchor'];
        state.stages['concept-anchor'] = {
          status: 'completed',
          attempts: previous.attempts,
          correctiveRetries: previous.correctiveRetries,
          feedback: [],
        };
        this.logger.info('anchor_confirmed', {
          invariants: anchor.invariants.map((invariant) => invariant.property),
        });
        return 'continue';
      }
      case 'request-changes':
        if (decision.anchor !== undefined) {
          return this.acceptCorrectedAnchor(state, gate, decision.anchor);
        }
        state.anchorCandidate = null;
        state.stages['concept-anchor'] = pendingStage(state.stages['concept-anchor'], [
          decision.feedback,
        ]);
        return 'continue';
      case 'override-violation':
        throw new GateDecisionError(
          'Anchor invariants cannot be overridden; resolve or correct them',
          gate.kind,
          decision.type
        );
    }
  }

  private async decidePhase(
    state: PipelineState,
    gate: GateState,
    decision: GateDecision
  ): Promise<Decided> {
    const { phase } = gate;
    const report = state.phases[phase].report;

    switch (decision.type) {
      case 'approve':
        if (report !== undefined && !canProceed(report)) {
          const invariants = sortedUnique(unresolvedBlocking(report).map((v) => v.invariant));
          throw new GateDecisionError(
            `Blocking violations of ${invariants.join(', ')} remain; override them or request changes`,
            gate.kind,
            decision.type
          );
        }
        return this.completePhase(state, phase);

      case 'override-violation': {
        if (report === undefined) {
          throw new GateDecisionError('There is no verification report to override', gate.kind, decision.type);
        }
        if (decision.acks.length === 0) {
          throw new GateDecisionError('Acknowledge at least one violation', gate.kind, decision.type);
        }
        const logger = this.logger.child('PhaseVerifier');
        const updated = decision.acks.reduce(
          (current, ack) => applyOverride(current, ack, this.now(), logger),
          report
        );
        await saveReport(updated, this.config.paths.reports);
        state.phases[phase] = phaseWith(state.phases[phase], 'awaiting-gate', updated);
        this.logger.warn('override_recorded', {
          phase,
          invariants: decision.acks.map((ack) => ack.invariant),
        });

        if (canProceed(updated)) {
          return this.completePhase(state, phase);
        }
        const remaining = sortedUnique(unresolvedBlocking(updated).map((v) => v.invariant));
        const reason = `${String(remaining.length)} blocking violation(s) remain: ${remaining.join(', ')}`;
        return {
          gate: { ...gate, reason },
          error: new VerificationViolationError(reason, remaining),
        };
      }

      case 'request-changes': {
        const stage = decision.stage ?? this.lastCompletedStage(state, phase);
        this.resetFrom(state, gate, stage, decision);
        return 'continue';
      }

      case 'resolve-ambiguity':
        throw new GateDecisionError(
          'Ambiguities are resolved at the anchor review',
          gate.kind,
          decision.type
        );
    }
  }

  private decideEscalation(state: PipelineState, gate: GateState, decision: GateDecision): Decided {
    switch (decision.type) {
      case 'approve':
        if (gate.stage !== undefined) {
          state.stages[gate.stage] = pendingStage(state.stages[gate.stage]);
        }
        this.logger.info('escalation_retried', { phase: gate.phase, stage: gate.stage ?? null });
        return 'continue';

      case 'request-changes': {
        if (decision.anchor !== undefined) {
          if (gate.stage !== 'concept-anchor') {
            throw new GateDecisionError(
              'A corrected anchor only applies to an anchor escalation',
              gate.kind,
              decision.type
            );
          }
          return this.acceptCorrectedAnchor(state, gate, decision.anchor);
        }
        const stage = decision.stage ?? gate.stage ?? this.lastCompletedStage(state, gate.phase);
        this.resetFrom(state, gate, stage, decision);
        return 'continue';
      }

      case 'resolve-ambiguity':
      case 'override-violation':
        throw new GateDecisionError(
          `'${decision.type}' does not apply to an escalation; retry or request changes`,
          gate.kind,
          decision.type
        );
    }
  }

  private decideEntry(state: PipelineState, gate: GateState, decision: GateDecision): Decided {
    switch (decision.type) {
      case 'override-violation': {
        const ack = decision.acks.find((candidate) => candidate.invariant === gate.condition);
        if (ack === undefined || ack.reason.trim() === '') {
          throw new GateDecisionError(
            `Acknowledge condition '${gate.condition ?? ''}' with a reason to override it`,
            gate.kind,
            decision.type
          );
        }
        state.phases[gate.phase] = { ...state.phases[gate.phase], entryOverride: ack.reason };
        this.logger.warn('entry_condition_overridden', {
          phase: gate.phase,
          condition: gate.condition ?? null,
          reason: ack.reason,
        });
        return 'continue';
      }

      case 'request-changes': {
        const stage = decision.stage ?? phaseNode(gate.phase).entry?.remedyStage;
        this.resetFrom(state, gate, stage, decision);
        return 'continue';
      }

      case 'approve':
      case 'resolve-ambiguity':
        throw new GateDecisionError(
          'An unmet entry condition must be overridden or fixed upstream',
          gate.kind,
          decision.type
        );
    }
  }

  private completePhase(state: PipelineState, phase: PhaseId): Decided {
    const previous = state.phases[phase];
    state.phases[phase] = phaseWith(previous, 'complete', previous.report);
    this.logger.info('phase_completed', { phase, next: nextPhase(phase) ?? null });
    return 'continue';
  }

  private lastCompletedStage(state: PipelineState, phase: PhaseId): StageId | undefined {
    return [...PHASE_STAGES[phase]].reverse().find((stage) => state.stages[stage].status === 'completed');
  }

  /**
   * Sends the run back to a stage with the human's feedback. The stage's
   * phase restarts there; later phases start over.
   */
  private resetFrom(
    state: PipelineState,
    gate: GateState,
    stage: StageId | undefined,
    decision: GateDecision & { readonly type: 'request-changes' }
  ): void {
    if (stage === undefined) {
      throw new GateDecisionError('Name the stage to re-run', gate.kind, decision.type);
    }
    const phase = phaseOf(stage);
    if (PHASE_IDS.indexOf(phase) > PHASE_IDS.indexOf(gate.phase)) {
      throw new GateDecisionError(
        `Stage '${stage}' has not been reached yet`,
        gate.kind,
        decision.type
      );
    }
    if (stage === 'concept-anchor' && state.anchor !== null) {
      throw new GateDecisionError('The confirmed concept anchor is frozen', gate.kind, decision.type);
    }
    if (decision.feedback.trim() === '') {
      throw new GateDecisionError('Describe the changes to make', gate.kind, decision.type);
    }

    const stages = stagesFrom(phase);
    for (const id of stages.slice(stages.indexOf(stage))) {
      if (id === 'concept-anchor' && state.anchor !== null) {
        continue;
      }
      state.stages[id] = pendingStage(state.stages[id], id === stage ? [decision.feedback] : []);
    }
    state.phases[phase] = phaseWith(state.phases[phase], 'in-progress');
    for (const later of PHASE_IDS.slice(PHASE_IDS.indexOf(phase) + 1)) {
      state.phases[later] = NOT_STARTED_PHASE;
    }
    this.logger.info('changes_requested', { stage, phase });
  }

  // -- run status -----------------------------------------------------------

  private async suspend(
    state: PipelineState,
    { gate, error }: Suspension,
    hook: 'gate' | 'escalation'
  ): Promise<RunOutcome> {
    state.gate = gate;
    state.status = 'suspended';
    await this.persist(state);
    this.logger.info('gate_suspended', {
      kind: gate.kind,
      phase: gate.phase,
      stage: gate.stage ?? null,
      reason: gate.reason,
    });

    const variables = {
      runId: state.runId,
      phase: gate.phase,
      reason: gate.reason,
      timestamp: this.timestamp(),
      ...(gate.stage !== undefined ? { stage: gate.stage } : {}),
    };
    if (hook === 'escalation') {
      await this.hooks?.onEscalation(variables);
    } else {
      await this.hooks?.onGate(variables);
    }
    return error !== undefined ? { status: 'suspended', gate, error } : { status: 'suspended', gate };
  }

  private async cancel(state: PipelineState): Promise<RunOutcome> {
    for (const [stage, stageState] of Object.entries(state.stages)) {
      if (stageState.status === 'running') {
        this.logger.warn('stage_interrupted', { stage });
      }
    }
    state.status = 'cancelled';
    this.logger.warn('run_cancelled', { runId: state.runId, phase: currentPhase(state) ?? null });
    await this.persist(state);
    return { status: 'cancelled' };
  }

  private async complete(state: PipelineState): Promise<RunOutcome> {
    const reuse = state.phases['work-items'].status === 'skipped' && state.specification !== null;
    const specification =
      reuse && state.specification !== null
        ? state.specification
        : this.assembled(() =>
            assembleSpecification(
              state.store,
              this.requireAnchor(state),
              state.outputs['work-item-ordering']?.data.order ?? [],
              this.assemblyOptions(state)
            )
          );
    if (specification instanceof Error) {
      // Reopen the phase so an approved retry re-runs the ordering.
      state.phases['work-items'] = phaseWith(state.phases['work-items'], 'in-progress');
      return this.assemblyFailed(state, 'work-item-ordering', specification);
    }

    if (!reuse) {
      await writeFileAtomic(this.config.paths.output, serializeSpecification(specification));
    }
    state.specification = specification;
    state.status = 'complete';
    this.logger.info('run_completed', {
      runId: state.runId,
      reused: reuse,
      workItems: specification.workItems.length,
      uncovered: specification.uncovered.map((capability) => capability.id),
    });
    await this.persist(state);
    await this.hooks?.onComplete({
      runId: state.runId,
      phase: 'work-items',
      timestamp: this.timestamp(),
    });
    return { status: 'complete', specification };
  }

  // -- helpers --------------------------------------------------------------

  private view(state: PipelineState): PredicateView {
    return { state, diff: diffFromStore(state.store), config: this.config };
  }

  private assemblyOptions(state: PipelineState): AssembleContextOptions {
    return {
      legacy: state.legacy,
      legacyUntil: this.config.workflow.legacy_fallback_until,
      now: this.now(),
      logger: this.logger.child('SpecificationAssembler'),
    };
  }

  private timestamp(): string {
    return this.now().toISOString();
  }

  private async persist(state: PipelineState): Promise<void> {
    state.updatedAt = this.timestamp();
    await saveState(state, this.config.paths.state, this.now());
  }
}
