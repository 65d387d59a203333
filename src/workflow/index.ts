/**
 * Workflow Engine.
 *
 * @packageDocumentation
 */

export { GateDecisionError, WorkflowEngine, WorkflowStateError } from './engine.js';
export type { RunOutcome, WorkflowEngineOptions } from './engine.js';
export {
  PHASE_STAGES,
  WORKFLOW_GRAPH,
  and,
  designIntegrationEnabled,
  diffIsEmpty,
  hasPriorOutput,
  hasUserFacingInterface,
  nextPhase,
  not,
  or,
  phaseNode,
  phaseOf,
  riskIsHigh,
  stageSkipped,
  stagesFrom,
  workItemsNeeded,
} from './graph.js';
export type { EntryCondition, PhaseNode, PredicateView, StageNode, StagePredicate } from './graph.js';
export { batchCapabilities, mergeWorkItemBatches, pendingArtifacts } from './drafts.js';
export { NotificationHooksExecutor, hookEnvironment, substituteVariables } from './hooks.js';
export type { HookEvent, HookVariables } from './hooks.js';
export {
  PHASE_IDS,
  PHASE_TITLES,
  STAGE_IDS,
  STAGE_TITLES,
  isPhaseId,
  isStageId,
} from './ids.js';
export type { PhaseId, StageId } from './ids.js';
export { STAGE_INSTRUCTIONS } from './instructions.js';
export { overridesOf, setStageOutput, summaryOf } from './outputs.js';
export type {
  ArchitectureDecisions,
  CapabilityDraft,
  CapabilityModel,
  DecisionDraft,
  DesignMockups,
  EntityDraft,
  IdeaAnalysis,
  MockupScreen,
  Overridable,
  PivotOption,
  PivotStrategy,
  Risk,
  RiskAssessment,
  RiskLevel,
  ScopeBoundaries,
  StageDataByStage,
  StageOutput,
  StageOutputOf,
  StageOutputs,
  SystemTrait,
  SystemTraits,
  ValidationVerdict,
  Verdict,
  WorkItemBatch,
  WorkItemDraft,
  WorkItemOrdering,
} from './outputs.js';
export {
  StatePersistenceError,
  deserializeState,
  fromPersisted,
  loadState,
  saveState,
  serializeState,
  toPersisted,
} from './persistence.js';
export type { StatePersistenceErrorType } from './persistence.js';
export {
  NOT_STARTED_PHASE,
  PENDING_STAGE,
  PIPELINE_STATE_VERSION,
  createInitialState,
  currentPhase,
  failedStages,
} from './state.js';
export type { CreateStateOptions } from './state.js';
export type {
  GateDecision,
  GateDecisionRecord,
  GateDecisionType,
  GateKind,
  GateState,
  OverrideRequest,
  PersistedPipelineState,
  PhaseState,
  PhaseStatus,
  PipelineState,
  RunStatus,
  StageState,
  StageStatus,
} from './types.js';
