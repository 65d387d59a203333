/**
 * Phase-Boundary Verifier.
 *
 * @packageDocumentation
 */

export {
  CHECK_INSTRUCTIONS,
  renderVerificationContext,
  synthesizeFindings,
  verifyPhase,
} from './verifier.js';
export type { CheckFindings, VerifyPhaseInput, VerifyPhaseResult } from './verifier.js';
export {
  applyOverride,
  canProceed,
  correctiveFeedback,
  formatReportSummary,
  unresolvedBlocking,
} from './report.js';
export {
  ReportStorageError,
  getReportPath,
  isPhaseVerificationReport,
  loadReport,
  parseReport,
  saveReport,
  serializeReport,
} from './report-storage.js';
export type { ReportFormat, ReportStorageErrorType } from './report-storage.js';
export type {
  GenericizedFeature,
  InvariantViolation,
  OverrideAck,
  PhaseVerificationReport,
  VerificationCheck,
  VerificationFindings,
  ViolationSeverity,
} from './types.js';
