/**
 * Configuration types for throughline.toml.
 *
 * Field names mirror the TOML keys.
 *
 * @packageDocumentation
 */

import type { PhaseId } from '../workflow/ids.js';

/**
 * Generation backend and retry policy.
 */
export interface GenerationConfig {
  /** Shell command run by the command backend; empty disables it. */
  command: string;
  /** Per-call timeout in milliseconds. */
  timeout_ms: number;
  /** Retries after the first attempt for transient failures. */
  max_retries: number;
  /** Base delay for exponential backoff. */
  retry_base_delay_ms: number;
  /** Upper bound on a single backoff delay. */
  retry_max_delay_ms: number;
  /** Jitter factor (0-1) applied to backoff delays. */
  jitter_factor: number;
}

/**
 * Concept anchor extraction policy.
 */
export interface AnchorConfig {
  /** Invariants below this confidence must carry ambiguity text and options. */
  confidence_threshold: number;
  /** Re-extractions after a validation failure. */
  extraction_retries: number;
  /** Token budget the anchor block is expected to fit in. */
  token_budget: number;
}

/**
 * Verification mode for a phase.
 */
export type VerificationMode = 'single' | 'multi-pass';

/**
 * Phase-boundary verification policy.
 */
export interface VerificationConfig {
  /** Automatic re-runs of a stage after a blocking violation. */
  max_corrective_retries: number;
  /** Mode for phases not listed in multi_pass_phases. */
  default_mode: VerificationMode;
  /** Phases verified with independent sub-checks and a synthesis step. */
  multi_pass_phases: PhaseId[];
}

/**
 * Stage context assembly.
 */
export interface ContextConfig {
  /** Token budget for upstream sections (the anchor is not counted). */
  token_budget: number;
}

/**
 * Workflow switches.
 */
export interface WorkflowConfig {
  /** Enables the design-mockup stage for user-facing products. */
  design_integration: boolean;
  /** Capabilities per work-item generation call. */
  work_item_batch_size: number;
  /** ISO date after which raw-text fallbacks are refused. */
  legacy_fallback_until: string;
}

/**
 * File locations, relative to the project root.
 */
export interface PathConfig {
  state: string;
  reports: string;
  tracker: string;
  output: string;
}

/**
 * A shell command run on a pipeline event.
 */
export interface NotificationHook {
  command: string;
  enabled: boolean;
}

/**
 * Hooks keyed by pipeline event.
 */
export interface NotificationHooks {
  /** The pipeline suspended at a decision gate. */
  on_gate?: NotificationHook;
  /** The resolved specification was produced. */
  on_complete?: NotificationHook;
  /** A stage exhausted its retries and escalated. */
  on_escalation?: NotificationHook;
}

export interface NotificationConfig {
  hooks: NotificationHooks;
}

export interface LoggingConfig {
  debug: boolean;
}

/**
 * Complete configuration.
 */
export interface Config {
  generation: GenerationConfig;
  anchor: AnchorConfig;
  verification: VerificationConfig;
  context: ContextConfig;
  workflow: WorkflowConfig;
  paths: PathConfig;
  notifications: NotificationConfig;
  logging: LoggingConfig;
}
