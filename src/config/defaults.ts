/**
 * Default configuration values.
 *
 * @packageDocumentation
 */

import type {
  AnchorConfig,
  Config,
  ContextConfig,
  GenerationConfig,
  LoggingConfig,
  NotificationConfig,
  PathConfig,
  VerificationConfig,
  WorkflowConfig,
} from './types.js';

export const DEFAULT_GENERATION: GenerationConfig = {
  command: '',
  timeout_ms: 120000,
  max_retries: 3,
  retry_base_delay_ms: 1000,
  retry_max_delay_ms: 30000,
  jitter_factor: 0.2,
};

export const DEFAULT_ANCHOR: AnchorConfig = {
  confidence_threshold: 0.7,
  extraction_retries: 1,
  token_budget: 500,
};

export const DEFAULT_VERIFICATION: VerificationConfig = {
  max_corrective_retries: 2,
  default_mode: 'single',
  multi_pass_phases: ['scope'],
};

export const DEFAULT_CONTEXT: ContextConfig = {
  token_budget: 6000,
};

export const DEFAULT_WORKFLOW: WorkflowConfig = {
  design_integration: false,
  work_item_batch_size: 8,
  legacy_fallback_until: '2027-06-30',
};

/**
 * Default locations relative to the project root.
 */
export const DEFAULT_PATHS: PathConfig = {
  state: '.throughline/state.json',
  reports: '.throughline/reports',
  tracker: '.throughline/tracker.json',
  output: '.throughline/specification.json',
};

export const DEFAULT_NOTIFICATIONS: NotificationConfig = {
  hooks: {},
};

export const DEFAULT_LOGGING: LoggingConfig = {
  debug: false,
};

/**
 * Complete default configuration.
 */
export const DEFAULT_CONFIG: Config = {
  generation: DEFAULT_GENERATION,
  anchor: DEFAULT_ANCHOR,
  verification: DEFAULT_VERIFICATION,
  context: DEFAULT_CONTEXT,
  workflow: DEFAULT_WORKFLOW,
  paths: DEFAULT_PATHS,
  notifications: DEFAULT_NOTIFICATIONS,
  logging: DEFAULT_LOGGING,
};
