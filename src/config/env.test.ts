import { describe, expect, it } from 'vitest';
import {
  applyEnvOverrides,
  DEFAULT_CONFIG,
  EnvCoercionError,
  getEnvVarDocumentation,
  readEnvOverrides,
} from './index.js';

describe('environment overrides', () => {
  it('returns the config unchanged when no variables are set', () => {
    expect(applyEnvOverrides(DEFAULT_CONFIG, {})).toEqual(DEFAULT_CONFIG);
  });

  it('applies string, number and boolean overrides', () => {
    const config = applyEnvOverrides(DEFAULT_CONFIG, {
      THROUGHLINE_GENERATION_COMMAND: 'planner --json',
      THROUGHLINE_ANCHOR_CONFIDENCE_THRESHOLD: '0.85',
      THROUGHLINE_WORKFLOW_DESIGN_INTEGRATION: 'yes',
      THROUGHLINE_DEBUG: '1',
    });

    expect(config.generation.command).toBe('planner --json');
    expect(config.anchor.confidence_threshold).toBe(0.85);
    expect(config.workflow.design_integration).toBe(true);
    expect(config.logging.debug).toBe(true);
    expect(config.generation.timeout_ms).toBe(DEFAULT_CONFIG.generation.timeout_ms);
  });

  it('does not mutate the base config', () => {
    applyEnvOverrides(DEFAULT_CONFIG, { THROUGHLINE_CONTEXT_TOKEN_BUDGET: '10' });
    expect(DEFAULT_CONFIG.context.token_budget).toBe(6000);
  });

  it('skips empty values', () => {
    const result = readEnvOverrides(DEFAULT_CONFIG, { THROUGHLINE_GENERATION_COMMAND: '' });
    expect(result.appliedVars).toEqual([]);
  });

  it('throws on values that cannot be coerced', () => {
    expect(() =>
      applyEnvOverrides(DEFAULT_CONFIG, { THROUGHLINE_GENERATION_MAX_RETRIES: 'many' })
    ).toThrow(EnvCoercionError);
    expect(() => applyEnvOverrides(DEFAULT_CONFIG, { THROUGHLINE_DEBUG: 'maybe' })).toThrow(
      /Expected one of: true, 1, yes, on, false, 0, no, off/
    );
  });

  it('collects errors when asked and keeps valid overrides', () => {
    const result = readEnvOverrides(
      DEFAULT_CONFIG,
      {
        THROUGHLINE_GENERATION_MAX_RETRIES: 'many',
        THROUGHLINE_PATHS_STATE: 'elsewhere/state.json',
      },
      { collectErrors: true }
    );

    expect(result.errors).toHaveLength(1);
    expect(result.errors[0]?.envVar).toBe('THROUGHLINE_GENERATION_MAX_RETRIES');
    expect(result.appliedVars).toEqual(['THROUGHLINE_PATHS_STATE']);
    expect(result.config.paths.state).toBe('elsewhere/state.json');
  });

  it('documents every supported variable', () => {
    const docs = getEnvVarDocumentation();
    expect(docs.THROUGHLINE_DEBUG).toEqual({ description: 'Enable debug logging', type: 'boolean' });
    expect(Object.keys(docs).every((name) => name.startsWith('THROUGHLINE_'))).toBe(true);
  });
});
