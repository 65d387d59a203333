import { describe, expect, it, beforeEach, afterEach } from 'vitest';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import {
  assertConfigValid,
  ConfigValidationError,
  DEFAULT_CONFIG,
  loadConfig,
  validateConfig,
  type Config,
} from './index.js';

function withOverrides(patch: (config: Config) => Config): Config {
  return patch(structuredClone(DEFAULT_CONFIG));
}

describe('validateConfig', () => {
  it('accepts the defaults', () => {
    expect(validateConfig(DEFAULT_CONFIG)).toEqual({ valid: true, errors: [] });
  });

  it('rejects a confidence threshold outside (0, 1]', () => {
    const result = validateConfig(
      withOverrides((c) => ({ ...c, anchor: { ...c.anchor, confidence_threshold: 0 } }))
    );
    expect(result.valid).toBe(false);
    expect(result.errors.map((e) => e.field)).toEqual(['anchor.confidence_threshold']);
  });

  it('collects every problem at once', () => {
    const result = validateConfig(
      withOverrides((c) => ({
        ...c,
        generation: { ...c.generation, max_retries: -1, retry_max_delay_ms: 10 },
        workflow: { ...c.workflow, work_item_batch_size: 0, legacy_fallback_until: 'soon' },
      }))
    );
    expect(result.errors.map((e) => e.field)).toEqual([
      'generation.max_retries',
      'generation.retry_max_delay_ms',
      'workflow.work_item_batch_size',
      'workflow.legacy_fallback_until',
    ]);
  });

  it('assertConfigValid throws with a summary', () => {
    const invalid = withOverrides((c) => ({
      ...c,
      verification: { ...c.verification, max_corrective_retries: 1.5 },
    }));
    expect(() => {
      assertConfigValid(invalid);
    }).toThrow(ConfigValidationError);
    expect(() => {
      assertConfigValid(invalid);
    }).toThrow(/verification.max_corrective_retries must be a non-negative integer/);
  });
});

describe('loadConfig', () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await mkdtemp(join(tmpdir(), 'throughline-config-'));
  });

  afterEach(async () => {
    await rm(tempDir, { recursive: true, force: true });
  });

  it('uses defaults when throughline.toml is absent', async () => {
    expect(await loadConfig(tempDir, {})).toEqual(DEFAULT_CONFIG);
  });

  it('layers env over file over defaults', async () => {
    await writeFile(
      join(tempDir, 'throughline.toml'),
      '[generation]\ncommand = "from-file"\nmax_retries = 1\n'
    );
    const config = await loadConfig(tempDir, { THROUGHLINE_GENERATION_COMMAND: 'from-env' });
    expect(config.generation.command).toBe('from-env');
    expect(config.generation.max_retries).toBe(1);
  });

  it('rejects semantically invalid files', async () => {
    await writeFile(join(tempDir, 'throughline.toml'), '[anchor]\nconfidence_threshold = 2\n');
    await expect(loadConfig(tempDir, {})).rejects.toThrow(ConfigValidationError);
  });
});
