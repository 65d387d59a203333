import { describe, it, expect, beforeAll } from 'vitest';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { SchemaLoadError, SchemaRegistry, formatSchemaIssues } from './schema-registry.js';

describe('SchemaRegistry', () => {
  let registry: SchemaRegistry;

  beforeAll(async () => {
    registry = await SchemaRegistry.load();
  });

  it('should accept output matching its schema', () => {
    const data = {
      summary: 'Members of an existing club trade seedlings.',
      problem: 'Seedling swaps are organised by word of mouth.',
      targetUsers: ['club members'],
      hasUserFacingInterface: true,
    };

    const check = registry.validate('idea-analysis', data);

    expect(check).toEqual({ success: true, data });
  });

  it('should report every missing field with its path', () => {
    const check = registry.validate(
      'idea-analysis',
      { summary: 'x', targetUsers: [] },
      '{"summary":"x"}'
    );

    expect(check.success).toBe(false);
    if (!check.success) {
      expect(check.error.kind).toBe('SchemaError');
      expect(check.error.schema).toBe('idea-analysis');
      expect(check.error.raw).toBe('{"summary":"x"}');
      expect(check.error.issues).toEqual([
        "(root): must have required property 'problem'",
        "(root): must have required property 'hasUserFacingInterface'",
      ]);
    }
  });

  it('should reject unknown properties instead of dropping them', () => {
    const check = registry.validate('validation-verdict', {
      summary: 'Go ahead.',
      verdict: 'GO',
      rationale: 'Clear demand.',
      confidence: 0.9,
    });

    expect(check.success).toBe(false);
    if (!check.success) {
      expect(check.error.issues).toEqual(['(root): must NOT have additional properties']);
    }
  });

  it('should validate stage output against the stage schema', () => {
    const check = registry.validateStage('capability-model', {
      summary: 'Capabilities.',
      capabilities: [],
    });

    expect(check.success).toBe(false);
    if (!check.success) {
      expect(check.error.schema).toBe('capabilities');
      expect(check.error.issues).toEqual([
        '/capabilities: must NOT have fewer than 1 items',
      ]);
    }
  });

  it('should accept declared overrides on stage output', () => {
    const check = registry.validateStage('scope-boundaries', {
      summary: 'Closed club only.',
      inScope: ['invitations'],
      outOfScope: ['public sign-up'],
      overrides: [
        { invariant: 'community_model', reason: 'Guests may view.', userImpact: 'Read-only.' },
      ],
    });

    expect(check.success).toBe(true);
  });

  it('should check nested verification findings', () => {
    const check = registry.validate('verification-findings', {
      honored: [],
      violations: [{ invariant: 'community_model', violation: 'x', stage: 'nowhere', severity: 'blocking' }],
      preserved: [],
      genericized: [],
      warnings: [],
      confidence: 0.8,
    });

    expect(check.success).toBe(false);
    if (!check.success) {
      expect(check.error.issues).toEqual([
        '/violations/0/stage: must be equal to one of the allowed values',
      ]);
    }
  });
});

describe('SchemaRegistry.load', () => {
  it('should fail with SchemaLoadError when a schema file is missing', async () => {
    const dir = await mkdtemp(join(tmpdir(), 'schemas-'));
    try {
      await expect(SchemaRegistry.load(dir)).rejects.toBeInstanceOf(SchemaLoadError);
    } finally {
      await rm(dir, { recursive: true, force: true });
    }
  });

  it('should fail when a schema file is not an object', async () => {
    const dir = await mkdtemp(join(tmpdir(), 'schemas-'));
    try {
      await writeFile(join(dir, 'concept-anchor.schema.json'), '[]');
      await expect(SchemaRegistry.load(dir)).rejects.toThrow(SchemaLoadError);
    } finally {
      await rm(dir, { recursive: true, force: true });
    }
  });
});

describe('formatSchemaIssues', () => {
  it('should return no issues for null errors', () => {
    expect(formatSchemaIssues(null)).toEqual([]);
  });
});
