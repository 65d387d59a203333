import { describe, it, expect, beforeAll } from 'vitest';
import { Logger } from '../utils/logger.js';
import { SchemaRegistry } from './schema-registry.js';
import { ScriptedBackend, sequence } from './scripted-backend.js';
import { createTransientError, type GenerationBackend } from './types.js';
import { createValidatedGenerator } from './validated.js';

const noSleep = (): Promise<void> => Promise.resolve();

const analysis = {
  summary: 'Members of an existing club trade seedlings.',
  problem: 'Swaps are organised by word of mouth.',
  targetUsers: ['club members'],
  hasUserFacingInterface: true,
};

const input = { instruction: 'Analyse the idea.', context: 'A seedling swap.', feedback: [] };

describe('ValidatedGenerator', () => {
  let registry: SchemaRegistry;

  beforeAll(async () => {
    registry = await SchemaRegistry.load();
  });

  it('should return typed data on the first valid reply', async () => {
    const backend = new ScriptedBackend({ 'idea-analysis': sequence({ data: analysis }) });
    const generator = createValidatedGenerator(backend, registry, { sleep: noSleep });

    const result = await generator.generate('idea-analysis', input);

    expect(result.success).toBe(true);
    expect(result.attempts).toBe(1);
    if (result.success) {
      expect(result.data.targetUsers).toEqual(['club members']);
    }
  });

  it('should retry a schema mismatch with the issues as feedback', async () => {
    const { problem: _dropped, ...incomplete } = analysis;
    const backend = new ScriptedBackend({
      'idea-analysis': sequence({ data: incomplete }, { data: analysis }),
    });
    const generator = createValidatedGenerator(backend, registry, { sleep: noSleep });

    const result = await generator.generate('idea-analysis', input);

    expect(result.success).toBe(true);
    expect(result.attempts).toBe(2);
    expect(backend.calls.map((call) => call.feedback)).toEqual([
      [],
      [
        "Previous output was rejected by schema 'idea-analysis':\n- (root): must have required property 'problem'",
      ],
    ]);
  });

  it('should keep caller feedback ahead of retry feedback', async () => {
    const backend = new ScriptedBackend({
      'idea-analysis': sequence({ error: createTransientError('busy') }, { data: analysis }),
    });
    const generator = createValidatedGenerator(backend, registry, { sleep: noSleep });

    await generator.generate('idea-analysis', { ...input, feedback: ['Keep it closed.'] });

    expect(backend.calls[1]?.feedback).toEqual([
      'Keep it closed.',
      'Previous attempt failed: busy',
    ]);
  });

  it('should return the last schema error with its raw output when exhausted', async () => {
    const backend = new ScriptedBackend({ 'idea-analysis': sequence({ raw: 'Sure! {"summary": "x"}' }) });
    const generator = createValidatedGenerator(backend, registry, {
      sleep: noSleep,
      retry: { maxRetries: 1 },
    });

    const result = await generator.generate('idea-analysis', input);

    expect(result.success).toBe(false);
    expect(result.exhausted).toBe(true);
    expect(result.attempts).toBe(2);
    if (!result.success && result.error.kind === 'SchemaError') {
      expect(result.error.raw).toBe('Sure! {"summary": "x"}');
    }
  });

  it('should route stage generation through the stage schema and task', async () => {
    const backend = new ScriptedBackend().on(
      'capabilities',
      sequence({
        data: {
          summary: 'One capability.',
          capabilities: [
            {
              ref: 'invite',
              name: 'Invite members',
              description: 'Members invite people they know.',
              category: 'functional',
              summary: 'Invite-only membership.',
            },
          ],
        },
      })
    );
    const generator = createValidatedGenerator(backend, registry, { sleep: noSleep });

    const result = await generator.generateStage('capability-model', input);

    expect(result.success).toBe(true);
    expect(backend.calls[0]?.task).toBe('capability-model');
    expect(backend.calls[0]?.schema).toBe('capabilities');
  });

  it('should turn a throwing backend into a non-retryable failure', async () => {
    const backend: GenerationBackend = {
      name: 'broken',
      generate: () => Promise.reject(new Error('socket closed')),
    };
    const generator = createValidatedGenerator(backend, registry, { sleep: noSleep });

    const result = await generator.generate('idea-analysis', input);

    expect(result.attempts).toBe(1);
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.kind).toBe('BackendError');
      expect(result.error.message).toBe("Backend 'broken' threw: socket closed");
    }
  });

  it('should time out a stalled backend', async () => {
    const backend: GenerationBackend = {
      name: 'stalled',
      generate: () => new Promise(() => undefined),
    };
    const generator = createValidatedGenerator(backend, registry, {
      sleep: noSleep,
      timeoutMs: 20,
      retry: { maxRetries: 0 },
    });

    const result = await generator.generate('idea-analysis', input);

    expect(result.exhausted).toBe(true);
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.kind).toBe('TimeoutError');
    }
  });

  it('should log schema mismatches', async () => {
    const lines: string[] = [];
    const logger = new Logger({ component: 'test', sink: (line) => lines.push(line) });
    const backend = new ScriptedBackend({
      'idea-analysis': sequence({ data: { summary: 'x' } }, { data: analysis }),
    });
    const generator = createValidatedGenerator(backend, registry, { sleep: noSleep, logger });

    await generator.generate('idea-analysis', input);

    const events = lines.map((line): unknown => JSON.parse(line));
    expect(events).toContainEqual(
      expect.objectContaining({ level: 'warn', event: 'generation_schema_mismatch' })
    );
    expect(events).toContainEqual(
      expect.objectContaining({ level: 'warn', event: 'generation_retry' })
    );
  });
});
