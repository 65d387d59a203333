import { mkdtemp, readFile, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { Logger } from '../utils/logger.js';
import {
  NotificationHooksExecutor,
  hookEnvironment,
  substituteVariables,
  type HookVariables,
} from './hooks.js';

const variables: HookVariables = {
  runId: 'run-1',
  phase: 'scope',
  stage: 'capability-model',
  reason: "1 blocking violation(s) remain; it's `urgent`",
  timestamp: '2026-03-02T09:00:00.000Z',
};

describe('substituteVariables', () => {
  it('should replace identifiers and leave the reason out of the command line', () => {
    expect(substituteVariables('notify {runId} {phase}/{stage} at {timestamp} {reason}', variables)).toBe(
      'notify run-1 scope/capability-model at 2026-03-02T09:00:00.000Z {reason}'
    );
    expect(substituteVariables('notify {stage}', { runId: 'run-1', timestamp: 't' })).toBe('notify ');
  });
});

describe('hookEnvironment', () => {
  it('should expose every variable, the reason included', () => {
    expect(hookEnvironment('gate', variables)).toEqual({
      THROUGHLINE_EVENT: 'gate',
      THROUGHLINE_RUN_ID: 'run-1',
      THROUGHLINE_PHASE: 'scope',
      THROUGHLINE_STAGE: 'capability-model',
      THROUGHLINE_REASON: "1 blocking violation(s) remain; it's `urgent`",
      THROUGHLINE_TIMESTAMP: '2026-03-02T09:00:00.000Z',
    });
  });
});

describe('NotificationHooksExecutor', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'hooks-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('should run the gate hook with the reason in its environment', async () => {
    const hooks = new NotificationHooksExecutor(
      {
        on_gate: {
          command: 'printf "%s|%s|%s" {runId} "$THROUGHLINE_EVENT" "$THROUGHLINE_REASON" > gate.txt',
          enabled: true,
        },
      },
      { cwd: dir }
    );

    expect(await hooks.onGate(variables)).toBe(true);
    expect(await readFile(join(dir, 'gate.txt'), 'utf8')).toBe(
      "run-1|gate|1 blocking violation(s) remain; it's `urgent`"
    );
  });

  it('should skip disabled or missing hooks', async () => {
    const hooks = new NotificationHooksExecutor(
      { on_complete: { command: 'touch complete.txt', enabled: false } },
      { cwd: dir }
    );

    expect(await hooks.onComplete(variables)).toBe(false);
    expect(await hooks.onEscalation(variables)).toBe(false);
  });

  it('should log a failing hook without throwing', async () => {
    const lines: string[] = [];
    const logger = new Logger({ component: 'hooks', sink: (line) => lines.push(line) });
    const hooks = new NotificationHooksExecutor(
      { on_escalation: { command: 'echo broken >&2; exit 3', enabled: true } },
      { cwd: dir, logger }
    );

    expect(await hooks.onEscalation(variables)).toBe(false);
    expect(lines).toHaveLength(1);
    expect(JSON.parse(lines[0] ?? '{}')).toMatchObject({
      level: 'warn',
      event: 'hook_failed',
      data: { event: 'escalation', exitCode: 3, stderr: 'broken' },
    });
  });
});
