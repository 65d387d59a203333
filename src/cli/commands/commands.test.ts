import { mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeAll, beforeEach, describe, expect, it, vi, type MockInstance } from 'vitest';
import { SchemaRegistry } from '../../generation/schema-registry.js';
import { ScriptedBackend } from '../../generation/scripted-backend.js';
import { SEEDLING_IDEA } from '../../testing/fixtures.js';
import { seedlingHandlers } from '../../testing/stage-replies.js';
import { parseTrackerFile } from '../../tracker/file-tracker.js';
import { createCliApp } from '../app.js';
import { CliUsageError } from '../errors.js';
import { createEngine, loadRunState } from '../operations.js';
import type { CliContext } from '../types.js';
import { handleAssembleCommand } from './assemble.js';
import { handleDiffCommand } from './diff.js';
import { handleExportCommand } from './export.js';
import { handleRerunCommand } from './rerun.js';
import { handleResumeCommand } from './resume.js';
import { handleStartCommand } from './start.js';
import { handleStatusCommand } from './status.js';

const fixedNow = (): Date => new Date('2026-03-05T07:00:00.000Z');

describe('CLI commands', () => {
  let registry: SchemaRegistry;
  let root: string;
  let log: MockInstance<typeof console.log>;

  beforeAll(async () => {
    registry = await SchemaRegistry.load();
  });

  beforeEach(async () => {
    root = await mkdtemp(join(tmpdir(), 'cli-'));
    await writeFile(join(root, 'throughline.toml'), '[verification]\nmulti_pass_phases = []\n');
    await writeFile(join(root, 'idea.txt'), SEEDLING_IDEA);
    log = vi.spyOn(console, 'log').mockImplementation(() => {});
  });

  afterEach(async () => {
    log.mockRestore();
    await rm(root, { recursive: true, force: true });
  });

  async function contextFor(args: string[], backend = new ScriptedBackend(seedlingHandlers())): Promise<CliContext> {
    const context = await createCliApp({ projectRoot: root, args, env: {} });
    context.backend = backend;
    context.registry = registry;
    context.now = fixedNow;
    return context;
  }

  function lastOutput(): string {
    const call = log.mock.calls.at(-1);
    return typeof call?.[0] === 'string' ? call[0] : '';
  }

  async function runToCompletion(): Promise<void> {
    await handleStartCommand(await contextFor(['idea.txt']));
    for (let step = 0; step < 5; step++) {
      await handleResumeCommand(await contextFor(['approve']));
    }
  }

  it('should resolve configured paths against the project root', async () => {
    const context = await contextFor([]);

    expect(context.config.paths.state).toBe(join(root, '.throughline', 'state.json'));
    expect(context.config.verification.multi_pass_phases).toEqual([]);
  });

  it('should start a run and stop at the anchor review', async () => {
    const result = await handleStartCommand(await contextFor(['idea.txt']));

    expect(result).toEqual({ exitCode: 0 });
    expect(lastOutput().split('\n')[0]).toBe(
      'Waiting at anchor-review gate (Validation (WHY)): Review and confirm the concept anchor'
    );
    expect((await loadRunState(await contextFor([]))).idea).toBe(SEEDLING_IDEA);
  });

  it('should refuse to replace a run without --force', async () => {
    await handleStartCommand(await contextFor(['idea.txt']));

    await expect(handleStartCommand(await contextFor(['idea.txt']))).rejects.toThrow(
      `A run already exists at ${join(root, '.throughline', 'state.json')}; pass --force to start over`
    );
    await expect(handleStartCommand(await contextFor(['idea.txt', '--force']))).resolves.toEqual({ exitCode: 0 });
  });

  it('should require an idea file', async () => {
    await expect(handleStartCommand(await contextFor([]))).rejects.toThrow(CliUsageError);
  });

  it('should run through every gate to a resolved specification', async () => {
    await runToCompletion();

    expect(lastOutput()).toBe(
      `Run complete: 2 work item(s) in the resolved specification\nWritten to ${join(root, '.throughline', 'specification.json')}`
    );
    const state = await loadRunState(await contextFor([]));
    expect(state.status).toBe('complete');
  });

  it('should report status with the open gate', async () => {
    await handleStartCommand(await contextFor(['idea.txt']));

    await handleStatusCommand(await contextFor([]));

    const lines = lastOutput().split('\n');
    expect(lines[0]).toMatch(/^Run [0-9a-f-]+: suspended$/);
    expect(lines).toContain('  Validation (WHY): in-progress');
    expect(lines).toContain('Artifacts: 0 capabilities, 0 decisions, 0 entities, 0 work items');
    expect(lines).toContain('  throughline resume approve');
  });

  it('should report a missing run', async () => {
    await expect(handleStatusCommand(await contextFor([]))).rejects.toThrow(
      `No run found at ${join(root, '.throughline', 'state.json')}; start one with "throughline start <idea-file>"`
    );
  });

  it('should export work items of a completed run once', async () => {
    await runToCompletion();

    const first = await handleExportCommand(await contextFor([]));
    const trackerPath = join(root, '.throughline', 'tracker.json');
    expect(first).toEqual({ exitCode: 0, message: `Exported to ${trackerPath}: 2 created, 0 already tracked` });

    const tracker = parseTrackerFile(await readFile(trackerPath, 'utf8'));
    expect(tracker.drafts.map((draft) => [draft.id, draft.labels])).toEqual([
      ['WI-001', ['work-item:WI-001', 'implements:CAP-001']],
      ['WI-002', ['work-item:WI-002', 'implements:CAP-002', 'depends-on:WI-001']],
    ]);
    expect(tracker.drafts[0]?.createdAt).toBe('2026-03-05T07:00:00.000Z');

    const second = await handleExportCommand(await contextFor([]));
    expect(second.message).toBe(
      `Exported to ${trackerPath}: 0 created, 2 already tracked\n  WI-001: draft\n  WI-002: draft`
    );
  });

  it('should refuse to export an unfinished run', async () => {
    await handleStartCommand(await contextFor(['idea.txt']));

    await expect(handleExportCommand(await contextFor([]))).rejects.toThrow(
      'Only a completed run can be exported; the run is suspended'
    );
  });

  it('should assemble markdown to a file', async () => {
    await runToCompletion();

    const result = await handleAssembleCommand(await contextFor(['--format', 'markdown', '--output', 'plan.md']));

    expect(result).toEqual({ exitCode: 0, message: `Specification written to ${join(root, 'plan.md')}` });
    const markdown = await readFile(join(root, 'plan.md'), 'utf8');
    expect(markdown.startsWith('# Resolved Specification\n')).toBe(true);
  });

  it('should reject an unknown assemble format', async () => {
    await expect(handleAssembleCommand(await contextFor(['--format', 'csv']))).rejects.toThrow(
      'Unknown format "csv"; use json or markdown'
    );
  });

  it('should print an empty diff for a finished run', async () => {
    await runToCompletion();

    await handleDiffCommand(await contextFor(['--json']));

    expect(JSON.parse(lastOutput())).toEqual({
      uncovered: [],
      supersededCapabilities: [],
      affectedDecisions: [],
      affectedEntities: [],
      affectedWorkItems: [],
      unimplemented: [],
    });
  });

  it('should re-run a phase without new generation when nothing changed', async () => {
    await runToCompletion();
    const backend = new ScriptedBackend(seedlingHandlers());

    const result = await handleRerunCommand(await contextFor(['architecture'], backend));

    expect(result.exitCode).toBe(0);
    expect(backend.calls).toHaveLength(0);
    expect(lastOutput().split('\n')[0]).toBe('Run complete: 2 work item(s) in the resolved specification');
  });

  it('should reject an unknown phase for rerun', async () => {
    await expect(handleRerunCommand(await contextFor(['launch']))).rejects.toThrow(
      'Name the phase to re-run: one of validation, scope, architecture, work-items'
    );
  });

  it('should need a generation command when no backend is given', async () => {
    const context = await createCliApp({ projectRoot: root, env: {} });
    context.registry = registry;

    await expect(createEngine(context)).rejects.toThrow(
      'No generation command configured; set generation.command in throughline.toml or THROUGHLINE_GENERATION_COMMAND'
    );
  });
});
