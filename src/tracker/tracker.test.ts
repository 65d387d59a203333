import { mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { assembleSpecification } from '../assembly/assembler.js';
import type { ResolvedSpecification } from '../assembly/types.js';
import { ArtifactStore } from '../store/store.js';
import { capabilityInput, workItemInput } from '../store/builders.js';
import { seedlingAnchor } from '../testing/fixtures.js';
import { Logger } from '../utils/logger.js';
import { draftBody, exportToTracker } from './export.js';
import { FileTracker, parseTrackerFile } from './file-tracker.js';
import { buildTraceabilityLabels } from './labels.js';
import { InMemoryTracker } from './memory-tracker.js';
import { TrackerError } from './types.js';

const fixedNow = (): Date => new Date('2026-03-03T10:00:00.000Z');

function seedlingSpecification(): ResolvedSpecification {
  const store = new ArtifactStore({ now: fixedNow });
  store.append(capabilityInput('Invite members'));
  store.append(capabilityInput('Swap seedlings'));
  store.append(workItemInput('Invite flow', ['CAP-001']));
  store.append(workItemInput('Swap board page', ['CAP-002'], { dependsOn: ['WI-001'] }));
  return assembleSpecification(store, seedlingAnchor());
}

function secondItem(spec: ResolvedSpecification) {
  const item = spec.workItems[1];
  if (item === undefined) {
    throw new Error('fixture has two work items');
  }
  return item;
}

async function caught(action: Promise<unknown>): Promise<unknown> {
  return action.then(
    () => undefined,
    (error: unknown) => error
  );
}

describe('buildTraceabilityLabels', () => {
  it('should label the item, its capabilities and its dependencies', () => {
    expect(buildTraceabilityLabels(secondItem(seedlingSpecification()))).toEqual([
      'work-item:WI-002',
      'implements:CAP-002',
      'depends-on:WI-001',
    ]);
  });

  it('should replace colons when asked for plain labels', () => {
    expect(buildTraceabilityLabels(secondItem(seedlingSpecification()), { plain: true })).toEqual([
      'work-item-WI-002',
      'implements-CAP-002',
      'depends-on-WI-001',
    ]);
  });
});

describe('draftBody', () => {
  it('should list acceptance criteria and implemented capabilities', () => {
    expect(draftBody(secondItem(seedlingSpecification()))).toBe(
      [
        'Swap board page work',
        '',
        '## Acceptance criteria',
        '',
        '- [ ] Swap board page is done',
        '',
        '## Implements',
        '',
        '- CAP-002: Swap seedlings',
      ].join('\n')
    );
  });

  it('should leave acceptance criteria out on request', () => {
    expect(draftBody(secondItem(seedlingSpecification()), { omitAcceptanceCriteria: true })).toBe(
      'Swap board page work\n\n## Implements\n\n- CAP-002: Swap seedlings'
    );
  });
});

describe('exportToTracker', () => {
  it('should create drafts in resolved order', async () => {
    const tracker = new InMemoryTracker({ now: fixedNow });

    const result = await exportToTracker(seedlingSpecification(), tracker);

    expect(result).toEqual({ created: ['WI-001', 'WI-002'], skipped: [] });
    expect(tracker.list().map((draft) => [draft.id, draft.position, draft.dependsOn])).toEqual([
      ['WI-001', 1, []],
      ['WI-002', 2, ['WI-001']],
    ]);
    expect(tracker.list()[0]?.createdAt).toBe('2026-03-03T10:00:00.000Z');
  });

  it('should skip items the tracker already knows', async () => {
    const tracker = new InMemoryTracker({ now: fixedNow });
    await exportToTracker(seedlingSpecification(), tracker);
    tracker.setStatus('WI-001', 'in-progress');

    const result = await exportToTracker(seedlingSpecification(), tracker);

    expect(result).toEqual({
      created: [],
      skipped: [
        { id: 'WI-001', status: 'in-progress' },
        { id: 'WI-002', status: 'draft' },
      ],
    });
  });

  it('should log a summary', async () => {
    const lines: string[] = [];
    const logger = new Logger({ component: 'tracker', sink: (line) => lines.push(line), now: fixedNow });

    await exportToTracker(seedlingSpecification(), new InMemoryTracker(), { logger });

    expect(lines).toHaveLength(1);
    expect(JSON.parse(lines[0] ?? '{}')).toMatchObject({
      level: 'info',
      event: 'tracker_export',
      data: { created: 2, skipped: 0 },
    });
  });
});

describe('InMemoryTracker', () => {
  it('should refuse a duplicate draft', async () => {
    const tracker = new InMemoryTracker();
    const draft = { id: 'WI-001', title: 'Invite flow', body: '', labels: [], position: 1, dependsOn: [] };
    await tracker.createDraft(draft);

    const error = await caught(tracker.createDraft(draft));

    expect(error).toBeInstanceOf(TrackerError);
    expect(error instanceof TrackerError ? error.errorType : null).toBe('duplicate_draft');
  });

  it('should report null for an unknown ID', async () => {
    expect(await new InMemoryTracker().queryStatus('WI-404')).toBeNull();
    expect(new InMemoryTracker().setStatus('WI-404', 'done')).toBe(false);
  });
});

describe('FileTracker', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'tracker-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('should persist drafts and read statuses edited in the file', async () => {
    const filePath = join(dir, 'nested', 'tracker.json');
    const tracker = new FileTracker(filePath, { now: fixedNow });

    await exportToTracker(seedlingSpecification(), tracker);
    const file = parseTrackerFile(await readFile(filePath, 'utf8'));
    expect(file.version).toBe('1.0.0');
    expect(file.drafts.map((draft) => draft.id)).toEqual(['WI-001', 'WI-002']);

    const edited = { ...file, drafts: file.drafts.map((draft) => ({ ...draft, status: 'done' })) };
    await writeFile(filePath, JSON.stringify(edited));

    expect(await tracker.queryStatus('WI-002')).toBe('done');
  });

  it('should treat a missing file as empty', async () => {
    const tracker = new FileTracker(join(dir, 'absent.json'));

    expect(await tracker.read()).toEqual([]);
    expect(await tracker.queryStatus('WI-001')).toBeNull();
  });

  it('should reject invalid JSON and malformed drafts', async () => {
    const filePath = join(dir, 'tracker.json');
    const tracker = new FileTracker(filePath);

    await writeFile(filePath, '{ not json');
    const parseError = await caught(tracker.read());
    expect(parseError instanceof TrackerError ? parseError.errorType : null).toBe('parse_error');

    await writeFile(filePath, JSON.stringify({ version: '1.0.0', drafts: [{ id: 'WI-001', status: 'lost' }] }));
    const shapeError = await caught(tracker.read());
    expect(shapeError instanceof TrackerError ? shapeError.message : null).toBe(
      'Tracker draft at index 0 is malformed'
    );
  });
});
