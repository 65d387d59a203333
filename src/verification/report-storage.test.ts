import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import {
  ReportStorageError,
  getReportPath,
  loadReport,
  saveReport,
} from './report-storage.js';
import type { PhaseVerificationReport } from './types.js';

const report: PhaseVerificationReport = {
  phase: 'architecture',
  mode: 'single',
  passed: true,
  invariantsHonored: ['community_model'],
  invariantsViolated: [
    {
      invariant: 'exchange_model',
      violation: 'Mentions a tip jar: "optional tips"',
      stage: 'architecture-decisions',
      severity: 'warning',
    },
  ],
  identityPreserved: ['Swaps between neighbours who already know each other'],
  identityGenericized: [],
  warnings: [],
  confidenceScore: 0.9,
  checks: ['single'],
  overrides: [],
  createdAt: '2026-03-03T09:00:00.000Z',
};

describe('report storage', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'verification-reports-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('should name files by phase and format', () => {
    expect(getReportPath('/reports', 'work-items', 'yaml')).toBe(
      '/reports/verification-work-items.yaml'
    );
  });

  it('should save and load JSON', async () => {
    const filePath = await saveReport(report, dir);

    expect(filePath).toBe(join(dir, 'verification-architecture.json'));
    expect(await loadReport(filePath)).toEqual(report);
  });

  it('should save and load YAML', async () => {
    const filePath = await saveReport(report, dir, 'yaml');

    const content = await readFile(filePath, 'utf-8');
    expect(content.startsWith('phase: architecture\n')).toBe(true);
    expect(await loadReport(filePath)).toEqual(report);
  });

  it('should report a missing file as not_found', async () => {
    await expect(loadReport(join(dir, 'missing.json'))).rejects.toMatchObject({
      name: 'ReportStorageError',
      errorType: 'not_found',
    });
  });

  it('should reject content that is not a report', async () => {
    const filePath = join(dir, 'verification-scope.json');
    await writeFile(filePath, JSON.stringify({ phase: 'scope', passed: 'yes' }), 'utf-8');

    const error: unknown = await loadReport(filePath).catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(ReportStorageError);
    expect(error).toMatchObject({ errorType: 'validation_error' });
  });
});
