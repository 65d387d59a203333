/**
 * Verification report storage.
 *
 * Reports are written per phase as JSON or YAML. Loading accepts either
 * format regardless of the file extension.
 *
 * @packageDocumentation
 */

import * as path from 'node:path';
import * as yaml from 'js-yaml';
import { isRecord, isStringArray } from '../utils/guards.js';
import { isNotFoundError, safeReadFile, writeFileAtomic } from '../utils/safe-fs.js';
import { isPhaseId, isStageId, type PhaseId } from '../workflow/ids.js';
import type { PhaseVerificationReport } from './types.js';

export type ReportFormat = 'json' | 'yaml';

export type ReportStorageErrorType = 'file_error' | 'parse_error' | 'validation_error' | 'not_found';

export class ReportStorageError extends Error {
  public readonly errorType: ReportStorageErrorType;
  public readonly details: string | undefined;
  public override readonly cause: Error | undefined;

  constructor(
    message: string,
    errorType: ReportStorageErrorType,
    options?: { details?: string; cause?: Error }
  ) {
    super(message);
    this.name = 'ReportStorageError';
    this.errorType = errorType;
    this.details = options?.details;
    this.cause = options?.cause;
  }
}

/**
 * Path of a phase's report inside a reports directory.
 */
export function getReportPath(dir: string, phase: PhaseId, format: ReportFormat = 'json'): string {
  return path.join(dir, `verification-${phase}.${format === 'yaml' ? 'yaml' : 'json'}`);
}

export function serializeReport(report: PhaseVerificationReport, format: ReportFormat): string {
  if (format === 'yaml') {
    return yaml.dump(report, { indent: 2, lineWidth: -1, noRefs: true, sortKeys: false });
  }
  return `${JSON.stringify(report, null, 2)}\n`;
}

const isViolation = (value: unknown): boolean =>
  isRecord(value) &&
  typeof value.invariant === 'string' &&
  typeof value.violation === 'string' &&
  isStageId(value.stage) &&
  (value.severity === 'blocking' || value.severity === 'warning');

const isGenericized = (value: unknown): boolean =>
  isRecord(value) &&
  typeof value.feature === 'string' &&
  typeof value.genericReplacement === 'string' &&
  isStageId(value.stage) &&
  typeof value.evidence === 'string';

const isAck = (value: unknown): boolean =>
  isRecord(value) &&
  typeof value.invariant === 'string' &&
  isStageId(value.stage) &&
  typeof value.reason === 'string' &&
  typeof value.acknowledgedAt === 'string';

/**
 * Structural check of a parsed report.
 */
export function isPhaseVerificationReport(value: unknown): value is PhaseVerificationReport {
  return (
    isRecord(value) &&
    isPhaseId(value.phase) &&
    (value.mode === 'single' || value.mode === 'multi-pass') &&
    typeof value.passed === 'boolean' &&
    isStringArray(value.invariantsHonored) &&
    Array.isArray(value.invariantsViolated) &&
    value.invariantsViolated.every(isViolation) &&
    isStringArray(value.identityPreserved) &&
    Array.isArray(value.identityGenericized) &&
    value.identityGenericized.every(isGenericized) &&
    isStringArray(value.warnings) &&
    typeof value.confidenceScore === 'number' &&
    isStringArray(value.checks) &&
    Array.isArray(value.overrides) &&
    value.overrides.every(isAck) &&
    typeof value.createdAt === 'string'
  );
}

/**
 * Writes a report atomically. Returns the path written.
 *
 * @throws ReportStorageError if the file cannot be written.
 */
export async function saveReport(
  report: PhaseVerificationReport,
  dir: string,
  format: ReportFormat = 'json'
): Promise<string> {
  const filePath = getReportPath(dir, report.phase, format);
  try {
    await writeFileAtomic(filePath, serializeReport(report, format));
  } catch (error) {
    const cause = error instanceof Error ? error : new Error(String(error));
    throw new ReportStorageError(
      `Failed to save verification report to "${filePath}": ${cause.message}`,
      'file_error',
      { cause }
    );
  }
  return filePath;
}

/**
 * Parses report content, trying JSON first and then YAML.
 */
export function parseReport(content: string, filePath: string): PhaseVerificationReport {
  let data: unknown;
  try {
    data = JSON.parse(content);
  } catch (jsonError) {
    try {
      data = yaml.load(content);
    } catch (yamlError) {
      const first = jsonError instanceof Error ? jsonError.message : String(jsonError);
      const second = yamlError instanceof Error ? yamlError.message : String(yamlError);
      throw new ReportStorageError(
        `Failed to parse verification report at "${filePath}": neither JSON nor YAML`,
        'parse_error',
        { cause: new Error(`JSON: ${first}; YAML: ${second}`) }
      );
    }
  }

  if (!isPhaseVerificationReport(data)) {
    throw new ReportStorageError(
      `Invalid verification report at "${filePath}"`,
      'validation_error',
      { details: 'Report does not match the expected structure' }
    );
  }
  return data;
}

/**
 * Loads a report file.
 *
 * @throws ReportStorageError with `not_found`, `file_error`, `parse_error` or `validation_error`.
 */
export async function loadReport(filePath: string): Promise<PhaseVerificationReport> {
  let content: string;
  try {
    content = await safeReadFile(filePath);
  } catch (error) {
    const cause = error instanceof Error ? error : new Error(String(error));
    throw new ReportStorageError(
      isNotFoundError(error)
        ? `Verification report not found: "${filePath}"`
        : `Failed to read verification report "${filePath}": ${cause.message}`,
      isNotFoundError(error) ? 'not_found' : 'file_error',
      { cause }
    );
  }
  return parseReport(content, filePath);
}
