/**
 * Tracker backed by a JSON file.
 *
 * The file holds `{ version, drafts }` and is rewritten atomically on every
 * change. Statuses edited by hand in the file are picked up by the next read.
 *
 * @packageDocumentation
 */

import { isRecord, isStringArray } from '../utils/guards.js';
import { isNotFoundError, safeReadFile, writeFileAtomic } from '../utils/safe-fs.js';
import {
  TRACKER_STATUSES,
  TrackerError,
  type TrackerDraft,
  type TrackerDraftInput,
  type TrackerStatus,
  type WorkItemTracker,
} from './types.js';

export const TRACKER_FILE_VERSION = '1.0.0';

interface TrackerFile {
  readonly version: string;
  readonly drafts: readonly TrackerDraft[];
}

const toError = (error: unknown): Error =>
  error instanceof Error ? error : new Error(String(error));

function isTrackerStatus(value: unknown): value is TrackerStatus {
  return TRACKER_STATUSES.some((status) => status === value);
}

function isTrackerDraft(value: unknown): value is TrackerDraft {
  return (
    isRecord(value) &&
    typeof value.id === 'string' &&
    typeof value.title === 'string' &&
    typeof value.body === 'string' &&
    isStringArray(value.labels) &&
    typeof value.position === 'number' &&
    isStringArray(value.dependsOn) &&
    isTrackerStatus(value.status) &&
    typeof value.createdAt === 'string'
  );
}

/**
 * Parses tracker file contents.
 *
 * @throws TrackerError (parse_error) for invalid JSON and (validation_error)
 * for any other shape.
 */
export function parseTrackerFile(json: string): TrackerFile {
  let data: unknown;
  try {
    data = JSON.parse(json);
  } catch (error) {
    const cause = toError(error);
    throw new TrackerError(`Failed to parse tracker file: ${cause.message}`, 'parse_error', { cause });
  }
  if (!isRecord(data) || typeof data.version !== 'string' || !Array.isArray(data.drafts)) {
    throw new TrackerError('Tracker file must hold a version and a drafts list', 'validation_error');
  }
  const drafts: TrackerDraft[] = [];
  for (const [index, draft] of data.drafts.entries()) {
    if (!isTrackerDraft(draft)) {
      throw new TrackerError(`Tracker draft at index ${String(index)} is malformed`, 'validation_error');
    }
    drafts.push(draft);
  }
  return { version: data.version, drafts };
}

export class FileTracker implements WorkItemTracker {
  private readonly filePath: string;
  private readonly now: () => Date;

  constructor(filePath: string, options: { now?: () => Date } = {}) {
    this.filePath = filePath;
    this.now = options.now ?? ((): Date => new Date());
  }

  async createDraft(input: TrackerDraftInput): Promise<TrackerDraft> {
    const drafts = await this.read();
    if (drafts.some((draft) => draft.id === input.id)) {
      throw new TrackerError(`Work item '${input.id}' is already tracked`, 'duplicate_draft');
    }
    const draft: TrackerDraft = { ...input, status: 'draft', createdAt: this.now().toISOString() };
    await this.write([...drafts, draft]);
    return draft;
  }

  async queryStatus(id: string): Promise<TrackerStatus | null> {
    const drafts = await this.read();
    return drafts.find((draft) => draft.id === id)?.status ?? null;
  }

  /**
   * All drafts in file order. A missing file reads as empty.
   */
  async read(): Promise<readonly TrackerDraft[]> {
    let json: string;
    try {
      json = await safeReadFile(this.filePath);
    } catch (error) {
      if (isNotFoundError(error)) {
        return [];
      }
      const cause = toError(error);
      throw new TrackerError(`Failed to read tracker file: ${cause.message}`, 'file_error', {
        cause,
        details: this.filePath,
      });
    }
    return parseTrackerFile(json).drafts;
  }

  private async write(drafts: readonly TrackerDraft[]): Promise<void> {
    const file: TrackerFile = { version: TRACKER_FILE_VERSION, drafts };
    try {
      await writeFileAtomic(this.filePath, `${JSON.stringify(file, null, 2)}\n`);
    } catch (error) {
      const cause = toError(error);
      throw new TrackerError(`Failed to write tracker file: ${cause.message}`, 'file_error', {
        cause,
        details: this.filePath,
      });
    }
  }
}
