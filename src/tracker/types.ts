/**
 * External work-item tracker contract.
 *
 * A tracker receives drafts only: status changes happen on the tracker side
 * and are read back with `queryStatus`.
 *
 * @packageDocumentation
 */

/**
 * Status reported by a tracker.
 */
export type TrackerStatus = 'draft' | 'todo' | 'in-progress' | 'done' | 'cancelled';

export const TRACKER_STATUSES: readonly TrackerStatus[] = [
  'draft',
  'todo',
  'in-progress',
  'done',
  'cancelled',
] as const;

/**
 * A work item as handed to a tracker.
 */
export interface TrackerDraft {
  /** Work item ID; the tracker key. */
  readonly id: string;
  readonly title: string;
  /** Description with acceptance criteria and implemented capabilities. */
  readonly body: string;
  readonly labels: readonly string[];
  /** 1-based position in the resolved order. */
  readonly position: number;
  readonly dependsOn: readonly string[];
  readonly status: TrackerStatus;
  readonly createdAt: string;
}

/**
 * Input for creating a draft. The tracker assigns status and timestamp.
 */
export type TrackerDraftInput = Omit<TrackerDraft, 'status' | 'createdAt'>;

/**
 * Anything that can hold work-item drafts.
 */
export interface WorkItemTracker {
  /**
   * Creates a draft. Fails with TrackerError (duplicate_draft) when the ID
   * is already tracked.
   */
  createDraft(draft: TrackerDraftInput): Promise<TrackerDraft>;
  /** Status of a tracked item, or null when the ID is unknown. */
  queryStatus(id: string): Promise<TrackerStatus | null>;
}

export type TrackerErrorType = 'duplicate_draft' | 'file_error' | 'parse_error' | 'validation_error';

export class TrackerError extends Error {
  public readonly errorType: TrackerErrorType;
  public readonly details: string | undefined;
  public override readonly cause: Error | undefined;

  constructor(
    message: string,
    errorType: TrackerErrorType,
    options?: { details?: string | undefined; cause?: Error | undefined }
  ) {
    super(message);
    this.name = 'TrackerError';
    this.errorType = errorType;
    this.details = options?.details;
    this.cause = options?.cause;
  }
}
