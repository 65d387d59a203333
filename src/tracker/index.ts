/**
 * Work-item tracker export.
 *
 * @packageDocumentation
 */

export { draftBody, exportToTracker, toTrackerDraft } from './export.js';
export type { ExportOptions, ExportResult } from './export.js';
export { FileTracker, TRACKER_FILE_VERSION, parseTrackerFile } from './file-tracker.js';
export { buildTraceabilityLabels } from './labels.js';
export type { LabelOptions } from './labels.js';
export { InMemoryTracker } from './memory-tracker.js';
export { TRACKER_STATUSES, TrackerError } from './types.js';
export type {
  TrackerDraft,
  TrackerDraftInput,
  TrackerErrorType,
  TrackerStatus,
  WorkItemTracker,
} from './types.js';
