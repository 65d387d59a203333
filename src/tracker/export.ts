/**
 * Pushes the work items of a Resolved Specification to a tracker.
 *
 * Items go out in resolved order. Items the tracker already knows are
 * skipped, so a repeated export only adds what is new.
 *
 * @packageDocumentation
 */

import type { ResolvedSpecification, ResolvedWorkItem } from '../assembly/types.js';
import type { Logger } from '../utils/logger.js';
import { buildTraceabilityLabels, type LabelOptions } from './labels.js';
import type { TrackerDraftInput, TrackerStatus, WorkItemTracker } from './types.js';

export interface ExportOptions extends LabelOptions {
  /** Leave acceptance criteria out of the draft body. */
  readonly omitAcceptanceCriteria?: boolean;
  readonly logger?: Logger;
}

export interface ExportResult {
  /** IDs of drafts created by this export. */
  readonly created: readonly string[];
  /** IDs already tracked, with their current status. */
  readonly skipped: readonly { readonly id: string; readonly status: TrackerStatus }[];
}

/**
 * Markdown body of a draft.
 */
export function draftBody(item: ResolvedWorkItem, options: ExportOptions = {}): string {
  const lines = [item.workItem.fields.description];
  if (options.omitAcceptanceCriteria !== true && item.workItem.fields.acceptanceCriteria.length > 0) {
    lines.push('', '## Acceptance criteria', '');
    lines.push(...item.workItem.fields.acceptanceCriteria.map((criterion) => `- [ ] ${criterion}`));
  }
  if (item.implements.length > 0) {
    lines.push('', '## Implements', '');
    lines.push(...item.implements.map((capability) => `- ${capability.id}: ${capability.fields.name}`));
  }
  return lines.join('\n');
}

export function toTrackerDraft(item: ResolvedWorkItem, options: ExportOptions = {}): TrackerDraftInput {
  return {
    id: item.workItem.id,
    title: item.workItem.fields.title,
    body: draftBody(item, options),
    labels: buildTraceabilityLabels(item, options),
    position: item.position,
    dependsOn: item.dependsOn.map((dependency) => dependency.id),
  };
}

/**
 * Exports every work item of the specification.
 */
export async function exportToTracker(
  spec: ResolvedSpecification,
  tracker: WorkItemTracker,
  options: ExportOptions = {}
): Promise<ExportResult> {
  const created: string[] = [];
  const skipped: { id: string; status: TrackerStatus }[] = [];

  for (const item of spec.workItems) {
    const id = item.workItem.id;
    const status = await tracker.queryStatus(id);
    if (status !== null) {
      skipped.push({ id, status });
      continue;
    }
    await tracker.createDraft(toTrackerDraft(item, options));
    created.push(id);
  }

  options.logger?.info('tracker_export', { created: created.length, skipped: skipped.length });
  return { created, skipped };
}
