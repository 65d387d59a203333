/**
 * In-process tracker.
 *
 * @packageDocumentation
 */

import { TrackerError, type TrackerDraft, type TrackerDraftInput, type TrackerStatus, type WorkItemTracker } from './types.js';

export class InMemoryTracker implements WorkItemTracker {
  private readonly drafts = new Map<string, TrackerDraft>();
  private readonly now: () => Date;

  constructor(options: { now?: () => Date } = {}) {
    this.now = options.now ?? ((): Date => new Date());
  }

  createDraft(input: TrackerDraftInput): Promise<TrackerDraft> {
    if (this.drafts.has(input.id)) {
      return Promise.reject(new TrackerError(`Work item '${input.id}' is already tracked`, 'duplicate_draft'));
    }
    const draft: TrackerDraft = { ...input, status: 'draft', createdAt: this.now().toISOString() };
    this.drafts.set(draft.id, draft);
    return Promise.resolve(draft);
  }

  queryStatus(id: string): Promise<TrackerStatus | null> {
    return Promise.resolve(this.drafts.get(id)?.status ?? null);
  }

  /**
   * Moves a tracked item to a new status, the way a person would on the
   * tracker side. Returns false for an unknown ID.
   */
  setStatus(id: string, status: TrackerStatus): boolean {
    const draft = this.drafts.get(id);
    if (draft === undefined) {
      return false;
    }
    this.drafts.set(id, { ...draft, status });
    return true;
  }

  list(): TrackerDraft[] {
    return [...this.drafts.values()].sort((a, b) => a.position - b.position);
  }
}
