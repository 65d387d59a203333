/**
 * Diff Engine.
 *
 * @packageDocumentation
 */

export {
  DIFF_HEADING,
  computeDiff,
  diffFromStore,
  formatDiffContext,
  isDiffEmpty,
  needsRevision,
  needsWorkItems,
  summarizeDiff,
} from './diff.js';
export type { Diff, DiffInput } from './diff.js';
