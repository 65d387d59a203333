/**
 * Traceability labels linking tracker drafts back to the specification.
 *
 * @packageDocumentation
 */

import type { ResolvedWorkItem } from '../assembly/types.js';

export interface LabelOptions {
  /** Replace `:` with `-` for trackers that reject colons. */
  readonly plain?: boolean;
}

/**
 * Labels for one work item: `work-item:<id>`, one `implements:<CAP>` per
 * capability and one `depends-on:<WI>` per dependency.
 *
 * @example
 * ```typescript
 * buildTraceabilityLabels(item);
 * // ['work-item:WI-002', 'implements:CAP-001', 'depends-on:WI-001']
 * ```
 */
export function buildTraceabilityLabels(item: ResolvedWorkItem, options: LabelOptions = {}): string[] {
  const labels = [
    `work-item:${item.workItem.id}`,
    ...item.implements.map((capability) => `implements:${capability.id}`),
    ...item.dependsOn.map((dependency) => `depends-on:${dependency.id}`),
  ];
  return options.plain === true ? labels.map((label) => label.replaceAll(':', '-')) : labels;
}
