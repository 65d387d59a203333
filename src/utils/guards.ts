/**
 * Narrowing helpers for data read from files, environment and generation output.
 *
 * @packageDocumentation
 */

/**
 * True for plain objects (not arrays, not null).
 */
export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * True for arrays whose every element is a string.
 */
export function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((item) => typeof item === 'string');
}

/**
 * True for non-empty strings after trimming.
 */
export function isNonEmptyString(value: unknown): value is string {
  return typeof value === 'string' && value.trim().length > 0;
}

/**
 * Returns a sorted copy of unique strings.
 */
export function sortedUnique(values: Iterable<string>): string[] {
  return [...new Set(values)].sort();
}
