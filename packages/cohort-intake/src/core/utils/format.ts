/**
 * Message formatting shared by validators and consistency checks
 *
 * @module core/utils/format
 */

/** Number of offending items quoted in a single message */
export const SAMPLE_SIZE = 5;

/**
 * Render strings the way messages quote them: `['a', 'b']`.
 */
export function formatList(items: readonly string[]): string {
  return `[${items.map((item) => `'${item}'`).join(', ')}]`;
}

/**
 * Render at most `limit` items and an overflow note for the rest.
 */
export function formatSample(items: readonly string[], limit: number = SAMPLE_SIZE): string {
  const shown = formatList(items.slice(0, limit));
  const remaining = items.length - limit;
  return remaining > 0 ? `${shown} (and ${remaining} more)` : shown;
}

/**
 * Distinct values in order of first appearance.
 */
export function unique(values: Iterable<string>): string[] {
  return [...new Set(values)];
}

/**
 * Values that appear more than once, in the order they first repeat.
 */
export function duplicates(values: Iterable<string>): string[] {
  const seen = new Set<string>();
  const repeated = new Set<string>();
  for (const value of values) {
    if (seen.has(value)) {
      repeated.add(value);
    } else {
      seen.add(value);
    }
  }
  return [...repeated];
}
