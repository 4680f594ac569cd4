/**
 * Breakdown column rules
 *
 * A breakdown cell splits a phenotype's cases into categories:
 * `CODE:COUNT;CODE:COUNT`. Counts may be suppressed (`<5`, read as 0).
 *
 * @module validators/breakdown
 */

import { isDecimalLiteral } from '../tabular/numeric-column.js';

export interface BreakdownEntry {
  readonly code: string;
  readonly count: number;
}

export interface BreakdownCheck {
  readonly entries: readonly BreakdownEntry[];
  readonly errors: readonly string[];
  readonly warnings: readonly string[];
}

/**
 * Check one breakdown cell against the row's case count.
 *
 * @param label - How the row is named in messages, e.g. `Phenotype 'L40'`
 * @param cases - The row's case count, or null when it is not a number
 */
export function checkBreakdown(label: string, text: string, cases: number | null): BreakdownCheck {
  const entries: BreakdownEntry[] = [];
  const errors: string[] = [];
  const warnings: string[] = [];

  const segments = text
    .split(';')
    .map((segment) => segment.trim())
    .filter((segment) => segment !== '');

  for (const segment of segments) {
    const parts = segment.split(':');
    const code = parts[0]?.trim() ?? '';
    const raw = parts[1]?.trim() ?? '';

    if (parts.length !== 2 || code === '') {
      errors.push(`${label}: malformed breakdown entry '${segment}' (expected CODE:COUNT)`);
      continue;
    }

    let count: number;
    if (raw.startsWith('<')) {
      count = 0;
    } else if (isDecimalLiteral(raw) && Number.isInteger(Number(raw))) {
      count = Number(raw);
    } else {
      errors.push(`${label}: breakdown count for '${code}' is not an integer ('${raw}')`);
      continue;
    }

    if (count < 0) {
      errors.push(`${label}: breakdown count for '${code}' must be non-negative (${count})`);
      continue;
    }

    if (cases !== null && count > cases) {
      errors.push(`${label}: breakdown count for '${code}' (${count}) exceeds total cases (${cases})`);
    }
    entries.push({ code, count });
  }

  const total = entries.reduce((sum, entry) => sum + entry.count, 0);
  if (cases !== null && total > 0 && total < cases) {
    warnings.push(`${label}: breakdown total (${total}) is less than cases (${cases})`);
  }

  return { entries, errors, warnings };
}
