/**
 * Output Formatting for CLI Commands
 *
 * @module cli/lib/output
 */

export interface TableColumn {
  readonly key: string;
  readonly header: string;
  readonly align?: 'left' | 'right';
}

/**
 * Format rows as an aligned text table.
 */
export function formatTable(data: ReadonlyArray<Record<string, unknown>>, columns: readonly TableColumn[]): string {
  if (data.length === 0) {
    return 'No entries found.';
  }

  const text = (value: unknown): string =>
    value === null || value === undefined ? '-' : typeof value === 'object' ? JSON.stringify(value) : String(value);

  const widths = columns.map((col) =>
    Math.max(col.header.length, ...data.map((row) => text(row[col.key]).length))
  );

  const pad = (value: string, index: number, align: 'left' | 'right' = 'left'): string => {
    const width = widths[index] ?? value.length;
    return align === 'right' ? value.padStart(width) : value.padEnd(width);
  };

  const headerRow = columns.map((col, i) => pad(col.header, i, col.align)).join(' | ');
  const separator = widths.map((w) => '-'.repeat(w)).join('-+-');
  const dataRows = data.map((row) =>
    columns.map((col, i) => pad(text(row[col.key]), i, col.align)).join(' | ')
  );

  return [headerRow, separator, ...dataRows].join('\n');
}

export function formatJson(data: unknown, pretty = true): string {
  return pretty ? JSON.stringify(data, null, 2) : JSON.stringify(data);
}

/**
 * Parse a JSON command-line argument.
 *
 * @throws Error naming the option when the value is not valid JSON
 */
export function parseJsonOption(value: string | undefined, option: string): unknown {
  if (value === undefined) {
    return undefined;
  }
  try {
    const parsed: unknown = JSON.parse(value);
    return parsed;
  } catch (error) {
    throw new Error(`${option} must be valid JSON: ${error instanceof Error ? error.message : String(error)}`);
  }
}
