/**
 * Delimited-file parsing
 *
 * Turns uploaded bytes into a {@link RowSet}. Gzip payloads are inflated
 * first; the delimiter is chosen from the file extension.
 *
 * @module tabular/row-set-parser
 */

import { gunzipSync } from 'node:zlib';
import { parse } from 'csv-parse/sync';
import type { CellValue, Row, RowSet } from '../core/types/row-set.js';
import { FileParseError, errorMessage } from '../core/errors.js';

export type Delimiter = ',' | '\t';

const GZIP_MAGIC = [0x1f, 0x8b] as const;

export function isGzip(content: Uint8Array): boolean {
  return content.length >= 2 && content[0] === GZIP_MAGIC[0] && content[1] === GZIP_MAGIC[1];
}

function stripGzipExtension(fileName: string): string {
  return fileName.toLowerCase().endsWith('.gz') ? fileName.slice(0, -3) : fileName;
}

/**
 * `.tsv` and `.txt` are tab-separated; everything else is read as CSV.
 */
export function delimiterForFileName(fileName: string): Delimiter {
  const name = stripGzipExtension(fileName).toLowerCase();
  return name.endsWith('.tsv') || name.endsWith('.txt') ? '\t' : ',';
}

function isStringMatrix(value: unknown): value is string[][] {
  return (
    Array.isArray(value) &&
    value.every((record) => Array.isArray(record) && record.every((cell) => typeof cell === 'string'))
  );
}

function toCell(raw: string | undefined): CellValue {
  if (raw === undefined) {
    return null;
  }
  const text = raw.trim();
  return text === '' ? null : text;
}

/**
 * Parse delimited text into a row set. The first record is the header.
 */
export function parseDelimitedText(text: string, delimiter: Delimiter): RowSet {
  const records: unknown = parse(text, {
    delimiter,
    bom: true,
    trim: true,
    skip_empty_lines: true,
    relax_column_count: true,
    relax_quotes: true,
  });

  if (!isStringMatrix(records)) {
    throw new Error('Unexpected parser output');
  }

  const [header, ...body] = records;
  if (header === undefined) {
    return { columns: [], rows: [] };
  }

  const columns = header.map((name) => name.trim());
  const rows = body.map((record) => {
    const row: Row = {};
    columns.forEach((column, index) => {
      row[column] = toCell(record[index]);
    });
    return row;
  });

  return { columns, rows };
}

/**
 * Decode an uploaded or stored file into a row set.
 *
 * @throws FileParseError when the bytes are not a readable delimited table
 */
export function parseRowSet(content: Uint8Array, fileName: string): RowSet {
  try {
    const raw = isGzip(content) ? gunzipSync(content) : content;
    const text = Buffer.from(raw).toString('utf-8');
    return parseDelimitedText(text, delimiterForFileName(fileName));
  } catch (error) {
    throw new FileParseError(fileName, errorMessage(error), { cause: error });
  }
}
