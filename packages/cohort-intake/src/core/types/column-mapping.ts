/**
 * Column mappings: canonical role -> header name in the uploaded file
 *
 * @module core/types/column-mapping
 */

import { z } from 'zod';
import type { FileFamily } from './file-types.js';

export const CASES_CONTROLS_ROLES = ['phenotype', 'cases', 'controls', 'breakdown'] as const;
export const COOCCURRENCE_ROLES = ['phenotype1', 'phenotype2', 'cooccurrence_count'] as const;

export type CasesControlsRole = (typeof CASES_CONTROLS_ROLES)[number];
export type CooccurrenceRole = (typeof COOCCURRENCE_ROLES)[number];

export interface CasesControlsMapping {
  readonly phenotype: string;
  readonly cases: string;
  readonly controls: string;
  /** Optional per-row ancestry/category breakdown */
  readonly breakdown?: string;
}

export interface CooccurrenceMapping {
  readonly phenotype1: string;
  readonly phenotype2: string;
  readonly cooccurrence_count: string;
}

export type ColumnMapping = CasesControlsMapping | CooccurrenceMapping;

export const DEFAULT_CASES_CONTROLS_MAPPING: CasesControlsMapping = {
  phenotype: 'phenotype',
  cases: 'cases',
  controls: 'controls',
  breakdown: 'breakdown',
};

export const DEFAULT_COOCCURRENCE_MAPPING: CooccurrenceMapping = {
  phenotype1: 'phenotype1',
  phenotype2: 'phenotype2',
  cooccurrence_count: 'cooccurrence_count',
};

const headerName = z.string().trim().min(1, 'Column names must be non-empty');

export const CasesControlsMappingSchema = z.object({
  phenotype: headerName,
  cases: headerName,
  controls: headerName,
  breakdown: headerName.optional(),
});

export const CooccurrenceMappingSchema = z.object({
  phenotype1: headerName,
  phenotype2: headerName,
  cooccurrence_count: headerName,
});

export type MappingParseResult<T> =
  | { readonly success: true; readonly data: T }
  | { readonly success: false; readonly error: string };

function parseWith<T>(schema: z.ZodType<T>, input: unknown): MappingParseResult<T> {
  const result = schema.safeParse(input);
  if (!result.success) {
    const issue = result.error.errors[0];
    const path = issue && issue.path.length > 0 ? `${issue.path.join('.')}: ` : '';
    return { success: false, error: `Invalid column mapping: ${path}${issue?.message ?? 'unknown error'}` };
  }
  return { success: true, data: result.data };
}

export function parseCasesControlsMapping(input: unknown): MappingParseResult<CasesControlsMapping> {
  return parseWith(CasesControlsMappingSchema, input);
}

export function parseCooccurrenceMapping(input: unknown): MappingParseResult<CooccurrenceMapping> {
  return parseWith(CooccurrenceMappingSchema, input);
}

/**
 * Parse a mapping for the given family, or fall back to the canonical
 * column names when none was supplied.
 */
export function parseColumnMapping(
  family: FileFamily,
  input: unknown
): MappingParseResult<ColumnMapping> {
  if (input === undefined || input === null) {
    return {
      success: true,
      data: family === 'cases_controls' ? DEFAULT_CASES_CONTROLS_MAPPING : DEFAULT_COOCCURRENCE_MAPPING,
    };
  }
  return family === 'cases_controls'
    ? parseCasesControlsMapping(input)
    : parseCooccurrenceMapping(input);
}

export function isCasesControlsMapping(mapping: ColumnMapping): mapping is CasesControlsMapping {
  return 'phenotype' in mapping;
}

export function isCooccurrenceMapping(mapping: ColumnMapping): mapping is CooccurrenceMapping {
  return 'phenotype1' in mapping;
}
