/**
 * Validator outcomes
 *
 * @module core/types/validation
 */

export interface CasesControlsValidationResult {
  /** `"; "`-joined errors, or null when the file is acceptable */
  readonly error: string | null;
  /** `"; "`-joined non-blocking warnings */
  readonly warning: string | null;
}

/** Co-occurrence files produce no warnings */
export type CooccurrenceValidationResult = string | null;

export interface FileValidationResult {
  readonly error: string | null;
  readonly warning: string | null;
}

export function joinMessages(messages: readonly string[]): string | null {
  return messages.length > 0 ? messages.join('; ') : null;
}
