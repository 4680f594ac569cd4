/**
 * Process exit codes shared by every command.
 */
export const EXIT_CODES = {
  SUCCESS: 0,
  WARNINGS: 1,
  ERRORS: 2,
  CONFIG_ERROR: 3,
} as const;

export type ExitCode = (typeof EXIT_CODES)[keyof typeof EXIT_CODES];

/**
 * Exit code for a result that may carry an error and a warning.
 */
export function exitCodeFor(result: { readonly error: string | null; readonly warning?: string | null }): ExitCode {
  if (result.error !== null) return EXIT_CODES.ERRORS;
  if (result.warning !== undefined && result.warning !== null) return EXIT_CODES.WARNINGS;
  return EXIT_CODES.SUCCESS;
}
