/**
 * `--mapping` handling shared by file commands.
 */

import { UploadRejectedError } from '../../core/errors.js';
import { parseColumnMapping, type ColumnMapping } from '../../core/types/column-mapping.js';
import type { FileFamily } from '../../core/types/file-types.js';
import { parseJsonOption } from './output.js';

/**
 * Parse a JSON mapping option; canonical headers when the option is absent.
 *
 * @throws UploadRejectedError when the JSON is not a valid mapping
 */
export function mappingFromOption(family: FileFamily, value: string | undefined, option = '--mapping'): ColumnMapping {
  const result = parseColumnMapping(family, parseJsonOption(value, option));
  if (!result.success) {
    throw new UploadRejectedError(result.error);
  }
  return result.data;
}
