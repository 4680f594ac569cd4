/**
 * File families and sex-stratified file types
 *
 * Every uploaded table belongs to a family (`cases_controls` or
 * `cooccurrence`) and a sex stratum. The `both` stratum is never uploaded;
 * it is produced by merging the male and female tables of the same family.
 *
 * @module core/types/file-types
 */

export const FILE_FAMILIES = ['cases_controls', 'cooccurrence'] as const;
export const SEXES = ['male', 'female', 'both'] as const;

export type FileFamily = (typeof FILE_FAMILIES)[number];
export type Sex = (typeof SEXES)[number];
export type UploadableSex = Exclude<Sex, 'both'>;

export type FileType = `${FileFamily}_${Sex}`;

export const FILE_TYPES: readonly FileType[] = FILE_FAMILIES.flatMap((family) =>
  SEXES.map((sex): FileType => `${family}_${sex}`)
);

export function isFileFamily(value: string): value is FileFamily {
  return FILE_FAMILIES.some((family) => family === value);
}

export function isFileType(value: string): value is FileType {
  return FILE_TYPES.some((fileType) => fileType === value);
}

export function fileTypeOf(family: FileFamily, sex: Sex): FileType {
  return `${family}_${sex}`;
}

/**
 * Split a file type into its family and sex.
 */
export function parseFileType(fileType: FileType): { family: FileFamily; sex: Sex } {
  for (const family of FILE_FAMILIES) {
    for (const sex of SEXES) {
      if (fileTypeOf(family, sex) === fileType) {
        return { family, sex };
      }
    }
  }
  // Unreachable for a FileType value
  throw new Error(`Unknown file type: ${fileType}`);
}

/**
 * The three file types a family needs before a cohort can be validated.
 */
export function requiredFileTypes(family: FileFamily): readonly FileType[] {
  return SEXES.map((sex) => fileTypeOf(family, sex));
}
