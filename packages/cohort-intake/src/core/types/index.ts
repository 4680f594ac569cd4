export * from './file-types.js';
export * from './row-set.js';
export * from './column-mapping.js';
export * from './metadata.js';
export * from './validation.js';
export * from './cohort.js';
