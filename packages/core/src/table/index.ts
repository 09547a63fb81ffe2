/**
 * Table module: validation, merging and comparison of translation tables.
 */

export { validateTranslationTable, validateRuleSet } from './validate.js';
export { deepMerge, isTranslationMap } from './merge.js';
export type { TranslationMap } from './merge.js';
export { compareLocaleTables, valuesEqual, isEmptyDiff } from './compare.js';
export type { TableDiff } from './compare.js';
