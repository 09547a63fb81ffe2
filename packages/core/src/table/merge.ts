/**
 * Deep merge of translation mappings, the way a translation backend combines
 * files on its load path: later files win, nested groups merge key by key.
 */

import type { TranslationValue } from '../types/index.js';

export type TranslationMap = { [key: string]: TranslationValue };

/**
 * True for nested mappings (not lists, not scalars).
 */
export function isTranslationMap(value: TranslationValue | undefined): value is TranslationMap {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Merge `override` into `base` without mutating either.
 *
 * - Both sides mappings: merged recursively
 * - Anything else: override replaces base (lists are not concatenated)
 *
 * Keys already in `base` keep their position; new keys are appended.
 */
export function deepMerge(base: TranslationMap, override: TranslationMap): TranslationMap {
    const result: TranslationMap = { ...base };

    for (const [key, value] of Object.entries(override)) {
        const existing = result[key];
        if (isTranslationMap(existing) && isTranslationMap(value)) {
            result[key] = deepMerge(existing, value);
        } else {
            result[key] = value;
        }
    }

    return result;
}
