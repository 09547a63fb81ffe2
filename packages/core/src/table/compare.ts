/**
 * Key-level comparison of two locale tables.
 * Used to check that emitted module files reproduce the source table.
 */

import { isTranslationMap } from './merge.js';
import type { LocaleTable, TranslationValue } from '../types/index.js';

export interface TableDiff {
    /** In expected, absent from actual */
    missing: string[];
    /** In actual, absent from expected */
    extra: string[];
    /** In both, with different values */
    changed: string[];
}

/**
 * Structural equality. Mapping key order is ignored, list order is not.
 */
export function valuesEqual(a: TranslationValue, b: TranslationValue): boolean {
    if (Array.isArray(a) || Array.isArray(b)) {
        if (!Array.isArray(a) || !Array.isArray(b) || a.length !== b.length) return false;
        return a.every((item, i) => valuesEqual(item, b[i]));
    }

    if (isTranslationMap(a) || isTranslationMap(b)) {
        if (!isTranslationMap(a) || !isTranslationMap(b)) return false;
        const aKeys = Object.keys(a);
        if (aKeys.length !== Object.keys(b).length) return false;
        return aKeys.every(key => Object.hasOwn(b, key) && valuesEqual(a[key], b[key]));
    }

    return a === b;
}

/**
 * Compare the top-level keys of two locale tables.
 * Lists follow the key order of the table they come from.
 */
export function compareLocaleTables(expected: LocaleTable, actual: LocaleTable): TableDiff {
    const missing: string[] = [];
    const changed: string[] = [];

    for (const [key, value] of Object.entries(expected)) {
        if (!Object.hasOwn(actual, key)) {
            missing.push(key);
        } else if (!valuesEqual(value, actual[key])) {
            changed.push(key);
        }
    }

    const extra = Object.keys(actual).filter(key => !Object.hasOwn(expected, key));

    return { missing, extra, changed };
}

/**
 * True when the diff has no differences.
 */
export function isEmptyDiff(diff: TableDiff): boolean {
    return diff.missing.length === 0 && diff.extra.length === 0 && diff.changed.length === 0;
}
