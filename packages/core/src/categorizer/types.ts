/**
 * Internal types for categorizer module.
 */

import type { LocaleTable } from '../types/index.js';

/**
 * Keys of one locale that landed in one module.
 */
export interface ModuleBucket {
    module: string;
    entries: LocaleTable;
    keyCount: number;
}

/**
 * One locale's partition. Buckets follow rule order, fallback last,
 * and empty buckets are left out.
 */
export interface LocaleCategorization {
    locale: string;
    buckets: ModuleBucket[];
}

/**
 * Per-locale key counts.
 */
export interface LocaleStats {
    total: number;
    byModule: Record<string, number>;
}

/**
 * Statistics from categorizing a whole table.
 */
export interface CategorizationStats {
    totalKeys: number;
    byLocale: Record<string, LocaleStats>;
}

/**
 * Result of categorize().
 */
export interface CategorizationResult {
    locales: LocaleCategorization[];
    skippedLocales: string[];
    stats: CategorizationStats;
}

/**
 * A pattern together with the module that declares it.
 */
export interface PatternRef {
    module: string;
    pattern: string;
}

/**
 * Pattern validation result.
 */
export interface PatternValidationResult {
    valid: boolean;
    errors: string[];
    warnings: string[];
    matchCount?: number;
    matchPercent?: number;
}

/**
 * Ordering conflicts of one pattern against a rule list.
 * `shadowedBy`: earlier patterns that claim every key this pattern matches.
 * `shadows`: later patterns whose keys this pattern now claims.
 */
export interface ShadowingResult {
    hasConflict: boolean;
    shadowedBy: PatternRef[];
    shadows: PatternRef[];
}

/**
 * A declared pattern that can never win.
 */
export interface ShadowedPattern extends PatternRef {
    shadowedBy: PatternRef;
}
