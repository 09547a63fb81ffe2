/**
 * Translation key categorization.
 *
 * Rule priority is declaration order (first match wins):
 * 1. rules[0], rules[1], ... each checked with all of its patterns
 * 2. fallback_module when no rule matches
 *
 * Overlapping patterns are expected ("email_" vs a generic "_"), so the
 * order of the rule list decides where ambiguous keys go.
 *
 * ARCHITECTURAL NOTE: No console.* calls, no I/O.
 */

import { matchesRule } from './match.js';
import { validateTranslationTable } from '../table/validate.js';
import type { LocaleTable, RuleSet } from '../types/index.js';
import type {
    CategorizationResult,
    CategorizationStats,
    LocaleCategorization,
    ModuleBucket,
} from './types.js';

/**
 * Module a key belongs to under the given rules.
 * Depends only on the key string and the rule list.
 */
export function categorizeKey(key: string, ruleSet: RuleSet): string {
    for (const rule of ruleSet.rules) {
        if (matchesRule(key, rule) !== null) {
            return rule.module;
        }
    }
    return ruleSet.fallback_module;
}

/**
 * Partition one locale's keys into module buckets.
 * Keys keep their source order inside each bucket.
 */
export function categorizeLocale(
    locale: string,
    localeTable: LocaleTable,
    ruleSet: RuleSet
): LocaleCategorization {
    // Seeded in rule order so output order never depends on key order
    const buckets = new Map<string, LocaleTable>();
    for (const rule of ruleSet.rules) {
        buckets.set(rule.module, {});
    }
    buckets.set(ruleSet.fallback_module, {});

    for (const [key, value] of Object.entries(localeTable)) {
        const entries = buckets.get(categorizeKey(key, ruleSet));
        if (entries) {
            entries[key] = value;
        }
    }

    const nonEmpty: ModuleBucket[] = [];
    for (const [module, entries] of buckets) {
        const keyCount = Object.keys(entries).length;
        if (keyCount > 0) {
            nonEmpty.push({ module, entries, keyCount });
        }
    }

    return { locale, buckets: nonEmpty };
}

/**
 * Categorize every locale of a translation table.
 *
 * @param table - locale → key → value; validated before use
 * @param ruleSet - Ordered rules and fallback module name
 * @param excludedLocales - Locales passed through untouched (no output at all)
 * @returns Per-locale buckets, skipped locales and key counts
 * @throws MalformedInputError if table is not locale → key → value
 */
export function categorize(
    table: unknown,
    ruleSet: RuleSet,
    excludedLocales: Iterable<string> = []
): CategorizationResult {
    const validated = validateTranslationTable(table);
    const excluded = new Set(excludedLocales);

    const locales: LocaleCategorization[] = [];
    const skippedLocales: string[] = [];
    const stats: CategorizationStats = {
        totalKeys: 0,
        byLocale: {},
    };

    for (const [locale, localeTable] of Object.entries(validated)) {
        if (excluded.has(locale)) {
            skippedLocales.push(locale);
            continue;
        }

        const categorized = categorizeLocale(locale, localeTable, ruleSet);
        locales.push(categorized);

        const byModule: Record<string, number> = {};
        let total = 0;
        for (const bucket of categorized.buckets) {
            byModule[bucket.module] = bucket.keyCount;
            total += bucket.keyCount;
        }
        stats.byLocale[locale] = { total, byModule };
        stats.totalKeys += total;
    }

    return { locales, skippedLocales, stats };
}
