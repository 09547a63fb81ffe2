import { basename, dirname } from 'node:path';
import { compareLocaleTables, isEmptyDiff, type TableDiff } from '@locale-modules/core';
import type { TranslationTable } from '@locale-modules/shared';
import type { LoadedSource } from './registry.js';

export interface LocaleVerification {
    locale: string;
    diff: TableDiff;
}

/**
 * A module file whose top-level key does not match its directory.
 */
export interface ContractViolation {
    path: string;
    message: string;
}

export interface VerifyReport {
    ok: boolean;
    locales: LocaleVerification[];
    /** Locales that only exist in module files */
    unexpectedLocales: string[];
    violations: ContractViolation[];
}

/**
 * Checks loaded module files against the source table.
 *
 * - each file defines exactly one locale, named like its directory
 * - each non-excluded source locale is reproduced key for key
 * - no non-excluded locale appears only in module files
 */
export function verifyModules(
    source: TranslationTable,
    loaded: TranslationTable,
    sources: readonly LoadedSource[],
    excludedLocales: Iterable<string> = []
): VerifyReport {
    const excluded = new Set(excludedLocales);

    const violations: ContractViolation[] = [];
    for (const file of sources) {
        const expected = basename(dirname(file.path));
        if (file.locales.length !== 1 || file.locales[0] !== expected) {
            const found = file.locales.length > 0 ? file.locales.map(l => `"${l}"`).join(', ') : 'none';
            violations.push({
                path: file.path,
                message: `Expected a single top-level key "${expected}", found ${found}`,
            });
        }
    }

    const locales: LocaleVerification[] = [];
    for (const [locale, table] of Object.entries(source)) {
        if (excluded.has(locale)) continue;
        locales.push({ locale, diff: compareLocaleTables(table, loaded[locale] ?? {}) });
    }

    const unexpectedLocales = Object.keys(loaded).filter(
        locale => !excluded.has(locale) && !Object.hasOwn(source, locale)
    );

    const ok =
        violations.length === 0 &&
        unexpectedLocales.length === 0 &&
        locales.every(l => isEmptyDiff(l.diff));

    return { ok, locales, unexpectedLocales, violations };
}
