/**
 * Shape checks for translation tables and rule sets.
 * Failures become MalformedInputError so callers see one error type.
 */

import type { ZodError, ZodIssue } from 'zod';
import {
    MalformedInputError,
    RuleSetSchema,
    TranslationTableSchema,
} from '../types/index.js';
import type { RuleSet, TranslationTable } from '../types/index.js';

/**
 * Dotted location of a zod issue, e.g. "pl.items_count.one" or "rules.2.module".
 */
function formatIssuePath(path: (string | number)[]): string {
    return path.map(String).join('.');
}

/**
 * A refinement failure buried in a union (a translation value tries every
 * branch) says more than the union's generic "Invalid input".
 */
function findRefinementIssue(issues: ZodIssue[]): ZodIssue | undefined {
    for (const issue of issues) {
        if (issue.code === 'custom') {
            return issue;
        }
        if (issue.code === 'invalid_union') {
            for (const unionError of issue.unionErrors) {
                const found = findRefinementIssue(unionError.issues);
                if (found) return found;
            }
        }
    }
    return undefined;
}

function toMalformed(kind: string, error: ZodError, source?: string): MalformedInputError {
    const issue = findRefinementIssue(error.issues) ?? error.issues[0];
    const path = formatIssuePath(issue.path);
    const where = source ? ` in ${source}` : '';
    const at = path ? ` at "${path}"` : '';
    return new MalformedInputError(`Malformed ${kind}${where}${at}: ${issue.message}`, path, { cause: error });
}

function isPlainMapping(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * First key present in the parsed document but missing after validation.
 * zod records skip `__proto__`, so such a key would otherwise vanish.
 */
function findDroppedKey(raw: unknown, validated: unknown, path: string[] = []): string[] | null {
    if (Array.isArray(raw) && Array.isArray(validated)) {
        for (let i = 0; i < raw.length; i++) {
            const dropped = findDroppedKey(raw[i], validated[i], [...path, String(i)]);
            if (dropped) return dropped;
        }
        return null;
    }

    if (isPlainMapping(raw) && isPlainMapping(validated)) {
        for (const key of Object.keys(raw)) {
            if (!Object.hasOwn(validated, key)) {
                return [...path, key];
            }
            const dropped = findDroppedKey(raw[key], validated[key], [...path, key]);
            if (dropped) return dropped;
        }
    }

    return null;
}

/**
 * Check that data is a two-level mapping: locale → key → value.
 *
 * @param data - Parsed document, typically straight from a YAML parser
 * @param source - File name for error messages
 * @returns the validated table, keys in source order
 * @throws MalformedInputError when data is absent or mis-shaped
 */
export function validateTranslationTable(data: unknown, source?: string): TranslationTable {
    if (data === undefined || data === null) {
        const where = source ? ` in ${source}` : '';
        throw new MalformedInputError(`Translation table${where} is empty`);
    }

    const result = TranslationTableSchema.safeParse(data);
    if (!result.success) {
        throw toMalformed('translation table', result.error, source);
    }

    const dropped = findDroppedKey(data, result.data);
    if (dropped) {
        const path = formatIssuePath(dropped);
        const where = source ? ` in ${source}` : '';
        throw new MalformedInputError(
            `Malformed translation table${where} at "${path}": Key "${dropped[dropped.length - 1]}" is not supported`,
            path
        );
    }

    return result.data;
}

/**
 * Validate a rule set. Accepts either `{ fallback_module?, rules }` or a bare
 * list of rules.
 *
 * @throws MalformedInputError when the rules are mis-shaped
 */
export function validateRuleSet(data: unknown, source?: string): RuleSet {
    const input = Array.isArray(data) ? { rules: data } : data;
    const result = RuleSetSchema.safeParse(input);
    if (!result.success) {
        throw toMalformed('rule set', result.error, source);
    }
    return result.data;
}
