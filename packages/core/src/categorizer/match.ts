/**
 * Pattern matching for categorization.
 *
 * Matching is a plain, case-sensitive substring test against the key:
 * no anchoring and no normalization, so "email_" matches "send_email_reminder".
 */

import type { ModuleRule } from '../types/index.js';

/**
 * Test a single pattern against a translation key.
 */
export function matchesPattern(key: string, pattern: string): boolean {
    return pattern.length > 0 && key.includes(pattern);
}

/**
 * Match a key against a rule.
 *
 * @returns the first pattern of the rule found in the key, or null
 */
export function matchesRule(key: string, rule: ModuleRule): string | null {
    for (const pattern of rule.patterns) {
        if (matchesPattern(key, pattern)) {
            return pattern;
        }
    }
    return null;
}
