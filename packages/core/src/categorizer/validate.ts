/**
 * Pattern validation and rule-order analysis.
 *
 * ARCHITECTURAL NOTE: No console.* calls. Results returned as data.
 */

import { matchesPattern } from './match.js';
import { PATTERN_VALIDATION } from '../types/index.js';
import type { ModuleRule, RuleSet } from '../types/index.js';
import type {
    PatternRef,
    PatternValidationResult,
    ShadowedPattern,
    ShadowingResult,
} from './types.js';

/**
 * Validate a pattern before adding it to a rule.
 *
 * Empty or blank patterns are rejected. With a key sample, a pattern that
 * matches more than 20% of the keys AND more than 3 keys is flagged as too
 * broad (warning only).
 *
 * @param pattern - Pattern string to validate
 * @param keys - Optional translation keys for the breadth check
 */
export function validatePattern(pattern: string, keys?: string[]): PatternValidationResult {
    const errors: string[] = [];
    const warnings: string[] = [];

    if (!pattern || pattern.trim() === '') {
        errors.push('Pattern cannot be empty');
        return { valid: false, errors, warnings };
    }

    if (!keys || keys.length === 0) {
        return { valid: true, errors, warnings };
    }

    let matchCount = 0;
    for (const key of keys) {
        if (matchesPattern(key, pattern)) matchCount++;
    }

    const matchPercent = matchCount / keys.length;

    if (
        matchPercent > PATTERN_VALIDATION.MAX_MATCH_PERCENT &&
        matchCount > PATTERN_VALIDATION.MAX_MATCHES_FOR_BROAD
    ) {
        warnings.push(
            `Pattern "${pattern}" is too broad: matches ${matchCount} keys ` +
            `(${(matchPercent * 100).toFixed(1)}% > ${PATTERN_VALIDATION.MAX_MATCH_PERCENT * 100}%)`
        );
    }

    return {
        valid: errors.length === 0,
        errors,
        warnings,
        matchCount,
        matchPercent,
    };
}

/**
 * Check how a pattern of `module` interacts with the other rules.
 *
 * `rules` is the list as it will be after the change. If `module` is not in
 * it, the pattern is treated as belonging to a new rule appended at the end.
 *
 * Earlier rules with a pattern contained in the new one claim all of its keys;
 * later rules with a pattern that contains the new one lose keys to it.
 */
export function checkPatternShadowing(
    module: string,
    pattern: string,
    rules: ModuleRule[]
): ShadowingResult {
    const found = rules.findIndex(r => r.module === module);
    const position = found === -1 ? rules.length : found;

    const shadowedBy: PatternRef[] = [];
    const shadows: PatternRef[] = [];

    rules.forEach((rule, index) => {
        if (index === position) return;
        for (const existing of rule.patterns) {
            if (index < position && pattern.includes(existing)) {
                shadowedBy.push({ module: rule.module, pattern: existing });
            } else if (index > position && existing.includes(pattern)) {
                shadows.push({ module: rule.module, pattern: existing });
            }
        }
    });

    return {
        hasConflict: shadowedBy.length > 0 || shadows.length > 0,
        shadowedBy,
        shadows,
    };
}

/**
 * Find declared patterns that can never win because an earlier rule has a
 * pattern contained in them.
 *
 * These are not errors: ordering is how the rule list is meant to resolve
 * overlaps. They usually point at a rule placed after a more general one.
 */
export function findShadowedPatterns(ruleSet: RuleSet): ShadowedPattern[] {
    const shadowed: ShadowedPattern[] = [];

    ruleSet.rules.forEach((rule, index) => {
        const earlier = ruleSet.rules.slice(0, index);
        for (const pattern of rule.patterns) {
            const hit = findFirstContained(pattern, earlier);
            if (hit) {
                shadowed.push({ module: rule.module, pattern, shadowedBy: hit });
            }
        }
    });

    return shadowed;
}

function findFirstContained(pattern: string, rules: ModuleRule[]): PatternRef | null {
    for (const rule of rules) {
        for (const existing of rule.patterns) {
            if (pattern.includes(existing)) {
                return { module: rule.module, pattern: existing };
            }
        }
    }
    return null;
}

/**
 * Human-readable line for a shadowed pattern.
 */
export function describeShadowedPattern(entry: ShadowedPattern): string {
    return (
        `Pattern "${entry.pattern}" of module "${entry.module}" never matches: ` +
        `earlier module "${entry.shadowedBy.module}" claims every key containing "${entry.shadowedBy.pattern}"`
    );
}
