/**
 * Categorizer module: rule-based partitioning of translation keys.
 */

export { categorize, categorizeKey, categorizeLocale } from './categorize.js';
export {
    validatePattern,
    checkPatternShadowing,
    findShadowedPatterns,
    describeShadowedPattern,
} from './validate.js';
export { matchesPattern, matchesRule } from './match.js';
export type {
    ModuleBucket,
    LocaleCategorization,
    LocaleStats,
    CategorizationStats,
    CategorizationResult,
    PatternRef,
    PatternValidationResult,
    ShadowingResult,
    ShadowedPattern,
} from './types.js';
