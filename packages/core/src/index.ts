// Types (re-exported from shared)
export type {
    TranslationScalar,
    TranslationValue,
    LocaleTable,
    TranslationTable,
    ModuleRule,
    RuleSet,
    RuleSetInput,
} from './types/index.js';

export {
    TranslationTableSchema,
    RuleSetSchema,
    FALLBACK_MODULE,
    DEFAULT_EXTENSION,
    PATTERN_VALIDATION,
    MalformedInputError,
} from './types/index.js';

// Categorizer
export {
    categorize,
    categorizeKey,
    categorizeLocale,
    matchesPattern,
    matchesRule,
    validatePattern,
    checkPatternShadowing,
    findShadowedPatterns,
    describeShadowedPattern,
} from './categorizer/index.js';
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
} from './categorizer/index.js';

// Tables
export {
    validateTranslationTable,
    validateRuleSet,
    deepMerge,
    isTranslationMap,
    compareLocaleTables,
    valuesEqual,
    isEmptyDiff,
} from './table/index.js';
export type { TranslationMap, TableDiff } from './table/index.js';

// Serialization
export { buildModuleDocuments, serializeDocument } from './serialize/index.js';
export type { ModuleDocument } from './serialize/index.js';
