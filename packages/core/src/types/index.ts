/**
 * Re-export all types from shared package.
 * Core package uses these types but doesn't define them.
 */
export type {
    TranslationScalar,
    TranslationValue,
    LocaleTable,
    TranslationTable,
    ModuleRule,
    RuleSet,
    RuleSetInput,
} from '@locale-modules/shared';

export {
    TranslationTableSchema,
    RuleSetSchema,
    FALLBACK_MODULE,
    DEFAULT_EXTENSION,
    PATTERN_VALIDATION,
    MalformedInputError,
} from '@locale-modules/shared';
