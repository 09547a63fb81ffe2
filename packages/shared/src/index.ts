// Schemas
export {
    TranslationValueSchema,
    LocaleTableSchema,
    TranslationTableSchema,
    ModuleRuleSchema,
    RuleSetSchema,
    WorkspaceConfigFileSchema,
} from './schemas.js';

// Types
export type {
    TranslationScalar,
    TranslationValue,
    LocaleTable,
    TranslationTable,
    ModuleRule,
    RuleSet,
    RuleSetInput,
    WorkspaceConfigFile,
} from './schemas.js';

// Constants
export {
    FALLBACK_MODULE,
    DEFAULT_EXTENSION,
    MODULE_NAME_PATTERN,
    LOCALE_NAME_PATTERN,
    WORKSPACE_PATHS,
    LOCK_FILE_NAME,
    PATTERN_VALIDATION,
} from './constants.js';

// Errors
export {
    LocaleModulesError,
    MalformedInputError,
    IOError,
    LockError,
} from './errors.js';
export type { LocaleModulesErrorCode } from './errors.js';
