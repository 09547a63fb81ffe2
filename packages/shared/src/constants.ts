/**
 * Constants for Locale Modules.
 */

/**
 * Module name for keys that match no rule.
 * Emitted last, after every rule bucket.
 */
export const FALLBACK_MODULE = 'other';

/**
 * File extension of module fragments and of the loader glob.
 */
export const DEFAULT_EXTENSION = 'yml';

/**
 * Module names double as file names, so they are restricted to a safe alphabet.
 */
export const MODULE_NAME_PATTERN = /^[A-Za-z0-9_-]+$/;

/**
 * Locale identifiers become directory names under the destination root
 * (`pl`, `pt-BR`, `zh_Hant`). No dots or separators, no leading `_` or `-`.
 */
export const LOCALE_NAME_PATTERN = /^[A-Za-z0-9][A-Za-z0-9_-]*$/;

/**
 * Workspace-relative locations used when no config file overrides them.
 */
export const WORKSPACE_PATHS = {
    LOCALES_DIR: 'config/locales',
    SOURCE_FILE: 'config/locales.yml',
    CONFIG_FILE: 'config/locale-modules.yaml',
    RULES_FILE: 'config/module-rules.yaml',
} as const;

/**
 * Run-level lock, created in the destination root for the duration of a split.
 */
export const LOCK_FILE_NAME = '.locale-modules.lock';

/**
 * Pattern breadth thresholds.
 * A pattern is "too broad" when it matches more than MAX_MATCH_PERCENT of the
 * sampled keys AND more than MAX_MATCHES_FOR_BROAD keys.
 */
export const PATTERN_VALIDATION = {
    MAX_MATCH_PERCENT: 0.2,
    MAX_MATCHES_FOR_BROAD: 3,
} as const;
