/**
 * Zod schemas for Locale Modules data structures.
 *
 * Key order inside every mapping is the source order and is carried through
 * to the emitted files.
 */

import { z } from 'zod';
import {
    DEFAULT_EXTENSION,
    FALLBACK_MODULE,
    LOCALE_NAME_PATTERN,
    MODULE_NAME_PATTERN,
    WORKSPACE_PATHS,
} from './constants.js';

// ============================================================================
// Translation Tables
// ============================================================================

export type TranslationScalar = string | number | boolean | null;

/**
 * A translation value: a scalar, a list (e.g. day names), or a nested group
 * such as pluralization forms (one/few/many/other).
 */
export type TranslationValue =
    | TranslationScalar
    | TranslationValue[]
    | { [key: string]: TranslationValue };

/**
 * Integers beyond 2^53 have already lost digits once parsed; writing them back
 * would change the value. They have to be quoted in the source.
 */
const TranslationNumberSchema = z
    .number()
    .refine(
        n => !Number.isInteger(n) || Number.isSafeInteger(n),
        'Integer is too large to represent exactly; quote it to keep it as text'
    );

export const TranslationValueSchema: z.ZodType<TranslationValue> = z.lazy(() =>
    z.union([
        z.string(),
        TranslationNumberSchema,
        z.boolean(),
        z.null(),
        z.array(TranslationValueSchema),
        z.record(z.string(), TranslationValueSchema),
    ])
);

/**
 * One locale's keys: translation key → value.
 */
export const LocaleTableSchema = z.record(z.string(), TranslationValueSchema);

export type LocaleTable = z.infer<typeof LocaleTableSchema>;

/**
 * Locale identifier → LocaleTable.
 */
export const TranslationTableSchema = z.record(
    z.string().regex(LOCALE_NAME_PATTERN, 'Locale name may only contain letters, digits, "_" and "-", and must start with a letter or digit'),
    LocaleTableSchema
);

export type TranslationTable = z.infer<typeof TranslationTableSchema>;

// ============================================================================
// Rules
// ============================================================================

const moduleName = z
    .string()
    .regex(MODULE_NAME_PATTERN, 'Module name may only contain letters, digits, "_" and "-"');

/**
 * A named module and the substrings that send a key to it.
 */
export const ModuleRuleSchema = z.object({
    module: moduleName,
    patterns: z.array(z.string().min(1, 'Pattern cannot be empty')).min(1, 'Rule needs at least one pattern'),
    note: z.string().optional(),
});

export type ModuleRule = z.infer<typeof ModuleRuleSchema>;

/**
 * Ordered rule list plus the name of the catch-all bucket.
 * Order is significant: the first rule with a matching pattern wins.
 */
export const RuleSetSchema = z
    .object({
        fallback_module: moduleName.default(FALLBACK_MODULE),
        rules: z.array(ModuleRuleSchema),
    })
    .superRefine((ruleSet, ctx) => {
        const seen = new Set<string>();
        ruleSet.rules.forEach((rule, index) => {
            if (rule.module === ruleSet.fallback_module) {
                ctx.addIssue({
                    code: z.ZodIssueCode.custom,
                    path: ['rules', index, 'module'],
                    message: `Rule cannot use the fallback module name "${ruleSet.fallback_module}"`,
                });
            }
            if (seen.has(rule.module)) {
                ctx.addIssue({
                    code: z.ZodIssueCode.custom,
                    path: ['rules', index, 'module'],
                    message: `Duplicate module "${rule.module}"`,
                });
            }
            seen.add(rule.module);
        });
    });

export type RuleSet = z.infer<typeof RuleSetSchema>;
export type RuleSetInput = z.input<typeof RuleSetSchema>;

// ============================================================================
// Workspace Configuration
// ============================================================================

/**
 * config/locale-modules.yaml. Every key is optional.
 */
export const WorkspaceConfigFileSchema = z
    .object({
        source: z.string().min(1).default(WORKSPACE_PATHS.SOURCE_FILE),
        destination: z.string().min(1).default(WORKSPACE_PATHS.LOCALES_DIR),
        extension: z.string().regex(/^[a-z0-9]+$/, 'Extension must be lowercase alphanumeric').default(DEFAULT_EXTENSION),
        excluded_locales: z.array(z.string().min(1)).default([]),
    })
    .strict();

export type WorkspaceConfigFile = z.infer<typeof WorkspaceConfigFileSchema>;
