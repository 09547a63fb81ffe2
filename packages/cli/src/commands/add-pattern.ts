import { existsSync } from 'node:fs';
import { checkPatternShadowing, validatePattern } from '@locale-modules/core';
import { MODULE_NAME_PATTERN, type ModuleRule, type RuleSet } from '@locale-modules/shared';
import { openWorkspace } from './workspace.js';
import { loadRules, loadSourceTable } from '../workspace/config.js';
import { appendPatternToYaml } from '../yaml/rules.js';
import { describeError } from '../utils/errors.js';
import { success, log, arrow, warn, error } from '../utils/console.js';
import type { AddPatternOptions, Workspace } from '../types.js';

/**
 * Keys of every non-excluded locale, for the breadth check.
 * Empty when the source file is absent.
 */
function sampleKeys(workspace: Workspace): string[] {
    if (!existsSync(workspace.config.sourcePath)) {
        return [];
    }
    const table = loadSourceTable(workspace);
    const excluded = new Set(workspace.config.excludedLocales);
    const keys = new Set<string>();
    for (const [locale, entries] of Object.entries(table)) {
        if (excluded.has(locale)) continue;
        for (const key of Object.keys(entries)) keys.add(key);
    }
    return [...keys];
}

/**
 * The rule list as it will look once the pattern is added.
 */
function withPattern(rules: ModuleRule[], module: string, pattern: string, before?: string): ModuleRule[] {
    if (rules.some(r => r.module === module)) {
        return rules.map(r => (r.module === module ? { ...r, patterns: [...r.patterns, pattern] } : r));
    }
    const rule: ModuleRule = { module, patterns: [pattern] };
    const index = before ? rules.findIndex(r => r.module === before) : -1;
    return index === -1 ? [...rules, rule] : [...rules.slice(0, index), rule, ...rules.slice(index)];
}

export async function addPattern(module: string, pattern: string, options: AddPatternOptions): Promise<void> {
    // 1. Workspace detection
    const workspace = openWorkspace(options);
    const rulesPath = workspace.config.userRulesPath;

    // 2. Current rules and a key sample
    let ruleSet: RuleSet;
    let keys: string[];
    try {
        ruleSet = loadRules(workspace);
        keys = sampleKeys(workspace);
    } catch (err) {
        error(describeError(err));
        process.exit(1);
    }

    if (!MODULE_NAME_PATTERN.test(module)) {
        error(`Invalid module name "${module}": use letters, digits, "_" and "-".`);
        process.exit(1);
    }
    if (module === ruleSet.fallback_module) {
        error(`"${module}" is the fallback module; keys reach it by matching no rule.`);
        process.exit(1);
    }

    const target = ruleSet.rules.find(r => r.module === module);
    if (target?.patterns.includes(pattern)) {
        error(`Module "${module}" already has pattern "${pattern}".`);
        process.exit(1);
    }
    if (options.before) {
        if (target) {
            error(`--before only applies to new modules; "${module}" already exists.`);
            process.exit(1);
        }
        if (!ruleSet.rules.some(r => r.module === options.before)) {
            error(`Module "${options.before}" not found.`);
            process.exit(1);
        }
    }

    // 3. Pattern validation (empty rejected, breadth warned)
    const validation = validatePattern(pattern, keys);
    if (!validation.valid) {
        error(validation.errors.join(', '));
        process.exit(1);
    }
    for (const w of validation.warnings) {
        warn(w);
    }

    // 4. Ordering conflicts (warn, don't block)
    const shadowing = checkPatternShadowing(module, pattern, withPattern(ruleSet.rules, module, pattern, options.before));
    for (const ref of shadowing.shadowedBy) {
        warn(`Earlier module "${ref.module}" (pattern "${ref.pattern}") captures every key "${pattern}" matches.`);
    }
    for (const ref of shadowing.shadows) {
        warn(`Keys matching "${ref.pattern}" (module "${ref.module}") will now go to "${module}".`);
    }

    // 5. Perform addition
    const seeded = !existsSync(rulesPath);
    log(`Adding pattern to: ${rulesPath}`);

    try {
        await appendPatternToYaml(rulesPath, module, pattern, {
            before: options.before,
            seedPath: workspace.config.defaultRulesPath,
        });
    } catch (err) {
        error(`Failed to add pattern: ${describeError(err)}`);
        process.exit(1);
    }

    success('Pattern successfully added!');
    if (seeded) {
        arrow('Seeded from bundled rules');
    }
    arrow(`Module:   ${module}${target ? '' : ' (new)'}`);
    arrow(`Pattern:  "${pattern}"`);
    if (validation.matchCount !== undefined) {
        arrow(`Matches:  ${validation.matchCount} keys`);
    }
}
