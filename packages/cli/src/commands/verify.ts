import { relative } from 'node:path';
import type { TranslationTable } from '@locale-modules/shared';
import { loadModularTranslations } from '../loader/load.js';
import { YamlTranslationRegistry } from '../loader/registry.js';
import { verifyModules } from '../loader/verify.js';
import { loadSourceTable } from '../workspace/config.js';
import { openWorkspace } from './workspace.js';
import { describeError } from '../utils/errors.js';
import { log, success, arrow, error } from '../utils/console.js';
import type { CommandOptions } from '../types.js';

const MAX_LISTED_KEYS = 10;

function listKeys(label: string, keys: string[]): void {
    if (keys.length === 0) return;
    log(`  ${label} (${keys.length}):`);
    for (const key of keys.slice(0, MAX_LISTED_KEYS)) {
        log(`    - ${key}`);
    }
    if (keys.length > MAX_LISTED_KEYS) {
        log(`    ... and ${keys.length - MAX_LISTED_KEYS} more`);
    }
}

/**
 * Checks that the module files reproduce the source file.
 */
export async function verifyLocales(options: CommandOptions): Promise<void> {
    const workspace = openWorkspace(options);
    const { destinationPath, extension, excludedLocales } = workspace.config;
    const registry = new YamlTranslationRegistry();

    let source: TranslationTable;
    try {
        source = loadSourceTable(workspace);
        await loadModularTranslations(destinationPath, registry, extension);
    } catch (err) {
        error(describeError(err));
        process.exit(1);
    }

    const report = verifyModules(source, registry.table(), registry.sources(), excludedLocales);

    for (const violation of report.violations) {
        error(`${relative(destinationPath, violation.path)}: ${violation.message}`);
    }

    for (const locale of report.unexpectedLocales) {
        error(`Locale "${locale}" is in module files but not in the source file`);
    }

    for (const { locale, diff } of report.locales) {
        const problems = diff.missing.length + diff.extra.length + diff.changed.length;
        if (problems === 0) {
            arrow(`${locale}: OK`);
            continue;
        }
        error(`${locale}: ${problems} differences`);
        listKeys('Missing from modules', diff.missing);
        listKeys('Not in source', diff.extra);
        listKeys('Changed', diff.changed);
    }

    if (!report.ok) {
        log('\n✖ Module files do not match the source.');
        process.exit(1);
    }

    success(`Module files match the source (${registry.sources().length} files).`);
}
