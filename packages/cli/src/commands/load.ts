import { loadModularTranslations } from '../loader/load.js';
import { YamlTranslationRegistry } from '../loader/registry.js';
import { openWorkspace } from './workspace.js';
import { describeError } from '../utils/errors.js';
import { log, success, arrow, error } from '../utils/console.js';
import type { CommandOptions } from '../types.js';

/**
 * Loads the module files the way the application does at startup and
 * reports what was found.
 */
export async function loadModules(options: CommandOptions): Promise<void> {
    const workspace = openWorkspace(options);
    const { destinationPath, extension } = workspace.config;
    const registry = new YamlTranslationRegistry();

    try {
        const report = await loadModularTranslations(destinationPath, registry, extension);
        if (report.paths.length === 0) {
            log(`No modular translation files found in ${destinationPath}`);
            return;
        }
        success(`Loaded ${report.paths.length} modular translation files`);
    } catch (err) {
        error(`Failed to load translations: ${describeError(err)}`);
        process.exit(1);
    }

    for (const [locale, table] of Object.entries(registry.table())) {
        arrow(`${locale}: ${Object.keys(table).length} keys`);
    }
}
