import { DEFAULT_EXTENSION } from '@locale-modules/shared';
import { discoverModuleFiles } from './discover.js';
import type { TranslationRegistry } from './registry.js';

export interface LoadReport {
    /** Registered paths, in load order */
    paths: string[];
}

/**
 * Startup loading of modular translations.
 * Registers every `<root>/<locale>/<module>.<ext>` file (sorted) and reloads
 * the registry once. Does nothing when there are no files.
 */
export async function loadModularTranslations(
    root: string,
    registry: TranslationRegistry,
    extension: string = DEFAULT_EXTENSION
): Promise<LoadReport> {
    const paths = await discoverModuleFiles(root, extension);

    if (paths.length > 0) {
        registry.addLoadPaths(paths);
        await registry.reload();
    }

    return { paths };
}
