import { join, dirname, resolve } from 'node:path';
import { fileURLToPath } from 'node:url';
import {
    WORKSPACE_PATHS,
    WorkspaceConfigFileSchema,
    type WorkspaceConfigFile,
} from '@locale-modules/shared';
import type { Workspace } from '../types.js';

const __dirname = dirname(fileURLToPath(import.meta.url));

/**
 * Constructs a Workspace object from a root path and its (optional) config file.
 * Relative paths in the config resolve against the root.
 */
export function resolveWorkspace(
    root: string,
    file: WorkspaceConfigFile = WorkspaceConfigFileSchema.parse({})
): Workspace {
    return {
        root,
        config: {
            configPath: join(root, WORKSPACE_PATHS.CONFIG_FILE),
            sourcePath: resolve(root, file.source),
            destinationPath: resolve(root, file.destination),
            extension: file.extension,
            excludedLocales: file.excluded_locales,
            userRulesPath: join(root, WORKSPACE_PATHS.RULES_FILE),
            defaultRulesPath: resolveDefaultRulesPath(),
        },
    };
}

/**
 * Rules bundled with the CLI package.
 */
export function resolveDefaultRulesPath(): string {
    // packages/cli/src/workspace -> packages/cli
    const pkgRoot = join(__dirname, '..', '..');
    return join(pkgRoot, 'assets', 'module-rules.yaml');
}
