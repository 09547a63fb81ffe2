import { existsSync } from 'node:fs';
import { dirname, join, resolve } from 'node:path';
import { WORKSPACE_PATHS } from '@locale-modules/shared';

/**
 * Searches for the workspace root by looking for a 'config/locales' directory.
 * Starts at startPath and bubbles up to the root.
 */
export function detectWorkspaceRoot(startPath: string = process.cwd()): string | null {
    let current = resolve(startPath);
    while (true) {
        if (existsSync(join(current, WORKSPACE_PATHS.LOCALES_DIR))) {
            return current;
        }
        const parent = dirname(current);
        if (parent === current) {
            break;
        }
        current = parent;
    }
    return null;
}
