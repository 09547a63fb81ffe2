import { detectWorkspaceRoot } from '../workspace/detect.js';
import { loadWorkspace } from '../workspace/config.js';
import { describeError } from '../utils/errors.js';
import { error, log } from '../utils/console.js';
import type { CommandOptions, Workspace } from '../types.js';

/**
 * Resolves the workspace for a command, or exits with an error.
 */
export function openWorkspace(options: CommandOptions): Workspace {
    const root = options.workspace || detectWorkspaceRoot();
    if (!root) {
        error('Workspace not found. Are you in a project with translations?');
        log('Expected a "config/locales" directory in the workspace root.');
        process.exit(1);
    }

    try {
        return loadWorkspace(root);
    } catch (err) {
        error(`Failed to load workspace config. ${describeError(err)}`);
        process.exit(1);
    }
}
