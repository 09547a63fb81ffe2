import { relative } from 'node:path';
import { runPipeline } from '../pipeline/runner.js';
import { openWorkspace } from './workspace.js';
import { log, success, warn, arrow, info, error } from '../utils/console.js';
import type { SplitOptions } from '../types.js';

/**
 * Splits the source translation file into per-locale module files.
 */
export async function splitLocales(options: SplitOptions): Promise<void> {
    log('\nLocale Modules - Splitting translations');

    // 1. Workspace detection
    arrow('Detecting workspace...');
    const workspace = openWorkspace(options);
    success(`Workspace: ${workspace.root}`);

    // 2. Run Pipeline
    const state = await runPipeline(workspace, options);

    // 3. Report Final Status
    log('\n--- Split Summary ---');

    if (state.rulesPath) {
        info(`Rules: ${relative(workspace.root, state.rulesPath) || state.rulesPath}`);
    }

    for (const locale of state.categorization?.skippedLocales ?? []) {
        info(`Skipped excluded locale: ${locale}`);
    }

    let fileCount = 0;
    let keyCount = 0;
    for (const result of state.emitted) {
        for (const artifact of result.written) {
            arrow(`${relative(workspace.config.destinationPath, artifact.path)}: ${artifact.keyCount} keys`);
            fileCount++;
            keyCount += artifact.keyCount;
        }
        for (const path of result.removed) {
            info(`Removed stale ${relative(workspace.config.destinationPath, path)}`);
        }
    }

    for (const w of state.warnings) {
        warn(w);
    }

    if (state.errors.length > 0) {
        for (const e of state.errors) {
            console.error(`✖ ERROR [${e.step}]: ${e.message}`);
        }
        if (state.errors.some(e => e.fatal)) {
            log('\n✖ Split failed with fatal errors.');
            process.exit(1);
        }
    }

    success(`Split complete: ${keyCount} keys in ${fileCount} files.`);

    if (options.dryRun) {
        log('\n[DRY RUN] No files were written or removed.');
    } else {
        arrow(`Modules saved to: ${workspace.config.destinationPath}`);
    }
}
