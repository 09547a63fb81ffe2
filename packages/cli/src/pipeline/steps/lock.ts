import type { PipelineStep } from '../types.js';
import { acquireLock } from '../../workspace/lock.js';
import { describeError } from '../../utils/errors.js';

/**
 * Step 1: Acquire Lock
 * Takes exclusive ownership of the destination directory. Skipped on dry runs,
 * which write nothing.
 */
export const acquireRunLock: PipelineStep = async (state) => {
    if (state.options.dryRun) {
        return state;
    }

    try {
        state.lock = await acquireLock(state.workspace.config.destinationPath);
    } catch (err) {
        state.errors.push({
            step: 'lock',
            message: describeError(err),
            fatal: true,
            error: err
        });
    }

    return state;
};

/**
 * Final step: Release Lock
 * Runs even after a fatal error.
 */
export const releaseRunLock: PipelineStep = async (state) => {
    const lock = state.lock;
    if (!lock) {
        return state;
    }

    try {
        await lock.release();
        state.lock = undefined;
    } catch (err) {
        state.errors.push({
            step: 'unlock',
            message: `Failed to release lock ${lock.path}: ${describeError(err)}`,
            fatal: false,
            error: err
        });
    }

    return state;
};
