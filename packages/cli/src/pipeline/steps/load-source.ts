import type { PipelineStep } from '../types.js';
import { loadSourceTable } from '../../workspace/config.js';
import { describeError } from '../../utils/errors.js';

/**
 * Step 2: Load Source
 * Reads and validates the multi-locale translation file.
 */
export const loadSource: PipelineStep = async (state) => {
    try {
        state.table = loadSourceTable(state.workspace);
    } catch (err) {
        state.errors.push({
            step: 'load-source',
            message: describeError(err),
            fatal: true,
            error: err
        });
    }

    return state;
};
