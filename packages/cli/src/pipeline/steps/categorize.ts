import { categorize } from '@locale-modules/core';
import type { PipelineStep } from '../types.js';
import { describeError } from '../../utils/errors.js';

/**
 * Step 5: Categorization
 * Partitions every non-excluded locale into module buckets.
 */
export const categorizeKeys: PipelineStep = async (state) => {
    if (!state.table || !state.ruleSet) {
        state.errors.push({
            step: 'categorize',
            message: 'Source table and rules must be loaded before categorization.',
            fatal: true
        });
        return state;
    }

    const excluded = state.workspace.config.excludedLocales;
    for (const locale of excluded) {
        if (!Object.hasOwn(state.table, locale)) {
            state.warnings.push(`Excluded locale "${locale}" is not in the source file.`);
        }
    }

    try {
        state.categorization = categorize(state.table, state.ruleSet, excluded);
    } catch (err) {
        state.errors.push({
            step: 'categorize',
            message: describeError(err),
            fatal: true,
            error: err
        });
    }

    return state;
};
