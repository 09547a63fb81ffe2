import { describeShadowedPattern, findShadowedPatterns } from '@locale-modules/core';
import type { PipelineStep } from '../types.js';

/**
 * Step 4: Rule Analysis
 * Warns about patterns an earlier rule makes unreachable. Never fatal:
 * the declared order decides.
 */
export const analyzeRules: PipelineStep = async (state) => {
    if (!state.ruleSet) {
        return state;
    }

    for (const shadowed of findShadowedPatterns(state.ruleSet)) {
        state.warnings.push(describeShadowedPattern(shadowed));
    }

    return state;
};
