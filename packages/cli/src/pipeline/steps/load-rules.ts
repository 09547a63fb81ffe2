import type { PipelineStep } from '../types.js';
import { activeRulesPath, loadRules } from '../../workspace/config.js';
import { describeError } from '../../utils/errors.js';

/**
 * Step 3: Load Rules
 * Workspace rules when present, bundled rules otherwise.
 */
export const loadModuleRules: PipelineStep = async (state) => {
    try {
        state.rulesPath = activeRulesPath(state.workspace);
        state.ruleSet = loadRules(state.workspace);
    } catch (err) {
        state.errors.push({
            step: 'load-rules',
            message: `Failed to load rules: ${describeError(err)}`,
            fatal: true,
            error: err
        });
    }

    return state;
};
