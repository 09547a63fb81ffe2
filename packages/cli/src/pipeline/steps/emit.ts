import type { PipelineStep } from '../types.js';
import { emit } from '../../emitter/emit.js';
import { describeError } from '../../utils/errors.js';

/**
 * Step 6: Emit Modules
 * Writes locales one at a time. A failure stops the run; locales written
 * before it keep their files.
 */
export const emitModules: PipelineStep = async (state) => {
    if (!state.categorization) {
        return state;
    }

    const { destinationPath, extension } = state.workspace.config;

    for (const locale of state.categorization.locales) {
        try {
            const result = await emit(locale, destinationPath, {
                extension,
                dryRun: state.options.dryRun,
            });
            state.emitted.push(result);
        } catch (err) {
            state.errors.push({
                step: 'emit',
                message: describeError(err),
                fatal: true,
                error: err
            });
            break;
        }
    }

    return state;
};
