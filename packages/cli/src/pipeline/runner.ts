import type { PipelineState, PipelineStepEntry } from './types.js';
import { acquireRunLock, releaseRunLock } from './steps/lock.js';
import { loadSource } from './steps/load-source.js';
import { loadModuleRules } from './steps/load-rules.js';
import { analyzeRules } from './steps/analyze-rules.js';
import { categorizeKeys } from './steps/categorize.js';
import { emitModules } from './steps/emit.js';
import type { Workspace, SplitOptions } from '../types.js';

export const SPLIT_STEPS: PipelineStepEntry[] = [
    { name: 'Acquire Lock', fn: acquireRunLock },
    { name: 'Load Source', fn: loadSource },
    { name: 'Load Rules', fn: loadModuleRules },
    { name: 'Rule Analysis', fn: analyzeRules },
    { name: 'Categorization', fn: categorizeKeys },
    { name: 'Emit Modules', fn: emitModules },
    { name: 'Release Lock', fn: releaseRunLock, always: true },
];

/**
 * Orchestrates the execution of the split pipeline.
 * Runs each step sequentially. After a fatal error only `always` steps run.
 */
export async function runPipeline(
    workspace: Workspace,
    options: SplitOptions,
    steps: PipelineStepEntry[] = SPLIT_STEPS
): Promise<PipelineState> {
    let state: PipelineState = {
        workspace,
        options,
        emitted: [],
        warnings: [],
        errors: [],
    };

    let failedStep: string | null = null;

    for (let i = 0; i < steps.length; i++) {
        const step = steps[i];
        if (failedStep && !step.always) {
            continue;
        }

        console.log(`\n→ Step ${i + 1}/${steps.length}: ${step.name}...`);

        state = await step.fn(state);

        if (!failedStep && state.errors.some(e => e.fatal)) {
            failedStep = step.name;
            console.error(`\n✖ Fatal error in step "${step.name}". Stopping.`);
        }
    }

    return state;
}
