import type {
    RuleSet,
    TranslationTable,
} from '@locale-modules/shared';
import type { CategorizationResult } from '@locale-modules/core';
import type { Workspace, SplitOptions } from '../types.js';
import type { DirectoryLock } from '../workspace/lock.js';
import type { EmitResult } from '../emitter/emit.js';

/**
 * Representation of an error occurring within a pipeline step.
 */
export interface PipelineError {
    step: string;
    message: string;
    fatal: boolean;
    error?: unknown;
}

/**
 * Central state object passed through the split pipeline.
 */
export interface PipelineState {
    workspace: Workspace;
    options: SplitOptions;

    // Accumulated during pipeline execution
    lock?: DirectoryLock;
    table?: TranslationTable;
    ruleSet?: RuleSet;
    rulesPath?: string;
    categorization?: CategorizationResult;
    emitted: EmitResult[];

    warnings: string[];
    errors: PipelineError[];
}

/**
 * Function signature for a discrete pipeline step.
 */
export type PipelineStep = (state: PipelineState) => Promise<PipelineState>;

/**
 * A named step. `always` steps run even after a fatal error (cleanup).
 */
export interface PipelineStepEntry {
    name: string;
    fn: PipelineStep;
    always?: boolean;
}
