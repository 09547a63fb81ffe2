import { readFileSync, existsSync } from 'node:fs';
import { parse } from 'yaml';
import {
    IOError,
    MalformedInputError,
    WorkspaceConfigFileSchema,
    type RuleSet,
    type TranslationTable,
    type WorkspaceConfigFile,
} from '@locale-modules/shared';
import { validateRuleSet, validateTranslationTable } from '@locale-modules/core';
import { resolveWorkspace } from './paths.js';
import { describeError } from '../utils/errors.js';
import type { Workspace } from '../types.js';

/**
 * Reads and parses a YAML file.
 * Read failures become IOError, syntax errors MalformedInputError.
 */
export function readYamlFile(path: string): unknown {
    let content: string;
    try {
        content = readFileSync(path, 'utf-8');
    } catch (err) {
        throw new IOError(`Failed to read ${path}: ${describeError(err)}`, path, { cause: err });
    }

    try {
        return parse(content);
    } catch (err) {
        throw new MalformedInputError(`Invalid YAML in ${path}: ${describeError(err)}`, undefined, { cause: err });
    }
}

/**
 * Loads config/locale-modules.yaml, or the defaults when it doesn't exist.
 */
export function loadWorkspaceConfigFile(configPath: string): WorkspaceConfigFile {
    if (!existsSync(configPath)) {
        return WorkspaceConfigFileSchema.parse({});
    }

    const result = WorkspaceConfigFileSchema.safeParse(readYamlFile(configPath) ?? {});
    if (!result.success) {
        const issue = result.error.issues[0];
        const path = issue.path.join('.');
        throw new MalformedInputError(
            `Invalid workspace config ${configPath}${path ? ` at "${path}"` : ''}: ${issue.message}`,
            path,
            { cause: result.error }
        );
    }
    return result.data;
}

/**
 * Resolves a workspace root together with its config file.
 */
export function loadWorkspace(root: string): Workspace {
    const { config } = resolveWorkspace(root);
    return resolveWorkspace(root, loadWorkspaceConfigFile(config.configPath));
}

/**
 * Path of the rule file in effect: the workspace's own rules if present,
 * otherwise the bundled defaults.
 */
export function activeRulesPath(workspace: Workspace): string {
    return existsSync(workspace.config.userRulesPath)
        ? workspace.config.userRulesPath
        : workspace.config.defaultRulesPath;
}

/**
 * Loads the ordered module rules.
 */
export function loadRules(workspace: Workspace): RuleSet {
    const path = activeRulesPath(workspace);
    if (!existsSync(path)) {
        throw new MalformedInputError(`Rules file not found: ${path}`);
    }
    return validateRuleSet(readYamlFile(path) ?? [], path);
}

/**
 * Loads the multi-locale source translation file.
 */
export function loadSourceTable(workspace: Workspace): TranslationTable {
    const path = workspace.config.sourcePath;
    if (!existsSync(path)) {
        throw new MalformedInputError(`Source translation file not found: ${path}`);
    }
    return validateTranslationTable(readYamlFile(path), path);
}
