/**
 * Locale Modules CLI - Core Types
 */

export interface CommandOptions {
    workspace?: string;
}

export interface SplitOptions extends CommandOptions {
    dryRun: boolean;
}

export interface AddPatternOptions extends CommandOptions {
    before?: string;
}

export interface WorkspaceConfig {
    /** config/locale-modules.yaml, optional */
    configPath: string;
    /** Multi-locale input file */
    sourcePath: string;
    /** Root of <locale>/<module>.<extension>, also the loader root */
    destinationPath: string;
    extension: string;
    excludedLocales: string[];
    /** Workspace rule file, overrides the bundled rules when present */
    userRulesPath: string;
    /** Rules shipped with the CLI */
    defaultRulesPath: string;
}

export interface Workspace {
    root: string;
    config: WorkspaceConfig;
}
