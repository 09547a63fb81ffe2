#!/usr/bin/env -S npx tsx
/**
 * Locale Modules CLI
 *
 * - split:       one-time migration of a multi-locale file into module files
 * - load:        startup-style discovery and loading of module files
 * - verify:      module files reproduce the source file
 * - add-pattern: extend the workspace rules
 *
 * The CLI does all file I/O; core receives data and returns data.
 */

import { Command } from 'commander';
import { splitLocales } from './commands/split.js';
import { loadModules } from './commands/load.js';
import { verifyLocales } from './commands/verify.js';
import { addPattern } from './commands/add-pattern.js';
import type { AddPatternOptions, CommandOptions, SplitOptions } from './types.js';
import { describeError } from './utils/errors.js';

export function buildProgram(): Command {
    const program = new Command();

    program
        .name('locmod')
        .description('Split translation files into per-module fragments and load them back')
        .version('1.0.0');

    program
        .command('split')
        .description('Split the source translation file into <locale>/<module>.yml files')
        .option('-w, --workspace <dir>', 'workspace root (default: detected from the current directory)')
        .option('--dry-run', 'show what would be written without touching the disk', false)
        .action(async (options: SplitOptions) => {
            await splitLocales(options);
        });

    program
        .command('load')
        .description('Discover and load module files the way the application does at startup')
        .option('-w, --workspace <dir>', 'workspace root')
        .action(async (options: CommandOptions) => {
            await loadModules(options);
        });

    program
        .command('verify')
        .description('Check that module files reproduce the source translation file')
        .option('-w, --workspace <dir>', 'workspace root')
        .action(async (options: CommandOptions) => {
            await verifyLocales(options);
        });

    program
        .command('add-pattern')
        .description('Add a pattern to a module rule in config/module-rules.yaml')
        .argument('<module>', 'module name, e.g. auth')
        .argument('<pattern>', 'substring matched against translation keys')
        .option('-b, --before <module>', 'insert a new module before this one')
        .option('-w, --workspace <dir>', 'workspace root')
        .action(async (module: string, pattern: string, options: AddPatternOptions) => {
            await addPattern(module, pattern, options);
        });

    return program;
}

buildProgram()
    .parseAsync(process.argv)
    .catch((err: unknown) => {
        console.error('Unexpected error:', describeError(err));
        process.exit(1);
    });
