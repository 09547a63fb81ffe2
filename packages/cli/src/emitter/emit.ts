import { mkdir, readdir, unlink, writeFile } from 'node:fs/promises';
import { basename, dirname, join, resolve } from 'node:path';
import { buildModuleDocuments, type LocaleCategorization } from '@locale-modules/core';
import { DEFAULT_EXTENSION, IOError, MalformedInputError } from '@locale-modules/shared';
import { describeError, isErrnoCode } from '../utils/errors.js';

/**
 * A module file written for one locale.
 */
export interface EmittedArtifact {
    module: string;
    path: string;
    keyCount: number;
}

export interface EmitResult {
    locale: string;
    directory: string;
    written: EmittedArtifact[];
    /** Module files of an earlier run that no longer have any keys */
    removed: string[];
}

export interface EmitOptions {
    extension?: string;
    /** Compute the result without touching the disk */
    dryRun?: boolean;
}

async function withIO<T>(action: string, path: string, fn: () => Promise<T>): Promise<T> {
    try {
        return await fn();
    } catch (err) {
        throw new IOError(`Failed to ${action} ${path}: ${describeError(err)}`, path, { cause: err });
    }
}

/**
 * Module files currently in a locale directory, sorted by name.
 */
async function listModuleFiles(directory: string, extension: string): Promise<string[]> {
    try {
        const entries = await readdir(directory, { withFileTypes: true });
        return entries
            .filter(e => e.isFile() && !e.name.startsWith('.') && e.name.endsWith(`.${extension}`))
            .map(e => e.name)
            .sort();
    } catch (err) {
        if (isErrnoCode(err, 'ENOENT')) return [];
        throw new IOError(`Failed to list ${directory}: ${describeError(err)}`, directory, { cause: err });
    }
}

/**
 * `<destinationRoot>/<locale>`, refusing any locale that would resolve
 * elsewhere (`..`, `.`, `a/b`, empty).
 */
function localeDirectory(destinationRoot: string, locale: string): string {
    const root = resolve(destinationRoot);
    const directory = join(root, locale);
    if (dirname(directory) !== root || basename(directory) !== locale) {
        throw new MalformedInputError(
            `Locale "${locale}" does not name a directory directly under ${root}`,
            locale
        );
    }
    return directory;
}

/**
 * Writes one locale's buckets to `<destinationRoot>/<locale>/<module>.<ext>`.
 *
 * Existing module files are overwritten, and module files the current
 * categorization did not produce are removed, so the directory ends up with
 * exactly this run's artifacts.
 *
 * @throws MalformedInputError when the locale is not a plain directory name
 * @throws IOError on any file-system failure; files already written stay
 */
export async function emit(
    categorization: LocaleCategorization,
    destinationRoot: string,
    options: EmitOptions = {}
): Promise<EmitResult> {
    const extension = options.extension ?? DEFAULT_EXTENSION;
    const directory = localeDirectory(destinationRoot, categorization.locale);
    const documents = buildModuleDocuments(categorization, extension);

    if (!options.dryRun) {
        await withIO('create directory', directory, () => mkdir(directory, { recursive: true }));
    }

    const written: EmittedArtifact[] = [];
    for (const document of documents) {
        const path = join(directory, document.fileName);
        if (!options.dryRun) {
            await withIO('write', path, () => writeFile(path, document.content, 'utf8'));
        }
        written.push({ module: document.module, path, keyCount: document.keyCount });
    }

    const current = new Set(documents.map(d => d.fileName));
    const stale = (await listModuleFiles(directory, extension)).filter(name => !current.has(name));

    const removed: string[] = [];
    for (const name of stale) {
        const path = join(directory, name);
        if (!options.dryRun) {
            await withIO('remove', path, () => unlink(path));
        }
        removed.push(path);
    }

    return { locale: categorization.locale, directory, written, removed };
}
