import type { Dirent } from 'node:fs';
import { readdir } from 'node:fs/promises';
import { extname, join } from 'node:path';
import { DEFAULT_EXTENSION, IOError } from '@locale-modules/shared';
import { describeError, isErrnoCode } from '../utils/errors.js';

/**
 * Finds module files exactly two levels below root: `<root>/<locale>/<module>.<ext>`.
 * Hidden entries are skipped. Paths come back sorted lexically, which is the
 * order they are loaded in (later files override earlier ones).
 *
 * A missing root yields an empty list.
 */
export async function discoverModuleFiles(
    root: string,
    extension: string = DEFAULT_EXTENSION
): Promise<string[]> {
    let localeDirs: Dirent[];
    try {
        localeDirs = await readdir(root, { withFileTypes: true });
    } catch (err) {
        if (isErrnoCode(err, 'ENOENT')) return [];
        throw new IOError(`Failed to scan ${root}: ${describeError(err)}`, root, { cause: err });
    }

    const paths: string[] = [];

    for (const dir of localeDirs) {
        if (!dir.isDirectory() || dir.name.startsWith('.')) continue;

        const dirPath = join(root, dir.name);
        let entries: Dirent[];
        try {
            entries = await readdir(dirPath, { withFileTypes: true });
        } catch (err) {
            throw new IOError(`Failed to scan ${dirPath}: ${describeError(err)}`, dirPath, { cause: err });
        }

        for (const entry of entries) {
            if (entry.isFile() && !entry.name.startsWith('.') && extname(entry.name) === `.${extension}`) {
                paths.push(join(dirPath, entry.name));
            }
        }
    }

    return paths.sort();
}
