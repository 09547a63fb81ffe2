import { mkdir, open, readFile, rm, type FileHandle } from 'node:fs/promises';
import { join } from 'node:path';
import { IOError, LOCK_FILE_NAME, LockError } from '@locale-modules/shared';
import { describeError, isErrnoCode } from '../utils/errors.js';

/**
 * Exclusive ownership of a destination directory for one run.
 */
export interface DirectoryLock {
    path: string;
    release(): Promise<void>;
}

async function readLockHolder(path: string): Promise<string> {
    try {
        const pid = (await readFile(path, 'utf8')).trim();
        return pid || 'unknown';
    } catch (err) {
        // The holder may have released the lock between open() and here.
        if (isErrnoCode(err, 'ENOENT')) return 'unknown';
        throw new IOError(`Failed to read lock ${path}: ${describeError(err)}`, path, { cause: err });
    }
}

/**
 * Creates `<directory>/.locale-modules.lock` exclusively and writes the PID.
 *
 * @throws LockError when another run holds the lock
 * @throws IOError when the directory or lock file cannot be created
 */
export async function acquireLock(directory: string): Promise<DirectoryLock> {
    const path = join(directory, LOCK_FILE_NAME);

    try {
        await mkdir(directory, { recursive: true });
    } catch (err) {
        throw new IOError(`Failed to create directory ${directory}: ${describeError(err)}`, directory, { cause: err });
    }

    let handle: FileHandle;
    try {
        handle = await open(path, 'wx');
    } catch (err) {
        if (isErrnoCode(err, 'EEXIST')) {
            const holder = await readLockHolder(path);
            throw new LockError(
                `Destination ${directory} is locked by another run (pid ${holder}). Remove ${path} if that run is gone.`,
                path,
                { cause: err }
            );
        }
        throw new IOError(`Failed to create lock ${path}: ${describeError(err)}`, path, { cause: err });
    }

    try {
        await handle.writeFile(`${process.pid}\n`, 'utf8');
    } finally {
        await handle.close();
    }

    let released = false;
    return {
        path,
        async release() {
            if (released) return;
            released = true;
            await rm(path, { force: true });
        },
    };
}
