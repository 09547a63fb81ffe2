/**
 * Error classes shared by core and CLI.
 * Core only ever throws MalformedInputError; file-system failures are wrapped
 * by the CLI.
 */

export type LocaleModulesErrorCode =
    | 'MALFORMED_INPUT'
    | 'IO_FAILURE'
    | 'LOCK_HELD';

/**
 * Base class for every error this project throws on purpose.
 */
export class LocaleModulesError extends Error {
    constructor(
        message: string,
        public readonly code: LocaleModulesErrorCode,
        options?: ErrorOptions
    ) {
        super(message, options);
        this.name = 'LocaleModulesError';
        Object.setPrototypeOf(this, new.target.prototype);
    }
}

/**
 * Input is absent or not shaped as expected (locale → key → value, or a rule file).
 * `path` is the dotted location of the first offending node, when known.
 */
export class MalformedInputError extends LocaleModulesError {
    constructor(
        message: string,
        public readonly path?: string,
        options?: ErrorOptions
    ) {
        super(message, 'MALFORMED_INPUT', options);
        this.name = 'MalformedInputError';
    }
}

/**
 * A read, write, mkdir or unlink failed. `path` is the file or directory involved.
 */
export class IOError extends LocaleModulesError {
    constructor(
        message: string,
        public readonly path: string,
        options?: ErrorOptions
    ) {
        super(message, 'IO_FAILURE', options);
        this.name = 'IOError';
    }
}

/**
 * Another run owns the destination directory.
 */
export class LockError extends LocaleModulesError {
    constructor(
        message: string,
        public readonly lockPath: string,
        options?: ErrorOptions
    ) {
        super(message, 'LOCK_HELD', options);
        this.name = 'LockError';
    }
}
