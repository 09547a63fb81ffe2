/**
 * Helpers for inspecting caught values.
 */

/**
 * Message of an Error, or the value itself as a string.
 */
export function describeError(err: unknown): string {
    return err instanceof Error ? err.message : String(err);
}

/**
 * True when err is a Node.js system error with the given code (ENOENT, EEXIST, ...).
 */
export function isErrnoCode(err: unknown, code: string): boolean {
    return err instanceof Error && 'code' in err && err.code === code;
}
