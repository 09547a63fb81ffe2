import { readFile } from 'node:fs/promises';
import { parse } from 'yaml';
import { deepMerge, validateTranslationTable } from '@locale-modules/core';
import { IOError, MalformedInputError, type TranslationTable } from '@locale-modules/shared';
import { describeError } from '../utils/errors.js';

/**
 * The host side of translation loading: register paths, then reload once.
 */
export interface TranslationRegistry {
    addLoadPaths(paths: readonly string[]): void;
    reload(): Promise<void>;
}

/**
 * A file read by the last reload and the locales it defined.
 */
export interface LoadedSource {
    path: string;
    locales: string[];
}

/**
 * In-memory registry backed by YAML files.
 * Files are merged in load-path order; later files override earlier ones.
 */
export class YamlTranslationRegistry implements TranslationRegistry {
    private loadPath: string[] = [];
    private store: TranslationTable = {};
    private loaded: LoadedSource[] = [];

    addLoadPaths(paths: readonly string[]): void {
        for (const path of paths) {
            if (!this.loadPath.includes(path)) {
                this.loadPath.push(path);
            }
        }
    }

    get loadPaths(): readonly string[] {
        return this.loadPath;
    }

    /**
     * Re-reads every registered file from scratch.
     * @throws IOError if a file cannot be read
     * @throws MalformedInputError if a file is not a locale → key → value document
     */
    async reload(): Promise<void> {
        const store: TranslationTable = {};
        const loaded: LoadedSource[] = [];

        for (const path of this.loadPath) {
            let content: string;
            try {
                content = await readFile(path, 'utf8');
            } catch (err) {
                throw new IOError(`Failed to read ${path}: ${describeError(err)}`, path, { cause: err });
            }

            let data: unknown;
            try {
                data = parse(content);
            } catch (err) {
                throw new MalformedInputError(`Invalid YAML in ${path}: ${describeError(err)}`, undefined, { cause: err });
            }

            const table = validateTranslationTable(data, path);
            for (const [locale, entries] of Object.entries(table)) {
                store[locale] = deepMerge(store[locale] ?? {}, entries);
            }
            loaded.push({ path, locales: Object.keys(table) });
        }

        this.store = store;
        this.loaded = loaded;
    }

    /**
     * Merged translations from the last reload.
     */
    table(): TranslationTable {
        return this.store;
    }

    sources(): readonly LoadedSource[] {
        return this.loaded;
    }
}
