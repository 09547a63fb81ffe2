/**
 * YAML serialization of categorized buckets.
 *
 * Each bucket becomes one document shaped like the source table,
 * `{ <locale>: { <key>: <value>, ... } }`, so the loader can merge it back
 * under the same locale.
 *
 * Pure: returns file names and contents, the CLI writes them.
 */

import { Document, visit } from 'yaml';
import { DEFAULT_EXTENSION } from '../types/index.js';
import type { LocaleCategorization } from '../categorizer/types.js';

/**
 * A module file ready to be written under `<destination>/<locale>/`.
 */
export interface ModuleDocument {
    module: string;
    fileName: string;
    keyCount: number;
    content: string;
}

/**
 * Plain scalars a YAML 1.1 reader (Psych, PyYAML) turns into booleans.
 * YAML 1.2 leaves them as strings, so the 1.2 writer does not quote them.
 */
const YAML_11_BOOLEANS = /^(?:y|Y|yes|Yes|YES|n|N|no|No|NO|on|On|ON|off|Off|OFF)$/;

/**
 * Serialize a translation document. Long strings are never folded so
 * HTML and placeholders stay on one line. Strings such as the `no` locale
 * are double-quoted so YAML 1.1 hosts read them back as strings.
 */
export function serializeDocument(document: unknown): string {
    const doc = new Document(document);
    visit(doc, {
        Scalar(_, node) {
            if (typeof node.value === 'string' && YAML_11_BOOLEANS.test(node.value)) {
                node.type = 'QUOTE_DOUBLE';
            }
        },
    });
    return doc.toString({ lineWidth: 0 });
}

/**
 * Build one document per non-empty bucket, in bucket order.
 */
export function buildModuleDocuments(
    categorization: LocaleCategorization,
    extension: string = DEFAULT_EXTENSION
): ModuleDocument[] {
    const { locale, buckets } = categorization;

    return buckets
        .filter(bucket => bucket.keyCount > 0)
        .map(bucket => ({
            module: bucket.module,
            fileName: `${bucket.module}.${extension}`,
            keyCount: bucket.keyCount,
            content: serializeDocument({ [locale]: bucket.entries }),
        }));
}
