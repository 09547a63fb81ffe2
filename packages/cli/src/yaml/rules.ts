import { parseDocument, isSeq, isMap, YAMLSeq, type Document } from 'yaml';
import { readFile, writeFile } from 'node:fs/promises';
import { isErrnoCode } from '../utils/errors.js';

export interface AppendPatternOptions {
    /** Insert a new module before this one instead of appending it */
    before?: string;
    /** Copied (comments included) when filePath does not exist yet */
    seedPath?: string;
}

/**
 * Finds the rule list of a rules document: a top-level sequence, or the
 * sequence under `rules`. Creates `rules` when the document has none.
 */
function findRuleSequence(doc: Document, filePath: string): YAMLSeq {
    const root = doc.contents;

    if (isSeq(root)) {
        return root;
    }

    if (isMap(root)) {
        const rules = root.get('rules');
        if (isSeq(rules)) {
            return rules;
        }
        if (rules === undefined || rules === null) {
            const seq = new YAMLSeq();
            root.set('rules', seq);
            return seq;
        }
        throw new Error(`Invalid YAML structure in ${filePath}: "rules" must be a list.`);
    }

    // Empty or scalar document
    const seq = new YAMLSeq();
    doc.set('rules', seq);
    return seq;
}

/**
 * Adds a pattern to a module rule in a YAML rules file while preserving comments.
 *
 * - module exists: pattern appended to its `patterns`
 * - module missing: new `{ module, patterns: [pattern] }` appended, or inserted
 *   before `options.before`
 *
 * @throws Error when `before` names an unknown module or the file is mis-shaped
 */
export async function appendPatternToYaml(
    filePath: string,
    module: string,
    pattern: string,
    options: AppendPatternOptions = {}
): Promise<void> {
    let content = '';
    try {
        content = await readFile(filePath, 'utf8');
    } catch (err) {
        if (!isErrnoCode(err, 'ENOENT')) {
            throw err;
        }
        content = options.seedPath
            ? await readFile(options.seedPath, 'utf8')
            : '# Module rules (first match wins)\nrules:\n';
    }

    const doc = parseDocument(content || 'rules:');
    const rules = findRuleSequence(doc, filePath);

    const existing = rules.items.find(item => isMap(item) && item.get('module') === module);
    if (isMap(existing)) {
        const patterns = existing.get('patterns');
        if (isSeq(patterns)) {
            patterns.add(doc.createNode(pattern));
        } else if (patterns === undefined || patterns === null) {
            existing.set('patterns', doc.createNode([pattern]));
        } else {
            throw new Error(`Invalid YAML structure in ${filePath}: patterns of "${module}" must be a list.`);
        }
    } else {
        const node = doc.createNode({ module, patterns: [pattern] });
        if (options.before) {
            const before = options.before;
            const index = rules.items.findIndex(item => isMap(item) && item.get('module') === before);
            if (index === -1) {
                throw new Error(`Module "${before}" not found in ${filePath}.`);
            }
            rules.items.splice(index, 0, node);
        } else {
            rules.add(node);
        }
    }

    await writeFile(filePath, doc.toString());
}
