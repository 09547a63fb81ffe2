import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { parse } from 'yaml';
import { appendPatternToYaml } from '../src/yaml/rules.js';

const INITIAL_RULES = `# Workspace rules
fallback_module: other
rules:
  - module: auth
    patterns:
      - sign_in
  - module: common
    patterns: [save]
`;

describe('YAML Pattern Appending', () => {
    let dir: string;
    let rulesFile: string;

    beforeEach(async () => {
        dir = await mkdtemp(join(tmpdir(), 'locale-modules-rules-'));
        rulesFile = join(dir, 'module-rules.yaml');
        await writeFile(rulesFile, INITIAL_RULES, 'utf8');
    });

    afterEach(async () => {
        await rm(dir, { recursive: true, force: true });
    });

    async function readRules(): Promise<unknown> {
        return parse(await readFile(rulesFile, 'utf8'));
    }

    it('appends to an existing module while preserving comments', async () => {
        await appendPatternToYaml(rulesFile, 'auth', 'password');

        const content = await readFile(rulesFile, 'utf8');
        expect(content.startsWith('# Workspace rules\n')).toBe(true);
        expect(await readRules()).toEqual({
            fallback_module: 'other',
            rules: [
                { module: 'auth', patterns: ['sign_in', 'password'] },
                { module: 'common', patterns: ['save'] },
            ],
        });
    });

    it('appends a new module at the end', async () => {
        await appendPatternToYaml(rulesFile, 'emails', 'mailer');

        expect(await readRules()).toEqual({
            fallback_module: 'other',
            rules: [
                { module: 'auth', patterns: ['sign_in'] },
                { module: 'common', patterns: ['save'] },
                { module: 'emails', patterns: ['mailer'] },
            ],
        });
    });

    it('inserts a new module before another one', async () => {
        await appendPatternToYaml(rulesFile, 'emails', 'mailer', { before: 'common' });

        expect(await readRules()).toEqual({
            fallback_module: 'other',
            rules: [
                { module: 'auth', patterns: ['sign_in'] },
                { module: 'emails', patterns: ['mailer'] },
                { module: 'common', patterns: ['save'] },
            ],
        });
    });

    it('rejects an unknown "before" module and leaves the file alone', async () => {
        await expect(
            appendPatternToYaml(rulesFile, 'emails', 'mailer', { before: 'missing' })
        ).rejects.toThrow('Module "missing" not found');

        expect(await readFile(rulesFile, 'utf8')).toBe(INITIAL_RULES);
    });

    it('keeps a bare rule list a list', async () => {
        await writeFile(rulesFile, '- module: auth\n  patterns: [sign_in]\n', 'utf8');

        await appendPatternToYaml(rulesFile, 'common', 'save');

        expect(await readRules()).toEqual([
            { module: 'auth', patterns: ['sign_in'] },
            { module: 'common', patterns: ['save'] },
        ]);
    });

    it('creates "rules" in a document that only has comments', async () => {
        await writeFile(rulesFile, '# Empty file\n', 'utf8');

        await appendPatternToYaml(rulesFile, 'auth', 'sign_in');

        expect(await readRules()).toEqual({ rules: [{ module: 'auth', patterns: ['sign_in'] }] });
    });

    it('creates a missing file', async () => {
        await rm(rulesFile);

        await appendPatternToYaml(rulesFile, 'auth', 'sign_in');

        expect(await readRules()).toEqual({ rules: [{ module: 'auth', patterns: ['sign_in'] }] });
    });

    it('seeds a missing file from another rules file', async () => {
        const seedFile = join(dir, 'seed.yaml');
        await writeFile(seedFile, INITIAL_RULES, 'utf8');
        await rm(rulesFile);

        await appendPatternToYaml(rulesFile, 'common', 'cancel', { seedPath: seedFile });

        const content = await readFile(rulesFile, 'utf8');
        expect(content.startsWith('# Workspace rules\n')).toBe(true);
        expect(await readRules()).toEqual({
            fallback_module: 'other',
            rules: [
                { module: 'auth', patterns: ['sign_in'] },
                { module: 'common', patterns: ['save', 'cancel'] },
            ],
        });
        expect(await readFile(seedFile, 'utf8')).toBe(INITIAL_RULES);
    });

    it('rejects a "rules" value that is not a list', async () => {
        await writeFile(rulesFile, 'rules: 5\n', 'utf8');

        await expect(appendPatternToYaml(rulesFile, 'auth', 'sign_in')).rejects.toThrow('"rules" must be a list');
    });
});
