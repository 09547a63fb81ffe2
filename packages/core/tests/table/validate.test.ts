import { describe, it, expect } from 'vitest';
import { parse } from 'yaml';
import { validateTranslationTable, validateRuleSet } from '../../src/table/validate.js';
import { MalformedInputError } from '../../src/types/index.js';

describe('validateTranslationTable', () => {
    it('returns a valid table unchanged', () => {
        const table = { pl: { save: 'Zapisz', items: { one: 'plik', other: 'pliki' } } };
        expect(validateTranslationTable(table)).toEqual(table);
    });

    it('rejects an absent document', () => {
        expect(() => validateTranslationTable(undefined, 'locales.yml')).toThrow(
            'Translation table in locales.yml is empty'
        );
    });

    it('names the offending locale', () => {
        try {
            validateTranslationTable({ en: {}, pl: 'Zapisz' }, 'locales.yml');
            expect.fail('expected MalformedInputError');
        } catch (err) {
            expect(err).toBeInstanceOf(MalformedInputError);
            expect((err as MalformedInputError).path).toBe('pl');
            expect((err as MalformedInputError).message).toContain('Malformed translation table in locales.yml at "pl"');
        }
    });

    it('rejects a top-level scalar', () => {
        expect(() => validateTranslationTable('pl')).toThrow(MalformedInputError);
    });

    it('accepts regional and script locale names', () => {
        const table = { 'pt-BR': { save: 'Salvar' }, zh_Hant: { save: '儲存' } };
        expect(validateTranslationTable(table)).toEqual(table);
    });

    it.each(['..', '.', 'a/b', '', '-pl', 'pl.old'])('rejects the locale name %j', (locale) => {
        expect(() => validateTranslationTable({ [locale]: { save: 'x' } }, 'locales.yml')).toThrow(
            MalformedInputError
        );
    });

    it('names the bad locale in the message', () => {
        expect(() => validateTranslationTable({ '..': { save: 'x' } }, 'locales.yml')).toThrow(
            'Malformed translation table in locales.yml at "..": Locale name may only contain'
        );
    });

    it('rejects a __proto__ key instead of dropping it', () => {
        const data: unknown = parse('pl:\n  __proto__: X\n  save: Y\n');

        try {
            validateTranslationTable(data, 'locales.yml');
            expect.fail('expected MalformedInputError');
        } catch (err) {
            expect(err).toBeInstanceOf(MalformedInputError);
            expect((err as MalformedInputError).path).toBe('pl.__proto__');
            expect((err as MalformedInputError).message).toBe(
                'Malformed translation table in locales.yml at "pl.__proto__": Key "__proto__" is not supported'
            );
        }
    });

    it('finds a __proto__ key in a nested group', () => {
        const data: unknown = parse('pl:\n  errors:\n    blank: puste\n    __proto__: X\n');

        expect(() => validateTranslationTable(data)).toThrow('at "pl.errors.__proto__"');
    });

    it('rejects integers that cannot be held exactly', () => {
        const data: unknown = parse('pl:\n  support_phone: 48123456789012345678\n');

        try {
            validateTranslationTable(data, 'locales.yml');
            expect.fail('expected MalformedInputError');
        } catch (err) {
            expect(err).toBeInstanceOf(MalformedInputError);
            expect((err as MalformedInputError).path).toBe('pl.support_phone');
            expect((err as MalformedInputError).message).toBe(
                'Malformed translation table in locales.yml at "pl.support_phone": ' +
                'Integer is too large to represent exactly; quote it to keep it as text'
            );
        }
    });

    it('finds an unsafe integer inside a list', () => {
        expect(() => validateTranslationTable({ pl: { codes: [1, 2 ** 60] } })).toThrow('at "pl.codes.1"');
    });

    it('keeps safe integers, floats and quoted big numbers', () => {
        const data: unknown = parse(
            'pl:\n  max_items: 9007199254740991\n  ratio: 0.5\n  support_phone: "48123456789012345678"\n'
        );
        expect(validateTranslationTable(data)).toEqual({
            pl: { max_items: 9007199254740991, ratio: 0.5, support_phone: '48123456789012345678' },
        });
    });
});

describe('validateRuleSet', () => {
    it('accepts a bare list of rules', () => {
        const ruleSet = validateRuleSet([{ module: 'auth', patterns: ['sign_in'] }]);
        expect(ruleSet).toEqual({
            fallback_module: 'other',
            rules: [{ module: 'auth', patterns: ['sign_in'] }],
        });
    });

    it('accepts a wrapped rule set with a custom fallback', () => {
        const ruleSet = validateRuleSet({ fallback_module: 'uncategorized', rules: [] });
        expect(ruleSet.fallback_module).toBe('uncategorized');
    });

    it('reports the path of a bad rule', () => {
        try {
            validateRuleSet({ rules: [{ module: 'auth', patterns: ['sign_in'] }, { module: 'forms' }] }, 'module-rules.yaml');
            expect.fail('expected MalformedInputError');
        } catch (err) {
            expect(err).toBeInstanceOf(MalformedInputError);
            expect((err as MalformedInputError).path).toBe('rules.1.patterns');
        }
    });
});
