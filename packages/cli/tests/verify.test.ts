import { describe, it, expect } from 'vitest';
import type { TranslationTable } from '@locale-modules/shared';
import { verifyModules } from '../src/loader/verify.js';

const SOURCE: TranslationTable = {
    pl: { save: 'Zapisz', sign_in: 'Zaloguj się' },
    en: { save: 'Save', sign_in: 'Sign in' },
};

describe('verifyModules', () => {
    it('passes when module files reproduce the source', () => {
        const report = verifyModules(
            SOURCE,
            { pl: { sign_in: 'Zaloguj się', save: 'Zapisz' } },
            [
                { path: '/locales/pl/auth.yml', locales: ['pl'] },
                { path: '/locales/pl/common.yml', locales: ['pl'] },
            ],
            ['en']
        );

        expect(report.ok).toBe(true);
        expect(report.locales).toEqual([
            { locale: 'pl', diff: { missing: [], extra: [], changed: [] } },
        ]);
    });

    it('reports missing, extra and changed keys', () => {
        const report = verifyModules(
            SOURCE,
            { pl: { save: 'Zachowaj', mystery_key: '?' } },
            [{ path: '/locales/pl/common.yml', locales: ['pl'] }],
            ['en']
        );

        expect(report.ok).toBe(false);
        expect(report.locales[0].diff).toEqual({
            missing: ['sign_in'],
            extra: ['mystery_key'],
            changed: ['save'],
        });
    });

    it('treats a non-excluded locale without files as fully missing', () => {
        const report = verifyModules(
            SOURCE,
            { pl: { save: 'Zapisz', sign_in: 'Zaloguj się' } },
            [{ path: '/locales/pl/common.yml', locales: ['pl'] }]
        );

        expect(report.ok).toBe(false);
        expect(report.locales.map(l => l.locale)).toEqual(['pl', 'en']);
        expect(report.locales[1].diff.missing).toEqual(['save', 'sign_in']);
    });

    it('flags files whose top-level key does not match the directory', () => {
        const report = verifyModules(
            SOURCE,
            { pl: { save: 'Zapisz' }, en: { sign_in: 'Sign in' } },
            [
                { path: '/locales/pl/common.yml', locales: ['pl'] },
                { path: '/locales/pl/auth.yml', locales: ['en'] },
            ],
            ['en']
        );

        expect(report.violations).toEqual([
            { path: '/locales/pl/auth.yml', message: 'Expected a single top-level key "pl", found "en"' },
        ]);
        expect(report.ok).toBe(false);
    });

    it('flags files with several locales or none', () => {
        const report = verifyModules(
            { pl: {} },
            {},
            [
                { path: '/locales/pl/a.yml', locales: ['pl', 'en'] },
                { path: '/locales/pl/b.yml', locales: [] },
            ]
        );

        expect(report.violations.map(v => v.message)).toEqual([
            'Expected a single top-level key "pl", found "pl", "en"',
            'Expected a single top-level key "pl", found none',
        ]);
    });

    it('reports locales that only exist in module files', () => {
        const report = verifyModules(
            { pl: { save: 'Zapisz' } },
            { pl: { save: 'Zapisz' }, de: { save: 'Speichern' } },
            [
                { path: '/locales/pl/common.yml', locales: ['pl'] },
                { path: '/locales/de/common.yml', locales: ['de'] },
            ]
        );

        expect(report.unexpectedLocales).toEqual(['de']);
        expect(report.ok).toBe(false);
    });

    it('ignores excluded locales on both sides', () => {
        const report = verifyModules(
            { pl: { save: 'Zapisz' }, en: { save: 'Save' } },
            { pl: { save: 'Zapisz' }, en: { save: 'Something else' } },
            [
                { path: '/locales/pl/common.yml', locales: ['pl'] },
                { path: '/locales/en/common.yml', locales: ['en'] },
            ],
            ['en']
        );

        expect(report.ok).toBe(true);
        expect(report.unexpectedLocales).toEqual([]);
    });
});
