import { describe, it, expect } from 'vitest';
import { compareLocaleTables, valuesEqual, isEmptyDiff } from '../../src/table/compare.js';

describe('compareLocaleTables', () => {
    it('finds missing, extra and changed keys', () => {
        const expected = { save: 'Zapisz', cancel: 'Anuluj', title: 'Tytuł' };
        const actual = { save: 'Zapisz', title: 'Nagłówek', back: 'Wstecz' };

        expect(compareLocaleTables(expected, actual)).toEqual({
            missing: ['cancel'],
            extra: ['back'],
            changed: ['title'],
        });
    });

    it('reports no differences for equal tables in another key order', () => {
        const diff = compareLocaleTables(
            { save: 'Zapisz', items: { one: 'plik', other: 'pliki' } },
            { items: { other: 'pliki', one: 'plik' }, save: 'Zapisz' }
        );
        expect(isEmptyDiff(diff)).toBe(true);
    });
});

describe('valuesEqual', () => {
    it('compares lists in order', () => {
        expect(valuesEqual(['a', 'b'], ['a', 'b'])).toBe(true);
        expect(valuesEqual(['a', 'b'], ['b', 'a'])).toBe(false);
    });

    it('does not equate a list with a mapping', () => {
        expect(valuesEqual(['a'], { 0: 'a' })).toBe(false);
    });

    it('distinguishes scalar types', () => {
        expect(valuesEqual(1, '1')).toBe(false);
        expect(valuesEqual(null, null)).toBe(true);
        expect(valuesEqual(true, true)).toBe(true);
    });

    it('compares nested groups by size', () => {
        expect(valuesEqual({ one: 'x' }, { one: 'x', other: 'y' })).toBe(false);
    });
});
