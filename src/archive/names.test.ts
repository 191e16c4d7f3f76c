import { describe, it, expect } from 'vitest';
import {
    name_equals,
    name_contains,
    name_apply,
    name_titleCase,
    pathSegments_split,
    pathRoot_check,
    nameUnsafe_check
} from './names.js';

describe('names', () => {
    it('compares names case-insensitively', () => {
        expect(name_equals('Startup.d', 'STARTUP.D')).toBe(true);
        expect(name_equals('startup.d', 'startup.src')).toBe(false);
    });

    it('matches wildcard filters as case-insensitive substrings', () => {
        expect(name_contains('MENU_ITEMS.D', 'items')).toBe(true);
        expect(name_contains('MENU.D', 'items')).toBe(false);
        expect(name_contains('ANY.TXT', '')).toBe(true);
    });

    it('applies the upper and preserve policies to every origin', () => {
        expect(name_apply('file.txt', 'upper', 'merged')).toBe('FILE.TXT');
        expect(name_apply('Data', 'upper', 'directory')).toBe('DATA');
        expect(name_apply('file.txt', 'preserve', 'file')).toBe('file.txt');
    });

    it('upper-cases only single inserted files under the archive policy', () => {
        expect(name_apply('file.txt', 'archive', 'file')).toBe('FILE.TXT');
        expect(name_apply('file.txt', 'archive', 'merged')).toBe('file.txt');
        expect(name_apply('Data', 'archive', 'directory')).toBe('Data');
    });

    it('title-cases each run of letters', () => {
        expect(name_titleCase('FILE.TXT')).toBe('File.Txt');
        expect(name_titleCase('_work')).toBe('_Work');
        expect(name_titleCase('a1b')).toBe('A1B');
        expect(name_titleCase('MENU_ITEMS.D')).toBe('Menu_Items.D');
    });

    it('splits internal paths on either separator', () => {
        expect(pathSegments_split('_work/data\\scripts')).toEqual(['_work', 'data', 'scripts']);
        expect(pathSegments_split('./a//b/')).toEqual(['a', 'b']);
        expect(pathSegments_split(['a', '', '.', 'b'])).toEqual(['a', 'b']);
        expect(pathSegments_split('')).toEqual([]);
    });

    it('recognizes root aliases', () => {
        for (const alias of [undefined, '', '.', '/', '\\', './', '.\\']) {
            expect(pathRoot_check(alias)).toBe(true);
        }
        expect(pathRoot_check('_work')).toBe(false);
        expect(pathRoot_check('./_work')).toBe(false);
    });

    it('flags names that cannot stand as a single node', () => {
        expect(nameUnsafe_check('')).toBe(true);
        expect(nameUnsafe_check('..')).toBe(true);
        expect(nameUnsafe_check('a/b')).toBe(true);
        expect(nameUnsafe_check('a\\b')).toBe(true);
        expect(nameUnsafe_check('..hidden')).toBe(false);
    });

    it('flags the signature entry and the prototype key as reserved', () => {
        expect(nameUnsafe_check('.vdf-signature')).toBe(true);
        expect(nameUnsafe_check('__proto__')).toBe(true);
        expect(nameUnsafe_check('.vdf-signature.bak')).toBe(false);
        expect(nameUnsafe_check('constructor')).toBe(false);
    });
});
