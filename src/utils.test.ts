import { describe, expect, it } from 'vitest';
import { BAD_KEY, MISSING_VALUE, errorMessage, isPlainObject, normalizeError, toPairs, truncateFields } from './utils';

describe('toPairs', () => {
    it('pairs keys with values in order, duplicates included', () => {
        expect(toPairs(['a', 1, 'b', 2, 'a', 3])).toEqual([['a', 1], ['b', 2], ['a', 3]]);
    });

    it('gives a trailing key the missing-value marker', () => {
        expect(toPairs(['a', 1, 'b'])).toEqual([['a', 1], ['b', MISSING_VALUE]]);
    });

    it('stringifies non-string keys', () => {
        expect(toPairs([1, 'one', null, 'nil', Symbol('s'), 'sym'])).toEqual([['1', 'one'], ['null', 'nil'], ['Symbol(s)', 'sym']]);
    });

    it('falls back when a key cannot be stringified', () => {
        const hostile = { toString: () => { throw new Error('no'); } };
        expect(toPairs([hostile, 1])).toEqual([[BAD_KEY, 1]]);
    });

    it('handles an empty list', () => {
        expect(toPairs([])).toEqual([]);
    });
});

describe('normalizeError', () => {
    it('keeps name, message and custom fields', () => {
        const err = Object.assign(new TypeError('bad input'), { field: 'email' });
        expect(normalizeError(err, false)).toEqual({ name: 'TypeError', message: 'bad input', field: 'email' });
    });

    it('adds the stack on request', () => {
        const err = new Error('x');
        expect(normalizeError(err, true).stack).toBe(err.stack);
    });

    it('defaults the name of error-like objects', () => {
        expect(normalizeError({ message: 'plain' }, true)).toEqual({ name: 'Error', message: 'plain' });
    });
});

describe('errorMessage', () => {
    it('prefers the message of error-likes', () => {
        expect(errorMessage(new Error('m'))).toBe('m');
        expect(errorMessage(404)).toBe('404');
    });
});

describe('truncateFields', () => {
    it('is a no-op when disabled', () => {
        const obj = { s: 'long string' };
        expect(truncateFields(obj, 0)).toBe(obj);
    });

    it('truncates only top-level strings', () => {
        const nested = { s: 'abcdef' };
        expect(truncateFields({ s: 'abcdef', nested }, 3)).toEqual({ s: 'abc...[truncated]', nested });
    });
});

describe('isPlainObject', () => {
    it('accepts object literals and null-prototype objects only', () => {
        expect(isPlainObject({})).toBe(true);
        expect(isPlainObject(Object.create(null))).toBe(true);
        expect(isPlainObject([])).toBe(false);
        expect(isPlainObject(new Date())).toBe(false);
        expect(isPlainObject('x')).toBe(false);
    });
});
