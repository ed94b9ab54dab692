import { describe, expect, it } from 'vitest';
import { DEV_VERBOSITY, VERBOSITY_NONE, parseVerbosity, resolveVerbosity } from './env';

describe('parseVerbosity', () => {
    it('parses names and non-negative integers', () => {
        expect(parseVerbosity('none')).toBe(VERBOSITY_NONE);
        expect(parseVerbosity(' OFF ')).toBe(VERBOSITY_NONE);
        expect(parseVerbosity('4')).toBe(4);
    });

    it('rejects anything else', () => {
        expect(parseVerbosity(undefined)).toBeUndefined();
        expect(parseVerbosity('')).toBeUndefined();
        expect(parseVerbosity('-1')).toBeUndefined();
        expect(parseVerbosity('1.5')).toBeUndefined();
        expect(parseVerbosity('loud')).toBeUndefined();
    });
});

describe('resolveVerbosity', () => {
    it('prefers an explicit value', () => {
        expect(resolveVerbosity({ verbosity: 2, env: { DEBUG_MODE: '1', LOG_VERBOSITY: '5' } })).toBe(2);
    });

    it('opens everything in debug mode', () => {
        expect(resolveVerbosity({ env: { DEBUG_MODE: 'yes', LOG_VERBOSITY: '0' } })).toBe(Number.POSITIVE_INFINITY);
    });

    it('reads LOG_VERBOSITY', () => {
        expect(resolveVerbosity({ env: { LOG_VERBOSITY: '3', NODE_ENV: 'production' } })).toBe(3);
        expect(resolveVerbosity({ env: { LOG_VERBOSITY: 'none' } })).toBe(VERBOSITY_NONE);
    });

    it('falls back on NODE_ENV', () => {
        expect(resolveVerbosity({ env: { NODE_ENV: 'production' } })).toBe(0);
        expect(resolveVerbosity({ env: { NODE_ENV: 'production' }, prodDefault: 2 })).toBe(2);
        expect(resolveVerbosity({ env: { NODE_ENV: 'development', LOG_VERBOSITY: 'loud' } })).toBe(DEV_VERBOSITY);
        expect(resolveVerbosity({ env: {} })).toBe(DEV_VERBOSITY);
    });

    it('keeps an explicit Infinity over the production default', () => {
        expect(resolveVerbosity({ verbosity: Number.POSITIVE_INFINITY, env: { NODE_ENV: 'production' } }))
            .toBe(Number.POSITIVE_INFINITY);
    });

    it('ignores a NaN explicit value', () => {
        expect(resolveVerbosity({ verbosity: Number.NaN, env: { LOG_VERBOSITY: '2' } })).toBe(2);
    });
});
