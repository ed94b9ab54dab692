import type { KeyValue } from './types';

/* ------------------------------- Key/values -------------------------------- */

/** Value given to a trailing key that has no value. */
export const MISSING_VALUE = '[MissingValue]';

/** Key used when a non-string key cannot be stringified. */
export const BAD_KEY = '[BadKey]';

/**
 * Turn a flat `key, value, key, value...` list into ordered pairs.
 * - Order and duplicate keys are preserved.
 * - An odd trailing key gets {@link MISSING_VALUE}.
 * - Non-string keys go through `String()`; if that throws the key becomes {@link BAD_KEY}.
 */
export function toPairs(keysAndValues: readonly unknown[]): KeyValue[] {
    const out: KeyValue[] = [];
    for (let i = 0; i < keysAndValues.length; i += 2) {
        const key = toKey(keysAndValues[i]);
        out.push(i + 1 < keysAndValues.length ? [key, keysAndValues[i + 1]] : [key, MISSING_VALUE]);
    }
    return out;
}

function toKey(k: unknown): string {
    if (typeof k === 'string') return k;
    try { return String(k); } catch { return BAD_KEY; }
}

/** Define `key` as an own enumerable field, so names like `__proto__` stay plain data. */
export function setOwn(obj: Record<string, unknown>, key: string, value: unknown): void {
    Object.defineProperty(obj, key, { value, enumerable: true, writable: true, configurable: true });
}

/* ------------------------------ Error helpers ------------------------------ */

export type ErrorLike = { name?: unknown; message: unknown; stack?: unknown };

/** Fast-ish error-like detection */
export function isErrorLike(e: unknown): e is ErrorLike {
    return typeof e === 'object' && e !== null && 'message' in e;
}

/**
 * Convert an error into a small, JSON-friendly object.
 * - Always includes `name` and `message`; `stack` only when requested.
 * - Copies own enumerable custom fields but never overrides `name|message|stack`.
 */
export function normalizeError(err: ErrorLike, includeStack: boolean): Record<string, unknown> {
    const out: Record<string, unknown> = {
        name: typeof err.name === 'string' && err.name ? err.name : 'Error',
        message: err.message,
    };
    if (includeStack && typeof err.stack === 'string') out.stack = err.stack;

    for (const [k, v] of Object.entries(err)) {
        if (k === 'name' || k === 'message' || k === 'stack') continue;
        setOwn(out, k, v);
    }
    return out;
}

/** Best-effort message for a thrown value. */
export function errorMessage(e: unknown): string {
    if (isErrorLike(e) && typeof e.message === 'string') return e.message;
    try { return String(e); } catch { return '[unprintable]'; }
}

/* ----------------------------- Data transformers --------------------------- */

export const TRUNCATED_SUFFIX = '...[truncated]';

/**
 * Shallow truncation of long string fields.
 * - Strings longer than `maxPerField` are sliced and post-fixed with "...[truncated]".
 * - BigInt is stringified to avoid JSON issues.
 * Returns a shallow copy; `maxPerField <= 0` returns the input.
 */
export function truncateFields(obj: Record<string, unknown>, maxPerField: number): Record<string, unknown> {
    if (!maxPerField || maxPerField <= 0) return obj;
    const clone: Record<string, unknown> = { ...obj };
    for (const k of Object.keys(clone)) {
        const v = clone[k];
        if (typeof v === 'bigint') setOwn(clone, k, v.toString());
        else if (typeof v === 'string' && v.length > maxPerField) setOwn(clone, k, v.slice(0, maxPerField) + TRUNCATED_SUFFIX);
    }
    return clone;
}

/** Plain-object detection (no prototype or direct Object prototype) */
export function isPlainObject(v: unknown): v is Record<string, unknown> {
    if (v === null || typeof v !== 'object') return false;
    const proto: unknown = Object.getPrototypeOf(v);
    return proto === Object.prototype || proto === null;
}
