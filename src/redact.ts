// src/redact.ts
// Optional masking helpers for sink output (separate entry point).

import { setOwn } from './utils';

/* ---------------------------------- Types ---------------------------------- */

export type RedactOptions = {
    /** Replace value for matching keys; default '***' */
    mask?: string;
    /** Case-insensitive key matching. Default: false */
    ciKeys?: boolean;
    /** Partial key match (e.g., containing 'token'). Default: false */
    partialMatch?: boolean;
    /** Max recursion depth; 0 = only root. Default: 8 */
    maxDepth?: number;
    /** Max visited nodes. Default: 50_000 */
    maxNodes?: number;
};

/* --------------------------- Default mask key set --------------------------- */

export const DEFAULT_MASK_KEYS: readonly string[] = Object.freeze([
    'password', 'token', 'idToken', 'accessToken', 'refreshToken', 'authorization',
    'secret', 'clientSecret', 'apiKey', 'x-api-key',
    'card', 'cvv', 'ssn',
]);

/* ------------------------------- Redact core ------------------------------- */

type Walk = {
    mask: string;
    maxDepth: number;
    maxNodes: number;
    matchKey: (k: string) => boolean;
    seen: WeakSet<object>;
    nodes: number;
};

/**
 * Deep copy of `value` with the values of matching keys replaced by the mask.
 * Guards against cycles, depth and size; Maps become entry arrays, Sets become arrays.
 */
export function redact(value: unknown, keys: Iterable<string>, opts: RedactOptions = {}): unknown {
    if (value === null || typeof value !== 'object') return value;
    const walk: Walk = {
        mask: opts.mask ?? '***',
        maxDepth: opts.maxDepth ?? 8,
        maxNodes: opts.maxNodes ?? 50_000,
        matchKey: makeKeyMatcher(keys, !!opts.ciKeys, !!opts.partialMatch),
        seen: new WeakSet<object>(),
        nodes: 0,
    };
    return deepRedact(value, walk, 0);
}

/**
 * Mask function for `FuncSinkOptions.mask`.
 * No keys → DEFAULT_MASK_KEYS; an empty list → identity.
 */
export function makeMask(keys?: readonly string[], opts?: RedactOptions): (value: unknown) => unknown {
    if (keys && keys.length === 0) return (x) => x;
    const set = new Set(keys ?? DEFAULT_MASK_KEYS);
    return (x) => redact(x, set, opts);
}

/* ------------------------------- Internals --------------------------------- */

function deepRedact(value: unknown, w: Walk, depth: number): unknown {
    if (value === null || typeof value !== 'object') return value;

    if (depth >= w.maxDepth) return '[DepthLimit]';
    if (w.nodes++ > w.maxNodes) return '[TooLarge]';
    if (w.seen.has(value)) return '[Circular]';
    // `seen` holds the current path only, so shared siblings are copied in full
    w.seen.add(value);
    try {
        return copyNode(value, w, depth);
    } finally {
        w.seen.delete(value);
    }
}

function copyNode(value: object, w: Walk, depth: number): unknown {
    if (Array.isArray(value)) {
        return value.map((item: unknown) => deepRedact(item, w, depth + 1));
    }
    if (value instanceof Map) {
        const out: [unknown, unknown][] = [];
        for (const [k, v] of value) {
            const masked = typeof k === 'string' && w.matchKey(k);
            out.push([k, masked ? w.mask : deepRedact(v, w, depth + 1)]);
        }
        return out;
    }
    if (value instanceof Set) {
        const out: unknown[] = [];
        for (const v of value) out.push(deepRedact(v, w, depth + 1));
        return out;
    }
    if (value instanceof Error) {
        const out: Record<string, unknown> = { name: value.name, message: value.message };
        copyKeys(value, out, w, depth);
        return out;
    }
    if (value instanceof Date) return new Date(value.getTime());

    const out: Record<string, unknown> = {};
    copyKeys(value, out, w, depth);
    return out;
}

/** Own enumerable keys; class instances are treated like plain bags. */
function copyKeys(src: object, out: Record<string, unknown>, w: Walk, depth: number): void {
    for (const k of Object.keys(src)) {
        if (Object.prototype.hasOwnProperty.call(out, k)) continue;
        try {
            const v: unknown = Reflect.get(src, k);
            setOwn(out, k, w.matchKey(k) ? w.mask : deepRedact(v, w, depth + 1));
        } catch {
            setOwn(out, k, '[GetterError]');
        }
    }
}

function makeKeyMatcher(keys: Iterable<string>, ci: boolean, partial: boolean): (k: string) => boolean {
    const set = new Set<string>();
    for (const k of keys) set.add(ci ? k.toLowerCase() : k);
    return (k) => {
        const kk = ci ? k.toLowerCase() : k;
        if (set.has(kk)) return true;
        if (partial) for (const sk of set) if (kk.includes(sk)) return true;
        return false;
    };
}
