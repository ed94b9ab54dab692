import type { EnvBag, LogEntry } from './types';
import { setOwn } from './utils';

/* ---------------------------------- Types ---------------------------------- */

export type ColorMode = 'auto' | 'on' | 'off';

export type EntryFormatter = (entry: LogEntry) => string;

const CSI = '\x1b[';
const colors = {
    red:  (s: string) => `${CSI}31m${s}${CSI}39m`,
    cyan: (s: string) => `${CSI}36m${s}${CSI}39m`,
    dim:  (s: string) => `${CSI}2m${s}${CSI}22m`,
};

/** Top-level keys of a JSON line; values using one of these are emitted as `_<key>`. */
export const RESERVED_KEYS: readonly string[] = ['time', 'level', 'v', 'logger', 'msg', 'error'];

/* ------------------------------- Formatters -------------------------------- */

/**
 * Minimal console formatter: `[time] INFO(v=1) name: msg {"k":1}`.
 * Color is auto by default (TTY and not production per `env`, default `process.env`).
 */
export function createConsoleFormatter(color: ColorMode = 'auto', env?: EnvBag): EntryFormatter {
    const nodeEnv = (env ?? (typeof process !== 'undefined' ? process.env : undefined))?.NODE_ENV;
    const isTTY = typeof process !== 'undefined' && !!process.stdout?.isTTY;
    const useColor = color === 'on' || (color === 'auto' && isTTY && nodeEnv !== 'production');

    return (entry) => {
        let prefix = entry.level === 'error' ? 'ERROR' : `INFO(v=${entry.v ?? 0})`;
        if (entry.time) prefix = `[${entry.time}] ${prefix}`;
        if (useColor) {
            if (entry.level === 'error') prefix = colors.red(prefix);
            else if ((entry.v ?? 0) > 0) prefix = colors.cyan(prefix);
            else prefix = colors.dim(prefix);
        }
        const head = entry.logger ? `${prefix} ${entry.logger}: ${entry.msg}` : `${prefix} ${entry.msg}`;

        const data: Record<string, unknown> = entry.error === undefined ? {} : { error: entry.error };
        for (const [k, v] of Object.entries(entry.values)) setOwn(data, k, v);
        return Object.keys(data).length === 0 ? head : `${head} ${safeJson(data)}`;
    };
}

/** One flat JSON object per entry; fixed fields first, then values. */
export function formatJsonLine(entry: LogEntry): string {
    const out: Record<string, unknown> = {};
    if (entry.time !== undefined) out.time = entry.time;
    out.level = entry.level;
    if (entry.v !== undefined) out.v = entry.v;
    if (entry.logger !== undefined) out.logger = entry.logger;
    out.msg = entry.msg;
    if (entry.error !== undefined) out.error = entry.error;
    for (const [k, v] of Object.entries(entry.values)) {
        setOwn(out, RESERVED_KEYS.includes(k) ? `_${k}` : k, v);
    }
    return safeJson(out);
}

/* ----------------------------- Format helpers ------------------------------ */

/**
 * JSON.stringify that survives cycles and bigint.
 * Only a reference back to an ancestor is a cycle; shared siblings render in full.
 */
export function safeJson(data: unknown): string {
    const ancestors: unknown[] = [];
    try {
        return JSON.stringify(data, function (this: unknown, _k: string, v: unknown) {
            if (typeof v === 'bigint') return v.toString();
            if (v === null || typeof v !== 'object') return v;
            // `this` is the holder of `v`; unwind to it before checking the path
            while (ancestors.length > 0 && ancestors[ancestors.length - 1] !== this) ancestors.pop();
            if (ancestors.includes(v)) return '[Circular]';
            ancestors.push(v);
            return v;
        });
    } catch {
        try { return String(data); } catch { return '[Unserializable]'; }
    }
}
