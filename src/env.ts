import type { EnvBag } from './types';

/** `LOG_VERBOSITY=NONE|OFF`: no info output at any level. */
export const VERBOSITY_NONE = -1;

/** Verbosity used outside production when nothing else is configured. */
export const DEV_VERBOSITY = 1;

export type ResolveVerbosityOptions = {
    verbosity?: number;
    env?: EnvBag;
    prodDefault?: number;
};

/** `process.env` when running on Node, otherwise undefined. */
export function defaultEnv(): EnvBag | undefined {
    return typeof process !== 'undefined' ? process.env : undefined;
}

/**
 * Parse a `LOG_VERBOSITY` value.
 * Accepts 'NONE'/'OFF' or a non-negative integer; returns `undefined` if unparsable.
 */
export function parseVerbosity(s?: string): number | undefined {
    if (!s) return undefined;
    const v = s.trim().toUpperCase();
    if (v === 'NONE' || v === 'OFF') return VERBOSITY_NONE;
    if (!/^\d+$/.test(v)) return undefined;
    return Number(v);
}

/**
 * Resolve a sink's verbosity threshold in the following order:
 * 1) explicit `verbosity` (anything but NaN; Infinity enables everything)
 * 2) `DEBUG_MODE=1|true|yes|on` → everything
 * 3) `LOG_VERBOSITY=<NONE|OFF|n>`
 * 4) `NODE_ENV=production` → `prodDefault` (default 0), else {@link DEV_VERBOSITY}
 */
export function resolveVerbosity(opts: ResolveVerbosityOptions = {}): number {
    if (opts.verbosity != null && !Number.isNaN(opts.verbosity)) return opts.verbosity;

    const env = opts.env;
    const dm = env?.DEBUG_MODE?.trim().toLowerCase();
    if (dm === '1' || dm === 'true' || dm === 'yes' || dm === 'on') return Number.POSITIVE_INFINITY;

    const parsed = parseVerbosity(env?.LOG_VERBOSITY);
    if (parsed !== undefined) return parsed;

    return isProduction(env) ? (opts.prodDefault ?? 0) : DEV_VERBOSITY;
}

export function isProduction(env?: EnvBag): boolean {
    return (env?.NODE_ENV ?? '').trim().toLowerCase() === 'production';
}
