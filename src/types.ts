/**
 * A single key/value pair after a sink has normalized the caller's flat list.
 */
export type KeyValue = readonly [key: string, value: unknown];

/**
 * Backend contract for a {@link Logger}.
 *
 * Implementations must be safe to share: the same sink is reached from every handle
 * derived from it, so `withValues` and `withName` return new sinks and never touch the receiver.
 */
export interface Sink {
    /**
     * Whether info output at verbosity `level` is enabled.
     * Called before every `info()`; keep it pure and free of I/O.
     */
    enabled(level: number): boolean;

    /**
     * Emit a non-error message. Only called after `enabled(level)` returned true.
     * `keysAndValues` alternates keys and values; validation is up to the sink.
     */
    info(level: number, msg: string, ...keysAndValues: unknown[]): void;

    /**
     * Emit an error. Called regardless of verbosity.
     * `err` may be null/undefined, meaning there is no underlying cause.
     */
    error(err: unknown, msg: string, ...keysAndValues: unknown[]): void;

    /** New sink carrying the prior pairs followed by these. */
    withValues(...keysAndValues: unknown[]): Sink;

    /** New sink whose name has `name` appended as a segment. */
    withName(name: string): Sink;
}

/**
 * Optional capability of logged values.
 * Structured sinks log the result of `marshalLog()` instead of the value itself, e.g. to:
 * - avoid a class being rendered through its `toString()`/`toJSON()`
 * - keep only a few fields of a large object
 * - expose private fields through a plain object
 */
export interface Marshaler {
    marshalLog(): unknown;
}

/**
 * Structured log entry produced by {@link FuncSink}.
 */
export interface LogEntry {
    time?: string;
    level: 'info' | 'error';
    /** Verbosity of an info entry. */
    v?: number;
    /** Name segments joined by the sink's separator. */
    logger?: string;
    msg: string;
    error?: unknown;
    values: Record<string, unknown>;
}

export type ErrorStackPolicy = 'auto' | 'always' | 'never';

export type EnvBag = Record<string, string | undefined>;

/**
 * Options shared by every {@link FuncSink}-based sink.
 */
export interface FuncSinkOptions {
    /**
     * Highest verbosity passed by `enabled()`; `Infinity` passes everything.
     * If omitted, resolved from the environment (`DEBUG_MODE` → `LOG_VERBOSITY` → `NODE_ENV`).
     */
    verbosity?: number;

    /** Environment bag for verbosity and stack policy. Defaults to `process.env` when available. */
    env?: EnvBag;

    /** Verbosity used when `NODE_ENV=production` and nothing else applies. Default: 0. */
    prodDefault?: number;

    /** Separator between name segments. Default: '/'. */
    nameSeparator?: string;

    /**
     * `true` (default) stamps ISO time, `false` omits it, a function supplies the text.
     */
    timestamp?: boolean | (() => string);

    /** Masker applied to rendered values and normalized errors (see `makeMask` in `redact`). */
    mask?: (value: unknown) => unknown;

    /** Shallow truncation of long string values. Default: 0 (off). */
    truncate?: number;

    /**
     * Stack traces for Error values.
     * - 'auto' (default): include unless `NODE_ENV=production`.
     */
    errorStackPolicy?: ErrorStackPolicy;

    /**
     * Receives faults raised while rendering or writing an entry.
     * Default: one `console.error` line.
     */
    onWriteError?: (err: unknown) => void;
}
