import type { Sink } from './types';

/** Non-finite and negative increments count as 0; fractions are floored. */
function toIncrement(level: number): number {
    return Number.isFinite(level) && level > 0 ? Math.floor(level) : 0;
}

/**
 * Value-typed logging handle.
 *
 * All real work is delegated to a {@link Sink}. Every derivation (`v`, `withValues`,
 * `withName`, `withSink`) returns a new handle; the receiver and anything already holding it
 * keep behaving exactly as before. A handle bound to `null` is inert.
 */
export class Logger {
    private readonly sink: Sink | null;

    /** Verbosity accumulated through `v()`, relative to the root handle. */
    public readonly level: number;

    constructor(sink: Sink | null, level: number = 0) {
        this.sink = sink;
        this.level = toIncrement(level);
    }

    /**
     * Whether `info()` at this handle's verbosity would reach the sink.
     * Use it to skip building expensive arguments.
     */
    enabled(): boolean {
        return this.sink !== null && this.sink.enabled(this.level);
    }

    /**
     * Log a non-error message.
     * `keysAndValues` alternates string keys and arbitrary values, e.g.
     * `log.info('request done', 'path', req.path, 'ms', elapsed)`.
     */
    info(msg: string, ...keysAndValues: unknown[]): void {
        if (this.sink !== null && this.sink.enabled(this.level)) {
            this.sink.info(this.level, msg, ...keysAndValues);
        }
    }

    /**
     * Log an error. Not subject to verbosity: it reaches any non-null sink.
     * `msg` adds context to `err`, which may be null when there is no underlying cause.
     */
    error(err: unknown, msg: string, ...keysAndValues: unknown[]): void {
        if (this.sink !== null) {
            this.sink.error(err, msg, ...keysAndValues);
        }
    }

    /**
     * Handle with verbosity raised by `level`. V-levels are additive and a higher level means a
     * less important message; negative increments are treated as 0.
     */
    v(level: number): Logger {
        if (this.sink === null) return this;
        return new Logger(this.sink, this.level + toIncrement(level));
    }

    /** Handle whose sink carries these extra key/value pairs. */
    withValues(...keysAndValues: unknown[]): Logger {
        if (this.sink === null) return this;
        return new Logger(this.sink.withValues(...keysAndValues), this.level);
    }

    /**
     * Handle with `name` appended to its name. Successive calls append further segments;
     * prefer letters, digits and hyphens.
     */
    withName(name: string): Logger {
        if (this.sink === null) return this;
        return new Logger(this.sink.withName(name), this.level);
    }

    /** The bound sink, for wrapping it in another backend. */
    getSink(): Sink | null {
        return this.sink;
    }

    /** Same verbosity, different sink. */
    withSink(sink: Sink | null): Logger {
        return new Logger(sink, this.level);
    }
}

/**
 * Bind a handle to `sink` at verbosity 0.
 * Meant for sink packages; applications usually receive a ready handle.
 */
/* @__PURE__ */
export function createLogger(sink: Sink | null): Logger {
    return new Logger(sink);
}

/** A handle that drops everything. */
export function discard(): Logger {
    return new Logger(null);
}
