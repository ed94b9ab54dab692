import type { EnvBag, ErrorStackPolicy, FuncSinkOptions, KeyValue, LogEntry, Sink } from './types';
import { defaultEnv, isProduction, resolveVerbosity } from './env';
import { type ColorMode, createConsoleFormatter, formatJsonLine } from './format';
import { marshalValue } from './marshal';
import { errorMessage, isErrorLike, isPlainObject, normalizeError, setOwn, toPairs, truncateFields } from './utils';

/* ------------------------------- Func sink -------------------------------- */

/** Settings resolved once per root sink and shared by everything derived from it. */
type FuncSinkCore = {
    write: (entry: LogEntry) => void;
    verbosity: number;
    separator: string;
    clock: (() => string) | null;
    mask: ((value: unknown) => unknown) | null;
    truncate: number;
    includeStack: boolean;
    onWriteError: (err: unknown) => void;
};

const reportToConsole = (err: unknown): void => {
    console.error(`[loghandle] sink write failed: ${errorMessage(err)}`);
};

/** Hand a fault to its reporter; a failing reporter is dropped. */
function report(onError: (err: unknown) => void, err: unknown): void {
    try {
        onError(err);
    } catch {
        // reporter failed too; the caller must not see it
    }
}

function resolveStack(policy: ErrorStackPolicy, env?: EnvBag): boolean {
    if (policy === 'never') return false;
    return policy === 'always' || !isProduction(env);
}

function buildCore(write: (entry: LogEntry) => void, o: FuncSinkOptions): FuncSinkCore {
    const env = o.env ?? defaultEnv();
    const ts = o.timestamp ?? true;
    return {
        write,
        verbosity: resolveVerbosity({ verbosity: o.verbosity, env, prodDefault: o.prodDefault }),
        separator: o.nameSeparator ?? '/',
        clock: ts === true ? () => new Date().toISOString() : ts === false ? null : ts,
        mask: o.mask ?? null,
        truncate: o.truncate ?? 0,
        includeStack: resolveStack(o.errorStackPolicy ?? 'auto', env),
        onWriteError: o.onWriteError ?? reportToConsole,
    };
}

/**
 * Sink that renders every call into a {@link LogEntry} and hands it to a write function.
 * Values are marshaled, then masked, then truncated; any fault along the way goes to
 * `onWriteError` and never reaches the caller.
 */
export class FuncSink implements Sink {
    private constructor(
        private readonly core: FuncSinkCore,
        /** Name segments in call order. */
        public readonly names: readonly string[],
        /** Accumulated pairs, duplicates included. */
        public readonly pairs: readonly KeyValue[],
    ) {}

    static create(write: (entry: LogEntry) => void, options: FuncSinkOptions = {}): FuncSink {
        return new FuncSink(buildCore(write, options), [], []);
    }

    /** Resolved threshold: `enabled(level)` is `level <= verbosity`. */
    get verbosity(): number {
        return this.core.verbosity;
    }

    enabled(level: number): boolean {
        return level <= this.core.verbosity;
    }

    info(level: number, msg: string, ...keysAndValues: unknown[]): void {
        this.emit(() => ({
            ...this.head('info', msg),
            v: level,
            values: this.renderValues(keysAndValues),
        }));
    }

    error(err: unknown, msg: string, ...keysAndValues: unknown[]): void {
        this.emit(() => {
            const entry: LogEntry = { ...this.head('error', msg), values: this.renderValues(keysAndValues) };
            if (err != null) entry.error = this.renderError(err);
            return entry;
        });
    }

    withValues(...keysAndValues: unknown[]): FuncSink {
        return new FuncSink(this.core, this.names, [...this.pairs, ...toPairs(keysAndValues)]);
    }

    withName(name: string): FuncSink {
        return new FuncSink(this.core, [...this.names, name], this.pairs);
    }

    /* ------------------------------ Rendering ------------------------------ */

    private head(level: LogEntry['level'], msg: string): LogEntry {
        const entry: LogEntry = { level, msg, values: {} };
        if (this.core.clock) entry.time = this.core.clock();
        if (this.names.length > 0) entry.logger = this.names.join(this.core.separator);
        return entry;
    }

    private renderValues(keysAndValues: unknown[]): Record<string, unknown> {
        let values: Record<string, unknown> = {};
        for (const [k, v] of this.pairs) setOwn(values, k, marshalValue(v));
        for (const [k, v] of toPairs(keysAndValues)) setOwn(values, k, marshalValue(v));

        if (this.core.mask) {
            const masked = this.core.mask(values);
            values = isPlainObject(masked) ? masked : { masked };
        }
        return truncateFields(values, this.core.truncate);
    }

    private renderError(err: unknown): unknown {
        const marshaled = marshalValue(err);
        const rendered = marshaled !== err
            ? marshaled
            : isErrorLike(err) ? normalizeError(err, this.core.includeStack) : err;
        return this.core.mask ? this.core.mask(rendered) : rendered;
    }

    private emit(build: () => LogEntry): void {
        try {
            this.core.write(build());
        } catch (e) {
            report(this.core.onWriteError, e);
        }
    }
}

/* ------------------------------ Writer sinks ------------------------------ */

export type ConsoleSinkOptions = FuncSinkOptions & {
    /** 'text' (default) for a human line, 'json' for one JSON object per line. */
    format?: 'text' | 'json';
    /** Color for the text format. Default: 'auto'. */
    color?: ColorMode;
};

/**
 * Console sink (Node/Browser compatible): info → console.info, error → console.error.
 */
export function createConsoleSink(options: ConsoleSinkOptions = {}): FuncSink {
    const format = options.format === 'json'
        ? formatJsonLine
        : createConsoleFormatter(options.color, options.env ?? defaultEnv());
    return FuncSink.create((entry) => {
        const line = format(entry);
        if (entry.level === 'error') console.error(line);
        else console.info(line);
    }, options);
}

/** Anything with a string `write`, e.g. `process.stdout` or a file stream. */
export interface LineWriter {
    write(chunk: string): unknown;
}

/**
 * Stream sink writing newline-delimited JSON.
 */
export function createStreamSink(stream: LineWriter, options: FuncSinkOptions = {}): FuncSink {
    return FuncSink.create((entry) => {
        stream.write(formatJsonLine(entry) + '\n');
    }, options);
}

/* ------------------------------ Memory sink ------------------------------- */

export interface MemoryRecord {
    kind: 'info' | 'error';
    /** Verbosity of an info call. */
    level?: number;
    name: string[];
    msg: string;
    /** Marshaled `err` of an error call. */
    err?: unknown;
    /** Sink pairs then call pairs, values marshaled. */
    values: KeyValue[];
}

/**
 * Memory sink for testing or buffering logs.
 * Sinks derived from the same root share one record buffer.
 */
export class MemorySink implements Sink {
    constructor(
        public readonly verbosity: number = Number.POSITIVE_INFINITY,
        public readonly names: readonly string[] = [],
        public readonly pairs: readonly KeyValue[] = [],
        private readonly records: MemoryRecord[] = [],
    ) {}

    enabled(level: number): boolean {
        return level <= this.verbosity;
    }

    info(level: number, msg: string, ...keysAndValues: unknown[]): void {
        this.records.push({ kind: 'info', level, name: [...this.names], msg, values: this.render(keysAndValues) });
    }

    error(err: unknown, msg: string, ...keysAndValues: unknown[]): void {
        this.records.push({ kind: 'error', name: [...this.names], msg, err: marshalValue(err), values: this.render(keysAndValues) });
    }

    withValues(...keysAndValues: unknown[]): MemorySink {
        return new MemorySink(this.verbosity, this.names, [...this.pairs, ...toPairs(keysAndValues)], this.records);
    }

    withName(name: string): MemorySink {
        return new MemorySink(this.verbosity, [...this.names, name], this.pairs, this.records);
    }

    getRecords(): MemoryRecord[] {
        return [...this.records];
    }

    /** Empties the buffer shared with every related sink. */
    clear(): void {
        this.records.length = 0;
    }

    private render(keysAndValues: unknown[]): KeyValue[] {
        return [...this.pairs, ...toPairs(keysAndValues)].map(([k, v]): KeyValue => [k, marshalValue(v)]);
    }
}

/* ------------------------------- Tee sink --------------------------------- */

export type TeeSinkOptions = {
    /** Receives whatever a member throws. Default: one `console.error` line. */
    onError?: (err: unknown) => void;
};

class TeeSink implements Sink {
    constructor(
        private readonly sinks: readonly Sink[],
        private readonly onError: (err: unknown) => void,
    ) {}

    enabled(level: number): boolean {
        return this.sinks.some((s) => this.guard(() => s.enabled(level), false));
    }

    info(level: number, msg: string, ...keysAndValues: unknown[]): void {
        for (const s of this.sinks) {
            this.guard(() => {
                if (s.enabled(level)) s.info(level, msg, ...keysAndValues);
            }, undefined);
        }
    }

    error(err: unknown, msg: string, ...keysAndValues: unknown[]): void {
        for (const s of this.sinks) {
            this.guard(() => s.error(err, msg, ...keysAndValues), undefined);
        }
    }

    withValues(...keysAndValues: unknown[]): Sink {
        return new TeeSink(this.sinks.map((s) => s.withValues(...keysAndValues)), this.onError);
    }

    withName(name: string): Sink {
        return new TeeSink(this.sinks.map((s) => s.withName(name)), this.onError);
    }

    /** One member failing must not starve the others. */
    private guard<T>(call: () => T, fallback: T): T {
        try {
            return call();
        } catch (e) {
            report(this.onError, e);
            return fallback;
        }
    }
}

/**
 * Fan out to several sinks. Info goes only to members enabled at its level,
 * errors go to all of them.
 */
export function teeSink(...sinks: Sink[]): Sink {
    return createTeeSink(sinks);
}

/** {@link teeSink} with a hook for member faults. */
export function createTeeSink(sinks: readonly Sink[], options: TeeSinkOptions = {}): Sink {
    return new TeeSink([...sinks], options.onError ?? reportToConsole);
}
