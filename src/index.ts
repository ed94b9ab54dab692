/**
 * loghandle: a backend-agnostic structured logging facade.
 * Hold a `Logger`, plug in any `Sink`.
 */

export { Logger, createLogger, discard } from './logger';
export { isMarshaler, marshalValue } from './marshal';
export { toPairs, MISSING_VALUE, BAD_KEY } from './utils';
export { resolveVerbosity, parseVerbosity, VERBOSITY_NONE } from './env';
export { createConsoleFormatter, formatJsonLine, safeJson } from './format';
export { FuncSink, createConsoleSink, createStreamSink, MemorySink, teeSink, createTeeSink } from './sinks';
export type { ColorMode, EntryFormatter } from './format';
export type { ConsoleSinkOptions, LineWriter, MemoryRecord, TeeSinkOptions } from './sinks';
export type { ResolveVerbosityOptions } from './env';
export type {
  Sink,
  Marshaler,
  KeyValue,
  LogEntry,
  FuncSinkOptions,
  ErrorStackPolicy,
  EnvBag,
} from './types';

// Default export
import { createLogger, discard } from './logger';

export default {
  createLogger,
  discard,
};
