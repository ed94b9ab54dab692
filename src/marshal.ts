import type { Marshaler } from './types';
import { errorMessage } from './utils';

/** Narrow check for the {@link Marshaler} capability. */
export function isMarshaler(value: unknown): value is Marshaler {
    return value !== null
        && (typeof value === 'object' || typeof value === 'function')
        && 'marshalLog' in value
        && typeof value.marshalLog === 'function';
}

/**
 * Single substitution pass: a Marshaler is replaced by what `marshalLog()` returns,
 * anything else is returned as-is. The substitute is not checked again.
 */
export function marshalValue(value: unknown): unknown {
    try {
        return isMarshaler(value) ? value.marshalLog() : value;
    } catch (e) {
        return `[MarshalError: ${errorMessage(e)}]`;
    }
}
