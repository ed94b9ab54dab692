import { describe, expect, it } from 'vitest';
import { isMarshaler, marshalValue } from './marshal';

describe('isMarshaler', () => {
    it('detects objects and functions with a callable marshalLog', () => {
        const fn = Object.assign(() => 1, { marshalLog: () => 'fn' });
        expect(isMarshaler({ marshalLog: () => 1 })).toBe(true);
        expect(isMarshaler(fn)).toBe(true);
    });

    it('rejects everything else', () => {
        expect(isMarshaler(null)).toBe(false);
        expect(isMarshaler(undefined)).toBe(false);
        expect(isMarshaler('marshalLog')).toBe(false);
        expect(isMarshaler({ marshalLog: 'not callable' })).toBe(false);
        expect(isMarshaler({})).toBe(false);
    });

    it('sees methods inherited from a class', () => {
        class Slim {
            marshalLog() { return 'slim'; }
        }
        expect(isMarshaler(new Slim())).toBe(true);
    });
});

describe('marshalValue', () => {
    it('returns the substitute', () => {
        class Secretive {
            constructor(private readonly pin: string) {}
            toString() { return `pin=${this.pin}`; }
            marshalLog() { return { pin: '****' }; }
        }
        expect(marshalValue(new Secretive('1234'))).toEqual({ pin: '****' });
    });

    it('passes other values through', () => {
        const obj = { a: 1 };
        expect(marshalValue(obj)).toBe(obj);
        expect(marshalValue(5)).toBe(5);
        expect(marshalValue(null)).toBeNull();
    });

    it('can substitute undefined', () => {
        expect(marshalValue({ marshalLog: () => undefined })).toBeUndefined();
    });

    it('turns a throwing marshaler into a marker', () => {
        expect(marshalValue({ marshalLog: () => { throw new Error('broken'); } })).toBe('[MarshalError: broken]');
        expect(marshalValue({ marshalLog: () => { throw 'raw'; } })).toBe('[MarshalError: raw]');
    });

    it('turns a throwing marshalLog getter into a marker', () => {
        const hostile = Object.defineProperty({}, 'marshalLog', { get() { throw new Error('getter'); } });
        expect(marshalValue(hostile)).toBe('[MarshalError: getter]');
    });
});
