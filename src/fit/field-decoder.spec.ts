import { BASE_TYPES, BaseType, BaseTypeName, getBaseTypeByName } from './base-types';
import { decodeField, decodeOpaque } from './field-decoder';
import { Endianness, FieldValue } from './field-value';

describe('decodeField', () => {
    const type = (name: BaseTypeName): BaseType => getBaseTypeByName(name);

    const view = (size: number, write: (v: DataView) => void): Uint8Array => {
        const v = new DataView(new ArrayBuffer(size));
        write(v);
        return new Uint8Array(v.buffer);
    };

    const decode = (name: BaseTypeName, bytes: Uint8Array, endianness: Endianness = 'little'): FieldValue => {
        const baseType = type(name);
        return decodeField(bytes, baseType, bytes.length / baseType.size, endianness);
    };

    const rawInvalid = (baseType: BaseType): Uint8Array => view(baseType.size, v => {
        const invalid = baseType.invalid;
        if (typeof invalid === 'bigint') {
            v.setBigUint64(0, invalid, true);
        } else if (baseType.size === 1) {
            v.setUint8(0, invalid);
        } else if (baseType.size === 2) {
            v.setUint16(0, invalid, true);
        } else {
            v.setUint32(0, invalid, true);
        }
    });

    describe('integers', () => {
        it('should decode little and big endian uint16', () => {
            expect(decode('uint16', new Uint8Array([0x34, 0x12]), 'little')).toEqual({ kind: 'uint', value: 0x1234 });
            expect(decode('uint16', new Uint8Array([0x12, 0x34]), 'big')).toEqual({ kind: 'uint', value: 0x1234 });
        });

        it('should decode uint32 above the signed 32 bit range', () => {
            const bytes = view(4, v => v.setUint32(0, 0xF0000001, false));
            expect(decode('uint32', bytes, 'big')).toEqual({ kind: 'uint', value: 0xF0000001 });
        });

        it('should sign-extend signed types', () => {
            expect(decode('sint8', new Uint8Array([0x80]))).toEqual({ kind: 'sint', value: -128 });
            expect(decode('sint16', new Uint8Array([0xFE, 0xFF]))).toEqual({ kind: 'sint', value: -2 });
            expect(decode('sint32', view(4, v => v.setInt32(0, -100000, true)))).toEqual({ kind: 'sint', value: -100000 });
            expect(decode('sint32', view(4, v => v.setInt32(0, -100000, false)), 'big')).toEqual({ kind: 'sint', value: -100000 });
        });

        it('should decode 64 bit types as bigint', () => {
            expect(decode('sint64', view(8, v => v.setBigInt64(0, -5n, true)))).toEqual({ kind: 'sint', value: -5n });
            expect(decode('uint64', view(8, v => v.setBigUint64(0, 2n ** 63n + 1n, false)), 'big'))
                .toEqual({ kind: 'uint', value: 2n ** 63n + 1n });
        });

        it('should decode enum and z types as unsigned values', () => {
            expect(decode('enum', new Uint8Array([4]))).toEqual({ kind: 'uint', value: 4 });
            expect(decode('uint16z', new Uint8Array([0x01, 0x00]))).toEqual({ kind: 'uint', value: 1 });
        });

        it('should treat zero as a valid value for non-z unsigned types', () => {
            expect(decode('uint32', new Uint8Array([0, 0, 0, 0]))).toEqual({ kind: 'uint', value: 0 });
            expect(decode('uint32z', new Uint8Array([0, 0, 0, 0]))).toEqual({ kind: 'absent' });
        });
    });

    describe('floats', () => {
        it('should decode float32 in both byte orders', () => {
            expect(decode('float32', view(4, v => v.setFloat32(0, 1.5, true)), 'little')).toEqual({ kind: 'float', value: 1.5 });
            expect(decode('float32', view(4, v => v.setFloat32(0, 1.5, false)), 'big')).toEqual({ kind: 'float', value: 1.5 });
        });

        it('should decode float64', () => {
            expect(decode('float64', view(8, v => v.setFloat64(0, -2.25, true)))).toEqual({ kind: 'float', value: -2.25 });
        });

        it('should only treat the all-ones bit pattern as invalid', () => {
            const quietNaN = view(4, v => v.setUint32(0, 0x7FC00000, true));
            const value = decode('float32', quietNaN);

            expect(value.kind).toBe('float');
            expect(value.kind === 'float' && Number.isNaN(value.value)).toBe(true);
        });
    });

    describe('invalid sentinels', () => {
        BASE_TYPES.forEach(baseType => {
            it(`should decode the ${baseType.name} sentinel as absent`, () => {
                expect(decodeField(rawInvalid(baseType), baseType, 1, 'little')).toEqual({ kind: 'absent' });
            });
        });

        BASE_TYPES.filter(t => t.kind !== 'string' && t.kind !== 'bytes').forEach(baseType => {
            it(`should mark ${baseType.name} array elements individually`, () => {
                const valid = view(baseType.size, v => v.setUint8(0, 1));
                const bytes = new Uint8Array([...rawInvalid(baseType), ...valid]);
                const value = decodeField(bytes, baseType, 2, 'little');

                expect(value.kind).toBe('array');
                if (value.kind === 'array') {
                    expect(value.elementKind).toBe(baseType.kind);
                    expect(value.values.length).toBe(2);
                    expect(value.values[0]).toBeUndefined();
                    expect(value.values[1]).toBeDefined();
                }
            });
        });
    });

    describe('arrays', () => {
        it('should decode uint16 arrays in order', () => {
            const bytes = view(6, v => {
                v.setUint16(0, 1, false);
                v.setUint16(2, 0xFFFF, false);
                v.setUint16(4, 3, false);
            });
            expect(decode('uint16', bytes, 'big')).toEqual({ kind: 'array', elementKind: 'uint', values: [1, undefined, 3] });
        });

        it('should keep an array whose elements are all invalid', () => {
            expect(decode('uint8', new Uint8Array([0xFF, 0xFF])))
                .toEqual({ kind: 'array', elementKind: 'uint', values: [undefined, undefined] });
        });

        it('should return absent for zero elements', () => {
            expect(decodeField(new Uint8Array(0), type('uint16'), 0, 'little')).toEqual({ kind: 'absent' });
        });
    });

    describe('strings', () => {
        const utf8 = (s: string) => Uint8Array.from(Buffer.from(s, 'utf8'));

        it('should stop at the first NUL', () => {
            expect(decode('string', utf8('Hi\0xyz'))).toEqual({ kind: 'string', value: 'Hi' });
        });

        it('should use the whole field when there is no terminator', () => {
            expect(decode('string', utf8('abc'))).toEqual({ kind: 'string', value: 'abc' });
        });

        it('should not read beyond the element count', () => {
            expect(decodeField(utf8('abc'), type('string'), 2, 'little')).toEqual({ kind: 'string', value: 'ab' });
        });

        it('should decode UTF-8', () => {
            expect(decode('string', new Uint8Array([0xC3, 0xA9, 0x00, 0x00]))).toEqual({ kind: 'string', value: 'é' });
        });

        it('should treat an empty string as absent', () => {
            expect(decode('string', new Uint8Array([0, 0x41, 0x42]))).toEqual({ kind: 'absent' });
        });
    });

    describe('bytes', () => {
        it('should return a copy of the bytes', () => {
            const bytes = new Uint8Array([1, 2, 0xFF]);
            const value = decode('byte', bytes);

            expect(value).toEqual({ kind: 'bytes', value: new Uint8Array([1, 2, 0xFF]) });
            bytes[0] = 9;
            expect(value.kind === 'bytes' && value.value[0]).toBe(1);
        });

        it('should be absent when every byte is 0xFF', () => {
            expect(decode('byte', new Uint8Array([0xFF, 0xFF, 0xFF]))).toEqual({ kind: 'absent' });
        });
    });

    describe('decodeOpaque', () => {
        it('should keep bytes as they are, even 0xFF', () => {
            expect(decodeOpaque(new Uint8Array([0xFF, 0xFF]))).toEqual({ kind: 'bytes', value: new Uint8Array([0xFF, 0xFF]) });
        });
    });
});
