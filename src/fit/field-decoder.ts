import { BaseType } from './base-types';
import { ABSENT, Endianness, FieldValue, NumericElement } from './field-value';

/**
 * Decode the raw bytes of one field.
 * @param bytes - exactly the bytes the definition declared for the field
 * @param baseType - resolved base type of the field
 * @param elementCount - number of base type elements in `bytes`
 * @param endianness - architecture of the owning definition message
 */
export function decodeField(
    bytes: Uint8Array,
    baseType: BaseType,
    elementCount: number,
    endianness: Endianness,
): FieldValue {
    const kind = baseType.kind;
    if (kind === 'string') {
        return decodeString(bytes, elementCount);
    }
    if (kind === 'bytes') {
        return decodeBytes(bytes, elementCount);
    }
    if (elementCount === 0) {
        return ABSENT;
    }

    const view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
    const littleEndian = endianness === 'little';

    if (elementCount === 1) {
        const element = readElement(view, 0, baseType, littleEndian);
        if (element === undefined) {
            return ABSENT;
        }
        if (kind === 'float') {
            return { kind, value: Number(element) };
        }
        return { kind, value: element };
    }

    const values: Array<NumericElement | undefined> = [];
    for (let i = 0; i < elementCount; i++) {
        values.push(readElement(view, i * baseType.size, baseType, littleEndian));
    }
    return { kind: 'array', elementKind: kind, values };
}

/**
 * Raw bytes surfaced without interpretation, used when a field's type
 * cannot be resolved.
 */
export function decodeOpaque(bytes: Uint8Array): FieldValue {
    return { kind: 'bytes', value: new Uint8Array(bytes) };
}

function decodeString(bytes: Uint8Array, elementCount: number): FieldValue {
    const limit = Math.min(elementCount, bytes.length);
    let end = bytes.indexOf(0);
    if (end < 0 || end > limit) {
        end = limit;
    }
    if (end === 0) {
        return ABSENT;
    }
    return { kind: 'string', value: Buffer.from(bytes.buffer, bytes.byteOffset, end).toString('utf8') };
}

function decodeBytes(bytes: Uint8Array, elementCount: number): FieldValue {
    const value = bytes.subarray(0, Math.min(elementCount, bytes.length));
    if (value.length === 0 || value.every(b => b === 0xFF)) {
        return ABSENT;
    }
    return { kind: 'bytes', value: new Uint8Array(value) };
}

function readRaw(view: DataView, offset: number, baseType: BaseType, littleEndian: boolean): number | bigint {
    switch (baseType.size) {
        case 1:
            return view.getUint8(offset);
        case 2:
            return view.getUint16(offset, littleEndian);
        case 4:
            return view.getUint32(offset, littleEndian);
        case 8:
            return view.getBigUint64(offset, littleEndian);
    }
}

function readElement(view: DataView, offset: number, baseType: BaseType, littleEndian: boolean): NumericElement | undefined {
    const raw = readRaw(view, offset, baseType, littleEndian);
    if (raw === baseType.invalid) {
        return undefined;
    }

    if (baseType.kind === 'float') {
        return baseType.size === 4
            ? view.getFloat32(offset, littleEndian)
            : view.getFloat64(offset, littleEndian);
    }
    if (baseType.kind === 'sint') {
        if (typeof raw === 'bigint') {
            return BigInt.asIntN(64, raw);
        }
        switch (baseType.size) {
            case 1:
                return (raw << 24) >> 24;
            case 2:
                return (raw << 16) >> 16;
            default:
                return raw | 0;
        }
    }
    return raw;
}
