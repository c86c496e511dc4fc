export type BaseTypeName =
    | 'enum'
    | 'sint8'
    | 'uint8'
    | 'sint16'
    | 'uint16'
    | 'sint32'
    | 'uint32'
    | 'string'
    | 'float32'
    | 'float64'
    | 'uint8z'
    | 'uint16z'
    | 'uint32z'
    | 'byte'
    | 'sint64'
    | 'uint64'
    | 'uint64z';

export type BaseTypeKind = 'sint' | 'uint' | 'float' | 'string' | 'bytes';

export type BaseTypeSize = 1 | 2 | 4 | 8;

export interface BaseType {
    code: number;
    name: BaseTypeName;
    size: BaseTypeSize;
    kind: BaseTypeKind;
    // raw bit pattern meaning "not present"; floats are compared by their bits
    invalid: number | bigint;
    endianAbility: boolean;
}

export const BASE_TYPES: readonly BaseType[] = [
    { code: 0x00, name: 'enum', size: 1, kind: 'uint', invalid: 0xFF, endianAbility: false },
    { code: 0x01, name: 'sint8', size: 1, kind: 'sint', invalid: 0x7F, endianAbility: false },
    { code: 0x02, name: 'uint8', size: 1, kind: 'uint', invalid: 0xFF, endianAbility: false },
    { code: 0x83, name: 'sint16', size: 2, kind: 'sint', invalid: 0x7FFF, endianAbility: true },
    { code: 0x84, name: 'uint16', size: 2, kind: 'uint', invalid: 0xFFFF, endianAbility: true },
    { code: 0x85, name: 'sint32', size: 4, kind: 'sint', invalid: 0x7FFFFFFF, endianAbility: true },
    { code: 0x86, name: 'uint32', size: 4, kind: 'uint', invalid: 0xFFFFFFFF, endianAbility: true },
    { code: 0x07, name: 'string', size: 1, kind: 'string', invalid: 0x00, endianAbility: false },
    { code: 0x88, name: 'float32', size: 4, kind: 'float', invalid: 0xFFFFFFFF, endianAbility: true },
    { code: 0x89, name: 'float64', size: 8, kind: 'float', invalid: 0xFFFFFFFFFFFFFFFFn, endianAbility: true },
    { code: 0x0A, name: 'uint8z', size: 1, kind: 'uint', invalid: 0x00, endianAbility: false },
    { code: 0x8B, name: 'uint16z', size: 2, kind: 'uint', invalid: 0x0000, endianAbility: true },
    { code: 0x8C, name: 'uint32z', size: 4, kind: 'uint', invalid: 0x00000000, endianAbility: true },
    { code: 0x0D, name: 'byte', size: 1, kind: 'bytes', invalid: 0xFF, endianAbility: false },
    { code: 0x8E, name: 'sint64', size: 8, kind: 'sint', invalid: 0x7FFFFFFFFFFFFFFFn, endianAbility: true },
    { code: 0x8F, name: 'uint64', size: 8, kind: 'uint', invalid: 0xFFFFFFFFFFFFFFFFn, endianAbility: true },
    { code: 0x90, name: 'uint64z', size: 8, kind: 'uint', invalid: 0x0000000000000000n, endianAbility: true },
];

const BY_CODE = new Map<number, BaseType>(BASE_TYPES.map(t => [t.code, t]));
const BY_NAME = new Map<BaseTypeName, BaseType>(BASE_TYPES.map(t => [t.name, t]));

export function getBaseType(code: number): BaseType | undefined {
    return BY_CODE.get(code);
}

export function getBaseTypeByName(name: BaseTypeName): BaseType {
    const baseType = BY_NAME.get(name);
    if (baseType == null) {
        throw new Error(`Unknown base type name ${name}`);
    }
    return baseType;
}

/**
 * Number of elements a field of `size` bytes holds, or undefined when the
 * size is not a whole multiple of the base type width.
 */
export function elementCount(baseType: BaseType, size: number): number | undefined {
    if (size % baseType.size !== 0) {
        return undefined;
    }
    return size / baseType.size;
}
