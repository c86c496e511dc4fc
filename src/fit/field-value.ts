import { BaseTypeName } from './base-types';

export type Endianness = 'little' | 'big';

export type NumericElement = number | bigint;

/**
 * One decoded field value. 8-byte integers are carried as bigint, every
 * narrower integer and every float as number.
 */
export type FieldValue =
    | { kind: 'absent' }
    | { kind: 'sint'; value: NumericElement }
    | { kind: 'uint'; value: NumericElement }
    | { kind: 'float'; value: number }
    | { kind: 'string'; value: string }
    | { kind: 'bytes'; value: Uint8Array }
    // elements equal to the invalid sentinel are undefined
    | { kind: 'array'; elementKind: 'sint' | 'uint' | 'float'; values: Array<NumericElement | undefined> };

export const ABSENT: FieldValue = Object.freeze({ kind: 'absent' });

export interface NativeField {
    type: 'native';
    fieldDefinitionNumber: number;
    baseType: BaseTypeName;
    value: FieldValue;
}

export interface DeveloperField {
    type: 'developer';
    developerDataIndex: number;
    fieldDefinitionNumber: number;
    // false when no field description had been seen; value is then opaque bytes
    resolved: boolean;
    baseType?: BaseTypeName;
    name?: string;
    units?: string;
    value: FieldValue;
}

export type DecodedField = NativeField | DeveloperField;

/**
 * Narrows a value to a single number, e.g. for reserved fields such as
 * timestamp or message index. Arrays, strings and bytes yield undefined.
 */
export function scalarNumber(value: FieldValue): number | undefined {
    switch (value.kind) {
        case 'sint':
        case 'uint':
            return typeof value.value === 'bigint' ? Number(value.value) : value.value;
        case 'float':
            return value.value;
        case 'absent':
        case 'string':
        case 'bytes':
        case 'array':
            return undefined;
    }
}

export function findNativeField(fields: readonly DecodedField[], fieldDefinitionNumber: number): NativeField | undefined {
    for (const field of fields) {
        if (field.type === 'native' && field.fieldDefinitionNumber === fieldDefinitionNumber) {
            return field;
        }
    }
    return undefined;
}
