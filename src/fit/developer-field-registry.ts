import debug from 'debug';

import { DeveloperDataIdField, FieldDescriptionField } from './fit-constants';
import { DecodedField, FieldValue, findNativeField, scalarNumber } from './field-value';

const logger = debug('FIT_DEV_FIELDS');

export interface DeveloperFieldMeta {
    developerDataIndex: number;
    fieldDefinitionNumber: number;
    baseTypeCode: number;
    fieldName?: string;
    units?: string;
    nativeMessageNumber?: number;
    nativeFieldNumber?: number;
}

export interface DeveloperDataId {
    developerDataIndex: number;
    developerId?: Uint8Array;
    applicationId?: Uint8Array;
    manufacturerId?: number;
    applicationVersion?: number;
}

export interface ReadonlyDeveloperFieldRegistry {
    resolve(developerDataIndex: number, fieldDefinitionNumber: number): DeveloperFieldMeta | undefined;
    getDeveloperDataId(developerDataIndex: number): DeveloperDataId | undefined;
    fields(): DeveloperFieldMeta[];
}

/**
 * Developer field metadata keyed by (developer data index, field number).
 * Filled in as field_description / developer_data_id messages are decoded
 * and only looked up when a data message needs it.
 */
export class DeveloperFieldRegistry implements ReadonlyDeveloperFieldRegistry {
    private readonly descriptions = new Map<string, DeveloperFieldMeta>();
    private readonly dataIds = new Map<number, DeveloperDataId>();

    public register(meta: DeveloperFieldMeta): void {
        const key = registryKey(meta.developerDataIndex, meta.fieldDefinitionNumber);
        if (this.descriptions.has(key)) {
            logger(`Redefining developer field ${key}`);
        }
        this.descriptions.set(key, meta);
    }

    public registerDeveloperDataId(dataId: DeveloperDataId): void {
        this.dataIds.set(dataId.developerDataIndex, dataId);
    }

    public resolve(developerDataIndex: number, fieldDefinitionNumber: number): DeveloperFieldMeta | undefined {
        return this.descriptions.get(registryKey(developerDataIndex, fieldDefinitionNumber));
    }

    public getDeveloperDataId(developerDataIndex: number): DeveloperDataId | undefined {
        return this.dataIds.get(developerDataIndex);
    }

    public fields(): DeveloperFieldMeta[] {
        return [...this.descriptions.values()];
    }

    /**
     * Register the description carried by a decoded field_description
     * message. Returns undefined when one of the key fields is missing.
     */
    public registerFieldDescription(fields: readonly DecodedField[]): DeveloperFieldMeta | undefined {
        const developerDataIndex = numberField(fields, FieldDescriptionField.DEVELOPER_DATA_INDEX);
        const fieldDefinitionNumber = numberField(fields, FieldDescriptionField.FIELD_DEFINITION_NUMBER);
        const baseTypeCode = numberField(fields, FieldDescriptionField.FIT_BASE_TYPE_ID);
        if (developerDataIndex == null || fieldDefinitionNumber == null || baseTypeCode == null) {
            logger('Ignoring field description without index, field number or base type');
            return undefined;
        }

        const meta: DeveloperFieldMeta = {
            developerDataIndex,
            fieldDefinitionNumber,
            baseTypeCode,
            fieldName: stringField(fields, FieldDescriptionField.FIELD_NAME),
            units: stringField(fields, FieldDescriptionField.UNITS),
            nativeMessageNumber: numberField(fields, FieldDescriptionField.NATIVE_MESG_NUM),
            nativeFieldNumber: numberField(fields, FieldDescriptionField.NATIVE_FIELD_NUM),
        };
        this.register(meta);
        logger(`Developer field ${developerDataIndex}:${fieldDefinitionNumber} is ${meta.fieldName ?? '(unnamed)'}`);
        return meta;
    }

    public registerDeveloperDataIdMessage(fields: readonly DecodedField[]): DeveloperDataId | undefined {
        const developerDataIndex = numberField(fields, DeveloperDataIdField.DEVELOPER_DATA_INDEX);
        if (developerDataIndex == null) {
            logger('Ignoring developer data id without developer data index');
            return undefined;
        }

        const dataId: DeveloperDataId = {
            developerDataIndex,
            developerId: byteField(fields, DeveloperDataIdField.DEVELOPER_ID),
            applicationId: byteField(fields, DeveloperDataIdField.APPLICATION_ID),
            manufacturerId: numberField(fields, DeveloperDataIdField.MANUFACTURER_ID),
            applicationVersion: numberField(fields, DeveloperDataIdField.APPLICATION_VERSION),
        };
        this.registerDeveloperDataId(dataId);
        return dataId;
    }
}

function registryKey(developerDataIndex: number, fieldDefinitionNumber: number): string {
    return `${developerDataIndex}:${fieldDefinitionNumber}`;
}

function valueOf(fields: readonly DecodedField[], fieldDefinitionNumber: number): FieldValue | undefined {
    return findNativeField(fields, fieldDefinitionNumber)?.value;
}

function numberField(fields: readonly DecodedField[], fieldDefinitionNumber: number): number | undefined {
    const value = valueOf(fields, fieldDefinitionNumber);
    return value == null ? undefined : scalarNumber(value);
}

function stringField(fields: readonly DecodedField[], fieldDefinitionNumber: number): string | undefined {
    const value = valueOf(fields, fieldDefinitionNumber);
    return value?.kind === 'string' ? value.value : undefined;
}

// application and developer ids are byte arrays, or uint8 arrays on some writers
function byteField(fields: readonly DecodedField[], fieldDefinitionNumber: number): Uint8Array | undefined {
    const value = valueOf(fields, fieldDefinitionNumber);
    if (value?.kind === 'bytes') {
        return value.value;
    }
    if (value?.kind === 'array') {
        return Uint8Array.from(value.values, v => (typeof v === 'number' ? v : 0xFF));
    }
    return undefined;
}
