import debug from 'debug';

import { getBaseType, elementCount } from './base-types';
import {
    DefinitionTable,
    DeveloperFieldDefinition,
    FieldDefinition,
    MessageDefinition,
    createMessageDefinition,
} from './definition-table';
import { DeveloperFieldRegistry } from './developer-field-registry';
import { decodeField, decodeOpaque } from './field-decoder';
import { DecodedField, DeveloperField, Endianness, NativeField, findNativeField, scalarNumber } from './field-value';
import {
    COMPRESSED_LOCAL_MESSAGE_TYPE_SHIFT,
    FitArchitecture,
    FitCommonField,
    FitMesgNum,
    RecordHeaderMask,
} from './fit-constants';
import { FitDecodeError } from './fit-decode-error';
import { globalMessageName } from './global-messages';
import { RecordReader } from './record-reader';
import { TimestampTracker } from './timestamp-tracker';

const logger = debug('FIT_RECORD');

const DEFINITION_FIXED_SIZE = 5;
const FIELD_DEFINITION_SIZE = 3;

export interface DataMessage {
    // seconds since the FIT epoch; undefined until an absolute timestamp is known
    timestamp: number | undefined;
    globalMessageNumber: number;
    localMessageType: number;
    messageIndex: number | undefined;
    fields: DecodedField[];
}

export type RecordResult =
    | { type: 'definition'; definition: MessageDefinition }
    | { type: 'data'; message: DataMessage };

export type WarningHandler = (warning: FitDecodeError) => void;

/**
 * Decodes one record per call and keeps the per-file state the records
 * depend on: local definitions, developer field metadata and the last
 * timestamp.
 */
export class RecordDecoder {
    public readonly definitions = new DefinitionTable();
    public readonly developerFields = new DeveloperFieldRegistry();
    public readonly timestamps = new TimestampTracker();

    constructor(
        private readonly reader: RecordReader,
        private readonly onWarning: WarningHandler = () => undefined,
    ) { }

    public decodeNext(): RecordResult {
        const header = this.reader.readByte();

        if (header & RecordHeaderMask.COMPRESSED_TIMESTAMP) {
            const localMessageType = (header & RecordHeaderMask.COMPRESSED_LOCAL_MESSAGE_TYPE) >> COMPRESSED_LOCAL_MESSAGE_TYPE_SHIFT;
            const timeOffset = header & RecordHeaderMask.COMPRESSED_TIME_OFFSET;
            return { type: 'data', message: this.readDataMessage(localMessageType, timeOffset) };
        }

        if (header & RecordHeaderMask.RESERVED) {
            logger(`Reserved bit set in record header 0x${header.toString(16)}`);
        }

        const localMessageType = header & RecordHeaderMask.LOCAL_MESSAGE_TYPE;
        if (header & RecordHeaderMask.DEFINITION) {
            const hasDeveloperData = (header & RecordHeaderMask.DEVELOPER_DATA) !== 0;
            return { type: 'definition', definition: this.readDefinitionMessage(localMessageType, hasDeveloperData) };
        }
        return { type: 'data', message: this.readDataMessage(localMessageType) };
    }

    private readDefinitionMessage(localMessageType: number, hasDeveloperData: boolean): MessageDefinition {
        const fixed = this.reader.read(DEFINITION_FIXED_SIZE);
        const architecture = fixed[1];
        if (architecture !== FitArchitecture.LITTLE_ENDIAN && architecture !== FitArchitecture.BIG_ENDIAN) {
            throw new FitDecodeError('InvalidDefinition', `unknown architecture ${architecture}`, this.reader.offset);
        }
        const endianness: Endianness = architecture === FitArchitecture.BIG_ENDIAN ? 'big' : 'little';
        const globalMessageNumber = new DataView(fixed.buffer, fixed.byteOffset, fixed.byteLength)
            .getUint16(2, endianness === 'little');

        const fields: FieldDefinition[] = this.readFieldTriples(fixed[4]).map(([num, size, baseTypeCode]) => ({
            fieldDefinitionNumber: num,
            size,
            baseTypeCode,
        }));

        let developerFields: DeveloperFieldDefinition[] = [];
        if (hasDeveloperData) {
            const count = this.reader.readByte();
            developerFields = this.readFieldTriples(count).map(([num, size, developerDataIndex]) => ({
                fieldDefinitionNumber: num,
                size,
                developerDataIndex,
            }));
        }

        const definition = createMessageDefinition(localMessageType, globalMessageNumber, endianness, fields, developerFields);
        const previous = this.definitions.set(definition);
        logger(
            `Local type ${localMessageType} -> ${globalMessageName(globalMessageNumber) ?? globalMessageNumber}`
            + ` (${fields.length} fields, ${developerFields.length} developer fields, ${endianness} endian)`
            + (previous ? `, replacing ${previous.globalMessageNumber}` : ''),
        );
        return definition;
    }

    private readFieldTriples(count: number): Array<[number, number, number]> {
        const bytes = this.reader.read(count * FIELD_DEFINITION_SIZE);
        const triples: Array<[number, number, number]> = [];
        for (let i = 0; i < bytes.length; i += FIELD_DEFINITION_SIZE) {
            triples.push([bytes[i], bytes[i + 1], bytes[i + 2]]);
        }
        return triples;
    }

    private readDataMessage(localMessageType: number, timeOffset?: number): DataMessage {
        const definition = this.definitions.get(localMessageType);
        if (definition == null) {
            throw new FitDecodeError(
                'UnknownLocalMessageType',
                `data message for local type ${localMessageType} before any definition`,
                this.reader.offset,
            );
        }

        let timestamp: number | undefined;
        if (timeOffset != null) {
            timestamp = this.timestamps.applyCompressedOffset(timeOffset);
            if (timestamp == null) {
                throw new FitDecodeError(
                    'MissingTimestampContext',
                    'compressed timestamp header before any absolute timestamp',
                    this.reader.offset,
                );
            }
        }

        const body = this.reader.read(definition.dataSize);
        const fields: DecodedField[] = [];
        let position = 0;
        for (const fieldDefinition of definition.fields) {
            const bytes = body.subarray(position, position + fieldDefinition.size);
            position += fieldDefinition.size;
            fields.push(this.decodeNativeField(fieldDefinition, bytes, definition.endianness));
        }
        for (const developerDefinition of definition.developerFields) {
            const bytes = body.subarray(position, position + developerDefinition.size);
            position += developerDefinition.size;
            fields.push(this.decodeDeveloperField(developerDefinition, bytes, definition.endianness));
        }

        const explicitTimestamp = fieldNumber(fields, FitCommonField.TIMESTAMP);
        if (explicitTimestamp != null) {
            this.timestamps.update(explicitTimestamp);
            timestamp = explicitTimestamp;
        } else if (timestamp == null) {
            timestamp = this.timestamps.lastTimestamp;
        }

        switch (definition.globalMessageNumber) {
            case FitMesgNum.FIELD_DESCRIPTION:
                this.developerFields.registerFieldDescription(fields);
                break;
            case FitMesgNum.DEVELOPER_DATA_ID:
                this.developerFields.registerDeveloperDataIdMessage(fields);
                break;
        }

        return {
            timestamp,
            globalMessageNumber: definition.globalMessageNumber,
            localMessageType,
            messageIndex: fieldNumber(fields, FitCommonField.MESSAGE_INDEX),
            fields,
        };
    }

    private decodeNativeField(definition: FieldDefinition, bytes: Uint8Array, endianness: Endianness): NativeField {
        const baseType = getBaseType(definition.baseTypeCode);
        if (baseType == null) {
            throw new FitDecodeError(
                'UnsupportedBaseType',
                `field ${definition.fieldDefinitionNumber} has base type 0x${definition.baseTypeCode.toString(16)}`,
                this.reader.offset,
            );
        }

        const count = elementCount(baseType, definition.size);
        if (count == null) {
            logger(`Field ${definition.fieldDefinitionNumber}: size ${definition.size} is not a multiple of ${baseType.name}`);
            return {
                type: 'native',
                fieldDefinitionNumber: definition.fieldDefinitionNumber,
                baseType: baseType.name,
                value: decodeOpaque(bytes),
            };
        }

        return {
            type: 'native',
            fieldDefinitionNumber: definition.fieldDefinitionNumber,
            baseType: baseType.name,
            value: decodeField(bytes, baseType, count, endianness),
        };
    }

    private decodeDeveloperField(definition: DeveloperFieldDefinition, bytes: Uint8Array, endianness: Endianness): DeveloperField {
        const { developerDataIndex, fieldDefinitionNumber } = definition;
        const meta = this.developerFields.resolve(developerDataIndex, fieldDefinitionNumber);
        if (meta == null) {
            this.warn(new FitDecodeError(
                'UnresolvedDeveloperField',
                `no field description for developer field ${developerDataIndex}:${fieldDefinitionNumber}`,
                this.reader.offset,
            ));
            return { type: 'developer', developerDataIndex, fieldDefinitionNumber, resolved: false, value: decodeOpaque(bytes) };
        }

        const described = { type: 'developer', developerDataIndex, fieldDefinitionNumber, resolved: true, name: meta.fieldName, units: meta.units } as const;
        const baseType = getBaseType(meta.baseTypeCode);
        if (baseType == null) {
            this.warn(new FitDecodeError(
                'UnsupportedBaseType',
                `developer field ${developerDataIndex}:${fieldDefinitionNumber} has base type 0x${meta.baseTypeCode.toString(16)}`,
                this.reader.offset,
            ));
            return { ...described, value: decodeOpaque(bytes) };
        }

        const count = elementCount(baseType, definition.size);
        return {
            ...described,
            baseType: baseType.name,
            value: count == null ? decodeOpaque(bytes) : decodeField(bytes, baseType, count, endianness),
        };
    }

    private warn(warning: FitDecodeError): void {
        logger(warning.message);
        this.onWarning(warning);
    }
}

function fieldNumber(fields: readonly DecodedField[], fieldDefinitionNumber: number): number | undefined {
    const field = findNativeField(fields, fieldDefinitionNumber);
    return field == null ? undefined : scalarNumber(field.value);
}
