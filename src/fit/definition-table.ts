import { Endianness } from './field-value';

export interface FieldDefinition {
    fieldDefinitionNumber: number;
    size: number;
    baseTypeCode: number;
}

export interface DeveloperFieldDefinition {
    fieldDefinitionNumber: number;
    size: number;
    developerDataIndex: number;
}

export interface MessageDefinition {
    localMessageType: number;
    globalMessageNumber: number;
    endianness: Endianness;
    fields: FieldDefinition[];
    developerFields: DeveloperFieldDefinition[];
    // bytes of a data message following this definition, record header excluded
    dataSize: number;
}

export const LOCAL_MESSAGE_TYPE_COUNT = 16;

/**
 * Local message type slots. A definition replaces whatever the slot held.
 */
export class DefinitionTable {
    private readonly slots: Array<MessageDefinition | undefined> = new Array(LOCAL_MESSAGE_TYPE_COUNT).fill(undefined);

    public set(definition: MessageDefinition): MessageDefinition | undefined {
        const previous = this.slots[definition.localMessageType];
        this.slots[definition.localMessageType] = definition;
        return previous;
    }

    public get(localMessageType: number): MessageDefinition | undefined {
        return this.slots[localMessageType];
    }

    public get size(): number {
        return this.slots.filter(s => s != null).length;
    }
}

export function createMessageDefinition(
    localMessageType: number,
    globalMessageNumber: number,
    endianness: Endianness,
    fields: FieldDefinition[],
    developerFields: DeveloperFieldDefinition[],
): MessageDefinition {
    const dataSize = fields.reduce((sum, f) => sum + f.size, 0)
        + developerFields.reduce((sum, f) => sum + f.size, 0);
    return { localMessageType, globalMessageNumber, endianness, fields, developerFields, dataSize };
}
