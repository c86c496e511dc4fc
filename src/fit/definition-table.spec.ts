import { DefinitionTable, createMessageDefinition } from './definition-table';

describe('DefinitionTable', () => {
    let table: DefinitionTable;

    beforeEach(() => {
        table = new DefinitionTable();
    });

    it('should start empty', () => {
        expect(table.size).toBe(0);
        expect(table.get(0)).toBeUndefined();
    });

    it('should store definitions by local message type', () => {
        const record = createMessageDefinition(1, 20, 'little', [{ fieldDefinitionNumber: 0, size: 4, baseTypeCode: 0x85 }], []);
        table.set(record);

        expect(table.get(1)).toBe(record);
        expect(table.get(0)).toBeUndefined();
        expect(table.size).toBe(1);
    });

    it('should replace the previous definition of the same local type', () => {
        const first = createMessageDefinition(3, 20, 'little', [], []);
        const second = createMessageDefinition(3, 18, 'big', [], []);

        expect(table.set(first)).toBeUndefined();
        expect(table.set(second)).toBe(first);
        expect(table.get(3)).toBe(second);
        expect(table.size).toBe(1);
    });

    it('should compute the data message size from all fields', () => {
        const definition = createMessageDefinition(
            0,
            20,
            'little',
            [
                { fieldDefinitionNumber: 253, size: 4, baseTypeCode: 0x86 },
                { fieldDefinitionNumber: 3, size: 1, baseTypeCode: 0x02 },
            ],
            [{ fieldDefinitionNumber: 0, size: 8, developerDataIndex: 0 }],
        );

        expect(definition.dataSize).toBe(13);
    });
});
