const CRC_TABLE = [
    0x0000, 0xCC01, 0xD801, 0x1400, 0xF001, 0x3C00, 0x2800, 0xE401,
    0xA001, 0x6C00, 0x7800, 0xB401, 0x5000, 0x9C01, 0x8801, 0x4400,
];

/**
 * FIT CRC-16, fed one byte at a time.
 */
export class CrcCalculator {
    private crc = 0;

    public static calculate(data: Uint8Array, start = 0, end = data.length): number {
        const calculator = new CrcCalculator();
        calculator.update(data, start, end);
        return calculator.value;
    }

    public get value(): number {
        return this.crc;
    }

    public update(data: Uint8Array, start = 0, end = data.length): number {
        for (let i = start; i < end; i++) {
            this.addByte(data[i]);
        }
        return this.crc;
    }

    public addByte(byte: number): number {
        // lower four bits
        let crc = this.crc;
        let tmp = CRC_TABLE[crc & 0xF];
        crc = (crc >> 4) & 0x0FFF;
        crc = crc ^ tmp ^ CRC_TABLE[byte & 0xF];

        // upper four bits
        tmp = CRC_TABLE[crc & 0xF];
        crc = (crc >> 4) & 0x0FFF;
        crc = crc ^ tmp ^ CRC_TABLE[(byte >> 4) & 0xF];

        this.crc = crc;
        return crc;
    }
}
