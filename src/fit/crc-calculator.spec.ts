import { CrcCalculator } from './crc-calculator';

describe('CrcCalculator', () => {
    const ascii = (s: string) => Uint8Array.from(Buffer.from(s, 'ascii'));

    it('should compute the CRC-16 check value for "123456789"', () => {
        expect(CrcCalculator.calculate(ascii('123456789'))).toBe(0xBB3D);
    });

    it('should return 0 for no data', () => {
        expect(CrcCalculator.calculate(new Uint8Array(0))).toBe(0);
    });

    it('should give the same value when fed incrementally', () => {
        const data = ascii('123456789');
        const calculator = new CrcCalculator();
        calculator.update(data, 0, 4);
        data.subarray(4).forEach(b => calculator.addByte(b));

        expect(calculator.value).toBe(CrcCalculator.calculate(data));
    });

    it('should honour start and end offsets', () => {
        const data = ascii('xx123456789yy');
        expect(CrcCalculator.calculate(data, 2, 11)).toBe(0xBB3D);
    });

    it('should be zero over data followed by its own little-endian CRC', () => {
        const data = ascii('123456789');
        const crc = CrcCalculator.calculate(data);
        const withCrc = new Uint8Array([...data, crc & 0xFF, crc >> 8]);

        expect(CrcCalculator.calculate(withCrc)).toBe(0);
    });

    it('should change when any single byte changes', () => {
        const data = ascii('.FIT header and some records');
        const original = CrcCalculator.calculate(data);

        for (let i = 0; i < data.length; i++) {
            const corrupted = data.slice();
            corrupted[i] ^= 0x01;
            expect(CrcCalculator.calculate(corrupted)).not.toBe(original);
        }
    });
});
