import { ByteSource } from '../io/byte-source';
import { CrcCalculator } from './crc-calculator';
import { FitDecodeError } from './fit-decode-error';

/**
 * Pulls bytes from the source while keeping the running file CRC and the
 * number of bytes consumed. Once the data region is set, record reads may
 * not cross its end.
 */
export class RecordReader {
    private readonly crc = new CrcCalculator();
    private consumed = 0;
    private dataEnd = Number.POSITIVE_INFINITY;

    constructor(private readonly source: ByteSource) { }

    public get offset(): number {
        return this.consumed;
    }

    public get crcValue(): number {
        return this.crc.value;
    }

    public setDataRegion(size: number): void {
        this.dataEnd = this.consumed + size;
    }

    public get remaining(): number {
        return this.dataEnd - this.consumed;
    }

    public read(length: number): Uint8Array {
        if (length > this.remaining) {
            throw new FitDecodeError(
                'TrailingDataSizeMismatch',
                `record needs ${length} bytes but only ${this.remaining} remain in the declared data size`,
                this.consumed,
            );
        }
        const bytes = this.readExact(length);
        this.crc.update(bytes);
        return bytes;
    }

    public readByte(): number {
        return this.read(1)[0];
    }

    /**
     * Bytes after the data region, not folded into the CRC.
     */
    public readTrailer(length: number): Uint8Array {
        return this.readExact(length);
    }

    private readExact(length: number): Uint8Array {
        const bytes = this.source.read(length);
        if (bytes.length < length) {
            throw new FitDecodeError(
                'UnexpectedEof',
                `wanted ${length} bytes, stream ended after ${bytes.length}`,
                this.consumed + bytes.length,
            );
        }
        this.consumed += length;
        return bytes;
    }
}
