import { CrcCalculator } from './crc-calculator';
import { FIT_HEADER_SIZE, FIT_HEADER_SIZE_LEGACY, FIT_SIGNATURE } from './fit-constants';
import { FitDecodeError } from './fit-decode-error';
import { RecordReader } from './record-reader';

export interface FileHeader {
    headerSize: number;
    protocolVersion: number;
    profileVersion: number;
    dataSize: number;
    signature: string;
    // only present on 14 byte headers; 0 means the writer did not compute it
    headerCrc?: number;
}

/**
 * Read and validate the file header.
 * @param checkCrc - compare a non-zero header CRC against the first 12 bytes
 */
export function readFileHeader(reader: RecordReader, checkCrc: boolean): FileHeader {
    const headerSize = reader.read(1)[0];
    if (headerSize !== FIT_HEADER_SIZE_LEGACY && headerSize !== FIT_HEADER_SIZE) {
        throw new FitDecodeError('InvalidHeader', `unsupported header size ${headerSize}`, reader.offset);
    }

    const bytes = new Uint8Array(headerSize);
    bytes[0] = headerSize;
    bytes.set(reader.read(headerSize - 1), 1);

    const view = new DataView(bytes.buffer);
    const signature = String.fromCharCode(...bytes.subarray(8, 12));
    if (signature !== FIT_SIGNATURE) {
        throw new FitDecodeError('InvalidHeader', 'missing .FIT signature', reader.offset);
    }

    const header: FileHeader = {
        headerSize,
        protocolVersion: view.getUint8(1),
        profileVersion: view.getUint16(2, true),
        dataSize: view.getUint32(4, true),
        signature,
    };

    if (headerSize === FIT_HEADER_SIZE) {
        header.headerCrc = view.getUint16(12, true);
        if (checkCrc && header.headerCrc !== 0) {
            const computed = CrcCalculator.calculate(bytes, 0, FIT_HEADER_SIZE_LEGACY);
            if (computed !== header.headerCrc) {
                throw new FitDecodeError(
                    'HeaderCrcMismatch',
                    `header CRC 0x${header.headerCrc.toString(16)} != computed 0x${computed.toString(16)}`,
                    reader.offset,
                );
            }
        }
    }

    return header;
}
