import debug from 'debug';
import { closeSync, openSync, readSync } from 'fs';

const logger = debug('BYTE_SOURCE');

export const DEFAULT_CHUNK_SIZE = 64 * 1024;

/**
 * Forward-only pull source. `read` returns fewer than `length` bytes only
 * when the input is exhausted.
 */
export interface ByteSource {
    read(length: number): Uint8Array;
}

export class BufferByteSource implements ByteSource {
    private position = 0;

    constructor(private readonly data: Uint8Array) { }

    public read(length: number): Uint8Array {
        const end = Math.min(this.position + length, this.data.length);
        const bytes = this.data.subarray(this.position, end);
        this.position = end;
        return bytes;
    }
}

/**
 * Reads a file through a fixed-size chunk buffer, so memory use does not
 * grow with the file. Accepts a path (opened and closed here) or an already
 * open descriptor (left open).
 */
export class FileByteSource implements ByteSource {
    private fd: number | null;
    private readonly ownsDescriptor: boolean;
    private readonly chunk: Buffer;
    private chunkStart = 0;
    private chunkEnd = 0;
    private eof = false;

    constructor(file: string | number, chunkSize: number = DEFAULT_CHUNK_SIZE) {
        if (!Number.isInteger(chunkSize) || chunkSize <= 0) {
            throw new Error(`Invalid chunk size ${chunkSize}`);
        }
        if (typeof file === 'number') {
            this.fd = file;
            this.ownsDescriptor = false;
        } else {
            this.fd = openSync(file, 'r');
            this.ownsDescriptor = true;
            logger(`Opened ${file}`);
        }
        this.chunk = Buffer.alloc(chunkSize);
    }

    public read(length: number): Uint8Array {
        const out = new Uint8Array(length);
        let filled = 0;
        while (filled < length) {
            if (this.chunkStart === this.chunkEnd && !this.fill()) {
                break;
            }
            const count = Math.min(length - filled, this.chunkEnd - this.chunkStart);
            out.set(this.chunk.subarray(this.chunkStart, this.chunkStart + count), filled);
            this.chunkStart += count;
            filled += count;
        }
        return filled === length ? out : out.subarray(0, filled);
    }

    public close(): void {
        if (this.fd != null && this.ownsDescriptor) {
            closeSync(this.fd);
            logger('Closed file');
        }
        this.fd = null;
    }

    private fill(): boolean {
        if (this.eof || this.fd == null) {
            return false;
        }
        const bytesRead = readSync(this.fd, this.chunk, 0, this.chunk.length, null);
        this.chunkStart = 0;
        this.chunkEnd = bytesRead;
        if (bytesRead === 0) {
            this.eof = true;
            return false;
        }
        return true;
    }
}
