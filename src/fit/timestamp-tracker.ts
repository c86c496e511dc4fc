import { RecordHeaderMask } from './fit-constants';

const ROLLOVER = 0x20;
const UINT32_RANGE = 0x100000000;

/**
 * Remembers the last absolute timestamp so compressed timestamp headers can
 * be expanded.
 */
export class TimestampTracker {
    private last: number | undefined;

    public get lastTimestamp(): number | undefined {
        return this.last;
    }

    public update(timestamp: number): void {
        this.last = timestamp;
    }

    /**
     * Replace the low five bits of the last timestamp with `timeOffset`,
     * rolling over by 32 seconds when the offset went backwards.
     * Returns undefined when no absolute timestamp has been seen yet.
     */
    public applyCompressedOffset(timeOffset: number): number | undefined {
        if (this.last == null) {
            return undefined;
        }
        const offset = timeOffset & RecordHeaderMask.COMPRESSED_TIME_OFFSET;
        const lastOffset = this.last & RecordHeaderMask.COMPRESSED_TIME_OFFSET;
        let timestamp = this.last - lastOffset + offset;
        if (offset < lastOffset) {
            timestamp += ROLLOVER;
        }
        this.last = timestamp % UINT32_RANGE;
        return this.last;
    }
}
