import { WarningHandler } from '../fit/record-decoder';
import { DEFAULT_CHUNK_SIZE } from '../io/byte-source';

export const DEFAULT_FIT_DECODER_OPTIONS: FitDecoderOptions = {
    checkHeaderCrc: true,
    checkFileCrc: true,
    chunkSize: DEFAULT_CHUNK_SIZE,
};

export interface FitDecoderOptions {
    checkHeaderCrc: boolean;
    checkFileCrc: boolean;
    // read buffer size for files opened by path
    chunkSize: number;
    // also called for every WARNING event
    onWarning?: WarningHandler;
}
