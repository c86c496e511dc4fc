import debug from 'debug';

import { ByteSource } from '../io/byte-source';
import { MessageDefinition } from './definition-table';
import { ReadonlyDeveloperFieldRegistry } from './developer-field-registry';
import { DecodedField } from './field-value';
import { FIT_CRC_SIZE } from './fit-constants';
import { FitDecodeError } from './fit-decode-error';
import { FileHeader, readFileHeader } from './file-header';
import { RecordDecoder, WarningHandler } from './record-decoder';
import { RecordReader } from './record-reader';

const logger = debug('FIT_READER');

export type FitMessageCallback<C> = (
    timestamp: number | undefined,
    globalMessageNumber: number,
    localMessageType: number,
    messageIndex: number | undefined,
    fields: DecodedField[],
    context: C,
) => void;

export interface ReadOptions {
    checkHeaderCrc: boolean;
    checkFileCrc: boolean;
    onWarning?: WarningHandler;
    onDefinition?: (definition: MessageDefinition) => void;
}

export const DEFAULT_READ_OPTIONS: ReadOptions = {
    checkHeaderCrc: true,
    checkFileCrc: true,
};

export interface FitDecodeSummary {
    header: FileHeader;
    definitionMessages: number;
    dataMessages: number;
    crc: number;
    developerFields: ReadonlyDeveloperFieldRegistry;
}

/**
 * Decode one FIT file from `source`, calling `callback` once per data
 * message in file order. `context` is handed to every callback untouched.
 * Throws a FitDecodeError on the first fatal problem; callbacks made before
 * that stand. An exception thrown by the callback stops decoding and is
 * rethrown as is.
 */
export function read<C>(
    source: ByteSource,
    callback: FitMessageCallback<C>,
    context: C,
    options: Partial<ReadOptions> = {},
): FitDecodeSummary {
    const opts: ReadOptions = { ...DEFAULT_READ_OPTIONS, ...options };
    const reader = new RecordReader(source);

    const header = readFileHeader(reader, opts.checkHeaderCrc);
    logger(`Header: ${header.headerSize} bytes, protocol ${header.protocolVersion}, profile ${header.profileVersion}, ${header.dataSize} data bytes`);

    reader.setDataRegion(header.dataSize);
    const decoder = new RecordDecoder(reader, opts.onWarning);
    let definitionMessages = 0;
    let dataMessages = 0;

    while (reader.remaining > 0) {
        const result = decoder.decodeNext();
        if (result.type === 'definition') {
            definitionMessages++;
            opts.onDefinition?.(result.definition);
            continue;
        }

        dataMessages++;
        const { timestamp, globalMessageNumber, localMessageType, messageIndex, fields } = result.message;
        callback(timestamp, globalMessageNumber, localMessageType, messageIndex, fields, context);
    }

    const crc = reader.crcValue;
    const trailer = reader.readTrailer(FIT_CRC_SIZE);
    const storedCrc = trailer[0] | (trailer[1] << 8);
    if (opts.checkFileCrc && storedCrc !== crc) {
        throw new FitDecodeError(
            'FileCrcMismatch',
            `file CRC 0x${storedCrc.toString(16)} != computed 0x${crc.toString(16)}`,
            reader.offset,
        );
    }

    logger(`Decoded ${dataMessages} data messages and ${definitionMessages} definitions`);
    return {
        header,
        definitionMessages,
        dataMessages,
        crc,
        developerFields: decoder.developerFields,
    };
}
