import debug from 'debug';
import { EventEmitter } from 'events';
import { Observable } from 'rxjs';

import { FitDecodeSummary, FitMessageCallback, read } from '../fit/fit-reader';
import { DataMessage } from '../fit/record-decoder';
import { globalMessageName } from '../fit/global-messages';
import { ByteSource, FileByteSource } from '../io/byte-source';
import { FitDecoderEvents } from './fit-decoder-events';
import { DEFAULT_FIT_DECODER_OPTIONS, FitDecoderOptions } from './fit-decoder-options';

const logger = debug('FIT_DECODER');

export interface FitMessage extends DataMessage {
    // profile name of the global message, when it is a well-known one
    name?: string;
}

// thrown from inside the callback once an Observable subscriber has gone away
class DecodeAborted extends Error { }

export class FitDecoder extends EventEmitter {
    private options: FitDecoderOptions = { ...DEFAULT_FIT_DECODER_OPTIONS };

    constructor(optionsFn?: (o: FitDecoderOptions) => void) {
        super();
        optionsFn?.(this.options);
    }

    public getOptions(): FitDecoderOptions {
        return { ...this.options };
    }

    /**
     * Decode a FIT file, emitting DEFINITION, MESSAGE and WARNING events as
     * it goes and END with the summary, or ERROR before rethrowing.
     */
    public read<C>(source: ByteSource, callback: FitMessageCallback<C>, context: C): FitDecodeSummary {
        try {
            const summary = read(
                source,
                (timestamp, globalMessageNumber, localMessageType, messageIndex, fields, ctx) => {
                    this.emit(FitDecoderEvents.MESSAGE, toFitMessage({ timestamp, globalMessageNumber, localMessageType, messageIndex, fields }));
                    callback(timestamp, globalMessageNumber, localMessageType, messageIndex, fields, ctx);
                },
                context,
                {
                    checkHeaderCrc: this.options.checkHeaderCrc,
                    checkFileCrc: this.options.checkFileCrc,
                    onWarning: warning => {
                        this.options.onWarning?.(warning);
                        this.emit(FitDecoderEvents.WARNING, warning);
                    },
                    onDefinition: definition => this.emit(FitDecoderEvents.DEFINITION, definition),
                },
            );
            this.emit(FitDecoderEvents.END, summary);
            return summary;
        } catch (err) {
            if (!(err instanceof DecodeAborted)) {
                logger('Decoding failed:', err);
                this.emit(FitDecoderEvents.ERROR, err);
            }
            throw err;
        }
    }

    /**
     * Same as read(), pulling the file through a FileByteSource of the
     * configured chunk size.
     */
    public readFile<C>(path: string, callback: FitMessageCallback<C>, context: C): FitDecodeSummary {
        const source = new FileByteSource(path, this.options.chunkSize);
        try {
            return this.read(source, callback, context);
        } finally {
            source.close();
        }
    }

    /**
     * Cold stream of the data messages of one file. Decoding starts on
     * subscribe and stops once the subscriber unsubscribes.
     */
    public decode$(source: ByteSource): Observable<FitMessage> {
        return this.toObservable(callback => this.read(source, callback, undefined));
    }

    public decodeFile$(path: string): Observable<FitMessage> {
        return this.toObservable(callback => this.readFile(path, callback, undefined));
    }

    private toObservable(run: (callback: FitMessageCallback<undefined>) => FitDecodeSummary): Observable<FitMessage> {
        return new Observable<FitMessage>(subscriber => {
            try {
                run((timestamp, globalMessageNumber, localMessageType, messageIndex, fields) => {
                    if (subscriber.closed) {
                        throw new DecodeAborted();
                    }
                    subscriber.next(toFitMessage({ timestamp, globalMessageNumber, localMessageType, messageIndex, fields }));
                });
                subscriber.complete();
            } catch (err) {
                if (err instanceof DecodeAborted) {
                    logger('Subscriber closed, decoding stopped');
                    return;
                }
                subscriber.error(err);
            }
        });
    }
}

function toFitMessage(message: DataMessage): FitMessage {
    return { ...message, name: globalMessageName(message.globalMessageNumber) };
}
