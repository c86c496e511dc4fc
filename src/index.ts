export { FitDecoder } from './decoder/fit-decoder';
export type { FitMessage } from './decoder/fit-decoder';
export { FitDecoderEvents } from './decoder/fit-decoder-events';
export type { FitDecoderEventName } from './decoder/fit-decoder-events';
export { DEFAULT_FIT_DECODER_OPTIONS } from './decoder/fit-decoder-options';
export type { FitDecoderOptions } from './decoder/fit-decoder-options';

export { read, DEFAULT_READ_OPTIONS } from './fit/fit-reader';
export type { FitMessageCallback, FitDecodeSummary, ReadOptions } from './fit/fit-reader';
export { FitDecodeError, isFitDecodeError } from './fit/fit-decode-error';
export type { FitDecodeErrorCode } from './fit/fit-decode-error';
export type { FileHeader } from './fit/file-header';
export { findNativeField, scalarNumber } from './fit/field-value';
export type { DecodedField, DeveloperField, Endianness, FieldValue, NativeField, NumericElement } from './fit/field-value';
export { BASE_TYPES, getBaseType } from './fit/base-types';
export type { BaseType, BaseTypeName } from './fit/base-types';
export { decodeField } from './fit/field-decoder';
export { CrcCalculator } from './fit/crc-calculator';
export type { MessageDefinition, FieldDefinition, DeveloperFieldDefinition } from './fit/definition-table';
export type { DeveloperFieldMeta, DeveloperDataId, ReadonlyDeveloperFieldRegistry } from './fit/developer-field-registry';
export type { DataMessage } from './fit/record-decoder';
export { FitCommonField, FitMesgNum } from './fit/fit-constants';
export { globalMessageName } from './fit/global-messages';
export { fitTimestampToDate, dateToFitTimestamp } from './fit/fit-time';
export { BufferByteSource, FileByteSource } from './io/byte-source';
export type { ByteSource } from './io/byte-source';
