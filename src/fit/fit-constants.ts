/**
 * File header layout
 */
export const FIT_SIGNATURE = '.FIT';
export const FIT_HEADER_SIZE_LEGACY = 12;
export const FIT_HEADER_SIZE = 14;
export const FIT_CRC_SIZE = 2;

/**
 * Seconds between the unix epoch and the FIT epoch (1989-12-31T00:00:00Z)
 */
export const FIT_EPOCH_OFFSET_SECONDS = 631065600;

/**
 * Record header bit masks
 */
export enum RecordHeaderMask {
    COMPRESSED_TIMESTAMP = 0x80,
    DEFINITION = 0x40,
    DEVELOPER_DATA = 0x20,
    RESERVED = 0x10,
    LOCAL_MESSAGE_TYPE = 0x0F,
    COMPRESSED_LOCAL_MESSAGE_TYPE = 0x60,
    COMPRESSED_TIME_OFFSET = 0x1F,
}

export const COMPRESSED_LOCAL_MESSAGE_TYPE_SHIFT = 5;

/**
 * Definition message architecture byte
 */
export enum FitArchitecture {
    LITTLE_ENDIAN = 0,
    BIG_ENDIAN = 1,
}

/**
 * Field definition numbers shared by every global message
 */
export enum FitCommonField {
    PART_INDEX = 250,
    TIMESTAMP = 253,
    MESSAGE_INDEX = 254,
}

/**
 * Well-known global message numbers
 */
export enum FitMesgNum {
    FILE_ID = 0,
    RECORD = 20,
    FIELD_DESCRIPTION = 206,
    DEVELOPER_DATA_ID = 207,
}

/**
 * Field numbers of the field_description message (206)
 */
export enum FieldDescriptionField {
    DEVELOPER_DATA_INDEX = 0,
    FIELD_DEFINITION_NUMBER = 1,
    FIT_BASE_TYPE_ID = 2,
    FIELD_NAME = 3,
    UNITS = 8,
    NATIVE_MESG_NUM = 14,
    NATIVE_FIELD_NUM = 15,
}

/**
 * Field numbers of the developer_data_id message (207)
 */
export enum DeveloperDataIdField {
    DEVELOPER_ID = 0,
    APPLICATION_ID = 1,
    MANUFACTURER_ID = 2,
    DEVELOPER_DATA_INDEX = 3,
    APPLICATION_VERSION = 4,
}
