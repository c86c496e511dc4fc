export type FitDecodeErrorCode =
    | 'InvalidHeader'
    | 'HeaderCrcMismatch'
    | 'FileCrcMismatch'
    | 'TrailingDataSizeMismatch'
    | 'UnexpectedEof'
    | 'UnknownLocalMessageType'
    | 'UnresolvedDeveloperField'
    | 'MissingTimestampContext'
    | 'UnsupportedBaseType'
    | 'InvalidDefinition';

export class FitDecodeError extends Error {
    constructor(
        public readonly code: FitDecodeErrorCode,
        message: string,
        // bytes of the file consumed when the problem was detected
        public readonly offset: number,
    ) {
        super(`${code}: ${message} (offset ${offset})`);
        this.name = 'FitDecodeError';
    }
}

export function isFitDecodeError(err: unknown, code?: FitDecodeErrorCode): err is FitDecodeError {
    return err instanceof FitDecodeError && (code == null || err.code === code);
}
