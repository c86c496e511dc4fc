/**
 * Event names emitted by FitDecoder
 */
export const FitDecoderEvents = {
    DEFINITION: Symbol('FitDecoder:definition'),
    MESSAGE: Symbol('FitDecoder:message'),
    WARNING: Symbol('FitDecoder:warning'),
    END: Symbol('FitDecoder:end'),
    ERROR: Symbol('FitDecoder:error'),
} as const;

export type FitDecoderEventName = typeof FitDecoderEvents[keyof typeof FitDecoderEvents];
