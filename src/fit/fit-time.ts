import { FIT_EPOCH_OFFSET_SECONDS } from './fit-constants';

/**
 * FIT timestamps count seconds from 1989-12-31T00:00:00Z.
 */
export function fitTimestampToDate(timestamp: number): Date {
    return new Date((timestamp + FIT_EPOCH_OFFSET_SECONDS) * 1000);
}

export function dateToFitTimestamp(date: Date): number {
    return Math.round(date.getTime() / 1000) - FIT_EPOCH_OFFSET_SECONDS;
}
