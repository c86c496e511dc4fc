import { dateToFitTimestamp, fitTimestampToDate } from './fit-time';

describe('fit-time', () => {
    it('should count from the FIT epoch', () => {
        expect(fitTimestampToDate(0).toISOString()).toBe('1989-12-31T00:00:00.000Z');
        expect(fitTimestampToDate(1104624000).toISOString()).toBe('2025-01-01T00:00:00.000Z');
    });

    it('should convert dates back to FIT timestamps', () => {
        expect(dateToFitTimestamp(new Date('2025-01-01T00:00:00Z'))).toBe(1104624000);
    });
});
