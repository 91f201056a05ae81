import {
    compareIsoDates,
    daysBetween,
    isIsoDate,
    maxIsoDate,
    minIsoDate,
    toDayNumber,
} from '../dates';

describe('date utilities', () => {
    describe('toDayNumber', () => {
        it('returns the UTC day number for a valid date', () => {
            expect(toDayNumber('1970-01-01')).toBe(0);
            expect(toDayNumber('1970-01-02')).toBe(1);
        });

        it('rejects impossible calendar dates', () => {
            expect(toDayNumber('2024-02-30')).toBeNull();
            expect(toDayNumber('2023-02-29')).toBeNull();
            expect(toDayNumber('2024-13-01')).toBeNull();
        });

        it('rejects values that are not YYYY-MM-DD', () => {
            expect(toDayNumber('2024-1-5')).toBeNull();
            expect(toDayNumber('2024-01-05T00:00:00Z')).toBeNull();
            expect(toDayNumber('')).toBeNull();
        });
    });

    it('isIsoDate accepts leap days and rejects non-strings', () => {
        expect(isIsoDate('2024-02-29')).toBe(true);
        expect(isIsoDate(20240229)).toBe(false);
        expect(isIsoDate(null)).toBe(false);
    });

    it('daysBetween counts calendar days across a leap February', () => {
        expect(daysBetween('2024-01-31', '2024-04-01')).toBe(61);
        expect(daysBetween('2024-04-01', '2024-01-31')).toBe(-61);
        expect(daysBetween('2024-03-15', '2024-03-15')).toBe(0);
    });

    it('daysBetween throws on an invalid date', () => {
        expect(() => daysBetween('2024-02-30', '2024-03-01')).toThrow(RangeError);
    });

    it('orders and picks dates', () => {
        expect(compareIsoDates('2024-01-01', '2024-01-02')).toBeLessThan(0);
        expect(maxIsoDate('2024-01-01', '2023-12-31')).toBe('2024-01-01');
        expect(minIsoDate('2024-01-01', '2023-12-31')).toBe('2023-12-31');
    });
});
