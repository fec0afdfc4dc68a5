import { describe, expect, it } from 'vitest';
import {
    appendDate,
    convertIsoDate,
    formatCrmDate,
    formatDuration,
    parseFlexibleDate,
    splitDateList,
} from '../../src/utils/dates.js';

describe('parseFlexibleDate', () => {
    it('reads each accepted format', () => {
        expect(parseFlexibleDate('01/15/2024')).toEqual(new Date(2024, 0, 15));
        expect(parseFlexibleDate('2024-01-15')).toEqual(new Date(2024, 0, 15));
        expect(parseFlexibleDate('01-15-2024')).toEqual(new Date(2024, 0, 15));
        expect(parseFlexibleDate('3/1/2024')).toEqual(new Date(2024, 2, 1));
    });

    it('returns null for text that is not a date', () => {
        expect(parseFlexibleDate('not-a-date')).toBeNull();
        expect(parseFlexibleDate('')).toBeNull();
        expect(parseFlexibleDate(null)).toBeNull();
        expect(parseFlexibleDate(42)).toBeNull();
    });

    it('rejects a year written with fewer than four digits', () => {
        expect(parseFlexibleDate('3/1/24')).toBeNull();
        expect(parseFlexibleDate('24-01-15')).toBeNull();
    });
});

describe('convertIsoDate', () => {
    it('rewrites ISO dates in the CRM format', () => {
        expect(convertIsoDate('2024-01-15')).toBe('01/15/2024');
    });

    it('leaves anything else alone', () => {
        expect(convertIsoDate('01/15/2024')).toBe('01/15/2024');
        expect(convertIsoDate('')).toBe('');
        expect(convertIsoDate('24-01-15')).toBe('24-01-15');
    });
});

describe('date lists', () => {
    it('appends to an existing list', () => {
        expect(appendDate('01/01/2024', '03/15/2024')).toBe('01/01/2024,03/15/2024');
        expect(appendDate('', '03/15/2024')).toBe('03/15/2024');
        expect(appendDate(undefined, '03/15/2024')).toBe('03/15/2024');
    });

    it('splits and trims', () => {
        expect(splitDateList('01/01/2024, 02/01/2024')).toEqual(['01/01/2024', '02/01/2024']);
        expect(splitDateList('  ')).toEqual([]);
        expect(splitDateList(null)).toEqual([]);
    });
});

describe('formatting', () => {
    it('formats CRM dates and durations', () => {
        expect(formatCrmDate(new Date(2024, 2, 5))).toBe('03/05/2024');
        expect(formatDuration(3725)).toBe('1h 2m 5s');
        expect(formatDuration(0)).toBe('0h 0m 0s');
    });
});
