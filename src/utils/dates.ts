import { format, isValid, parse } from 'date-fns';
import type { FieldValue } from '../types/index.js';

/** The CRM's date fields are written as MM/dd/yyyy. */
export const CRM_DATE_FORMAT = 'MM/dd/yyyy';

/** Formats tried, in order, when reading a date someone typed into the CRM. */
export const ACCEPTED_DATE_FORMATS = ['MM/dd/yyyy', 'yyyy-MM-dd', 'MM-dd-yyyy', 'dd/MM/yyyy'] as const;

export function formatCrmDate(date: Date): string {
    return format(date, CRM_DATE_FORMAT);
}

/** `yyyy` in date-fns also takes one to three digits; a CRM date needs all four. */
function hasFullYear(date: Date): boolean {
    return isValid(date) && date.getFullYear() >= 1000;
}

/**
 * Parse a date against each accepted format in turn. Returns null when no
 * format matches the whole string with a four-digit year.
 */
export function parseFlexibleDate(
    value: FieldValue | undefined,
    formats: readonly string[] = ACCEPTED_DATE_FORMATS,
): Date | null {
    if (typeof value !== 'string') return null;
    const text = value.trim();
    if (!text) return null;

    const reference = new Date(2000, 0, 1);
    for (const pattern of formats) {
        const parsed = parse(text, pattern, reference);
        if (hasFullYear(parsed)) {
            return parsed;
        }
    }
    return null;
}

/** `2024-01-15` → `01/15/2024`; anything else is returned unchanged. */
export function convertIsoDate(value: string): string {
    if (!value) return '';
    const parsed = parse(value, 'yyyy-MM-dd', new Date(2000, 0, 1));
    return hasFullYear(parsed) ? formatCrmDate(parsed) : value;
}

/** Split a comma-separated date list. Blank or missing values give an empty list. */
export function splitDateList(value: FieldValue | undefined): string[] {
    if (value === null || value === undefined) return [];
    const text = String(value);
    if (text.trim() === '') return [];
    return text.split(',').map(part => part.trim());
}

/** Append a date to a list field, keeping every component already there. */
export function appendDate(current: FieldValue | undefined, date: string): string {
    const existing = current === null || current === undefined ? '' : String(current);
    return existing.trim() === '' ? date : `${existing},${date}`;
}

/** `3725` seconds → `1h 2m 5s` */
export function formatDuration(totalSeconds: number): string {
    const hours = Math.floor(totalSeconds / 3600);
    const minutes = Math.floor((totalSeconds % 3600) / 60);
    const seconds = Math.floor(totalSeconds % 60);
    return `${hours}h ${minutes}m ${seconds}s`;
}
