import { isValid, parseISO } from 'date-fns';

// The service's timestamps carry no time zone. They are held as UTC wall-clock
// time so that no local daylight-saving shift can merge or split records.

const NAIVE_TIMESTAMP = /^(\d{4}-\d{2}-\d{2})(?:[T ](\d{2}:\d{2}(?::\d{2})?))?$/;

/**
 * Milliseconds of 0001-01-01 00:00, the end date reported for a series without records.
 * Compares earlier than any real timestamp, so callers need no null check.
 */
export const MIN_TIMESTAMP: number = parseISO('0001-01-01T00:00Z').getTime();

export const minDate = (): Date => new Date(MIN_TIMESTAMP);

const pad = (n: number, width = 2) => n.toString().padStart(width, '0');

const formatDatePart = (date: Date) =>
    `${pad(date.getUTCFullYear(), 4)}-${pad(date.getUTCMonth() + 1)}-${pad(date.getUTCDate())}`;

/**
 * Formats a Date as the service writes timestamps: YYYY-MM-DD HH:mm.
 * Seconds are only written when they are not zero.
 */
export function formatTimestamp(date: Date): string {
    const time = `${pad(date.getUTCHours())}:${pad(date.getUTCMinutes())}`;
    const seconds = date.getUTCSeconds();
    return `${formatDatePart(date)} ${time}${seconds === 0 ? '' : `:${pad(seconds)}`}`;
}

/** YYYY-MM-DDTHH:mm:ss, as the service takes date query parameters. */
export function formatIsoTimestamp(date: Date): string {
    const time = `${pad(date.getUTCHours())}:${pad(date.getUTCMinutes())}:${pad(date.getUTCSeconds())}`;
    return `${formatDatePart(date)}T${time}`;
}

/**
 * Parses "YYYY-MM-DD[ HH:mm[:ss]]" (space or T separator).
 * Returns null when the string is not a timestamp.
 */
export function parseTimestamp(text: string): Date | null {
    const match = NAIVE_TIMESTAMP.exec(text.trim());
    if (!match) return null;
    const date = parseISO(`${match[1]}T${match[2] ?? '00:00'}Z`);
    return isValid(date) ? date : null;
}
