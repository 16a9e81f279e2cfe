import type { TimeseriesRecord } from '../types';
import { TimeseriesFormatError } from '../services/errors';
import { formatTimestamp, parseTimestamp } from './dateUtils';

// Line format: "2014-01-01 08:00,11.5,FLAG1 FLAG2"; value and flags may be empty.

/**
 * Sorts records chronologically and drops duplicate timestamps, keeping the last occurrence.
 */
export function normalizeRecords(records: TimeseriesRecord[]): TimeseriesRecord[] {
    const byTime = new Map<number, TimeseriesRecord>();
    records.forEach(record => {
        byTime.set(record.timestamp.getTime(), record);
    });
    return Array.from(byTime.entries())
        .sort((a, b) => a[0] - b[0])
        .map(([, record]) => record);
}

const parseValue = (field: string | undefined, line: number): number | null => {
    const trimmed = field?.trim() ?? '';
    if (trimmed === '' || trimmed.toLowerCase() === 'nan') return null;
    const value = Number(trimmed);
    if (!Number.isFinite(value)) {
        throw new TimeseriesFormatError(`Invalid value "${trimmed}"`, line);
    }
    return value;
};

const normalizeFlags = (flags: string) => flags.trim().split(/\s+/).filter(Boolean).join(' ');

export function parseTsData(text: string): TimeseriesRecord[] {
    const records: TimeseriesRecord[] = [];

    text.split(/\r?\n/).forEach((rawLine, index) => {
        if (!rawLine.trim()) return;
        const [timestampField, valueField, ...flagFields] = rawLine.split(',');

        const timestamp = parseTimestamp(timestampField);
        if (!timestamp) {
            throw new TimeseriesFormatError(`Invalid timestamp "${timestampField.trim()}"`, index + 1);
        }

        records.push({
            timestamp,
            value: parseValue(valueField, index + 1),
            flags: normalizeFlags(flagFields.join(' '))
        });
    });

    return normalizeRecords(records);
}

export function serializeTsData(records: TimeseriesRecord[]): string {
    return normalizeRecords(records)
        .map(record => {
            const value = record.value === null ? '' : String(record.value);
            return `${formatTimestamp(record.timestamp)},${value},${normalizeFlags(record.flags)}\n`;
        })
        .join('');
}

/**
 * Timestamp of the last non-blank line of a records text, or null if there is none.
 */
export function lastTimestamp(text: string): Date | null {
    const lines = text.split(/\r?\n/);
    for (let index = lines.length - 1; index >= 0; index--) {
        const line = lines[index].trim();
        if (!line) continue;
        const field = line.split(',')[0];
        const timestamp = parseTimestamp(field);
        if (!timestamp) {
            throw new TimeseriesFormatError(`Invalid timestamp "${field.trim()}"`, index + 1);
        }
        return timestamp;
    }
    return null;
}
