import type { AxiosInstance } from 'axios';

export type JsonPrimitive = string | number | boolean | null;
export type JsonValue = JsonPrimitive | JsonValue[] | { [key: string]: JsonValue };
export type JsonObject = { [key: string]: JsonValue };

/**
 * Session cookies obtained by `login`. An empty object is an anonymous session.
 */
export interface Credentials {
    sessionId?: string;
    csrfToken?: string;
}

export const ANONYMOUS: Readonly<Credentials> = Object.freeze({});

export const MODEL_TYPES = [
    'Station',
    'Timeseries',
    'Instrument',
    'Variable',
    'UnitOfMeasurement',
    'TimeZone',
    'Organization',
    'Person',
    'StationType',
] as const;

export type ModelType = typeof MODEL_TYPES[number];

export type ModelFields = JsonObject;

export interface TimeseriesRecord {
    timestamp: Date;
    value: number | null; // null for a missing value
    flags: string;
}

export interface DateRange {
    startDate?: Date;
    endDate?: Date;
}

export interface ClientOptions {
    /**
     * Transport to issue the request with; defaults to the shared instance in services/http.
     */
    http?: AxiosInstance;
}
