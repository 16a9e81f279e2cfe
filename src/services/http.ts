import axios, { type AxiosRequestConfig, type AxiosResponse } from 'axios';
import { loadConfig, type ClientConfig } from '../lib/config';
import type { Credentials } from '../types';
import { NotFoundError, RequestError, ValidationError } from './errors';

export const SESSION_COOKIE = 'sessionid';
export const CSRF_COOKIE = 'csrftoken';
export const CSRF_HEADER = 'X-CSRFToken';

export const createHttp = (config: ClientConfig = loadConfig()) => axios.create({
    timeout: config.timeoutMs,
    headers: { 'User-Agent': config.userAgent },
    // Statuses are mapped to errors by ensureSuccess, not by axios.
    validateStatus: () => true
});

const http = createHttp();

const describeStatus = (status: number, statusText?: string) =>
    `${status} ${statusText || 'Unknown error'}`;

export const formatAxiosError = (error: unknown, context: string) => {
    if (!axios.isAxiosError(error)) {
        return `${context}: Unexpected error.`;
    }
    const status = error.response?.status;
    return `${context}: ${status ? describeStatus(status, error.response?.statusText) : 'Network/timeout error'}.`;
};

/**
 * Request config carrying the session cookies, plus the CSRF header for unsafe methods.
 * Status validation is disabled here as well so that caller-supplied instances behave the same.
 */
export function requestConfig(
    credentials: Credentials,
    options: { csrf?: boolean; headers?: Record<string, string> } = {}
): AxiosRequestConfig {
    const headers: Record<string, string> = { ...options.headers };
    const cookies: string[] = [];
    if (credentials.sessionId) cookies.push(`${SESSION_COOKIE}=${credentials.sessionId}`);
    if (credentials.csrfToken) cookies.push(`${CSRF_COOKIE}=${credentials.csrfToken}`);
    if (cookies.length > 0) headers.Cookie = cookies.join('; ');
    if (options.csrf && credentials.csrfToken) headers[CSRF_HEADER] = credentials.csrfToken;

    return { headers, validateStatus: () => true };
}

/**
 * Cookies set by a response, name -> value. Attributes (Path, HttpOnly...) are dropped.
 */
export function readCookies(response: AxiosResponse): Record<string, string> {
    const cookies: Record<string, string> = {};
    const raw: unknown = response.headers['set-cookie'];
    const headers = Array.isArray(raw) ? raw : [raw];
    for (const header of headers) {
        if (typeof header !== 'string') continue;
        const pair = header.split(';')[0];
        const separator = pair.indexOf('=');
        if (separator <= 0) continue;
        cookies[pair.slice(0, separator).trim()] = pair.slice(separator + 1).trim();
    }
    return cookies;
}

/**
 * Runs a single request, turning transport failures (timeouts, refused connections) into RequestError.
 */
export async function send<T>(request: () => Promise<AxiosResponse<T>>, context: string): Promise<AxiosResponse<T>> {
    try {
        return await request();
    } catch (error) {
        const message = formatAxiosError(error, context);
        console.warn(message);
        throw new RequestError(message, { status: axios.isAxiosError(error) ? error.response?.status : undefined, cause: error });
    }
}

const isStringList = (value: unknown): value is string[] =>
    Array.isArray(value) && value.every(item => typeof item === 'string');

/**
 * Reads a field-error body such as `{ "name": ["This field is required."] }`.
 * Returns null when the body does not have that shape.
 */
export function readFieldErrors(data: unknown): Record<string, string[]> | null {
    if (typeof data !== 'object' || data === null || Array.isArray(data)) return null;

    const fieldErrors: Record<string, string[]> = {};
    for (const [field, value] of Object.entries(data)) {
        if (typeof value === 'string') {
            fieldErrors[field] = [value];
        } else if (isStringList(value)) {
            fieldErrors[field] = value;
        } else {
            return null;
        }
    }
    return Object.keys(fieldErrors).length > 0 ? fieldErrors : null;
}

/**
 * Throws the error matching a non-2xx response: NotFoundError for 404, ValidationError for a
 * 400 with field errors when `validation` is set, RequestError for anything else.
 */
export function ensureSuccess(response: AxiosResponse, context: string, options: { validation?: boolean } = {}): void {
    const { status } = response;
    if (status >= 200 && status < 300) return;

    const message = `${context}: ${describeStatus(status, response.statusText)}.`;
    console.warn(message);

    if (status === 404) {
        throw new NotFoundError(message);
    }
    if (status === 400 && options.validation) {
        const fieldErrors = readFieldErrors(response.data);
        if (fieldErrors) throw new ValidationError(message, fieldErrors);
    }
    throw new RequestError(message, { status });
}

export default http;
