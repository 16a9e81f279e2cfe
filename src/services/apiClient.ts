import { formatIsoTimestamp, minDate } from '../lib/dateUtils';
import { lastTimestamp, parseTsData, serializeTsData } from '../lib/tsdata';
import { urljoin } from '../lib/urljoin';
import {
    ANONYMOUS,
    type ClientOptions,
    type Credentials,
    type DateRange,
    type JsonObject,
    type ModelFields,
    type ModelType,
    type TimeseriesRecord,
} from '../types';
import { AuthenticationError, RequestError } from './errors';
import defaultHttp, { CSRF_COOKIE, SESSION_COOKIE, ensureSuccess, readCookies, requestConfig, send } from './http';

export const modelUrl = (baseUrl: string, modelType: ModelType, id?: number) =>
    id === undefined
        ? urljoin(baseUrl, 'api', modelType, '/')
        : urljoin(baseUrl, 'api', modelType, String(id), '/');

export const tsDataUrl = (baseUrl: string, timeseriesId: number) =>
    urljoin(baseUrl, 'api', 'tsdata', String(timeseriesId), '/');

export const tsBottomUrl = (baseUrl: string, timeseriesId: number) =>
    urljoin(baseUrl, 'timeseries', 'd', String(timeseriesId), 'bottom', '/');

const isJsonObject = (value: unknown): value is JsonObject =>
    typeof value === 'object' && value !== null && !Array.isArray(value);


const textBody = (data: unknown) => (typeof data === 'string' ? data : '');

/**
 * Logs in with a username and password and returns the session cookies.
 * With no username this is an anonymous session: `{}` is returned and nothing is sent.
 */
export async function login(
    baseUrl: string,
    username: string | null | undefined,
    password: string | null | undefined,
    options: ClientOptions = {}
): Promise<Credentials> {
    if (!username) return {};
    const http = options.http ?? defaultHttp;
    const loginUrl = urljoin(baseUrl, 'accounts/login/');

    // The login form needs the CSRF cookie handed out with the form page.
    const page = await send(() => http.get(loginUrl, requestConfig(ANONYMOUS)), 'Login page request failed');
    ensureSuccess(page, 'Login page request failed');
    const csrfToken = readCookies(page)[CSRF_COOKIE];

    const form = new URLSearchParams({ username, password: password ?? '' });
    const response = await send(
        () => http.post(loginUrl, form, {
            ...requestConfig({ csrfToken }, { csrf: true, headers: { Referer: loginUrl } }),
            maxRedirects: 0
        }),
        'Login failed'
    );
    if (response.status >= 400) {
        const message = `Login failed: ${response.status} ${response.statusText || 'Unknown error'}.`;
        console.warn(message);
        throw new AuthenticationError(message);
    }

    const cookies = readCookies(response);
    const sessionId = cookies[SESSION_COOKIE];
    if (!sessionId) {
        // A rejected login re-renders the form with 200 and sets no session.
        console.warn(`Login failed for user ${username}: no session cookie returned.`);
        throw new AuthenticationError('Login failed: invalid username or password.');
    }
    return { sessionId, csrfToken: cookies[CSRF_COOKIE] ?? csrfToken };
}

export async function getModel(
    baseUrl: string,
    credentials: Credentials,
    modelType: ModelType,
    id: number,
    options: ClientOptions = {}
): Promise<ModelFields> {
    const http = options.http ?? defaultHttp;
    const context = `Fetching ${modelType} ${id} failed`;
    const response = await send(() => http.get<unknown>(modelUrl(baseUrl, modelType, id), requestConfig(credentials)), context);
    ensureSuccess(response, context);

    if (!isJsonObject(response.data)) {
        throw new RequestError(`${context}: response is not a ${modelType} object.`, { status: response.status });
    }
    return response.data;
}

/**
 * Creates a resource and returns its id.
 */
export async function postModel(
    baseUrl: string,
    credentials: Credentials,
    modelType: ModelType,
    data: ModelFields,
    options: ClientOptions = {}
): Promise<number> {
    const http = options.http ?? defaultHttp;
    const context = `Creating ${modelType} failed`;
    const response = await send(
        () => http.post<unknown>(modelUrl(baseUrl, modelType), data, requestConfig(credentials, { csrf: true })),
        context
    );
    ensureSuccess(response, context, { validation: true });

    const id = isJsonObject(response.data) ? response.data.id : undefined;
    if (typeof id !== 'number') {
        throw new RequestError(`${context}: response carries no id.`, { status: response.status });
    }
    return id;
}

/** Updates the given fields only. */
export async function patchModel(
    baseUrl: string,
    credentials: Credentials,
    modelType: ModelType,
    id: number,
    data: ModelFields,
    options: ClientOptions = {}
): Promise<void> {
    const http = options.http ?? defaultHttp;
    const context = `Updating ${modelType} ${id} failed`;
    const response = await send(
        () => http.patch(modelUrl(baseUrl, modelType, id), data, requestConfig(credentials, { csrf: true })),
        context
    );
    ensureSuccess(response, context, { validation: true });
}

/** Replaces the resource; fields left out of `data` are reset by the server. */
export async function putModel(
    baseUrl: string,
    credentials: Credentials,
    modelType: ModelType,
    id: number,
    data: ModelFields,
    options: ClientOptions = {}
): Promise<void> {
    const http = options.http ?? defaultHttp;
    const context = `Replacing ${modelType} ${id} failed`;
    const response = await send(
        () => http.put(modelUrl(baseUrl, modelType, id), data, requestConfig(credentials, { csrf: true })),
        context
    );
    ensureSuccess(response, context, { validation: true });
}

export async function deleteModel(
    baseUrl: string,
    credentials: Credentials,
    modelType: ModelType,
    id: number,
    options: ClientOptions = {}
): Promise<void> {
    const http = options.http ?? defaultHttp;
    const context = `Deleting ${modelType} ${id} failed`;
    const response = await send(
        () => http.delete(modelUrl(baseUrl, modelType, id), requestConfig(credentials, { csrf: true })),
        context
    );
    ensureSuccess(response, context);
}

/**
 * Downloads the records of a time series, optionally limited to a date range (inclusive).
 */
export async function readTsData(
    baseUrl: string,
    credentials: Credentials,
    timeseriesId: number,
    range: DateRange = {},
    options: ClientOptions = {}
): Promise<TimeseriesRecord[]> {
    const http = options.http ?? defaultHttp;
    const context = `Reading data of time series ${timeseriesId} failed`;
    const response = await send(
        () => http.get<string>(tsDataUrl(baseUrl, timeseriesId), {
            ...requestConfig(credentials),
            params: {
                start_date: range.startDate ? formatIsoTimestamp(range.startDate) : undefined,
                end_date: range.endDate ? formatIsoTimestamp(range.endDate) : undefined
            },
            responseType: 'text'
        }),
        context
    );
    ensureSuccess(response, context);
    return parseTsData(textBody(response.data));
}

/**
 * Uploads records, appending them to those already stored.
 * Overlaps with existing records are left to the server to reject.
 */
export async function postTsData(
    baseUrl: string,
    credentials: Credentials,
    timeseriesId: number,
    records: TimeseriesRecord[],
    options: ClientOptions = {}
): Promise<void> {
    const http = options.http ?? defaultHttp;
    const context = `Posting data to time series ${timeseriesId} failed`;
    const form = new URLSearchParams({ timeseries_records: serializeTsData(records), mode: 'append' });
    const response = await send(
        () => http.post(tsDataUrl(baseUrl, timeseriesId), form, requestConfig(credentials, { csrf: true })),
        context
    );
    ensureSuccess(response, context);
}

/**
 * Timestamp of the last record of a time series, or 0001-01-01 00:00 if it has none.
 */
export async function getTsEndDate(
    baseUrl: string,
    credentials: Credentials,
    timeseriesId: number,
    options: ClientOptions = {}
): Promise<Date> {
    const http = options.http ?? defaultHttp;
    const context = `Reading end date of time series ${timeseriesId} failed`;
    const response = await send(
        () => http.get<string>(tsBottomUrl(baseUrl, timeseriesId), { ...requestConfig(credentials), responseType: 'text' }),
        context
    );
    ensureSuccess(response, context);
    return lastTimestamp(textBody(response.data)) ?? minDate();
}
