import { AxiosError, type AxiosResponse, type InternalAxiosRequestConfig, AxiosHeaders } from 'axios';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { NotFoundError, RequestError, ValidationError } from './errors';
import { ensureSuccess, formatAxiosError, readCookies, readFieldErrors, requestConfig, send } from './http';

const config: InternalAxiosRequestConfig = { headers: new AxiosHeaders() };

const response = (status: number, statusText: string, data: unknown = '', setCookie?: string[]): AxiosResponse => ({
    status,
    statusText,
    data,
    headers: setCookie ? { 'set-cookie': setCookie } : {},
    config
});

describe('http helpers', () => {
    beforeEach(() => {
        vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    });

    afterEach(() => {
        vi.restoreAllMocks();
    });

    describe('requestConfig', () => {
        it('sends no cookies for an anonymous session', () => {
            expect(requestConfig({}).headers).toEqual({});
        });

        it('sends the session cookies and, when asked, the CSRF header', () => {
            const credentials = { sessionId: 'test-session', csrfToken: 'test-csrf' };
            expect(requestConfig(credentials).headers).toEqual({ Cookie: 'sessionid=test-session; csrftoken=test-csrf' });
            expect(requestConfig(credentials, { csrf: true }).headers).toEqual({
                Cookie: 'sessionid=test-session; csrftoken=test-csrf',
                'X-CSRFToken': 'test-csrf'
            });
        });

        it('leaves status checks to ensureSuccess', () => {
            const { validateStatus } = requestConfig({});
            expect(validateStatus?.(500)).toBe(true);
        });
    });

    describe('readCookies', () => {
        it('reads names and values, dropping attributes', () => {
            const cookies = readCookies(response(200, 'OK', '', [
                'csrftoken=test-csrf; expires=Sat, 16 Oct 2027 12:00:00 GMT; Max-Age=31449600; Path=/',
                'sessionid=test-session; HttpOnly; Path=/',
                'malformed'
            ]));
            expect(cookies).toEqual({ csrftoken: 'test-csrf', sessionid: 'test-session' });
        });

        it('returns nothing when no cookie is set', () => {
            expect(readCookies(response(200, 'OK'))).toEqual({});
        });
    });

    describe('readFieldErrors', () => {
        it('reads lists and single messages', () => {
            expect(readFieldErrors({ name: ['This field is required.'], detail: 'Invalid.' })).toEqual({
                name: ['This field is required.'],
                detail: ['Invalid.']
            });
        });

        it('rejects bodies of another shape', () => {
            expect(readFieldErrors('<html></html>')).toBeNull();
            expect(readFieldErrors(['error'])).toBeNull();
            expect(readFieldErrors({})).toBeNull();
            expect(readFieldErrors({ name: { nested: true } })).toBeNull();
        });
    });

    describe('ensureSuccess', () => {
        it('accepts any 2xx status', () => {
            expect(() => ensureSuccess(response(200, 'OK'), 'Fetching')).not.toThrow();
            expect(() => ensureSuccess(response(204, 'No Content'), 'Deleting')).not.toThrow();
        });

        it('maps 404 to NotFoundError', () => {
            expect(() => ensureSuccess(response(404, 'Not Found'), 'Fetching Station 42 failed')).toThrow(
                new NotFoundError('Fetching Station 42 failed: 404 Not Found.')
            );
            expect(console.warn).toHaveBeenCalledWith('Fetching Station 42 failed: 404 Not Found.');
        });

        it('maps a 400 with field errors to ValidationError on writes only', () => {
            const rejected = response(400, 'Bad Request', { name: ['This field is required.'] });

            let error: unknown;
            try {
                ensureSuccess(rejected, 'Creating Station failed', { validation: true });
            } catch (e) {
                error = e;
            }
            expect(error).toBeInstanceOf(ValidationError);
            expect(error).toMatchObject({ fieldErrors: { name: ['This field is required.'] } });

            expect(() => ensureSuccess(rejected, 'Fetching Station 42 failed')).toThrow(RequestError);
        });

        it('maps other statuses to RequestError with the status', () => {
            expect(() => ensureSuccess(response(302, 'Found'), 'Fetching')).toThrow(RequestError);
            expect(() => ensureSuccess(response(503, ''), 'Fetching')).toThrow('Fetching: 503 Unknown error.');
        });
    });

    describe('send', () => {
        it('returns the response of the request', async () => {
            const ok = response(200, 'OK', 'data');
            await expect(send(async () => ok, 'Fetching')).resolves.toBe(ok);
        });

        it('turns a transport failure into RequestError', async () => {
            const timeout = new AxiosError('timeout of 10ms exceeded', 'ECONNABORTED', config);
            await expect(send(async () => { throw timeout; }, 'Fetching')).rejects.toThrow(
                new RequestError('Fetching: Network/timeout error.')
            );
        });
    });

    describe('formatAxiosError', () => {
        it('describes errors that are not from axios', () => {
            expect(formatAxiosError(new Error('boom'), 'Fetching')).toBe('Fetching: Unexpected error.');
        });
    });
});
