import axios, { AxiosError, type AxiosHeaders, type AxiosInstance, type InternalAxiosRequestConfig } from 'axios';

export interface RecordedRequest {
    method: string;
    url: string;
    params: unknown;
    data: unknown;
    headers: AxiosHeaders;
    maxRedirects?: number;
}

export type FakeReply =
    | { status?: number; statusText?: string; data?: unknown; setCookie?: string[] }
    | { networkError: string };

/**
 * An axios instance answering from a queue of canned replies, in order, without touching the network.
 * Every request it receives is recorded.
 */
export function createFakeHttp(replies: FakeReply[] = []): { http: AxiosInstance; requests: RecordedRequest[] } {
    const queue = [...replies];
    const requests: RecordedRequest[] = [];

    const http = axios.create({
        adapter: async (config: InternalAxiosRequestConfig) => {
            requests.push({
                method: (config.method ?? 'get').toUpperCase(),
                url: config.url ?? '',
                params: config.params,
                data: config.data,
                headers: config.headers,
                maxRedirects: config.maxRedirects
            });

            const reply = queue.shift();
            if (!reply) {
                throw new Error(`Unexpected request: ${config.method} ${config.url}`);
            }
            if ('networkError' in reply) {
                throw new AxiosError('timeout of 10000ms exceeded', reply.networkError, config);
            }
            return {
                data: reply.data ?? '',
                status: reply.status ?? 200,
                statusText: reply.statusText ?? 'OK',
                headers: reply.setCookie ? { 'set-cookie': reply.setCookie } : {},
                config,
                request: {}
            };
        }
    });

    return { http, requests };
}
