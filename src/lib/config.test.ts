import { afterEach, describe, expect, it, vi } from 'vitest';
import { DEFAULT_TIMEOUT_MS, DEFAULT_USER_AGENT, loadConfig } from './config';

describe('loadConfig', () => {
    afterEach(() => {
        vi.restoreAllMocks();
    });

    it('falls back to defaults', () => {
        expect(loadConfig({})).toEqual({ timeoutMs: DEFAULT_TIMEOUT_MS, userAgent: DEFAULT_USER_AGENT });
    });

    it('reads the timeout and user agent from the environment', () => {
        expect(loadConfig({ HYDRODATA_TIMEOUT_MS: '2500', HYDRODATA_USER_AGENT: 'loggertodb/3.0' })).toEqual({
            timeoutMs: 2500,
            userAgent: 'loggertodb/3.0'
        });
    });

    it('accepts 0 to disable the timeout', () => {
        expect(loadConfig({ HYDRODATA_TIMEOUT_MS: '0' }).timeoutMs).toBe(0);
    });

    it('warns and keeps the default on an invalid timeout', () => {
        const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);

        expect(loadConfig({ HYDRODATA_TIMEOUT_MS: 'soon' }).timeoutMs).toBe(DEFAULT_TIMEOUT_MS);
        expect(warn).toHaveBeenCalledWith('Ignoring HYDRODATA_TIMEOUT_MS=soon: expected a non-negative integer.');
    });
});
