export interface ClientConfig {
    timeoutMs: number;
    userAgent: string;
}

export const DEFAULT_TIMEOUT_MS = 10000;
export const DEFAULT_USER_AGENT = 'hydrodata-api-client/1.0';

const parseTimeout = (value: string | undefined): number => {
    if (!value) return DEFAULT_TIMEOUT_MS;
    const parsed = Number(value.trim());
    if (!Number.isInteger(parsed) || parsed < 0) {
        console.warn(`Ignoring HYDRODATA_TIMEOUT_MS=${value}: expected a non-negative integer.`);
        return DEFAULT_TIMEOUT_MS;
    }
    return parsed;
};

/**
 * Transport settings from the environment:
 * HYDRODATA_TIMEOUT_MS (0 disables the timeout) and HYDRODATA_USER_AGENT.
 */
export function loadConfig(env: Record<string, string | undefined> = process.env): ClientConfig {
    return {
        timeoutMs: parseTimeout(env.HYDRODATA_TIMEOUT_MS),
        userAgent: env.HYDRODATA_USER_AGENT?.trim() || DEFAULT_USER_AGENT,
    };
}
