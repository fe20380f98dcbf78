import { errorMessage } from '../utils/errors.js';
import { FetchFn, fetchWithTimeout } from '../utils/http.js';
import { Logger } from '../utils/logger.js';

export type HealthcheckEvent = 'start' | 'success' | 'fail';

const SUFFIX: Record<HealthcheckEvent, string> = {
    start: '/start',
    success: '',
    fail: '/fail',
};

export interface HealthcheckOptions {
    url?: string;
    timeoutMs?: number;
    fetch?: FetchFn;
    logger: Logger;
}

/**
 * Ping a healthchecks.io-style endpoint. Never throws.
 */
export async function pingHealthcheck(event: HealthcheckEvent, options: HealthcheckOptions): Promise<void> {
    if (!options.url) {
        return;
    }
    const url = options.url.trim().replace(/\/+$/, '') + SUFFIX[event];
    try {
        await fetchWithTimeout(options.fetch ?? fetch, url, { method: 'GET' }, options.timeoutMs ?? 5_000);
    } catch (error) {
        options.logger.debug(`Healthcheck ping to ${url} failed: ${errorMessage(error)}`);
    }
}
