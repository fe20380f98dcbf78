/**
 * The part of fetch the providers use; global fetch satisfies it
 */
export type FetchFn = (url: string, init: RequestInit) => Promise<Response>;

/**
 * Raised when a request outlives its timeout
 */
export class RequestTimeoutError extends Error {
    constructor(public readonly timeoutMs: number) {
        super(`Request timed out after ${timeoutMs}ms`);
        this.name = 'RequestTimeoutError';
    }
}

/**
 * fetch bounded by a timeout and, optionally, an outer signal
 */
export async function fetchWithTimeout(
    fetchFn: FetchFn,
    url: string,
    init: RequestInit,
    timeoutMs: number,
    signal?: AbortSignal
): Promise<Response> {
    const controller = new AbortController();
    let timedOut = false;
    const timeout = setTimeout(() => {
        timedOut = true;
        controller.abort();
    }, timeoutMs);
    const onAbort = (): void => controller.abort(signal?.reason);

    if (signal?.aborted) {
        controller.abort(signal.reason);
    } else {
        signal?.addEventListener('abort', onAbort, { once: true });
    }

    try {
        return await fetchFn(url, { ...init, signal: controller.signal });
    } catch (error) {
        if (timedOut) {
            throw new RequestTimeoutError(timeoutMs);
        }
        throw error;
    } finally {
        clearTimeout(timeout);
        signal?.removeEventListener('abort', onAbort);
    }
}

/**
 * POST a JSON body
 */
export function postJson(
    fetchFn: FetchFn,
    url: string,
    body: unknown,
    options: { headers?: Record<string, string>; timeoutMs: number; signal?: AbortSignal }
): Promise<Response> {
    return fetchWithTimeout(
        fetchFn,
        url,
        {
            method: 'POST',
            headers: { 'Content-Type': 'application/json', ...options.headers },
            body: JSON.stringify(body),
        },
        options.timeoutMs,
        options.signal
    );
}
