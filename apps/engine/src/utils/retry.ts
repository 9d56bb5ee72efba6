/**
 * Retry and timeout helpers shared by source adapters and generation calls
 */

export interface RetryOptions {
    /** Extra attempts after the first one */
    retries: number;
    /** Base delay; attempt n waits backoffMs * n */
    backoffMs: number;
    shouldRetry?: (error: Error, attempt: number) => boolean;
    onRetry?: (error: Error, attempt: number) => void;
    signal?: AbortSignal;
}

export class AbortedError extends Error {
    constructor(message = 'Operation aborted') {
        super(message);
        this.name = 'AbortedError';
    }
}

/**
 * Sleep that wakes early (and rejects) when the signal aborts
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
    if (signal?.aborted) {
        return Promise.reject(new AbortedError());
    }
    if (ms <= 0) {
        return Promise.resolve();
    }

    return new Promise((resolve, reject) => {
        const onAbort = (): void => {
            clearTimeout(timer);
            reject(new AbortedError());
        };
        const timer = setTimeout(() => {
            signal?.removeEventListener('abort', onAbort);
            resolve();
        }, ms);
        signal?.addEventListener('abort', onAbort, { once: true });
    });
}

/**
 * Run fn until it succeeds or retries are exhausted; rethrows the last error
 */
export async function retry<T>(
    fn: (attempt: number) => Promise<T>,
    options: RetryOptions
): Promise<T> {
    const maxAttempts = Math.max(1, options.retries + 1);
    let lastError: Error | undefined;

    for (let attempt = 1; attempt <= maxAttempts; attempt++) {
        if (options.signal?.aborted) {
            throw new AbortedError();
        }

        try {
            return await fn(attempt);
        } catch (error) {
            lastError = error instanceof Error ? error : new Error('Unknown error');

            const retriable = options.shouldRetry?.(lastError, attempt) ?? true;
            if (!retriable || attempt >= maxAttempts) {
                break;
            }

            options.onRetry?.(lastError, attempt);
            await sleep(options.backoffMs * attempt, options.signal);
        }
    }

    throw lastError || new Error('Max retries exceeded');
}

/**
 * Reject with onTimeout() if the promise does not settle within ms
 */
export function withTimeout<T>(
    promise: Promise<T>,
    ms: number,
    onTimeout: () => Error
): Promise<T> {
    return new Promise<T>((resolve, reject) => {
        const timer = setTimeout(() => reject(onTimeout()), ms);
        promise.then(
            value => {
                clearTimeout(timer);
                resolve(value);
            },
            (error: unknown) => {
                clearTimeout(timer);
                reject(error);
            }
        );
    });
}

export default { retry, withTimeout, sleep };
