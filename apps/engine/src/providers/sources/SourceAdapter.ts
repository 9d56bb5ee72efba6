/**
 * Source Adapter Interface
 *
 * Defines the contract for fetching candidate items from one configured
 * source. Adapters never throw: timeouts and failures come back as a
 * FetchResult so one bad source cannot stop the others.
 */

import { FetchError, FetchTimeout } from '../../errors';
import { createLogger } from '../../logger';
import { isRecord } from '../../pipeline/types';
import { AbortedError, retry, withTimeout } from '../../utils/retry';

const logger = createLogger('source-adapter');

/**
 * Per-source fetch policy
 */
export interface SourcePolicy {
    name: string;
    sourceUrl: string;
    maxItems: number;
    timeoutSeconds: number;
    retryCount: number;
    retryBackoffSeconds: number;
}

/**
 * Item as extracted from a source, before the pipeline attaches the
 * source's position, weight and category
 */
export interface SourceItem {
    title: string;
    url: string | null;
    summary: string;
    publishedAt: string | null;
    trendingBoost: number;
    payload: Record<string, unknown>;
}

export type FetchResult<T> =
    | { success: true; items: T[] }
    | { success: false; error: FetchTimeout | FetchError };

export interface SourceAdapter<C extends SourcePolicy, T = SourceItem> {
    /**
     * Adapter name for logging
     */
    readonly name: string;

    /**
     * Fetch up to config.maxItems items, bounded by the source's timeout and
     * retried per its policy
     */
    fetch(config: C, signal?: AbortSignal): Promise<FetchResult<T>>;
}

function toFetchError(source: string, error: Error): FetchTimeout | FetchError {
    if (error instanceof FetchTimeout || error instanceof FetchError) {
        return error;
    }
    if (error instanceof AbortedError) {
        return new FetchError(source, 'cancelled');
    }
    return new FetchError(source, error.message);
}

/**
 * Applies the timeout and retry policy around a single-attempt fetch
 */
export abstract class BaseSourceAdapter<C extends SourcePolicy, T = SourceItem> implements SourceAdapter<C, T> {
    abstract readonly name: string;

    protected abstract fetchOnce(config: C, timeoutMs: number, signal?: AbortSignal): Promise<T[]>;

    async fetch(config: C, signal?: AbortSignal): Promise<FetchResult<T>> {
        const timeoutMs = Math.round(config.timeoutSeconds * 1000);

        try {
            const items = await retry(
                () => withTimeout(
                    this.fetchOnce(config, timeoutMs, signal),
                    timeoutMs,
                    () => new FetchTimeout(config.name, timeoutMs)
                ),
                {
                    retries: config.retryCount,
                    backoffMs: config.retryBackoffSeconds * 1000,
                    signal,
                    shouldRetry: error => !(error instanceof AbortedError),
                    onRetry: (error, attempt) => {
                        logger.warn('Retry attempt', {
                            adapter: this.name,
                            source: config.name,
                            attempt,
                            error: error.message,
                        });
                    },
                }
            );

            const bounded = items.slice(0, config.maxItems);
            logger.debug('Source fetched', { adapter: this.name, source: config.name, count: bounded.length });
            return { success: true, items: bounded };
        } catch (error) {
            const failure = toFetchError(
                config.name,
                error instanceof Error ? error : new Error('Unknown error')
            );
            logger.warn('Source fetch failed', {
                adapter: this.name,
                source: config.name,
                code: failure.code,
                error: failure.message,
            });
            return { success: false, error: failure };
        }
    }
}

function isNullableString(value: unknown): value is string | null {
    return value === null || typeof value === 'string';
}

/**
 * Narrow a stored fetch output back to items
 */
export function isSourceItem(value: unknown): value is SourceItem {
    return isRecord(value) &&
        typeof value.title === 'string' &&
        isNullableString(value.url) &&
        typeof value.summary === 'string' &&
        isNullableString(value.publishedAt) &&
        typeof value.trendingBoost === 'number' &&
        isRecord(value.payload);
}
