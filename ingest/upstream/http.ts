/**
 * Weather Ingest — Upstream HTTP
 *
 * GET with a per-attempt timeout, bounded exponential backoff, and the shared
 * response cache. Every failure leaves here as a FetchError.
 */
/* eslint-disable no-console */

import { FetchError, describeError } from '../errors';
import { ResponseCache, requestCacheKey, type CachedBody } from './cache';

export interface RetryPolicy {
    /** Retries after the first attempt. */
    retries: number;
    /** Delay before retry n is `backoffMs * 2^(n-1)`. */
    backoffMs: number;
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = { retries: 5, backoffMs: 200 };
export const DEFAULT_TIMEOUT_MS = 20_000;

export interface HttpClientOptions {
    cache: ResponseCache;
    retry?: RetryPolicy;
    timeoutMs?: number;
    headers?: Record<string, string>;
}

export interface GetOptions<T> {
    /** Location id or "batch"; carried by any FetchError. */
    scope: string;
    /** Throws on a body that does not match the provider contract. */
    decode: (body: string) => T;
    signal?: AbortSignal;
    /** URL safe for logs (e.g. without credentials). */
    logUrl?: string;
}

export interface GetResult<T> extends CachedBody {
    data: T;
}

export function backoffDelayMs(policy: RetryPolicy, retry: number): number {
    return policy.backoffMs * 2 ** (retry - 1);
}

export class HttpClient {
    private readonly cache: ResponseCache;
    private readonly retry: RetryPolicy;
    private readonly timeoutMs: number;
    private readonly headers: Record<string, string>;

    constructor(options: HttpClientOptions) {
        this.cache = options.cache;
        this.retry = options.retry ?? DEFAULT_RETRY_POLICY;
        this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
        this.headers = { Accept: 'application/json', ...options.headers };
    }

    /**
     * Fetch and decode `url`. Decoded successes are cached; a cached body is
     * decoded again on each hit.
     */
    async getJson<T>(url: URL, options: GetOptions<T>): Promise<GetResult<T>> {
        const key = requestCacheKey({ method: 'GET', url: url.toString() });
        const cached = await this.cache.getOrLoad(key, async () => {
            const body = await this.fetchWithRetry(url, options);
            decodeOrThrow(body, options);
            return body;
        });
        return { ...cached, data: decodeOrThrow(cached.body, options) };
    }

    private async fetchWithRetry<T>(url: URL, options: GetOptions<T>): Promise<string> {
        const logUrl = options.logUrl ?? url.toString();

        for (let attempt = 0; ; attempt++) {
            try {
                return await this.attempt(url, options);
            } catch (error) {
                const failure = error instanceof FetchError
                    ? error
                    : new FetchError(options.scope, 'network', describeError(error), { cause: error });

                if (!failure.retryable || attempt >= this.retry.retries || options.signal?.aborted) {
                    throw failure;
                }

                const delay = backoffDelayMs(this.retry, attempt + 1);
                console.warn('[upstream] retrying', {
                    scope: options.scope,
                    url: logUrl,
                    attempt: attempt + 1,
                    delayMs: delay,
                    reason: failure.reason,
                    status: failure.status
                });
                await sleep(delay, options.signal);
            }
        }
    }

    private async attempt<T>(url: URL, options: GetOptions<T>): Promise<string> {
        const { scope, signal } = options;
        if (signal?.aborted) {
            throw new FetchError(scope, 'aborted', 'Run cancelled before request');
        }

        const timeout = AbortSignal.timeout(this.timeoutMs);
        const combined = anySignal([timeout, signal]);

        let response: Response;
        try {
            response = await fetch(url, { headers: this.headers, signal: combined });
        } catch (error) {
            if (signal?.aborted) {
                throw new FetchError(scope, 'aborted', 'Run cancelled during request', { cause: error });
            }
            if (timeout.aborted) {
                throw new FetchError(scope, 'timeout', `Request timed out after ${this.timeoutMs}ms`, { cause: error });
            }
            throw new FetchError(scope, 'network', `Request failed: ${describeError(error)}`, { cause: error });
        }

        if (!response.ok) {
            const text = await response.text().catch(() => '');
            const status = [response.status, response.statusText].filter(Boolean).join(' ');
            throw new FetchError(scope, 'http', `HTTP ${status}${text ? `: ${text.slice(0, 200)}` : ''}`, {
                status: response.status
            });
        }

        try {
            return await response.text();
        } catch (error) {
            if (timeout.aborted) {
                throw new FetchError(scope, 'timeout', `Body read timed out after ${this.timeoutMs}ms`, { cause: error });
            }
            throw new FetchError(scope, 'network', `Body read failed: ${describeError(error)}`, { cause: error });
        }
    }
}

function decodeOrThrow<T>(body: string, options: GetOptions<T>): T {
    try {
        return options.decode(body);
    } catch (error) {
        if (error instanceof FetchError) throw error;
        throw new FetchError(options.scope, 'decode', `Undecodable response: ${describeError(error)}`, { cause: error });
    }
}

/** Abort when any input aborts. */
export function anySignal(signals: (AbortSignal | undefined)[]): AbortSignal {
    const controller = new AbortController();
    const present = signals.filter((s): s is AbortSignal => s !== undefined);
    for (const signal of present) {
        if (signal.aborted) {
            controller.abort(signal.reason);
            return controller.signal;
        }
    }
    for (const signal of present) {
        signal.addEventListener('abort', () => controller.abort(signal.reason), { once: true, signal: controller.signal });
    }
    return controller.signal;
}

/** Resolve after `ms`, or early when `signal` aborts. */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
    return new Promise((resolve) => {
        if (signal?.aborted || ms <= 0) {
            resolve();
            return;
        }
        const onAbort = () => {
            clearTimeout(timer);
            resolve();
        };
        const timer = setTimeout(() => {
            signal?.removeEventListener('abort', onAbort);
            resolve();
        }, ms);
        signal?.addEventListener('abort', onAbort, { once: true });
    });
}
