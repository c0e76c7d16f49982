/**
 * Weather Ingest — Response Cache
 *
 * TTL cache for upstream response bodies, keyed by a hash of the canonical
 * request descriptor. Concurrent loads of the same key share one promise.
 */

import { digestOf } from '../digest';

export const DEFAULT_CACHE_TTL_MS = 3600 * 1000;

type CacheEntry = {
    body: string;
    storedAt: number;
};

export interface CacheStats {
    hits: number;
    misses: number;
    shared: number;
}

export interface CachedBody {
    body: string;
    fromCache: boolean;
}

export interface ResponseCacheOptions {
    ttlMs?: number;
    now?: () => number;
}

export interface RequestDescriptor {
    method: 'GET';
    url: string;
}

/** Stable key for a request: BLAKE3 of its canonical MsgPack form. */
export function requestCacheKey(request: RequestDescriptor): string {
    return digestOf(request);
}

export class ResponseCache {
    private entries = new Map<string, CacheEntry>();
    private inFlight = new Map<string, Promise<string>>();
    private readonly ttlMs: number;
    private readonly now: () => number;
    readonly stats: CacheStats = { hits: 0, misses: 0, shared: 0 };

    constructor(options: ResponseCacheOptions = {}) {
        this.ttlMs = Math.max(0, options.ttlMs ?? DEFAULT_CACHE_TTL_MS);
        this.now = options.now ?? Date.now;
    }

    get size(): number {
        return this.entries.size;
    }

    get(key: string): string | undefined {
        const entry = this.entries.get(key);
        if (!entry) return undefined;
        if (this.now() - entry.storedAt >= this.ttlMs) {
            this.entries.delete(key);
            return undefined;
        }
        return entry.body;
    }

    set(key: string, body: string): void {
        if (this.ttlMs === 0) return;
        this.entries.set(key, { body, storedAt: this.now() });
    }

    /**
     * Serve a fresh entry, join a pending load, or run `loader` and store its
     * result. Rejected loads are never cached.
     */
    async getOrLoad(key: string, loader: () => Promise<string>): Promise<CachedBody> {
        const cached = this.get(key);
        if (cached !== undefined) {
            this.stats.hits++;
            return { body: cached, fromCache: true };
        }

        const pending = this.inFlight.get(key);
        if (pending) {
            this.stats.shared++;
            return { body: await pending, fromCache: true };
        }

        this.stats.misses++;
        const load = loader().then((body) => {
            this.set(key, body);
            return body;
        });
        this.inFlight.set(key, load);
        try {
            return { body: await load, fromCache: false };
        } finally {
            this.inFlight.delete(key);
        }
    }

    /** Drop expired entries. Returns how many were removed. */
    prune(): number {
        const nowMs = this.now();
        let removed = 0;
        for (const [key, entry] of this.entries) {
            if (nowMs - entry.storedAt >= this.ttlMs) {
                this.entries.delete(key);
                removed++;
            }
        }
        return removed;
    }
}
