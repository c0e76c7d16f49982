/**
 * Weather Ingest — Storage Interface
 *
 * Abstract over S3-compatible stores, the local filesystem and memory. Every
 * backend is bound to one container when constructed.
 */

export interface PutOptions {
    contentType?: string;
}

export interface StorageBackend {
    /** Container (bucket / directory) this backend writes into. */
    readonly container: string;

    /** Check if object exists */
    exists(key: string): Promise<boolean>;

    /** Create or overwrite an object. Either the full payload lands or the call rejects. */
    put(key: string, data: Uint8Array, options?: PutOptions): Promise<void>;

    /** Get object */
    get(key: string): Promise<Uint8Array | null>;

    /** List object keys with prefix */
    list(prefix: string): Promise<string[]>;
}

export interface StoredObject {
    data: Uint8Array;
    contentType: string | undefined;
}

/**
 * Simple in-memory storage backend.
 */
export class MemoryStorage implements StorageBackend {
    private store = new Map<string, StoredObject>();

    constructor(readonly container: string) { }

    async exists(key: string): Promise<boolean> {
        return this.store.has(key);
    }

    async put(key: string, data: Uint8Array, options?: PutOptions): Promise<void> {
        this.store.set(key, { data: data.slice(), contentType: options?.contentType });
    }

    async get(key: string): Promise<Uint8Array | null> {
        return this.store.get(key)?.data ?? null;
    }

    async list(prefix: string): Promise<string[]> {
        return this.keys().filter((k) => k.startsWith(prefix));
    }

    /** Stored object with metadata */
    describe(key: string): StoredObject | undefined {
        return this.store.get(key);
    }

    /** All keys, sorted */
    keys(): string[] {
        return Array.from(this.store.keys()).sort();
    }
}
