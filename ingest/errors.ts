/**
 * Weather Ingest — Error Taxonomy
 *
 * Every expected failure is one of these classes. Pipelines return them inside
 * a `Result` rather than throwing across unit-of-work boundaries.
 */

export type IngestErrorKind = 'fetch' | 'normalization' | 'secret' | 'sink' | 'config';

export abstract class IngestError extends Error {
    abstract readonly kind: IngestErrorKind;

    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = new.target.name;
    }

    /** Structured fields for log lines. */
    context(): Record<string, unknown> {
        return { kind: this.kind, message: this.message };
    }
}

export type FetchFailureReason = 'network' | 'timeout' | 'http' | 'decode' | 'aborted';

export class FetchError extends IngestError {
    readonly kind = 'fetch';

    constructor(
        /** Location id in per-call mode, "batch" in batched mode. */
        readonly scope: string,
        readonly reason: FetchFailureReason,
        message: string,
        options?: { cause?: unknown; status?: number }
    ) {
        super(message, options);
        this.status = options?.status;
    }

    readonly status: number | undefined;

    /** Transient failures worth another attempt. */
    get retryable(): boolean {
        if (this.reason === 'network' || this.reason === 'timeout') return true;
        return this.reason === 'http' && this.status !== undefined && RETRYABLE_STATUSES.has(this.status);
    }

    override context(): Record<string, unknown> {
        return { ...super.context(), scope: this.scope, reason: this.reason, status: this.status };
    }
}

const RETRYABLE_STATUSES = new Set([429, 500, 502, 503, 504]);

export class NormalizationError extends IngestError {
    readonly kind = 'normalization';

    constructor(readonly locationId: string | null, message: string) {
        super(message);
    }

    override context(): Record<string, unknown> {
        return { ...super.context(), locationId: this.locationId };
    }
}

export class SecretResolutionError extends IngestError {
    readonly kind = 'secret';

    constructor(readonly secretName: string, message: string, options?: { cause?: unknown }) {
        super(message, options);
    }

    override context(): Record<string, unknown> {
        return { ...super.context(), secretName: this.secretName };
    }
}

export class SinkError extends IngestError {
    readonly kind = 'sink';

    constructor(readonly key: string, message: string, options?: { cause?: unknown }) {
        super(message, options);
    }

    override context(): Record<string, unknown> {
        return { ...super.context(), key: this.key };
    }
}

export class ConfigError extends IngestError {
    readonly kind = 'config';
}

export function isIngestError(value: unknown): value is IngestError {
    return value instanceof IngestError;
}

/** Render any thrown value for a log line. */
export function describeError(error: unknown): string {
    if (error instanceof Error) {
        return error.message || error.name;
    }
    return String(error);
}
