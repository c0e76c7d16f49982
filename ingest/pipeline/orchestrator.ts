/**
 * Weather Ingest — Pipeline Orchestrator
 *
 * Owns the shared response cache and HTTP client, enforces the run deadline,
 * and turns every run into a RunReport. Nothing thrown inside a run escapes.
 */
/* eslint-disable no-console */

import type { IngestConfig } from '../config';
import { floorToBucketUtc } from '../time';
import type { SecretStore } from '../secrets';
import { createStorage } from '../storage/factory';
import type { StorageBackend } from '../storage/storage';
import type { Location, PipelineKind, RunReport } from '../types';
import { ResponseCache } from '../upstream/cache';
import { HttpClient, type RetryPolicy } from '../upstream/http';
import { OpenMeteoClient } from '../upstream/openmeteo';
import { OpenWeatherClient } from '../upstream/openweather';
import { runBatchedPipeline } from './batched';
import { DEFAULT_PER_CALL_CONCURRENCY, runPerCallPipeline } from './per-call';
import { RunTracker } from './run';

export const DEFAULT_RUN_TIMEOUT_MS = 10 * 60_000;

export interface OrchestratorOptions {
    /** A backend, or a factory invoked on first use. */
    storage: StorageBackend | (() => StorageBackend);
    secrets: SecretStore;
    locations: readonly Location[];
    perCallLocations: readonly Location[];
    openWeatherSecretName?: string;
    openMeteoUrl?: string;
    openWeatherUrl?: string;
    cacheTtlMs?: number;
    retry?: RetryPolicy;
    requestTimeoutMs?: number;
    runTimeoutMs?: number;
    perCallConcurrency?: number;
    now?: () => Date;
}

export class IngestOrchestrator {
    readonly cache: ResponseCache;
    private readonly openMeteo: OpenMeteoClient;
    private readonly openWeather: OpenWeatherClient;
    private readonly now: () => Date;
    private readonly runTimeoutMs: number;
    private storage: StorageBackend | null;
    private readonly storageFactory: () => StorageBackend;
    private readonly lastReports = new Map<PipelineKind, RunReport>();

    constructor(private readonly options: OrchestratorOptions) {
        this.now = options.now ?? (() => new Date());
        this.runTimeoutMs = options.runTimeoutMs ?? DEFAULT_RUN_TIMEOUT_MS;
        this.cache = new ResponseCache({ ttlMs: options.cacheTtlMs, now: () => this.now().getTime() });

        const http = new HttpClient({
            cache: this.cache,
            retry: options.retry,
            timeoutMs: options.requestTimeoutMs
        });
        this.openMeteo = new OpenMeteoClient({ http, endpoint: options.openMeteoUrl });
        this.openWeather = new OpenWeatherClient({ http, endpoint: options.openWeatherUrl });

        const { storage } = options;
        if (typeof storage === 'function') {
            this.storage = null;
            this.storageFactory = storage;
        } else {
            this.storage = storage;
            this.storageFactory = () => storage;
        }
    }

    /** Most recent report per pipeline. */
    reports(): Partial<Record<PipelineKind, RunReport>> {
        return Object.fromEntries(this.lastReports);
    }

    lastReport(pipeline: PipelineKind): RunReport | undefined {
        return this.lastReports.get(pipeline);
    }

    /** Backend the runs write to; constructed on first call. */
    resolveStorage(): StorageBackend {
        if (!this.storage) {
            this.storage = this.storageFactory();
        }
        return this.storage;
    }

    runBatched(runAt?: Date): Promise<RunReport> {
        return this.run('batched', runAt);
    }

    runPerCall(runAt?: Date): Promise<RunReport> {
        return this.run('per-call', runAt);
    }

    /**
     * Execute one pipeline run. Always resolves with a report.
     */
    async run(pipeline: PipelineKind, runAt: Date = this.now()): Promise<RunReport> {
        const tracker = new RunTracker(pipeline, floorToBucketUtc(runAt, 1), () => this.now().getTime());
        const scope = `[ingest:${pipeline}]`;
        const deadline = new AbortController();
        const timer = setTimeout(() => {
            console.warn(`${scope} run timeout`, { runTimeoutMs: this.runTimeoutMs });
            deadline.abort(new Error(`Run exceeded ${this.runTimeoutMs}ms`));
        }, this.runTimeoutMs);

        const pruned = this.cache.prune();
        console.log(`${scope} run start`, {
            runAt: tracker.runAt.toISOString(),
            cache: { entries: this.cache.size, pruned }
        });
        try {
            const storage = this.resolveStorage();
            if (pipeline === 'batched') {
                await runBatchedPipeline(
                    tracker,
                    { client: this.openMeteo, storage, locations: this.options.locations },
                    deadline.signal
                );
            } else {
                await runPerCallPipeline(
                    tracker,
                    {
                        client: this.openWeather,
                        storage,
                        secrets: this.options.secrets,
                        secretName: this.options.openWeatherSecretName ?? 'OpenWeatherApiKey',
                        locations: this.options.perCallLocations,
                        concurrency: this.options.perCallConcurrency ?? DEFAULT_PER_CALL_CONCURRENCY
                    },
                    deadline.signal
                );
            }
        } catch (error) {
            const failure = tracker.fail('run', error);
            console.error(`${scope} run failed unexpectedly`, failure);
            tracker.abort();
        } finally {
            clearTimeout(timer);
        }

        const report = tracker.report();
        this.lastReports.set(pipeline, report);
        const line = {
            status: report.status,
            artifacts: report.artifacts.length,
            failures: report.failures.length,
            skipped: report.skipped.length,
            durationMs: report.durationMs
        };
        if (report.status === 'SUCCESS') {
            console.log(`${scope} run complete`, line);
        } else {
            console.error(`${scope} run complete`, line);
        }
        return report;
    }
}

/**
 * Wire an orchestrator from validated configuration.
 */
export function createOrchestrator(config: IngestConfig, secrets: SecretStore): IngestOrchestrator {
    return new IngestOrchestrator({
        storage: () => createStorage(config.storage),
        secrets,
        locations: config.locations,
        perCallLocations: config.perCallLocations,
        openWeatherSecretName: config.secrets.openWeatherSecretName,
        openMeteoUrl: config.upstream.openMeteoUrl,
        openWeatherUrl: config.upstream.openWeatherUrl,
        cacheTtlMs: config.upstream.cacheTtlMs,
        retry: { retries: config.upstream.retries, backoffMs: config.upstream.backoffMs },
        requestTimeoutMs: config.upstream.timeoutMs,
        runTimeoutMs: config.run.timeoutMs,
        perCallConcurrency: config.run.perCallConcurrency
    });
}
