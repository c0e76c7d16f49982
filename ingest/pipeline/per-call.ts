/**
 * Weather Ingest — Per-Call Pipeline
 *
 * One request per location. Each location is its own unit of work
 * (fetch, tag, write); a failed unit is recorded and the rest carry on.
 */
/* eslint-disable no-console */

import type { IngestError } from '../errors';
import { tagSnapshot } from '../normalize';
import { buildPerCallKey } from '../partition';
import { resolveSecret, type SecretStore } from '../secrets';
import type { StorageBackend } from '../storage/storage';
import { encodeText, writeArtifact } from '../storage/writer';
import { err, ok, type ArtifactRef, type Location, type Result } from '../types';
import type { OpenWeatherClient } from '../upstream/openweather';
import { mapWithConcurrency } from './pool';
import type { RunTracker } from './run';

export const JSON_CONTENT_TYPE = 'application/json';
export const DEFAULT_PER_CALL_CONCURRENCY = 4;

export interface PerCallPipelineDeps {
    client: OpenWeatherClient;
    storage: StorageBackend;
    secrets: SecretStore;
    secretName: string;
    locations: readonly Location[];
    concurrency?: number;
}

export interface PerCallUnitOutput {
    artifact: ArtifactRef;
    /** Body came from the response cache rather than a new request. */
    fromCache: boolean;
}

/**
 * Fetch, tag and persist one location.
 */
export async function runPerCallUnit(
    location: Location,
    apiKey: string,
    runAt: Date,
    deps: Pick<PerCallPipelineDeps, 'client' | 'storage'>,
    signal?: AbortSignal
): Promise<Result<PerCallUnitOutput, IngestError>> {
    const fetched = await deps.client.fetchOne(location, apiKey, signal);
    if (!fetched.ok) return err(fetched.error);

    const snapshot = tagSnapshot(fetched.value.body, location, runAt);
    const key = buildPerCallKey(snapshot.ingestedAt, snapshot.location);
    const written = await writeArtifact(deps.storage, key, encodeText(snapshot.body), JSON_CONTENT_TYPE);
    if (!written.ok) return err(written.error);
    return ok({ artifact: written.value, fromCache: fetched.value.fromCache });
}

export async function runPerCallPipeline(
    tracker: RunTracker,
    deps: PerCallPipelineDeps,
    signal?: AbortSignal
): Promise<void> {
    // No fetch happens without a key.
    let apiKey: string;
    try {
        apiKey = await resolveSecret(deps.secrets, deps.secretName);
    } catch (error) {
        const failure = tracker.fail('run', error);
        console.error('[ingest:per-call] secret resolution failed', { secretName: deps.secretName, error: failure.message });
        tracker.abort();
        return;
    }

    tracker.advance('FETCHING');
    const outcomes = await mapWithConcurrency(
        deps.locations,
        deps.concurrency ?? DEFAULT_PER_CALL_CONCURRENCY,
        async (location) => {
            const result = await runPerCallUnit(location, apiKey, tracker.runAt, deps, signal);
            if (result.ok) {
                console.log('[ingest:per-call] unit ok', {
                    location: location.id,
                    key: result.value.artifact.key,
                    bytes: result.value.artifact.bytes,
                    fromCache: result.value.fromCache
                });
            } else {
                console.error('[ingest:per-call] unit failed', { location: location.id, ...result.error.context() });
            }
            return result;
        },
        signal
    );

    let succeeded = 0;
    outcomes.forEach((outcome, i) => {
        const location = deps.locations[i];
        if (outcome.status === 'skipped') {
            tracker.skipped.push(location.id);
        } else if (outcome.value.ok) {
            tracker.artifacts.push(outcome.value.value.artifact);
            succeeded++;
        } else {
            tracker.fail(location.id, outcome.value.error);
        }
    });

    if (tracker.skipped.length > 0) {
        console.warn('[ingest:per-call] run deadline reached; locations skipped', { skipped: tracker.skipped });
    }

    // Units interleave fetch, tag and write; the run-level phases close together.
    tracker.advance('NORMALIZING');
    tracker.advance('WRITING');
    tracker.settleUnits(succeeded);
}
