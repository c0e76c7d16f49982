/**
 * Weather Ingest — Batched Pipeline
 *
 * One forecast call for the whole registry, one CSV per run. Any failure
 * fails the run and nothing is written.
 */
/* eslint-disable no-console */

import { recordsToCsv } from '../csv';
import { normalizeBatch } from '../normalize';
import { buildBatchedKey } from '../partition';
import type { StorageBackend } from '../storage/storage';
import { encodeText, writeArtifact } from '../storage/writer';
import type { Location } from '../types';
import type { OpenMeteoClient } from '../upstream/openmeteo';
import type { RunTracker } from './run';

export const CSV_CONTENT_TYPE = 'text/csv; charset=utf-8';

export interface BatchedPipelineDeps {
    client: OpenMeteoClient;
    storage: StorageBackend;
    locations: readonly Location[];
}

export async function runBatchedPipeline(
    tracker: RunTracker,
    deps: BatchedPipelineDeps,
    signal?: AbortSignal
): Promise<void> {
    const { client, storage, locations } = deps;

    tracker.advance('FETCHING');
    const fetched = await client.fetchBatch(locations, signal);
    if (!fetched.ok) {
        const failure = tracker.fail(fetched.error.scope, fetched.error);
        console.error('[ingest:batched] fetch failed', { ...fetched.error.context(), failure: failure.message });
        tracker.abort();
        return;
    }

    tracker.advance('NORMALIZING');
    let csv: string;
    try {
        const records = normalizeBatch(fetched.value, locations);
        csv = recordsToCsv(records, locations);
        console.log('[ingest:batched] normalized', { locations: locations.length, records: records.length });
    } catch (error) {
        const failure = tracker.fail('batch', error);
        console.error('[ingest:batched] normalization failed', failure);
        tracker.abort();
        return;
    }

    tracker.advance('WRITING');
    const key = buildBatchedKey(tracker.runAt);
    const written = await writeArtifact(storage, key, encodeText(csv), CSV_CONTENT_TYPE);
    if (!written.ok) {
        tracker.fail('batch', written.error);
        console.error('[ingest:batched] write failed', written.error.context());
        tracker.abort();
        return;
    }

    tracker.artifacts.push(written.value);
    tracker.advance('SUCCESS');
    console.log(`[ingest:batched] Uploaded ${key} → ${written.value.checksum.slice(0, 12)}...`, {
        bytes: written.value.bytes
    });
}
