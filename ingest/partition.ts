/**
 * Weather Ingest — Partition Keys
 *
 * Storage paths are a pure function of (run time, pipeline, location) at minute
 * resolution, so a retried run in the same wall-clock minute overwrites the
 * object it already wrote.
 */

import { utcParts } from './time';
import type { Location, PipelineKind } from './types';

export const BATCHED_PREFIX = 'ingestion-v2';
export const PER_CALL_PREFIX = 'api-ingestion';

/**
 * `ingestion-v2/{YYYY}/{MM}/{DD}/weather_{HH}{mm}.<ext>`
 */
export function buildBatchedKey(runAt: Date, extension = 'csv'): string {
    const { year, month, day, hour, minute } = utcParts(runAt);
    return `${BATCHED_PREFIX}/${year}/${month}/${day}/weather_${hour}${minute}.${extension}`;
}

/**
 * `api-ingestion/{label}/{YYYY}/{MM}/{DD}/{HH}-{mm}_data.<ext>`
 */
export function buildPerCallKey(runAt: Date, location: Pick<Location, 'label'>, extension = 'json'): string {
    const { year, month, day, hour, minute } = utcParts(runAt);
    return `${PER_CALL_PREFIX}/${labelSegment(location.label)}/${year}/${month}/${day}/${hour}-${minute}_data.${extension}`;
}

export function buildPartitionKey(runAt: Date, pipeline: 'batched'): string;
export function buildPartitionKey(runAt: Date, pipeline: 'per-call', location: Pick<Location, 'label'>): string;
export function buildPartitionKey(runAt: Date, pipeline: PipelineKind, location?: Pick<Location, 'label'>): string {
    if (pipeline === 'batched') {
        return buildBatchedKey(runAt);
    }
    if (!location) {
        throw new Error('Per-call partition keys require a location');
    }
    return buildPerCallKey(runAt, location);
}

// Labels are used verbatim apart from the separator.
function labelSegment(label: string): string {
    return label.trim().replace(/\//g, '-');
}
