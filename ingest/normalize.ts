/**
 * Weather Ingest — Normalizer
 *
 * Batched responses become flat hourly records; per-call snapshots pass
 * through untouched. A response that does not fit the fixed hourly schema is
 * rejected whole.
 */

import { NormalizationError } from './errors';
import {
    hourlyRecord,
    type BatchedLocationResponse,
    type Location,
    type ObservationRecord,
    type SnapshotRecord,
    type TimeSeriesBlock
} from './types';

/**
 * Timestamps of a block over the half-open window [start, end).
 */
export function blockTimestamps(block: Pick<TimeSeriesBlock<string>, 'start' | 'end' | 'interval'>, locationId: string): Date[] {
    const { start, end, interval } = block;
    if (!Number.isFinite(start) || !Number.isFinite(end) || !Number.isFinite(interval) || interval <= 0) {
        throw new NormalizationError(locationId, `Invalid time axis: start=${start} end=${end} interval=${interval}`);
    }
    const span = end - start;
    const count = span / interval;
    if (span < 0 || !Number.isInteger(count)) {
        throw new NormalizationError(
            locationId,
            `Time axis is not a whole number of intervals: (${end} - ${start}) / ${interval}`
        );
    }

    const timestamps: Date[] = [];
    for (let i = 0; i < count; i++) {
        timestamps.push(new Date((start + i * interval) * 1000));
    }
    return timestamps;
}

/**
 * Normalize one location's hourly block.
 */
export function normalizeLocation(response: BatchedLocationResponse, location: Location): ObservationRecord[] {
    const timestamps = blockTimestamps(response.hourly, location.id);

    const columns = hourlyRecord((variable) => {
        const values = response.hourly.values[variable];
        if (!values) {
            throw new NormalizationError(location.id, `Missing hourly variable ${variable}`);
        }
        if (values.length !== timestamps.length) {
            throw new NormalizationError(
                location.id,
                `Hourly variable ${variable} has ${values.length} values, expected ${timestamps.length}`
            );
        }
        return values;
    });

    return timestamps.map((timestamp, i) => ({
        locationId: location.id,
        timestamp,
        values: hourlyRecord((variable) => columns[variable][i])
    }));
}

/**
 * Normalize a batched response. `responses[i]` belongs to `locations[i]`.
 */
export function normalizeBatch(
    responses: readonly BatchedLocationResponse[],
    locations: readonly Location[]
): ObservationRecord[] {
    if (responses.length !== locations.length) {
        throw new NormalizationError(
            null,
            `Response count ${responses.length} does not match location count ${locations.length}`
        );
    }

    const records: ObservationRecord[] = [];
    responses.forEach((response, i) => {
        records.push(...normalizeLocation(response, locations[i]));
    });
    return records;
}

/**
 * Tag a raw snapshot with its location and ingestion time.
 */
export function tagSnapshot(body: string, location: Location, ingestedAt: Date): SnapshotRecord {
    return { location, ingestedAt, body };
}
