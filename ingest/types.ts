/**
 * Weather Ingest — Core Type Definitions
 *
 * Shared shapes for both pipelines: the location registry, decoded upstream
 * payloads, normalized records and run reports.
 */

import type { IngestError } from './errors';

// =============================================================================
// Variables
// =============================================================================

/** Hourly variables requested from the forecast provider, in request order. */
export const HOURLY_VARIABLES = [
    'temperature_2m',
    'relative_humidity_2m',
    'apparent_temperature',
    'precipitation',
    'rain',
    'snowfall',
    'snow_depth',
    'wind_speed_10m',
    'wind_direction_10m',
    'wind_gusts_10m',
    'is_day',
    'dew_point_2m',
    'pressure_msl',
    'surface_pressure',
    'cloud_cover',
    'cloud_cover_low',
    'cloud_cover_mid',
    'cloud_cover_high',
    'shortwave_radiation',
    'direct_radiation'
] as const;

/** Daily variables. Fetched, never joined into the hourly stream. */
export const DAILY_VARIABLES = ['sunrise', 'sunset', 'precipitation_hours'] as const;

export type HourlyVariable = (typeof HOURLY_VARIABLES)[number];
export type DailyVariable = (typeof DAILY_VARIABLES)[number];

/**
 * Build a complete per-variable mapping. Listing every key keeps the compiler
 * checking the record against the variable list.
 */
export function hourlyRecord<T>(pick: (variable: HourlyVariable) => T): Record<HourlyVariable, T> {
    return {
        temperature_2m: pick('temperature_2m'),
        relative_humidity_2m: pick('relative_humidity_2m'),
        apparent_temperature: pick('apparent_temperature'),
        precipitation: pick('precipitation'),
        rain: pick('rain'),
        snowfall: pick('snowfall'),
        snow_depth: pick('snow_depth'),
        wind_speed_10m: pick('wind_speed_10m'),
        wind_direction_10m: pick('wind_direction_10m'),
        wind_gusts_10m: pick('wind_gusts_10m'),
        is_day: pick('is_day'),
        dew_point_2m: pick('dew_point_2m'),
        pressure_msl: pick('pressure_msl'),
        surface_pressure: pick('surface_pressure'),
        cloud_cover: pick('cloud_cover'),
        cloud_cover_low: pick('cloud_cover_low'),
        cloud_cover_mid: pick('cloud_cover_mid'),
        cloud_cover_high: pick('cloud_cover_high'),
        shortwave_radiation: pick('shortwave_radiation'),
        direct_radiation: pick('direct_radiation')
    };
}

// =============================================================================
// Locations
// =============================================================================

export interface Location {
    readonly id: string;
    readonly label: string;
    readonly latitude: number;
    readonly longitude: number;
}

// =============================================================================
// Upstream payloads
// =============================================================================

/**
 * One evenly spaced time series block. Times are unix epoch seconds;
 * `end` is exclusive.
 */
export interface TimeSeriesBlock<V extends string> {
    start: number;
    end: number;
    interval: number;
    /** Named mapping; a variable the provider omitted is simply absent. */
    values: Partial<Record<V, (number | null)[]>>;
}

/** Decoded per-location slice of a batched forecast response. */
export interface BatchedLocationResponse {
    latitude: number;
    longitude: number;
    timezone: string;
    utcOffsetSeconds: number;
    hourly: TimeSeriesBlock<HourlyVariable>;
    daily: TimeSeriesBlock<DailyVariable> | null;
}

/** A single-location current-conditions payload, kept byte-for-byte. */
export interface RawSnapshot {
    body: string;
    fromCache: boolean;
}

// =============================================================================
// Normalized records
// =============================================================================

export interface ObservationRecord {
    locationId: string;
    /** UTC instant. */
    timestamp: Date;
    values: Record<HourlyVariable, number | null>;
}

export interface SnapshotRecord {
    location: Location;
    ingestedAt: Date;
    body: string;
}

// =============================================================================
// Results & runs
// =============================================================================

export type Result<T, E = IngestError> =
    | { ok: true; value: T }
    | { ok: false; error: E };

export function ok<T>(value: T): { ok: true; value: T } {
    return { ok: true, value };
}

export function err<E>(error: E): { ok: false; error: E } {
    return { ok: false, error };
}

export type PipelineKind = 'batched' | 'per-call';

export const PIPELINE_KINDS: readonly PipelineKind[] = ['batched', 'per-call'];

export type RunStatus = 'SUCCESS' | 'PARTIAL_FAILURE' | 'TOTAL_FAILURE';

export type RunPhase = 'START' | 'FETCHING' | 'NORMALIZING' | 'WRITING' | RunStatus;

export interface ArtifactRef {
    key: string;
    bytes: number;
    /** BLAKE3 hex of the stored payload. */
    checksum: string;
}

export interface UnitFailure {
    /** Location id, or "batch" / "run" for run-scoped failures. */
    scope: string;
    kind: IngestError['kind'] | 'unexpected';
    message: string;
}

export interface RunReport {
    pipeline: PipelineKind;
    runAt: string;
    status: RunStatus;
    phases: RunPhase[];
    artifacts: ArtifactRef[];
    failures: UnitFailure[];
    /** Locations not attempted before the run deadline. */
    skipped: string[];
    durationMs: number;
}
