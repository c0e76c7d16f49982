/**
 * Weather Ingest — Open-Meteo Batched Client
 *
 * One forecast request for every registry location. The provider answers with
 * one entry per coordinate pair, in request order.
 */

import { z } from 'zod';
import { FetchError } from '../errors';
import {
    DAILY_VARIABLES,
    HOURLY_VARIABLES,
    err,
    ok,
    type BatchedLocationResponse,
    type Location,
    type Result,
    type TimeSeriesBlock
} from '../types';
import type { HttpClient } from './http';

export const OPEN_METEO_FORECAST_URL = 'https://api.open-meteo.com/v1/forecast';

const HOURLY_SECONDS = 3600;
const DAILY_SECONDS = 86_400;

export interface OpenMeteoClientOptions {
    http: HttpClient;
    endpoint?: string;
    /** Forecast horizon in days; the ingest keeps the current day only. */
    forecastDays?: number;
}

const seriesSchema = z.record(z.string(), z.array(z.number().nullable()));

const locationPayloadSchema = z.object({
    latitude: z.number(),
    longitude: z.number(),
    timezone: z.string(),
    utc_offset_seconds: z.number(),
    hourly: seriesSchema,
    daily: seriesSchema.optional()
});

type LocationPayload = z.infer<typeof locationPayloadSchema>;

/**
 * Build the batched forecast URL. Coordinates are parallel lists.
 */
export function buildForecastUrl(
    locations: readonly Location[],
    endpoint = OPEN_METEO_FORECAST_URL,
    forecastDays = 1
): URL {
    const url = new URL(endpoint);
    url.searchParams.set('latitude', locations.map((l) => l.latitude.toString()).join(','));
    url.searchParams.set('longitude', locations.map((l) => l.longitude.toString()).join(','));
    url.searchParams.set('hourly', HOURLY_VARIABLES.join(','));
    url.searchParams.set('daily', DAILY_VARIABLES.join(','));
    url.searchParams.set('timezone', 'auto');
    url.searchParams.set('forecast_days', forecastDays.toString());
    url.searchParams.set('timeformat', 'unixtime');
    return url;
}

/**
 * Turn a `time` column plus named value columns into an evenly spaced block.
 */
function toBlock<V extends string>(
    series: Record<string, (number | null)[]>,
    variables: readonly V[],
    fallbackInterval: number,
    label: string
): TimeSeriesBlock<V> {
    const times = series.time;
    if (!times || times.length === 0) {
        throw new Error(`${label} block has no time axis`);
    }
    const axis: number[] = [];
    for (const t of times) {
        if (t === null) throw new Error(`${label} time axis contains null`);
        axis.push(t);
    }

    const interval = axis.length > 1 ? axis[1] - axis[0] : fallbackInterval;
    if (interval <= 0) {
        throw new Error(`${label} time axis is not increasing`);
    }
    for (let i = 1; i < axis.length; i++) {
        if (axis[i] - axis[i - 1] !== interval) {
            throw new Error(`${label} time axis is not evenly spaced at index ${i}`);
        }
    }

    const values: Partial<Record<V, (number | null)[]>> = {};
    for (const variable of variables) {
        const column = series[variable];
        if (column) values[variable] = column;
    }

    return {
        start: axis[0],
        end: axis[0] + axis.length * interval,
        interval,
        values
    };
}

function toLocationResponse(payload: LocationPayload): BatchedLocationResponse {
    return {
        latitude: payload.latitude,
        longitude: payload.longitude,
        timezone: payload.timezone,
        utcOffsetSeconds: payload.utc_offset_seconds,
        hourly: toBlock(payload.hourly, HOURLY_VARIABLES, HOURLY_SECONDS, 'hourly'),
        daily: payload.daily ? toBlock(payload.daily, DAILY_VARIABLES, DAILY_SECONDS, 'daily') : null
    };
}

/**
 * Decode a forecast body. A single-location request yields an object rather
 * than an array.
 */
export function decodeForecastBody(body: string): BatchedLocationResponse[] {
    const json: unknown = JSON.parse(body);
    const entries = Array.isArray(json) ? json : [json];
    return entries.map((entry, i) => {
        const parsed = locationPayloadSchema.safeParse(entry);
        if (!parsed.success) {
            const issue = parsed.error.issues[0];
            throw new Error(`entry ${i}: ${issue ? `${issue.path.join('.')} ${issue.message}` : 'invalid'}`);
        }
        return toLocationResponse(parsed.data);
    });
}

export class OpenMeteoClient {
    private readonly http: HttpClient;
    private readonly endpoint: string;
    private readonly forecastDays: number;

    constructor(options: OpenMeteoClientOptions) {
        this.http = options.http;
        this.endpoint = options.endpoint ?? OPEN_METEO_FORECAST_URL;
        this.forecastDays = options.forecastDays ?? 1;
    }

    /**
     * One call for all locations. `value[i]` belongs to `locations[i]`.
     */
    async fetchBatch(
        locations: readonly Location[],
        signal?: AbortSignal
    ): Promise<Result<BatchedLocationResponse[], FetchError>> {
        const url = buildForecastUrl(locations, this.endpoint, this.forecastDays);
        try {
            const result = await this.http.getJson(url, {
                scope: 'batch',
                decode: decodeForecastBody,
                signal
            });
            return ok(result.data);
        } catch (error) {
            if (error instanceof FetchError) return err(error);
            return err(new FetchError('batch', 'network', String(error), { cause: error }));
        }
    }
}
