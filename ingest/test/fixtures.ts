import { DAILY_VARIABLES, HOURLY_VARIABLES, type Location } from '../types';

export const RUN_AT = new Date('2024-03-01T14:00:00Z');
/** 2024-03-01T00:00:00Z */
export const DAY_START = Date.UTC(2024, 2, 1) / 1000;

export const TEST_API_KEY = 'test-secret';

/**
 * Forecast body for one location, shaped like the provider's unixtime reply.
 * Variable `v` at hour `i` is `v_index * 100 + i`.
 */
export function forecastEntry(location: Location, hours = 24, start = DAY_START) {
    const hourly: Record<string, number[]> = {
        time: Array.from({ length: hours }, (_, i) => start + i * 3600)
    };
    HOURLY_VARIABLES.forEach((variable, v) => {
        hourly[variable] = Array.from({ length: hours }, (_, i) => v * 100 + i);
    });

    const daily: Record<string, number[]> = { time: [start] };
    for (const variable of DAILY_VARIABLES) {
        daily[variable] = [start + 6 * 3600];
    }

    return {
        latitude: location.latitude,
        longitude: location.longitude,
        timezone: 'Africa/Casablanca',
        utc_offset_seconds: 3600,
        hourly,
        daily
    };
}

export function jsonResponse(body: unknown, status = 200): Response {
    return new Response(JSON.stringify(body), {
        status,
        headers: { 'content-type': 'application/json' }
    });
}

/** URL of whatever was passed as fetch's first argument. */
export function requestUrl(input: unknown): URL {
    if (input instanceof URL) return input;
    if (typeof input === 'string') return new URL(input);
    if (input instanceof Request) return new URL(input.url);
    throw new Error('Unexpected fetch input');
}

/** Never resolves; rejects once `signal` aborts. */
export function hangUntilAborted(signal: AbortSignal | null | undefined): Promise<Response> {
    return new Promise((_resolve, reject) => {
        const abort = () => reject(new Error('The operation was aborted.'));
        if (signal?.aborted) {
            abort();
            return;
        }
        signal?.addEventListener('abort', abort, { once: true });
    });
}

export const decoder = new TextDecoder();
