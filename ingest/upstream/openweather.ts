/**
 * Weather Ingest — OpenWeather Per-Call Client
 */

import { FetchError } from '../errors';
import { err, ok, type Location, type RawSnapshot, type Result } from '../types';
import type { HttpClient } from './http';

export const OPENWEATHER_CURRENT_URL = 'https://api.openweathermap.org/data/2.5/weather';

export interface OpenWeatherClientOptions {
    http: HttpClient;
    endpoint?: string;
}

export function buildCurrentUrl(location: Location, apiKey: string, endpoint = OPENWEATHER_CURRENT_URL): URL {
    const url = new URL(endpoint);
    url.searchParams.set('lat', location.latitude.toString());
    url.searchParams.set('lon', location.longitude.toString());
    url.searchParams.set('appid', apiKey);
    url.searchParams.set('units', 'metric');
    return url;
}

/** Body must be a JSON object; the text itself is what gets stored. */
export function assertJsonObject(body: string): string {
    const json: unknown = JSON.parse(body);
    if (typeof json !== 'object' || json === null || Array.isArray(json)) {
        throw new Error('Expected a JSON object');
    }
    return body;
}

export class OpenWeatherClient {
    private readonly http: HttpClient;
    private readonly endpoint: string;

    constructor(options: OpenWeatherClientOptions) {
        this.http = options.http;
        this.endpoint = options.endpoint ?? OPENWEATHER_CURRENT_URL;
    }

    async fetchOne(location: Location, apiKey: string, signal?: AbortSignal): Promise<Result<RawSnapshot, FetchError>> {
        const url = buildCurrentUrl(location, apiKey, this.endpoint);
        const logUrl = buildCurrentUrl(location, '***', this.endpoint).toString();
        try {
            const result = await this.http.getJson(url, {
                scope: location.id,
                decode: assertJsonObject,
                signal,
                logUrl
            });
            return ok({ body: result.data, fromCache: result.fromCache });
        } catch (error) {
            if (error instanceof FetchError) return err(error);
            return err(new FetchError(location.id, 'network', String(error), { cause: error }));
        }
    }
}
