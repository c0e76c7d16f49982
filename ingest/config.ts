/**
 * Weather Ingest — Configuration
 *
 * Everything tunable comes from the environment, validated once at boot.
 */

import { z } from 'zod';
import { ConfigError } from './errors';
import { DEFAULT_LOCATIONS, DEFAULT_PER_CALL_LOCATION_IDS, parseLocationsJson, selectLocations } from './locations';
import type { Location } from './types';
import { OPEN_METEO_FORECAST_URL } from './upstream/openmeteo';
import { OPENWEATHER_CURRENT_URL } from './upstream/openweather';
import { WEATHER_RAW_CONTAINER } from './storage/writer';

export type StorageKind = 'fs' | 's3' | 'memory';

export interface IngestConfig {
    storage: {
        backend: StorageKind;
        container: string;
        root: string;
        s3: {
            endpoint?: string;
            region?: string;
            accessKeyId?: string;
            secretAccessKey?: string;
            sessionToken?: string;
            forcePathStyle?: boolean;
        };
    };
    upstream: {
        openMeteoUrl: string;
        openWeatherUrl: string;
        cacheTtlMs: number;
        retries: number;
        backoffMs: number;
        timeoutMs: number;
    };
    secrets: {
        vault?: string;
        openWeatherSecretName: string;
    };
    run: {
        timeoutMs: number;
        perCallConcurrency: number;
        enableBatched: boolean;
        enablePerCall: boolean;
    };
    schedule: {
        minute: number;
        runOnStartup: boolean;
    };
    locations: readonly Location[];
    perCallLocations: readonly Location[];
    port: number;
}

const TRUE_VALUES = new Set(['1', 'true', 'yes', 'on']);
const FALSE_VALUES = new Set(['0', 'false', 'no', 'off']);

// Unset and blank both mean "use the default".
const blankToUndefined = (value: unknown) =>
    typeof value === 'string' && value.trim() === '' ? undefined : value;

const optionalString = () => z.preprocess(blankToUndefined, z.string().trim().optional());

const stringVar = (fallback: string) => z.preprocess(blankToUndefined, z.string().trim().default(fallback));

const urlVar = (fallback: string) => z.preprocess(blankToUndefined, z.string().trim().url().default(fallback));

const numberVar = (fallback: number, min: number, max = Number.MAX_SAFE_INTEGER) =>
    z.preprocess(blankToUndefined, z.coerce.number().finite().min(min).max(max).default(fallback));

const integerVar = (fallback: number, min: number, max = Number.MAX_SAFE_INTEGER) =>
    z.preprocess(blankToUndefined, z.coerce.number().int().min(min).max(max).default(fallback));

const booleanVar = (fallback?: boolean) =>
    z.preprocess(blankToUndefined, z.string().optional()).transform((value, ctx) => {
        if (value === undefined) return fallback;
        const normalized = value.trim().toLowerCase();
        if (TRUE_VALUES.has(normalized)) return true;
        if (FALSE_VALUES.has(normalized)) return false;
        ctx.addIssue({
            code: z.ZodIssueCode.custom,
            message: `Expected one of ${[...TRUE_VALUES, ...FALSE_VALUES].join(', ')}`
        });
        return z.NEVER;
    });

const envSchema = z.object({
    STORAGE_BACKEND: z.preprocess(blankToUndefined, z.enum(['fs', 's3', 'memory']).default('fs')),
    STORAGE_CONTAINER: stringVar(WEATHER_RAW_CONTAINER),
    STORAGE_ROOT: stringVar('./data'),
    S3_ENDPOINT: optionalString(),
    S3_REGION: optionalString(),
    S3_ACCESS_KEY_ID: optionalString(),
    S3_SECRET_ACCESS_KEY: optionalString(),
    S3_SESSION_TOKEN: optionalString(),
    S3_FORCE_PATH_STYLE: booleanVar(),
    OPEN_METEO_URL: urlVar(OPEN_METEO_FORECAST_URL),
    OPENWEATHER_URL: urlVar(OPENWEATHER_CURRENT_URL),
    SECRET_VAULT: optionalString(),
    OPENWEATHER_SECRET_NAME: stringVar('OpenWeatherApiKey'),
    HTTP_CACHE_TTL_SECONDS: numberVar(3600, 0),
    HTTP_RETRIES: integerVar(5, 0, 20),
    HTTP_BACKOFF_SECONDS: numberVar(0.2, 0),
    HTTP_TIMEOUT_MS: integerVar(20_000, 1),
    RUN_TIMEOUT_MS: integerVar(600_000, 1),
    PER_CALL_CONCURRENCY: integerVar(4, 1, 64),
    ENABLE_BATCHED: booleanVar(true),
    ENABLE_PER_CALL: booleanVar(true),
    RUN_ON_STARTUP: booleanVar(true),
    SCHEDULE_MINUTE: integerVar(0, 0, 59),
    INGEST_LOCATIONS_JSON: optionalString(),
    PER_CALL_LOCATIONS: optionalString(),
    PORT: integerVar(3000, 0, 65_535)
});

function formatIssues(error: z.ZodError): string {
    return error.issues
        .map((issue) => `${issue.path.length > 0 ? issue.path.join('.') : '<root>'}: ${issue.message}`)
        .join('; ');
}

function parseIdList(raw: string): string[] {
    return raw
        .split(/[,\s]+/)
        .map((id) => id.trim())
        .filter((id) => id.length > 0);
}

/**
 * Validate `env` into a typed config. Throws ConfigError listing every issue.
 */
export function loadConfig(env: Record<string, string | undefined> = process.env): IngestConfig {
    const parsed = envSchema.safeParse(env);
    if (!parsed.success) {
        throw new ConfigError(`Invalid environment configuration: ${formatIssues(parsed.error)}`);
    }
    const vars = parsed.data;

    const locations = vars.INGEST_LOCATIONS_JSON ? parseLocationsJson(vars.INGEST_LOCATIONS_JSON) : DEFAULT_LOCATIONS;
    const perCallIds = vars.PER_CALL_LOCATIONS ? parseIdList(vars.PER_CALL_LOCATIONS) : DEFAULT_PER_CALL_LOCATION_IDS;
    const perCallLocations = selectLocations(locations, perCallIds);

    return {
        storage: {
            backend: vars.STORAGE_BACKEND,
            container: vars.STORAGE_CONTAINER,
            root: vars.STORAGE_ROOT,
            s3: {
                endpoint: vars.S3_ENDPOINT,
                region: vars.S3_REGION,
                accessKeyId: vars.S3_ACCESS_KEY_ID,
                secretAccessKey: vars.S3_SECRET_ACCESS_KEY,
                sessionToken: vars.S3_SESSION_TOKEN,
                forcePathStyle: vars.S3_FORCE_PATH_STYLE
            }
        },
        upstream: {
            openMeteoUrl: vars.OPEN_METEO_URL,
            openWeatherUrl: vars.OPENWEATHER_URL,
            cacheTtlMs: Math.round(vars.HTTP_CACHE_TTL_SECONDS * 1000),
            retries: vars.HTTP_RETRIES,
            backoffMs: Math.round(vars.HTTP_BACKOFF_SECONDS * 1000),
            timeoutMs: vars.HTTP_TIMEOUT_MS
        },
        secrets: {
            vault: vars.SECRET_VAULT,
            openWeatherSecretName: vars.OPENWEATHER_SECRET_NAME
        },
        run: {
            timeoutMs: vars.RUN_TIMEOUT_MS,
            perCallConcurrency: vars.PER_CALL_CONCURRENCY,
            enableBatched: vars.ENABLE_BATCHED ?? true,
            enablePerCall: vars.ENABLE_PER_CALL ?? true
        },
        schedule: {
            minute: vars.SCHEDULE_MINUTE,
            runOnStartup: vars.RUN_ON_STARTUP ?? true
        },
        locations,
        perCallLocations,
        port: vars.PORT
    };
}
