/**
 * Weather Ingest — Secret Store
 *
 * Credentials are resolved by name at run time, never at import.
 */

import { SecretResolutionError, describeError } from './errors';

export interface SecretStore {
    /** Value for `name`, or undefined when the store has no such secret. */
    getSecret(name: string): Promise<string | undefined>;
}

/** `OpenWeatherApiKey` -> `OPEN_WEATHER_API_KEY`, `weather-kv` -> `WEATHER_KV`. */
export function toEnvName(name: string): string {
    return name
        .replace(/([a-z0-9])([A-Z])/g, '$1_$2')
        .replace(/[^A-Za-z0-9]+/g, '_')
        .replace(/^_+|_+$/g, '')
        .toUpperCase();
}

/**
 * Reads secrets from environment variables. With a vault name the variable is
 * prefixed: vault `weather-kv` and secret `OpenWeatherApiKey` read
 * `WEATHER_KV_OPEN_WEATHER_API_KEY`.
 */
export class EnvSecretStore implements SecretStore {
    constructor(
        private readonly env: Record<string, string | undefined>,
        private readonly vault?: string
    ) { }

    variableFor(name: string): string {
        const base = toEnvName(name);
        return this.vault ? `${toEnvName(this.vault)}_${base}` : base;
    }

    async getSecret(name: string): Promise<string | undefined> {
        return this.env[this.variableFor(name)];
    }
}

export class MemorySecretStore implements SecretStore {
    private readonly secrets: Map<string, string>;

    constructor(secrets: Record<string, string> = {}) {
        this.secrets = new Map(Object.entries(secrets));
    }

    async getSecret(name: string): Promise<string | undefined> {
        return this.secrets.get(name);
    }

    set(name: string, value: string): void {
        this.secrets.set(name, value);
    }
}

/**
 * Resolve a required secret. Missing or blank values and store failures all
 * surface as SecretResolutionError.
 */
export async function resolveSecret(store: SecretStore, name: string): Promise<string> {
    let value: string | undefined;
    try {
        value = await store.getSecret(name);
    } catch (error) {
        throw new SecretResolutionError(name, `Secret store lookup for ${name} failed: ${describeError(error)}`, {
            cause: error
        });
    }
    const trimmed = value?.trim();
    if (!trimmed) {
        throw new SecretResolutionError(name, `Secret ${name} is missing or empty`);
    }
    return trimmed;
}
