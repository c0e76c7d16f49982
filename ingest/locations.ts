/**
 * Weather Ingest — Location Registry
 *
 * The fixed set of named points ingested every run. Registry order is the
 * order of the batched request, and therefore of its response.
 */

import { z } from 'zod';
import { ConfigError } from './errors';
import type { Location } from './types';

export const DEFAULT_LOCATIONS: readonly Location[] = Object.freeze([
    { id: 'casablanca', label: 'Casablanca', latitude: 33.5731, longitude: -7.5898 },
    { id: 'rabat', label: 'Rabat', latitude: 34.0209, longitude: -6.8416 },
    { id: 'marrakech', label: 'Marrakech', latitude: 31.6295, longitude: -7.9811 },
    { id: 'fes', label: 'Fès', latitude: 34.0331, longitude: -5.0003 },
    { id: 'tanger', label: 'Tanger', latitude: 35.7595, longitude: -5.834 },
    { id: 'meknes', label: 'Meknès', latitude: 34.261, longitude: -6.5802 },
    { id: 'agadir', label: 'Agadir', latitude: 30.4278, longitude: -9.5981 },
    { id: 'safi', label: 'Safi', latitude: 32.2994, longitude: -9.2372 },
    { id: 'beni-mellal', label: 'Beni Mellal', latitude: 32.3373, longitude: -6.3498 },
    { id: 'nador', label: 'Nador', latitude: 35.1681, longitude: -2.9335 },
    { id: 'mohammedia', label: 'Mohammedia', latitude: 33.6874, longitude: -7.382 },
    { id: 'tetouan', label: 'Tétouan', latitude: 35.5722, longitude: -5.3724 },
    { id: 'el-jadida', label: 'El Jadida', latitude: 33.2316, longitude: -8.5007 },
    { id: 'oujda', label: 'Oujda', latitude: 34.6867, longitude: -1.9114 },
    { id: 'ouarzazate', label: 'Ouarzazate', latitude: 30.9189, longitude: -6.8934 },
    { id: 'essaouira', label: 'Essaouira', latitude: 31.5085, longitude: -9.7595 },
    { id: 'tiznit', label: 'Tiznit', latitude: 29.6974, longitude: -9.7316 },
    { id: 'al-hoceima', label: 'Al Hoceima', latitude: 35.2517, longitude: -3.937 },
    { id: 'laayoune', label: 'Laâyoune', latitude: 27.151, longitude: -13.199 },
    { id: 'dakhla', label: 'Dakhla', latitude: 23.6848, longitude: -15.957 }
]);

/** Default per-call subset. */
export const DEFAULT_PER_CALL_LOCATION_IDS: readonly string[] = [
    'casablanca',
    'rabat',
    'marrakech',
    'fes',
    'tanger',
    'agadir'
];

const locationSchema = z.object({
    id: z.string().trim().min(1),
    // Labels become a storage path segment.
    label: z.string().trim().min(1).refine((label) => !/^\.+$/.test(label), 'Label cannot be only dots'),
    latitude: z.number().finite().min(-90).max(90),
    longitude: z.number().finite().min(-180).max(180)
});

/**
 * Validate a list of locations: shape, coordinate ranges, unique ids.
 * Returns frozen copies.
 */
export function validateLocations(input: unknown): readonly Location[] {
    const parsed = z.array(locationSchema).safeParse(input);
    if (!parsed.success) {
        const issue = parsed.error.issues[0];
        const path = issue ? issue.path.join('.') : '';
        throw new ConfigError(`Invalid location registry at [${path}]: ${issue?.message ?? 'unknown issue'}`);
    }

    const seen = new Set<string>();
    for (const location of parsed.data) {
        if (seen.has(location.id)) {
            throw new ConfigError(`Invalid location registry: duplicate id "${location.id}"`);
        }
        seen.add(location.id);
    }

    return Object.freeze(parsed.data.map((location) => Object.freeze({ ...location })));
}

/**
 * Parse a registry override (a JSON array of locations).
 */
export function parseLocationsJson(raw: string): readonly Location[] {
    let parsed: unknown;
    try {
        parsed = JSON.parse(raw);
    } catch (error) {
        throw new ConfigError('INGEST_LOCATIONS_JSON is not valid JSON', { cause: error });
    }
    if (!Array.isArray(parsed)) {
        throw new ConfigError('INGEST_LOCATIONS_JSON must be a JSON array');
    }
    return validateLocations(parsed);
}

/**
 * Pick locations by id, preserving registry order.
 * Unknown ids are a configuration error.
 */
export function selectLocations(registry: readonly Location[], ids: readonly string[]): readonly Location[] {
    const known = new Set(registry.map((location) => location.id));
    const unknown = ids.filter((id) => !known.has(id));
    if (unknown.length > 0) {
        throw new ConfigError(`Unknown location ids: ${unknown.join(', ')}`);
    }
    const wanted = new Set(ids);
    return registry.filter((location) => wanted.has(location.id));
}
