import { describe, it, expect } from 'vitest';
import { NormalizationError } from '../errors';
import { blockTimestamps, normalizeBatch, normalizeLocation, tagSnapshot } from '../normalize';
import { recordsToCsv, CSV_COLUMNS } from '../csv';
import type { BatchedLocationResponse, Location } from '../types';
import { decodeForecastBody } from '../upstream/openmeteo';
import { DAY_START, forecastEntry } from './fixtures';

const casablanca: Location = { id: 'casablanca', label: 'Casablanca', latitude: 33.5731, longitude: -7.5898 };
const fes: Location = { id: 'fes', label: 'Fès', latitude: 34.0331, longitude: -5.0003 };

function decodeOne(payload: unknown): BatchedLocationResponse {
    const [response] = decodeForecastBody(JSON.stringify(payload));
    return response;
}

describe('blockTimestamps', () => {

    it('covers the half-open window', () => {
        const stamps = blockTimestamps({ start: DAY_START, end: DAY_START + 3 * 3600, interval: 3600 }, 'x');
        expect(stamps.map((d) => d.toISOString())).toEqual([
            '2024-03-01T00:00:00.000Z',
            '2024-03-01T01:00:00.000Z',
            '2024-03-01T02:00:00.000Z'
        ]);
    });

    it('returns nothing for an empty window', () => {
        expect(blockTimestamps({ start: DAY_START, end: DAY_START, interval: 3600 }, 'x')).toEqual([]);
    });

    it('rejects a span that is not a whole number of intervals', () => {
        expect(() => blockTimestamps({ start: 0, end: 5400, interval: 3600 }, 'fes')).toThrow(NormalizationError);
    });

    it('rejects a non-positive interval', () => {
        expect(() => blockTimestamps({ start: 0, end: 3600, interval: 0 }, 'fes')).toThrow(NormalizationError);
    });
});

describe('normalizeBatch', () => {

    it('emits one record per location and timestamp', () => {
        const responses = [decodeOne(forecastEntry(casablanca, 3)), decodeOne(forecastEntry(fes, 3))];
        const records = normalizeBatch(responses, [casablanca, fes]);

        expect(records).toHaveLength(6);
        expect(records.map((r) => r.locationId)).toEqual(['casablanca', 'casablanca', 'casablanca', 'fes', 'fes', 'fes']);
        expect(records[4].timestamp.toISOString()).toBe('2024-03-01T01:00:00.000Z');
        expect(records[4].values.temperature_2m).toBe(1);
        expect(records[4].values.relative_humidity_2m).toBe(101);
        expect(records[4].values.direct_radiation).toBe(1901);
    });

    it('rejects a response count that does not match the registry', () => {
        const responses = [decodeOne(forecastEntry(casablanca, 3))];
        try {
            normalizeBatch(responses, [casablanca, fes]);
            expect.unreachable();
        } catch (error) {
            expect(error).toBeInstanceOf(NormalizationError);
            expect(error).toMatchObject({ locationId: null });
        }
    });

    it('rejects a variable array shorter than the time axis', () => {
        const payload = forecastEntry(fes, 3);
        payload.hourly.rain = [0, 0];
        expect(() => normalizeLocation(decodeOne(payload), fes)).toThrow(
            'Hourly variable rain has 2 values, expected 3'
        );
    });

    it('rejects a variable array longer than the time axis', () => {
        const payload = forecastEntry(fes, 3);
        payload.hourly.snowfall = [0, 0, 0, 0];
        expect(() => normalizeLocation(decodeOne(payload), fes)).toThrow(NormalizationError);
    });

    it('rejects a missing variable', () => {
        const payload = forecastEntry(fes, 3);
        delete payload.hourly.is_day;
        expect(() => normalizeLocation(decodeOne(payload), fes)).toThrow('Missing hourly variable is_day');
    });

    it('keeps nulls', () => {
        const payload = forecastEntry(casablanca, 2);
        const response = decodeOne(payload);
        response.hourly.values.snow_depth = [null, 0.5];
        const records = normalizeLocation(response, casablanca);
        expect(records[0].values.snow_depth).toBeNull();
        expect(records[1].values.snow_depth).toBe(0.5);
    });
});

describe('tagSnapshot', () => {

    it('passes the body through unchanged', () => {
        const body = '{"main":{"temp":18.4},"name":"Rabat"}';
        const at = new Date('2024-03-01T14:00:00Z');
        expect(tagSnapshot(body, casablanca, at)).toEqual({ location: casablanca, ingestedAt: at, body });
    });
});

describe('recordsToCsv', () => {

    it('writes the header and one row per record', () => {
        const response = decodeOne(forecastEntry(fes, 2));
        response.hourly.values.rain = [null, 0.2];
        const csv = recordsToCsv(normalizeLocation(response, fes), [fes]);
        const lines = csv.trimEnd().split('\n');

        expect(lines).toHaveLength(3);
        expect(lines[0]).toBe(CSV_COLUMNS.join(','));
        expect(lines[0].startsWith('datetime_utc,temperature_2m,relative_humidity_2m,')).toBe(true);
        expect(lines[0].endsWith(',direct_radiation,city')).toBe(true);

        const cells = lines[1].split(',');
        expect(cells).toHaveLength(22);
        expect(cells[0]).toBe('2024-03-01 00:00:00+00:00');
        expect(cells[1]).toBe('0');
        expect(cells[5]).toBe('');
        expect(cells[21]).toBe('Fès');

        expect(lines[2].split(',')[5]).toBe('0.2');
    });

    it('quotes labels that contain the delimiter', () => {
        const place: Location = { id: 'x', label: 'Rabat, Salé', latitude: 34, longitude: -6.8 };
        const csv = recordsToCsv(normalizeLocation(decodeOne(forecastEntry(place, 1)), place), [place]);
        expect(csv.trimEnd().split('\n')[1].endsWith(',"Rabat, Salé"')).toBe(true);
    });
});
