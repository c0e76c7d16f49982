/**
 * Weather Ingest — CSV Export
 *
 * One combined table per batched run:
 *   datetime_utc, <hourly variables in request order>, city
 */

import { stringify } from 'csv-stringify/sync';
import { formatUtcOffsetTimestamp } from './time';
import { HOURLY_VARIABLES, type Location, type ObservationRecord } from './types';

export const CSV_COLUMNS: readonly string[] = ['datetime_utc', ...HOURLY_VARIABLES, 'city'];

type CsvRow = Record<string, string | number | null>;

/**
 * Serialize records to CSV text. The `city` column carries the location label.
 */
export function recordsToCsv(records: readonly ObservationRecord[], locations: readonly Location[]): string {
    const labels = new Map(locations.map((location) => [location.id, location.label]));

    const rows: CsvRow[] = records.map((record) => {
        const row: CsvRow = { datetime_utc: formatUtcOffsetTimestamp(record.timestamp) };
        for (const variable of HOURLY_VARIABLES) {
            row[variable] = record.values[variable];
        }
        row.city = labels.get(record.locationId) ?? record.locationId;
        return row;
    });

    return stringify(rows, {
        header: true,
        columns: [...CSV_COLUMNS]
    });
}
