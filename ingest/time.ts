/**
 * Weather Ingest — Time Utilities
 */

/**
 * Floor a date to the start of a bucket.
 *
 * @param bucketMinutes The duration of the bucket in minutes (e.g., 60)
 * @returns A new Date floored to the bucket boundary (UTC)
 */
export function floorToBucketUtc(date: Date | string, bucketMinutes: number): Date {
    const d = typeof date === 'string' ? new Date(date) : date;
    const ms = d.getTime();
    const bucketMs = bucketMinutes * 60_000;
    return new Date(Math.floor(ms / bucketMs) * bucketMs);
}

export interface UtcParts {
    year: string;
    month: string;
    day: string;
    hour: string;
    minute: string;
    second: string;
}

/** Zero-padded UTC calendar fields. */
export function utcParts(date: Date): UtcParts {
    const pad = (n: number) => n.toString().padStart(2, '0');
    return {
        year: date.getUTCFullYear().toString().padStart(4, '0'),
        month: pad(date.getUTCMonth() + 1),
        day: pad(date.getUTCDate()),
        hour: pad(date.getUTCHours()),
        minute: pad(date.getUTCMinutes()),
        second: pad(date.getUTCSeconds())
    };
}

/**
 * Render a UTC instant as `YYYY-MM-DD HH:MM:SS+00:00`.
 */
export function formatUtcOffsetTimestamp(date: Date): string {
    const p = utcParts(date);
    return `${p.year}-${p.month}-${p.day} ${p.hour}:${p.minute}:${p.second}+00:00`;
}
