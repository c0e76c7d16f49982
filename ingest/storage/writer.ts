/**
 * Weather Ingest — Sink Writer
 */

import { SinkError, describeError } from '../errors';
import { hashHex } from '../digest';
import { err, ok, type ArtifactRef, type Result } from '../types';
import type { StorageBackend } from './storage';

export const WEATHER_RAW_CONTAINER = 'weather-raw';

/**
 * Create or overwrite exactly one object at `key`.
 * A rejected backend write becomes a SinkError scoped to this artifact.
 */
export async function writeArtifact(
    storage: StorageBackend,
    key: string,
    payload: Uint8Array,
    contentType: string
): Promise<Result<ArtifactRef, SinkError>> {
    try {
        await storage.put(key, payload, { contentType });
    } catch (error) {
        return err(
            new SinkError(key, `Write to ${storage.container}/${key} failed: ${describeError(error)}`, { cause: error })
        );
    }
    return ok({ key, bytes: payload.byteLength, checksum: hashHex(payload) });
}

export function encodeText(text: string): Uint8Array {
    return new TextEncoder().encode(text);
}
