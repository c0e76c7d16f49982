/**
 * Weather Ingest — Digests
 *
 * BLAKE3 over raw bytes for artifact checksums, and over a canonical MsgPack
 * encoding for structured values such as request descriptors.
 */

import { encode as msgpackEncode } from '@msgpack/msgpack';
import { blake3 } from '@noble/hashes/blake3';

export function hashHex(data: Uint8Array): string {
    return Array.from(blake3(data), (b) => b.toString(16).padStart(2, '0')).join('');
}

/**
 * Copy of `value` with object keys sorted at every depth and -0 folded to 0.
 * Rejects values with no stable encoding.
 */
export function canonicalize(value: unknown, path = '$'): unknown {
    switch (typeof value) {
        case 'string':
        case 'boolean':
            return value;
        case 'number':
            if (!Number.isFinite(value)) throw new Error(`${path} is not a finite number`);
            return Object.is(value, -0) ? 0 : value;
        case 'object':
            break;
        default:
            throw new Error(`${path} has unsupported type ${typeof value}`);
    }
    if (value === null) return null;
    if (Array.isArray(value)) {
        return value.map((item, i) => canonicalize(item, `${path}[${i}]`));
    }

    const sorted: Record<string, unknown> = {};
    for (const [key, item] of Object.entries(value).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))) {
        sorted[key] = canonicalize(item, `${path}.${key}`);
    }
    return sorted;
}

export function canonicalMsgPack(value: unknown): Uint8Array {
    return msgpackEncode(canonicalize(value));
}

/** Stable identity of a structured value. */
export function digestOf(value: unknown): string {
    return hashHex(canonicalMsgPack(value));
}
