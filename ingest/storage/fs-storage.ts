/**
 * Weather Ingest — Filesystem Storage Backend
 *
 * Objects live at `<root>/<container>/<key>`. Writes go to a sibling temp file
 * and are renamed into place, so a reader sees the old object or the new one.
 */

import { randomUUID } from 'node:crypto';
import type { Dirent } from 'node:fs';
import { mkdir, readdir, readFile, rename, rm, stat, writeFile } from 'node:fs/promises';
import path from 'node:path';
import type { StorageBackend } from './storage';

export class FileSystemStorage implements StorageBackend {
    private readonly baseDir: string;

    constructor(root: string, readonly container: string) {
        this.baseDir = path.resolve(root, container);
    }

    async exists(key: string): Promise<boolean> {
        try {
            const info = await stat(this.resolveKey(key));
            return info.isFile();
        } catch (error) {
            if (isMissing(error)) return false;
            throw error;
        }
    }

    async put(key: string, data: Uint8Array): Promise<void> {
        const target = this.resolveKey(key);
        await mkdir(path.dirname(target), { recursive: true });

        const temp = `${target}.${randomUUID()}.tmp`;
        try {
            await writeFile(temp, data);
            await rename(temp, target);
        } catch (error) {
            await rm(temp, { force: true });
            throw error;
        }
    }

    async get(key: string): Promise<Uint8Array | null> {
        try {
            return new Uint8Array(await readFile(this.resolveKey(key)));
        } catch (error) {
            if (isMissing(error)) return null;
            throw error;
        }
    }

    async list(prefix: string): Promise<string[]> {
        const keys: string[] = [];
        await this.walk(this.baseDir, keys);
        return keys.filter((key) => key.startsWith(prefix) && !key.endsWith('.tmp')).sort();
    }

    private async walk(dir: string, out: string[]): Promise<void> {
        let entries: Dirent[];
        try {
            entries = await readdir(dir, { withFileTypes: true });
        } catch (error) {
            if (isMissing(error)) return;
            throw error;
        }
        for (const entry of entries) {
            const full = path.join(dir, entry.name);
            if (entry.isDirectory()) {
                await this.walk(full, out);
            } else if (entry.isFile()) {
                out.push(path.relative(this.baseDir, full).split(path.sep).join('/'));
            }
        }
    }

    private resolveKey(key: string): string {
        const resolved = path.resolve(this.baseDir, ...key.split('/'));
        if (!resolved.startsWith(this.baseDir + path.sep)) {
            throw new Error(`Key escapes storage root: ${key}`);
        }
        return resolved;
    }
}

function isMissing(error: unknown): boolean {
    return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}
