/**
 * @file Filesystem Cache Backend
 *
 * Implements CacheBackend against a directory on the local filesystem.
 * Each entry is one `<fingerprint>.json` envelope. Writes go to a
 * temporary file first and are renamed into place, so a reader never
 * sees a half-written entry from this process.
 *
 * @module dag/store/backend
 */

import { promises as fs } from 'fs';
import path from 'path';
import type { CacheBackend, CacheEnvelope } from '../types.js';
import type { StepResult } from '../../../steps/types.js';
import { CacheEnvelopeSchema } from '../schemas.js';

const FINGERPRINT_PATTERN: RegExp = /^[A-Za-z0-9_-]+$/;

/**
 * Directory-backed persistent cache.
 */
export class FileCacheBackend implements CacheBackend {
    constructor(private readonly directory: string) {}

    async entry_get(fingerprint: string): Promise<StepResult | null> {
        let raw: string;
        try {
            raw = await fs.readFile(this.entryPath_resolve(fingerprint), 'utf-8');
        } catch (error: unknown) {
            if (errorCode_get(error) === 'ENOENT') return null;
            throw error;
        }

        const parsed = CacheEnvelopeSchema.safeParse(JSON.parse(raw));
        if (!parsed.success) {
            throw new Error(`Corrupt cache entry ${fingerprint}: ${parsed.error.issues[0]?.message ?? 'invalid shape'}`);
        }
        if (parsed.data.fingerprint !== fingerprint) {
            throw new Error(`Cache entry ${fingerprint} is keyed as ${parsed.data.fingerprint}`);
        }
        return parsed.data.result;
    }

    async entry_put(fingerprint: string, result: StepResult): Promise<void> {
        await fs.mkdir(this.directory, { recursive: true });
        const envelope: CacheEnvelope = {
            fingerprint,
            storedAt: new Date().toISOString(),
            result,
        };
        const finalPath: string = this.entryPath_resolve(fingerprint);
        const tempPath: string = `${finalPath}.${process.pid}.${Date.now()}.tmp`;
        await fs.writeFile(tempPath, JSON.stringify(envelope), 'utf-8');
        await fs.rename(tempPath, finalPath);
    }

    async entry_delete(fingerprint: string): Promise<void> {
        await fs.rm(this.entryPath_resolve(fingerprint), { force: true });
    }

    async entries_clear(): Promise<void> {
        let names: string[];
        try {
            names = await fs.readdir(this.directory);
        } catch (error: unknown) {
            if (errorCode_get(error) === 'ENOENT') return;
            throw error;
        }
        await Promise.all(
            names
                .filter((name: string): boolean => name.endsWith('.json'))
                .map((name: string): Promise<void> => fs.rm(path.join(this.directory, name), { force: true })),
        );
    }

    private entryPath_resolve(fingerprint: string): string {
        if (!FINGERPRINT_PATTERN.test(fingerprint)) {
            throw new Error(`Invalid fingerprint for cache path: '${fingerprint}'`);
        }
        return path.join(this.directory, `${fingerprint}.json`);
    }
}

function errorCode_get(error: unknown): string | undefined {
    if (typeof error === 'object' && error !== null && 'code' in error) {
        const code: unknown = error.code;
        return typeof code === 'string' ? code : undefined;
    }
    return undefined;
}
