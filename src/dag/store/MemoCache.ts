/**
 * @file Memo Cache
 *
 * Process-wide, content-addressed store of step results keyed by
 * fingerprint. Guarantees at most one computation per fingerprint at a
 * time: concurrent callers for the same fingerprint wait on the first
 * caller's in-flight promise. Unrelated fingerprints never wait on each
 * other.
 *
 * Layers, in lookup order: memory → persistent backend (optional) →
 * computation. Entries stay valid until evicted or cleared. Every
 * result is deep-frozen before it enters a layer, so a caller holding a
 * result cannot change what later hits receive.
 *
 * @module dag/store
 */

import type { StepResult } from '../../steps/types.js';
import type { TelemetryBus } from '../../telemetry/TelemetryBus.js';
import { value_freeze } from '../../utils/freeze.js';
import type {
    CacheBackend,
    CacheResolution,
    CacheStats,
} from './types.js';

export class MemoCache {
    private readonly entries: Map<string, StepResult> = new Map();
    private readonly inflight: Map<string, Promise<CacheResolution>> = new Map();
    private readonly writes: Map<string, Promise<void>> = new Map();
    private hits: number = 0;
    private misses: number = 0;

    constructor(
        private readonly backend: CacheBackend | null = null,
        private readonly bus: TelemetryBus | null = null,
    ) {}

    /**
     * Look up a fingerprint in memory, then in the persistent layer.
     * A persistent hit is promoted into memory.
     *
     * @returns The cached result, or null on a miss
     */
    async lookup(fingerprint: string): Promise<StepResult | null> {
        const memory: StepResult | undefined = this.entries.get(fingerprint);
        if (memory) return memory;

        const persisted: StepResult | null = await this.persistent_read(fingerprint);
        if (persisted) {
            this.entries.set(fingerprint, value_freeze(persisted));
        }
        return persisted;
    }

    /**
     * Store a result in memory and write it back to the persistent layer.
     * Writes for the same fingerprint are serialized; a failed write is
     * reported and does not fail the caller.
     */
    async store(fingerprint: string, result: StepResult): Promise<void> {
        this.entries.set(fingerprint, value_freeze(result));
        if (!this.backend) return;

        const backend: CacheBackend = this.backend;
        const previous: Promise<void> = this.writes.get(fingerprint) ?? Promise.resolve();
        const next: Promise<void> = previous.then(async (): Promise<void> => {
            try {
                await backend.entry_put(fingerprint, result);
            } catch (error: unknown) {
                this.warning_report(fingerprint, `write failed: ${message_of(error)}`);
            }
        });
        this.writes.set(fingerprint, next);
        await next;
        if (this.writes.get(fingerprint) === next) {
            this.writes.delete(fingerprint);
        }
    }

    /**
     * Resolve a fingerprint through the cache, running `compute` only when
     * no layer holds it and no other caller is already computing it.
     *
     * A failed computation is not cached; every caller waiting on it
     * receives the same rejection, after the in-flight entry is gone, so a
     * caller that retries starts a fresh computation.
     */
    async memo_resolve(
        fingerprint: string,
        compute: () => Promise<StepResult>,
    ): Promise<CacheResolution> {
        const memory: StepResult | undefined = this.entries.get(fingerprint);
        if (memory) {
            this.hits++;
            return { result: memory, source: 'memory' };
        }

        const pending: Promise<CacheResolution> | undefined = this.inflight.get(fingerprint);
        if (pending) {
            this.hits++;
            const shared: CacheResolution = await pending;
            return { result: shared.result, source: 'inflight' };
        }

        const task: Promise<CacheResolution> = this.layers_resolve(fingerprint, compute)
            .finally((): void => {
                this.inflight.delete(fingerprint);
            });
        this.inflight.set(fingerprint, task);
        return task;
    }

    /** Drop one entry from every layer. */
    async evict(fingerprint: string): Promise<void> {
        this.entries.delete(fingerprint);
        await this.backend?.entry_delete(fingerprint);
    }

    /** Drop every entry from every layer. */
    async clear(): Promise<void> {
        this.entries.clear();
        await this.backend?.entries_clear();
    }

    /** Whether the in-memory layer holds a fingerprint. */
    has(fingerprint: string): boolean {
        return this.entries.has(fingerprint);
    }

    stats(): CacheStats {
        return {
            entries: this.entries.size,
            inflight: this.inflight.size,
            hits: this.hits,
            misses: this.misses,
        };
    }

    private async layers_resolve(
        fingerprint: string,
        compute: () => Promise<StepResult>,
    ): Promise<CacheResolution> {
        const persisted: StepResult | null = await this.persistent_read(fingerprint);
        if (persisted) {
            this.hits++;
            this.entries.set(fingerprint, value_freeze(persisted));
            return { result: persisted, source: 'persistent' };
        }

        this.misses++;
        const result: StepResult = await compute();
        await this.store(fingerprint, result);
        return { result, source: 'computed' };
    }

    /** Unreadable persisted entries count as misses. */
    private async persistent_read(fingerprint: string): Promise<StepResult | null> {
        if (!this.backend) return null;
        try {
            return await this.backend.entry_get(fingerprint);
        } catch (error: unknown) {
            this.warning_report(fingerprint, `unreadable entry treated as miss: ${message_of(error)}`);
            return null;
        }
    }

    private warning_report(fingerprint: string, message: string): void {
        console.warn(`[CACHE] ${fingerprint.slice(0, 12)}: ${message}`);
        this.bus?.emit({ type: 'cache_warning', fingerprint, message });
    }
}

function message_of(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}
