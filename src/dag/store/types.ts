/**
 * @file Cache and Result Store Type Definitions
 *
 * The memo cache maps fingerprints to step results for the lifetime of
 * the process. A persistent backend, keyed by the same fingerprint, is
 * an optional second layer consulted after a memory miss and written
 * back after a successful remote invocation.
 *
 * @module dag/store
 */

import type { z } from 'zod';
import type { StepResult } from '../../steps/types.js';
import type { CacheEnvelopeSchema } from './schemas.js';

// ─── Persistent Backend Interface ───────────────────────────────

/**
 * Backend-agnostic persistent cache.
 *
 * The memo cache never touches I/O directly. A backend that cannot
 * read an entry (missing, truncated, wrong shape) may either return
 * null or throw; the memo cache treats both as a miss.
 */
export interface CacheBackend {
    /** Read the result stored under a fingerprint. Null if absent. */
    entry_get(fingerprint: string): Promise<StepResult | null>;

    /** Store a result under a fingerprint, replacing any previous entry. */
    entry_put(fingerprint: string, result: StepResult): Promise<void>;

    /** Remove one entry. No-op if absent. */
    entry_delete(fingerprint: string): Promise<void>;

    /** Remove every entry. */
    entries_clear(): Promise<void>;
}

// ─── Cache Envelope ─────────────────────────────────────────────

/**
 * On-disk wrapper around a cached result.
 *
 * @property fingerprint - Key the entry was stored under (checked on read)
 * @property storedAt - ISO timestamp of the write
 * @property result - The cached step result
 */
export type CacheEnvelope = z.output<typeof CacheEnvelopeSchema>;

// ─── Resolution ─────────────────────────────────────────────────

/**
 * Where a memoized result came from.
 *
 * - memory: already in the in-process layer
 * - persistent: read from the backend
 * - inflight: another caller was computing the same fingerprint
 * - computed: this caller ran the computation
 */
export type CacheSource = 'memory' | 'persistent' | 'inflight' | 'computed';

export interface CacheResolution {
    result: StepResult;
    source: CacheSource;
}

export interface CacheStats {
    entries: number;
    inflight: number;
    hits: number;
    misses: number;
}

// ─── Result Lookup ──────────────────────────────────────────────

/**
 * Outcome of looking up a step's result.
 *
 * `missing` means the step was part of the workflow but produced no
 * result (it failed or was skipped); `not-requested` means the step was
 * never part of the workflow.
 */
export type ResultLookup<R extends StepResult = StepResult> =
    | { status: 'present'; result: R }
    | { status: 'missing' }
    | { status: 'not-requested' };
