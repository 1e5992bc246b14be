/**
 * @file Scheduler Type Definitions
 *
 * @module dag/scheduler
 */

import type { FingerprintHasher } from '../fingerprint/types.js';
import type { AutoInsertPolicy } from '../graph/types.js';
import type { MemoCache } from '../store/MemoCache.js';
import type { ResultStore } from '../store/ResultStore.js';
import type { JobOptions } from '../../jobs/types.js';
import type { TelemetryBus } from '../../telemetry/TelemetryBus.js';
import type { RemoteTransport } from '../../transport/types.js';
import type { StepResult } from '../../steps/types.js';

export const DEFAULT_MAX_CONCURRENCY = 4;

/**
 * 'abort' stops the run at the first failure. 'best-effort' keeps
 * independent branches running and skips dependents of failed steps.
 */
export type FailurePolicy = 'abort' | 'best-effort';

/**
 * @property transport - Remote analysis API
 * @property cache - Shared memo cache; a private in-memory cache when omitted
 * @property bus - Telemetry sink
 * @property jobOptions - Retry, poll and timeout settings for deferred jobs
 * @property maxConcurrency - Steps in flight at once (1 = sequential)
 * @property fast - Run-level fast flag, used where a step leaves it unset
 * @property policy - Auto-insertion policy for graph builds
 * @property hasher - Fingerprint digest
 */
export interface SchedulerOptions {
    transport: RemoteTransport;
    cache?: MemoCache;
    bus?: TelemetryBus | null;
    jobOptions?: Partial<JobOptions>;
    maxConcurrency?: number;
    fast?: boolean;
    policy?: Partial<AutoInsertPolicy>;
    hasher?: FingerprintHasher;
}

export interface RunOptions {
    signal?: AbortSignal;
}

export type StepStatus = 'pending' | 'running' | 'succeeded' | 'failed' | 'skipped';

/**
 * Final state of one step in a run.
 *
 * @property cached - Whether the result came from the cache rather than a remote call
 * @property error - Failure, or the DependencyFailedError a skipped step carries
 */
export type StepOutcome =
    | { stepId: string; status: 'succeeded'; fingerprint: string; cached: boolean }
    | { stepId: string; status: 'failed'; fingerprint: string | null; error: Error }
    | { stepId: string; status: 'skipped'; error: Error };

/**
 * Best-effort run summary.
 *
 * @property results - Sealed results of the steps that succeeded
 * @property outcomes - One entry per step, in execution order
 */
export interface RunReport {
    runId: string;
    results: ResultStore;
    outcomes: StepOutcome[];
    succeeded: string[];
    failed: string[];
    skipped: string[];
}

/** A step that finished with a result. */
export interface StepSuccess {
    result: StepResult;
    fingerprint: string;
    cached: boolean;
}
