/**
 * @file Job Monitor Type Definitions
 *
 * @module jobs
 */

import type { RemoteJobStatus } from '../transport/types.js';

/**
 * Local job status. `error` never comes from the remote side: it marks a
 * job whose last status query failed and is being retried.
 */
export type JobStatus = RemoteJobStatus | 'error';

export const TERMINAL_STATUSES: ReadonlySet<JobStatus> = new Set<JobStatus>(['completed', 'failed']);

/**
 * Polling and retry bounds.
 *
 * @property maxAttempts - Status query attempts per refresh before giving up
 * @property retryDelayMs - Delay between failed status query attempts
 * @property pollIntervalMs - Delay between refreshes inside wait()
 * @property timeoutMs - Default wall-clock bound for wait()
 */
export interface JobOptions {
    maxAttempts: number;
    retryDelayMs: number;
    pollIntervalMs: number;
    timeoutMs: number;
}

export const DEFAULT_JOB_OPTIONS: Readonly<JobOptions> = {
    maxAttempts: 10,
    retryDelayMs: 2000,
    pollIntervalMs: 2000,
    timeoutMs: 180_000,
};

export interface WaitOptions {
    timeoutMs?: number;
    signal?: AbortSignal;
}

/** Snapshot of the local job state. */
export interface JobSnapshot {
    id: string;
    status: JobStatus;
    resultLocation: string | null;
    errorMessage: string | null;
}
