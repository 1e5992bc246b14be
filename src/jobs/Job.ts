/**
 * @file Job Monitor
 *
 * Tracks a deferred remote computation from submission to a terminal
 * state. `refresh()` issues one status query, retrying transient faults
 * up to a fixed number of attempts. `wait()` polls until the job ends
 * or the wall-clock bound elapses.
 *
 * State machine:
 *
 *   queued ──► running ──► completed
 *      │          │
 *      └──────────┴──────► failed
 *
 *   any ──(status query fault)──► error ──(successful query)──► reported status
 *
 * Polling sleeps on timers, so one job's wait never blocks other steps
 * of the same run.
 *
 * @module jobs/Job
 */

import {
    JobTimeoutError,
    JobTransportError,
    RemoteFailureError,
    TransportError,
} from '../errors.js';
import type { RemoteTransport, JobStatusReport } from '../transport/types.js';
import type { TelemetryBus } from '../telemetry/TelemetryBus.js';
import { sleep_ms, cancellation_check } from '../utils/timers.js';
import {
    DEFAULT_JOB_OPTIONS,
    TERMINAL_STATUSES,
    type JobOptions,
    type JobSnapshot,
    type JobStatus,
    type WaitOptions,
} from './types.js';

type JobTransport = Pick<RemoteTransport, 'pollStatus' | 'fetchResult'>;

/**
 * Whether a status query failure is worth another attempt.
 */
export function transientFault_is(error: unknown): boolean {
    return error instanceof TransportError && error.transient;
}

/**
 * Handle to one remote job.
 */
export class Job {
    private readonly options: JobOptions;
    private currentStatus: JobStatus;
    private currentLocation: string | null = null;
    private currentError: string | null = null;
    private currentPayload: unknown = null;

    constructor(
        public readonly id: string,
        private readonly transport: JobTransport,
        options: Partial<JobOptions> = {},
        private readonly bus: TelemetryBus | null = null,
        initialStatus: JobStatus = 'queued',
    ) {
        this.options = { ...DEFAULT_JOB_OPTIONS, ...options };
        this.currentStatus = initialStatus;
    }

    get status(): JobStatus {
        return this.currentStatus;
    }

    get resultLocation(): string | null {
        return this.currentLocation;
    }

    get errorMessage(): string | null {
        return this.currentError;
    }

    /** Whether the job has reached `completed` or `failed`. */
    terminal_is(): boolean {
        return TERMINAL_STATUSES.has(this.currentStatus);
    }

    snapshot(): JobSnapshot {
        return {
            id: this.id,
            status: this.currentStatus,
            resultLocation: this.currentLocation,
            errorMessage: this.currentError,
        };
    }

    /**
     * Issue one status query and replace the local state with the answer.
     *
     * Transient faults are retried up to `maxAttempts` times with
     * `retryDelayMs` between attempts. Any other fault raises immediately.
     *
     * @param signal - Optional abort signal, checked between attempts
     * @returns This job, updated
     * @throws {JobTransportError} When every attempt failed transiently
     */
    async refresh(signal?: AbortSignal): Promise<Job> {
        const { maxAttempts, retryDelayMs } = this.options;
        let lastFault: unknown = null;

        for (let attempt = 1; attempt <= maxAttempts; attempt++) {
            cancellation_check(signal, { jobId: this.id });
            try {
                const report: JobStatusReport = await this.transport.pollStatus(this.id);
                this.report_apply(report);
                this.bus?.emit({ type: 'job_poll', jobId: this.id, status: this.currentStatus });
                return this;
            } catch (error: unknown) {
                if (!transientFault_is(error)) {
                    throw error;
                }
                lastFault = error;
                this.currentStatus = 'error';
                this.bus?.emit({
                    type: 'job_retry',
                    jobId: this.id,
                    attempt,
                    maxAttempts,
                    message: error instanceof Error ? error.message : String(error),
                });
                if (attempt < maxAttempts) {
                    await sleep_ms(retryDelayMs, signal, { jobId: this.id });
                }
            }
        }

        throw new JobTransportError(this.id, maxAttempts, lastFault);
    }

    /**
     * Poll until the job reaches a terminal state.
     *
     * @returns The fetched artifact when the job completed with a result
     *   location, otherwise the job's inline payload
     * @throws {RemoteFailureError} When the job failed remotely
     * @throws {JobTimeoutError} When `timeoutMs` elapsed first; the job
     *   keeps its last observed status and the remote work is not cancelled
     */
    async wait(options: WaitOptions = {}): Promise<unknown> {
        const timeoutMs: number = options.timeoutMs ?? this.options.timeoutMs;
        const deadline: number = Date.now() + timeoutMs;

        for (;;) {
            await this.refresh(options.signal);

            switch (this.currentStatus) {
                case 'completed':
                    return this.result_resolve();
                case 'failed':
                    throw new RemoteFailureError(
                        this.currentError ? `Job ${this.id} failed: ${this.currentError}` : `Job ${this.id} failed`,
                        this.currentError,
                        { jobId: this.id },
                    );
                case 'queued':
                case 'running':
                case 'error':
                    break;
            }

            const remaining: number = deadline - Date.now();
            if (remaining <= 0) {
                throw new JobTimeoutError(this.id, timeoutMs, this.currentStatus);
            }
            await sleep_ms(Math.min(this.options.pollIntervalMs, remaining), options.signal, { jobId: this.id });
        }
    }

    private async result_resolve(): Promise<unknown> {
        if (this.currentLocation) {
            return this.transport.fetchResult(this.currentLocation);
        }
        return this.currentPayload;
    }

    /** Last write wins: no field of a previous answer survives. */
    private report_apply(report: JobStatusReport): void {
        this.currentStatus = report.status;
        this.currentLocation = report.resultLocation;
        this.currentError = report.errorMessage;
        this.currentPayload = report.payload;
    }
}
