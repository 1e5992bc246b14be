/**
 * @file Remote Transport Contract
 *
 * The narrow interface the engine consumes from the remote analysis API.
 * The engine assumes nothing about the wire format beyond these three
 * operations and the job status enumeration.
 *
 * @module transport
 */

import type { StepConfig, ResolvedInputs } from '../steps/types.js';

// ─── Job Status ─────────────────────────────────────────────────

/** Status values the remote side reports for a deferred computation. */
export type RemoteJobStatus = 'queued' | 'running' | 'completed' | 'failed';

/**
 * One status query answer. Replaces the local job state wholesale.
 *
 * @property status - Remote job status
 * @property resultLocation - Where the final artifact can be fetched, once completed
 * @property errorMessage - Remote-provided failure message
 * @property payload - Inline result, for jobs that complete without a location
 */
export interface JobStatusReport {
    status: RemoteJobStatus;
    resultLocation: string | null;
    errorMessage: string | null;
    payload: unknown;
}

// ─── Submission ─────────────────────────────────────────────────

/**
 * Outcome of submitting a step: either the raw payload right away (fast
 * path) or a job identifier to poll (deferred path).
 */
export type SubmitOutcome =
    | { type: 'result'; payload: unknown }
    | { type: 'job'; jobId: string };

// ─── Transport Interface ────────────────────────────────────────

/**
 * Remote analysis API as seen by the engine.
 *
 * A submit the remote side answers with an error status raises
 * `RemoteFailureError`. Other failures surface as `TransportError`;
 * `transient: true` marks faults a status query may retry.
 */
export interface RemoteTransport {
    /** Submit the work for one step. The step kind is `config.kind`. */
    submit(config: StepConfig, inputs: ResolvedInputs): Promise<SubmitOutcome>;

    /** Query the status of a deferred job. */
    pollStatus(jobId: string): Promise<JobStatusReport>;

    /** Fetch a completed job's artifact from its result location. */
    fetchResult(resultLocation: string): Promise<unknown>;
}
