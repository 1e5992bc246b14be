/**
 * @file Workflow Error Taxonomy
 *
 * Every failure the engine raises is a WorkflowError carrying a stable
 * code and enough context (step, fingerprint, job) to diagnose a run
 * without re-executing it. Wrapped failures keep the original error on
 * `cause`.
 *
 * @module errors
 */

// ─── Context ────────────────────────────────────────────────────

/**
 * Diagnostic context attached to an error.
 *
 * @property stepId - Step the failure is recorded against
 * @property fingerprint - Cache key of the step invocation
 * @property jobId - Remote job identifier, when the deferred path was taken
 */
export interface ErrorContext {
    stepId?: string;
    fingerprint?: string;
    jobId?: string;
}

export type WorkflowErrorCode =
    | 'CONFIGURATION_ERROR'
    | 'TRANSPORT_ERROR'
    | 'JOB_TRANSPORT_ERROR'
    | 'REMOTE_FAILURE'
    | 'JOB_TIMEOUT'
    | 'RUN_CANCELLED'
    | 'STEP_FAILED'
    | 'DEPENDENCY_FAILED'
    | 'RESULT_NOT_REQUESTED'
    | 'RESULT_UNAVAILABLE';

// ─── Base ───────────────────────────────────────────────────────

export class WorkflowError extends Error {
    constructor(
        message: string,
        public readonly code: WorkflowErrorCode,
        public readonly context: ErrorContext = {},
        options?: { cause?: unknown },
    ) {
        super(message, options);
        this.name = this.constructor.name;
        Error.captureStackTrace(this, this.constructor);
    }
}

// ─── Graph build ────────────────────────────────────────────────

/**
 * Cycle, unresolved dependency name or invalid option. Raised before any
 * remote call and never retried.
 */
export class ConfigurationError extends WorkflowError {
    constructor(message: string, context: ErrorContext = {}) {
        super(message, 'CONFIGURATION_ERROR', context);
    }
}

// ─── Transport ──────────────────────────────────────────────────

/**
 * A remote call failed at the transport layer or returned a non-success
 * response. `transient` marks faults worth retrying on status queries
 * (timeouts, not-found-yet, server errors).
 */
export class TransportError extends WorkflowError {
    constructor(
        message: string,
        public readonly transient: boolean,
        public readonly status: number | null = null,
        context: ErrorContext = {},
        options?: { cause?: unknown },
    ) {
        super(message, 'TRANSPORT_ERROR', context, options);
    }
}

/** A status query ran out of retry attempts. */
export class JobTransportError extends WorkflowError {
    constructor(
        jobId: string,
        public readonly attempts: number,
        cause: unknown,
    ) {
        super(
            `Status query for job ${jobId} failed after ${attempts} attempts`,
            'JOB_TRANSPORT_ERROR',
            { jobId },
            { cause },
        );
    }
}

// ─── Remote outcomes ────────────────────────────────────────────

/** The remote side reported the work as failed. Not retried. */
export class RemoteFailureError extends WorkflowError {
    constructor(
        message: string,
        public readonly remoteMessage: string | null,
        context: ErrorContext = {},
        public readonly status: number | null = null,
    ) {
        super(message, 'REMOTE_FAILURE', context);
    }
}

/** `wait()` exceeded its bound with the job still non-terminal. */
export class JobTimeoutError extends WorkflowError {
    constructor(
        jobId: string,
        public readonly timeoutMs: number,
        public readonly lastStatus: string,
    ) {
        super(
            `Job ${jobId} did not finish within ${timeoutMs} ms (last status: ${lastStatus})`,
            'JOB_TIMEOUT',
            { jobId },
        );
    }
}

/** The run was aborted; raised at a dispatch or poll boundary. */
export class RunCancelledError extends WorkflowError {
    constructor(context: ErrorContext = {}) {
        super('Run cancelled', 'RUN_CANCELLED', context);
    }
}

// ─── Run outcomes ───────────────────────────────────────────────

/** A step failed; `cause` holds the underlying error. */
export class StepFailedError extends WorkflowError {
    constructor(stepId: string, fingerprint: string | undefined, cause: unknown) {
        const detail: string = cause instanceof Error ? cause.message : String(cause);
        super(
            `Step '${stepId}' failed: ${detail}`,
            'STEP_FAILED',
            { stepId, fingerprint },
            { cause },
        );
    }
}

/** Best-effort mode: the step was not started because a dependency failed. */
export class DependencyFailedError extends WorkflowError {
    constructor(stepId: string, public readonly failedDependencies: string[]) {
        super(
            `Step '${stepId}' skipped: dependency failed (${failedDependencies.join(', ')})`,
            'DEPENDENCY_FAILED',
            { stepId },
        );
    }
}

// ─── Result access ──────────────────────────────────────────────

export class ResultNotRequestedError extends WorkflowError {
    constructor(stepId: string) {
        super(`No result for step '${stepId}': it was not requested in this workflow`, 'RESULT_NOT_REQUESTED', { stepId });
    }
}

export class ResultUnavailableError extends WorkflowError {
    constructor(stepId: string) {
        super(`No result for step '${stepId}': the step did not complete`, 'RESULT_UNAVAILABLE', { stepId });
    }
}

/**
 * Type guard for any engine error.
 */
export function workflowError_is(error: unknown): error is WorkflowError {
    return error instanceof WorkflowError;
}
