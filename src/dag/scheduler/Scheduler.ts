/**
 * @file Workflow Scheduler
 *
 * Executes an ExecutionPlan: dispatches ready steps in plan order up to
 * `maxConcurrency`, resolves each through the memo cache by fingerprint,
 * awaits deferred jobs through the job monitor and records results in a
 * run-scoped ResultStore.
 *
 * A step is dispatched only after every upstream step has a result.
 * Cancellation is checked at dispatch and at every poll, and stays with
 * the run that was cancelled: runs sharing a computation through the
 * cache are not cancelled with it.
 *
 * @module dag/scheduler
 */

import { randomUUID } from 'crypto';
import {
    DependencyFailedError,
    RunCancelledError,
    StepFailedError,
} from '../../errors.js';
import { config_effective, type AnalysisStep } from '../../steps/AnalysisStep.js';
import type { ResolvedInputs, StepConfig, StepResult } from '../../steps/types.js';
import { Job } from '../../jobs/Job.js';
import type { JobOptions } from '../../jobs/types.js';
import type { TelemetryBus, RunEvent } from '../../telemetry/TelemetryBus.js';
import type { RemoteTransport } from '../../transport/types.js';
import { cancellation_check } from '../../utils/timers.js';
import { fingerprint_compute, Sha256Hasher } from '../fingerprint/hasher.js';
import type { FingerprintHasher } from '../fingerprint/types.js';
import { plan_build } from '../graph/builder.js';
import { downstream_list, upstream_list } from '../graph/resolver.js';
import type { AutoInsertPolicy, ExecutionPlan, Workflow } from '../graph/types.js';
import { MemoCache } from '../store/MemoCache.js';
import { ResultStore } from '../store/ResultStore.js';
import type { CacheResolution } from '../store/types.js';
import { inputs_resolve } from './inputs.js';
import {
    DEFAULT_MAX_CONCURRENCY,
    type FailurePolicy,
    type RunOptions,
    type RunReport,
    type SchedulerOptions,
    type StepOutcome,
    type StepStatus,
    type StepSuccess,
} from './types.js';

type Completion =
    | { stepId: string; success: StepSuccess }
    | { stepId: string; error: unknown };

/** Per-run mutable state. */
interface RunState {
    runId: string;
    plan: ExecutionPlan;
    policy: FailurePolicy;
    results: ResultStore;
    statuses: Map<string, StepStatus>;
    fingerprints: Map<string, string>;
    outcomes: Map<string, StepOutcome>;
    signal: AbortSignal;
    firstFailure: StepFailedError | null;
}

export class Scheduler {
    private readonly transport: RemoteTransport;
    private readonly cache: MemoCache;
    private readonly bus: TelemetryBus | null;
    private readonly jobOptions: Partial<JobOptions>;
    private readonly maxConcurrency: number;
    private readonly fast: boolean;
    private readonly policy: Partial<AutoInsertPolicy>;
    private readonly hasher: FingerprintHasher;

    constructor(options: SchedulerOptions) {
        this.transport = options.transport;
        this.bus = options.bus ?? null;
        this.cache = options.cache ?? new MemoCache(null, this.bus);
        this.jobOptions = options.jobOptions ?? {};
        this.maxConcurrency = Math.max(1, Math.floor(options.maxConcurrency ?? DEFAULT_MAX_CONCURRENCY));
        this.fast = options.fast ?? false;
        this.policy = options.policy ?? {};
        this.hasher = options.hasher ?? new Sha256Hasher();
    }

    /**
     * Build, validate and order a workflow without running it.
     *
     * @throws {ConfigurationError} On unresolved references or cycles
     */
    plan_compute(workflow: Workflow): ExecutionPlan {
        return plan_build(workflow, this.policy);
    }

    /**
     * Run a workflow, stopping at the first failure.
     *
     * @returns Sealed results of every step
     * @throws {ConfigurationError} Before any remote call, on an invalid workflow
     * @throws {StepFailedError} For the first step that failed
     * @throws {RunCancelledError} If the signal aborted the run
     */
    async workflow_run(workflow: Workflow, options: RunOptions = {}): Promise<ResultStore> {
        const state: RunState = await this.run_execute(workflow, 'abort', options.signal);
        if (state.firstFailure) {
            throw state.firstFailure;
        }
        return state.results;
    }

    /**
     * Run a workflow, continuing independent branches past failures.
     *
     * @returns A report of successes, failures and skipped dependents
     * @throws {ConfigurationError} Before any remote call, on an invalid workflow
     * @throws {RunCancelledError} If the signal aborted the run
     */
    async workflow_runBestEffort(workflow: Workflow, options: RunOptions = {}): Promise<RunReport> {
        const state: RunState = await this.run_execute(workflow, 'best-effort', options.signal);
        const outcomes: StepOutcome[] = state.plan.order
            .map((id: string) => state.outcomes.get(id))
            .filter((outcome): outcome is StepOutcome => outcome !== undefined);
        const ids = (status: StepOutcome['status']): string[] =>
            outcomes.filter(outcome => outcome.status === status).map(outcome => outcome.stepId);

        return {
            runId: state.runId,
            results: state.results,
            outcomes,
            succeeded: ids('succeeded'),
            failed: ids('failed'),
            skipped: ids('skipped'),
        };
    }

    // ─── Run Loop ───────────────────────────────────────────────

    private async run_execute(workflow: Workflow, policy: FailurePolicy, external?: AbortSignal): Promise<RunState> {
        const plan: ExecutionPlan = this.plan_compute(workflow);
        cancellation_check(external);

        const controller = new AbortController();
        const onAbort = (): void => controller.abort();
        external?.addEventListener('abort', onAbort, { once: true });

        const state: RunState = {
            runId: randomUUID(),
            plan,
            policy,
            results: new ResultStore(plan.order),
            statuses: new Map(plan.order.map((id: string): [string, StepStatus] => [id, 'pending'])),
            fingerprints: new Map(),
            outcomes: new Map(),
            signal: controller.signal,
            firstFailure: null,
        };
        const position = new Map<string, number>(plan.order.map((id: string, index: number) => [id, index]));
        const steps = new Map<string, AnalysisStep>(plan.graph.steps.map(step => [step.id, step]));

        this.event_emit({ type: 'run_start', runId: state.runId, order: plan.order });

        const inFlight = new Map<string, Promise<Completion>>();
        const ready: string[] = plan.order.filter((id: string) => upstream_list(plan.graph, id).length === 0);

        const halted = (): boolean => controller.signal.aborted;

        const enqueue = (stepId: string): void => {
            ready.push(stepId);
            ready.sort((a, b) => (position.get(a) ?? 0) - (position.get(b) ?? 0));
        };

        const dispatch = (): void => {
            while (!halted() && inFlight.size < this.maxConcurrency && ready.length > 0) {
                const stepId: string | undefined = ready.shift();
                const step: AnalysisStep | undefined = stepId === undefined ? undefined : steps.get(stepId);
                if (stepId === undefined || !step) break;

                state.statuses.set(stepId, 'running');
                const completion: Promise<Completion> = this.step_execute(state, step)
                    .then((success: StepSuccess): Completion => ({ stepId, success }))
                    .catch((error: unknown): Completion => ({ stepId, error }));
                inFlight.set(stepId, completion);
            }
        };

        try {
            dispatch();
            while (inFlight.size > 0) {
                const completion: Completion = await Promise.race(inFlight.values());
                inFlight.delete(completion.stepId);

                if ('success' in completion) {
                    this.success_record(state, completion.stepId, completion.success);
                    for (const childId of downstream_list(plan.graph, completion.stepId)) {
                        if (this.dependencies_met(state, childId)) enqueue(childId);
                    }
                } else if (!halted()) {
                    this.failure_record(state, completion.stepId, completion.error);
                    if (policy === 'abort') {
                        controller.abort();
                    } else {
                        this.dependents_skip(state, completion.stepId);
                    }
                }
                dispatch();
            }
        } finally {
            if (inFlight.size > 0) {
                await Promise.allSettled(inFlight.values());
            }
            external?.removeEventListener('abort', onAbort);
            state.results.seal();
        }

        this.event_emit({
            type: 'run_complete',
            runId: state.runId,
            succeeded: state.results.size,
            failed: this.statuses_count(state, 'failed'),
            skipped: this.statuses_count(state, 'skipped'),
        });

        if (external?.aborted) {
            throw new RunCancelledError();
        }
        return state;
    }

    private dependencies_met(state: RunState, stepId: string): boolean {
        if (state.statuses.get(stepId) !== 'pending') return false;
        return upstream_list(state.plan.graph, stepId)
            .every((parentId: string): boolean => state.statuses.get(parentId) === 'succeeded');
    }

    private success_record(state: RunState, stepId: string, success: StepSuccess): void {
        state.results.result_set(stepId, success.result);
        state.statuses.set(stepId, 'succeeded');
        state.outcomes.set(stepId, {
            stepId,
            status: 'succeeded',
            fingerprint: success.fingerprint,
            cached: success.cached,
        });
    }

    private failure_record(state: RunState, stepId: string, cause: unknown): void {
        const fingerprint: string | null = state.fingerprints.get(stepId) ?? null;
        const error: StepFailedError = cause instanceof StepFailedError
            ? cause
            : new StepFailedError(stepId, fingerprint ?? undefined, cause);

        state.statuses.set(stepId, 'failed');
        state.outcomes.set(stepId, { stepId, status: 'failed', fingerprint, error });
        state.firstFailure ??= error;
        console.error(`[SCHEDULER] ${error.message}`);
        this.event_emit({ type: 'step_failed', runId: state.runId, stepId, message: error.message });
    }

    /** Mark every pending transitive dependent of a failed step as skipped. */
    private dependents_skip(state: RunState, failedId: string): void {
        const queue: string[] = downstream_list(state.plan.graph, failedId);
        while (queue.length > 0) {
            const stepId: string | undefined = queue.shift();
            if (stepId === undefined || state.statuses.get(stepId) !== 'pending') continue;

            const failedParents: string[] = upstream_list(state.plan.graph, stepId).filter((parentId: string) => {
                const status: StepStatus | undefined = state.statuses.get(parentId);
                return status === 'failed' || status === 'skipped';
            });
            const error = new DependencyFailedError(stepId, failedParents);
            state.statuses.set(stepId, 'skipped');
            state.outcomes.set(stepId, { stepId, status: 'skipped', error });
            this.event_emit({ type: 'step_skipped', runId: state.runId, stepId, reason: error.message });
            queue.push(...downstream_list(state.plan.graph, stepId));
        }
    }

    private statuses_count(state: RunState, status: StepStatus): number {
        let count = 0;
        for (const value of state.statuses.values()) {
            if (value === status) count++;
        }
        return count;
    }

    // ─── Step Execution ─────────────────────────────────────────

    /**
     * Resolve one step: fingerprint, then cache, then remote work.
     *
     * @throws {StepFailedError} Wrapping whatever made the step fail
     */
    private async step_execute(state: RunState, step: AnalysisStep): Promise<StepSuccess> {
        let fingerprint: string | undefined;
        try {
            cancellation_check(state.signal, { stepId: step.id });
            const inputs: ResolvedInputs = inputs_resolve(state.plan.graph, step, state.results);
            const config: StepConfig = config_effective(step.config, this.fast);
            const key: string = fingerprint_compute(config, inputs, this.hasher);
            fingerprint = key;
            state.fingerprints.set(step.id, key);

            this.event_emit({ type: 'step_start', runId: state.runId, stepId: step.id, fingerprint: key });
            const started: number = Date.now();

            const resolution: CacheResolution = await this.cache_resolve(
                state,
                key,
                () => this.step_compute(state, step, config, inputs),
            );
            const cached: boolean = resolution.source !== 'computed';
            if (resolution.source !== 'computed') {
                this.event_emit({
                    type: 'cache_hit',
                    runId: state.runId,
                    stepId: step.id,
                    fingerprint: key,
                    layer: resolution.source,
                });
            }
            this.event_emit({
                type: 'step_complete',
                runId: state.runId,
                stepId: step.id,
                fingerprint: key,
                cached,
                durationMs: Date.now() - started,
            });
            return { result: resolution.result, fingerprint: key, cached };
        } catch (error: unknown) {
            throw new StepFailedError(step.id, fingerprint, error);
        }
    }

    /**
     * Resolve through the shared cache. A coalesced computation belongs to
     * whichever run started it; when that run is cancelled, a caller whose
     * own run is still live starts the computation again.
     */
    private async cache_resolve(
        state: RunState,
        fingerprint: string,
        compute: () => Promise<StepResult>,
    ): Promise<CacheResolution> {
        while (true) {
            try {
                return await this.cache.memo_resolve(fingerprint, compute);
            } catch (error: unknown) {
                if (!(error instanceof RunCancelledError) || state.signal.aborted) {
                    throw error;
                }
            }
        }
    }

    private async step_compute(
        state: RunState,
        step: AnalysisStep,
        config: StepConfig,
        inputs: ResolvedInputs,
    ): Promise<StepResult> {
        const yielded = await step.run({
            inputs,
            config,
            transport: this.transport,
            job_create: (jobId: string): Job => new Job(jobId, this.transport, this.jobOptions, this.bus),
        });
        if (yielded.type === 'result') {
            return yielded.result;
        }

        this.event_emit({ type: 'job_submitted', runId: state.runId, stepId: step.id, jobId: yielded.job.id });
        const payload: unknown = await yielded.job.wait({ signal: state.signal });
        return yielded.finalize(payload);
    }

    private event_emit(event: RunEvent): void {
        this.bus?.emit(event);
    }
}
