/**
 * @file Scheduler Tests
 *
 * End-to-end runs against MockTransport: ordering, memoization,
 * single-flight coalescing, concurrency bounds, deferred jobs, failure
 * policies and cancellation.
 *
 * @module dag/scheduler
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import {
    ConfigurationError,
    DependencyFailedError,
    RemoteFailureError,
    RunCancelledError,
    StepFailedError,
} from '../../errors.js';
import { TelemetryBus, type RunEvent } from '../../telemetry/TelemetryBus.js';
import { MockTransport, type MockTransportOptions } from '../../transport/MockTransport.js';
import { WorkflowBuilder } from '../graph/WorkflowBuilder.js';
import type { Workflow } from '../graph/types.js';
import { MemoCache } from '../store/MemoCache.js';
import type { ResultStore } from '../store/ResultStore.js';
import { Scheduler } from './Scheduler.js';
import type { RunReport, SchedulerOptions } from './types.js';

// ═══════════════════════════════════════════════════════════════════
// Test Fixtures
// ═══════════════════════════════════════════════════════════════════

const DATASET: string[] = ['the app is great', 'billing is broken', 'I love the new layout'];

interface Harness {
    scheduler: Scheduler;
    transport: MockTransport;
    events: RunEvent[];
}

function harness_create(mock: MockTransportOptions = {}, options: Partial<SchedulerOptions> = {}): Harness {
    const transport = new MockTransport(mock);
    const bus = new TelemetryBus();
    const events: RunEvent[] = [];
    bus.subscribe((event: RunEvent): void => { events.push(event); });
    const scheduler = new Scheduler({
        transport,
        bus,
        jobOptions: { pollIntervalMs: 1, retryDelayMs: 1 },
        ...options,
    });
    return { scheduler, transport, events };
}

function eventIndex_find(events: RunEvent[], type: RunEvent['type'], stepId: string): number {
    return events.findIndex(event => event.type === type && 'stepId' in event && event.stepId === stepId);
}

// ═══════════════════════════════════════════════════════════════════
// Successful Runs
// ═══════════════════════════════════════════════════════════════════

describe('dag/scheduler/Scheduler', (): void => {
    beforeEach((): void => {
        vi.spyOn(console, 'error').mockImplementation((): void => undefined);
    });

    afterEach((): void => {
        vi.restoreAllMocks();
    });

    it('should run a workflow with an auto-inserted dependency', async (): Promise<void> => {
        const { scheduler, events } = harness_create();
        const workflow: Workflow = new WorkflowBuilder().themeAllocation().build(DATASET);

        const results: ResultStore = await scheduler.workflow_run(workflow);

        expect(results.ids()).toEqual(['theme_generation', 'theme_allocation']);
        expect(results.sealed_is()).toBe(true);
        expect(results.result_ofKind('theme_generation', 'theme_generation').themes.map(t => t.shortLabel))
            .toEqual(['Theme 1', 'Theme 2']);
        expect(results.result_ofKind('theme_allocation', 'theme_allocation')).toEqual({
            kind: 'theme_allocation',
            themes: ['Theme 1', 'Theme 2'],
            assignments: [0, 1, 0],
            labels: ['Theme 1', 'Theme 2', null],
            multiLabels: [['Theme 1'], ['Theme 2'], []],
            similarity: [[1, 0], [0, 1], [0, 0]],
        });
        expect(eventIndex_find(events, 'step_start', 'theme_allocation'))
            .toBeGreaterThan(eventIndex_find(events, 'step_complete', 'theme_generation'));
    });

    it('should feed extracted spans to a downstream step', async (): Promise<void> => {
        const { scheduler } = harness_create();
        const workflow: Workflow = new WorkflowBuilder()
            .themeExtraction({ themes: ['great'] }, { name: 'spans' })
            .sentiment({}, { source: 'spans' })
            .build(DATASET);

        const results: ResultStore = await scheduler.workflow_run(workflow);

        expect(results.result_ofKind('sentiment', 'sentiment').sentiments).toEqual([
            { sentiment: 'positive', confidence: 0.9 },
        ]);
    });

    it('should read named sources', async (): Promise<void> => {
        const { scheduler } = harness_create();
        const workflow: Workflow = new WorkflowBuilder()
            .source('feedback', ['this is bad'])
            .sentiment({}, { source: 'feedback' })
            .build(DATASET);

        const results: ResultStore = await scheduler.workflow_run(workflow);

        expect(results.result_ofKind('sentiment', 'sentiment').sentiments).toEqual([
            { sentiment: 'negative', confidence: 0.9 },
        ]);
    });

    it('should await deferred jobs', async (): Promise<void> => {
        const { scheduler, transport, events } = harness_create({ deferred: ['sentiment'], pollsUntilComplete: 2 });

        const results: ResultStore = await scheduler.workflow_run(new WorkflowBuilder().sentiment().build(DATASET));

        expect(results.result_ofKind('sentiment', 'sentiment').sentiments.map(s => s.sentiment))
            .toEqual(['positive', 'negative', 'positive']);
        expect(transport.polls).toBe(2);
        expect(events.some(event => event.type === 'job_submitted' && event.jobId === 'job-1')).toBe(true);
    });

    it('should refuse an invalid workflow before any remote call', async (): Promise<void> => {
        const { scheduler, transport } = harness_create();
        const workflow: Workflow = new WorkflowBuilder()
            .themeExtraction({ themes: ['x'] }, { name: 'a', source: 'b' })
            .themeGeneration({}, { name: 'b', source: 'a' })
            .build(DATASET);

        await expect(scheduler.workflow_run(workflow)).rejects.toBeInstanceOf(ConfigurationError);
        expect(transport.submits_total()).toBe(0);
    });

    // ═══════════════════════════════════════════════════════════════
    // Memoization
    // ═══════════════════════════════════════════════════════════════

    it('should serve a repeated run entirely from the cache', async (): Promise<void> => {
        const { scheduler, transport, events } = harness_create();
        const workflow: Workflow = new WorkflowBuilder().themeAllocation().sentiment().build(DATASET);

        await scheduler.workflow_run(workflow);
        const submitsAfterFirst: number = transport.submits_total();
        events.length = 0;
        const report: RunReport = await scheduler.workflow_runBestEffort(workflow);

        expect(submitsAfterFirst).toBe(3);
        expect(transport.submits_total()).toBe(3);
        expect(report.outcomes.every(outcome => outcome.status === 'succeeded' && outcome.cached)).toBe(true);
        expect(events.filter(event => event.type === 'cache_hit').map(event => 'layer' in event && event.layer))
            .toEqual(['memory', 'memory', 'memory']);
    });

    it('should hand out results that cannot alter the cached entry', async (): Promise<void> => {
        const { scheduler, transport } = harness_create();
        const workflow: Workflow = new WorkflowBuilder().sentiment().build(DATASET);

        const first: ResultStore = await scheduler.workflow_run(workflow);
        const sentiments = first.result_ofKind('sentiment', 'sentiment').sentiments;
        expect(() => sentiments.push({ sentiment: 'neutral', confidence: 0 })).toThrow(TypeError);
        expect(() => { sentiments[0].confidence = 0; }).toThrow(TypeError);

        const second: ResultStore = await scheduler.workflow_run(workflow);

        expect(transport.submits_total()).toBe(1);
        expect(second.result_ofKind('sentiment', 'sentiment').sentiments).toEqual([
            { sentiment: 'positive', confidence: 0.9 },
            { sentiment: 'negative', confidence: 0.9 },
            { sentiment: 'positive', confidence: 0.9 },
        ]);
    });

    it('should share a cache across schedulers', async (): Promise<void> => {
        const cache = new MemoCache();
        const first = harness_create({}, { cache });
        const second = harness_create({}, { cache });
        const workflow: Workflow = new WorkflowBuilder().cluster().build(DATASET);

        await first.scheduler.workflow_run(workflow);
        await second.scheduler.workflow_run(workflow);

        expect(first.transport.submits_total()).toBe(1);
        expect(second.transport.submits_total()).toBe(0);
    });

    it('should compute identical steps of one run once', async (): Promise<void> => {
        const { scheduler, transport } = harness_create({ submitDelayMs: 10 });
        const workflow: Workflow = new WorkflowBuilder().sentiment().sentiment().build(DATASET);

        const report: RunReport = await scheduler.workflow_runBestEffort(workflow);

        expect(transport.submits.get('sentiment')).toBe(1);
        expect(report.succeeded).toEqual(['sentiment', 'sentiment_2']);
        expect(report.results.result_get('sentiment_2')).toEqual(report.results.result_get('sentiment'));
        expect(report.outcomes.map(outcome => outcome.status === 'succeeded' && outcome.cached)).toEqual([false, true]);
    });

    it('should coalesce concurrent runs of the same workflow', async (): Promise<void> => {
        const { scheduler, transport } = harness_create({ submitDelayMs: 20 });
        const workflow: Workflow = new WorkflowBuilder().sentiment().cluster().build(DATASET);

        const [a, b] = await Promise.all([scheduler.workflow_run(workflow), scheduler.workflow_run(workflow)]);

        expect(transport.submits.get('sentiment')).toBe(1);
        expect(transport.submits.get('cluster')).toBe(1);
        expect(b.result_get('cluster')).toEqual(a.result_get('cluster'));
    });

    it('should treat a changed fast flag as a different invocation', async (): Promise<void> => {
        const cache = new MemoCache();
        const slow = harness_create({}, { cache, fast: false });
        const fast = harness_create({}, { cache, fast: true });
        const submit = vi.spyOn(fast.transport, 'submit');
        const workflow: Workflow = new WorkflowBuilder().sentiment().build(DATASET);

        await slow.scheduler.workflow_run(workflow);
        await fast.scheduler.workflow_run(workflow);

        expect(fast.transport.submits_total()).toBe(1);
        expect(submit.mock.calls[0][0].fast).toBe(true);
    });

    // ═══════════════════════════════════════════════════════════════
    // Concurrency
    // ═══════════════════════════════════════════════════════════════

    it('should run independent steps concurrently', async (): Promise<void> => {
        const { scheduler, transport } = harness_create({ submitDelayMs: 20 });
        await scheduler.workflow_run(new WorkflowBuilder().sentiment().cluster().themeGeneration().build(DATASET));
        expect(transport.peakSubmits).toBe(3);
    });

    it('should respect the concurrency bound', async (): Promise<void> => {
        const { scheduler, transport } = harness_create({ submitDelayMs: 5 }, { maxConcurrency: 1 });
        const results: ResultStore = await scheduler.workflow_run(
            new WorkflowBuilder().sentiment().cluster().themeGeneration().build(DATASET),
        );

        expect(transport.peakSubmits).toBe(1);
        expect(results.ids()).toEqual(['sentiment', 'cluster', 'theme_generation']);
    });

    // ═══════════════════════════════════════════════════════════════
    // Failure Policies
    // ═══════════════════════════════════════════════════════════════

    it('should stop at the first failure by default', async (): Promise<void> => {
        const { scheduler, transport } = harness_create({ failing: ['sentiment'] }, { maxConcurrency: 1 });
        const workflow: Workflow = new WorkflowBuilder().sentiment().cluster().build(DATASET);

        const error: unknown = await scheduler.workflow_run(workflow).catch((caught: unknown) => caught);

        expect(error).toBeInstanceOf(StepFailedError);
        if (!(error instanceof StepFailedError)) return;
        expect(error.message).toBe("Step 'sentiment' failed: Mock sentiment request rejected");
        expect(error.context.stepId).toBe('sentiment');
        expect(error.context.fingerprint).toMatch(/^[0-9a-f]{64}$/);
        expect(error.cause).toBeInstanceOf(RemoteFailureError);
        expect(transport.submits.get('cluster')).toBeUndefined();
    });

    it('should fail a step whose deferred job fails remotely', async (): Promise<void> => {
        const { scheduler } = harness_create({ deferred: ['cluster'], failing: ['cluster'] });

        await expect(scheduler.workflow_run(new WorkflowBuilder().cluster().build(DATASET)))
            .rejects.toThrow("Step 'cluster' failed: Job job-1 failed: mock cluster failure");
    });

    it('should skip dependents and keep independent branches in best-effort mode', async (): Promise<void> => {
        const { scheduler, events } = harness_create({ failing: ['theme_generation'] });
        const workflow: Workflow = new WorkflowBuilder().themeAllocation().sentiment().build(DATASET);

        const report: RunReport = await scheduler.workflow_runBestEffort(workflow);

        expect(report.failed).toEqual(['theme_generation']);
        expect(report.skipped).toEqual(['theme_allocation']);
        expect(report.succeeded).toEqual(['sentiment']);
        expect(report.results.result_lookup('theme_allocation')).toEqual({ status: 'missing' });

        const skipped = report.outcomes.find(outcome => outcome.stepId === 'theme_allocation');
        expect(skipped?.status).toBe('skipped');
        expect(skipped && 'error' in skipped ? skipped.error : null).toBeInstanceOf(DependencyFailedError);
        expect(events.at(-1)).toMatchObject({ type: 'run_complete', succeeded: 1, failed: 1, skipped: 1 });
    });

    it('should not cache failures', async (): Promise<void> => {
        const failing = harness_create({ failing: ['sentiment'] });
        const workflow: Workflow = new WorkflowBuilder().sentiment().build(DATASET);

        await failing.scheduler.workflow_runBestEffort(workflow);
        await failing.scheduler.workflow_runBestEffort(workflow);

        expect(failing.transport.submits.get('sentiment')).toBe(2);
    });

    // ═══════════════════════════════════════════════════════════════
    // Cancellation
    // ═══════════════════════════════════════════════════════════════

    it('should not cancel a run waiting on a computation another run abandoned', async (): Promise<void> => {
        const cache = new MemoCache();
        const aborting = harness_create(
            { deferred: ['sentiment'], pollsUntilComplete: 1_000_000, failing: ['cluster'] },
            { cache },
        );
        const waiting = harness_create({}, { cache });

        const abortingRun: Promise<ResultStore> = aborting.scheduler.workflow_run(
            new WorkflowBuilder().sentiment().cluster().build(DATASET),
        );
        const waitingRun: Promise<ResultStore> = waiting.scheduler.workflow_run(
            new WorkflowBuilder().sentiment().build(DATASET),
        );

        await expect(abortingRun).rejects.toThrow("Step 'cluster' failed: Mock cluster request rejected");
        const results: ResultStore = await waitingRun;

        expect(results.result_ofKind('sentiment', 'sentiment').sentiments.map(s => s.sentiment))
            .toEqual(['positive', 'negative', 'positive']);
        expect(waiting.transport.submits.get('sentiment')).toBe(1);
        expect(aborting.transport.submits.get('sentiment')).toBe(1);
    });

    it('should not start a run whose signal is already aborted', async (): Promise<void> => {
        const { scheduler, transport } = harness_create();
        const controller = new AbortController();
        controller.abort();

        await expect(scheduler.workflow_run(new WorkflowBuilder().sentiment().build(DATASET), { signal: controller.signal }))
            .rejects.toBeInstanceOf(RunCancelledError);
        expect(transport.submits_total()).toBe(0);
    });

    it('should stop polling and dispatching when cancelled mid-run', async (): Promise<void> => {
        const { scheduler, transport } = harness_create(
            { deferred: ['theme_generation'], pollsUntilComplete: 1_000_000 },
            { jobOptions: { pollIntervalMs: 5, retryDelayMs: 1 } },
        );
        const controller = new AbortController();
        const workflow: Workflow = new WorkflowBuilder().themeAllocation().build(DATASET);

        const running: Promise<RunReport> = scheduler.workflow_runBestEffort(workflow, { signal: controller.signal });
        setTimeout((): void => controller.abort(), 30);

        await expect(running).rejects.toBeInstanceOf(RunCancelledError);
        expect(transport.submits.get('theme_allocation')).toBeUndefined();
    });
});
