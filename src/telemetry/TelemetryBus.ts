/**
 * @file Telemetry Bus
 *
 * Central event bus for run progress: scheduling decisions, cache hits,
 * job polling and step outcomes. Consumers (the console logger, the CLI,
 * tests) subscribe; the engine only emits.
 *
 * Typed facade over Node.js EventEmitter.
 *
 * @module telemetry/TelemetryBus
 */

import { EventEmitter } from 'events';
import type { JobStatus } from '../jobs/types.js';

export type CacheLayer = 'memory' | 'persistent' | 'inflight';

export type RunEvent =
    | { type: 'run_start'; runId: string; order: string[] }
    | { type: 'step_start'; runId: string; stepId: string; fingerprint: string }
    | { type: 'cache_hit'; runId: string; stepId: string; fingerprint: string; layer: CacheLayer }
    | { type: 'job_submitted'; runId: string; stepId: string; jobId: string }
    | { type: 'job_poll'; jobId: string; status: JobStatus }
    | { type: 'job_retry'; jobId: string; attempt: number; maxAttempts: number; message: string }
    | { type: 'step_complete'; runId: string; stepId: string; fingerprint: string; cached: boolean; durationMs: number }
    | { type: 'step_failed'; runId: string; stepId: string; message: string }
    | { type: 'step_skipped'; runId: string; stepId: string; reason: string }
    | { type: 'cache_warning'; fingerprint: string; message: string }
    | { type: 'run_complete'; runId: string; succeeded: number; failed: number; skipped: number };

export type RunEventType = RunEvent['type'];

export type RunObserver = (event: RunEvent) => void;

/** Internal event channel. Single constant avoids string literals at call sites. */
const CHANNEL = 'run' as const;

/**
 * Manages the emission and observation of run events.
 */
export class TelemetryBus {
    private readonly emitter: EventEmitter;

    constructor() {
        this.emitter = new EventEmitter();
        this.emitter.setMaxListeners(0);
    }

    /**
     * Subscribe to run events.
     *
     * @param observer - Callback function for new events.
     * @returns Unsubscribe function.
     */
    subscribe(observer: RunObserver): () => void {
        this.emitter.on(CHANNEL, observer);
        return () => this.emitter.off(CHANNEL, observer);
    }

    /**
     * Emit a run event to all subscribers.
     */
    emit(event: RunEvent): void {
        this.emitter.emit(CHANNEL, event);
    }

    /** Number of active subscribers. */
    observers_count(): number {
        return this.emitter.listenerCount(CHANNEL);
    }
}
