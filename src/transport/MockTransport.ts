/**
 * @file Mock Transport
 *
 * In-process RemoteTransport that answers every step kind with a
 * deterministic payload computed from its inputs. Used for offline runs
 * (`analysis-flow run --mock`) and tests. Kinds can be set to answer
 * through deferred jobs, to fail, or to take time, and every call is
 * counted.
 *
 * @module transport/MockTransport
 */

import { RemoteFailureError, TransportError } from '../errors.js';
import type { ResolvedInputs, StepConfig, StepKind } from '../steps/types.js';
import { sleep_ms } from '../utils/timers.js';
import type { JobStatusReport, RemoteTransport, SubmitOutcome } from './types.js';

export type MockHandler = (config: StepConfig, inputs: ResolvedInputs) => unknown;

/**
 * @property handlers - Payload producers replacing the built-in ones, per kind
 * @property deferred - Kinds that answer 'job' instead of 'result'
 * @property pollsUntilComplete - Status queries a job stays 'running' for before completing
 * @property withLocation - Completed jobs report a result location instead of an inline payload
 * @property failing - Kinds whose jobs end 'failed' (deferred) or whose submit is rejected (fast path)
 * @property submitDelayMs - Latency of every submit call
 */
export interface MockTransportOptions {
    handlers?: Partial<Record<StepKind, MockHandler>>;
    deferred?: readonly StepKind[];
    pollsUntilComplete?: number;
    withLocation?: boolean;
    failing?: readonly StepKind[];
    submitDelayMs?: number;
}

interface MockJob {
    kind: StepKind;
    payload: unknown;
    polls: number;
}

export class MockTransport implements RemoteTransport {
    public readonly submits: Map<StepKind, number> = new Map();
    public polls: number = 0;
    public fetches: number = 0;
    public activeSubmits: number = 0;
    public peakSubmits: number = 0;

    private readonly jobs: Map<string, MockJob> = new Map();
    private jobCounter: number = 0;

    constructor(private readonly options: MockTransportOptions = {}) {}

    /** Total submit calls across kinds. */
    submits_total(): number {
        let total = 0;
        for (const count of this.submits.values()) total += count;
        return total;
    }

    async submit(config: StepConfig, inputs: ResolvedInputs): Promise<SubmitOutcome> {
        this.submits.set(config.kind, (this.submits.get(config.kind) ?? 0) + 1);
        this.activeSubmits++;
        this.peakSubmits = Math.max(this.peakSubmits, this.activeSubmits);
        try {
            if (this.options.submitDelayMs) {
                await sleep_ms(this.options.submitDelayMs);
            }
            const failing: boolean = this.options.failing?.includes(config.kind) ?? false;
            const deferred: boolean = this.options.deferred?.includes(config.kind) ?? false;
            if (failing && !deferred) {
                throw new RemoteFailureError(`Mock ${config.kind} request rejected`, 'request rejected', {}, 400);
            }

            const handler: MockHandler = this.options.handlers?.[config.kind] ?? payload_default;
            const payload: unknown = handler(config, inputs);
            if (!deferred) {
                return { type: 'result', payload };
            }

            const jobId = `job-${++this.jobCounter}`;
            this.jobs.set(jobId, { kind: config.kind, payload, polls: 0 });
            return { type: 'job', jobId };
        } finally {
            this.activeSubmits--;
        }
    }

    async pollStatus(jobId: string): Promise<JobStatusReport> {
        this.polls++;
        const job: MockJob | undefined = this.jobs.get(jobId);
        if (!job) {
            throw new TransportError(`Unknown job ${jobId}`, true, 404, { jobId });
        }
        job.polls++;
        if (job.polls < (this.options.pollsUntilComplete ?? 1)) {
            return { status: 'running', resultLocation: null, errorMessage: null, payload: null };
        }
        if (this.options.failing?.includes(job.kind)) {
            return { status: 'failed', resultLocation: null, errorMessage: `mock ${job.kind} failure`, payload: null };
        }
        if (this.options.withLocation) {
            return { status: 'completed', resultLocation: `results/${jobId}`, errorMessage: null, payload: null };
        }
        return { status: 'completed', resultLocation: null, errorMessage: null, payload: job.payload };
    }

    async fetchResult(resultLocation: string): Promise<unknown> {
        this.fetches++;
        const jobId: string = resultLocation.replace(/^results\//, '');
        const job: MockJob | undefined = this.jobs.get(jobId);
        if (!job) {
            throw new TransportError(`Nothing stored at ${resultLocation}`, false, 404);
        }
        return job.payload;
    }
}

// ─── Default Payloads ───────────────────────────────────────────

/**
 * Built-in payload for a kind. Similarity is 1 for equal strings, 0.5
 * when one contains the other, else 0.
 */
export function payload_default(config: StepConfig, inputs: ResolvedInputs): unknown {
    switch (config.kind) {
        case 'theme_generation': {
            const count: number = Math.min(config.minThemes, inputs.texts.length);
            return {
                themes: inputs.texts.slice(0, count).map((text: string, i: number) => ({
                    shortLabel: `Theme ${i + 1}`,
                    label: `Theme ${i + 1}`,
                    description: '',
                    representatives: [text],
                })),
            };
        }
        case 'theme_allocation': {
            const themeTexts: string[] = config.themes ?? inputs.themes?.texts ?? [];
            return { matrix: inputs.texts.map(text => themeTexts.map(theme => similarity_score(text, theme))) };
        }
        case 'theme_extraction': {
            const labels: string[] = config.themes ?? inputs.themes?.labels ?? [];
            return {
                extractions: inputs.texts.map(text =>
                    labels.map(label => (text.toLowerCase().includes(label.toLowerCase()) ? [text] : []))),
            };
        }
        case 'sentiment':
            return { results: inputs.texts.map(text => sentiment_guess(text)) };
        case 'cluster':
            return { matrix: inputs.texts.map(a => inputs.texts.map(b => similarity_score(a, b))) };
    }
}

function similarity_score(a: string, b: string): number {
    if (a === b) return 1;
    const left: string = a.toLowerCase();
    const right: string = b.toLowerCase();
    return left.includes(right) || right.includes(left) ? 0.5 : 0;
}

function sentiment_guess(text: string): { sentiment: string; confidence: number } {
    const lower: string = text.toLowerCase();
    if (/\b(great|good|love)\b/.test(lower)) return { sentiment: 'positive', confidence: 0.9 };
    if (/\b(bad|broken|hate)\b/.test(lower)) return { sentiment: 'negative', confidence: 0.9 };
    return { sentiment: 'neutral', confidence: 0.6 };
}
