/**
 * @file Step Type Definitions
 *
 * The closed family of analysis step kinds, their input slots, and the
 * tagged result union. Adding a kind means extending `StepKind`, the
 * config and result schemas, and every exhaustive `switch` over kinds.
 *
 * @module steps
 */

import type { z } from 'zod';
import type {
    StepConfig,
    StepConfigInput,
    StepResultSchema,
    ThemeSchema,
    SentimentLabelSchema,
} from './schemas.js';
import type { Job } from '../jobs/Job.js';
import type { RemoteTransport } from '../transport/types.js';

export type { StepConfig, StepConfigInput } from './schemas.js';

// ─── Kinds ──────────────────────────────────────────────────────

export type StepKind = StepConfig['kind'];

export const STEP_KINDS: readonly StepKind[] = [
    'theme_generation',
    'theme_allocation',
    'theme_extraction',
    'sentiment',
    'cluster',
];

export function stepKind_is(value: string): value is StepKind {
    return STEP_KINDS.some((kind: StepKind): boolean => kind === value);
}

export type ConfigOf<K extends StepKind> = Extract<StepConfig, { kind: K }>;

/** Caller-facing options of a kind: its raw config without the tag. */
export type OptionsOf<K extends StepKind> = Omit<Extract<StepConfigInput, { kind: K }>, 'kind'>;

// ─── Input Slots ────────────────────────────────────────────────

/**
 * Named inputs a step reads.
 *
 * `texts` is the record sequence the step analyzes. `themes` supplies
 * theme labels to allocation and extraction when their config carries
 * no static theme list.
 */
export type InputSlot = 'texts' | 'themes';

export const INPUT_SLOTS: readonly InputSlot[] = ['texts', 'themes'];

/**
 * Declared wiring: slot → reference. A reference names a source, another
 * step's id, or a bare step kind that the graph builder resolves by
 * auto-insertion.
 */
export type StepInputs = Partial<Record<InputSlot, string>>;

/**
 * Themes as consumed by allocation/extraction: display labels plus the
 * text each theme is compared against.
 */
export interface ThemeSet {
    labels: string[];
    texts: string[];
}

/** Input values after dependency resolution. */
export interface ResolvedInputs {
    texts: string[];
    themes?: ThemeSet;
}

// ─── Results ────────────────────────────────────────────────────

export type Theme = z.output<typeof ThemeSchema>;
export type SentimentLabel = z.output<typeof SentimentLabelSchema>;
export type StepResult = z.output<typeof StepResultSchema>;
export type ResultOf<K extends StepKind> = Extract<StepResult, { kind: K }>;

// ─── Run Contract ───────────────────────────────────────────────

/**
 * Read-only view handed to a step when it runs.
 *
 * @property inputs - Resolved input values by slot
 * @property config - Config with the run-level fast flag materialized
 * @property transport - Remote analysis API
 * @property job_create - Wraps a submitted job id in a monitored Job
 */
export interface StepContext {
    readonly inputs: Readonly<ResolvedInputs>;
    readonly config: StepConfig;
    readonly transport: RemoteTransport;
    readonly job_create: (jobId: string) => Job;
}

/**
 * What a step invocation yields: a finished result (fast path) or a
 * job handle plus the function that shapes the job's final payload.
 */
export type StepYield =
    | { type: 'result'; result: StepResult }
    | { type: 'deferred'; job: Job; finalize: (payload: unknown) => StepResult };
