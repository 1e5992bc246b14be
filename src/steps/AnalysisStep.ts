/**
 * @file Analysis Step
 *
 * One declared unit of analysis work. A step knows its kind, its
 * normalized config and its input wiring; `run()` submits the work
 * through the transport and yields either the shaped result or a job
 * handle for the scheduler to await.
 *
 * Steps are frozen once constructed.
 *
 * @module steps/AnalysisStep
 */

import { ConfigurationError } from '../errors.js';
import { StepConfigSchema } from './schemas.js';
import { result_shape } from './results.js';
import type {
    InputSlot,
    ResolvedInputs,
    StepConfig,
    StepConfigInput,
    StepContext,
    StepInputs,
    StepKind,
    StepYield,
} from './types.js';
import type { SubmitOutcome } from '../transport/types.js';

/** Theme generation sample sizes, by fast flag. */
export const THEME_SAMPLE_FAST = 200;
export const THEME_SAMPLE_FULL = 1000;

export class AnalysisStep {
    public readonly kind: StepKind;

    constructor(
        public readonly id: string,
        public readonly config: StepConfig,
        public readonly inputs: Readonly<StepInputs>,
        public readonly autoInserted: boolean = false,
    ) {
        this.kind = config.kind;
        Object.freeze(this.inputs);
        Object.freeze(this);
    }

    /** Input slots this step reads, given its config. */
    slots_required(): InputSlot[] {
        return slots_required(this.config);
    }

    /**
     * Submit this step's work.
     *
     * @param context - Resolved inputs, effective config and transport
     * @returns The shaped result (fast path) or a job to await (deferred path)
     */
    async run(context: StepContext): Promise<StepYield> {
        const inputs: ResolvedInputs = inputs_prepare(context.config, context.inputs);
        const outcome: SubmitOutcome = await context.transport.submit(context.config, inputs);

        if (outcome.type === 'result') {
            return { type: 'result', result: result_shape(context.config, inputs, outcome.payload) };
        }
        return {
            type: 'deferred',
            job: context.job_create(outcome.jobId),
            finalize: (payload: unknown) => result_shape(context.config, inputs, payload),
        };
    }
}

// ─── Construction ───────────────────────────────────────────────

/**
 * Build a step from a raw config record, validating and normalizing it.
 *
 * @param id - Step identifier (unique within the workflow)
 * @param config - Raw config including `kind`; omitted options take defaults.
 *   Untyped records (parsed workflow files) are accepted and validated the same way.
 * @param inputs - Input wiring by slot
 * @param autoInserted - Whether the graph builder synthesized this step
 * @throws {ConfigurationError} On invalid options
 */
export function step_create(
    id: string,
    config: StepConfigInput | Readonly<Record<string, unknown>>,
    inputs: StepInputs = {},
    autoInserted: boolean = false,
): AnalysisStep {
    if (!id) {
        throw new ConfigurationError('Step id must be a non-empty string');
    }
    const result = StepConfigSchema.safeParse(config);
    if (!result.success) {
        const issues: string = result.error.issues
            .map(i => `[${i.path.join('.')}] ${i.message}`)
            .join('; ');
        throw new ConfigurationError(`Invalid config for step '${id}': ${issues}`, { stepId: id });
    }
    return new AnalysisStep(id, result.data, { ...inputs }, autoInserted);
}

/**
 * Input slots a config reads. Allocation and extraction read `themes`
 * only when no static theme list is configured.
 */
export function slots_required(config: StepConfig): InputSlot[] {
    switch (config.kind) {
        case 'theme_allocation':
        case 'theme_extraction':
            return config.themes ? ['texts'] : ['texts', 'themes'];
        case 'theme_generation':
        case 'sentiment':
        case 'cluster':
            return ['texts'];
    }
}

/**
 * Materialize the run-level fast flag into a config. The result is what
 * gets fingerprinted and submitted.
 */
export function config_effective(config: StepConfig, runFast: boolean): StepConfig {
    return { ...config, fast: config.fast ?? runFast };
}

// ─── Input Preparation ──────────────────────────────────────────

function inputs_prepare(config: StepConfig, inputs: Readonly<ResolvedInputs>): ResolvedInputs {
    if (config.kind !== 'theme_generation') {
        return { ...inputs };
    }
    const size: number = config.fast ? THEME_SAMPLE_FAST : THEME_SAMPLE_FULL;
    return { ...inputs, texts: texts_sample(inputs.texts, size) };
}

/**
 * Evenly spaced sample of at most `size` texts, keeping input order.
 * Deterministic so repeated runs submit identical requests.
 */
export function texts_sample(texts: readonly string[], size: number): string[] {
    if (texts.length <= size) return [...texts];
    const sample: string[] = [];
    for (let i = 0; i < size; i++) {
        sample.push(texts[Math.floor((i * texts.length) / size)]);
    }
    return sample;
}
