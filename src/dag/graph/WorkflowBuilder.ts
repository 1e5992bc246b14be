/**
 * @file Workflow Builder
 *
 * Fluent declaration surface for workflows:
 *
 * ```ts
 * const workflow = new WorkflowBuilder()
 *     .source('feedback', feedbackTexts)
 *     .themeGeneration({ maxThemes: 5 }, { source: 'feedback' })
 *     .themeAllocation({ threshold: 0.4 }, { inputs: 'feedback' })
 *     .sentiment()
 *     .build(datasetTexts);
 * ```
 *
 * A kind declared more than once is aliased `<kind>_2`, `<kind>_3`, ...
 * unless the step is given an explicit `name`.
 *
 * @module dag/graph
 */

import { ConfigurationError } from '../../errors.js';
import { step_create, type AnalysisStep } from '../../steps/AnalysisStep.js';
import type {
    OptionsOf,
    StepConfigInput,
    StepInputs,
    StepKind,
} from '../../steps/types.js';
import { graph_build } from './builder.js';
import { adjacency_compute } from './resolver.js';
import {
    PRIMARY_SOURCE,
    type AutoInsertPolicy,
    type SourceDeclaration,
    type Workflow,
} from './types.js';

/**
 * Input wiring for a declared step.
 *
 * @property name - Explicit step id (must not collide with a source or step)
 * @property source - Reference for the `texts` slot
 * @property inputs - Alias of `source`
 * @property themesFrom - Reference for the `themes` slot
 */
export interface StepWiring {
    name?: string;
    source?: string;
    inputs?: string;
    themesFrom?: string;
}

export class WorkflowBuilder {
    private readonly sources: Map<string, SourceDeclaration> = new Map();
    private readonly steps: AnalysisStep[] = [];
    private readonly kindCounts: Map<StepKind, number> = new Map();

    /**
     * Register a named source of text records.
     *
     * @throws {ConfigurationError} If the name is taken
     */
    source(name: string, records: readonly string[]): this {
        if (!name) {
            throw new ConfigurationError('Source name must be a non-empty string');
        }
        if (this.sources.has(name) || this.stepIds_has(name)) {
            throw new ConfigurationError(`Source '${name}' already registered`);
        }
        this.sources.set(name, { name, records: Object.freeze([...records]) });
        return this;
    }

    /** Whether a source of that name is registered. */
    source_has(name: string): boolean {
        return this.sources.has(name);
    }

    themeGeneration(options: OptionsOf<'theme_generation'> = {}, wiring: StepWiring = {}): this {
        return this.step({ ...options, kind: 'theme_generation' }, wiring);
    }

    themeAllocation(options: OptionsOf<'theme_allocation'> = {}, wiring: StepWiring = {}): this {
        return this.step({ ...options, kind: 'theme_allocation' }, wiring);
    }

    themeExtraction(options: OptionsOf<'theme_extraction'> = {}, wiring: StepWiring = {}): this {
        return this.step({ ...options, kind: 'theme_extraction' }, wiring);
    }

    sentiment(options: OptionsOf<'sentiment'> = {}, wiring: StepWiring = {}): this {
        return this.step({ ...options, kind: 'sentiment' }, wiring);
    }

    cluster(options: OptionsOf<'cluster'> = {}, wiring: StepWiring = {}): this {
        return this.step({ ...options, kind: 'cluster' }, wiring);
    }

    /**
     * Declare a step of any kind.
     *
     * @throws {ConfigurationError} On invalid config, a taken name or conflicting wiring
     */
    step(config: StepConfigInput | Readonly<Record<string, unknown>>, wiring: StepWiring = {}): this {
        const declared: AnalysisStep = step_create(wiring.name ?? String(config['kind'] ?? 'step'), config);
        const id: string = this.id_assign(declared.kind, wiring.name);
        this.steps.push(step_create(id, config, inputs_wire(id, wiring)));
        return this;
    }

    /**
     * Freeze the declaration into a Workflow.
     *
     * @param dataset - Records of the primary source, unless registered with source()
     * @throws {ConfigurationError} If the primary source is given twice
     */
    build(dataset?: readonly string[]): Workflow {
        const sources = new Map<string, SourceDeclaration>(this.sources);
        if (dataset) {
            if (sources.has(PRIMARY_SOURCE)) {
                throw new ConfigurationError(`Source '${PRIMARY_SOURCE}' already registered`);
            }
            sources.set(PRIMARY_SOURCE, { name: PRIMARY_SOURCE, records: Object.freeze([...dataset]) });
        }
        return { sources, steps: [...this.steps] };
    }

    /**
     * Adjacency view: step id → ids of the steps it depends on, including
     * steps the policy would synthesize.
     */
    graph(policy: Partial<AutoInsertPolicy> = {}): Record<string, string[]> {
        const workflow: Workflow = this.sources.has(PRIMARY_SOURCE) ? this.build() : this.build([]);
        return adjacency_compute(graph_build(workflow, policy));
    }

    // ─── Internals ──────────────────────────────────────────────

    private id_assign(kind: StepKind, name: string | undefined): string {
        const count: number = (this.kindCounts.get(kind) ?? 0) + 1;
        this.kindCounts.set(kind, count);

        if (name !== undefined) {
            if (!name || this.sources.has(name) || name === PRIMARY_SOURCE || this.stepIds_has(name)) {
                throw new ConfigurationError(`Step name '${name}' already registered`, { stepId: name });
            }
            return name;
        }

        let id: string = count > 1 ? `${kind}_${count}` : kind;
        let suffix: number = count;
        while (this.stepIds_has(id) || this.sources.has(id)) {
            suffix++;
            id = `${kind}_${suffix}`;
        }
        return id;
    }

    private stepIds_has(id: string): boolean {
        return this.steps.some((step: AnalysisStep): boolean => step.id === id);
    }
}

function inputs_wire(id: string, wiring: StepWiring): StepInputs {
    if (wiring.source !== undefined && wiring.inputs !== undefined && wiring.source !== wiring.inputs) {
        throw new ConfigurationError(
            `Step '${id}': 'source' and 'inputs' name different references ('${wiring.source}', '${wiring.inputs}')`,
            { stepId: id },
        );
    }
    const inputs: StepInputs = {};
    const texts: string | undefined = wiring.source ?? wiring.inputs;
    if (texts !== undefined) inputs.texts = texts;
    if (wiring.themesFrom !== undefined) inputs.themes = wiring.themesFrom;
    return inputs;
}
