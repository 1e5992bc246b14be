/**
 * @file DAG Graph Builder
 *
 * Resolves a declared Workflow into an ExecutionGraph and a validated
 * ExecutionPlan. Each required input of each step resolves, in order of
 * precedence, to:
 *
 *   1. a step with that id
 *   2. a source with that name
 *   3. a step kind, satisfied by an existing step of that kind or by a
 *      default step synthesized upstream (per AutoInsertPolicy)
 *
 * An unwired `texts` input reads the primary dataset; an unwired
 * `themes` input references the `theme_generation` kind.
 *
 * @module dag/graph
 */

import { ConfigurationError } from '../../errors.js';
import { step_create, type AnalysisStep } from '../../steps/AnalysisStep.js';
import {
    INPUT_SLOTS,
    stepKind_is,
    type InputSlot,
    type StepKind,
} from '../../steps/types.js';
import {
    DEFAULT_AUTO_INSERT_POLICY,
    PRIMARY_SOURCE,
    type AutoInsertPolicy,
    type ExecutionGraph,
    type ExecutionPlan,
    type GraphEdge,
    type GraphNode,
    type Workflow,
} from './types.js';
import { dag_validate } from './validator.js';
import { order_compute } from './resolver.js';

/** Step kinds whose results can feed a `texts` input. */
const TEXT_PRODUCERS: ReadonlySet<StepKind> = new Set<StepKind>(['theme_generation', 'theme_extraction']);

/** Step kinds whose results can feed a `themes` input. */
const THEME_PRODUCERS: ReadonlySet<StepKind> = new Set<StepKind>(['theme_generation']);

/** Kind referenced by an unwired `themes` input. */
const DEFAULT_THEMES_KIND: StepKind = 'theme_generation';

/**
 * Build, validate and order a workflow.
 *
 * @param workflow - The declared workflow
 * @param policy - Auto-insertion policy overrides
 * @returns The execution plan
 * @throws {ConfigurationError} On unresolved references, invalid wiring or cycles
 */
export function plan_build(workflow: Workflow, policy: Partial<AutoInsertPolicy> = {}): ExecutionPlan {
    const graph: ExecutionGraph = graph_build(workflow, policy);
    const validation = dag_validate(graph);
    if (!validation.valid) {
        throw new ConfigurationError(`Invalid workflow: ${validation.errors.join('; ')}`, {
            stepId: validation.cycle[0],
        });
    }
    return { graph, order: order_compute(graph) };
}

/**
 * Resolve every step input and synthesize missing upstream steps.
 *
 * Cycles are not checked here; see dag_validate.
 */
export function graph_build(workflow: Workflow, policy: Partial<AutoInsertPolicy> = {}): ExecutionGraph {
    const effectivePolicy: AutoInsertPolicy = { ...DEFAULT_AUTO_INSERT_POLICY, ...policy };
    const nodes = new Map<string, GraphNode>();

    for (const source of workflow.sources.values()) {
        nodes.set(source.name, { type: 'source', id: source.name, source });
    }
    for (const step of workflow.steps) {
        if (workflow.sources.has(step.id)) {
            throw new ConfigurationError(`Step id '${step.id}' collides with a source name`, { stepId: step.id });
        }
        if (nodes.has(step.id)) {
            throw new ConfigurationError(`Duplicate step id '${step.id}'`, { stepId: step.id });
        }
        nodes.set(step.id, { type: 'step', id: step.id, step });
    }

    const state: BuildState = {
        nodes,
        steps: [...workflow.steps],
        bindings: new Map(),
        edges: [],
        inserted: [],
        insertedByKey: new Map(),
        policy: effectivePolicy,
    };

    // Synthesized steps are spliced in before the step that needs them
    // and resolved on the next iteration.
    let index = 0;
    while (index < state.steps.length) {
        const step: AnalysisStep = state.steps[index];
        const inserted: AnalysisStep | null = step_resolve(state, step, index);
        if (inserted) {
            state.steps.splice(index, 0, inserted);
            continue;
        }
        index++;
    }

    return {
        nodes: state.nodes,
        steps: state.steps,
        bindings: state.bindings,
        edges: state.edges,
        inserted: state.inserted,
    };
}

// ─── Internals ──────────────────────────────────────────────────

interface BuildState {
    nodes: Map<string, GraphNode>;
    steps: AnalysisStep[];
    bindings: Map<string, Partial<Record<InputSlot, string>>>;
    edges: GraphEdge[];
    inserted: string[];
    /** `<kind>\0<texts reference>` → synthesized step id, so each is inserted once. */
    insertedByKey: Map<string, string>;
    policy: AutoInsertPolicy;
}

/**
 * Bind every required slot of a step. Returns a synthesized step when a
 * kind reference needs one; the caller inserts it and retries.
 */
function step_resolve(state: BuildState, step: AnalysisStep, index: number): AnalysisStep | null {
    if (state.bindings.has(step.id)) return null;

    const required: InputSlot[] = step.slots_required();
    for (const slot of INPUT_SLOTS) {
        if (step.inputs[slot] !== undefined && !required.includes(slot)) {
            throw new ConfigurationError(
                `Step '${step.id}': input '${slot}' is not read by a ${step.kind} step with this config`,
                { stepId: step.id },
            );
        }
    }

    const binding: Partial<Record<InputSlot, string>> = {};
    for (const slot of required) {
        const reference: string = step.inputs[slot] ?? slotDefault_resolve(slot);
        const target = reference_resolve(state, step, index, slot, reference);
        if (target.type === 'insert') {
            return target.step;
        }
        binding[slot] = target.id;
    }

    for (const slot of required) {
        const from: string | undefined = binding[slot];
        if (from === undefined) continue;
        producer_check(state, step, slot, from);
        state.edges.push({ from, to: step.id, slot });
    }
    state.bindings.set(step.id, binding);
    return null;
}

function slotDefault_resolve(slot: InputSlot): string {
    return slot === 'texts' ? PRIMARY_SOURCE : DEFAULT_THEMES_KIND;
}

type ReferenceTarget =
    | { type: 'node'; id: string }
    | { type: 'insert'; step: AnalysisStep };

function reference_resolve(
    state: BuildState,
    step: AnalysisStep,
    index: number,
    slot: InputSlot,
    reference: string,
): ReferenceTarget {
    if (reference === step.id) {
        throw new ConfigurationError(`Step '${step.id}': input '${slot}' references the step itself`, { stepId: step.id });
    }
    // A synthesized step's id doubles as its kind name; a bare kind
    // still resolves by kind so each texts reference gets its own step.
    const node: GraphNode | undefined = state.nodes.get(reference);
    if (node && !(node.type === 'step' && node.step.autoInserted && stepKind_is(reference))) {
        return { type: 'node', id: reference };
    }
    if (!stepKind_is(reference)) {
        throw new ConfigurationError(
            `Step '${step.id}': input '${slot}' references unknown source or step '${reference}'`,
            { stepId: step.id },
        );
    }

    const textsReference: string = step.inputs.texts ?? PRIMARY_SOURCE;
    const key: string = `${reference}\0${textsReference}`;
    const alreadyInserted: string | undefined = state.insertedByKey.get(key);
    if (alreadyInserted) {
        return { type: 'node', id: alreadyInserted };
    }

    if (state.policy.reuseExisting) {
        const existing: string | null = kindMatch_find(state, reference, index, step.id);
        if (existing) return { type: 'node', id: existing };
    }

    if (state.policy.mode === 'forbid') {
        throw new ConfigurationError(
            `Step '${step.id}': input '${slot}' requires a '${reference}' step, and auto-insertion is disabled`,
            { stepId: step.id },
        );
    }

    const inserted: AnalysisStep = defaultStep_create(state, reference, textsReference);
    state.insertedByKey.set(key, inserted.id);
    state.inserted.push(inserted.id);
    state.nodes.set(inserted.id, { type: 'step', id: inserted.id, step: inserted });
    return { type: 'insert', step: inserted };
}

/**
 * Nearest step of a kind declared before `index`, else the first one
 * after it. Synthesized steps are only matched through insertedByKey.
 */
function kindMatch_find(state: BuildState, kind: StepKind, index: number, requesterId: string): string | null {
    for (let i = index - 1; i >= 0; i--) {
        const candidate: AnalysisStep = state.steps[i];
        if (candidate.kind === kind && !candidate.autoInserted) return candidate.id;
    }
    for (let i = index + 1; i < state.steps.length; i++) {
        const candidate: AnalysisStep = state.steps[i];
        if (candidate.kind === kind && !candidate.autoInserted && candidate.id !== requesterId) return candidate.id;
    }
    return null;
}

function defaultStep_create(state: BuildState, kind: StepKind, textsReference: string): AnalysisStep {
    let id: string = kind;
    if (state.nodes.has(id)) {
        id = `${kind}_auto`;
        let counter = 2;
        while (state.nodes.has(id)) {
            id = `${kind}_auto_${counter++}`;
        }
    }
    const config: Record<string, unknown> = { ...state.policy.defaults[kind], kind };
    const inputs = textsReference === PRIMARY_SOURCE ? {} : { texts: textsReference };
    return step_create(id, config, inputs, true);
}

/** A step feeding a slot must produce the kind of value the slot reads. */
function producer_check(state: BuildState, step: AnalysisStep, slot: InputSlot, from: string): void {
    const node: GraphNode | undefined = state.nodes.get(from);
    if (!node || node.type === 'source') return;

    const allowed: ReadonlySet<StepKind> = slot === 'texts' ? TEXT_PRODUCERS : THEME_PRODUCERS;
    if (!allowed.has(node.step.kind)) {
        throw new ConfigurationError(
            `Step '${step.id}': input '${slot}' cannot read from '${from}' (a ${node.step.kind} step)`,
            { stepId: step.id },
        );
    }
}
