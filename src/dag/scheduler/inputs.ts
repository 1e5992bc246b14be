/**
 * @file Input Resolution
 *
 * Materializes a step's input slots from the sources and upstream
 * results its bindings point at.
 *
 * @module dag/scheduler
 */

import { WorkflowError } from '../../errors.js';
import type { AnalysisStep } from '../../steps/AnalysisStep.js';
import type { ResolvedInputs, StepResult, ThemeSet } from '../../steps/types.js';
import type { ResultStore } from '../store/ResultStore.js';
import type { ExecutionGraph, GraphNode } from '../graph/types.js';

/**
 * Resolve every bound slot of a step.
 *
 * @throws {ResultUnavailableError} If an upstream step has no result yet
 */
export function inputs_resolve(graph: ExecutionGraph, step: AnalysisStep, results: ResultStore): ResolvedInputs {
    const binding = graph.bindings.get(step.id) ?? {};
    const textsFrom: string | undefined = binding.texts;
    if (textsFrom === undefined) {
        throw new WorkflowError(`Step '${step.id}' has no texts binding`, 'CONFIGURATION_ERROR', { stepId: step.id });
    }

    const inputs: ResolvedInputs = { texts: texts_resolve(node_get(graph, textsFrom, step.id), results) };
    if (binding.themes !== undefined) {
        inputs.themes = themes_resolve(node_get(graph, binding.themes, step.id), results);
    }
    return inputs;
}

function node_get(graph: ExecutionGraph, id: string, stepId: string): GraphNode {
    const node: GraphNode | undefined = graph.nodes.get(id);
    if (!node) {
        throw new WorkflowError(`Step '${stepId}' reads from unknown node '${id}'`, 'CONFIGURATION_ERROR', { stepId });
    }
    return node;
}

/**
 * Texts from a source are its records. A theme generation result yields
 * its short labels; an extraction result yields every extracted span.
 */
function texts_resolve(node: GraphNode, results: ResultStore): string[] {
    if (node.type === 'source') return [...node.source.records];

    const result: StepResult = results.result_get(node.id);
    switch (result.kind) {
        case 'theme_generation':
            return result.themes.map(theme => theme.shortLabel);
        case 'theme_extraction':
            return result.extractions.flat(2);
        case 'theme_allocation':
        case 'sentiment':
        case 'cluster':
            throw new WorkflowError(
                `Step '${node.id}' produced a '${result.kind}' result, which carries no texts`,
                'CONFIGURATION_ERROR',
                { stepId: node.id },
            );
    }
}

/**
 * Themes from a theme generation result are compared by their joined
 * representatives; themes from a source are compared by the strings
 * themselves.
 */
function themes_resolve(node: GraphNode, results: ResultStore): ThemeSet {
    if (node.type === 'source') {
        return { labels: [...node.source.records], texts: [...node.source.records] };
    }
    const result = results.result_ofKind(node.id, 'theme_generation');
    return {
        labels: result.themes.map(theme => theme.shortLabel),
        texts: result.themes.map(theme => theme.representatives.join(' ')),
    };
}
