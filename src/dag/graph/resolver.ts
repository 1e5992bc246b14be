/**
 * @file DAG Resolver
 *
 * Resolves execution order and step readiness from an ExecutionGraph.
 * This is the contact surface between the graph layer and the
 * scheduler.
 *
 * @module dag/graph
 */

import type { ExecutionGraph, StepReadiness } from './types.js';

/**
 * Upstream step ids of a step (sources excluded), deduplicated, in
 * binding order.
 */
export function upstream_list(graph: ExecutionGraph, stepId: string): string[] {
    const parents: string[] = [];
    for (const edge of graph.edges) {
        if (edge.to !== stepId) continue;
        const node = graph.nodes.get(edge.from);
        if (node?.type === 'step' && !parents.includes(edge.from)) {
            parents.push(edge.from);
        }
    }
    return parents;
}

/**
 * Downstream step ids of a step, deduplicated.
 */
export function downstream_list(graph: ExecutionGraph, stepId: string): string[] {
    const children: string[] = [];
    for (const edge of graph.edges) {
        if (edge.from === stepId && !children.includes(edge.to)) {
            children.push(edge.to);
        }
    }
    return children;
}

/**
 * Adjacency view of the workflow: step id → the step ids it depends on.
 */
export function adjacency_compute(graph: ExecutionGraph): Record<string, string[]> {
    const adjacency: Record<string, string[]> = {};
    for (const step of graph.steps) {
        adjacency[step.id] = upstream_list(graph, step.id);
    }
    return adjacency;
}

/**
 * Resolve readiness for every step.
 *
 * @param graph - The execution graph
 * @param completedIds - Step ids whose results exist
 */
export function readiness_resolve(graph: ExecutionGraph, completedIds: ReadonlySet<string>): StepReadiness[] {
    return graph.steps.map((step): StepReadiness => {
        const complete: boolean = completedIds.has(step.id);
        const pendingParents: string[] = upstream_list(graph, step.id)
            .filter((parentId: string): boolean => !completedIds.has(parentId));
        return {
            stepId: step.id,
            ready: !complete && pendingParents.length === 0,
            complete,
            pendingParents,
        };
    });
}

/**
 * Compute topological order using Kahn's algorithm.
 *
 * Among steps that are ready at the same time, the one declared first
 * goes first, so identical declarations always produce identical order.
 * Steps caught in a cycle are omitted; validate first.
 *
 * @param graph - The execution graph
 * @returns Step ids in execution order
 */
export function order_compute(graph: ExecutionGraph): string[] {
    const position = new Map<string, number>();
    graph.steps.forEach((step, index) => position.set(step.id, index));

    const inDegree = new Map<string, number>();
    for (const step of graph.steps) {
        inDegree.set(step.id, upstream_list(graph, step.id).length);
    }

    const ready: string[] = [];
    for (const [id, deg] of inDegree) {
        if (deg === 0) ready.push(id);
    }

    const order: string[] = [];
    while (ready.length > 0) {
        ready.sort((a, b) => (position.get(a) ?? 0) - (position.get(b) ?? 0));
        const current: string | undefined = ready.shift();
        if (current === undefined) break;
        order.push(current);

        for (const childId of downstream_list(graph, current)) {
            const newDeg: number = (inDegree.get(childId) ?? 1) - 1;
            inDegree.set(childId, newDeg);
            if (newDeg === 0) {
                ready.push(childId);
            }
        }
    }

    return order;
}
