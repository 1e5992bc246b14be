/**
 * @file DAG Validator
 *
 * Validates an ExecutionGraph for structural correctness: no dangling
 * edges, no duplicate step ids, no cycles.
 *
 * Uses Kahn's algorithm for cycle detection via topological sort.
 *
 * @module dag/graph
 */

import type { ExecutionGraph, ValidationResult } from './types.js';

/**
 * Validate an ExecutionGraph for structural correctness.
 *
 * @param graph - The graph to validate
 * @returns ValidationResult with valid flag, error messages and cycle members
 */
export function dag_validate(graph: ExecutionGraph): ValidationResult {
    const errors: string[] = [];

    // Duplicate step ids
    const seen = new Set<string>();
    for (const step of graph.steps) {
        if (seen.has(step.id)) {
            errors.push(`Duplicate step id '${step.id}'`);
        }
        seen.add(step.id);
    }

    // Every edge endpoint must exist
    for (const edge of graph.edges) {
        if (!graph.nodes.has(edge.from)) {
            errors.push(`Step '${edge.to}': input '${edge.slot}' references nonexistent node '${edge.from}'`);
        }
        if (!graph.nodes.has(edge.to)) {
            errors.push(`Edge targets nonexistent step '${edge.to}'`);
        }
    }

    const cycle: string[] = cycles_detect(graph);
    if (cycle.length > 0) {
        errors.push(`Cycle detected among steps: ${cycle.join(', ')}`);
    }

    return {
        valid: errors.length === 0,
        errors,
        cycle,
    };
}

/**
 * Detect cycles using Kahn's algorithm.
 *
 * @returns Step ids that could not be ordered (members of, or downstream
 *   of, a cycle), in declaration order. Empty when acyclic.
 */
function cycles_detect(graph: ExecutionGraph): string[] {
    const inDegree = new Map<string, number>();
    for (const step of graph.steps) {
        inDegree.set(step.id, 0);
    }
    for (const edge of graph.edges) {
        // Only step-to-step edges constrain ordering
        if (inDegree.has(edge.to) && inDegree.has(edge.from)) {
            inDegree.set(edge.to, (inDegree.get(edge.to) ?? 0) + 1);
        }
    }

    const queue: string[] = [];
    for (const [id, deg] of inDegree) {
        if (deg === 0) queue.push(id);
    }

    const visited = new Set<string>();
    while (queue.length > 0) {
        const current: string | undefined = queue.shift();
        if (current === undefined) break;
        visited.add(current);

        for (const edge of graph.edges) {
            if (edge.from === current && inDegree.has(edge.to)) {
                const newDeg: number = (inDegree.get(edge.to) ?? 1) - 1;
                inDegree.set(edge.to, newDeg);
                if (newDeg === 0) {
                    queue.push(edge.to);
                }
            }
        }
    }

    return graph.steps
        .map(step => step.id)
        .filter(id => !visited.has(id));
}
