/**
 * @file Graph Ordering Property Tests
 *
 * Property-based invariant tests for `plan_build`.
 *
 * fast-check generates random acyclic workflows of text-producing steps,
 * wired to the dataset or to one another and declared in a random order.
 *
 * Invariants under test:
 *   1. The order contains every step exactly once.
 *   2. Every step comes after every step it reads from.
 *   3. Planning the same declaration twice yields the same order.
 */

import { describe, it, expect } from 'vitest';
import * as fc from 'fast-check';
import { step_create, type AnalysisStep } from '../../steps/AnalysisStep.js';
import { plan_build } from './builder.js';
import type { SourceDeclaration, Workflow } from './types.js';

// ─── Fixture Builders ────────────────────────────────────────────────────────

interface StepShape {
    extraction: boolean;
    parent: number;
}

/**
 * Step `s<i>` reads from `s<parent % (i + 1)>`, or from the dataset when
 * that lands on itself, so every edge points backwards and the workflow
 * is acyclic whatever order it is declared in.
 */
function workflow_make(shapes: StepShape[], declarationOrder: number[]): Workflow {
    const steps: AnalysisStep[] = declarationOrder.map((i: number): AnalysisStep => {
        const parent: number = shapes[i].parent % (i + 1);
        const texts: string = parent === i ? 'dataset' : `s${parent}`;
        const config = shapes[i].extraction
            ? { kind: 'theme_extraction' as const, themes: ['billing'] }
            : { kind: 'theme_generation' as const };
        return step_create(`s${i}`, config, { texts });
    });
    const dataset: SourceDeclaration = { name: 'dataset', records: ['a', 'b'] };
    return { sources: new Map([['dataset', dataset]]), steps };
}

const workflowArb = fc.integer({ min: 1, max: 10 }).chain((n: number) => fc.record({
    shapes: fc.array(
        fc.record({ extraction: fc.boolean(), parent: fc.nat({ max: 100 }) }),
        { minLength: n, maxLength: n },
    ),
    order: fc.shuffledSubarray(Array.from({ length: n }, (_: unknown, i: number) => i), { minLength: n, maxLength: n }),
}));

// ─── Properties ──────────────────────────────────────────────────────────────

describe('dag/graph/builder properties', (): void => {
    it('should order every step exactly once', (): void => {
        fc.assert(fc.property(workflowArb, ({ shapes, order }) => {
            const plan = plan_build(workflow_make(shapes, order));
            expect([...plan.order].sort()).toEqual(order.map(i => `s${i}`).sort());
        }));
    });

    it('should place every step after the steps it reads from', (): void => {
        fc.assert(fc.property(workflowArb, ({ shapes, order }) => {
            const plan = plan_build(workflow_make(shapes, order));
            const position = new Map<string, number>(plan.order.map((id, index) => [id, index]));
            for (const edge of plan.graph.edges) {
                const from: number | undefined = position.get(edge.from);
                if (from === undefined) continue;
                expect(from).toBeLessThan(position.get(edge.to) ?? -1);
            }
        }));
    });

    it('should be deterministic for a fixed declaration', (): void => {
        fc.assert(fc.property(workflowArb, ({ shapes, order }) => {
            const workflow: Workflow = workflow_make(shapes, order);
            expect(plan_build(workflow).order).toEqual(plan_build(workflow).order);
        }));
    });
});
