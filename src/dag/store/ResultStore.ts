/**
 * @file Result Store
 *
 * Run-scoped mapping from step identifier to completed result. Results
 * are appended while the run executes and the store is sealed before it
 * is handed to the caller. Lookups distinguish a step that was never
 * requested from one that was requested but produced nothing.
 *
 * @module dag/store
 */

import {
    ResultNotRequestedError,
    ResultUnavailableError,
    WorkflowError,
} from '../../errors.js';
import type { ResultOf, StepKind, StepResult } from '../../steps/types.js';
import { value_freeze } from '../../utils/freeze.js';
import type { ResultLookup } from './types.js';

export class ResultStore {
    private readonly results: Map<string, StepResult> = new Map();
    private readonly requested: string[];
    private readonly requestedSet: Set<string>;
    private sealed: boolean = false;

    /**
     * @param requested - Step ids that are part of the workflow, in execution order
     */
    constructor(requested: Iterable<string>) {
        this.requested = Array.from(requested);
        this.requestedSet = new Set(this.requested);
    }

    // ─── Writing (run-internal) ─────────────────────────────────

    /**
     * Record a step's result. Each step is written at most once.
     *
     * @throws If the store is sealed, the step is unknown, or already has a result
     */
    result_set(stepId: string, result: StepResult): void {
        if (this.sealed) {
            throw new Error(`Result store is sealed; cannot record '${stepId}'`);
        }
        if (!this.requestedSet.has(stepId)) {
            throw new ResultNotRequestedError(stepId);
        }
        if (this.results.has(stepId)) {
            throw new Error(`Result for step '${stepId}' already recorded`);
        }
        this.results.set(stepId, value_freeze(result));
    }

    /** Stop accepting results. */
    seal(): void {
        this.sealed = true;
    }

    sealed_is(): boolean {
        return this.sealed;
    }

    // ─── Reading ────────────────────────────────────────────────

    result_lookup(stepId: string): ResultLookup {
        if (!this.requestedSet.has(stepId)) return { status: 'not-requested' };
        const result: StepResult | undefined = this.results.get(stepId);
        return result ? { status: 'present', result } : { status: 'missing' };
    }

    /**
     * Get a step's result.
     *
     * @throws {ResultNotRequestedError} If the step was never part of the workflow
     * @throws {ResultUnavailableError} If the step was requested but did not complete
     */
    result_get(stepId: string): StepResult {
        const lookup: ResultLookup = this.result_lookup(stepId);
        switch (lookup.status) {
            case 'present':
                return lookup.result;
            case 'missing':
                throw new ResultUnavailableError(stepId);
            case 'not-requested':
                throw new ResultNotRequestedError(stepId);
        }
    }

    /**
     * Get a step's result narrowed to the expected kind.
     *
     * @throws If the step produced a result of another kind
     */
    result_ofKind<K extends StepKind>(stepId: string, kind: K): ResultOf<K> {
        const result: StepResult = this.result_get(stepId);
        if (!resultKind_is(result, kind)) {
            throw new WorkflowError(
                `Step '${stepId}' produced a '${result.kind}' result, not '${kind}'`,
                'RESULT_UNAVAILABLE',
                { stepId },
            );
        }
        return result;
    }

    has(stepId: string): boolean {
        return this.results.has(stepId);
    }

    /** Step ids that have results, in execution order. */
    ids(): string[] {
        return this.requested.filter((id: string): boolean => this.results.has(id));
    }

    /** Every step id that was part of the workflow, in execution order. */
    requested_list(): string[] {
        return [...this.requested];
    }

    entries(): Array<[string, StepResult]> {
        return this.ids().map((id: string): [string, StepResult] => [id, this.result_get(id)]);
    }

    get size(): number {
        return this.results.size;
    }

    toJSON(): Record<string, StepResult> {
        return Object.fromEntries(this.entries());
    }
}

function resultKind_is<K extends StepKind>(result: StepResult, kind: K): result is ResultOf<K> {
    return result.kind === kind;
}
