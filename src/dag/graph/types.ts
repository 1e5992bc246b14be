/**
 * @file DAG Graph Type Definitions
 *
 * Core types for the workflow graph. A workflow declares sources and
 * steps; the graph builder resolves every step input to a source or an
 * upstream step, synthesizes missing upstream steps by kind, and the
 * resolver orders the result.
 *
 * Design principle: the graph layer is pure topology. No I/O, no
 * caching, no remote calls. Every failure here is a ConfigurationError
 * raised before the run starts.
 *
 * @module dag/graph
 */

import type { AnalysisStep } from '../../steps/AnalysisStep.js';
import type { InputSlot, OptionsOf, StepKind } from '../../steps/types.js';

/** Name of the primary dataset source. */
export const PRIMARY_SOURCE = 'dataset';

// ─── Source ─────────────────────────────────────────────────────

/**
 * A named, immutable sequence of text records.
 *
 * @property name - Unique source name
 * @property records - The records (frozen)
 */
export interface SourceDeclaration {
    readonly name: string;
    readonly records: readonly string[];
}

// ─── Workflow ───────────────────────────────────────────────────

/**
 * A declared workflow: sources plus steps in declaration order.
 *
 * Declaration order is the tie-breaker for scheduling, so it is part of
 * the workflow's identity.
 *
 * @property sources - Source name → declaration
 * @property steps - Steps in declaration order
 */
export interface Workflow {
    readonly sources: ReadonlyMap<string, SourceDeclaration>;
    readonly steps: readonly AnalysisStep[];
}

// ─── Auto-Insertion Policy ──────────────────────────────────────

/** Config overrides for synthesized steps, per kind. */
export type StepDefaults = {
    [K in StepKind]?: OptionsOf<K>;
};

/**
 * How the builder treats an input that references a step kind with no
 * matching step in the workflow.
 *
 * @property mode - 'insert' synthesizes a default step upstream; 'forbid' fails the build
 * @property defaults - Config overrides for synthesized steps, per kind
 * @property reuseExisting - When true, an explicit step of the referenced
 *   kind satisfies the reference (the nearest one declared before the
 *   requiring step, else the first after). When false, a dedicated step
 *   is synthesized and coexists with explicit ones.
 */
export interface AutoInsertPolicy {
    mode: 'insert' | 'forbid';
    defaults: StepDefaults;
    reuseExisting: boolean;
}

export const DEFAULT_AUTO_INSERT_POLICY: Readonly<AutoInsertPolicy> = {
    mode: 'insert',
    defaults: {},
    reuseExisting: true,
};

// ─── Graph ──────────────────────────────────────────────────────

export type GraphNode =
    | { type: 'source'; id: string; source: SourceDeclaration }
    | { type: 'step'; id: string; step: AnalysisStep };

/**
 * An edge in the graph: `from` produces input `slot` of step `to`.
 */
export interface GraphEdge {
    from: string;
    to: string;
    slot: InputSlot;
}

/**
 * The resolved execution graph.
 *
 * @property nodes - Every source and step by id
 * @property steps - Steps (explicit and synthesized) in augmented declaration order
 * @property bindings - Step id → slot → node id the slot reads from
 * @property edges - Step-to-step and source-to-step edges
 * @property inserted - Ids of synthesized steps
 */
export interface ExecutionGraph {
    nodes: Map<string, GraphNode>;
    steps: AnalysisStep[];
    bindings: Map<string, Partial<Record<InputSlot, string>>>;
    edges: GraphEdge[];
    inserted: string[];
}

/**
 * A validated graph plus its execution order.
 *
 * @property order - Step ids in topological order, ties broken by declaration order
 */
export interface ExecutionPlan {
    graph: ExecutionGraph;
    order: string[];
}

// ─── Validation Result ──────────────────────────────────────────

/**
 * Result of graph validation.
 *
 * @property valid - Whether the graph passes all checks
 * @property errors - Validation error messages
 * @property cycle - Step ids left unordered by a cycle (empty when acyclic)
 */
export interface ValidationResult {
    valid: boolean;
    errors: string[];
    cycle: string[];
}

// ─── Readiness ──────────────────────────────────────────────────

/**
 * Readiness of a single step given the set of completed steps.
 *
 * @property stepId - Step ID
 * @property ready - Whether every upstream step has completed
 * @property complete - Whether this step has completed
 * @property pendingParents - Upstream step ids not yet complete
 */
export interface StepReadiness {
    stepId: string;
    ready: boolean;
    complete: boolean;
    pendingParents: string[];
}
