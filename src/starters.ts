/**
 * @file One-Call Analyses
 *
 * Single-analysis workflows for the common cases. Each helper loads its
 * texts, declares one step (plus whatever the graph builder inserts for
 * it), runs it through the given scheduler and returns that step's
 * result. Datasets of at most `FAST_DATASET_LIMIT` texts run with the
 * fast flag.
 *
 * @module starters
 */

import { readFile } from 'fs/promises';
import { records_parse } from './dag/graph/parser/common.js';
import { WorkflowBuilder } from './dag/graph/WorkflowBuilder.js';
import type { Scheduler } from './dag/scheduler/Scheduler.js';
import type { RunOptions } from './dag/scheduler/types.js';
import type { ResultStore } from './dag/store/ResultStore.js';
import { ConfigurationError } from './errors.js';
import type { StepResult } from './steps/types.js';

export const FAST_DATASET_LIMIT = 200;

/** Texts given directly, or the path of a record file. */
export type TextSource = readonly string[] | string;

export type SentimentResult = Extract<StepResult, { kind: 'sentiment' }>;
export type AllocationResult = Extract<StepResult, { kind: 'theme_allocation' }>;
export type ClusterResult = Extract<StepResult, { kind: 'cluster' }>;

/**
 * Resolve a text source. Files are decoded by `records_parse`, so `.txt`,
 * `.json`, `.csv` and `.tsv` are all accepted.
 *
 * @throws {ConfigurationError} When the file cannot be read or decoded
 */
export async function texts_load(source: TextSource): Promise<string[]> {
    if (typeof source !== 'string') {
        return [...source];
    }
    let content: string;
    try {
        content = await readFile(source, 'utf-8');
    } catch (error: unknown) {
        const reason: string = error instanceof Error ? error.message : String(error);
        throw new ConfigurationError(`Cannot read texts from '${source}': ${reason}`);
    }
    return records_parse(content, source);
}

export async function sentiment_analysis(
    scheduler: Scheduler,
    source: TextSource,
    options: RunOptions = {},
): Promise<SentimentResult> {
    const texts: string[] = await texts_load(source);
    const builder = new WorkflowBuilder().sentiment({ fast: fast_pick(texts) });
    const result: StepResult = await single_run(scheduler, builder, texts, 'sentiment', options);
    if (result.kind !== 'sentiment') throw kind_mismatch('sentiment', result);
    return result;
}

/**
 * Allocate texts to themes. Without seed themes, a theme generation step
 * is inserted ahead of the allocation.
 */
export async function theme_allocation(
    scheduler: Scheduler,
    source: TextSource,
    themes: readonly string[] | null = null,
    options: RunOptions = {},
): Promise<AllocationResult> {
    const texts: string[] = await texts_load(source);
    const builder = new WorkflowBuilder().themeAllocation(
        themes ? { themes: [...themes], fast: fast_pick(texts) } : { fast: fast_pick(texts) },
    );
    const result: StepResult = await single_run(scheduler, builder, texts, 'theme_allocation', options);
    if (result.kind !== 'theme_allocation') throw kind_mismatch('theme_allocation', result);
    return result;
}

export async function cluster_analysis(
    scheduler: Scheduler,
    source: TextSource,
    options: RunOptions = {},
): Promise<ClusterResult> {
    const texts: string[] = await texts_load(source);
    const builder = new WorkflowBuilder().cluster({ fast: fast_pick(texts) });
    const result: StepResult = await single_run(scheduler, builder, texts, 'cluster', options);
    if (result.kind !== 'cluster') throw kind_mismatch('cluster', result);
    return result;
}

// ─── Internals ──────────────────────────────────────────────────

function fast_pick(texts: readonly string[]): boolean {
    return texts.length <= FAST_DATASET_LIMIT;
}

async function single_run(
    scheduler: Scheduler,
    builder: WorkflowBuilder,
    texts: string[],
    stepId: string,
    options: RunOptions,
): Promise<StepResult> {
    const results: ResultStore = await scheduler.workflow_run(builder.build(texts), options);
    return results.result_get(stepId);
}

function kind_mismatch(expected: string, result: StepResult): ConfigurationError {
    return new ConfigurationError(`Step '${expected}' produced a ${result.kind} result`, { stepId: expected });
}
