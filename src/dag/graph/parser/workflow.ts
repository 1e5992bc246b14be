/**
 * @file Workflow Parser
 *
 * Parses workflow documents (YAML or JSON) into a populated
 * WorkflowBuilder plus the auto-insertion policy the document asks for.
 * The document is validated against `WorkflowDocumentSchema` (Zod) at
 * the boundary; step options are validated per kind by `step_create`.
 *
 * @module dag/graph/parser
 */

import { readFile } from 'fs/promises';
import path from 'path';
import { ConfigurationError } from '../../../errors.js';
import { WorkflowBuilder, type StepWiring } from '../WorkflowBuilder.js';
import type { AutoInsertPolicy } from '../types.js';
import { yaml_parse, issues_format, records_parse } from './common.js';
import {
    WorkflowDocumentSchema,
    type RawPipelineEntry,
    type RawWorkflowDocument,
} from './schemas.js';

/** Option keys that wire inputs rather than configure the step. */
const WIRING_KEYS = ['name', 'source', 'inputs', 'themesFrom'] as const;

export interface ParsedWorkflow {
    builder: WorkflowBuilder;
    policy: Partial<AutoInsertPolicy>;
}

/**
 * Validate a workflow document.
 *
 * @throws {ConfigurationError} On malformed YAML or schema violations
 */
export function document_parse(yamlStr: string): RawWorkflowDocument {
    const raw: unknown = yaml_parse(yamlStr);
    const result = WorkflowDocumentSchema.safeParse(raw);
    if (!result.success) {
        throw new ConfigurationError(`Invalid workflow: ${issues_format(result.error)}`);
    }
    return result.data;
}

/**
 * Parse a workflow whose sources are all inline record lists.
 *
 * @throws {ConfigurationError} On invalid documents or a source given as a path
 */
export function workflow_parse(yamlStr: string): ParsedWorkflow {
    const doc: RawWorkflowDocument = document_parse(yamlStr);
    const records = new Map<string, string[]>();
    for (const [name, source] of Object.entries(doc.sources)) {
        if (typeof source === 'string') {
            throw new ConfigurationError(`Source '${name}' is a file path; load the workflow with workflow_load`);
        }
        records.set(name, source);
    }
    return workflow_declare(doc, records);
}

/**
 * Read and parse a workflow file. Source paths resolve relative to the
 * workflow file.
 */
export async function workflow_load(filePath: string): Promise<ParsedWorkflow> {
    const doc: RawWorkflowDocument = document_parse(await readFile(filePath, 'utf-8'));
    const baseDir: string = path.dirname(filePath);
    const records = new Map<string, string[]>();
    for (const [name, source] of Object.entries(doc.sources)) {
        if (typeof source === 'string') {
            const sourcePath: string = path.resolve(baseDir, source);
            records.set(name, records_parse(await readFile(sourcePath, 'utf-8'), sourcePath));
        } else {
            records.set(name, source);
        }
    }
    return workflow_declare(doc, records);
}

/**
 * Populate a builder from a validated document and its loaded sources.
 */
export function workflow_declare(doc: RawWorkflowDocument, records: ReadonlyMap<string, string[]>): ParsedWorkflow {
    const builder = new WorkflowBuilder();
    for (const [name, sourceRecords] of records) {
        builder.source(name, sourceRecords);
    }
    doc.pipeline.forEach((entry: RawPipelineEntry, index: number) => {
        const { kind, options } = entry_split(entry);
        const { wiring, config } = wiring_extract(options, index);
        builder.step({ ...config, kind }, wiring);
    });
    return {
        builder,
        policy: { mode: doc.autoInsert.mode, reuseExisting: doc.autoInsert.reuseExisting },
    };
}

// ─── Internals ──────────────────────────────────────────────────

function entry_split(entry: RawPipelineEntry): { kind: string; options: Record<string, unknown> } {
    if (typeof entry === 'string') {
        return { kind: entry, options: {} };
    }
    const [kind, options] = Object.entries(entry)[0];
    return { kind, options: options ?? {} };
}

function wiring_extract(
    options: Record<string, unknown>,
    index: number,
): { wiring: StepWiring; config: Record<string, unknown> } {
    const config: Record<string, unknown> = { ...options };
    const wiring: StepWiring = {};
    for (const key of WIRING_KEYS) {
        const value: unknown = config[key];
        if (value === undefined) continue;
        if (typeof value !== 'string') {
            throw new ConfigurationError(`Invalid workflow: [pipeline.${index}.${key}] expected a string`);
        }
        wiring[key] = value;
        delete config[key];
    }
    return { wiring, config };
}
