/**
 * @file Workflow File Schemas
 *
 * Zod runtime schemas for workflow documents (YAML or JSON):
 *
 * ```yaml
 * sources:
 *   feedback: feedback.txt        # path, relative to the workflow file
 *   tags: [billing, onboarding]   # or inline records
 * autoInsert:
 *   mode: insert
 *   reuseExisting: true
 * pipeline:
 *   - theme_generation: { maxThemes: 5, source: feedback }
 *   - theme_allocation: { threshold: 0.4, inputs: feedback }
 *   - sentiment
 * ```
 *
 * Step configs stay untyped here; `step_create` validates them per kind.
 *
 * @module dag/graph/parser/schemas
 */

import { z } from 'zod';
import { STEP_KINDS } from '../../../steps/types.js';

// ─── Sources ──────────────────────────────────────────────────────────────────

export const SourceSchema = z.union([
    z.string().min(1, 'source path must be non-empty'),
    z.array(z.string())
]);

// ─── Pipeline Entry ───────────────────────────────────────────────────────────

const KindSchema = z.string().refine(
    (kind: string): boolean => STEP_KINDS.some((known: string): boolean => known === kind),
    (kind: string) => ({ message: `unknown step kind '${kind}' (expected one of: ${STEP_KINDS.join(', ')})` })
);

/**
 * A pipeline entry is a bare kind (`- sentiment`) or a single-key
 * mapping of kind to options (`- sentiment: { fast: true }`).
 */
export const PipelineEntrySchema = z.union([
    KindSchema,
    z.record(z.string(), z.record(z.string(), z.unknown()).nullable())
        .refine(
            (entry): boolean => Object.keys(entry).length === 1,
            'pipeline entry must be a single-key mapping of kind to options'
        )
        .superRefine((entry, ctx): void => {
            for (const kind of Object.keys(entry)) {
                const check = KindSchema.safeParse(kind);
                if (!check.success) {
                    for (const issue of check.error.issues) {
                        ctx.addIssue({ code: z.ZodIssueCode.custom, message: issue.message });
                    }
                }
            }
        })
]);

// ─── Document ─────────────────────────────────────────────────────────────────

export const AutoInsertSchema = z.object({
    mode:          z.enum(['insert', 'forbid']).default('insert'),
    reuseExisting: z.boolean().default(true)
}).strict();

export const WorkflowDocumentSchema = z.object({
    sources:    z.record(z.string().min(1), SourceSchema).default({}),
    autoInsert: AutoInsertSchema.default({}),
    pipeline:   z.array(PipelineEntrySchema).min(1, 'pipeline must have at least one step')
}).strict();

export type RawWorkflowDocument = z.infer<typeof WorkflowDocumentSchema>;
export type RawPipelineEntry    = z.infer<typeof PipelineEntrySchema>;
