/**
 * @file Step Configuration and Result Schemas
 *
 * Zod runtime schemas for every step kind. Config schemas materialize
 * defaults so two declarations that differ only in omitted options
 * normalize to the same record (and therefore the same fingerprint).
 * Result schemas guard values read back from a persistent cache.
 *
 * @module steps/schemas
 */

import { z } from 'zod';

// ─── Shared ──────────────────────────────────────────────────────────────────

/** `null` defers to the run-level fast flag. */
const FastSchema = z.boolean().nullable().default(null);

const ThemeListSchema = z.array(z.string().min(1)).min(1, 'themes must be a non-empty list');

// ─── Config per kind ─────────────────────────────────────────────────────────

export const ThemeGenerationConfigSchema = z.object({
    kind:      z.literal('theme_generation'),
    minThemes: z.number().int().min(1).default(2),
    maxThemes: z.number().int().min(1).max(50).default(10),
    context:   z.string().nullable().default(null),
    fast:      FastSchema
}).strict();

export const ThemeAllocationConfigSchema = z.object({
    kind:        z.literal('theme_allocation'),
    themes:      ThemeListSchema.nullable().default(null),
    singleLabel: z.boolean().default(true),
    threshold:   z.number().min(0).max(1).default(0.5),
    fast:        FastSchema
}).strict();

export const ThemeExtractionConfigSchema = z.object({
    kind:    z.literal('theme_extraction'),
    themes:  ThemeListSchema.nullable().default(null),
    version: z.string().nullable().default(null),
    fast:    FastSchema
}).strict();

export const SentimentConfigSchema = z.object({
    kind: z.literal('sentiment'),
    fast: FastSchema
}).strict();

export const ClusterConfigSchema = z.object({
    kind: z.literal('cluster'),
    fast: FastSchema
}).strict();

export const StepConfigSchema = z
    .discriminatedUnion('kind', [
        ThemeGenerationConfigSchema,
        ThemeAllocationConfigSchema,
        ThemeExtractionConfigSchema,
        SentimentConfigSchema,
        ClusterConfigSchema
    ])
    .superRefine((config, ctx): void => {
        if (config.kind === 'theme_generation' && config.minThemes > config.maxThemes) {
            ctx.addIssue({
                code:    z.ZodIssueCode.custom,
                path:    ['minThemes'],
                message: `minThemes (${config.minThemes}) exceeds maxThemes (${config.maxThemes})`
            });
        }
    });

export type StepConfigInput = z.input<typeof StepConfigSchema>;
export type StepConfig      = z.output<typeof StepConfigSchema>;

// ─── Results ─────────────────────────────────────────────────────────────────

export const ThemeSchema = z.object({
    shortLabel:      z.string(),
    label:           z.string(),
    description:     z.string().default(''),
    representatives: z.array(z.string()).default([])
});

export const SentimentLabelSchema = z.object({
    sentiment:  z.string(),
    confidence: z.number()
});

const MatrixSchema = z.array(z.array(z.number()));

export const StepResultSchema = z.discriminatedUnion('kind', [
    z.object({
        kind:   z.literal('theme_generation'),
        themes: z.array(ThemeSchema)
    }),
    z.object({
        kind:        z.literal('theme_allocation'),
        themes:      z.array(z.string()),
        assignments: z.array(z.number().int()),
        labels:      z.array(z.string().nullable()),
        multiLabels: z.array(z.array(z.string())),
        similarity:  MatrixSchema
    }),
    z.object({
        kind:        z.literal('theme_extraction'),
        themes:      z.array(z.string()),
        extractions: z.array(z.array(z.array(z.string())))
    }),
    z.object({
        kind:       z.literal('sentiment'),
        sentiments: z.array(SentimentLabelSchema)
    }),
    z.object({
        kind:   z.literal('cluster'),
        matrix: MatrixSchema
    })
]);

// ─── Remote payloads ─────────────────────────────────────────────────────────

export const ThemesPayloadSchema = z.object({
    themes: z.array(ThemeSchema)
});

export const SimilarityPayloadSchema = z.object({
    matrix: MatrixSchema
});

export const SentimentPayloadSchema = z.object({
    results: z.array(SentimentLabelSchema)
});

export const ExtractionsPayloadSchema = z.object({
    extractions: z.array(z.array(z.array(z.string())))
});
