/**
 * @file Result Shaping
 *
 * Turns raw remote payloads into typed step results. Payloads are
 * validated at this boundary; a malformed payload is a remote failure.
 *
 * @module steps/results
 */

import type { z } from 'zod';
import { RemoteFailureError } from '../errors.js';
import {
    ExtractionsPayloadSchema,
    SentimentPayloadSchema,
    SimilarityPayloadSchema,
    ThemesPayloadSchema,
} from './schemas.js';
import type { ResolvedInputs, StepConfig, StepResult } from './types.js';

/**
 * Validate a payload against a schema, raising a remote failure that
 * lists the offending fields.
 */
function payload_parse<T extends z.ZodTypeAny>(schema: T, payload: unknown, kind: string): z.output<T> {
    const result = schema.safeParse(payload);
    if (!result.success) {
        const issues: string = result.error.issues
            .map(i => `[${i.path.join('.')}] ${i.message}`)
            .join('; ');
        throw new RemoteFailureError(`Malformed ${kind} payload: ${issues}`, null);
    }
    return result.data;
}

/**
 * Shape a raw payload into the result for the step's kind.
 *
 * @param config - The step's effective config
 * @param inputs - The inputs the step ran on
 * @param payload - Raw remote payload
 */
export function result_shape(config: StepConfig, inputs: ResolvedInputs, payload: unknown): StepResult {
    switch (config.kind) {
        case 'theme_generation': {
            const data = payload_parse(ThemesPayloadSchema, payload, config.kind);
            return { kind: 'theme_generation', themes: data.themes };
        }
        case 'theme_allocation': {
            const data = payload_parse(SimilarityPayloadSchema, payload, config.kind);
            const labels: string[] = themeLabels_resolve(config.themes, inputs);
            return allocation_compute(labels, data.matrix, config.singleLabel, config.threshold);
        }
        case 'theme_extraction': {
            const data = payload_parse(ExtractionsPayloadSchema, payload, config.kind);
            return {
                kind: 'theme_extraction',
                themes: themeLabels_resolve(config.themes, inputs),
                extractions: data.extractions,
            };
        }
        case 'sentiment': {
            const data = payload_parse(SentimentPayloadSchema, payload, config.kind);
            return { kind: 'sentiment', sentiments: data.results };
        }
        case 'cluster': {
            const data = payload_parse(SimilarityPayloadSchema, payload, config.kind);
            return { kind: 'cluster', matrix: data.matrix };
        }
    }
}

/** Static theme list from config wins over a wired `themes` input. */
export function themeLabels_resolve(staticThemes: string[] | null, inputs: ResolvedInputs): string[] {
    if (staticThemes) return staticThemes;
    return inputs.themes?.labels ?? [];
}

/**
 * Assign texts to themes from a texts × themes similarity matrix.
 *
 * `assignments` holds the best theme index per text regardless of the
 * threshold. `labels` holds that theme's label, or null when its score is
 * below the threshold. `multiLabels` holds every theme at or above the
 * threshold, best first; in single-label mode it holds at most the one
 * label in `labels`.
 */
export function allocation_compute(
    themes: string[],
    similarity: number[][],
    singleLabel: boolean,
    threshold: number,
): Extract<StepResult, { kind: 'theme_allocation' }> {
    const assignments: number[] = [];
    const labels: (string | null)[] = [];
    const multiLabels: string[][] = [];

    for (const row of similarity) {
        let best = 0;
        for (let i = 1; i < row.length; i++) {
            if (row[i] > row[best]) best = i;
        }
        assignments.push(best);

        const passes: boolean = row.length > 0 && row[best] >= threshold;
        labels.push(passes ? themes[best] ?? null : null);

        if (singleLabel) {
            multiLabels.push(passes && themes[best] !== undefined ? [themes[best]] : []);
        } else {
            const above: number[] = row
                .map((score, index) => ({ score, index }))
                .filter(entry => entry.score >= threshold)
                .sort((a, b) => b.score - a.score || a.index - b.index)
                .map(entry => entry.index);
            multiLabels.push(above.flatMap(index => (themes[index] !== undefined ? [themes[index]] : [])));
        }
    }

    return { kind: 'theme_allocation', themes, assignments, labels, multiLabels, similarity };
}
