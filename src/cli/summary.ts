/**
 * @file Result Summaries
 *
 * One-line human summaries of step results for the CLI.
 *
 * @module cli/summary
 */

import type { StepResult } from '../steps/types.js';

export function result_summarize(result: StepResult): string {
    switch (result.kind) {
        case 'theme_generation':
            return `${result.themes.length} theme(s): ${result.themes.map(theme => theme.shortLabel).join(', ')}`;
        case 'theme_allocation': {
            const labelled: number = result.labels.filter(label => label !== null).length;
            return `${result.assignments.length} text(s) over ${result.themes.length} theme(s), ${labelled} above threshold`;
        }
        case 'theme_extraction': {
            const spans: number = result.extractions.flat(2).length;
            return `${spans} span(s) from ${result.extractions.length} text(s) over ${result.themes.length} theme(s)`;
        }
        case 'sentiment': {
            const counts = new Map<string, number>();
            for (const label of result.sentiments) {
                counts.set(label.sentiment, (counts.get(label.sentiment) ?? 0) + 1);
            }
            const parts: string[] = [...counts.entries()]
                .sort(([a], [b]) => a.localeCompare(b))
                .map(([sentiment, count]) => `${sentiment} ${count}`);
            return `${result.sentiments.length} label(s)${parts.length > 0 ? ` (${parts.join(', ')})` : ''}`;
        }
        case 'cluster':
            return `${result.matrix.length}x${result.matrix[0]?.length ?? 0} similarity matrix`;
    }
}
