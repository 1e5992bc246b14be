/**
 * @file One-Call Analysis Tests
 *
 * @module starters
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { mkdtemp, rm, writeFile } from 'fs/promises';
import os from 'os';
import path from 'path';
import { ConfigurationError } from './errors.js';
import { Scheduler } from './dag/scheduler/Scheduler.js';
import { MockTransport } from './transport/MockTransport.js';
import {
    FAST_DATASET_LIMIT,
    cluster_analysis,
    sentiment_analysis,
    texts_load,
    theme_allocation,
} from './starters.js';

// ═══════════════════════════════════════════════════════════════════
// Test Fixtures
// ═══════════════════════════════════════════════════════════════════

const DATASET: string[] = ['the app is great', 'billing is broken', 'I love the new layout'];

let tempDir: string;

beforeEach(async (): Promise<void> => {
    tempDir = await mkdtemp(path.join(os.tmpdir(), 'starters-test-'));
});

afterEach(async (): Promise<void> => {
    await rm(tempDir, { recursive: true, force: true });
});

function scheduler_create(transport: MockTransport): Scheduler {
    return new Scheduler({ transport, jobOptions: { pollIntervalMs: 1, retryDelayMs: 1 } });
}

// ═══════════════════════════════════════════════════════════════════
// texts_load
// ═══════════════════════════════════════════════════════════════════

describe('starters/texts_load', (): void => {
    it('should copy a list of texts', async (): Promise<void> => {
        const source: string[] = ['a', 'b'];
        const texts: string[] = await texts_load(source);

        expect(texts).toEqual(['a', 'b']);
        expect(texts).not.toBe(source);
    });

    it('should read texts from a CSV file', async (): Promise<void> => {
        const file: string = path.join(tempDir, 'reviews.csv');
        await writeFile(file, '"great, really",5\nbroken,1\n');

        expect(await texts_load(file)).toEqual(['great, really', 'broken']);
    });

    it('should report an unreadable file as a configuration error', async (): Promise<void> => {
        const file: string = path.join(tempDir, 'missing.txt');

        const error: unknown = await texts_load(file).catch((caught: unknown) => caught);

        expect(error).toBeInstanceOf(ConfigurationError);
        if (!(error instanceof ConfigurationError)) return;
        expect(error.message.startsWith(`Cannot read texts from '${file}': `)).toBe(true);
    });
});

// ═══════════════════════════════════════════════════════════════════
// One-Call Analyses
// ═══════════════════════════════════════════════════════════════════

describe('starters/analyses', (): void => {
    it('should run sentiment analysis in fast mode for a small dataset', async (): Promise<void> => {
        const transport = new MockTransport();
        const submit = vi.spyOn(transport, 'submit');

        const result = await sentiment_analysis(scheduler_create(transport), DATASET);

        expect(result.sentiments.map(s => s.sentiment)).toEqual(['positive', 'negative', 'positive']);
        expect(submit.mock.calls[0][0].fast).toBe(true);
    });

    it('should leave fast mode off above the dataset limit', async (): Promise<void> => {
        const transport = new MockTransport();
        const submit = vi.spyOn(transport, 'submit');
        const texts: string[] = Array.from({ length: FAST_DATASET_LIMIT + 1 }, (_, i) => `text ${i}`);

        const result = await sentiment_analysis(scheduler_create(transport), texts);

        expect(result.sentiments.length).toBe(FAST_DATASET_LIMIT + 1);
        expect(submit.mock.calls[0][0].fast).toBe(false);
    });

    it('should allocate texts to seed themes', async (): Promise<void> => {
        const transport = new MockTransport();

        const result = await theme_allocation(scheduler_create(transport), DATASET, ['billing', 'layout']);

        expect(result.themes).toEqual(['billing', 'layout']);
        expect(result.assignments).toEqual([0, 0, 1]);
        expect(result.labels).toEqual([null, 'billing', 'layout']);
        expect(transport.submits.get('theme_generation')).toBeUndefined();
    });

    it('should generate themes first when none are given', async (): Promise<void> => {
        const transport = new MockTransport();

        const result = await theme_allocation(scheduler_create(transport), DATASET);

        expect(result.themes).toEqual(['Theme 1', 'Theme 2']);
        expect(transport.submits.get('theme_generation')).toBe(1);
        expect(transport.submits.get('theme_allocation')).toBe(1);
    });

    it('should cluster texts read from a file', async (): Promise<void> => {
        const file: string = path.join(tempDir, 'reviews.txt');
        await writeFile(file, 'great app\n\nbroken billing\n');

        const result = await cluster_analysis(scheduler_create(new MockTransport()), file);

        expect(result.matrix).toEqual([[1, 0], [0, 1]]);
    });
});
