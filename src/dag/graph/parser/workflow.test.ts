/**
 * @file Workflow Parser Tests
 *
 * @module dag/graph/parser
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, rm, writeFile } from 'fs/promises';
import os from 'os';
import path from 'path';
import { ConfigurationError } from '../../../errors.js';
import { plan_build } from '../builder.js';
import { records_parse } from './common.js';
import { workflow_load, workflow_parse } from './workflow.js';

// ═══════════════════════════════════════════════════════════════════
// Test Fixtures
// ═══════════════════════════════════════════════════════════════════

const INLINE_WORKFLOW = `
sources:
  dataset: [the app is great, billing is broken]
  tags: [billing, onboarding]
pipeline:
  - theme_generation: { maxThemes: 5, name: gen }
  - theme_allocation: { threshold: 0.4, themesFrom: gen }
  - theme_extraction: { themes: [billing], version: "2" }
  - sentiment
  - cluster:
`;

// ═══════════════════════════════════════════════════════════════════
// workflow_parse
// ═══════════════════════════════════════════════════════════════════

describe('dag/graph/parser/workflow_parse', (): void => {
    it('should declare every pipeline entry with its options and wiring', (): void => {
        const { builder, policy } = workflow_parse(INLINE_WORKFLOW);
        const workflow = builder.build();

        expect(workflow.steps.map(step => step.id)).toEqual([
            'gen', 'theme_allocation', 'theme_extraction', 'sentiment', 'cluster',
        ]);
        expect(workflow.steps[0].config).toMatchObject({ kind: 'theme_generation', maxThemes: 5 });
        expect(workflow.steps[1].inputs).toEqual({ themes: 'gen' });
        expect(workflow.steps[2].config).toMatchObject({ themes: ['billing'], version: '2' });
        expect(policy).toEqual({ mode: 'insert', reuseExisting: true });
        expect(workflow.sources.get('tags')?.records).toEqual(['billing', 'onboarding']);
    });

    it('should produce a plan from a parsed document', (): void => {
        const { builder, policy } = workflow_parse(INLINE_WORKFLOW);
        const plan = plan_build(builder.build(), policy);

        expect(plan.order).toEqual(['gen', 'theme_allocation', 'theme_extraction', 'sentiment', 'cluster']);
        expect(plan.graph.inserted).toEqual([]);
    });

    it('should read the auto-insertion policy', (): void => {
        const { policy } = workflow_parse(`
autoInsert:
  mode: forbid
  reuseExisting: false
pipeline: [sentiment]
`);
        expect(policy).toEqual({ mode: 'forbid', reuseExisting: false });
    });

    it('should reject unknown step kinds', (): void => {
        expect(() => workflow_parse('pipeline: [summarize]')).toThrow(ConfigurationError);
        expect(() => workflow_parse('pipeline: [summarize]')).toThrow("unknown step kind 'summarize'");
    });

    it('should reject an empty pipeline', (): void => {
        expect(() => workflow_parse('pipeline: []')).toThrow(
            'Invalid workflow: [pipeline] pipeline must have at least one step',
        );
    });

    it('should reject unknown top-level keys', (): void => {
        expect(() => workflow_parse('pipeline: [sentiment]\nsteps: []')).toThrow('Invalid workflow');
    });

    it('should reject malformed YAML', (): void => {
        expect(() => workflow_parse('pipeline: [sentiment')).toThrow(/^Invalid YAML: /);
    });

    it('should reject non-string wiring values', (): void => {
        expect(() => workflow_parse('pipeline:\n  - sentiment: { source: 3 }')).toThrow(
            'Invalid workflow: [pipeline.0.source] expected a string',
        );
    });

    it('should reject invalid step options', (): void => {
        expect(() => workflow_parse('pipeline:\n  - theme_allocation: { threshold: 2 }')).toThrow(
            "Invalid config for step 'theme_allocation': [threshold]",
        );
    });

    it('should refuse file sources without a base directory', (): void => {
        expect(() => workflow_parse('sources: { dataset: data.txt }\npipeline: [sentiment]')).toThrow(
            "Source 'dataset' is a file path; load the workflow with workflow_load",
        );
    });
});

// ═══════════════════════════════════════════════════════════════════
// workflow_load
// ═══════════════════════════════════════════════════════════════════

describe('dag/graph/parser/workflow_load', (): void => {
    let dir: string;

    beforeEach(async (): Promise<void> => {
        dir = await mkdtemp(path.join(os.tmpdir(), 'workflow-load-'));
    });

    afterEach(async (): Promise<void> => {
        await rm(dir, { recursive: true, force: true });
    });

    it('should load path sources relative to the workflow file', async (): Promise<void> => {
        await writeFile(path.join(dir, 'feedback.txt'), 'slow checkout\n\n  great support  \n');
        await writeFile(path.join(dir, 'tags.json'), '["billing", "support"]');
        await writeFile(path.join(dir, 'workflow.yaml'), `
sources:
  feedback: feedback.txt
  tags: tags.json
pipeline:
  - sentiment: { source: feedback }
`);

        const { builder } = await workflow_load(path.join(dir, 'workflow.yaml'));
        const workflow = builder.build(['unused']);

        expect(workflow.sources.get('feedback')?.records).toEqual(['slow checkout', 'great support']);
        expect(workflow.sources.get('tags')?.records).toEqual(['billing', 'support']);
    });
});

// ═══════════════════════════════════════════════════════════════════
// records_parse
// ═══════════════════════════════════════════════════════════════════

describe('dag/graph/parser/records_parse', (): void => {
    it('should read one record per non-empty line', (): void => {
        expect(records_parse('a\r\n\nb  \n', 'data.txt')).toEqual(['a', 'b']);
    });

    it('should read a JSON array of strings', (): void => {
        expect(records_parse('["x", " y "]', 'DATA.JSON')).toEqual(['x', ' y ']);
    });

    it('should read the first column of a CSV file', (): void => {
        expect(records_parse('"great, really",5\nbroken,1\n\n  spaced  ,3\n', 'reviews.csv'))
            .toEqual(['great, really', 'broken', 'spaced']);
    });

    it('should read the first column of a TSV file', (): void => {
        expect(records_parse('first\tx\nsecond\ty\n', 'reviews.TSV')).toEqual(['first', 'second']);
    });

    it('should reject a CSV file with an unterminated quote', (): void => {
        expect(() => records_parse('"never closed\n', 'bad.csv')).toThrow("Invalid record file 'bad.csv'");
    });

    it('should reject JSON that is not an array of strings', (): void => {
        expect(() => records_parse('[1, 2]', 'data.json')).toThrow(
            "Invalid record file 'data.json': expected an array of strings",
        );
    });
});
