/**
 * @file CLI Tests
 *
 * Argument parsing, settings overrides and whole commands against the
 * in-process mock transport.
 *
 * @module cli
 */

import { mkdtemp, rm, writeFile } from 'fs/promises';
import os from 'os';
import path from 'path';
import chalk from 'chalk';
import { afterEach, beforeAll, beforeEach, describe, expect, it, vi } from 'vitest';
import { ConfigurationError } from '../errors.js';
import { args_parse, USAGE } from './args.js';
import { cli_run, settings_resolve, type CliIO } from './commands.js';

// ═══════════════════════════════════════════════════════════════════
// Test Fixtures
// ═══════════════════════════════════════════════════════════════════

const WORKFLOW_YAML = `
pipeline:
  - theme_allocation
  - sentiment
`;

const DATASET_TXT = 'the app is great\n\nbilling is broken\nI love the new layout\n';

interface CapturedIO extends CliIO {
    stdout: string[];
    stderr: string[];
}

function io_capture(env: Record<string, string | undefined> = {}): CapturedIO {
    const stdout: string[] = [];
    const stderr: string[] = [];
    return {
        stdout,
        stderr,
        out: (line: string): void => { stdout.push(line); },
        err: (line: string): void => { stderr.push(line); },
        env,
    };
}

beforeAll((): void => {
    chalk.level = 0;
});

// ═══════════════════════════════════════════════════════════════════
// Argument Parsing
// ═══════════════════════════════════════════════════════════════════

describe('cli/args', (): void => {
    it('should default to help', (): void => {
        expect(args_parse([]).command).toBe('help');
        expect(args_parse(['--help']).command).toBe('help');
    });

    it('should read flags, valued options and positionals', (): void => {
        const args = args_parse(['run', 'wf.yaml', '--fast', '--cache-dir', '.cache', 'data.txt', '-q', '--concurrency', '2']);

        expect(args).toEqual({
            command: 'run',
            positionals: ['wf.yaml', 'data.txt'],
            bestEffort: false,
            fast: true,
            mock: false,
            json: false,
            verbose: false,
            quiet: true,
            cacheDir: '.cache',
            concurrency: '2',
        });
    });

    it('should reject unknown commands and options', (): void => {
        expect(() => args_parse(['deploy'])).toThrow("Unknown command 'deploy'");
        expect(() => args_parse(['run', '--turbo'])).toThrow(ConfigurationError);
    });

    it('should require a value for valued options', (): void => {
        expect(() => args_parse(['run', '--cache-dir'])).toThrow('Option --cache-dir requires a value');
        expect(() => args_parse(['run', '--concurrency', '--fast'])).toThrow('Option --concurrency requires a value');
    });

    it('should apply options over the environment', (): void => {
        const settings = settings_resolve(
            args_parse(['run', '--concurrency', '3', '--fast']),
            { env: { ANALYSIS_MAX_CONCURRENCY: '9', ANALYSIS_CACHE_DIR: '/tmp/env-cache' } },
        );

        expect(settings.maxConcurrency).toBe(3);
        expect(settings.fast).toBe(true);
        expect(settings.cacheDir).toBe('/tmp/env-cache');
    });
});

// ═══════════════════════════════════════════════════════════════════
// Commands
// ═══════════════════════════════════════════════════════════════════

describe('cli/commands', (): void => {
    let dir: string;
    let workflowPath: string;
    let datasetPath: string;

    beforeEach(async (): Promise<void> => {
        dir = await mkdtemp(path.join(os.tmpdir(), 'analysis-cli-'));
        workflowPath = path.join(dir, 'workflow.yaml');
        datasetPath = path.join(dir, 'dataset.txt');
        await writeFile(workflowPath, WORKFLOW_YAML);
        await writeFile(datasetPath, DATASET_TXT);
        vi.spyOn(console, 'log').mockImplementation((): void => undefined);
        vi.spyOn(console, 'warn').mockImplementation((): void => undefined);
        vi.spyOn(console, 'error').mockImplementation((): void => undefined);
    });

    afterEach(async (): Promise<void> => {
        vi.restoreAllMocks();
        await rm(dir, { recursive: true, force: true });
    });

    it('should print usage for help', async (): Promise<void> => {
        const io = io_capture();
        expect(await cli_run(['help'], io)).toBe(0);
        expect(io.stdout).toEqual([USAGE]);
    });

    it('should print the execution plan with auto-inserted steps', async (): Promise<void> => {
        const io = io_capture();

        expect(await cli_run(['plan', workflowPath], io)).toBe(0);
        expect(io.stdout).toEqual([
            ' 1. theme_generation (auto-inserted)  texts ← dataset',
            ' 2. theme_allocation  texts ← dataset, themes ← theme_generation',
            ' 3. sentiment  texts ← dataset',
        ]);
    });

    it('should run a workflow against the mock transport', async (): Promise<void> => {
        const io = io_capture();

        expect(await cli_run(['run', workflowPath, datasetPath, '--mock', '--json'], io)).toBe(0);

        const printed: Record<string, { kind: string }> = JSON.parse(io.stdout.join('\n'));
        expect(Object.keys(printed)).toEqual(['theme_generation', 'theme_allocation', 'sentiment']);
        expect(printed['sentiment']).toEqual({
            kind: 'sentiment',
            sentiments: [
                { sentiment: 'positive', confidence: 0.9 },
                { sentiment: 'negative', confidence: 0.9 },
                { sentiment: 'positive', confidence: 0.9 },
            ],
        });
    });

    it('should summarize results one line per step', async (): Promise<void> => {
        const io = io_capture();

        expect(await cli_run(['run', workflowPath, datasetPath, '--mock'], io)).toBe(0);
        expect(io.stdout).toEqual([
            `✔ ${'theme_generation'.padEnd(24)} 2 theme(s): Theme 1, Theme 2`,
            `✔ ${'theme_allocation'.padEnd(24)} 3 text(s) over 2 theme(s), 2 above threshold`,
            `✔ ${'sentiment'.padEnd(24)} 3 label(s) (negative 1, positive 2)`,
        ]);
    });

    it('should report a best-effort run', async (): Promise<void> => {
        const io = io_capture();

        expect(await cli_run(['run', workflowPath, datasetPath, '--mock', '--json', '--best-effort'], io)).toBe(0);

        const printed: { failed: Record<string, string>; skipped: string[] } = JSON.parse(io.stdout.join('\n'));
        expect(printed.failed).toEqual({});
        expect(printed.skipped).toEqual([]);
    });

    it('should exit 2 when the dataset is missing', async (): Promise<void> => {
        const io = io_capture();

        expect(await cli_run(['run', workflowPath, '--mock'], io)).toBe(2);
        expect(io.stderr).toEqual(["Error: Missing dataset: pass a dataset file or declare a 'dataset' source"]);
    });

    it('should exit 2 on an invalid option value', async (): Promise<void> => {
        const io = io_capture();

        expect(await cli_run(['run', workflowPath, datasetPath, '--concurrency', 'many'], io)).toBe(2);
        expect(io.stderr).toEqual(['Error: Invalid value for maxConcurrency: many']);
    });

    it('should clear a cache directory', async (): Promise<void> => {
        const io = io_capture({ ANALYSIS_CACHE_DIR: dir });

        expect(await cli_run(['cache-clear'], io)).toBe(0);
        expect(io.stdout).toEqual([`Cleared cache at ${dir}`]);
    });

    it('should refuse to clear without a cache directory', async (): Promise<void> => {
        const io = io_capture();

        expect(await cli_run(['cache-clear'], io)).toBe(2);
        expect(io.stderr).toEqual(['Error: cache-clear needs --cache-dir or ANALYSIS_CACHE_DIR']);
    });
});
