/**
 * @file CLI Commands
 *
 * `run`, `plan` and `cache-clear`. Every command returns its exit code:
 * 0 on success, 1 when a step or the run failed, 2 on usage or
 * configuration errors.
 *
 * @module cli/commands
 */

import { readFile } from 'fs/promises';
import chalk from 'chalk';
import { ConfigurationError, StepFailedError } from '../errors.js';
import { SettingsService, jobOptions_derive, type EngineSettings } from '../config/settings.js';
import { records_parse } from '../dag/graph/parser/common.js';
import { plan_build } from '../dag/graph/builder.js';
import { workflow_load, type ParsedWorkflow } from '../dag/graph/parser/workflow.js';
import type { Workflow, ExecutionPlan } from '../dag/graph/types.js';
import { Scheduler } from '../dag/scheduler/Scheduler.js';
import type { RunReport, StepOutcome } from '../dag/scheduler/types.js';
import { MemoCache } from '../dag/store/MemoCache.js';
import type { ResultStore } from '../dag/store/ResultStore.js';
import { FileCacheBackend } from '../dag/store/backend/fs.js';
import { TelemetryBus } from '../telemetry/TelemetryBus.js';
import { consoleLogger_attach, type LogLevel } from '../telemetry/console.js';
import { HttpTransport } from '../transport/HttpTransport.js';
import { MockTransport } from '../transport/MockTransport.js';
import type { RemoteTransport } from '../transport/types.js';
import { args_parse, USAGE, type CliArgs } from './args.js';
import { result_summarize } from './summary.js';

export interface CliIO {
    out: (line: string) => void;
    err: (line: string) => void;
    env: Readonly<Record<string, string | undefined>>;
}

const DEFAULT_IO: CliIO = {
    out: (line: string): void => console.log(line),
    err: (line: string): void => console.error(line),
    env: process.env,
};

/**
 * Run the CLI.
 *
 * @param argv - Arguments after the script name
 * @returns Process exit code
 */
export async function cli_run(argv: readonly string[], io: CliIO = DEFAULT_IO): Promise<number> {
    try {
        const args: CliArgs = args_parse(argv);
        switch (args.command) {
            case 'help':
                io.out(USAGE);
                return 0;
            case 'plan':
                return await plan_command(args, io);
            case 'run':
                return await run_command(args, settings_resolve(args, io), io);
            case 'cache-clear':
                return await cacheClear_command(settings_resolve(args, io), io);
        }
    } catch (error: unknown) {
        if (error instanceof ConfigurationError) {
            io.err(chalk.red(`Error: ${error.message}`));
            return 2;
        }
        io.err(chalk.red(`Error: ${error instanceof Error ? error.message : String(error)}`));
        return 1;
    }
}

// ─── Commands ───────────────────────────────────────────────────

async function plan_command(args: CliArgs, io: CliIO): Promise<number> {
    const { workflow, parsed } = await workflow_prepare(args, false);
    const plan: ExecutionPlan = plan_build(workflow, parsed.policy);

    plan.order.forEach((stepId: string, index: number) => {
        const binding = plan.graph.bindings.get(stepId) ?? {};
        const wiring: string = Object.entries(binding)
            .map(([slot, from]) => `${slot} ← ${from}`)
            .join(', ');
        const marker: string = plan.graph.inserted.includes(stepId) ? chalk.dim(' (auto-inserted)') : '';
        io.out(`${String(index + 1).padStart(2)}. ${stepId}${marker}  ${chalk.dim(wiring)}`);
    });
    return 0;
}

async function run_command(args: CliArgs, settings: EngineSettings, io: CliIO): Promise<number> {
    const { workflow, parsed } = await workflow_prepare(args, true);

    const bus = new TelemetryBus();
    const level: LogLevel = args.quiet ? 'quiet' : args.verbose ? 'verbose' : 'normal';
    const detach: () => void = consoleLogger_attach(bus, level);

    const transport: RemoteTransport = args.mock
        ? new MockTransport()
        : new HttpTransport({
            baseUrl: settings.baseUrl,
            apiToken: settings.apiToken,
            requestTimeoutMs: settings.requestTimeoutMs,
        });
    const scheduler = new Scheduler({
        transport,
        cache: new MemoCache(settings.cacheDir ? new FileCacheBackend(settings.cacheDir) : null, bus),
        bus,
        jobOptions: jobOptions_derive(settings),
        maxConcurrency: settings.maxConcurrency,
        fast: settings.fast,
        policy: parsed.policy,
    });

    const controller = new AbortController();
    const onInterrupt = (): void => controller.abort();
    process.once('SIGINT', onInterrupt);

    try {
        if (args.bestEffort) {
            const report: RunReport = await scheduler.workflow_runBestEffort(workflow, { signal: controller.signal });
            report_print(report, args.json, io);
            return report.failed.length > 0 ? 1 : 0;
        }
        const results: ResultStore = await scheduler.workflow_run(workflow, { signal: controller.signal });
        results_print(results, args.json, io);
        return 0;
    } catch (error: unknown) {
        if (error instanceof StepFailedError) {
            io.err(chalk.red(error.message));
            return 1;
        }
        throw error;
    } finally {
        process.off('SIGINT', onInterrupt);
        detach();
    }
}

async function cacheClear_command(settings: EngineSettings, io: CliIO): Promise<number> {
    if (!settings.cacheDir) {
        throw new ConfigurationError('cache-clear needs --cache-dir or ANALYSIS_CACHE_DIR');
    }
    await new MemoCache(new FileCacheBackend(settings.cacheDir)).clear();
    io.out(`Cleared cache at ${settings.cacheDir}`);
    return 0;
}

// ─── Helpers ────────────────────────────────────────────────────

/**
 * Settings with command-line options applied as overrides.
 *
 * @throws {ConfigurationError} On an invalid option value
 */
export function settings_resolve(args: CliArgs, io: Pick<CliIO, 'env'>): EngineSettings {
    const service = new SettingsService(io.env);
    if (args.fast) service.set('fast', true);
    if (args.cacheDir !== null) override_apply(service, 'cacheDir', args.cacheDir);
    if (args.concurrency !== null) override_apply(service, 'maxConcurrency', args.concurrency);
    return service.snapshot();
}

function override_apply(service: SettingsService, key: 'cacheDir' | 'maxConcurrency', value: string): void {
    const result = service.set(key, value);
    if (!result.ok) {
        throw new ConfigurationError(result.error);
    }
}

async function workflow_prepare(
    args: CliArgs,
    datasetRequired: boolean,
): Promise<{ workflow: Workflow; parsed: ParsedWorkflow }> {
    const [workflowPath, datasetPath] = args.positionals;
    if (workflowPath === undefined) {
        throw new ConfigurationError(`Missing workflow file\n\n${USAGE}`);
    }
    const parsed: ParsedWorkflow = await workflow_load(workflowPath);

    if (datasetPath !== undefined) {
        const records: string[] = records_parse(await readFile(datasetPath, 'utf-8'), datasetPath);
        return { workflow: parsed.builder.build(records), parsed };
    }
    if (parsed.builder.source_has('dataset')) {
        return { workflow: parsed.builder.build(), parsed };
    }
    if (datasetRequired) {
        throw new ConfigurationError('Missing dataset: pass a dataset file or declare a \'dataset\' source');
    }
    return { workflow: parsed.builder.build([]), parsed };
}

function results_print(results: ResultStore, json: boolean, io: CliIO): void {
    if (json) {
        io.out(JSON.stringify(results.toJSON(), null, 2));
        return;
    }
    for (const [stepId, result] of results.entries()) {
        io.out(`${chalk.green('✔')} ${stepId.padEnd(24)} ${result_summarize(result)}`);
    }
}

function report_print(report: RunReport, json: boolean, io: CliIO): void {
    if (json) {
        io.out(JSON.stringify({
            results: report.results.toJSON(),
            failed: Object.fromEntries(report.outcomes
                .filter((o): o is Extract<StepOutcome, { status: 'failed' }> => o.status === 'failed')
                .map(o => [o.stepId, o.error.message])),
            skipped: report.skipped,
        }, null, 2));
        return;
    }
    for (const outcome of report.outcomes) {
        switch (outcome.status) {
            case 'succeeded':
                io.out(`${chalk.green('✔')} ${outcome.stepId.padEnd(24)} ${result_summarize(report.results.result_get(outcome.stepId))}`);
                break;
            case 'failed':
                io.out(`${chalk.red('✘')} ${outcome.stepId.padEnd(24)} ${outcome.error.message}`);
                break;
            case 'skipped':
                io.out(`${chalk.yellow('–')} ${outcome.stepId.padEnd(24)} ${outcome.error.message}`);
                break;
        }
    }
}
