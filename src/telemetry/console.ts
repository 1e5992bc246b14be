/**
 * @file Console Run Logger
 *
 * Subscribes to a TelemetryBus and prints run events with bracketed
 * tags (`[SCHEDULER]`, `[JOB]`, `[CACHE]`), coloured with chalk.
 *
 * @module telemetry/console
 */

import chalk from 'chalk';
import type { RunEvent, TelemetryBus } from './TelemetryBus.js';

export type LogLevel = 'quiet' | 'normal' | 'verbose';

/**
 * Format one event as a log line, or null when the level hides it.
 */
export function event_format(event: RunEvent, level: LogLevel = 'normal'): string | null {
    if (level === 'quiet' && event.type !== 'step_failed' && event.type !== 'cache_warning') {
        return null;
    }
    switch (event.type) {
        case 'run_start':
            return `${chalk.bold('[SCHEDULER]')} run ${event.runId.slice(0, 8)}: ${event.order.length} step(s): ${event.order.join(' → ')}`;
        case 'step_start':
            return level === 'verbose'
                ? `${chalk.bold('[SCHEDULER]')} ${event.stepId} started (${event.fingerprint.slice(0, 12)})`
                : null;
        case 'cache_hit':
            return `${chalk.cyan('[CACHE]')} ${event.stepId} served from ${event.layer} (${event.fingerprint.slice(0, 12)})`;
        case 'job_submitted':
            return `${chalk.magenta('[JOB]')} ${event.stepId} deferred as job ${event.jobId}`;
        case 'job_poll':
            return level === 'verbose' ? `${chalk.magenta('[JOB]')} ${event.jobId}: ${event.status}` : null;
        case 'job_retry':
            return `${chalk.yellow('[JOB]')} ${event.jobId}: status query failed (${event.attempt}/${event.maxAttempts}): ${event.message}`;
        case 'step_complete':
            return `${chalk.green('[SCHEDULER]')} ${event.stepId} complete in ${event.durationMs}ms${event.cached ? ' (cached)' : ''}`;
        case 'step_failed':
            return `${chalk.red('[SCHEDULER]')} ${event.stepId} failed: ${event.message}`;
        case 'step_skipped':
            return `${chalk.yellow('[SCHEDULER]')} ${event.stepId} skipped: ${event.reason}`;
        case 'cache_warning':
            return `${chalk.yellow('[CACHE]')} ${event.fingerprint.slice(0, 12)}: ${event.message}`;
        case 'run_complete':
            return `${chalk.bold('[SCHEDULER]')} run ${event.runId.slice(0, 8)} finished: ${event.succeeded} succeeded, ${event.failed} failed, ${event.skipped} skipped`;
    }
}

/**
 * Print bus events to the console.
 *
 * @returns Unsubscribe function
 */
export function consoleLogger_attach(bus: TelemetryBus, level: LogLevel = 'normal'): () => void {
    return bus.subscribe((event: RunEvent): void => {
        const line: string | null = event_format(event, level);
        if (line === null) return;
        if (event.type === 'step_failed') {
            console.error(line);
        } else if (event.type === 'job_retry' || event.type === 'cache_warning' || event.type === 'step_skipped') {
            console.warn(line);
        } else {
            console.log(line);
        }
    });
}
