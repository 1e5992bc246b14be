/**
 * @file Timer Helpers
 *
 * Timer-driven continuations for polling and retry loops. A pending
 * sleep rejects as soon as its abort signal fires.
 *
 * @module utils/timers
 */

import { RunCancelledError, type ErrorContext } from '../errors.js';

/**
 * Sleep for the given milliseconds, or until the signal aborts.
 *
 * @param ms - Delay in milliseconds (values below zero sleep for zero)
 * @param signal - Optional abort signal
 * @param context - Error context reported on cancellation
 * @throws {RunCancelledError} If the signal is or becomes aborted
 */
export function sleep_ms(ms: number, signal?: AbortSignal, context: ErrorContext = {}): Promise<void> {
    return new Promise((resolve, reject) => {
        if (signal?.aborted) {
            reject(new RunCancelledError(context));
            return;
        }
        const onAbort = (): void => {
            clearTimeout(timer);
            reject(new RunCancelledError(context));
        };
        const timer: NodeJS.Timeout = setTimeout((): void => {
            signal?.removeEventListener('abort', onAbort);
            resolve();
        }, Math.max(0, ms));
        signal?.addEventListener('abort', onAbort, { once: true });
    });
}

/**
 * Throw if the signal has been aborted. Used at dispatch and poll boundaries.
 */
export function cancellation_check(signal: AbortSignal | undefined, context: ErrorContext = {}): void {
    if (signal?.aborted) {
        throw new RunCancelledError(context);
    }
}
