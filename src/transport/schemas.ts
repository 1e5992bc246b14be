/**
 * @file Transport Response Schemas
 *
 * Zod schemas for the job envelopes the analysis API returns. Result
 * payloads are validated per step kind in steps/results.
 *
 * @module transport/schemas
 */

import { z } from 'zod';

export const JobSubmissionSchema = z.object({
    jobId: z.string().min(1)
});

/**
 * `pending` is the API's name for a queued job; `error` is a remote
 * failure, same as `failed`.
 */
export const JobStatusResponseSchema = z.object({
    jobId:     z.string().optional(),
    jobStatus: z.enum(['pending', 'queued', 'running', 'completed', 'error', 'failed']),
    message:   z.string().nullable().optional(),
    resultUrl: z.string().nullable().optional(),
    result:    z.unknown().optional()
}).passthrough();

export const ErrorBodySchema = z.object({
    message: z.string().optional(),
    error:   z.union([z.string(), z.object({ message: z.string() })]).optional()
}).passthrough();

export const SimilarityResponseSchema = z.object({
    matrix: z.array(z.array(z.number()))
}).passthrough();

export type JobStatusResponse = z.infer<typeof JobStatusResponseSchema>;
