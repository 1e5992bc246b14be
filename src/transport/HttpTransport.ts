/**
 * @file HTTP Transport
 *
 * RemoteTransport over the analysis REST API. One endpoint per step
 * kind; HTTP 200 carries the payload, HTTP 202 a job id to poll at
 * `GET /jobs?jobId=`. Similarity requests above the per-request item
 * limit are split into blocks and stitched.
 *
 * A submit the API answers with any other status is a remote-reported
 * failure (RemoteFailureError). Faults reaching the API, or reading its
 * status and results, surface as TransportError: timeouts, network
 * failures, 404 and 5xx are transient, everything else is not.
 *
 * @module transport/HttpTransport
 */

import { ConfigurationError, RemoteFailureError, TransportError } from '../errors.js';
import type { ResolvedInputs, StepConfig } from '../steps/types.js';
import {
    MAX_SIMILARITY_ITEMS,
    blocks_stitch,
    crossBlocks_plan,
    selfBlocks_plan,
    type SimilarityBlock,
} from './batching.js';
import {
    ErrorBodySchema,
    JobStatusResponseSchema,
    JobSubmissionSchema,
    SimilarityResponseSchema,
    type JobStatusResponse,
} from './schemas.js';
import type {
    JobStatusReport,
    RemoteJobStatus,
    RemoteTransport,
    SubmitOutcome,
} from './types.js';

export type FetchFn = (input: string, init?: RequestInit) => Promise<Response>;

/**
 * @property baseUrl - API root, e.g. `https://host/v1`
 * @property apiToken - Bearer token, omitted from requests when null
 * @property requestTimeoutMs - Per-request timeout
 * @property maxItems - Similarity item limit per request
 * @property fetch - fetch implementation (tests inject a stub)
 */
export interface HttpTransportOptions {
    baseUrl: string;
    apiToken?: string | null;
    requestTimeoutMs?: number;
    maxItems?: number;
    fetch?: FetchFn;
}

interface HttpReply {
    status: number;
    data: unknown;
}

type Endpoint = '/themes' | '/similarity' | '/extractions' | '/sentiment';

const NO_MESSAGE = 'no message provided';

const STATUS_MAP: Record<JobStatusResponse['jobStatus'], RemoteJobStatus> = {
    pending:   'queued',
    queued:    'queued',
    running:   'running',
    completed: 'completed',
    error:     'failed',
    failed:    'failed',
};

export class HttpTransport implements RemoteTransport {
    private readonly baseUrl: string;
    private readonly apiToken: string | null;
    private readonly requestTimeoutMs: number;
    private readonly maxItems: number;
    private readonly fetchFn: FetchFn;

    constructor(options: HttpTransportOptions) {
        if (!options.baseUrl) {
            throw new ConfigurationError('HttpTransport requires a baseUrl');
        }
        this.baseUrl = options.baseUrl.replace(/\/+$/, '');
        this.apiToken = options.apiToken ?? null;
        this.requestTimeoutMs = options.requestTimeoutMs ?? 30_000;
        this.maxItems = options.maxItems ?? MAX_SIMILARITY_ITEMS;
        this.fetchFn = options.fetch ?? ((input: string, init?: RequestInit) => fetch(input, init));
    }

    // ─── RemoteTransport ────────────────────────────────────────

    async submit(config: StepConfig, inputs: ResolvedInputs): Promise<SubmitOutcome> {
        const fast: { fast?: true } = config.fast ? { fast: true } : {};
        switch (config.kind) {
            case 'theme_generation':
                return this.post('/themes', {
                    inputs: inputs.texts,
                    minThemes: config.minThemes,
                    maxThemes: config.maxThemes,
                    ...(config.context !== null ? { context: config.context } : {}),
                    ...fast,
                });
            case 'theme_allocation': {
                const themeTexts: string[] = config.themes ?? inputs.themes?.texts ?? [];
                return this.similarity_submit(crossBlocks_plan(inputs.texts, themeTexts, this.maxItems), fast);
            }
            case 'theme_extraction':
                return this.post('/extractions', {
                    inputs: inputs.texts,
                    themes: config.themes ?? inputs.themes?.labels ?? [],
                    ...(config.version !== null ? { version: config.version } : {}),
                    ...fast,
                });
            case 'sentiment':
                return this.post('/sentiment', { inputs: inputs.texts, ...fast });
            case 'cluster':
                return this.similarity_submit(selfBlocks_plan(inputs.texts, this.maxItems), fast);
        }
    }

    async pollStatus(jobId: string): Promise<JobStatusReport> {
        const reply: HttpReply = await this.request('GET', `${this.baseUrl}/jobs?jobId=${encodeURIComponent(jobId)}`);
        if (reply.status !== 200) {
            throw this.fault_create('GET /jobs', reply);
        }
        const parsed = JobStatusResponseSchema.safeParse(reply.data);
        if (!parsed.success) {
            throw new TransportError(`Malformed job status for ${jobId}`, false, reply.status, { jobId });
        }
        const body: JobStatusResponse = parsed.data;
        return {
            status: STATUS_MAP[body.jobStatus],
            resultLocation: body.resultUrl ?? null,
            errorMessage: body.message ?? null,
            payload: body.result ?? body,
        };
    }

    async fetchResult(resultLocation: string): Promise<unknown> {
        const url: string = /^https?:\/\//.test(resultLocation)
            ? resultLocation
            : `${this.baseUrl}/${resultLocation.replace(/^\/+/, '')}`;
        const reply: HttpReply = await this.request('GET', url);
        if (reply.status !== 200) {
            throw this.fault_create('GET result', reply);
        }
        return reply.data;
    }

    // ─── Internals ──────────────────────────────────────────────

    private async post(endpoint: Endpoint, body: Record<string, unknown>): Promise<SubmitOutcome> {
        const reply: HttpReply = await this.request('POST', `${this.baseUrl}${endpoint}`, body);
        switch (reply.status) {
            case 200:
                return { type: 'result', payload: reply.data };
            case 202: {
                const parsed = JobSubmissionSchema.safeParse(reply.data);
                if (!parsed.success) {
                    throw new TransportError(`POST ${endpoint} returned 202 without a jobId`, false, 202);
                }
                return { type: 'job', jobId: parsed.data.jobId };
            }
            default: {
                const remoteMessage: string | null = errorMessage_extract(reply.data);
                throw new RemoteFailureError(
                    `POST ${endpoint} failed with HTTP ${reply.status}: ${remoteMessage ?? NO_MESSAGE}`,
                    remoteMessage,
                    {},
                    reply.status,
                );
            }
        }
    }

    /**
     * A single block goes out as-is and may be deferred. Batched blocks
     * must each answer synchronously.
     */
    private async similarity_submit(blocks: SimilarityBlock[], fast: { fast?: true }): Promise<SubmitOutcome> {
        if (blocks.length === 1) {
            return this.post('/similarity', { ...blocks[0].body, flatten: false, ...fast });
        }

        const matrices: number[][][] = [];
        for (const [index, block] of blocks.entries()) {
            const outcome: SubmitOutcome = await this.post('/similarity', { ...block.body, flatten: false, ...fast });
            if (outcome.type === 'job') {
                throw new TransportError(
                    `Similarity block ${index + 1}/${blocks.length} was deferred as job ${outcome.jobId}; batched requests need synchronous answers`,
                    false,
                    202,
                    { jobId: outcome.jobId },
                );
            }
            const parsed = SimilarityResponseSchema.safeParse(outcome.payload);
            if (!parsed.success) {
                throw new TransportError(`Similarity block ${index + 1}/${blocks.length} has no matrix`, false, 200);
            }
            matrices.push(parsed.data.matrix);
        }

        const rows: number = blocks.reduce((max, b) => Math.max(max, b.rowOffset + b.rows), 0);
        const cols: number = blocks.reduce((max, b) => Math.max(max, b.colOffset + b.cols), 0);
        return { type: 'result', payload: { matrix: blocks_stitch(rows, cols, blocks, matrices) } };
    }

    private async request(method: 'GET' | 'POST', url: string, body?: Record<string, unknown>): Promise<HttpReply> {
        const headers: Record<string, string> = { Accept: 'application/json' };
        if (body) headers['Content-Type'] = 'application/json';
        if (this.apiToken) headers['Authorization'] = `Bearer ${this.apiToken}`;

        let status: number;
        let text: string;
        try {
            const response: Response = await this.fetchFn(url, {
                method,
                headers,
                body: body ? JSON.stringify(body) : undefined,
                signal: AbortSignal.timeout(this.requestTimeoutMs),
            });
            status = response.status;
            text = await response.text();
        } catch (error: unknown) {
            const timedOut: boolean = error instanceof Error && error.name === 'TimeoutError';
            const reason: string = timedOut
                ? `timed out after ${this.requestTimeoutMs}ms`
                : error instanceof Error ? error.message : String(error);
            throw new TransportError(`${method} ${url} ${reason}`, true, null, {}, { cause: error });
        }

        if (!text) {
            return { status, data: null };
        }
        try {
            return { status, data: JSON.parse(text) };
        } catch {
            if (status < 200 || status >= 300) {
                return { status, data: { message: text } };
            }
            throw new TransportError(`${method} ${url} returned invalid JSON`, false, status);
        }
    }

    private fault_create(operation: string, reply: HttpReply): TransportError {
        const transient: boolean = reply.status === 404 || reply.status >= 500;
        return new TransportError(
            `${operation} failed with HTTP ${reply.status}: ${errorMessage_extract(reply.data) ?? NO_MESSAGE}`,
            transient,
            reply.status,
        );
    }
}

function errorMessage_extract(data: unknown): string | null {
    const parsed = ErrorBodySchema.safeParse(data);
    if (!parsed.success) return null;
    const { message, error } = parsed.data;
    if (message) return message;
    if (typeof error === 'string') return error;
    return error?.message ?? null;
}
