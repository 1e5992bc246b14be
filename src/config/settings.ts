/**
 * @file Runtime Settings Service
 *
 * Engine settings with central validation and deterministic precedence
 * (explicit override > env > defaults). Numeric settings are clamped to
 * their bounds wherever they come from.
 *
 * @module config/settings
 */

import fs from 'fs';
import path from 'path';
import type { JobOptions } from '../jobs/types.js';

export const DEFAULT_BASE_URL = 'https://core.researchwiseai.com/pulse/v1';

export interface EngineSettings {
    baseUrl: string;
    apiToken: string | null;
    requestTimeoutMs: number;
    pollIntervalMs: number;
    retryDelayMs: number;
    maxRefreshAttempts: number;
    jobTimeoutMs: number;
    maxConcurrency: number;
    cacheDir: string | null;
    fast: boolean;
}

export type SettingsKey = keyof EngineSettings;

export type SettingSource = 'override' | 'env' | 'default';

type NumericKey = 'requestTimeoutMs' | 'pollIntervalMs' | 'retryDelayMs' | 'maxRefreshAttempts' | 'jobTimeoutMs' | 'maxConcurrency';
type TextKey = 'baseUrl' | 'apiToken' | 'cacheDir';
type FlagKey = 'fast';

interface NumericBounds {
    min: number;
    max: number;
}

const ENV_NAMES: Record<SettingsKey, string> = {
    baseUrl:            'ANALYSIS_BASE_URL',
    apiToken:           'ANALYSIS_API_TOKEN',
    requestTimeoutMs:   'ANALYSIS_REQUEST_TIMEOUT_MS',
    pollIntervalMs:     'ANALYSIS_POLL_INTERVAL_MS',
    retryDelayMs:       'ANALYSIS_RETRY_DELAY_MS',
    maxRefreshAttempts: 'ANALYSIS_MAX_REFRESH_ATTEMPTS',
    jobTimeoutMs:       'ANALYSIS_JOB_TIMEOUT_MS',
    maxConcurrency:     'ANALYSIS_MAX_CONCURRENCY',
    cacheDir:           'ANALYSIS_CACHE_DIR',
    fast:               'ANALYSIS_FAST',
};

const NUMERIC_DEFAULTS: Record<NumericKey, number> = {
    requestTimeoutMs:   30_000,
    pollIntervalMs:     2_000,
    retryDelayMs:       2_000,
    maxRefreshAttempts: 10,
    jobTimeoutMs:       180_000,
    maxConcurrency:     4,
};

const NUMERIC_BOUNDS: Record<NumericKey, NumericBounds> = {
    requestTimeoutMs:   { min: 1_000, max: 600_000 },
    pollIntervalMs:     { min: 10, max: 60_000 },
    retryDelayMs:       { min: 0, max: 60_000 },
    maxRefreshAttempts: { min: 1, max: 100 },
    jobTimeoutMs:       { min: 1_000, max: 3_600_000 },
    maxConcurrency:     { min: 1, max: 64 },
};

const TEXT_DEFAULTS: Record<TextKey, string | null> = {
    baseUrl:  DEFAULT_BASE_URL,
    apiToken: null,
    cacheDir: null,
};

const NUMERIC_KEYS: readonly NumericKey[] = [
    'requestTimeoutMs', 'pollIntervalMs', 'retryDelayMs', 'maxRefreshAttempts', 'jobTimeoutMs', 'maxConcurrency',
];

export type SetResult =
    | { ok: true; value: string | number | boolean }
    | { ok: false; error: string };

export class SettingsService {
    private readonly numericOverrides: Map<NumericKey, number> = new Map();
    private readonly textOverrides: Map<TextKey, string> = new Map();
    private readonly flagOverrides: Map<FlagKey, boolean> = new Map();

    /**
     * @param env - Environment to read (defaults to process.env)
     */
    constructor(private readonly env: Readonly<Record<string, string | undefined>> = process.env) {}

    /**
     * Effective value of every setting.
     */
    public snapshot(): EngineSettings {
        return {
            baseUrl:            this.text_resolve('baseUrl') ?? DEFAULT_BASE_URL,
            apiToken:           this.text_resolve('apiToken'),
            requestTimeoutMs:   this.numeric_resolve('requestTimeoutMs'),
            pollIntervalMs:     this.numeric_resolve('pollIntervalMs'),
            retryDelayMs:       this.numeric_resolve('retryDelayMs'),
            maxRefreshAttempts: this.numeric_resolve('maxRefreshAttempts'),
            jobTimeoutMs:       this.numeric_resolve('jobTimeoutMs'),
            maxConcurrency:     this.numeric_resolve('maxConcurrency'),
            cacheDir:           this.text_resolve('cacheDir'),
            fast:               this.flag_resolve('fast'),
        };
    }

    /**
     * Set one override with validation. Numeric values are rounded and clamped.
     */
    public set(key: SettingsKey, value: unknown): SetResult {
        if (key === 'fast') {
            const parsed: boolean | undefined = typeof value === 'boolean' ? value : flag_parse(String(value));
            if (parsed === undefined) {
                return { ok: false, error: `Invalid value for ${key}: ${String(value)}` };
            }
            this.flagOverrides.set(key, parsed);
            return { ok: true, value: parsed };
        }
        if (numericKey_is(key)) {
            const parsed: number = typeof value === 'number' ? value : Number.parseInt(String(value), 10);
            if (!Number.isFinite(parsed)) {
                return { ok: false, error: `Invalid value for ${key}: ${String(value)}` };
            }
            const clamped: number = value_clamp(key, Math.round(parsed));
            this.numericOverrides.set(key, clamped);
            return { ok: true, value: clamped };
        }
        if (typeof value !== 'string' || value.trim() === '') {
            return { ok: false, error: `Invalid value for ${key}: expected a non-empty string` };
        }
        this.textOverrides.set(key, value.trim());
        return { ok: true, value: value.trim() };
    }

    /**
     * Remove one override.
     */
    public unset(key: SettingsKey): void {
        if (key === 'fast') {
            this.flagOverrides.delete(key);
        } else if (numericKey_is(key)) {
            this.numericOverrides.delete(key);
        } else {
            this.textOverrides.delete(key);
        }
    }

    /**
     * Where the effective value of a setting comes from.
     */
    public source(key: SettingsKey): SettingSource {
        const overridden: boolean = key === 'fast'
            ? this.flagOverrides.has(key)
            : numericKey_is(key) ? this.numericOverrides.has(key) : this.textOverrides.has(key);
        if (overridden) return 'override';

        if (key === 'fast') {
            return this.envFlag_resolve(key) !== undefined ? 'env' : 'default';
        }
        if (numericKey_is(key)) {
            return this.envNumeric_resolve(key) !== undefined ? 'env' : 'default';
        }
        return this.envText_resolve(key) !== undefined ? 'env' : 'default';
    }

    // ─── Resolution ─────────────────────────────────────────────

    private numeric_resolve(key: NumericKey): number {
        const override: number | undefined = this.numericOverrides.get(key);
        if (typeof override === 'number') return override;

        const envOverride: number | undefined = this.envNumeric_resolve(key);
        if (typeof envOverride === 'number') return value_clamp(key, envOverride);

        return NUMERIC_DEFAULTS[key];
    }

    private text_resolve(key: TextKey): string | null {
        return this.textOverrides.get(key) ?? this.envText_resolve(key) ?? TEXT_DEFAULTS[key];
    }

    private flag_resolve(key: FlagKey): boolean {
        return this.flagOverrides.get(key) ?? this.envFlag_resolve(key) ?? false;
    }

    private envNumeric_resolve(key: NumericKey): number | undefined {
        const envRaw: string | undefined = this.env[ENV_NAMES[key]];
        if (!envRaw) return undefined;

        const parsed: number = Number.parseInt(envRaw, 10);
        return Number.isFinite(parsed) ? parsed : undefined;
    }

    private envText_resolve(key: TextKey): string | undefined {
        const envRaw: string | undefined = this.env[ENV_NAMES[key]]?.trim();
        return envRaw ? envRaw : undefined;
    }

    private envFlag_resolve(key: FlagKey): boolean | undefined {
        const envRaw: string | undefined = this.env[ENV_NAMES[key]];
        return envRaw ? flag_parse(envRaw) : undefined;
    }
}

/**
 * Job monitor options derived from settings.
 */
export function jobOptions_derive(settings: EngineSettings): JobOptions {
    return {
        maxAttempts: settings.maxRefreshAttempts,
        retryDelayMs: settings.retryDelayMs,
        pollIntervalMs: settings.pollIntervalMs,
        timeoutMs: settings.jobTimeoutMs,
    };
}

// ─── Environment Loading ─────────────────────────────────────────

/**
 * Simple .env loader. Variables already set in the environment win.
 *
 * @param envPath - File to read (defaults to `.env` in the CWD)
 * @param env - Environment to hydrate
 * @returns Names of the variables that were set
 */
export function env_load(
    envPath: string = path.join(process.cwd(), '.env'),
    env: Record<string, string | undefined> = process.env,
): string[] {
    if (!fs.existsSync(envPath)) return [];

    const loaded: string[] = [];
    const content: string = fs.readFileSync(envPath, 'utf-8');
    content.split('\n').forEach(line => {
        const trimmed: string = line.trim();
        if (trimmed && !trimmed.startsWith('#') && trimmed.includes('=')) {
            const [key, ...valParts] = trimmed.split('=');
            const name: string = key.trim();
            const val: string = valParts.join('=').trim().replace(/^["']|["']$/g, ''); // strip quotes
            if (!env[name]) {
                env[name] = val;
                loaded.push(name);
            }
        }
    });
    return loaded;
}

// ─── Helpers ─────────────────────────────────────────────────────

function numericKey_is(key: SettingsKey): key is NumericKey {
    return NUMERIC_KEYS.some((numeric: NumericKey): boolean => numeric === key);
}

function value_clamp(key: NumericKey, value: number): number {
    const bounds: NumericBounds = NUMERIC_BOUNDS[key];
    return Math.max(bounds.min, Math.min(bounds.max, value));
}

function flag_parse(raw: string): boolean | undefined {
    const normalized: string = raw.trim().toLowerCase();
    if (['1', 'true', 'yes', 'on'].includes(normalized)) return true;
    if (['0', 'false', 'no', 'off'].includes(normalized)) return false;
    return undefined;
}
