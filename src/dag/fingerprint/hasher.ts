/**
 * @file Fingerprint Hasher
 *
 * Computes SHA-256 fingerprints for step invocations. Config and input
 * values are serialized canonically (object keys sorted, undefined
 * members dropped) so logically equal values digest identically.
 *
 * Input identities are sorted by slot name before hashing to guarantee
 * order-independence.
 *
 * @module dag/fingerprint
 */

import { createHash } from 'crypto';
import type { FingerprintHasher, FingerprintRecord } from './types.js';
import type { ResolvedInputs, StepConfig } from '../../steps/types.js';

/**
 * SHA-256 hasher implementing the FingerprintHasher interface.
 */
export class Sha256Hasher implements FingerprintHasher {
    digest_compute(content: string): string {
        return createHash('sha256').update(content).digest('hex');
    }
}

const DEFAULT_HASHER: FingerprintHasher = new Sha256Hasher();

/**
 * Serialize a JSON-like value with sorted object keys.
 *
 * Non-finite numbers serialize as null, the way JSON.stringify does.
 */
export function canonical_serialize(value: unknown): string {
    if (value === null || value === undefined) return 'null';
    if (Array.isArray(value)) {
        return `[${value.map(item => canonical_serialize(item)).join(',')}]`;
    }
    if (typeof value === 'object') {
        const entries: string[] = Object.entries(value)
            .filter(([, v]) => v !== undefined)
            .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
            .map(([k, v]) => `${JSON.stringify(k)}:${canonical_serialize(v)}`);
        return `{${entries.join(',')}}`;
    }
    if (typeof value === 'number' && !Number.isFinite(value)) return 'null';
    if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
        return JSON.stringify(value);
    }
    return JSON.stringify(String(value));
}

/**
 * Content identity of a value: the digest of its canonical serialization.
 */
export function contentIdentity_compute(value: unknown, hasher: FingerprintHasher = DEFAULT_HASHER): string {
    return hasher.digest_compute(canonical_serialize(value));
}

/**
 * Compute the full fingerprint record of a step invocation.
 *
 * Formula: hash(kind + '\0' + canonical config + '\0' + sorted slot identities)
 *
 * @param config - Effective config (defaults and fast flag materialized)
 * @param inputs - Resolved input values
 * @param hasher - Digest implementation
 */
export function fingerprint_record(
    config: StepConfig,
    inputs: ResolvedInputs,
    hasher: FingerprintHasher = DEFAULT_HASHER,
): FingerprintRecord {
    const inputIdentities: Record<string, string> = {};
    for (const [slot, value] of Object.entries(inputs)) {
        if (value !== undefined) {
            inputIdentities[slot] = contentIdentity_compute(value, hasher);
        }
    }

    const configPart: string = canonical_serialize(config);
    const inputPart: string = Object.entries(inputIdentities)
        .sort(([a], [b]) => a.localeCompare(b))
        .map(([k, v]) => `${k}:${v}`)
        .join(',');

    const fingerprint: string = hasher.digest_compute(config.kind + '\0' + configPart + '\0' + inputPart);
    return { fingerprint, kind: config.kind, config: configPart, inputIdentities };
}

/**
 * Compute the fingerprint (cache key) of a step invocation.
 */
export function fingerprint_compute(
    config: StepConfig,
    inputs: ResolvedInputs,
    hasher: FingerprintHasher = DEFAULT_HASHER,
): string {
    return fingerprint_record(config, inputs, hasher).fingerprint;
}
