/**
 * @file Fingerprint Type Definitions
 *
 * A fingerprint is the cache key of one step invocation: a digest over
 * the step kind, its normalized config, and the content identity of
 * every resolved input. Content-addressed, not address- or
 * timestamp-based: two datasets with identical content fingerprint
 * identically, and equal fingerprints imply equivalent results.
 *
 * Formula: fp(step) = hash(kind, canonical(config), id(input_1), ..., id(input_N))
 *
 * @module dag/fingerprint
 */

// ─── Hasher Interface ───────────────────────────────────────────

/**
 * Interface for computing digests.
 *
 * The hasher is pluggable: the default uses SHA-256, but tests can
 * substitute a readable hash for deterministic assertions.
 */
export interface FingerprintHasher {
    /**
     * Digest a canonical string.
     *
     * @param content - Canonical serialization to hash
     * @returns The digest string
     */
    digest_compute(content: string): string;
}

// ─── Fingerprint Record ─────────────────────────────────────────

/**
 * Everything a fingerprint was computed from, kept for diagnostics.
 *
 * @property fingerprint - The computed cache key
 * @property kind - Step kind
 * @property config - Canonical serialization of the effective config
 * @property inputIdentities - Slot → content identity of the resolved input
 */
export interface FingerprintRecord {
    fingerprint: string;
    kind: string;
    config: string;
    inputIdentities: Record<string, string>;
}
