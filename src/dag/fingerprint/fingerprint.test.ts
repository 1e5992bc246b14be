/**
 * @file Fingerprint Tests
 *
 * Verifies that fingerprints are content-addressed: equal kind, config
 * and input content digest identically, and any change to one of them
 * changes the fingerprint.
 *
 * @module dag/fingerprint
 */

import { describe, it, expect } from 'vitest';
import * as fc from 'fast-check';
import { step_create, config_effective } from '../../steps/AnalysisStep.js';
import type { ResolvedInputs, StepConfig, StepConfigInput } from '../../steps/types.js';
import {
    Sha256Hasher,
    canonical_serialize,
    contentIdentity_compute,
    fingerprint_compute,
    fingerprint_record,
} from './hasher.js';
import type { FingerprintHasher } from './types.js';

// ═══════════════════════════════════════════════════════════════════
// Test Fixtures
// ═══════════════════════════════════════════════════════════════════

/** Identity hasher: the digest is the content itself. */
const READABLE_HASHER: FingerprintHasher = {
    digest_compute: (content: string): string => content,
};

function config_make(raw: StepConfigInput): StepConfig {
    return config_effective(step_create('step', raw).config, false);
}

const TEXTS: ResolvedInputs = { texts: ['the app is great', 'billing is broken'] };

// ═══════════════════════════════════════════════════════════════════
// Canonical Serialization
// ═══════════════════════════════════════════════════════════════════

describe('dag/fingerprint/canonical_serialize', (): void => {
    it('should sort object keys at every depth', (): void => {
        expect(canonical_serialize({ b: 1, a: { d: [2, { z: true, y: null }], c: 'x' } }))
            .toBe('{"a":{"c":"x","d":[2,{"y":null,"z":true}]},"b":1}');
    });

    it('should drop undefined members and serialize non-finite numbers as null', (): void => {
        expect(canonical_serialize({ a: undefined, b: Number.NaN, c: Infinity })).toBe('{"b":null,"c":null}');
    });

    it('should be independent of key insertion order', (): void => {
        fc.assert(fc.property(fc.dictionary(fc.string(), fc.integer()), (record) => {
            const reversed = Object.fromEntries(Object.entries(record).reverse());
            expect(canonical_serialize(reversed)).toBe(canonical_serialize(record));
        }));
    });
});

// ═══════════════════════════════════════════════════════════════════
// Fingerprints
// ═══════════════════════════════════════════════════════════════════

describe('dag/fingerprint/fingerprint_compute', (): void => {
    it('should digest kind, config and input identities in a fixed layout', (): void => {
        const record = fingerprint_record(config_make({ kind: 'sentiment' }), { texts: ['a'] }, READABLE_HASHER);

        expect(record.config).toBe('{"fast":false,"kind":"sentiment"}');
        expect(record.inputIdentities).toEqual({ texts: '["a"]' });
        expect(record.fingerprint).toBe('sentiment\0{"fast":false,"kind":"sentiment"}\0texts:["a"]');
    });

    it('should produce 64-character hex digests by default', (): void => {
        expect(fingerprint_compute(config_make({ kind: 'cluster' }), TEXTS)).toMatch(/^[0-9a-f]{64}$/);
    });

    it('should treat omitted options and explicit defaults as the same invocation', (): void => {
        const omitted: string = fingerprint_compute(config_make({ kind: 'theme_generation' }), TEXTS);
        const explicit: string = fingerprint_compute(
            config_make({ kind: 'theme_generation', minThemes: 2, maxThemes: 10, context: null }),
            TEXTS,
        );
        expect(explicit).toBe(omitted);
    });

    it('should change when the config changes', (): void => {
        const base: string = fingerprint_compute(config_make({ kind: 'theme_generation' }), TEXTS);
        const changed: string = fingerprint_compute(config_make({ kind: 'theme_generation', maxThemes: 5 }), TEXTS);
        expect(changed).not.toBe(base);
    });

    it('should change when the fast flag changes', (): void => {
        const config: StepConfig = step_create('step', { kind: 'sentiment' }).config;
        expect(fingerprint_compute(config_effective(config, true), TEXTS))
            .not.toBe(fingerprint_compute(config_effective(config, false), TEXTS));
    });

    it('should depend on input content, not identity', (): void => {
        const config: StepConfig = config_make({ kind: 'sentiment' });
        const copy: ResolvedInputs = { texts: [...TEXTS.texts] };
        const reordered: ResolvedInputs = { texts: [...TEXTS.texts].reverse() };

        expect(fingerprint_compute(config, copy)).toBe(fingerprint_compute(config, TEXTS));
        expect(fingerprint_compute(config, reordered)).not.toBe(fingerprint_compute(config, TEXTS));
    });

    it('should distinguish steps of different kinds over the same inputs', (): void => {
        expect(fingerprint_compute(config_make({ kind: 'sentiment' }), TEXTS))
            .not.toBe(fingerprint_compute(config_make({ kind: 'cluster' }), TEXTS));
    });

    it('should include the themes slot when present', (): void => {
        const config: StepConfig = config_make({ kind: 'theme_allocation' });
        const withThemes: ResolvedInputs = { ...TEXTS, themes: { labels: ['Billing'], texts: ['billing'] } };
        const record = fingerprint_record(config, withThemes, READABLE_HASHER);

        expect(Object.keys(record.inputIdentities)).toEqual(['texts', 'themes']);
        expect(fingerprint_compute(config, withThemes)).not.toBe(fingerprint_compute(config, TEXTS));
    });

    it('should be stable for equal inputs', (): void => {
        fc.assert(fc.property(fc.array(fc.string()), (texts: string[]) => {
            const config: StepConfig = config_make({ kind: 'sentiment' });
            expect(fingerprint_compute(config, { texts })).toBe(fingerprint_compute(config, { texts: [...texts] }));
        }));
    });
});

describe('dag/fingerprint/Sha256Hasher', (): void => {
    it('should hash content identities with SHA-256', (): void => {
        const hasher = new Sha256Hasher();
        expect(contentIdentity_compute('', hasher)).toBe(hasher.digest_compute('""'));
        expect(hasher.digest_compute('')).toBe('e3b0c44298fc1c149afbf4c8996fb92427ae41e4649b934ca495991b7852b855');
    });
});
