/**
 * @file Cache Envelope Schema
 *
 * Zod schema for persisted cache entries. Anything read from disk passes
 * through here before it can reach a downstream step.
 *
 * @module dag/store/schemas
 */

import { z } from 'zod';
import { StepResultSchema } from '../../steps/schemas.js';

export const CacheEnvelopeSchema = z.object({
    fingerprint: z.string().min(1),
    storedAt:    z.string(),
    result:      StepResultSchema
});
