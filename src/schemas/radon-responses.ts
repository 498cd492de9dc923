import { z } from 'zod';

/**
 * `radon cc -j` maps each file to its block complexity list. The content is
 * passed through as opaque metrics, so only the top-level shape is checked.
 */
export const RADON_OUTPUT_SCHEMA = z.record(z.string(), z.unknown());

export type RadonOutput = z.infer<typeof RADON_OUTPUT_SCHEMA>;
