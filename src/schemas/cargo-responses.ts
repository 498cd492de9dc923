import { z } from 'zod';

export const CARGO_SPAN_SCHEMA = z.object({
  file_name: z.string(),
  line_start: z.number(),
  line_end: z.number(),
  column_start: z.number(),
  column_end: z.number(),
  is_primary: z.boolean(),
  suggested_replacement: z.string().nullable().optional(),
});

const CARGO_CHILD_SCHEMA = z.object({
  message: z.string(),
  level: z.string(),
});

export const CARGO_COMPILER_MESSAGE_SCHEMA = z.object({
  message: z.string(),
  level: z.string(),
  code: z.object({ code: z.string() }).nullable().optional(),
  spans: z.array(CARGO_SPAN_SCHEMA).default([]),
  children: z.array(CARGO_CHILD_SCHEMA).default([]),
});

/**
 * Schema for one line of `cargo check --message-format=json`.
 * Only records with reason `compiler-message` carry a message.
 */
export const CARGO_RECORD_SCHEMA = z.object({
  reason: z.string(),
  message: CARGO_COMPILER_MESSAGE_SCHEMA.optional(),
});

export type CargoSpan = z.infer<typeof CARGO_SPAN_SCHEMA>;
export type CargoCompilerMessage = z.infer<typeof CARGO_COMPILER_MESSAGE_SCHEMA>;
export type CargoRecord = z.infer<typeof CARGO_RECORD_SCHEMA>;
