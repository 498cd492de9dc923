import { z } from 'zod';

const RUFF_POSITION_SCHEMA = z.object({
  row: z.number(),
  column: z.number(),
});

/**
 * Schema for a single `ruff check --output-format=json` finding.
 * `code` is null for syntax errors.
 */
export const RUFF_ISSUE_SCHEMA = z.object({
  code: z.string().nullable(),
  message: z.string(),
  filename: z.string(),
  location: RUFF_POSITION_SCHEMA,
  end_location: RUFF_POSITION_SCHEMA.nullable().optional(),
  fix: z
    .object({
      message: z.string().nullable().optional(),
      applicability: z.string().optional(),
    })
    .nullable()
    .optional(),
  url: z.string().nullable().optional(),
});

export const RUFF_OUTPUT_SCHEMA = z.array(RUFF_ISSUE_SCHEMA);

export type RuffIssue = z.infer<typeof RUFF_ISSUE_SCHEMA>;
export type RuffOutput = z.infer<typeof RUFF_OUTPUT_SCHEMA>;
