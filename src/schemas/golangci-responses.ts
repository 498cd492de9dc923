import { z } from 'zod';

export const GOLANGCI_ISSUE_SCHEMA = z.object({
  FromLinter: z.string().optional(),
  Text: z.string(),
  Severity: z.string().optional(),
  Pos: z.object({
    Filename: z.string(),
    Line: z.number(),
    Column: z.number(),
  }),
});

/**
 * Schema for `golangci-lint run --out-format=json`.
 * `Issues` is null when the run is clean.
 */
export const GOLANGCI_OUTPUT_SCHEMA = z.object({
  Issues: z.array(GOLANGCI_ISSUE_SCHEMA).nullable().optional(),
});

export type GolangciIssue = z.infer<typeof GOLANGCI_ISSUE_SCHEMA>;
export type GolangciOutput = z.infer<typeof GOLANGCI_OUTPUT_SCHEMA>;
