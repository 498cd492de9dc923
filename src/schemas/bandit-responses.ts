import { z } from 'zod';

/**
 * Schema for a single bandit result. `col_offset` is 0-based.
 */
export const BANDIT_RESULT_SCHEMA = z.object({
  filename: z.string(),
  line_number: z.number(),
  col_offset: z.number().optional(),
  end_col_offset: z.number().optional(),
  issue_text: z.string(),
  issue_severity: z.string(),
  issue_confidence: z.string().optional(),
  test_id: z.string(),
  more_info: z.string().optional(),
});

/**
 * Schema for `bandit -f json` output. Only the results are read.
 */
export const BANDIT_OUTPUT_SCHEMA = z.object({
  results: z.array(BANDIT_RESULT_SCHEMA).default([]),
});

export type BanditResult = z.infer<typeof BANDIT_RESULT_SCHEMA>;
export type BanditOutput = z.infer<typeof BANDIT_OUTPUT_SCHEMA>;
