import { z } from 'zod';

/**
 * Schema for one ESLint message. Messages about ignored files carry no
 * position, so line and column fall back to 1.
 */
export const ESLINT_MESSAGE_SCHEMA = z.object({
  ruleId: z.string().nullable().optional(),
  severity: z.number(),
  message: z.string(),
  line: z.number().default(1),
  column: z.number().default(1),
  endLine: z.number().optional(),
  endColumn: z.number().optional(),
  fix: z
    .object({
      range: z.tuple([z.number(), z.number()]),
      text: z.string(),
    })
    .optional(),
});

export const ESLINT_FILE_RESULT_SCHEMA = z.object({
  filePath: z.string(),
  messages: z.array(ESLINT_MESSAGE_SCHEMA).default([]),
});

/**
 * Schema for `eslint --format=json` output: one entry per linted file.
 */
export const ESLINT_OUTPUT_SCHEMA = z.array(ESLINT_FILE_RESULT_SCHEMA);

export type EslintMessage = z.infer<typeof ESLINT_MESSAGE_SCHEMA>;
export type EslintOutput = z.infer<typeof ESLINT_OUTPUT_SCHEMA>;
