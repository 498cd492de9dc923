import { z } from 'zod';
import { Severity } from '../analysis/types';
import { DEFAULT_MAX_RESULTS } from '../config/constants';

export const ANALYZE_CODEBASE_REQUEST_SCHEMA = z.object({
  path: z.string().min(1).describe('Path to the file or directory to analyze'),
  language: z
    .string()
    .min(1)
    .optional()
    .describe('Language of the target (auto-detected if omitted)'),
  include_metrics: z
    .boolean()
    .default(true)
    .describe('Include code metrics collected by metrics tools'),
});

export const GET_ERROR_LIST_REQUEST_SCHEMA = z.object({
  path: z.string().min(1).describe('Path to analyze'),
  min_severity: z
    .nativeEnum(Severity)
    .default(Severity.WARNING)
    .describe('Minimum severity to include'),
  max_results: z
    .number()
    .int()
    .nonnegative()
    .default(DEFAULT_MAX_RESULTS)
    .describe('Maximum number of diagnostics to return'),
});

export const DETECT_LANGUAGES_REQUEST_SCHEMA = z.object({
  directory: z.string().min(1).describe('Project directory path'),
});

export type AnalyzeCodebaseRequest = z.infer<typeof ANALYZE_CODEBASE_REQUEST_SCHEMA>;
export type GetErrorListRequest = z.infer<typeof GET_ERROR_LIST_REQUEST_SCHEMA>;
export type DetectLanguagesRequest = z.infer<typeof DETECT_LANGUAGES_REQUEST_SCHEMA>;
