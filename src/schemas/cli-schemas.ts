import { z } from 'zod';
import { OutputFormat } from '../cli/types';
import { Severity } from '../analysis/types';
import { DEFAULT_MAX_RESULTS } from '../config/constants';

// rdjson carries per-diagnostic locations, so only analyze supports it
const REPORT_FORMAT_SCHEMA = z
  .nativeEnum(OutputFormat)
  .refine((format) => format !== OutputFormat.RdJson, {
    message: 'Output format must be line or json',
  });

// Options shared by every command
const COMMON_OPTIONS_SCHEMA = z.object({
  verbose: z.boolean().default(false),
  config: z.string().optional(),
});

// analyze command options
export const ANALYZE_OPTIONS_SCHEMA = COMMON_OPTIONS_SCHEMA.extend({
  language: z.string().min(1).optional(),
  // commander sets this from --no-metrics
  metrics: z.boolean().default(true),
  output: z.nativeEnum(OutputFormat).default(OutputFormat.Line),
});

// errors command options
export const ERRORS_OPTIONS_SCHEMA = COMMON_OPTIONS_SCHEMA.extend({
  minSeverity: z.nativeEnum(Severity).default(Severity.WARNING),
  maxResults: z.coerce.number().int().nonnegative().default(DEFAULT_MAX_RESULTS),
  output: REPORT_FORMAT_SCHEMA.default(OutputFormat.Line),
});

// languages command options
export const LANGUAGES_OPTIONS_SCHEMA = COMMON_OPTIONS_SCHEMA.extend({
  output: REPORT_FORMAT_SCHEMA.default(OutputFormat.Line),
});

// call and tools command options
export const CALL_OPTIONS_SCHEMA = COMMON_OPTIONS_SCHEMA;

// Inferred types
export type AnalyzeOptions = z.infer<typeof ANALYZE_OPTIONS_SCHEMA>;
export type ErrorsOptions = z.infer<typeof ERRORS_OPTIONS_SCHEMA>;
export type LanguagesOptions = z.infer<typeof LANGUAGES_OPTIONS_SCHEMA>;
export type CallOptions = z.infer<typeof CALL_OPTIONS_SCHEMA>;
