import { z } from 'zod';
import {
  ANALYZE_OPTIONS_SCHEMA,
  ERRORS_OPTIONS_SCHEMA,
  LANGUAGES_OPTIONS_SCHEMA,
  CALL_OPTIONS_SCHEMA,
  type AnalyzeOptions,
  type ErrorsOptions,
  type LanguagesOptions,
  type CallOptions,
} from '../schemas/cli-schemas';
import { ValidationError, handleUnknownError } from '../errors/index';

function parseWith<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, raw: unknown, label: string): T {
  try {
    return schema.parse(raw);
  } catch (e: unknown) {
    if (e instanceof z.ZodError) {
      throw new ValidationError(`Invalid ${label}: ${e.message}`);
    }
    const err = handleUnknownError(e, `${label} parsing`);
    throw new ValidationError(`${label} parsing failed: ${err.message}`);
  }
}

export function parseAnalyzeOptions(raw: unknown): AnalyzeOptions {
  return parseWith(ANALYZE_OPTIONS_SCHEMA, raw, 'analyze options');
}

export function parseErrorsOptions(raw: unknown): ErrorsOptions {
  return parseWith(ERRORS_OPTIONS_SCHEMA, raw, 'errors options');
}

export function parseLanguagesOptions(raw: unknown): LanguagesOptions {
  return parseWith(LANGUAGES_OPTIONS_SCHEMA, raw, 'languages options');
}

export function parseCallOptions(raw: unknown): CallOptions {
  return parseWith(CALL_OPTIONS_SCHEMA, raw, 'call options');
}

export function parseRequest<T>(
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  raw: unknown,
  tool: string
): T {
  return parseWith(schema, raw, `${tool} arguments`);
}
