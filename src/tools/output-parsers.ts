import type { z } from 'zod';
import { MalformedOutputError } from '../errors/index';
import type { Diagnostic } from '../analysis/types';
import { ToolOutputFormat, type OutputParser, type ParseContext } from './types';

const PREVIEW_LENGTH = 500;

function preview(output: string): string {
  return output.length > PREVIEW_LENGTH ? `${output.substring(0, PREVIEW_LENGTH)}...` : output;
}

/*
 * The whole output is one JSON document. Invalid JSON, or JSON that does
 * not match the schema, is a MalformedOutputError. Empty output means the
 * tool had nothing to report.
 */
export function jsonDocument<T>(
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  toDiagnostics: (document: T, context: ParseContext) => Diagnostic[]
): OutputParser {
  return {
    format: ToolOutputFormat.Json,
    parse(output: string, context: ParseContext): Diagnostic[] {
      const text = output.trim();
      if (!text) return [];

      let raw: unknown;
      try {
        raw = JSON.parse(text);
      } catch (e: unknown) {
        const message = e instanceof Error ? e.message : String(e);
        throw new MalformedOutputError(`${context.source}: invalid JSON output: ${message}`, preview(text));
      }

      const parsed = schema.safeParse(raw);
      if (!parsed.success) {
        throw new MalformedOutputError(
          `${context.source}: unexpected output shape: ${parsed.error.message}`,
          preview(text)
        );
      }
      return toDiagnostics(parsed.data, context);
    },
  };
}

function parseJsonLine(line: string): unknown {
  try {
    return JSON.parse(line);
  } catch {
    return undefined;
  }
}

/*
 * One JSON record per line. Lines that are not JSON or do not match the
 * schema are skipped; they are progress chatter, not findings.
 */
export function jsonLines<T>(
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  toDiagnostics: (record: T, context: ParseContext) => Diagnostic[]
): OutputParser {
  return {
    format: ToolOutputFormat.JsonLines,
    parse(output: string, context: ParseContext): Diagnostic[] {
      const diagnostics: Diagnostic[] = [];
      for (const rawLine of output.split(/\r?\n/)) {
        const line = rawLine.trim();
        if (!line) continue;
        const parsed = schema.safeParse(parseJsonLine(line));
        if (!parsed.success) continue;
        diagnostics.push(...toDiagnostics(parsed.data, context));
      }
      return diagnostics;
    },
  };
}

export interface PatternOptions {
  /** Prepended to the captured `code` group. */
  codePrefix?: string;
}

/*
 * Text output matched line by line. The expression must capture the named
 * groups `file`, `line`, `column` and `message`; `severity` and `code` are
 * optional. Lines that do not match are ignored.
 */
export function linePattern(pattern: RegExp, options: PatternOptions = {}): OutputParser {
  return {
    format: ToolOutputFormat.Pattern,
    parse(output: string, context: ParseContext): Diagnostic[] {
      const diagnostics: Diagnostic[] = [];
      for (const line of output.split(/\r?\n/)) {
        const groups = pattern.exec(line)?.groups;
        if (!groups) continue;
        const { file, message } = groups;
        const lineNo = Number(groups.line);
        const column = Number(groups.column);
        if (!file || !message || !Number.isFinite(lineNo) || !Number.isFinite(column)) continue;

        diagnostics.push({
          message,
          severity: context.severityOf(groups.severity),
          location: { file, line: lineNo, column },
          code: groups.code ? `${options.codePrefix ?? ''}${groups.code}` : undefined,
          source: context.source,
        });
      }
      return diagnostics;
    },
  };
}
