import type { RankedDiagnostics } from '../analysis/severity-filter';
import type {
  AnalysisResult,
  CodeLocation,
  Diagnostic,
  Metrics,
  Severity,
  SeveritySummary,
  ToolStatus,
  ToolSummary,
} from '../analysis/types';
import type { LanguageCounts } from '../language/language-detector';

/*
 * Wire shapes of the service calls. Keys are snake_case and absent optional
 * values are serialized as null.
 */

export interface LocationPayload {
  file: string;
  line: number;
  column: number;
  end_line: number | null;
  end_column: number | null;
}

export interface DiagnosticPayload {
  message: string;
  severity: Severity;
  location: LocationPayload;
  code: string | null;
  source: string | null;
  suggestion: string | null;
}

export interface ToolSummaryPayload {
  tool: string;
  status: ToolStatus;
  duration_ms: number;
  detail: string | null;
}

export interface AnalysisPayload {
  language: string;
  files_analyzed: number;
  summary: SeveritySummary;
  diagnostics: DiagnosticPayload[];
  metrics?: Metrics;
  tools: ToolSummaryPayload[];
}

export interface ErrorListEntryPayload {
  message: string;
  severity: Severity;
  /** `file:line:column` */
  location: string;
  code: string | null;
  source: string | null;
  suggestion: string | null;
}

export interface ErrorListPayload {
  total_diagnostics: number;
  filtered_count: number;
  diagnostics: ErrorListEntryPayload[];
}

export interface LanguagesPayload {
  languages: LanguageCounts;
  primary_language: string | null;
  total_files: number;
}

export function formatLocation(location: CodeLocation): string {
  return `${location.file}:${location.line}:${location.column}`;
}

function toLocationPayload(location: CodeLocation): LocationPayload {
  return {
    file: location.file,
    line: location.line,
    column: location.column,
    end_line: location.endLine ?? null,
    end_column: location.endColumn ?? null,
  };
}

export function toDiagnosticPayload(diagnostic: Diagnostic): DiagnosticPayload {
  return {
    message: diagnostic.message,
    severity: diagnostic.severity,
    location: toLocationPayload(diagnostic.location),
    code: diagnostic.code ?? null,
    source: diagnostic.source ?? null,
    suggestion: diagnostic.suggestion ?? null,
  };
}

function toToolSummaryPayload(tool: ToolSummary): ToolSummaryPayload {
  return {
    tool: tool.tool,
    status: tool.status,
    duration_ms: tool.durationMs,
    detail: tool.detail ?? null,
  };
}

export function toAnalysisPayload(
  result: AnalysisResult,
  options: { includeMetrics?: boolean } = {}
): AnalysisPayload {
  const payload: AnalysisPayload = {
    language: result.language,
    files_analyzed: result.filesAnalyzed,
    summary: { ...result.summary },
    diagnostics: result.diagnostics.map(toDiagnosticPayload),
    tools: result.tools.map(toToolSummaryPayload),
  };
  if (options.includeMetrics ?? true) {
    payload.metrics = result.metrics;
  }
  return payload;
}

export function toErrorListPayload(ranked: RankedDiagnostics): ErrorListPayload {
  return {
    total_diagnostics: ranked.totalDiagnostics,
    filtered_count: ranked.filteredCount,
    diagnostics: ranked.diagnostics.map((d) => ({
      message: d.message,
      severity: d.severity,
      location: formatLocation(d.location),
      code: d.code ?? null,
      source: d.source ?? null,
      suggestion: d.suggestion ?? null,
    })),
  };
}

export function toJson(payload: unknown): string {
  return JSON.stringify(payload, null, 2);
}
