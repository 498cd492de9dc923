import {
  Severity,
  type AnalysisResult,
  type Diagnostic,
  type Metrics,
  type SeveritySummary,
  type ToolSummary,
} from './types';

export function emptySummary(): SeveritySummary {
  return {
    [Severity.ERROR]: 0,
    [Severity.WARNING]: 0,
    [Severity.INFO]: 0,
    [Severity.HINT]: 0,
  };
}

/*
 * Builds the immutable result for one request. filesAnalyzed counts the
 * distinct files that have at least one diagnostic.
 */
export function synthesize(
  language: string,
  diagnostics: readonly Diagnostic[],
  metrics: Metrics = {},
  tools: readonly ToolSummary[] = []
): AnalysisResult {
  const summary = emptySummary();
  const files = new Set<string>();
  for (const diagnostic of diagnostics) {
    summary[diagnostic.severity] += 1;
    files.add(diagnostic.location.file);
  }

  return Object.freeze({
    language,
    filesAnalyzed: files.size,
    diagnostics: Object.freeze([...diagnostics]),
    metrics,
    summary: Object.freeze(summary),
    tools: Object.freeze([...tools]),
  });
}

export function emptyResult(language: string): AnalysisResult {
  return synthesize(language, []);
}
