import { DEFAULT_MAX_RESULTS } from '../config/constants';
import { SEVERITY_ORDER, Severity, type AnalysisResult, type Diagnostic } from './types';

export interface FilterOptions {
  minSeverity?: Severity;
  maxResults?: number;
}

export interface RankedDiagnostics {
  totalDiagnostics: number;
  filteredCount: number;
  diagnostics: Diagnostic[];
}

/*
 * Keeps diagnostics at or above the threshold, most severe first. The sort
 * is stable, so equal severities keep their original order.
 */
export function filterAndRank(
  result: Pick<AnalysisResult, 'diagnostics'>,
  options: FilterOptions = {}
): RankedDiagnostics {
  const threshold = SEVERITY_ORDER[options.minSeverity ?? Severity.WARNING];
  const maxResults = Math.max(0, options.maxResults ?? DEFAULT_MAX_RESULTS);

  const ranked = result.diagnostics
    .filter((d) => SEVERITY_ORDER[d.severity] >= threshold)
    .sort((a, b) => SEVERITY_ORDER[b.severity] - SEVERITY_ORDER[a.severity])
    .slice(0, maxResults);

  return {
    totalDiagnostics: result.diagnostics.length,
    filteredCount: ranked.length,
    diagnostics: ranked,
  };
}
