/*
 * Shared data model for the diagnostic aggregation engine.
 * Every entity here is built fresh per request and never cached.
 */

export enum Severity {
  HINT = 'hint',
  INFO = 'info',
  WARNING = 'warning',
  ERROR = 'error',
}

// Ordinal used for threshold comparison and ranking
export const SEVERITY_ORDER: Readonly<Record<Severity, number>> = {
  [Severity.ERROR]: 3,
  [Severity.WARNING]: 2,
  [Severity.INFO]: 1,
  [Severity.HINT]: 0,
};

/*
 * Line and column follow the emitting tool's convention; columns are
 * 1-based for most tools but 0-based for bandit. They are not renormalized.
 */
export interface CodeLocation {
  readonly file: string;
  readonly line: number;
  readonly column: number;
  readonly endLine?: number;
  readonly endColumn?: number;
}

export interface Diagnostic {
  readonly message: string;
  readonly severity: Severity;
  readonly location: CodeLocation;
  /** Rule or error code reported by the tool, e.g. `E501` or `TS2322`. */
  readonly code?: string;
  /** Name of the tool that produced the finding. */
  readonly source?: string;
  readonly suggestion?: string;
  readonly related?: readonly CodeLocation[];
}

export enum ToolStatus {
  Ran = 'ran',
  NotFound = 'not-found',
  TimedOut = 'timed-out',
  ParseFailed = 'parse-failed',
  Failed = 'failed',
}

export interface ToolReport {
  tool: string;
  status: ToolStatus;
  diagnostics: Diagnostic[];
  durationMs: number;
  detail?: string;
}

export type ToolSummary = Omit<ToolReport, 'diagnostics'>;

export type SeveritySummary = Record<Severity, number>;

export type Metrics = Record<string, unknown>;

export interface AnalysisResult {
  readonly language: string;
  /** Distinct files among the diagnostics, not the number of files scanned. */
  readonly filesAnalyzed: number;
  readonly diagnostics: readonly Diagnostic[];
  readonly metrics: Metrics;
  readonly summary: Readonly<SeveritySummary>;
  readonly tools: readonly ToolSummary[];
}

export const UNKNOWN_LANGUAGE = 'unknown';
