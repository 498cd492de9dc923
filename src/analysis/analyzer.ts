import type { MetricsCollector, ToolAdapter } from '../tools/types';
import { synthesize } from './result-synthesizer';
import type { AnalysisResult, Metrics, ToolReport, ToolSummary } from './types';

export interface AnalyzerOptions {
  metrics?: MetricsCollector[];
  /** Run sibling tools concurrently; false runs them one after another. */
  parallel?: boolean;
}

export interface AnalyzerRunOptions {
  includeMetrics?: boolean;
}

function toSummary(report: ToolReport): ToolSummary {
  const summary: ToolSummary = {
    tool: report.tool,
    status: report.status,
    durationMs: report.durationMs,
  };
  if (report.detail !== undefined) summary.detail = report.detail;
  return summary;
}

/*
 * Runs the tools registered for one language and merges their findings.
 * Diagnostics are concatenated in adapter order whether or not the tools
 * ran concurrently.
 */
export class LanguageAnalyzer {
  private readonly metrics: MetricsCollector[];
  private readonly parallel: boolean;

  constructor(
    readonly language: string,
    private readonly adapters: ToolAdapter[],
    options: AnalyzerOptions = {}
  ) {
    this.metrics = options.metrics ?? [];
    this.parallel = options.parallel ?? true;
  }

  get toolNames(): string[] {
    return this.adapters.map((adapter) => adapter.name);
  }

  get metricsNames(): string[] {
    return this.metrics.map((collector) => collector.name);
  }

  async run(target: string, options: AnalyzerRunOptions = {}): Promise<AnalysisResult> {
    const reports = await this.invokeAll(target);
    const diagnostics = reports.flatMap((report) => report.diagnostics);
    const metrics = options.includeMetrics === false ? {} : await this.collectMetrics(target);
    return synthesize(this.language, diagnostics, metrics, reports.map(toSummary));
  }

  private async invokeAll(target: string): Promise<ToolReport[]> {
    if (this.parallel) {
      // Adapters with the same lock are chained; the rest start at once
      const chains = new Map<string, Promise<unknown>>();
      return Promise.all(
        this.adapters.map((adapter) => {
          if (adapter.lock === undefined) return adapter.invoke(target);
          const next = (chains.get(adapter.lock) ?? Promise.resolve()).then(() => adapter.invoke(target));
          chains.set(adapter.lock, next);
          return next;
        })
      );
    }
    const reports: ToolReport[] = [];
    for (const adapter of this.adapters) {
      reports.push(await adapter.invoke(target));
    }
    return reports;
  }

  private async collectMetrics(target: string): Promise<Metrics> {
    const metrics: Metrics = {};
    for (const collector of this.metrics) {
      const collected = await collector.collect(target);
      if (collected !== undefined) metrics[collector.name] = collected;
    }
    return metrics;
  }
}
