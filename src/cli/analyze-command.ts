import type { Command } from 'commander';
import { Severity } from '../analysis/types';
import { parseAnalyzeOptions } from '../boundaries/index';
import { handleUnknownError } from '../errors/index';
import { toAnalysisPayload, toJson } from '../output/json-formatter';
import { error, setSilentMode, setVerboseMode } from '../output/logger';
import { RdJsonFormatter } from '../output/rdjson-formatter';
import { printDiagnostics, printGlobalSummary, printToolStatuses } from '../output/reporter';
import { loadEngine } from './engine';
import { OutputFormat } from './types';

/*
 * Registers the 'analyze' command: runs every tool registered for the
 * target's language and reports the merged diagnostics.
 *
 * Note: process.exit is intentional in CLI commands to set proper exit codes.
 */
export function registerAnalyzeCommand(program: Command): void {
  program
    .command('analyze')
    .description('Run the analysis tools for a file or directory')
    .argument('<path>', 'file or directory to analyze')
    .option('--language <lang>', 'skip detection and analyze as this language')
    .option('--no-metrics', 'do not collect code metrics')
    .option('--output <format>', 'Output format: line (default), json, or rdjson', 'line')
    .option('--config <path>', 'Path to a custom .lintmux.ini config file')
    .option('-v, --verbose', 'Enable verbose logging')
    .action(async (target: string, rawOpts: unknown) => {
      let options;
      try {
        options = parseAnalyzeOptions(rawOpts);
      } catch (e: unknown) {
        const err = handleUnknownError(e, 'Parsing analyze command options');
        error(`Error: ${err.message}`);
        process.exit(1);
      }

      setVerboseMode(options.verbose);
      // Keep machine-readable output clean
      setSilentMode(options.output !== OutputFormat.Line);

      let engine;
      try {
        engine = loadEngine(options.config);
      } catch (e: unknown) {
        const err = handleUnknownError(e, 'Loading configuration');
        error(`Error: ${err.message}`);
        process.exit(1);
      }

      const includeMetrics = options.metrics && engine.config.includeMetrics;
      let result;
      try {
        result = await engine.dispatcher.analyze(target, {
          ...(options.language ? { language: options.language } : {}),
          includeMetrics,
        });
      } catch (e: unknown) {
        const err = handleUnknownError(e, 'Analyzing');
        error(`Error: ${err.message}`);
        process.exit(1);
      }

      switch (options.output) {
        case OutputFormat.Json:
          console.log(toJson(toAnalysisPayload(result, { includeMetrics })));
          break;
        case OutputFormat.RdJson: {
          const formatter = new RdJsonFormatter();
          formatter.addDiagnostics(result.diagnostics);
          console.log(formatter.toJson());
          break;
        }
        case OutputFormat.Line:
          printDiagnostics(result.diagnostics);
          printToolStatuses(result.tools);
          printGlobalSummary(result.language, result.filesAnalyzed, result.summary);
          break;
      }

      process.exit(result.summary[Severity.ERROR] > 0 ? 1 : 0);
    });
}
