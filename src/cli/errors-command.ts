import type { Command } from 'commander';
import { filterAndRank } from '../analysis/severity-filter';
import { Severity } from '../analysis/types';
import { parseErrorsOptions } from '../boundaries/index';
import { handleUnknownError } from '../errors/index';
import { toErrorListPayload, toJson } from '../output/json-formatter';
import { error, log, setSilentMode, setVerboseMode } from '../output/logger';
import { formatCount, printDiagnostics } from '../output/reporter';
import { loadEngine } from './engine';
import { OutputFormat } from './types';

/*
 * Registers the 'errors' command: the most severe diagnostics for a
 * target, filtered by a minimum severity and capped in number.
 */
export function registerErrorsCommand(program: Command): void {
  program
    .command('errors')
    .description('List diagnostics at or above a severity, most severe first')
    .argument('<path>', 'file or directory to analyze')
    .option('--min-severity <level>', 'lowest severity to report: error, warning, info or hint', 'warning')
    .option('--max-results <n>', 'maximum number of diagnostics to report', '50')
    .option('--output <format>', 'Output format: line (default) or json', 'line')
    .option('--config <path>', 'Path to a custom .lintmux.ini config file')
    .option('-v, --verbose', 'Enable verbose logging')
    .action(async (target: string, rawOpts: unknown) => {
      let options;
      try {
        options = parseErrorsOptions(rawOpts);
      } catch (e: unknown) {
        const err = handleUnknownError(e, 'Parsing errors command options');
        error(`Error: ${err.message}`);
        process.exit(1);
      }

      setVerboseMode(options.verbose);
      setSilentMode(options.output === OutputFormat.Json);

      let ranked;
      try {
        const engine = loadEngine(options.config);
        const result = await engine.dispatcher.analyze(target, { includeMetrics: false });
        ranked = filterAndRank(result, {
          minSeverity: options.minSeverity,
          maxResults: options.maxResults,
        });
      } catch (e: unknown) {
        const err = handleUnknownError(e, 'Listing errors');
        error(`Error: ${err.message}`);
        process.exit(1);
      }

      if (options.output === OutputFormat.Json) {
        console.log(toJson(toErrorListPayload(ranked)));
      } else {
        printDiagnostics(ranked.diagnostics);
        log(
          `Showing ${formatCount(ranked.filteredCount, 'diagnostic')} of ${ranked.totalDiagnostics} (${options.minSeverity} and above).`
        );
      }

      const hasErrors = ranked.diagnostics.some((d) => d.severity === Severity.ERROR);
      process.exit(hasErrors ? 1 : 0);
    });
}
