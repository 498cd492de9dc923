import type { Command } from 'commander';
import { parseLanguagesOptions } from '../boundaries/index';
import { handleUnknownError } from '../errors/index';
import { toJson } from '../output/json-formatter';
import { error, log, setSilentMode, setVerboseMode } from '../output/logger';
import { formatCount, printLanguageTable } from '../output/reporter';
import { ServiceTool } from '../service/service-tools';
import { loadEngine } from './engine';
import { OutputFormat } from './types';

export function registerLanguagesCommand(program: Command): void {
  program
    .command('languages')
    .description('Count source files per language in a directory')
    .argument('<directory>', 'directory to scan')
    .option('--output <format>', 'Output format: line (default) or json', 'line')
    .option('--config <path>', 'Path to a custom .lintmux.ini config file')
    .option('-v, --verbose', 'Enable verbose logging')
    .action(async (directory: string, rawOpts: unknown) => {
      let options;
      try {
        options = parseLanguagesOptions(rawOpts);
      } catch (e: unknown) {
        const err = handleUnknownError(e, 'Parsing languages command options');
        error(`Error: ${err.message}`);
        process.exit(1);
      }

      setVerboseMode(options.verbose);
      setSilentMode(options.output === OutputFormat.Json);

      let payload;
      try {
        const engine = loadEngine(options.config);
        payload = await engine.service.detectLanguages({ directory });
      } catch (e: unknown) {
        const err = handleUnknownError(e, `Running ${ServiceTool.DETECT_LANGUAGES}`);
        error(`Error: ${err.message}`);
        process.exit(1);
      }

      if (options.output === OutputFormat.Json) {
        console.log(toJson(payload));
        return;
      }

      printLanguageTable(payload.languages, payload.primary_language);
      const primary = payload.primary_language ?? 'none';
      log(`${formatCount(payload.total_files, 'file')}, primary language: ${primary}.`);
    });
}
