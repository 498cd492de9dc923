import type { Command } from 'commander';
import { parseCallOptions } from '../boundaries/index';
import { ValidationError, handleUnknownError } from '../errors/index';
import { toJson } from '../output/json-formatter';
import { error, setSilentMode, setVerboseMode } from '../output/logger';
import { loadEngine } from './engine';

export function parseCallArguments(raw: string | undefined): unknown {
  if (raw === undefined || raw.trim() === '') return {};
  try {
    return JSON.parse(raw);
  } catch (e: unknown) {
    const err = handleUnknownError(e, 'Parsing call arguments');
    throw new ValidationError(`Call arguments must be a JSON object: ${err.message}`);
  }
}

/*
 * Registers the 'call' command: invokes a service call by name and prints
 * its { success, data | error } envelope as JSON.
 */
export function registerCallCommand(program: Command): void {
  program
    .command('call')
    .description('Invoke analyze_codebase, get_error_list or detect_languages with JSON arguments')
    .argument('<tool>', 'service call name')
    .argument('[json-args]', 'call arguments as a JSON object')
    .option('--config <path>', 'Path to a custom .lintmux.ini config file')
    .option('-v, --verbose', 'Enable verbose logging')
    .action(async (tool: string, jsonArgs: string | undefined, rawOpts: unknown) => {
      let options;
      let args;
      try {
        options = parseCallOptions(rawOpts);
        args = parseCallArguments(jsonArgs);
      } catch (e: unknown) {
        const err = handleUnknownError(e, 'Parsing call command options');
        error(`Error: ${err.message}`);
        process.exit(1);
      }

      setVerboseMode(options.verbose);
      setSilentMode(true);

      let engine;
      try {
        engine = loadEngine(options.config);
      } catch (e: unknown) {
        const err = handleUnknownError(e, 'Loading configuration');
        error(`Error: ${err.message}`);
        process.exit(1);
      }

      const envelope = await engine.service.handleToolCall(tool, args);
      console.log(toJson(envelope));
      process.exit(envelope.success ? 0 : 1);
    });
}
