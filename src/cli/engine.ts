import { createAnalyzerRegistry } from '../analysis/analyzer-registry';
import { Dispatcher } from '../analysis/dispatcher';
import { loadConfig } from '../boundaries/config-loader';
import type { Config } from '../schemas/config-schemas';
import { AnalysisService } from '../service/analysis-service';
import type { CommandRunner } from '../tools/types';

export interface Engine {
  config: Config;
  dispatcher: Dispatcher;
  service: AnalysisService;
}

/*
 * Wires configuration into the registry, dispatcher and service used by
 * every command.
 */
export function createEngine(config: Config, runner?: CommandRunner): Engine {
  const registry = createAnalyzerRegistry({
    settings: config.tools,
    parallel: config.parallelTools,
    ...(runner ? { runner } : {}),
  });
  const scanOptions = { ignore: config.ignore };
  const dispatcher = new Dispatcher(registry, scanOptions);
  const service = new AnalysisService(dispatcher, { ...scanOptions, includeMetrics: config.includeMetrics });
  return { config, dispatcher, service };
}

export function loadEngine(configPath?: string): Engine {
  return createEngine(loadConfig(process.cwd(), configPath));
}
