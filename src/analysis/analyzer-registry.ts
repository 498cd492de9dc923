import type { ToolSettings } from '../schemas/config-schemas';
import { BUILTIN_METRICS, BUILTIN_TOOLS } from '../tools/catalog';
import { CommandMetricsCollector } from '../tools/metrics-collector';
import { runCommand } from '../tools/process-runner';
import { CommandToolAdapter } from '../tools/tool-adapter';
import type { CommandRunner, ToolCommand, ToolDefinition, MetricsDefinition } from '../tools/types';
import { LanguageAnalyzer } from './analyzer';

/*
 * AnalyzerRegistry maps a language identifier to its analyzer.
 * A language may be registered only once.
 */
export class AnalyzerRegistry {
  private registry = new Map<string, LanguageAnalyzer>();

  register(analyzer: LanguageAnalyzer): void {
    if (this.registry.has(analyzer.language)) {
      throw new Error(`Analyzer for language '${analyzer.language}' is already registered`);
    }
    this.registry.set(analyzer.language, analyzer);
  }

  get(language: string): LanguageAnalyzer | undefined {
    return this.registry.get(language);
  }

  getRegisteredLanguages(): string[] {
    return Array.from(this.registry.keys());
  }
}

export interface RegistryOptions {
  tools?: readonly ToolDefinition[];
  metrics?: readonly MetricsDefinition[];
  settings?: Record<string, ToolSettings>;
  parallel?: boolean;
  runner?: CommandRunner;
}

function applySettings<T extends ToolCommand>(definition: T, settings: ToolSettings | undefined): T {
  if (!settings) return definition;
  return {
    ...definition,
    command: settings.command ?? definition.command,
    timeoutMs: settings.timeoutMs ?? definition.timeoutMs,
  };
}

function isEnabled(definition: ToolCommand, settings: Record<string, ToolSettings>): boolean {
  return settings[definition.name]?.enabled ?? true;
}

/*
 * Builds one analyzer per language from the tool catalog, in catalog order.
 * Disabled tools are left out; a language whose tools are all disabled is
 * not registered.
 */
export function createAnalyzerRegistry(options: RegistryOptions = {}): AnalyzerRegistry {
  const tools = options.tools ?? BUILTIN_TOOLS;
  const metrics = options.metrics ?? BUILTIN_METRICS;
  const settings = options.settings ?? {};
  const runner = options.runner ?? runCommand;

  const languages: string[] = [];
  for (const def of tools) {
    for (const language of def.languages) {
      if (!languages.includes(language)) languages.push(language);
    }
  }

  const registry = new AnalyzerRegistry();
  for (const language of languages) {
    const adapters = tools
      .filter((def) => def.languages.includes(language) && isEnabled(def, settings))
      .map((def) => new CommandToolAdapter(applySettings(def, settings[def.name]), runner));
    if (adapters.length === 0) continue;

    const collectors = metrics
      .filter((def) => def.languages.includes(language) && isEnabled(def, settings))
      .map((def) => new CommandMetricsCollector(applySettings(def, settings[def.name]), runner));

    registry.register(
      new LanguageAnalyzer(language, adapters, {
        metrics: collectors,
        parallel: options.parallel ?? true,
      })
    );
  }
  return registry;
}
