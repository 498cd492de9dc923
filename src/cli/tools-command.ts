import type { Command } from 'commander';
import chalk from 'chalk';
import { BUILTIN_METRICS, BUILTIN_TOOLS } from '../tools/catalog';
import type { ToolCommand } from '../tools/types';

function describeCommand(definition: ToolCommand): string {
  return [definition.command, ...definition.args].join(' ');
}

/*
 * Lists the built-in tool catalog grouped by language, in the order the
 * analyzers run them.
 */
export function registerToolsCommand(program: Command): void {
  program
    .command('tools')
    .description('List the analysis tools registered for each language')
    .action(() => {
      const metricsNames = new Set(BUILTIN_METRICS.map((def) => def.name));
      const byLanguage = new Map<string, ToolCommand[]>();
      for (const def of [...BUILTIN_TOOLS, ...BUILTIN_METRICS]) {
        for (const language of def.languages) {
          const group = byLanguage.get(language) || [];
          group.push(def);
          byLanguage.set(language, group);
        }
      }

      for (const [language, tools] of byLanguage) {
        console.log(chalk.bold(language));
        const width = Math.max(...tools.map((t) => t.name.length)) + 2;
        for (const tool of tools) {
          const metrics = metricsNames.has(tool.name) ? chalk.dim(' (metrics)') : '';
          console.log(`  ${chalk.cyan(tool.name.padEnd(width, ' '))}${describeCommand(tool)}  ${chalk.dim(`${tool.timeoutMs / 1000}s`)}${metrics}`);
        }
        console.log('');
      }
    });
}
