import type { Metrics } from '../analysis/types';
import { handleUnknownError } from '../errors/index';
import { debug } from '../output/logger';
import { runCommand } from './process-runner';
import { toCommandRequest } from './tool-adapter';
import type { CommandRunner, MetricsCollector, MetricsDefinition } from './types';

/*
 * Collects an opaque JSON metrics blob from an external tool. Any failure
 * means "no metrics" and is only visible in verbose mode.
 */
export class CommandMetricsCollector implements MetricsCollector {
  constructor(
    private readonly definition: MetricsDefinition,
    private readonly runner: CommandRunner = runCommand
  ) {}

  get name(): string {
    return this.definition.name;
  }

  async collect(target: string): Promise<Metrics | undefined> {
    const def = this.definition;
    try {
      const output = await this.runner(toCommandRequest(def, target));
      const text = output.stdout.trim();
      if (!text) return undefined;
      const parsed = def.schema.safeParse(JSON.parse(text));
      if (!parsed.success) {
        debug(`${def.name}: unexpected metrics shape: ${parsed.error.message}`);
        return undefined;
      }
      return parsed.data;
    } catch (e: unknown) {
      const err = handleUnknownError(e, `Collecting ${def.name} metrics`);
      debug(`${def.name}: metrics unavailable: ${err.message}`);
      return undefined;
    }
  }
}
