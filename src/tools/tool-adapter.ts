import { existsSync, statSync } from 'fs';
import * as path from 'path';
import { ToolStatus, type ToolReport } from '../analysis/types';
import {
  MalformedOutputError,
  ToolTimeoutError,
  ToolUnavailableError,
  handleUnknownError,
} from '../errors/index';
import { TARGET_PLACEHOLDER } from '../config/constants';
import { debug, warn } from '../output/logger';
import { runCommand } from './process-runner';
import { resolveSeverity } from './severity-policy';
import {
  OutputChannel,
  WorkingDirectory,
  type CommandRequest,
  type CommandRunner,
  type ToolCommand,
  type ToolAdapter,
  type ToolDefinition,
} from './types';

export function buildArgs(args: string[], target: string): string[] {
  return args.map((arg) => arg.split(TARGET_PLACEHOLDER).join(target));
}

export function resolveWorkingDirectory(mode: WorkingDirectory, target: string): string | undefined {
  if (mode === WorkingDirectory.Invocation) return undefined;
  const abs = path.resolve(target);
  return existsSync(abs) && statSync(abs).isDirectory() ? abs : path.dirname(abs);
}

export function toCommandRequest(definition: ToolCommand, target: string): CommandRequest {
  return {
    tool: definition.name,
    command: definition.command,
    args: buildArgs(definition.args, target),
    cwd: resolveWorkingDirectory(definition.cwd, target),
    timeoutMs: definition.timeoutMs,
  };
}

function statusForError(err: Error): ToolStatus {
  if (err instanceof ToolUnavailableError) return ToolStatus.NotFound;
  if (err instanceof ToolTimeoutError) return ToolStatus.TimedOut;
  if (err instanceof MalformedOutputError) return ToolStatus.ParseFailed;
  return ToolStatus.Failed;
}

/*
 * Runs one external tool described by a ToolDefinition and normalizes its
 * output. invoke() never rejects: every failure becomes a report with zero
 * diagnostics and a non-`ran` status.
 */
export class CommandToolAdapter implements ToolAdapter {
  constructor(
    private readonly definition: ToolDefinition,
    private readonly runner: CommandRunner = runCommand
  ) {}

  get name(): string {
    return this.definition.name;
  }

  get lock(): string | undefined {
    return this.definition.lock;
  }

  async invoke(target: string): Promise<ToolReport> {
    const def = this.definition;
    const source = def.source ?? def.name;
    const started = Date.now();

    try {
      const output = await this.runner(toCommandRequest(def, target));
      const text = def.channel === OutputChannel.Stderr ? output.stderr : output.stdout;
      const diagnostics = def.parser.parse(text, {
        source,
        severityOf: (signal) => resolveSeverity(def.severity, signal),
      });
      debug(`${def.name}: ${diagnostics.length} diagnostic(s), exit code ${String(output.exitCode)}`);
      return {
        tool: def.name,
        status: ToolStatus.Ran,
        diagnostics,
        durationMs: Date.now() - started,
      };
    } catch (e: unknown) {
      const err = handleUnknownError(e, `Running ${def.name}`);
      const status = statusForError(err);
      if (status === ToolStatus.NotFound) {
        debug(err.message);
      } else {
        warn(`[lintmux] Warning: ${err.message}`);
      }
      return {
        tool: def.name,
        status,
        diagnostics: [],
        durationMs: Date.now() - started,
        detail: err.message,
      };
    }
  }
}
