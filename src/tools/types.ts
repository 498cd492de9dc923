import type { z } from 'zod';
import type { Diagnostic, Metrics, Severity, ToolReport } from '../analysis/types';

export enum OutputChannel {
  Stdout = 'stdout',
  Stderr = 'stderr',
}

export enum WorkingDirectory {
  // Inherit the working directory of the lintmux process
  Invocation = 'invocation',
  // The target itself when it is a directory, else its parent directory
  TargetDir = 'target-dir',
}

export enum ToolOutputFormat {
  Json = 'json',
  JsonLines = 'json-lines',
  Pattern = 'pattern',
}

/*
 * Maps a tool's native severity signal (a tag, a numeric level, a derived
 * flag) to a Severity. Signals missing from the table take the fallback.
 */
export interface SeverityPolicy {
  table: Readonly<Record<string, Severity>>;
  fallback: Severity;
}

export type SeveritySignal = string | number | boolean | null | undefined;

export interface ParseContext {
  source: string;
  severityOf(signal: SeveritySignal): Severity;
}

export interface OutputParser {
  readonly format: ToolOutputFormat;
  parse(output: string, context: ParseContext): Diagnostic[];
}

export interface ToolCommand {
  name: string;
  languages: string[];
  command: string;
  /** Arguments; `{target}` is replaced with the analysis target. */
  args: string[];
  cwd: WorkingDirectory;
  channel: OutputChannel;
  timeoutMs: number;
  /** Tools sharing a lock never run at the same time. */
  lock?: string;
}

/*
 * Declarative description of one external analysis tool. Adding a tool is
 * adding one of these to the catalog.
 */
export interface ToolDefinition extends ToolCommand {
  /** Name reported in Diagnostic.source; defaults to `name`. */
  source?: string;
  severity: SeverityPolicy;
  parser: OutputParser;
}

export interface MetricsDefinition extends ToolCommand {
  schema: z.ZodType<Metrics, z.ZodTypeDef, unknown>;
}

export interface ToolAdapter {
  readonly name: string;
  readonly lock?: string;
  invoke(target: string): Promise<ToolReport>;
}

export interface MetricsCollector {
  readonly name: string;
  /** Resolves to undefined when the metrics could not be collected. */
  collect(target: string): Promise<Metrics | undefined>;
}

export interface CommandRequest {
  tool: string;
  command: string;
  args: string[];
  cwd?: string;
  timeoutMs: number;
}

export interface CommandOutput {
  exitCode: number | null;
  stdout: string;
  stderr: string;
}

/*
 * Runs one command to completion. Rejects with ToolUnavailableError,
 * ToolTimeoutError or ProcessingError.
 */
export type CommandRunner = (request: CommandRequest) => Promise<CommandOutput>;
