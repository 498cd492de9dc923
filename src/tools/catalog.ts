import { Severity, type Diagnostic } from '../analysis/types';
import { TARGET_PLACEHOLDER as TARGET } from '../config/constants';
import { RUFF_OUTPUT_SCHEMA } from '../schemas/ruff-responses';
import { BANDIT_OUTPUT_SCHEMA } from '../schemas/bandit-responses';
import { ESLINT_OUTPUT_SCHEMA } from '../schemas/eslint-responses';
import { GOLANGCI_OUTPUT_SCHEMA } from '../schemas/golangci-responses';
import { CARGO_RECORD_SCHEMA, type CargoRecord } from '../schemas/cargo-responses';
import { RADON_OUTPUT_SCHEMA } from '../schemas/radon-responses';
import { jsonDocument, jsonLines, linePattern } from './output-parsers';
import {
  OutputChannel,
  WorkingDirectory,
  type MetricsDefinition,
  type ParseContext,
  type SeverityPolicy,
  type ToolDefinition,
} from './types';

const MYPY_LINE = /^(?<file>.+?):(?<line>\d+):(?<column>\d+): (?<severity>\w+): (?<message>.+)$/;
const TSC_LINE = /^(?<file>.+?)\((?<line>\d+),(?<column>\d+)\): (?<severity>error|warning) (?<code>TS\d+): (?<message>.+)$/;
const GO_VET_LINE = /^(?<file>.+?):(?<line>\d+):(?<column>\d+): (?<message>.+)$/;

// Compiler message levels pass straight through
const RUSTC_LEVELS: SeverityPolicy = {
  table: {
    'error': Severity.ERROR,
    'error: internal compiler error': Severity.ERROR,
    'warning': Severity.WARNING,
    'note': Severity.INFO,
    'failure-note': Severity.INFO,
    'help': Severity.HINT,
  },
  fallback: Severity.WARNING,
};

/*
 * One diagnostic per primary span of a compiler message. Build-progress
 * records (artifacts, build scripts, build-finished) carry no message.
 */
function cargoDiagnostics(record: CargoRecord, context: ParseContext): Diagnostic[] {
  const message = record.message;
  if (record.reason !== 'compiler-message' || !message) return [];

  const help = message.children.find((child) => child.level === 'help');
  return message.spans
    .filter((span) => span.is_primary)
    .map((span) => ({
      message: message.message,
      severity: context.severityOf(message.level),
      location: {
        file: span.file_name,
        line: span.line_start,
        column: span.column_start,
        endLine: span.line_end,
        endColumn: span.column_end,
      },
      code: message.code?.code,
      source: context.source,
      suggestion: help?.message ?? span.suggested_replacement ?? undefined,
    }));
}

export const BUILTIN_TOOLS: readonly ToolDefinition[] = [
  {
    name: 'ruff',
    languages: ['python'],
    command: 'ruff',
    args: ['check', TARGET, '--output-format=json'],
    cwd: WorkingDirectory.Invocation,
    channel: OutputChannel.Stdout,
    timeoutMs: 30_000,
    // Fixable findings are style issues; unfixable ones need attention
    severity: {
      table: { fixable: Severity.WARNING, unfixable: Severity.ERROR },
      fallback: Severity.ERROR,
    },
    parser: jsonDocument(RUFF_OUTPUT_SCHEMA, (issues, context) =>
      issues.map((issue) => ({
        message: issue.message,
        severity: context.severityOf(issue.fix ? 'fixable' : 'unfixable'),
        location: {
          file: issue.filename,
          line: issue.location.row,
          column: issue.location.column,
          endLine: issue.end_location?.row,
          endColumn: issue.end_location?.column,
        },
        code: issue.code ?? undefined,
        source: context.source,
        suggestion: issue.fix?.message ?? undefined,
      }))
    ),
  },
  {
    name: 'mypy',
    languages: ['python'],
    command: 'mypy',
    args: [TARGET, '--show-column-numbers', '--no-error-summary'],
    cwd: WorkingDirectory.Invocation,
    channel: OutputChannel.Stdout,
    timeoutMs: 30_000,
    severity: { table: { error: Severity.ERROR }, fallback: Severity.WARNING },
    parser: linePattern(MYPY_LINE),
  },
  {
    name: 'bandit',
    languages: ['python'],
    command: 'bandit',
    args: ['-r', TARGET, '-f', 'json'],
    cwd: WorkingDirectory.Invocation,
    channel: OutputChannel.Stdout,
    timeoutMs: 30_000,
    severity: { table: { HIGH: Severity.ERROR }, fallback: Severity.WARNING },
    parser: jsonDocument(BANDIT_OUTPUT_SCHEMA, (output, context) =>
      output.results.map((result) => ({
        message: result.issue_text,
        severity: context.severityOf(result.issue_severity),
        location: {
          file: result.filename,
          line: result.line_number,
          column: result.col_offset ?? 0,
        },
        code: result.test_id,
        source: context.source,
      }))
    ),
  },
  {
    name: 'tsc',
    source: 'typescript',
    languages: ['typescript', 'javascript'],
    command: 'tsc',
    args: ['--noEmit', '--pretty', 'false'],
    cwd: WorkingDirectory.TargetDir,
    channel: OutputChannel.Stdout,
    timeoutMs: 30_000,
    severity: {
      table: { error: Severity.ERROR, warning: Severity.WARNING },
      fallback: Severity.WARNING,
    },
    parser: linePattern(TSC_LINE),
  },
  {
    name: 'eslint',
    languages: ['typescript', 'javascript'],
    command: 'eslint',
    args: [TARGET, '--format=json'],
    cwd: WorkingDirectory.Invocation,
    channel: OutputChannel.Stdout,
    timeoutMs: 30_000,
    severity: {
      table: { '2': Severity.ERROR, '1': Severity.WARNING },
      fallback: Severity.WARNING,
    },
    parser: jsonDocument(ESLINT_OUTPUT_SCHEMA, (files, context) =>
      files.flatMap((file) =>
        file.messages.map((msg) => ({
          message: msg.message,
          severity: context.severityOf(msg.severity),
          location: {
            file: file.filePath,
            line: msg.line,
            column: msg.column,
            endLine: msg.endLine,
            endColumn: msg.endColumn,
          },
          code: msg.ruleId ?? undefined,
          source: context.source,
          suggestion: msg.fix?.text,
        }))
      )
    ),
  },
  {
    name: 'go-vet',
    source: 'go vet',
    languages: ['go'],
    command: 'go',
    args: ['vet', './...'],
    cwd: WorkingDirectory.TargetDir,
    channel: OutputChannel.Stderr,
    timeoutMs: 30_000,
    severity: { table: {}, fallback: Severity.ERROR },
    parser: linePattern(GO_VET_LINE),
  },
  {
    name: 'golangci-lint',
    languages: ['go'],
    command: 'golangci-lint',
    args: ['run', '--out-format=json'],
    cwd: WorkingDirectory.TargetDir,
    channel: OutputChannel.Stdout,
    timeoutMs: 60_000,
    severity: { table: {}, fallback: Severity.WARNING },
    parser: jsonDocument(GOLANGCI_OUTPUT_SCHEMA, (output, context) =>
      (output.Issues ?? []).map((issue) => ({
        message: issue.Text,
        severity: context.severityOf(issue.Severity),
        location: {
          file: issue.Pos.Filename,
          line: issue.Pos.Line,
          column: issue.Pos.Column,
        },
        code: issue.FromLinter,
        source: context.source,
      }))
    ),
  },
  {
    name: 'cargo-check',
    source: 'rustc',
    languages: ['rust'],
    command: 'cargo',
    args: ['check', '--message-format=json'],
    cwd: WorkingDirectory.TargetDir,
    channel: OutputChannel.Stdout,
    timeoutMs: 60_000,
    lock: 'cargo',
    severity: RUSTC_LEVELS,
    parser: jsonLines(CARGO_RECORD_SCHEMA, cargoDiagnostics),
  },
  {
    name: 'cargo-clippy',
    source: 'clippy',
    languages: ['rust'],
    command: 'cargo',
    args: ['clippy', '--message-format=json'],
    cwd: WorkingDirectory.TargetDir,
    channel: OutputChannel.Stdout,
    timeoutMs: 60_000,
    lock: 'cargo',
    severity: RUSTC_LEVELS,
    parser: jsonLines(CARGO_RECORD_SCHEMA, cargoDiagnostics),
  },
];

export const BUILTIN_METRICS: readonly MetricsDefinition[] = [
  {
    name: 'radon',
    languages: ['python'],
    command: 'radon',
    args: ['cc', TARGET, '-j'],
    cwd: WorkingDirectory.Invocation,
    channel: OutputChannel.Stdout,
    timeoutMs: 10_000,
    schema: RADON_OUTPUT_SCHEMA,
  },
];

export function getBuiltinToolNames(): string[] {
  return [...BUILTIN_TOOLS, ...BUILTIN_METRICS].map((def) => def.name);
}
