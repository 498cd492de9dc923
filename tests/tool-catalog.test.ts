import { describe, it, expect } from 'vitest';
import { Severity, ToolStatus } from '../src/analysis/types';
import { BUILTIN_METRICS, BUILTIN_TOOLS, getBuiltinToolNames } from '../src/tools/catalog';
import { CommandToolAdapter } from '../src/tools/tool-adapter';
import { ToolOutputFormat, type ToolDefinition } from '../src/tools/types';
import { createFakeRunner, type FakeResponse } from './helpers/fake-runner';

function definition(name: string): ToolDefinition {
  const def = BUILTIN_TOOLS.find((d) => d.name === name);
  if (!def) throw new Error(`no tool ${name}`);
  return def;
}

async function runTool(name: string, response: FakeResponse) {
  const { runner } = createFakeRunner({ [name]: response });
  return new CommandToolAdapter(definition(name), runner).invoke('proj');
}

describe('built-in tool catalog', () => {
  it('registers tools in analyzer order', () => {
    expect(getBuiltinToolNames()).toEqual([
      'ruff',
      'mypy',
      'bandit',
      'tsc',
      'eslint',
      'go-vet',
      'golangci-lint',
      'cargo-check',
      'cargo-clippy',
      'radon',
    ]);
  });

  it('declares formats and timeouts per tool', () => {
    expect(definition('mypy').parser.format).toBe(ToolOutputFormat.Pattern);
    expect(definition('eslint').parser.format).toBe(ToolOutputFormat.Json);
    expect(definition('cargo-check').parser.format).toBe(ToolOutputFormat.JsonLines);
    expect(definition('golangci-lint').timeoutMs).toBe(60_000);
    expect(definition('ruff').timeoutMs).toBe(30_000);
    expect(BUILTIN_METRICS[0]?.timeoutMs).toBe(10_000);
  });

  it('puts both cargo tools under one lock and leaves the rest unlocked', () => {
    expect(definition('cargo-check').lock).toBe('cargo');
    expect(definition('cargo-clippy').lock).toBe('cargo');
    expect(definition('ruff').lock).toBeUndefined();
  });
});

describe('ruff', () => {
  it('maps fixable findings to warning and unfixable ones to error', async () => {
    const stdout = JSON.stringify([
      {
        code: 'F401',
        message: '`os` imported but unused',
        filename: 'app.py',
        location: { row: 1, column: 8 },
        end_location: { row: 1, column: 10 },
        fix: { message: 'Remove unused import: `os`', applicability: 'safe' },
        url: 'https://docs.example.test/F401',
      },
      {
        code: null,
        message: 'SyntaxError: unexpected indent',
        filename: 'app.py',
        location: { row: 4, column: 1 },
        end_location: null,
        fix: null,
      },
    ]);

    const report = await runTool('ruff', { stdout, exitCode: 1 });

    expect(report.status).toBe(ToolStatus.Ran);
    expect(report.diagnostics).toEqual([
      {
        message: '`os` imported but unused',
        severity: Severity.WARNING,
        location: { file: 'app.py', line: 1, column: 8, endLine: 1, endColumn: 10 },
        code: 'F401',
        source: 'ruff',
        suggestion: 'Remove unused import: `os`',
      },
      {
        message: 'SyntaxError: unexpected indent',
        severity: Severity.ERROR,
        location: { file: 'app.py', line: 4, column: 1 },
        source: 'ruff',
      },
    ]);
  });
});

describe('mypy', () => {
  it('parses error and note lines', async () => {
    const stdout = [
      'app.py:3:5: error: Incompatible types in assignment  [assignment]',
      'app.py:9:1: note: See https://mypy.example.test',
      'Found 1 error in 1 file',
    ].join('\n');

    const report = await runTool('mypy', { stdout });

    expect(report.diagnostics).toEqual([
      {
        message: 'Incompatible types in assignment  [assignment]',
        severity: Severity.ERROR,
        location: { file: 'app.py', line: 3, column: 5 },
        source: 'mypy',
      },
      {
        message: 'See https://mypy.example.test',
        severity: Severity.WARNING,
        location: { file: 'app.py', line: 9, column: 1 },
        source: 'mypy',
      },
    ]);
  });
});

describe('bandit', () => {
  it('maps HIGH to error and everything else to warning', async () => {
    const stdout = JSON.stringify({
      errors: [],
      results: [
        {
          filename: 'app.py',
          line_number: 12,
          col_offset: 4,
          issue_text: 'Use of exec detected.',
          issue_severity: 'HIGH',
          issue_confidence: 'HIGH',
          test_id: 'B102',
        },
        {
          filename: 'app.py',
          line_number: 2,
          issue_text: 'Consider possible security implications of the subprocess module.',
          issue_severity: 'LOW',
          test_id: 'B404',
        },
      ],
    });

    const report = await runTool('bandit', { stdout });

    expect(report.diagnostics.map((d) => [d.severity, d.code, d.location.column])).toEqual([
      [Severity.ERROR, 'B102', 4],
      [Severity.WARNING, 'B404', 0],
    ]);
  });
});

describe('tsc', () => {
  it('parses compiler lines with TS codes and uses the typescript source label', async () => {
    const stdout = "src/index.ts(4,7): error TS2322: Type 'string' is not assignable to type 'number'.\n";

    const report = await runTool('tsc', { stdout });

    expect(report.diagnostics).toEqual([
      {
        message: "Type 'string' is not assignable to type 'number'.",
        severity: Severity.ERROR,
        location: { file: 'src/index.ts', line: 4, column: 7 },
        code: 'TS2322',
        source: 'typescript',
      },
    ]);
  });
});

describe('eslint', () => {
  it('flattens per-file messages and maps levels', async () => {
    const stdout = JSON.stringify([
      {
        filePath: '/proj/a.js',
        messages: [
          { ruleId: 'no-unused-vars', severity: 2, message: "'x' is defined but never used.", line: 1, column: 7, endLine: 1, endColumn: 8 },
          { ruleId: 'semi', severity: 1, message: 'Missing semicolon.', line: 2, column: 10, fix: { range: [20, 20], text: ';' } },
        ],
      },
      { filePath: '/proj/b.js', messages: [] },
      {
        filePath: '/proj/ignored.js',
        messages: [{ ruleId: null, severity: 1, message: 'File ignored because of a matching ignore pattern.' }],
      },
    ]);

    const report = await runTool('eslint', { stdout });

    expect(report.diagnostics).toEqual([
      {
        message: "'x' is defined but never used.",
        severity: Severity.ERROR,
        location: { file: '/proj/a.js', line: 1, column: 7, endLine: 1, endColumn: 8 },
        code: 'no-unused-vars',
        source: 'eslint',
      },
      {
        message: 'Missing semicolon.',
        severity: Severity.WARNING,
        location: { file: '/proj/a.js', line: 2, column: 10 },
        code: 'semi',
        source: 'eslint',
        suggestion: ';',
      },
      {
        message: 'File ignored because of a matching ignore pattern.',
        severity: Severity.WARNING,
        location: { file: '/proj/ignored.js', line: 1, column: 1 },
        source: 'eslint',
      },
    ]);
  });
});

describe('go tools', () => {
  it('reads go vet findings from stderr as errors', async () => {
    const stderr = ['# example.test/app', './main.go:8:2: fmt.Printf format %d has arg s of wrong type string'].join('\n');

    const report = await runTool('go-vet', { stdout: 'ignored:1:1: not this', stderr, exitCode: 1 });

    expect(report.diagnostics).toEqual([
      {
        message: 'fmt.Printf format %d has arg s of wrong type string',
        severity: Severity.ERROR,
        location: { file: './main.go', line: 8, column: 2 },
        source: 'go vet',
      },
    ]);
  });

  it('maps golangci-lint issues to warnings and accepts null Issues', async () => {
    const stdout = JSON.stringify({
      Issues: [
        { FromLinter: 'errcheck', Text: 'Error return value is not checked', Pos: { Filename: 'main.go', Line: 14, Column: 9 } },
      ],
    });

    const report = await runTool('golangci-lint', { stdout });
    expect(report.diagnostics).toEqual([
      {
        message: 'Error return value is not checked',
        severity: Severity.WARNING,
        location: { file: 'main.go', line: 14, column: 9 },
        code: 'errcheck',
        source: 'golangci-lint',
      },
    ]);

    const clean = await runTool('golangci-lint', { stdout: '{"Issues":null}' });
    expect(clean.status).toBe(ToolStatus.Ran);
    expect(clean.diagnostics).toEqual([]);
  });
});

describe('cargo', () => {
  const records = [
    JSON.stringify({ reason: 'compiler-artifact', package_id: 'app 0.1.0' }),
    JSON.stringify({
      reason: 'compiler-message',
      message: {
        message: 'unused variable: `count`',
        level: 'warning',
        code: { code: 'unused_variables' },
        spans: [
          { file_name: 'src/main.rs', line_start: 3, line_end: 3, column_start: 9, column_end: 14, is_primary: true, suggested_replacement: null },
          { file_name: 'src/main.rs', line_start: 1, line_end: 1, column_start: 1, column_end: 2, is_primary: false },
        ],
        children: [
          { message: '`#[warn(unused_variables)]` on by default', level: 'note' },
          { message: 'if this is intentional, prefix it with an underscore: `_count`', level: 'help' },
        ],
      },
    }),
    'Compiling app v0.1.0',
    JSON.stringify({
      reason: 'compiler-message',
      message: {
        message: 'mismatched types',
        level: 'error',
        code: { code: 'E0308' },
        spans: [
          { file_name: 'src/lib.rs', line_start: 7, line_end: 8, column_start: 5, column_end: 6, is_primary: true, suggested_replacement: '42' },
        ],
        children: [],
      },
    }),
    JSON.stringify({ reason: 'build-finished', success: false }),
  ].join('\n');

  it('reads primary spans of compiler messages and skips other lines', async () => {
    const report = await runTool('cargo-check', { stdout: records });

    expect(report.status).toBe(ToolStatus.Ran);
    expect(report.diagnostics).toEqual([
      {
        message: 'unused variable: `count`',
        severity: Severity.WARNING,
        location: { file: 'src/main.rs', line: 3, column: 9, endLine: 3, endColumn: 14 },
        code: 'unused_variables',
        source: 'rustc',
        suggestion: 'if this is intentional, prefix it with an underscore: `_count`',
      },
      {
        message: 'mismatched types',
        severity: Severity.ERROR,
        location: { file: 'src/lib.rs', line: 7, column: 5, endLine: 8, endColumn: 6 },
        code: 'E0308',
        source: 'rustc',
        suggestion: '42',
      },
    ]);
  });

  it('labels clippy findings with their own source', async () => {
    const report = await runTool('cargo-clippy', { stdout: records });
    expect(report.diagnostics.map((d) => d.source)).toEqual(['clippy', 'clippy']);
  });

  it('passes note and help levels through as info and hint', async () => {
    const line = (level: string) =>
      JSON.stringify({
        reason: 'compiler-message',
        message: {
          message: level,
          level,
          spans: [{ file_name: 'a.rs', line_start: 1, line_end: 1, column_start: 1, column_end: 1, is_primary: true }],
        },
      });

    const report = await runTool('cargo-check', { stdout: [line('note'), line('help'), line('failure-note')].join('\n') });
    expect(report.diagnostics.map((d) => d.severity)).toEqual([Severity.INFO, Severity.HINT, Severity.INFO]);
  });
});
