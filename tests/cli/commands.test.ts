import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { Command } from 'commander';
import stripAnsi from 'strip-ansi';
import { registerAnalyzeCommand } from '../../src/cli/analyze-command';
import { parseCallArguments, registerCallCommand } from '../../src/cli/call-command';
import { registerErrorsCommand } from '../../src/cli/errors-command';
import { registerLanguagesCommand } from '../../src/cli/languages-command';
import { registerToolsCommand } from '../../src/cli/tools-command';
import { ValidationError } from '../../src/errors/index';
import { setSilentMode } from '../../src/output/logger';

class ExitCalled extends Error {
  constructor(readonly code: number | string | null | undefined) {
    super(`process.exit(${String(code)})`);
  }
}

describe('CLI commands', () => {
  let program: Command;

  beforeEach(() => {
    program = new Command();
    program.exitOverride();
  });

  afterEach(() => {
    setSilentMode(false);
    vi.restoreAllMocks();
  });

  it('registers every command with its options', () => {
    registerAnalyzeCommand(program);
    registerErrorsCommand(program);
    registerLanguagesCommand(program);
    registerCallCommand(program);
    registerToolsCommand(program);

    expect(program.commands.map((c) => c.name())).toEqual(['analyze', 'errors', 'languages', 'call', 'tools']);

    const analyze = program.commands.find((c) => c.name() === 'analyze');
    expect(analyze?.options.map((o) => o.long)).toEqual(['--language', '--no-metrics', '--output', '--config', '--verbose']);

    const errors = program.commands.find((c) => c.name() === 'errors');
    expect(errors?.options.map((o) => o.long)).toEqual([
      '--min-severity',
      '--max-results',
      '--output',
      '--config',
      '--verbose',
    ]);
  });

  it('prints the envelope of a call and exits 1 on failure', async () => {
    const logSpy = vi.spyOn(console, 'log').mockImplementation(() => undefined);
    vi.spyOn(process, 'exit').mockImplementation((code) => {
      throw new ExitCalled(code);
    });
    registerCallCommand(program);

    await expect(program.parseAsync(['node', 'lintmux', 'call', 'hover', '{}'])).rejects.toBeInstanceOf(ExitCalled);

    expect(logSpy).toHaveBeenCalledWith('{\n  "success": false,\n  "error": "Unknown tool: hover"\n}');
    expect(process.exit).toHaveBeenCalledWith(1);
  });

  it('reports option errors on stderr even in silent mode', async () => {
    const errSpy = vi.spyOn(console, 'error').mockImplementation(() => undefined);
    vi.spyOn(process, 'exit').mockImplementation((code) => {
      throw new ExitCalled(code);
    });
    setSilentMode(true);
    registerCallCommand(program);

    await expect(program.parseAsync(['node', 'lintmux', 'call', 'get_error_list', '{path:'])).rejects.toBeInstanceOf(
      ExitCalled
    );

    expect(errSpy).toHaveBeenCalledTimes(1);
    expect(errSpy).toHaveBeenCalledWith(expect.stringMatching(/^Error: Call arguments must be a JSON object: /));
    expect(process.exit).toHaveBeenCalledWith(1);
  });

  it('lists the tool catalog per language', async () => {
    const lines: string[] = [];
    vi.spyOn(console, 'log').mockImplementation((line?: unknown) => {
      lines.push(stripAnsi(String(line ?? '')));
    });
    registerToolsCommand(program);

    await program.parseAsync(['node', 'lintmux', 'tools']);

    expect(lines[0]).toBe('python');
    expect(lines[1]).toBe('  ruff    ruff check {target} --output-format=json  30s');
    expect(lines).toContain('  radon   radon cc {target} -j  10s (metrics)');
    expect(lines).toContain('rust');
  });
});

describe('parseCallArguments', () => {
  it('parses a JSON object and defaults to an empty one', () => {
    expect(parseCallArguments('{"path":"src"}')).toEqual({ path: 'src' });
    expect(parseCallArguments(undefined)).toEqual({});
    expect(parseCallArguments('  ')).toEqual({});
  });

  it('rejects invalid JSON', () => {
    expect(() => parseCallArguments('{path:')).toThrow(ValidationError);
  });
});
