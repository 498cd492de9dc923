import { describe, it, expect } from 'vitest';
import { z } from 'zod';
import { Severity, type Diagnostic } from '../src/analysis/types';
import { MalformedOutputError } from '../src/errors/index';
import { jsonDocument, jsonLines, linePattern } from '../src/tools/output-parsers';
import { resolveSeverity } from '../src/tools/severity-policy';
import type { ParseContext } from '../src/tools/types';

const CONTEXT: ParseContext = {
  source: 'sample-tool',
  severityOf: (signal) =>
    resolveSeverity({ table: { E: Severity.ERROR, '2': Severity.ERROR }, fallback: Severity.WARNING }, signal),
};

const FINDING_SCHEMA = z.array(z.object({ file: z.string(), line: z.number(), text: z.string() }));

function toDiagnostic(file: string, line: number, message: string): Diagnostic {
  return { message, severity: Severity.WARNING, location: { file, line, column: 0 }, source: 'sample-tool' };
}

describe('resolveSeverity', () => {
  const policy = { table: { E: Severity.ERROR, '2': Severity.ERROR }, fallback: Severity.HINT };

  it('looks up string and numeric signals', () => {
    expect(resolveSeverity(policy, 'E')).toBe(Severity.ERROR);
    expect(resolveSeverity(policy, 2)).toBe(Severity.ERROR);
  });

  it('falls back for unknown or absent signals', () => {
    expect(resolveSeverity(policy, 'W')).toBe(Severity.HINT);
    expect(resolveSeverity(policy, undefined)).toBe(Severity.HINT);
    expect(resolveSeverity(policy, null)).toBe(Severity.HINT);
  });
});

describe('jsonDocument', () => {
  const parser = jsonDocument(FINDING_SCHEMA, (findings) => findings.map((f) => toDiagnostic(f.file, f.line, f.text)));

  it('maps a valid document', () => {
    const output = JSON.stringify([{ file: 'a.py', line: 2, text: 'bad' }]);
    expect(parser.parse(output, CONTEXT)).toEqual([toDiagnostic('a.py', 2, 'bad')]);
  });

  it('returns nothing for blank output', () => {
    expect(parser.parse('  \n', CONTEXT)).toEqual([]);
  });

  it('throws MalformedOutputError for invalid JSON', () => {
    expect(() => parser.parse('Traceback (most recent call last):', CONTEXT)).toThrow(MalformedOutputError);
    expect(() => parser.parse('[{', CONTEXT)).toThrow(/^sample-tool: invalid JSON output/);
  });

  it('throws MalformedOutputError when the shape does not match', () => {
    expect(() => parser.parse('{"file":"a.py"}', CONTEXT)).toThrow(/^sample-tool: unexpected output shape/);
  });

  it('keeps a bounded preview of the offending output', () => {
    const long = `x${'y'.repeat(600)}`;
    try {
      parser.parse(long, CONTEXT);
      expect.fail('expected a MalformedOutputError');
    } catch (e: unknown) {
      expect(e).toBeInstanceOf(MalformedOutputError);
      if (e instanceof MalformedOutputError) {
        expect(e.preview).toHaveLength(503);
        expect(e.preview.endsWith('...')).toBe(true);
      }
    }
  });
});

describe('jsonLines', () => {
  const RECORD = z.object({ kind: z.literal('finding'), file: z.string(), line: z.number(), text: z.string() });
  const parser = jsonLines(RECORD, (r) => [toDiagnostic(r.file, r.line, r.text)]);

  it('parses matching records and skips everything else', () => {
    const output = [
      '{"kind":"finding","file":"a.rs","line":1,"text":"one"}',
      'not json at all',
      '{"kind":"progress","done":3}',
      '',
      '  {"kind":"finding","file":"b.rs","line":9,"text":"two"}  ',
    ].join('\n');

    expect(parser.parse(output, CONTEXT)).toEqual([toDiagnostic('a.rs', 1, 'one'), toDiagnostic('b.rs', 9, 'two')]);
  });
});

describe('linePattern', () => {
  const parser = linePattern(
    /^(?<file>[^:]+):(?<line>\d+):(?<column>\d+): (?:(?<severity>[EW]) )?(?:\[(?<code>\d+)\] )?(?<message>.+)$/,
    { codePrefix: 'P' }
  );

  it('builds diagnostics from named groups', () => {
    expect(parser.parse('m.go:4:2: E [17] nil dereference\r\nm.go:5:1: plain message', CONTEXT)).toEqual([
      {
        message: 'nil dereference',
        severity: Severity.ERROR,
        location: { file: 'm.go', line: 4, column: 2 },
        code: 'P17',
        source: 'sample-tool',
      },
      {
        message: 'plain message',
        severity: Severity.WARNING,
        location: { file: 'm.go', line: 5, column: 1 },
        source: 'sample-tool',
      },
    ]);
  });

  it('ignores lines that do not match', () => {
    expect(parser.parse('# summary\nok', CONTEXT)).toEqual([]);
  });
});
