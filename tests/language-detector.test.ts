import { describe, it, expect } from 'vitest';
import { mkdirSync, mkdtempSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import path from 'path';
import {
  detectDirectoryLanguages,
  detectFileLanguage,
  getKnownLanguages,
  selectPrimaryLanguage,
} from '../src/language/language-detector';

function makeTree(files: string[]): string {
  const root = mkdtempSync(path.join(tmpdir(), 'lintmux-lang-'));
  for (const file of files) {
    const full = path.join(root, file);
    mkdirSync(path.dirname(full), { recursive: true });
    writeFileSync(full, '');
  }
  return root;
}

describe('detectFileLanguage', () => {
  it('maps extensions to languages', () => {
    expect(detectFileLanguage('src/app.py')).toBe('python');
    expect(detectFileLanguage('main.go')).toBe('go');
    expect(detectFileLanguage('lib.rs')).toBe('rust');
    expect(detectFileLanguage('index.tsx')).toBe('typescript');
    expect(detectFileLanguage('server.mjs')).toBe('javascript');
  });

  it('looks up extensions case-insensitively', () => {
    expect(detectFileLanguage('SCRIPT.PY')).toBe('python');
  });

  it('resolves .h to cpp, the first language listing it', () => {
    expect(detectFileLanguage('include/util.h')).toBe('cpp');
  });

  it('returns undefined for unknown or missing extensions', () => {
    expect(detectFileLanguage('README.md')).toBeUndefined();
    expect(detectFileLanguage('Makefile')).toBeUndefined();
  });

  it('knows every supported language', () => {
    const known = getKnownLanguages();
    expect(known).toHaveLength(23);
    expect(known).toContain('julia');
    expect(known).toContain('csharp');
  });
});

describe('detectDirectoryLanguages', () => {
  it('counts files per language recursively', async () => {
    const root = makeTree(['a.py', 'pkg/b.py', 'pkg/deep/c.py', 'tool.go', 'notes.txt']);
    expect(await detectDirectoryLanguages(root)).toEqual({ python: 3, go: 1 });
  });

  it('includes hidden files and skips default ignored directories', async () => {
    const root = makeTree(['.hidden/x.rs', 'node_modules/dep/index.js', '.git/hooks/pre.py', 'main.rs']);
    expect(await detectDirectoryLanguages(root)).toEqual({ rust: 2 });
  });

  it('honours configured ignore globs', async () => {
    const root = makeTree(['src/a.ts', 'vendor/b.ts', 'vendor/c.ts']);
    expect(await detectDirectoryLanguages(root, { ignore: ['vendor/**'] })).toEqual({ typescript: 1 });
  });

  it('returns an empty record for an empty directory', async () => {
    const root = makeTree([]);
    expect(await detectDirectoryLanguages(root)).toEqual({});
  });

  it('returns an empty record for a missing directory', async () => {
    const missing = path.join(tmpdir(), 'lintmux-does-not-exist-7f3a');
    expect(await detectDirectoryLanguages(missing)).toEqual({});
  });
});

describe('selectPrimaryLanguage', () => {
  it('picks the language with the most files', () => {
    expect(selectPrimaryLanguage({ go: 2, python: 5, rust: 1 })).toBe('python');
  });

  it('breaks ties alphabetically', () => {
    expect(selectPrimaryLanguage({ python: 3, go: 3 })).toBe('go');
  });

  it('returns undefined when nothing was counted', () => {
    expect(selectPrimaryLanguage({})).toBeUndefined();
  });
});
