import chalk from 'chalk';
import stripAnsi from 'strip-ansi';
import path from 'path';
import { Severity, ToolStatus, type Diagnostic, type SeveritySummary, type ToolSummary } from '../analysis/types';

function severityLabel(severity: Severity): string {
  switch (severity) {
    case Severity.ERROR:
      return chalk.red('error');
    case Severity.WARNING:
      return chalk.yellow('warning');
    case Severity.INFO:
      return chalk.blue('info');
    case Severity.HINT:
      return chalk.dim('hint');
  }
}

function wrapWords(text: string, width: number, first = ''): string[] {
  const words = text.split(/\s+/).filter(Boolean);
  const lines: string[] = [];
  let current = first;
  for (const w of words) {
    if (stripAnsi(current).length + (current ? 1 : 0) + w.length > width && current) {
      lines.push(current);
      current = w;
    } else {
      current = current ? `${current} ${w}` : w;
    }
  }
  if (current) lines.push(current);
  return lines;
}

export function printFileHeader(fileRelPath: string) {
  const cwd = process.cwd();
  const absPath = path.resolve(cwd, fileRelPath);
  // OSC 8 hyperlink
  const link = `\u001B]8;;file://${absPath}\u0007${fileRelPath}\u001B]8;;\u0007`;
  console.log(chalk.underline(link));
}

export function printDiagnosticRow(
  loc: string,
  severity: Severity,
  message: string,
  ruleName: string,
  opts: { locWidth?: number; severityWidth?: number; messageWidth?: number; suggestion?: string } = {}
) {
  // Columns: loc (fixed), severity (fixed), message (fixed wrap), rule/tool (unbounded)
  const locWidth = opts.locWidth ?? 9;
  const severityWidth = opts.severityWidth ?? 8;

  const termCols = process.stdout.columns || 100;
  const prefixOverhead = locWidth + severityWidth + 4;
  const ruleColumnBuffer = 25;
  const availableForMessage = Math.max(40, termCols - prefixOverhead - ruleColumnBuffer);
  const messageWidth = opts.messageWidth ?? availableForMessage;

  const locCell = (loc || '').padEnd(locWidth, ' ');
  const colored = severityLabel(severity);
  const pad = Math.max(0, severityWidth - stripAnsi(colored).length);
  const prefix = `  ${locCell} ${colored}${' '.repeat(pad)}  `;
  const prefixLen = stripAnsi(prefix).length;

  const lines = wrapWords(message || '', messageWidth);
  const [firstLine = '', ...rest] = lines;

  console.log(`${prefix}${firstLine.padEnd(messageWidth, ' ')}  ${chalk.dim(ruleName || '')}`);
  const contPrefix = ' '.repeat(prefixLen);
  for (const line of rest) {
    console.log(`${contPrefix}${line}`);
  }
  if (opts.suggestion) {
    for (const line of wrapWords(opts.suggestion, messageWidth, 'suggestion:')) {
      console.log(`${contPrefix}${line}`);
    }
  }
}

function ruleLabel(diagnostic: Diagnostic): string {
  const source = diagnostic.source ?? '';
  if (!diagnostic.code) return source;
  return source ? `${source}(${diagnostic.code})` : diagnostic.code;
}

// Groups diagnostics by file in first-seen order, one header per file
export function printDiagnostics(diagnostics: readonly Diagnostic[]) {
  const byFile = new Map<string, Diagnostic[]>();
  for (const d of diagnostics) {
    const group = byFile.get(d.location.file) || [];
    group.push(d);
    byFile.set(d.location.file, group);
  }

  for (const [file, group] of byFile) {
    printFileHeader(file);
    const locWidth = Math.max(9, ...group.map((d) => `${d.location.line}:${d.location.column}`.length));
    for (const d of group) {
      printDiagnosticRow(`${d.location.line}:${d.location.column}`, d.severity, d.message, ruleLabel(d), {
        locWidth,
        ...(d.suggestion ? { suggestion: d.suggestion } : {}),
      });
    }
    console.log('');
  }
}

export function printToolStatuses(tools: readonly ToolSummary[]) {
  const skipped = tools.filter((t) => t.status !== ToolStatus.Ran);
  if (skipped.length === 0) return;
  console.log(chalk.bold('Tools not run:'));
  for (const tool of skipped) {
    console.log(`  ${chalk.cyan(tool.tool)}  ${chalk.yellow(tool.status)}${tool.detail ? chalk.dim(`  ${tool.detail}`) : ''}`);
  }
}

export function formatCount(count: number, noun: string): string {
  return count === 1 ? `1 ${noun}` : `${count} ${noun}s`;
}

export function printGlobalSummary(language: string, files: number, summary: SeveritySummary) {
  const errors = summary[Severity.ERROR];
  const okMark = errors === 0 ? chalk.green('✓') : chalk.red('✖');
  const errTxt = formatCount(errors, 'error');
  const warnTxt = formatCount(summary[Severity.WARNING], 'warning');
  const infoCount = summary[Severity.INFO] + summary[Severity.HINT];
  const fileTxt = formatCount(files, 'file');

  const coloredErr = errors > 0 ? chalk.red(errTxt) : chalk.green(errTxt);
  const coloredWarn = chalk.yellow(warnTxt);
  const infoTxt = infoCount > 0 ? `, ${chalk.blue(formatCount(infoCount, 'note'))}` : '';

  // "X errors and Y warnings in Z files (language)."
  console.log(`${okMark} ${coloredErr} and ${coloredWarn}${infoTxt} in ${fileTxt} (${language}).`);
}

export function printLanguageTable(languages: Record<string, number>, primary: string | null) {
  const entries = Object.entries(languages).sort((a, b) => b[1] - a[1] || a[0].localeCompare(b[0]));
  if (entries.length === 0) {
    console.log('No source files detected.');
    return;
  }
  const width = Math.max(...entries.map(([name]) => name.length)) + 2;
  for (const [name, count] of entries) {
    const label = name === primary ? chalk.bold(name.padEnd(width, ' ')) : name.padEnd(width, ' ');
    console.log(`  ${label}${count}`);
  }
}
