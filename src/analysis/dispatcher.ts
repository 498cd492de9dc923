import { existsSync, statSync } from 'fs';
import * as path from 'path';
import {
  detectDirectoryLanguages,
  detectFileLanguage,
  selectPrimaryLanguage,
  type DirectoryScanOptions,
} from '../language/language-detector';
import { debug } from '../output/logger';
import type { AnalyzerRegistry } from './analyzer-registry';
import { emptyResult } from './result-synthesizer';
import { UNKNOWN_LANGUAGE, type AnalysisResult } from './types';

export interface AnalyzeOptions {
  /** Language hint; skips detection when given. */
  language?: string;
  includeMetrics?: boolean;
}

function isDirectory(target: string): boolean {
  const abs = path.resolve(target);
  return existsSync(abs) && statSync(abs).isDirectory();
}

/*
 * Resolves the language of a request and routes it to that language's
 * analyzer. Unresolved or unsupported languages produce a zeroed result
 * rather than an error.
 */
export class Dispatcher {
  constructor(
    private readonly registry: AnalyzerRegistry,
    private readonly scanOptions: DirectoryScanOptions = {}
  ) {}

  async analyze(target: string, options: AnalyzeOptions = {}): Promise<AnalysisResult> {
    const language = await this.resolveLanguage(target, options.language);
    if (!language) {
      debug(`no language detected for ${target}`);
      return emptyResult(UNKNOWN_LANGUAGE);
    }

    const analyzer = this.registry.get(language);
    if (!analyzer) {
      debug(`no analyzer registered for ${language}`);
      return emptyResult(language);
    }

    debug(`analyzing ${target} as ${language} with ${analyzer.toolNames.join(', ')}`);
    return analyzer.run(target, { includeMetrics: options.includeMetrics ?? true });
  }

  async resolveLanguage(target: string, hint?: string): Promise<string | undefined> {
    const normalized = hint?.trim().toLowerCase();
    if (normalized) return normalized;

    if (isDirectory(target)) {
      const counts = await detectDirectoryLanguages(target, this.scanOptions);
      return selectPrimaryLanguage(counts);
    }
    return detectFileLanguage(target);
  }
}
