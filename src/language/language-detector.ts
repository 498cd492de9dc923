import fg from 'fast-glob';
import { stat } from 'fs/promises';
import path from 'path';
import { z } from 'zod';
import { debug } from '../output/logger';
import { handleUnknownError } from '../errors/index';
import { DEFAULT_IGNORE_PATTERNS } from '../config/constants';
import LANGUAGE_TABLE_RAW from './languages.json';

const LANGUAGE_TABLE_SCHEMA = z.record(z.array(z.string().startsWith('.')));

export type LanguageCounts = Record<string, number>;

export interface DirectoryScanOptions {
  ignore?: string[];
}

/*
 * Extension -> language. When two languages list the same extension the
 * first one in the table wins (`.h` resolves to cpp).
 */
function buildExtensionIndex(table: Record<string, string[]>): Map<string, string> {
  const index = new Map<string, string>();
  for (const [language, extensions] of Object.entries(table)) {
    for (const ext of extensions) {
      const key = ext.toLowerCase();
      if (!index.has(key)) index.set(key, language);
    }
  }
  return index;
}

const LANGUAGE_TABLE = LANGUAGE_TABLE_SCHEMA.parse(LANGUAGE_TABLE_RAW);
const EXTENSION_INDEX = buildExtensionIndex(LANGUAGE_TABLE);

export function getKnownLanguages(): string[] {
  return Object.keys(LANGUAGE_TABLE);
}

export function detectFileLanguage(filePath: string): string | undefined {
  const ext = path.extname(filePath).toLowerCase();
  if (!ext) return undefined;
  return EXTENSION_INDEX.get(ext);
}

/*
 * Counts files per language under a directory, by extension only.
 * A directory that cannot be read counts as empty.
 */
export async function detectDirectoryLanguages(
  dir: string,
  options: DirectoryScanOptions = {}
): Promise<LanguageCounts> {
  try {
    const st = await stat(dir);
    if (!st.isDirectory()) return {};
  } catch (e: unknown) {
    const err = handleUnknownError(e, 'Reading directory');
    debug(`cannot scan ${dir}: ${err.message}`);
    return {};
  }

  const files = await fg('**/*', {
    cwd: dir,
    onlyFiles: true,
    dot: true,
    followSymbolicLinks: false,
    suppressErrors: true,
    ignore: options.ignore ?? DEFAULT_IGNORE_PATTERNS,
  });

  const counts: LanguageCounts = {};
  for (const file of files) {
    const language = detectFileLanguage(file);
    if (language) {
      counts[language] = (counts[language] ?? 0) + 1;
    }
  }
  return counts;
}

/*
 * Highest count wins; ties go to the alphabetically first language so the
 * result does not depend on directory traversal order.
 */
export function selectPrimaryLanguage(counts: LanguageCounts): string | undefined {
  let best: string | undefined;
  let bestCount = 0;
  for (const language of Object.keys(counts).sort()) {
    const count = counts[language] ?? 0;
    if (count > bestCount) {
      best = language;
      bestCount = count;
    }
  }
  return best;
}
