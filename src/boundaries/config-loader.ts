import { existsSync, readFileSync } from 'fs';
import * as path from 'path';
import { z } from 'zod';
import { CONFIG_SCHEMA, type Config } from '../schemas/config-schemas';
import { ConfigError, ValidationError, handleUnknownError } from '../errors/index';
import { DEFAULT_CONFIG_FILENAME } from '../config/constants';
import { getBuiltinToolNames } from '../tools/catalog';

enum ConfigKey {
  PARALLEL_TOOLS = 'ParallelTools',
  INCLUDE_METRICS = 'IncludeMetrics',
  IGNORE = 'Ignore',
}

enum ToolKey {
  ENABLED = 'Enabled',
  TIMEOUT = 'Timeout',
  COMMAND = 'Command',
}

function parseBoolean(key: string, value: string): boolean {
  switch (value.toLowerCase()) {
    case 'true':
    case 'yes':
    case 'on':
    case '1':
      return true;
    case 'false':
    case 'no':
    case 'off':
    case '0':
      return false;
    default:
      throw new ConfigError(`Invalid ${key} value: ${value}`);
  }
}

// Seconds in the file, milliseconds in the config object
function parseTimeout(section: string, value: string): number {
  const seconds = Number(value);
  if (!value || !Number.isFinite(seconds) || seconds <= 0) {
    throw new ConfigError(`Invalid Timeout value for [${section}]: ${value}`);
  }
  return Math.round(seconds * 1000);
}

function parseList(value: string): string[] {
  return value
    .split(',')
    .map((s) => s.trim())
    .filter((s) => s.length > 0);
}

const stripQuotes = (str: string): string =>
  str.replace(/^"|"$/g, '').replace(/^'|'$/g, '');

/*
 * Parses .lintmux.ini text into the raw config object. Global keys come
 * before any section; each [section] names a tool.
 */
export function parseConfigText(
  raw: string,
  knownTools: string[] = getBuiltinToolNames()
): Record<string, unknown> {
  const rawConfigObj: Record<string, unknown> = {};
  const tools: Record<string, Record<string, unknown>> = {};
  let currentSection: string | null = null;

  for (const rawLine of raw.split(/\r?\n/)) {
    const line = rawLine.trim();
    if (!line || line.startsWith('#') || line.startsWith(';')) continue;

    // Section header
    const sectionMatch = line.match(/^\[(.*)\]$/);
    if (sectionMatch && sectionMatch[1] !== undefined) {
      currentSection = sectionMatch[1].trim();
      if (!knownTools.includes(currentSection)) {
        throw new ConfigError(
          `Unknown tool section [${currentSection}]. Known tools: ${knownTools.join(', ')}`
        );
      }
      tools[currentSection] ??= {};
      continue;
    }

    const m = line.match(/^([A-Za-z0-9_.-]+)\s*=\s*(.*)$/);
    if (!m || !m[1]) continue;

    const key = m[1];
    const val = stripQuotes((m[2] ?? '').trim());

    if (currentSection) {
      const section = tools[currentSection] ?? {};
      switch (key) {
        case ToolKey.ENABLED:
          section.enabled = parseBoolean(`${key} for [${currentSection}]`, val);
          break;
        case ToolKey.TIMEOUT:
          section.timeoutMs = parseTimeout(currentSection, val);
          break;
        case ToolKey.COMMAND:
          section.command = val;
          break;
        default:
          throw new ConfigError(`Unknown key ${key} in [${currentSection}]`);
      }
      tools[currentSection] = section;
    } else {
      switch (key) {
        case ConfigKey.PARALLEL_TOOLS:
          rawConfigObj.parallelTools = parseBoolean(key, val);
          break;
        case ConfigKey.INCLUDE_METRICS:
          rawConfigObj.includeMetrics = parseBoolean(key, val);
          break;
        case ConfigKey.IGNORE:
          rawConfigObj.ignore = parseList(val);
          break;
        default:
          throw new ConfigError(`Unknown configuration key: ${key}`);
      }
    }
  }

  rawConfigObj.tools = tools;
  return rawConfigObj;
}

/**
 * Load and validate configuration from .lintmux.ini.
 * Without an explicit path a missing file means defaults.
 */
export function loadConfig(cwd: string = process.cwd(), configPath?: string): Config {
  const iniPath = configPath
    ? path.resolve(cwd, configPath)
    : path.resolve(cwd, DEFAULT_CONFIG_FILENAME);

  let rawConfigObj: Record<string, unknown> = {};
  if (existsSync(iniPath)) {
    try {
      rawConfigObj = parseConfigText(readFileSync(iniPath, 'utf-8'));
    } catch (e: unknown) {
      if (e instanceof ConfigError) throw e;
      const err = handleUnknownError(e, 'Reading config file');
      throw new ConfigError(`Failed to read config file: ${err.message}`);
    }
  } else if (configPath) {
    throw new ConfigError(`Missing configuration file at ${iniPath}`);
  }

  try {
    return CONFIG_SCHEMA.parse(rawConfigObj);
  } catch (e: unknown) {
    if (e instanceof z.ZodError) {
      throw new ValidationError(`Invalid configuration: ${e.message}`);
    }
    const err = handleUnknownError(e, 'Config validation');
    throw new ConfigError(`Configuration validation failed: ${err.message}`);
  }
}
