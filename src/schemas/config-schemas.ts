import { z } from 'zod';
import { DEFAULT_IGNORE_PATTERNS } from '../config/constants';

// Per-tool overrides from a [tool-name] section
export const TOOL_SETTINGS_SCHEMA = z.object({
  enabled: z.boolean().default(true),
  timeoutMs: z.number().int().positive().optional(),
  command: z.string().min(1).optional(),
});

// Configuration file schema for .lintmux.ini validation
export const CONFIG_SCHEMA = z.object({
  parallelTools: z.boolean().default(true),
  includeMetrics: z.boolean().default(true),
  ignore: z.array(z.string().min(1)).default(DEFAULT_IGNORE_PATTERNS),
  tools: z.record(z.string(), TOOL_SETTINGS_SCHEMA).default({}),
});

// Inferred types
export type Config = z.infer<typeof CONFIG_SCHEMA>;
export type ToolSettings = z.infer<typeof TOOL_SETTINGS_SCHEMA>;
