import { zodToJsonSchema } from 'zod-to-json-schema';
import {
  ANALYZE_CODEBASE_REQUEST_SCHEMA,
  DETECT_LANGUAGES_REQUEST_SCHEMA,
  GET_ERROR_LIST_REQUEST_SCHEMA,
} from '../schemas/request-schemas';

export const ServiceTool = {
  ANALYZE_CODEBASE: 'analyze_codebase',
  GET_ERROR_LIST: 'get_error_list',
  DETECT_LANGUAGES: 'detect_languages',
} as const;

export type ServiceToolName = typeof ServiceTool[keyof typeof ServiceTool];

export interface ServiceToolDescription {
  name: ServiceToolName;
  description: string;
  inputSchema: ReturnType<typeof zodToJsonSchema>;
}

/*
 * Descriptions of the service calls for reporting layers that expose them
 * as tools. Input schemas are generated from the request schemas.
 */
export const TOOL_DEFINITIONS: readonly ServiceToolDescription[] = [
  {
    name: ServiceTool.ANALYZE_CODEBASE,
    description:
      'Analyze a file or directory with the external analysis tools registered for its language. ' +
      'Returns normalized diagnostics, per-severity counts, tool statuses and optional metrics.',
    inputSchema: zodToJsonSchema(ANALYZE_CODEBASE_REQUEST_SCHEMA),
  },
  {
    name: ServiceTool.GET_ERROR_LIST,
    description:
      'Get diagnostics at or above a minimum severity, most severe first, ' +
      'with locations, rule codes and fix suggestions.',
    inputSchema: zodToJsonSchema(GET_ERROR_LIST_REQUEST_SCHEMA),
  },
  {
    name: ServiceTool.DETECT_LANGUAGES,
    description: 'Count source files per language in a directory and report the primary language.',
    inputSchema: zodToJsonSchema(DETECT_LANGUAGES_REQUEST_SCHEMA),
  },
];

export function isServiceToolName(name: string): name is ServiceToolName {
  return TOOL_DEFINITIONS.some((tool) => tool.name === name);
}
