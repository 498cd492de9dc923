import type { Dispatcher } from '../analysis/dispatcher';
import { filterAndRank } from '../analysis/severity-filter';
import { parseRequest } from '../boundaries/cli-parser';
import { handleUnknownError } from '../errors/index';
import {
  detectDirectoryLanguages,
  selectPrimaryLanguage,
  type DirectoryScanOptions,
} from '../language/language-detector';
import {
  toAnalysisPayload,
  toErrorListPayload,
  type AnalysisPayload,
  type ErrorListPayload,
  type LanguagesPayload,
} from '../output/json-formatter';
import {
  ANALYZE_CODEBASE_REQUEST_SCHEMA,
  DETECT_LANGUAGES_REQUEST_SCHEMA,
  GET_ERROR_LIST_REQUEST_SCHEMA,
} from '../schemas/request-schemas';
import { ServiceTool, isServiceToolName } from './service-tools';

export type ToolCallEnvelope =
  | { success: true; data: AnalysisPayload | ErrorListPayload | LanguagesPayload }
  | { success: false; error: string };

export interface ServiceOptions extends DirectoryScanOptions {
  /** When false, analyze_codebase never collects metrics. */
  includeMetrics?: boolean;
}

/*
 * The request-level interface consumed by reporting layers. Arguments are
 * validated with zod; invalid arguments raise ValidationError.
 */
export class AnalysisService {
  constructor(
    private readonly dispatcher: Dispatcher,
    private readonly options: ServiceOptions = {}
  ) {}

  async analyzeCodebase(rawArgs: unknown): Promise<AnalysisPayload> {
    const args = parseRequest(ANALYZE_CODEBASE_REQUEST_SCHEMA, rawArgs, ServiceTool.ANALYZE_CODEBASE);
    const includeMetrics = args.include_metrics && this.options.includeMetrics !== false;
    const result = await this.dispatcher.analyze(args.path, {
      ...(args.language !== undefined ? { language: args.language } : {}),
      includeMetrics,
    });
    return toAnalysisPayload(result, { includeMetrics });
  }

  async getErrorList(rawArgs: unknown): Promise<ErrorListPayload> {
    const args = parseRequest(GET_ERROR_LIST_REQUEST_SCHEMA, rawArgs, ServiceTool.GET_ERROR_LIST);
    // Metrics are not part of the error list
    const result = await this.dispatcher.analyze(args.path, { includeMetrics: false });
    return toErrorListPayload(
      filterAndRank(result, { minSeverity: args.min_severity, maxResults: args.max_results })
    );
  }

  async detectLanguages(rawArgs: unknown): Promise<LanguagesPayload> {
    const args = parseRequest(DETECT_LANGUAGES_REQUEST_SCHEMA, rawArgs, ServiceTool.DETECT_LANGUAGES);
    const counts = await detectDirectoryLanguages(args.directory, this.options);

    const languages: Record<string, number> = {};
    for (const name of Object.keys(counts).sort()) {
      languages[name] = counts[name] ?? 0;
    }

    return {
      languages,
      primary_language: selectPrimaryLanguage(languages) ?? null,
      total_files: Object.values(languages).reduce((sum, n) => sum + n, 0),
    };
  }

  /*
   * Routes a call by tool name. Never throws: failures come back as
   * { success: false, error }.
   */
  async handleToolCall(name: string, args: unknown): Promise<ToolCallEnvelope> {
    if (!isServiceToolName(name)) {
      return { success: false, error: `Unknown tool: ${name}` };
    }

    try {
      switch (name) {
        case ServiceTool.ANALYZE_CODEBASE:
          return { success: true, data: await this.analyzeCodebase(args) };
        case ServiceTool.GET_ERROR_LIST:
          return { success: true, data: await this.getErrorList(args) };
        case ServiceTool.DETECT_LANGUAGES:
          return { success: true, data: await this.detectLanguages(args) };
      }
    } catch (e: unknown) {
      const err = handleUnknownError(e, `Calling ${name}`);
      return { success: false, error: err.message };
    }
  }
}
