#!/usr/bin/env node
import { program } from 'commander';
import { createRequire } from 'node:module';
import { z } from 'zod';
import { registerAnalyzeCommand } from './cli/analyze-command';
import { registerCallCommand } from './cli/call-command';
import { registerErrorsCommand } from './cli/errors-command';
import { registerLanguagesCommand } from './cli/languages-command';
import { registerToolsCommand } from './cli/tools-command';
import { handleUnknownError } from './errors/index';
import { error, warn } from './output/logger';

const REQUIRE = createRequire(import.meta.url);
const PACKAGE_JSON_SCHEMA = z.object({ version: z.string() });

function readVersion(): string {
  try {
    const raw: unknown = REQUIRE('../package.json');
    return PACKAGE_JSON_SCHEMA.parse(raw).version;
  } catch (e: unknown) {
    const err = handleUnknownError(e, 'Reading package version');
    warn(`[lintmux] Warning: ${err.message}`);
    return '0.0.0';
  }
}

program
  .name('lintmux')
  .description('Run the static-analysis tools for a codebase and merge their diagnostics')
  .version(readVersion());

registerAnalyzeCommand(program);
registerErrorsCommand(program);
registerLanguagesCommand(program);
registerCallCommand(program);
registerToolsCommand(program);

program.parseAsync(process.argv).catch((e: unknown) => {
  const err = handleUnknownError(e, 'Running command');
  error(`Error: ${err.message}`);
  process.exit(1);
});
