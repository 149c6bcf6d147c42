#!/usr/bin/env node
import { performance } from 'node:perf_hooks';

import { createLogger, runBuild } from '@folio/content-compiler';

import {
  USAGE,
  formatRunSummaryEvent,
  formatUnhandledErrorEvent,
  parseArgs,
  resolveBuildOverrides,
  resolveExitCode,
  toPipelineOutcome,
  type CliOptions,
} from './build-utils.js';
import { loadConfigFile } from './config-file.js';

function printUsage(): void {
  console.log(USAGE);
}

async function run(): Promise<void> {
  let options: CliOptions;
  try {
    options = parseArgs(process.argv.slice(2));
  } catch (error) {
    console.error(error instanceof Error ? error.message : String(error));
    printUsage();
    process.exitCode = 1;
    return;
  }

  if (options.help) {
    printUsage();
    return;
  }

  const cwd = process.cwd();
  const configFile = await loadConfigFile(cwd, options.config);
  const overrides = resolveBuildOverrides(options, configFile, cwd);
  const logger = createLogger({ pretty: options.pretty });

  const start = performance.now();
  const result = await runBuild(overrides, { logger });
  const outcome = toPipelineOutcome(result);

  console.log(
    formatRunSummaryEvent(
      outcome,
      performance.now() - start,
      options.check ? 'check' : 'write',
      options.pretty,
    ),
  );

  process.exitCode = resolveExitCode(outcome);
}

void run().catch((error: unknown) => {
  console.error(formatUnhandledErrorEvent(error, process.argv.includes('--pretty')));
  process.exitCode = 1;
});
