import path from 'node:path';

import type {
  ArtifactFileAction,
  BuildConfigOverrides,
  BuildResult,
  FileWriteOperation,
} from '@folio/content-compiler';

import type { LoadedConfigFile } from './config-file.js';

// ============================================================================
// Types
// ============================================================================

export interface CliOptions {
  check: boolean;
  clean: boolean;
  pretty: boolean;
  requireDocuments: boolean;
  help: boolean;
  source: string | undefined;
  output: string | undefined;
  pageSize: number | undefined;
  config: string | undefined;
}

type BooleanFlag = keyof Pick<CliOptions, 'check' | 'clean' | 'pretty' | 'requireDocuments'>;

export interface ParsedValueArg {
  value: string;
  skip: number;
}

export interface RunSummary {
  status: BuildResult['status'];
  sources: number;
  documents: number;
  rejected: number;
  pages: number;
  artifactActions: {
    total: number;
    changed: number;
    byAction: Partial<Record<ArtifactFileAction, number>>;
  };
  failedStage?: string;
  errorCode?: string;
}

export interface PipelineOutcome {
  success: boolean;
  drift: boolean;
  runSummary: RunSummary;
}

export interface NormalizedError {
  name?: string;
  message: string;
  stack?: string;
}

// ============================================================================
// Constants
// ============================================================================

export const BOOLEAN_FLAGS: ReadonlyMap<string, BooleanFlag> = new Map<string, BooleanFlag>([
  ['--check', 'check'],
  ['--clean', 'clean'],
  ['--pretty', 'pretty'],
  ['--require-documents', 'requireDocuments'],
]);

export const USAGE = [
  'Usage: folio-build [options]',
  '',
  'Options:',
  '  --source <path>       Directory of Markdown sources.',
  '  --output <path>       Directory receiving the compiled artifacts.',
  '  --page-size <n>       Documents per page (default 10).',
  '  --config <path>       Config file (default ./folio.config.json5 when present).',
  '  --require-documents   Fail when no source yields a valid document.',
  '  --check               Run without writing files; exits 1 when drift detected.',
  '  --clean               Force rewrites even when artifacts are unchanged.',
  '  --pretty              Pretty-print JSON log events.',
  '  -h, --help            Show this help text.',
].join('\n');

const CHANGE_ACTIONS: ReadonlySet<ArtifactFileAction> = new Set<ArtifactFileAction>([
  'written',
  'deleted',
  'would-write',
  'would-delete',
]);

// ============================================================================
// Argument parsing
// ============================================================================

export function parseValueArg(
  arg: string,
  argv: readonly string[],
  index: number,
  flagName: string,
): ParsedValueArg {
  if (arg.startsWith(`${flagName}=`)) {
    return { value: arg.slice(flagName.length + 1), skip: 0 };
  }
  const nextValue = argv[index + 1];
  if (!nextValue) {
    throw new Error(`Missing value for ${flagName}`);
  }
  return { value: nextValue, skip: 1 };
}

export function parsePageSize(value: string): number {
  const pageSize = /^\d+$/.test(value) ? Number(value) : Number.NaN;
  if (!Number.isSafeInteger(pageSize) || pageSize < 1) {
    throw new Error(`Invalid value for --page-size: ${value}`);
  }
  return pageSize;
}

function matchesValueFlag(arg: string, flagName: string): boolean {
  return arg === flagName || arg.startsWith(`${flagName}=`);
}

export function parseArgs(argv: readonly string[]): CliOptions {
  const options: CliOptions = {
    check: false,
    clean: false,
    pretty: false,
    requireDocuments: false,
    help: false,
    source: undefined,
    output: undefined,
    pageSize: undefined,
    config: undefined,
  };

  for (let index = 0; index < argv.length; index += 1) {
    const arg = argv[index] ?? '';

    const flag = BOOLEAN_FLAGS.get(arg);
    if (flag !== undefined) {
      options[flag] = true;
      continue;
    }

    if (matchesValueFlag(arg, '--source')) {
      const parsed = parseValueArg(arg, argv, index, '--source');
      options.source = parsed.value;
      index += parsed.skip;
      continue;
    }

    if (matchesValueFlag(arg, '--output')) {
      const parsed = parseValueArg(arg, argv, index, '--output');
      options.output = parsed.value;
      index += parsed.skip;
      continue;
    }

    if (matchesValueFlag(arg, '--page-size')) {
      const parsed = parseValueArg(arg, argv, index, '--page-size');
      options.pageSize = parsePageSize(parsed.value);
      index += parsed.skip;
      continue;
    }

    if (matchesValueFlag(arg, '--config')) {
      const parsed = parseValueArg(arg, argv, index, '--config');
      options.config = parsed.value;
      index += parsed.skip;
      continue;
    }

    if (arg === '--help' || arg === '-h') {
      return { ...options, help: true };
    }

    throw new Error(`Unknown option: ${arg}`);
  }

  return options;
}

// ============================================================================
// Config resolution
// ============================================================================

/**
 * Merges flags over the config file. Flag paths resolve against `cwd`,
 * file paths against the file's directory.
 */
export function resolveBuildOverrides(
  options: CliOptions,
  configFile: LoadedConfigFile | undefined,
  cwd: string,
): BuildConfigOverrides {
  const fileConfig = configFile?.config;
  const fileRoot = configFile?.directory ?? cwd;

  const resolveRoot = (
    flagValue: string | undefined,
    fileValue: string | undefined,
    name: string,
  ): string => {
    if (flagValue !== undefined) {
      return path.resolve(cwd, flagValue);
    }
    if (fileValue !== undefined) {
      return path.resolve(fileRoot, fileValue);
    }
    throw new Error(`Missing ${name} directory: pass --${name} or set "${name}" in the config file.`);
  };

  const pageSize = options.pageSize ?? fileConfig?.pageSize;
  const site = fileConfig?.site;

  return {
    sourceRoot: resolveRoot(options.source, fileConfig?.source, 'source'),
    outputRoot: resolveRoot(options.output, fileConfig?.output, 'output'),
    requireDocuments: options.requireDocuments || fileConfig?.requireDocuments === true,
    check: options.check,
    clean: options.clean,
    ...(pageSize !== undefined ? { pageSize } : {}),
    ...(site !== undefined ? { site } : {}),
  };
}

// ============================================================================
// Outcome
// ============================================================================

export function isChangeAction(action: ArtifactFileAction): boolean {
  return CHANGE_ACTIONS.has(action);
}

export function countActions(
  operations: readonly FileWriteOperation[],
): RunSummary['artifactActions'] {
  const byAction: Partial<Record<ArtifactFileAction, number>> = {};
  let changed = 0;
  for (const operation of operations) {
    byAction[operation.action] = (byAction[operation.action] ?? 0) + 1;
    if (isChangeAction(operation.action)) {
      changed += 1;
    }
  }
  return { total: operations.length, changed, byAction };
}

export function createRunSummary(result: BuildResult): RunSummary {
  if (result.status === 'failed') {
    return {
      status: result.status,
      sources: result.totalSources,
      documents: result.totalSources - result.diagnostics.length,
      rejected: result.diagnostics.length,
      pages: 0,
      artifactActions: countActions([]),
      failedStage: result.failedStage,
      errorCode: result.error.code,
    };
  }

  return {
    status: result.status,
    sources: result.totalSources,
    documents: result.index.totalDocuments,
    rejected: result.diagnostics.length,
    pages: result.index.totalPages,
    artifactActions: countActions(result.artifacts.operations),
  };
}

export function toPipelineOutcome(result: BuildResult): PipelineOutcome {
  return {
    success: result.status === 'succeeded',
    drift: result.status === 'succeeded' && result.hasDrift,
    runSummary: createRunSummary(result),
  };
}

export function resolveExitCode(outcome: PipelineOutcome): number {
  return outcome.success && !outcome.drift ? 0 : 1;
}

export function normalizeError(error: unknown): NormalizedError {
  if (error instanceof Error) {
    return {
      name: error.name,
      message: error.message,
      ...(error.stack !== undefined ? { stack: error.stack } : {}),
    };
  }
  return { message: String(error) };
}

export function formatRunSummaryEvent(
  outcome: PipelineOutcome,
  durationMs: number,
  mode: 'check' | 'write',
  pretty: boolean,
): string {
  const payload: Record<string, unknown> = {
    event: 'cli.run_summary',
    timestamp: new Date().toISOString(),
    success: outcome.success,
    drift: outcome.drift,
    summary: outcome.runSummary,
    mode,
  };

  if (Number.isFinite(durationMs)) {
    payload.durationMs = Number(durationMs.toFixed(2));
  }

  return JSON.stringify(payload, undefined, pretty ? 2 : undefined);
}

export function formatUnhandledErrorEvent(error: unknown, pretty: boolean): string {
  return JSON.stringify(
    {
      event: 'cli.unhandled_error',
      timestamp: new Date().toISOString(),
      ...normalizeError(error),
    },
    undefined,
    pretty ? 2 : undefined,
  );
}
