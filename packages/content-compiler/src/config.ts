import os from 'node:os';
import path from 'node:path';

import type { SiteMetadata } from '@folio/content-schema';

export interface BuildConfig {
  /** Directory walked for `*.md` source units. */
  readonly sourceRoot: string;
  /** Directory receiving pages, detail artifacts, the report and the manifest. */
  readonly outputRoot: string;
  /**
   * Documents per shard.
   *
   * @defaultValue `10`
   */
  readonly pageSize: number;
  /**
   * Fail the build with `EmptyCorpusError` when no source yields a valid
   * document.
   *
   * @defaultValue `false`
   */
  readonly requireDocuments: boolean;
  /**
   * Re-read and verify every detail artifact after publishing.
   *
   * @defaultValue `true`
   */
  readonly verifyArtifacts: boolean;
  /**
   * Upper bound on source units read and parsed at once.
   *
   * @defaultValue `os.availableParallelism()`
   */
  readonly concurrency: number;
  /** Compute publish actions without touching the output root. */
  readonly check: boolean;
  /** Rewrite artifacts even when the bytes on disk already match. */
  readonly clean: boolean;
  readonly site?: SiteMetadata;
}

export type BuildConfigOverrides = Readonly<
  Pick<BuildConfig, 'sourceRoot' | 'outputRoot'> &
    Partial<Omit<BuildConfig, 'sourceRoot' | 'outputRoot'>>
>;

export type BuildConfigDefaults = Omit<BuildConfig, 'sourceRoot' | 'outputRoot' | 'site'>;

export const DEFAULT_BUILD_CONFIG: BuildConfigDefaults = Object.freeze({
  pageSize: 10,
  requireDocuments: false,
  verifyArtifacts: true,
  concurrency: Math.max(1, os.availableParallelism()),
  check: false,
  clean: false,
});

function toPositiveInt(value: unknown): number | undefined {
  if (typeof value !== 'number' || !Number.isFinite(value) || value <= 0) {
    return undefined;
  }
  return Math.max(1, Math.floor(value));
}

export function assertPageSize(pageSize: number): void {
  if (!Number.isSafeInteger(pageSize) || pageSize < 1) {
    throw new RangeError(`pageSize must be a positive integer, received ${pageSize}.`);
  }
}

export function resolveBuildConfig(overrides: BuildConfigOverrides): BuildConfig {
  const defaults = DEFAULT_BUILD_CONFIG;
  const pageSize = overrides.pageSize ?? defaults.pageSize;
  assertPageSize(pageSize);

  return Object.freeze({
    sourceRoot: path.resolve(overrides.sourceRoot),
    outputRoot: path.resolve(overrides.outputRoot),
    pageSize,
    requireDocuments: overrides.requireDocuments ?? defaults.requireDocuments,
    verifyArtifacts: overrides.verifyArtifacts ?? defaults.verifyArtifacts,
    concurrency: toPositiveInt(overrides.concurrency) ?? defaults.concurrency,
    check: overrides.check ?? defaults.check,
    clean: overrides.clean ?? defaults.clean,
    ...(overrides.site !== undefined ? { site: overrides.site } : {}),
  });
}
