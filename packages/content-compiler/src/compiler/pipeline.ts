import { promises as fsPromises } from 'node:fs';
import path from 'node:path';
import { performance } from 'node:perf_hooks';

import { getDetailArtifactPath, type Document } from '@folio/content-schema';

import { createDiagnosticsArtifact } from '../artifacts/diagnostics.js';
import type { BuildConfigOverrides } from '../config.js';
import {
  ArtifactIntegrityError,
  ContentBuildError,
  EmptyCorpusError,
  PublishError,
  describeCause,
} from '../errors.js';
import { discoverSources } from '../fs/discovery.js';
import { publishArtifacts } from '../fs/writer.js';
import type {
  ActiveBuildStage,
  ArtifactWriteResult,
  BuildResult,
  BuildStage,
  CorpusIndex,
  CorpusLoadResult,
  EmittedArtifact,
  ShardSet,
} from '../types.js';
import { mapWithConcurrency } from './concurrency.js';
import { createBuildContext, type BuildContext, type BuildOptions } from './context.js';
import { createDetailArtifacts, verifyDetailArtifact } from './details.js';
import { loadCorpus } from './loader.js';
import { buildCorpusIndex } from './ordering.js';
import { createShards } from './sharding.js';

const EMPTY_LOAD: CorpusLoadResult = Object.freeze({
  totalSources: 0,
  documents: Object.freeze([]),
  diagnostics: Object.freeze([]),
});

function timestamp(): string {
  return new Date().toISOString();
}

async function loadStage(context: BuildContext): Promise<CorpusLoadResult> {
  const discovery = await discoverSources(context.config.sourceRoot);
  const corpus = await loadCorpus(discovery.sources, {
    concurrency: context.config.concurrency,
    readSource: context.readSource,
  });
  // Unreadable directories count as rejected units.
  const load: CorpusLoadResult = {
    totalSources: corpus.totalSources + discovery.diagnostics.length,
    documents: corpus.documents,
    diagnostics: [...discovery.diagnostics, ...corpus.diagnostics],
  };

  for (const diagnostic of load.diagnostics) {
    context.logger({
      name: 'content_document.rejected',
      source: diagnostic.source,
      code: diagnostic.code,
      message: diagnostic.message,
      timestamp: timestamp(),
    });
  }

  if (context.config.requireDocuments && load.documents.length === 0) {
    throw new EmptyCorpusError(load.totalSources);
  }
  return load;
}

async function emitStage(
  context: BuildContext,
  index: CorpusIndex,
): Promise<readonly [ShardSet, readonly EmittedArtifact[]]> {
  const site = context.config.site;
  return Promise.all([
    (async () => createShards(index, site !== undefined ? { site } : {}))(),
    (async () => createDetailArtifacts(index))(),
  ]);
}

async function publishStage(
  context: BuildContext,
  artifacts: readonly EmittedArtifact[],
): Promise<ArtifactWriteResult> {
  const { outputRoot, check, clean } = context.config;
  try {
    return await publishArtifacts(outputRoot, artifacts, { check, clean });
  } catch (error) {
    throw new PublishError(outputRoot, error);
  }
}

async function verifyPublishedDetails(context: BuildContext, index: CorpusIndex): Promise<void> {
  const { outputRoot, concurrency } = context.config;
  await mapWithConcurrency(index.documents, concurrency, async (document: Document) => {
    const artifactPath = getDetailArtifactPath(document.slug);
    let bytes: Uint8Array;
    try {
      bytes = await fsPromises.readFile(path.join(outputRoot, artifactPath));
    } catch (error) {
      throw new ArtifactIntegrityError(
        artifactPath,
        `could not be read back (${describeCause(error)})`,
        { cause: error },
      );
    }
    verifyDetailArtifact(bytes, document, artifactPath);
  });
}

function hasDriftActions(artifacts: ArtifactWriteResult): boolean {
  return artifacts.operations.some(
    (operation) => operation.action === 'would-write' || operation.action === 'would-delete',
  );
}

/**
 * Runs one build: loading, indexing, emitting (pages and details in
 * parallel), publishing. Rejected documents are reported, never fatal;
 * structural failures end the build in the `failed` state. Errors that are
 * not build errors propagate to the caller.
 */
export async function runBuild(
  overrides: BuildConfigOverrides,
  options: BuildOptions = {},
): Promise<BuildResult> {
  const start = performance.now();
  const context = createBuildContext(overrides, options);
  const { config, logger } = context;
  const stages: BuildStage[] = ['idle'];

  const enterStage = (next: BuildStage): void => {
    stages.push(next);
    logger({ name: 'content_build.stage', stage: next, timestamp: timestamp() });
  };

  let stage: ActiveBuildStage = 'loading';
  let load = EMPTY_LOAD;

  try {
    enterStage(stage);
    load = await loadStage(context);

    stage = 'indexing';
    enterStage(stage);
    const index = buildCorpusIndex(
      load.documents.map((entry) => entry.document),
      config.pageSize,
    );

    stage = 'emitting';
    enterStage(stage);
    const [shards, details] = await emitStage(context, index);

    stage = 'publishing';
    enterStage(stage);
    const artifacts = await publishStage(context, [
      ...details,
      ...shards.pages,
      createDiagnosticsArtifact(load),
      shards.manifest,
    ]);
    if (config.verifyArtifacts && !config.check) {
      await verifyPublishedDetails(context, index);
    }

    enterStage('succeeded');
    const durationMs = performance.now() - start;
    logger({
      name: 'content_build.completed',
      timestamp: timestamp(),
      durationMs,
      documents: index.totalDocuments,
      rejected: load.diagnostics.length,
      pages: index.totalPages,
      artifacts: artifacts.operations.map(({ kind, path: artifactPath, action }) => ({
        kind,
        path: artifactPath,
        action,
      })),
      check: config.check,
    });

    return {
      status: 'succeeded',
      stages,
      totalSources: load.totalSources,
      diagnostics: load.diagnostics,
      durationMs,
      index,
      artifacts,
      hasDrift: config.check && hasDriftActions(artifacts),
    };
  } catch (error) {
    if (!(error instanceof ContentBuildError)) {
      throw error;
    }

    enterStage('failed');
    const durationMs = performance.now() - start;
    logger({
      name: 'content_build.failed',
      timestamp: timestamp(),
      durationMs,
      stage,
      code: error.code,
      message: error.message,
      ...(error.stack !== undefined ? { stack: error.stack } : {}),
    });

    return {
      status: 'failed',
      stages,
      totalSources: load.totalSources,
      diagnostics: load.diagnostics,
      durationMs,
      failedStage: stage,
      error,
    };
  }
}
