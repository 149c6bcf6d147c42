export { runBuild } from './compiler/pipeline.js';
export { createBuildContext } from './compiler/context.js';
export type { BuildContext, BuildOptions } from './compiler/context.js';
export { loadCorpus, reconcileOutcomes, readSourceFromDisk } from './compiler/loader.js';
export type { LoadCorpusOptions, SourceOutcome } from './compiler/loader.js';
export { mapWithConcurrency } from './compiler/concurrency.js';
export {
  buildCorpusIndex,
  compareDocuments,
  countPages,
  createDocumentSummary,
} from './compiler/ordering.js';
export { createShards, paginate } from './compiler/sharding.js';
export type { ShardOptions } from './compiler/sharding.js';
export {
  createDetailArtifact,
  createDetailArtifacts,
  verifyDetailArtifact,
} from './compiler/details.js';
export { parseDocument } from './parser/document.js';
export { extractFrontMatter } from './parser/front-matter.js';
export type { FrontMatterExtraction } from './parser/front-matter.js';
export { parseMarkdownBody } from './parser/markdown.js';
export { discoverSources } from './fs/discovery.js';
export type { DirectoryReader, DiscoveryOptions } from './fs/discovery.js';
export { publishArtifacts } from './fs/writer.js';
export { serializeArtifact, toArtifactBytes, toCanonicalJson } from './artifacts/json.js';
export { createDiagnosticsArtifact, createDiagnosticsReport } from './artifacts/diagnostics.js';
export { readDetailArtifact, readManifestArtifact, readPageArtifact } from './runtime.js';
export { DEFAULT_BUILD_CONFIG, resolveBuildConfig } from './config.js';
export type { BuildConfig, BuildConfigDefaults, BuildConfigOverrides } from './config.js';
export {
  ArtifactIntegrityError,
  ContentBuildError,
  EmptyCorpusError,
  PublishError,
  SourceRootError,
} from './errors.js';
export type { ContentBuildErrorCode } from './errors.js';
export { createLogger, silentLogger } from './logging.js';
export type { Logger, LoggerOptions } from './logging.js';
export { computeArtifactHash } from './hashing.js';
export type {
  ActiveBuildStage,
  ArtifactFileAction,
  ArtifactKind,
  ArtifactWriteResult,
  ArtifactWriterOptions,
  BuildFailure,
  BuildResult,
  BuildStage,
  BuildSuccess,
  CompileLogArtifactOperation,
  CompileLogEvent,
  ContentSource,
  CorpusIndex,
  CorpusLoadResult,
  EmittedArtifact,
  FileWriteOperation,
  LoadedDocument,
  ParseResult,
  ShardSet,
  SourceDiscovery,
  SourceReader,
} from './types.js';
