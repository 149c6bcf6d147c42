import type {
  Diagnostic,
  DiagnosticCode,
  Document,
  DocumentSummary,
} from '@folio/content-schema';

import type { ContentBuildError, ContentBuildErrorCode } from './errors.js';

export interface ContentSource {
  readonly absolutePath: string;
  /** Posix path relative to the source root; doubles as the diagnostic source. */
  readonly relativePath: string;
}

export type SourceReader = (source: ContentSource) => Promise<string>;

export interface SourceDiscovery {
  /** Sorted by relative path; this is the build's enumeration order. */
  readonly sources: readonly ContentSource[];
  /** Nested directories that could not be read. */
  readonly diagnostics: readonly Diagnostic[];
}

export type ParseResult =
  | {
      readonly ok: true;
      readonly document: Document;
    }
  | {
      readonly ok: false;
      readonly diagnostic: Diagnostic;
    };

export interface LoadedDocument {
  readonly source: ContentSource;
  readonly document: Document;
}

export interface CorpusLoadResult {
  readonly totalSources: number;
  /** Accepted documents, in enumeration order. */
  readonly documents: readonly LoadedDocument[];
  /** Rejections, in enumeration order. */
  readonly diagnostics: readonly Diagnostic[];
}

export interface CorpusIndex {
  /** Valid documents in canonical order: date descending, then id ascending. */
  readonly documents: readonly Document[];
  readonly summaries: readonly DocumentSummary[];
  readonly totalDocuments: number;
  readonly pageSize: number;
  readonly totalPages: number;
  /** Tag to slugs, tags sorted, slugs in canonical order. */
  readonly tags: ReadonlyMap<string, readonly string[]>;
}

export type ArtifactKind = 'page' | 'detail' | 'manifest' | 'diagnostics';

export interface EmittedArtifact {
  readonly kind: ArtifactKind;
  /** Page number, slug, or the artifact kind for singletons. */
  readonly key: string;
  /** Output-relative posix path. */
  readonly path: string;
  readonly canonicalJson: string;
  readonly artifactHash: string;
}

export interface ShardSet {
  readonly pages: readonly EmittedArtifact[];
  readonly manifest: EmittedArtifact;
}

export interface ArtifactWriterOptions {
  readonly check?: boolean;
  readonly clean?: boolean;
}

export type ArtifactFileAction =
  | 'written'
  | 'unchanged'
  | 'deleted'
  | 'would-write'
  | 'would-delete';

export interface FileWriteOperation {
  readonly key: string;
  readonly kind: ArtifactKind;
  readonly path: string;
  readonly action: ArtifactFileAction;
}

export interface ArtifactWriteResult {
  readonly operations: readonly FileWriteOperation[];
}

export type BuildStage =
  | 'idle'
  | 'loading'
  | 'indexing'
  | 'emitting'
  | 'publishing'
  | 'succeeded'
  | 'failed';

export type ActiveBuildStage = Exclude<BuildStage, 'idle' | 'succeeded' | 'failed'>;

interface BuildResultBase {
  /** Every stage entered, starting with `idle`. */
  readonly stages: readonly BuildStage[];
  readonly totalSources: number;
  readonly diagnostics: readonly Diagnostic[];
  readonly durationMs: number;
}

export interface BuildSuccess extends BuildResultBase {
  readonly status: 'succeeded';
  readonly index: CorpusIndex;
  readonly artifacts: ArtifactWriteResult;
  /** Check mode only: true when any artifact on disk differs from the build. */
  readonly hasDrift: boolean;
}

export interface BuildFailure extends BuildResultBase {
  readonly status: 'failed';
  readonly failedStage: ActiveBuildStage;
  readonly error: ContentBuildError;
}

export type BuildResult = BuildSuccess | BuildFailure;

export interface CompileLogArtifactOperation {
  readonly kind: ArtifactKind;
  readonly path: string;
  readonly action: ArtifactFileAction;
}

export type CompileLogEvent =
  | {
      readonly name: 'content_document.rejected';
      readonly source: string;
      readonly code: DiagnosticCode;
      readonly message: string;
      readonly timestamp: string;
    }
  | {
      readonly name: 'content_build.stage';
      readonly stage: BuildStage;
      readonly timestamp: string;
    }
  | {
      readonly name: 'content_build.completed';
      readonly timestamp: string;
      readonly durationMs: number;
      readonly documents: number;
      readonly rejected: number;
      readonly pages: number;
      readonly artifacts: readonly CompileLogArtifactOperation[];
      readonly check: boolean;
    }
  | {
      readonly name: 'content_build.failed';
      readonly timestamp: string;
      readonly durationMs: number;
      readonly stage: ActiveBuildStage;
      readonly code: ContentBuildErrorCode;
      readonly message: string;
      readonly stack?: string;
    };
