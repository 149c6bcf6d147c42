export type ContentBuildErrorCode =
  | 'build.sourceRootUnreadable'
  | 'build.publishFailed'
  | 'build.emptyCorpus'
  | 'build.artifactIntegrity';

/**
 * Structural build failure. Per-document problems never surface as errors;
 * they become diagnostics instead.
 */
export class ContentBuildError extends Error {
  readonly code: ContentBuildErrorCode;

  constructor(message: string, code: ContentBuildErrorCode, options?: { readonly cause?: unknown }) {
    super(message, options);
    this.name = 'ContentBuildError';
    this.code = code;
  }
}

export class SourceRootError extends ContentBuildError {
  readonly sourceRoot: string;

  constructor(sourceRoot: string, cause: unknown) {
    super(
      `Source root ${sourceRoot} could not be enumerated: ${describeCause(cause)}`,
      'build.sourceRootUnreadable',
      { cause },
    );
    this.name = 'SourceRootError';
    this.sourceRoot = sourceRoot;
  }
}

export class PublishError extends ContentBuildError {
  readonly outputRoot: string;

  constructor(outputRoot: string, cause: unknown) {
    super(
      `Artifacts could not be published to ${outputRoot}: ${describeCause(cause)}`,
      'build.publishFailed',
      { cause },
    );
    this.name = 'PublishError';
    this.outputRoot = outputRoot;
  }
}

export class EmptyCorpusError extends ContentBuildError {
  readonly totalSources: number;

  constructor(totalSources: number) {
    super(
      `No valid documents were found among ${totalSources} source file(s).`,
      'build.emptyCorpus',
    );
    this.name = 'EmptyCorpusError';
    this.totalSources = totalSources;
  }
}

export class ArtifactIntegrityError extends ContentBuildError {
  readonly artifactPath: string;

  constructor(artifactPath: string, message: string, options?: { readonly cause?: unknown }) {
    super(`Artifact ${artifactPath} failed verification: ${message}`, 'build.artifactIntegrity', options);
    this.name = 'ArtifactIntegrityError';
    this.artifactPath = artifactPath;
  }
}

export function describeCause(cause: unknown): string {
  return cause instanceof Error ? cause.message : String(cause);
}
