import {
  ARTIFACT_FORMAT_VERSION,
  MANIFEST_PATH,
  getPageArtifactPath,
  type DocumentSummary,
  type ManifestArtifact,
  type ManifestPageEntry,
  type PageArtifact,
  type SiteMetadata,
} from '@folio/content-schema';

import { serializeArtifact } from '../artifacts/json.js';
import { assertPageSize } from '../config.js';
import type { CorpusIndex, EmittedArtifact, ShardSet } from '../types.js';

export interface ShardOptions {
  readonly site?: SiteMetadata;
}

/**
 * Splits `items` into consecutive chunks of `pageSize`; only the last chunk
 * may be shorter. An empty input yields no chunks.
 */
export function paginate<Item>(items: readonly Item[], pageSize: number): Item[][] {
  assertPageSize(pageSize);
  const pages: Item[][] = [];
  for (let offset = 0; offset < items.length; offset += pageSize) {
    pages.push(items.slice(offset, offset + pageSize));
  }
  return pages;
}

function createPageArtifact(
  documents: readonly DocumentSummary[],
  page: number,
  totalPages: number,
): EmittedArtifact {
  const payload: PageArtifact = {
    formatVersion: ARTIFACT_FORMAT_VERSION,
    page,
    totalPages,
    documents,
  };
  return serializeArtifact({
    kind: 'page',
    key: String(page),
    path: getPageArtifactPath(page),
    payload,
  });
}

export function createShards(index: CorpusIndex, options: ShardOptions = {}): ShardSet {
  const chunks = paginate(index.summaries, index.pageSize);
  if (chunks.length !== index.totalPages) {
    throw new Error(
      `Corpus index declares ${index.totalPages} pages but its summaries fill ${chunks.length}.`,
    );
  }

  const pages: EmittedArtifact[] = [];
  const entries: ManifestPageEntry[] = [];
  chunks.forEach((documents, offset) => {
    const page = offset + 1;
    const artifact = createPageArtifact(documents, page, chunks.length);
    pages.push(artifact);
    entries.push({
      page,
      path: artifact.path,
      count: documents.length,
      artifactHash: artifact.artifactHash,
    });
  });

  const manifest: ManifestArtifact = {
    formatVersion: ARTIFACT_FORMAT_VERSION,
    ...(options.site !== undefined ? { site: options.site } : {}),
    totalDocuments: index.totalDocuments,
    pageSize: index.pageSize,
    totalPages: pages.length,
    pages: entries,
    tags: Object.fromEntries(index.tags),
  };

  return {
    pages,
    manifest: serializeArtifact({
      kind: 'manifest',
      key: 'manifest',
      path: MANIFEST_PATH,
      payload: manifest,
    }),
  };
}
