import { getDetailArtifactPath, type Document, type DocumentSummary } from '@folio/content-schema';

import { assertPageSize } from '../config.js';
import { deepFreeze } from '../runtime.js';
import type { CorpusIndex } from '../types.js';

function compareCodeUnits(left: string, right: string): number {
  if (left === right) {
    return 0;
  }
  return left < right ? -1 : 1;
}

/**
 * Canonical order: date descending, then id ascending by code unit. Ids are
 * unique after reconciliation, so this is a total order.
 */
export function compareDocuments(left: Document, right: Document): number {
  return compareCodeUnits(right.date, left.date) || compareCodeUnits(left.id, right.id);
}

export function countPages(totalDocuments: number, pageSize: number): number {
  assertPageSize(pageSize);
  return Math.ceil(totalDocuments / pageSize);
}

export function createDocumentSummary(document: Document): DocumentSummary {
  return {
    id: document.id,
    slug: document.slug,
    title: document.title,
    date: document.date,
    tags: [...document.tags],
    summary: document.summary,
    path: getDetailArtifactPath(document.slug),
  };
}

function buildTagIndex(documents: readonly Document[]): Map<string, string[]> {
  const slugsByTag = new Map<string, string[]>();
  for (const document of documents) {
    for (const tag of document.tags) {
      const slugs = slugsByTag.get(tag);
      if (slugs === undefined) {
        slugsByTag.set(tag, [document.slug]);
      } else {
        slugs.push(document.slug);
      }
    }
  }
  return new Map(
    [...slugsByTag.entries()].sort(([left], [right]) => compareCodeUnits(left, right)),
  );
}

/**
 * Builds the canonical, immutable view of the corpus. The result depends on
 * the set of documents only, never on the order they arrive in.
 */
export function buildCorpusIndex(documents: readonly Document[], pageSize: number): CorpusIndex {
  const totalPages = countPages(documents.length, pageSize);
  const ordered = [...documents].sort(compareDocuments);

  return deepFreeze({
    documents: ordered,
    summaries: ordered.map(createDocumentSummary),
    totalDocuments: ordered.length,
    pageSize,
    totalPages,
    tags: buildTagIndex(ordered),
  });
}
