import {
  ARTIFACT_FORMAT_VERSION,
  getDetailArtifactPath,
  type DetailArtifact,
  type Document,
} from '@folio/content-schema';

import { serializeArtifact, toCanonicalJson } from '../artifacts/json.js';
import { ArtifactIntegrityError } from '../errors.js';
import { readDetailArtifact } from '../runtime.js';
import type { CorpusIndex, EmittedArtifact } from '../types.js';

export function createDetailArtifact(document: Document): EmittedArtifact {
  const payload: DetailArtifact = {
    formatVersion: ARTIFACT_FORMAT_VERSION,
    document,
  };
  return serializeArtifact({
    kind: 'detail',
    key: document.slug,
    path: getDetailArtifactPath(document.slug),
    payload,
  });
}

/** One artifact per valid document, in canonical order. */
export function createDetailArtifacts(index: CorpusIndex): EmittedArtifact[] {
  return index.documents.map(createDetailArtifact);
}

/**
 * Re-validates the bytes of a written detail artifact against the document
 * it was emitted from.
 */
export function verifyDetailArtifact(
  bytes: Uint8Array,
  document: Document,
  artifactPath = getDetailArtifactPath(document.slug),
): void {
  const restored = readDetailArtifact(Buffer.from(bytes).toString('utf8'), artifactPath);
  if (toCanonicalJson(restored) !== toCanonicalJson(document)) {
    throw new ArtifactIntegrityError(
      artifactPath,
      `content does not match document "${document.id}"`,
    );
  }
}
