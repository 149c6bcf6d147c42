import canonicalize from 'canonicalize';

import { computeArtifactHash } from '../hashing.js';
import type { ArtifactKind, EmittedArtifact } from '../types.js';

/**
 * RFC 8785 canonical JSON: sorted keys, no insignificant whitespace.
 */
export function toCanonicalJson(value: unknown): string {
  const result = canonicalize(value);
  if (typeof result !== 'string') {
    throw new Error('Failed to canonicalize artifact payload.');
  }
  return result;
}

export interface SerializeArtifactInput {
  readonly kind: ArtifactKind;
  readonly key: string;
  readonly path: string;
  readonly payload: unknown;
}

export function serializeArtifact(input: SerializeArtifactInput): EmittedArtifact {
  const canonicalJson = toCanonicalJson(input.payload);
  return Object.freeze({
    kind: input.kind,
    key: input.key,
    path: input.path,
    canonicalJson,
    artifactHash: computeArtifactHash(canonicalJson),
  });
}

/** On-disk bytes: the canonical JSON plus a trailing newline. */
export function toArtifactBytes(artifact: EmittedArtifact): Uint8Array {
  return Buffer.from(`${artifact.canonicalJson}\n`, 'utf8');
}
