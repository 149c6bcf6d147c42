import {
  detailArtifactSchema,
  manifestArtifactSchema,
  pageArtifactSchema,
  type Document,
  type ManifestArtifact,
  type PageArtifact,
} from '@folio/content-schema';
import type { ZodType } from 'zod';

import { ArtifactIntegrityError, describeCause } from './errors.js';

export function deepFreeze<Value>(value: Value): Value {
  if (value === null || typeof value !== 'object' || Object.isFrozen(value)) {
    return value;
  }

  if (Array.isArray(value)) {
    value.forEach((item) => {
      deepFreeze(item);
    });
  } else if (value instanceof Map) {
    value.forEach((mapValue, mapKey) => {
      deepFreeze(mapKey);
      deepFreeze(mapValue);
    });
  } else {
    for (const key of Reflect.ownKeys(value)) {
      const descriptor = Object.getOwnPropertyDescriptor(value, key);
      if (descriptor?.value !== undefined) {
        deepFreeze(descriptor.value);
      }
    }
  }

  return Object.freeze(value);
}

function readArtifact<Value>(
  schema: ZodType<Value>,
  json: string,
  artifactPath: string,
): Value {
  let raw: unknown;
  try {
    raw = JSON.parse(json);
  } catch (error) {
    throw new ArtifactIntegrityError(artifactPath, `invalid JSON (${describeCause(error)})`, {
      cause: error,
    });
  }

  const parsed = schema.safeParse(raw);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join('.') || '<root>'}: ${issue.message}`)
      .join('; ');
    throw new ArtifactIntegrityError(artifactPath, details, { cause: parsed.error });
  }
  return deepFreeze(parsed.data);
}

/**
 * Parses a detail artifact back into the document it was emitted from.
 */
export function readDetailArtifact(json: string, artifactPath = '<detail>'): Document {
  return readArtifact(detailArtifactSchema, json, artifactPath).document;
}

export function readPageArtifact(json: string, artifactPath = '<page>'): PageArtifact {
  return readArtifact(pageArtifactSchema, json, artifactPath);
}

export function readManifestArtifact(
  json: string,
  artifactPath = '<manifest>',
): ManifestArtifact {
  return readArtifact(manifestArtifactSchema, json, artifactPath);
}
