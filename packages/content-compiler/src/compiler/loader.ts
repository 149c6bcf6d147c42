import { promises as fsPromises } from 'node:fs';

import { DIAGNOSTIC_CODES, type Diagnostic, type DiagnosticCode } from '@folio/content-schema';

import { describeCause } from '../errors.js';
import { parseDocument } from '../parser/document.js';
import { deepFreeze } from '../runtime.js';
import type {
  ContentSource,
  CorpusLoadResult,
  LoadedDocument,
  ParseResult,
  SourceReader,
} from '../types.js';
import { mapWithConcurrency } from './concurrency.js';

export interface LoadCorpusOptions {
  readonly concurrency: number;
  /** Replaces the filesystem read, e.g. for in-memory sources. */
  readonly readSource?: SourceReader;
}

export interface SourceOutcome {
  readonly source: ContentSource;
  readonly result: ParseResult;
}

export const readSourceFromDisk: SourceReader = (source) =>
  fsPromises.readFile(source.absolutePath, 'utf8');

function rejectSource(
  source: ContentSource,
  code: DiagnosticCode,
  message: string,
): SourceOutcome {
  return {
    source,
    result: {
      ok: false,
      diagnostic: deepFreeze({ source: source.relativePath, code, message }),
    },
  };
}

async function loadSource(source: ContentSource, readSource: SourceReader): Promise<SourceOutcome> {
  let raw: string;
  try {
    raw = await readSource(source);
  } catch (error) {
    return rejectSource(
      source,
      DIAGNOSTIC_CODES.unreadable,
      `Source could not be read: ${describeCause(error)}`,
    );
  }

  // A throw here (e.g. a body nested past the stack limit) rejects this unit only.
  try {
    return { source, result: parseDocument(raw, source.relativePath) };
  } catch (error) {
    return rejectSource(
      source,
      DIAGNOSTIC_CODES.unparsable,
      `Source could not be parsed: ${describeCause(error)}`,
    );
  }
}

function duplicateKey(
  source: ContentSource,
  field: 'id' | 'slug',
  value: string,
  owner: string,
): Diagnostic {
  return deepFreeze({
    source: source.relativePath,
    code: DIAGNOSTIC_CODES.duplicateKey,
    message: `Duplicate ${field} "${value}" (already declared in ${owner}).`,
    field,
  });
}

/**
 * Folds per-source outcomes in enumeration order. The first source to claim
 * an id or slug keeps it; later claimants are rejected.
 */
export function reconcileOutcomes(outcomes: readonly SourceOutcome[]): CorpusLoadResult {
  const documents: LoadedDocument[] = [];
  const diagnostics: Diagnostic[] = [];
  const idOwners = new Map<string, string>();
  const slugOwners = new Map<string, string>();

  for (const { source, result } of outcomes) {
    if (!result.ok) {
      diagnostics.push(result.diagnostic);
      continue;
    }

    const { document } = result;
    const idOwner = idOwners.get(document.id);
    if (idOwner !== undefined) {
      diagnostics.push(duplicateKey(source, 'id', document.id, idOwner));
      continue;
    }
    const slugOwner = slugOwners.get(document.slug);
    if (slugOwner !== undefined) {
      diagnostics.push(duplicateKey(source, 'slug', document.slug, slugOwner));
      continue;
    }

    idOwners.set(document.id, source.relativePath);
    slugOwners.set(document.slug, source.relativePath);
    documents.push({ source, document });
  }

  return {
    totalSources: outcomes.length,
    documents,
    diagnostics,
  };
}

/**
 * Reads and parses every source with bounded concurrency, then reconciles
 * duplicates in a single sequential pass. Each source ends up either as an
 * accepted document or as exactly one diagnostic.
 */
export async function loadCorpus(
  sources: readonly ContentSource[],
  options: LoadCorpusOptions,
): Promise<CorpusLoadResult> {
  const readSource = options.readSource ?? readSourceFromDisk;
  const outcomes = await mapWithConcurrency(sources, options.concurrency, (source) =>
    loadSource(source, readSource),
  );
  return reconcileOutcomes(outcomes);
}
