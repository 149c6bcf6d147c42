import { randomUUID } from 'node:crypto';
import { promises as fsPromises } from 'node:fs';
import path from 'node:path';

import { DETAILS_DIRECTORY, PAGES_DIRECTORY } from '@folio/content-schema';

import { toArtifactBytes } from '../artifacts/json.js';
import type {
  ArtifactKind,
  ArtifactWriteResult,
  ArtifactWriterOptions,
  EmittedArtifact,
  FileWriteOperation,
} from '../types.js';
import { hasErrorCode } from './errno.js';

const ARTIFACT_SUFFIX = '.json';

/**
 * Directories whose artifacts are keyed by page number or slug. Anything in
 * them that the current build did not produce is stale.
 */
const PRUNED_DIRECTORIES: readonly (readonly [string, ArtifactKind])[] = [
  [DETAILS_DIRECTORY, 'detail'],
  [PAGES_DIRECTORY, 'page'],
];

/**
 * Writes artifacts in the order given, then prunes stale pages and details.
 * Callers order the list so the manifest lands after everything it
 * references.
 */
export async function publishArtifacts(
  outputRoot: string,
  artifacts: readonly EmittedArtifact[],
  options: ArtifactWriterOptions = {},
): Promise<ArtifactWriteResult> {
  const rootDirectory = path.resolve(outputRoot);
  const operations: FileWriteOperation[] = [];
  const existing = await collectExistingArtifacts(rootDirectory);

  for (const artifact of artifacts) {
    const targetPath = path.join(rootDirectory, artifact.path);
    const action = await writeFileInternal(targetPath, toArtifactBytes(artifact), options);
    operations.push(createOperation(artifact.key, artifact.kind, artifact.path, action));
    existing.delete(artifact.path);
  }

  const staleEntries = [...existing].sort(([left], [right]) => (left < right ? -1 : 1));
  for (const [relativePath, stale] of staleEntries) {
    const action = await removeFile(path.join(rootDirectory, relativePath), options);
    if (action !== undefined) {
      operations.push(createOperation(stale.key, stale.kind, relativePath, action));
    }
  }

  return {
    operations,
  };
}

async function writeFileInternal(
  targetPath: string,
  content: Uint8Array,
  options: ArtifactWriterOptions,
): Promise<'written' | 'unchanged' | 'would-write'> {
  const { check = false, clean = false } = options;
  const existing = await readFile(targetPath);
  const identical = existing !== undefined && buffersEqual(existing, content);

  if (check) {
    return identical ? 'unchanged' : 'would-write';
  }

  if (identical && !clean) {
    return 'unchanged';
  }

  await fsPromises.mkdir(path.dirname(targetPath), { recursive: true });
  const tempPath = path.join(
    path.dirname(targetPath),
    `.tmp-${path.basename(targetPath)}-${randomUUID()}`,
  );

  try {
    await fsPromises.writeFile(tempPath, content);
    await fsPromises.rename(tempPath, targetPath);
  } finally {
    await safeUnlink(tempPath);
  }

  return 'written';
}

async function removeFile(
  targetPath: string,
  options: ArtifactWriterOptions,
): Promise<'deleted' | 'would-delete' | undefined> {
  const exists = await fileExists(targetPath);
  if (!exists) {
    return undefined;
  }
  if (options.check) {
    return 'would-delete';
  }
  await fsPromises.unlink(targetPath);
  return 'deleted';
}

interface ExistingArtifact {
  readonly key: string;
  readonly kind: ArtifactKind;
}

async function collectExistingArtifacts(
  rootDirectory: string,
): Promise<Map<string, ExistingArtifact>> {
  const artifacts = new Map<string, ExistingArtifact>();

  for (const [directory, kind] of PRUNED_DIRECTORIES) {
    const entries = await readDirSafe(path.join(rootDirectory, directory));
    for (const entry of entries) {
      if (!entry.isFile() || !entry.name.endsWith(ARTIFACT_SUFFIX) || entry.name.startsWith('.')) {
        continue;
      }
      artifacts.set(`${directory}/${entry.name}`, {
        key: entry.name.slice(0, -ARTIFACT_SUFFIX.length),
        kind,
      });
    }
  }

  return artifacts;
}

function createOperation(
  key: string,
  kind: ArtifactKind,
  relativePath: string,
  action: FileWriteOperation['action'],
): FileWriteOperation {
  return {
    key,
    kind,
    path: relativePath,
    action,
  };
}

async function readDirSafe(target: string) {
  try {
    return await fsPromises.readdir(target, { withFileTypes: true });
  } catch (error) {
    if (hasErrorCode(error, 'ENOENT')) {
      return [];
    }
    throw error;
  }
}

async function readFile(targetPath: string): Promise<Uint8Array | undefined> {
  try {
    return await fsPromises.readFile(targetPath);
  } catch (error) {
    if (hasErrorCode(error, 'ENOENT')) {
      return undefined;
    }
    throw error;
  }
}

async function fileExists(targetPath: string): Promise<boolean> {
  try {
    await fsPromises.access(targetPath);
    return true;
  } catch {
    return false;
  }
}

async function safeUnlink(targetPath: string): Promise<void> {
  try {
    await fsPromises.unlink(targetPath);
  } catch (error) {
    if (hasErrorCode(error, 'ENOENT')) {
      return;
    }
    throw error;
  }
}

function buffersEqual(left: Uint8Array, right: Uint8Array): boolean {
  if (left.byteLength !== right.byteLength) {
    return false;
  }
  for (let index = 0; index < left.byteLength; index += 1) {
    if (left[index] !== right[index]) {
      return false;
    }
  }
  return true;
}
