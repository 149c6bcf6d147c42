import { promises as fsPromises, type Dirent } from 'node:fs';
import path from 'node:path';

import { DIAGNOSTIC_CODES, type Diagnostic } from '@folio/content-schema';

import { SourceRootError, describeCause } from '../errors.js';
import { deepFreeze } from '../runtime.js';
import type { ContentSource, SourceDiscovery } from '../types.js';

const SOURCE_EXTENSION = '.md';
const IGNORED_DIRECTORIES = new Set(['node_modules']);

export type DirectoryReader = (directory: string) => Promise<Dirent[]>;

export interface DiscoveryOptions {
  /** Replaces `readdir`, e.g. to simulate failures. */
  readonly readDirectory?: DirectoryReader;
}

const readDirectoryFromDisk: DirectoryReader = (directory) =>
  fsPromises.readdir(directory, { withFileTypes: true });

function toPosixPath(value: string): string {
  return value.split(path.sep).join('/');
}

function isIgnoredDirectory(name: string): boolean {
  return name.startsWith('.') || IGNORED_DIRECTORIES.has(name);
}

function isSourceName(name: string): boolean {
  return name.endsWith(SOURCE_EXTENSION);
}

/**
 * Symlinks count as sources when their name ends in `.md` and they do not
 * resolve to a directory. A dangling link is still listed so the read fails
 * with a diagnostic. Directory links are not followed.
 */
async function isLinkedSource(entryPath: string, name: string): Promise<boolean> {
  if (!isSourceName(name)) {
    return false;
  }
  try {
    const stats = await fsPromises.stat(entryPath);
    return !stats.isDirectory();
  } catch {
    return true;
  }
}

function compareSources(left: ContentSource, right: ContentSource): number {
  if (left.relativePath === right.relativePath) {
    return 0;
  }
  return left.relativePath < right.relativePath ? -1 : 1;
}

/**
 * Enumerates every `*.md` unit under the source root. The returned order,
 * relative posix path by code unit, is the build's enumeration order.
 *
 * Only an unreadable root is fatal; a nested directory that cannot be read
 * becomes a `document.unreadable` diagnostic whose source ends in `/`.
 */
export async function discoverSources(
  sourceRoot: string,
  options: DiscoveryOptions = {},
): Promise<SourceDiscovery> {
  const readDirectory = options.readDirectory ?? readDirectoryFromDisk;
  const rootDirectory = path.resolve(sourceRoot);
  const sources: ContentSource[] = [];
  const diagnostics: Diagnostic[] = [];
  const pending: string[] = [rootDirectory];

  while (pending.length > 0) {
    const currentDir = pending.pop();
    if (currentDir === undefined) {
      continue;
    }

    let entries: Dirent[];
    try {
      entries = await readDirectory(currentDir);
    } catch (error) {
      if (currentDir === rootDirectory) {
        throw new SourceRootError(rootDirectory, error);
      }
      diagnostics.push(
        deepFreeze({
          source: `${toPosixPath(path.relative(rootDirectory, currentDir))}/`,
          code: DIAGNOSTIC_CODES.unreadable,
          message: `Directory could not be read: ${describeCause(error)}`,
        }),
      );
      continue;
    }

    for (const entry of entries) {
      const entryPath = path.join(currentDir, entry.name);
      if (entry.isDirectory()) {
        if (!isIgnoredDirectory(entry.name)) {
          pending.push(entryPath);
        }
        continue;
      }

      const included = entry.isSymbolicLink()
        ? await isLinkedSource(entryPath, entry.name)
        : entry.isFile() && isSourceName(entry.name);
      if (!included) {
        continue;
      }
      sources.push({
        absolutePath: entryPath,
        relativePath: toPosixPath(path.relative(rootDirectory, entryPath)),
      });
    }
  }

  sources.sort(compareSources);
  diagnostics.sort((left, right) =>
    left.source === right.source ? 0 : left.source < right.source ? -1 : 1,
  );

  return { sources, diagnostics };
}
