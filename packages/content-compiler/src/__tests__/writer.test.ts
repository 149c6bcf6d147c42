import { promises as fs } from 'node:fs';
import path from 'node:path';

import { afterEach, describe, expect, it } from 'vitest';

import { serializeArtifact } from '../artifacts/json.js';
import { publishArtifacts } from '../fs/writer.js';
import type { EmittedArtifact } from '../types.js';
import { createTempDirectory } from './fixtures.js';

const TMP_PREFIX = 'content-compiler-writer-';
const directories: string[] = [];

async function createOutputRoot(): Promise<string> {
  const directory = await createTempDirectory(TMP_PREFIX);
  directories.push(directory);
  return directory;
}

afterEach(async () => {
  await Promise.all(
    directories.splice(0).map((directory) => fs.rm(directory, { recursive: true, force: true })),
  );
});

function detail(slug: string, title = `Title of ${slug}`): EmittedArtifact {
  return serializeArtifact({
    kind: 'detail',
    key: slug,
    path: `posts/${slug}.json`,
    payload: { slug, title },
  });
}

function manifest(pages: number): EmittedArtifact {
  return serializeArtifact({
    kind: 'manifest',
    key: 'manifest',
    path: 'manifest.json',
    payload: { totalPages: pages },
  });
}

describe('publishArtifacts', () => {
  it('writes canonical JSON with a trailing newline', async () => {
    const outputRoot = await createOutputRoot();
    const artifact = detail('hello');

    const result = await publishArtifacts(outputRoot, [artifact, manifest(0)]);

    expect(result.operations).toEqual([
      { key: 'hello', kind: 'detail', path: 'posts/hello.json', action: 'written' },
      { key: 'manifest', kind: 'manifest', path: 'manifest.json', action: 'written' },
    ]);
    await expect(fs.readFile(path.join(outputRoot, 'posts/hello.json'), 'utf8')).resolves.toBe(
      '{"slug":"hello","title":"Title of hello"}\n',
    );
    const leftovers = (await fs.readdir(path.join(outputRoot, 'posts'))).filter((name) =>
      name.startsWith('.tmp-'),
    );
    expect(leftovers).toHaveLength(0);
  });

  it('does not rewrite identical artifacts', async () => {
    const outputRoot = await createOutputRoot();
    await publishArtifacts(outputRoot, [detail('stable'), manifest(0)]);
    const second = await publishArtifacts(outputRoot, [detail('stable'), manifest(0)]);

    expect(second.operations.map((operation) => operation.action)).toEqual([
      'unchanged',
      'unchanged',
    ]);
  });

  it('rewrites identical artifacts in clean mode', async () => {
    const outputRoot = await createOutputRoot();
    await publishArtifacts(outputRoot, [detail('stable')]);
    const second = await publishArtifacts(outputRoot, [detail('stable')], { clean: true });
    expect(second.operations.map((operation) => operation.action)).toEqual(['written']);
  });

  it('prunes pages and details the build no longer produces', async () => {
    const outputRoot = await createOutputRoot();
    await publishArtifacts(outputRoot, [
      detail('kept'),
      detail('removed'),
      serializeArtifact({ kind: 'page', key: '2', path: 'pages/page_2.json', payload: { page: 2 } }),
      manifest(2),
    ]);

    const second = await publishArtifacts(outputRoot, [detail('kept'), manifest(1)]);

    expect(second.operations).toEqual([
      { key: 'kept', kind: 'detail', path: 'posts/kept.json', action: 'unchanged' },
      { key: 'manifest', kind: 'manifest', path: 'manifest.json', action: 'written' },
      { key: 'page_2', kind: 'page', path: 'pages/page_2.json', action: 'deleted' },
      { key: 'removed', kind: 'detail', path: 'posts/removed.json', action: 'deleted' },
    ]);
    await expect(fs.access(path.join(outputRoot, 'posts/removed.json'))).rejects.toThrow();
    await expect(fs.access(path.join(outputRoot, 'pages/page_2.json'))).rejects.toThrow();
  });

  it('leaves unrelated files alone', async () => {
    const outputRoot = await createOutputRoot();
    await fs.mkdir(path.join(outputRoot, 'posts'), { recursive: true });
    await fs.writeFile(path.join(outputRoot, 'posts', 'notes.txt'), 'keep me', 'utf8');
    await fs.writeFile(path.join(outputRoot, 'robots.txt'), 'keep me too', 'utf8');

    const result = await publishArtifacts(outputRoot, [manifest(0)]);

    expect(result.operations).toHaveLength(1);
    await expect(fs.readFile(path.join(outputRoot, 'posts', 'notes.txt'), 'utf8')).resolves.toBe(
      'keep me',
    );
  });

  it('reports drift without touching the disk in check mode', async () => {
    const outputRoot = await createOutputRoot();
    await publishArtifacts(outputRoot, [detail('old'), manifest(0)]);

    const result = await publishArtifacts(
      outputRoot,
      [detail('new'), detail('old', 'Changed'), manifest(0)],
      { check: true },
    );

    expect(result.operations.map((operation) => [operation.path, operation.action])).toEqual([
      ['posts/new.json', 'would-write'],
      ['posts/old.json', 'would-write'],
      ['manifest.json', 'unchanged'],
    ]);
    await expect(fs.access(path.join(outputRoot, 'posts/new.json'))).rejects.toThrow();
    await expect(fs.readFile(path.join(outputRoot, 'posts/old.json'), 'utf8')).resolves.toBe(
      '{"slug":"old","title":"Title of old"}\n',
    );
  });

  it('reports stale artifacts as would-delete in check mode', async () => {
    const outputRoot = await createOutputRoot();
    await publishArtifacts(outputRoot, [detail('gone')]);

    const result = await publishArtifacts(outputRoot, [], { check: true });

    expect(result.operations).toEqual([
      { key: 'gone', kind: 'detail', path: 'posts/gone.json', action: 'would-delete' },
    ]);
    await expect(fs.access(path.join(outputRoot, 'posts/gone.json'))).resolves.toBeUndefined();
  });

  it('fails when the output root cannot be created', async () => {
    const parent = await createOutputRoot();
    const blocker = path.join(parent, 'blocker');
    await fs.writeFile(blocker, 'not a directory', 'utf8');

    await expect(
      publishArtifacts(path.join(blocker, 'site'), [manifest(0)]),
    ).rejects.toThrow(/ENOTDIR/);
  });
});
