import { DIAGNOSTIC_CODES } from '@folio/content-schema';
import { describe, expect, it } from 'vitest';

import { mapWithConcurrency } from '../compiler/concurrency.js';
import { loadCorpus } from '../compiler/loader.js';
import { buildCorpusIndex } from '../compiler/ordering.js';
import { createMemoryCorpus, renderSource } from './fixtures.js';

describe('mapWithConcurrency', () => {
  it('keeps input order when tasks finish out of order', async () => {
    const delays = [30, 5, 20, 0, 10];
    const results = await mapWithConcurrency(delays, 3, async (delay, index) => {
      await new Promise((resolve) => setTimeout(resolve, delay));
      return index;
    });
    expect(results).toEqual([0, 1, 2, 3, 4]);
  });

  it('never runs more than the limit at once', async () => {
    let active = 0;
    let peak = 0;
    await mapWithConcurrency(Array.from({ length: 12 }, (_, index) => index), 4, async () => {
      active += 1;
      peak = Math.max(peak, active);
      await new Promise((resolve) => setTimeout(resolve, 1));
      active -= 1;
    });
    expect(peak).toBe(4);
  });

  it('handles empty input', async () => {
    await expect(mapWithConcurrency([], 4, async () => 1)).resolves.toEqual([]);
  });
});

describe('loadCorpus', () => {
  it('accounts for every source exactly once', async () => {
    const corpus = createMemoryCorpus({
      'a.md': renderSource({ id: 'a', slug: 'alpha', date: '2024-01-01' }),
      'b.md': 'no front matter\n',
      'c.md': renderSource({ id: 'c', slug: 'gamma', date: '2024-01-03' }),
      'd.md': null,
    });

    const result = await loadCorpus(corpus.sources, {
      concurrency: 2,
      readSource: corpus.readSource,
    });

    expect(result.totalSources).toBe(4);
    expect(result.documents.map((entry) => entry.document.id)).toEqual(['a', 'c']);
    expect(result.documents.map((entry) => entry.source.relativePath)).toEqual(['a.md', 'c.md']);
    expect(result.diagnostics.map((diagnostic) => [diagnostic.source, diagnostic.code])).toEqual([
      ['b.md', DIAGNOSTIC_CODES.missingFrontMatter],
      ['d.md', DIAGNOSTIC_CODES.unreadable],
    ]);
    expect(result.documents.length + result.diagnostics.length).toBe(result.totalSources);
  });

  it('reports read failures as unreadable documents', async () => {
    const corpus = createMemoryCorpus({ 'locked.md': null });
    const result = await loadCorpus(corpus.sources, {
      concurrency: 1,
      readSource: corpus.readSource,
    });
    expect(result.diagnostics).toEqual([
      {
        source: 'locked.md',
        code: DIAGNOSTIC_CODES.unreadable,
        message: "Source could not be read: EACCES: permission denied, open '/memory/locked.md'",
      },
    ]);
  });

  it('rejects a source whose body cannot be parsed and keeps the rest', async () => {
    const corpus = createMemoryCorpus({
      'deep.md': renderSource(
        { id: 'deep', slug: 'deep', date: '2024-01-01' },
        `${'>'.repeat(20_000)} x`,
      ),
      'ok.md': renderSource({ id: 'ok', slug: 'ok', date: '2024-01-02' }),
    });

    const result = await loadCorpus(corpus.sources, {
      concurrency: 2,
      readSource: corpus.readSource,
    });

    expect(result.totalSources).toBe(2);
    expect(result.documents.map((entry) => entry.document.id)).toEqual(['ok']);
    expect(result.diagnostics).toHaveLength(1);
    expect(result.diagnostics[0]?.source).toBe('deep.md');
    expect(result.diagnostics[0]?.code).toBe(DIAGNOSTIC_CODES.unparsable);
    expect(result.diagnostics[0]?.message).toMatch(/^Source could not be parsed: /);
  });

  it('keeps large integer ids distinct', async () => {
    const corpus = createMemoryCorpus({
      'a.md': '---\nid: 12345678901234567890\nslug: a\ntitle: A\ndate: 2024-01-01\n---\n',
      'b.md': '---\nid: 12345678901234567891\nslug: b\ntitle: B\ndate: 2024-01-01\n---\n',
    });

    const result = await loadCorpus(corpus.sources, {
      concurrency: 2,
      readSource: corpus.readSource,
    });

    expect(result.diagnostics).toEqual([]);
    expect(result.documents.map((entry) => entry.document.id)).toEqual([
      '12345678901234567890',
      '12345678901234567891',
    ]);
  });

  it('rejects a later document that reuses an id', async () => {
    const corpus = createMemoryCorpus({
      'a.md': renderSource({ id: '1', slug: 'first', date: '2024-01-01' }),
      'b.md': renderSource({ id: '1', slug: 'second', date: '2024-01-02' }),
    });
    const result = await loadCorpus(corpus.sources, {
      concurrency: 2,
      readSource: corpus.readSource,
    });

    expect(result.documents.map((entry) => entry.document.slug)).toEqual(['first']);
    expect(result.diagnostics).toEqual([
      {
        source: 'b.md',
        code: DIAGNOSTIC_CODES.duplicateKey,
        message: 'Duplicate id "1" (already declared in a.md).',
        field: 'id',
      },
    ]);
  });

  it('rejects a later document that reuses a slug', async () => {
    const corpus = createMemoryCorpus({
      'a.md': renderSource({ id: '1', slug: 'shared', date: '2024-01-01' }),
      'b.md': renderSource({ id: '2', slug: 'shared', date: '2024-01-02' }),
    });
    const result = await loadCorpus(corpus.sources, {
      concurrency: 2,
      readSource: corpus.readSource,
    });

    expect(result.documents.map((entry) => entry.document.id)).toEqual(['1']);
    expect(result.diagnostics[0]?.field).toBe('slug');
    expect(result.diagnostics[0]?.message).toBe(
      'Duplicate slug "shared" (already declared in a.md).',
    );
  });

  it('checks the id before the slug', async () => {
    const corpus = createMemoryCorpus({
      'a.md': renderSource({ id: '1', slug: 'same', date: '2024-01-01' }),
      'b.md': renderSource({ id: '1', slug: 'same', date: '2024-01-01' }),
    });
    const result = await loadCorpus(corpus.sources, {
      concurrency: 1,
      readSource: corpus.readSource,
    });
    expect(result.diagnostics.map((diagnostic) => diagnostic.field)).toEqual(['id']);
  });

  it('picks the duplicate winner by enumeration order but keeps canonical order stable', async () => {
    const files = {
      'a.md': renderSource({ id: 'x', slug: 'from-a', date: '2024-01-01' }),
      'b.md': renderSource({ id: 'x', slug: 'from-b', date: '2024-01-01' }),
      'c.md': renderSource({ id: 'c', slug: 'gamma', date: '2024-02-01' }),
      'd.md': renderSource({ id: 'd', slug: 'delta', date: '2023-12-01' }),
    };
    const forward = createMemoryCorpus(files);
    const reversed = createMemoryCorpus(
      Object.fromEntries(Object.entries(files).reverse()),
    );

    const forwardResult = await loadCorpus(forward.sources, {
      concurrency: 4,
      readSource: forward.readSource,
    });
    const reversedResult = await loadCorpus(reversed.sources, {
      concurrency: 4,
      readSource: reversed.readSource,
    });

    const forwardIndex = buildCorpusIndex(
      forwardResult.documents.map((entry) => entry.document),
      10,
    );
    const reversedIndex = buildCorpusIndex(
      reversedResult.documents.map((entry) => entry.document),
      10,
    );

    expect(forwardIndex.summaries.map((summary) => summary.slug)).toEqual([
      'gamma',
      'from-a',
      'delta',
    ]);
    expect(reversedIndex.summaries.map((summary) => summary.slug)).toEqual([
      'gamma',
      'from-b',
      'delta',
    ]);
    expect(forwardIndex.summaries.map((summary) => summary.id)).toEqual(
      reversedIndex.summaries.map((summary) => summary.id),
    );
    expect(forwardResult.diagnostics.map((diagnostic) => diagnostic.source)).toEqual(['b.md']);
    expect(reversedResult.diagnostics.map((diagnostic) => diagnostic.source)).toEqual(['a.md']);
  });

  it('does not depend on the concurrency limit', async () => {
    const files = Object.fromEntries(
      Array.from({ length: 9 }, (_, index) => [
        `post-${index}.md`,
        index === 4
          ? 'broken\n'
          : renderSource({ id: `id-${index % 7}`, slug: `slug-${index}`, date: '2024-05-01' }),
      ]),
    );
    const corpus = createMemoryCorpus(files);

    const serial = await loadCorpus(corpus.sources, {
      concurrency: 1,
      readSource: corpus.readSource,
    });
    const parallel = await loadCorpus(corpus.sources, {
      concurrency: 8,
      readSource: corpus.readSource,
    });

    expect(parallel).toEqual(serial);
    expect(serial.diagnostics.map((diagnostic) => diagnostic.source)).toEqual([
      'post-4.md',
      'post-7.md',
      'post-8.md',
    ]);
  });
});
