import { promises as fs } from 'node:fs';
import os from 'node:os';
import path from 'node:path';

import type { Document } from '@folio/content-schema';

import type { ContentSource, SourceReader } from '../types.js';

export interface SourceFields {
  readonly id: string;
  readonly slug: string;
  readonly date: string;
  readonly title?: string;
  readonly tags?: readonly string[];
  readonly summary?: string;
}

/** Renders a Markdown source unit with a YAML front matter block. */
export function renderSource(fields: SourceFields, body = 'Hello world.'): string {
  const lines = [
    '---',
    `id: ${JSON.stringify(fields.id)}`,
    `slug: ${fields.slug}`,
    `title: ${JSON.stringify(fields.title ?? `Post ${fields.id}`)}`,
    `date: ${fields.date}`,
  ];
  if (fields.tags !== undefined) {
    lines.push(`tags: [${fields.tags.map((tag) => JSON.stringify(tag)).join(', ')}]`);
  }
  if (fields.summary !== undefined) {
    lines.push(`summary: ${JSON.stringify(fields.summary)}`);
  }
  lines.push('---', '', body, '');
  return lines.join('\n');
}

export function createDocument(
  fields: Pick<SourceFields, 'id' | 'date'> & Partial<SourceFields>,
): Document {
  return {
    id: fields.id,
    slug: fields.slug ?? `post-${fields.id}`,
    title: fields.title ?? `Post ${fields.id}`,
    date: fields.date,
    tags: fields.tags ?? [],
    summary: fields.summary ?? '',
    body: [{ type: 'paragraph', children: [{ type: 'text', value: `Body of ${fields.id}.` }] }],
  };
}

/** `count` documents with distinct ids and dates one day apart, newest first. */
export function createDocuments(count: number): Document[] {
  return Array.from({ length: count }, (_, offset) => {
    const day = new Date(Date.UTC(2024, 0, 1) - offset * 86_400_000);
    return createDocument({
      id: `doc-${String(offset).padStart(3, '0')}`,
      date: day.toISOString().slice(0, 10),
    });
  });
}

export interface MemoryCorpus {
  readonly sources: ContentSource[];
  readonly readSource: SourceReader;
}

/**
 * In-memory stand-in for a source root. Sources keep the order of `files`;
 * a `null` entry fails to read.
 */
export function createMemoryCorpus(files: Readonly<Record<string, string | null>>): MemoryCorpus {
  const sources = Object.keys(files).map((relativePath) => ({
    absolutePath: `/memory/${relativePath}`,
    relativePath,
  }));
  const readSource: SourceReader = async (source) => {
    const text = files[source.relativePath];
    if (typeof text !== 'string') {
      throw new Error(`EACCES: permission denied, open '${source.absolutePath}'`);
    }
    return text;
  };
  return { sources, readSource };
}

export async function createTempDirectory(prefix: string): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), prefix));
}

export async function writeSourceFiles(
  root: string,
  files: Readonly<Record<string, string>>,
): Promise<void> {
  for (const [relativePath, text] of Object.entries(files)) {
    const target = path.join(root, relativePath);
    await fs.mkdir(path.dirname(target), { recursive: true });
    await fs.writeFile(target, text, 'utf8');
  }
}
