import { Writable } from 'node:stream';

import { describe, expect, it } from 'vitest';

import { createLogger } from './logging.js';

function capture(): { stream: Writable; output: () => string } {
  const chunks: string[] = [];
  const stream = new Writable({
    decodeStrings: false,
    write(chunk: unknown, _encoding, callback) {
      chunks.push(String(chunk));
      callback();
    },
  });
  return { stream, output: () => chunks.join('') };
}

describe('createLogger', () => {
  it('writes one JSON object per line', () => {
    const { stream, output } = capture();
    const logger = createLogger({ stream });

    logger({ name: 'content_build.stage', stage: 'loading', timestamp: '2024-01-01T00:00:00.000Z' });

    expect(output()).toBe(
      '{"name":"content_build.stage","stage":"loading","timestamp":"2024-01-01T00:00:00.000Z"}\n',
    );
  });

  it('indents events in pretty mode', () => {
    const { stream, output } = capture();
    const logger = createLogger({ stream, pretty: true });

    logger({ name: 'content_build.stage', stage: 'indexing', timestamp: 'now' });

    expect(output()).toBe(
      '{\n  "name": "content_build.stage",\n  "stage": "indexing",\n  "timestamp": "now"\n}\n',
    );
  });
});
