import os from 'node:os';
import path from 'node:path';

import { describe, expect, it } from 'vitest';

import { DEFAULT_BUILD_CONFIG, resolveBuildConfig } from './config.js';

describe('resolveBuildConfig', () => {
  it('fills defaults and resolves roots to absolute paths', () => {
    const config = resolveBuildConfig({ sourceRoot: 'content', outputRoot: 'public' });
    expect(config).toEqual({
      sourceRoot: path.resolve('content'),
      outputRoot: path.resolve('public'),
      pageSize: 10,
      requireDocuments: false,
      verifyArtifacts: true,
      concurrency: Math.max(1, os.availableParallelism()),
      check: false,
      clean: false,
    });
    expect(Object.isFrozen(config)).toBe(true);
  });

  it('keeps explicit overrides', () => {
    const config = resolveBuildConfig({
      sourceRoot: '/src',
      outputRoot: '/out',
      pageSize: 3,
      requireDocuments: true,
      site: { title: 'Notes' },
    });
    expect(config.pageSize).toBe(3);
    expect(config.requireDocuments).toBe(true);
    expect(config.site).toEqual({ title: 'Notes' });
  });

  it('falls back to the default concurrency for unusable values', () => {
    for (const concurrency of [0, -2, Number.NaN]) {
      expect(resolveBuildConfig({ sourceRoot: '/src', outputRoot: '/out', concurrency }).concurrency).toBe(
        DEFAULT_BUILD_CONFIG.concurrency,
      );
    }
    expect(
      resolveBuildConfig({ sourceRoot: '/src', outputRoot: '/out', concurrency: 2.7 }).concurrency,
    ).toBe(2);
  });

  it.each([0, -5, 1.5])('rejects page size %s', (pageSize) => {
    expect(() => resolveBuildConfig({ sourceRoot: '/src', outputRoot: '/out', pageSize })).toThrow(
      RangeError,
    );
  });
});
