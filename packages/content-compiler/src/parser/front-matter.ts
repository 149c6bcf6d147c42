import matter from 'gray-matter';
import { parse as parseYaml } from 'yaml';

import { describeCause } from '../errors.js';

export type FrontMatterExtraction =
  | {
      readonly status: 'ok';
      readonly data: Readonly<Record<string, unknown>>;
      readonly body: string;
    }
  | { readonly status: 'missing' }
  | {
      readonly status: 'malformed';
      readonly message: string;
    };

class FrontMatterShapeError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'FrontMatterShapeError';
  }
}

/**
 * YAML 1.2 core schema: `2024-01-05` stays a string instead of becoming a
 * `Date`, and `yes`/`no` stay strings. Integers are read as `bigint` so ids
 * past 2^53 keep every digit.
 */
function parseYamlMapping(source: string): object {
  const value: unknown = parseYaml(source, { intAsBigInt: true });
  if (value === null || value === undefined) {
    return {};
  }
  if (typeof value !== 'object' || Array.isArray(value)) {
    throw new FrontMatterShapeError('front matter must be a mapping of keys to values');
  }
  return value;
}

function rejectLanguage(language: string): (source: string) => object {
  return () => {
    throw new FrontMatterShapeError(
      `front matter language "${language}" is not supported; use YAML`,
    );
  };
}

// Only YAML is parsed. Language tags after the opening fence (`---js`,
// `---json`) select these engines; unknown tags make gray-matter throw.
// Passing options also bypasses gray-matter's module-level result cache.
const MATTER_OPTIONS = {
  engines: {
    yaml: parseYamlMapping,
    yml: parseYamlMapping,
    javascript: rejectLanguage('javascript'),
    js: rejectLanguage('js'),
    json: rejectLanguage('json'),
  },
};

const BYTE_ORDER_MARK = '\uFEFF';

export function extractFrontMatter(raw: string): FrontMatterExtraction {
  const text = raw.startsWith(BYTE_ORDER_MARK) ? raw.slice(1) : raw;
  if (!matter.test(text, MATTER_OPTIONS)) {
    return { status: 'missing' };
  }

  try {
    const file = matter(text, MATTER_OPTIONS);
    const data: Readonly<Record<string, unknown>> = file.data;
    return { status: 'ok', data, body: file.content };
  } catch (error) {
    return { status: 'malformed', message: describeCause(error) };
  }
}
