import {
  DIAGNOSTIC_CODES,
  REQUIRED_FRONT_MATTER_FIELDS,
  frontMatterSchema,
  type Diagnostic,
  type DiagnosticCode,
  type Document,
} from '@folio/content-schema';

import { deepFreeze } from '../runtime.js';
import type { ParseResult } from '../types.js';
import { extractFrontMatter } from './front-matter.js';
import { parseMarkdownBody } from './markdown.js';

function reject(
  source: string,
  code: DiagnosticCode,
  message: string,
  details: Pick<Diagnostic, 'field' | 'issues'> = {},
): ParseResult {
  return {
    ok: false,
    diagnostic: deepFreeze({ source, code, message, ...details }),
  };
}

/**
 * Parses one source unit. Pure: the same text and source reference always
 * yield the same result, and nothing is read or written.
 */
export function parseDocument(raw: string, source: string): ParseResult {
  const extraction = extractFrontMatter(raw);

  if (extraction.status === 'missing') {
    return reject(
      source,
      DIAGNOSTIC_CODES.missingFrontMatter,
      'Document does not start with a front matter block.',
    );
  }

  if (extraction.status === 'malformed') {
    return reject(
      source,
      DIAGNOSTIC_CODES.malformedFrontMatter,
      `Front matter could not be parsed: ${extraction.message}`,
    );
  }

  const { data } = extraction;
  const missing = REQUIRED_FRONT_MATTER_FIELDS.find(
    (field) => data[field] === undefined || data[field] === null,
  );
  if (missing !== undefined) {
    return reject(
      source,
      DIAGNOSTIC_CODES.missingField,
      `Front matter is missing required field "${missing}".`,
      { field: missing },
    );
  }

  const parsed = frontMatterSchema.safeParse(data);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => ({
      path: [...issue.path],
      message: issue.message,
    }));
    const [first] = issues;
    const field = first !== undefined && first.path.length > 0 ? String(first.path[0]) : undefined;
    const code =
      field === 'date' ? DIAGNOSTIC_CODES.invalidDate : DIAGNOSTIC_CODES.invalidField;
    const message =
      field === undefined
        ? 'Front matter is invalid.'
        : `Front matter field "${field}" is invalid: ${first?.message ?? 'unknown issue'}`;
    return reject(source, code, message, {
      ...(field !== undefined ? { field } : {}),
      issues,
    });
  }

  const document: Document = {
    ...parsed.data,
    body: parseMarkdownBody(extraction.body),
  };
  return { ok: true, document: deepFreeze(document) };
}
