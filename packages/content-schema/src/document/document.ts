import { z } from 'zod';

import { calendarDateSchema, isCalendarDate } from '../base/dates.js';
import {
  documentIdSchema,
  SLUG_PATTERN,
  slugSchema,
  summarySchema,
  tagListSchema,
  titleSchema,
} from '../base/ids.js';
import { contentBodySchema, type ContentNode } from './content-node.js';

/**
 * Required front-matter keys, in the order a missing key is reported.
 */
export const REQUIRED_FRONT_MATTER_FIELDS = ['id', 'title', 'slug', 'date'] as const;

export type RequiredFrontMatterField = (typeof REQUIRED_FRONT_MATTER_FIELDS)[number];

/**
 * Authoring-side schema. Unknown keys are stripped so newer front matter keeps
 * compiling with older compilers.
 */
export const frontMatterSchema = z.object({
  id: documentIdSchema,
  title: titleSchema,
  slug: slugSchema,
  date: calendarDateSchema,
  tags: tagListSchema,
  summary: summarySchema,
});

export type FrontMatter = z.infer<typeof frontMatterSchema>;

export interface Document {
  readonly id: string;
  readonly slug: string;
  readonly title: string;
  readonly date: string;
  readonly tags: readonly string[];
  readonly summary: string;
  readonly body: readonly ContentNode[];
}

export interface DocumentSummary {
  readonly id: string;
  readonly slug: string;
  readonly title: string;
  readonly date: string;
  readonly tags: readonly string[];
  readonly summary: string;
  /** Output-relative path of the document's detail artifact. */
  readonly path: string;
}

const normalizedFields = {
  id: z.string().min(1),
  slug: z.string().regex(SLUG_PATTERN),
  title: z.string().min(1),
  date: z.string().refine(isCalendarDate, {
    message: 'Date must be a valid calendar date in YYYY-MM-DD format.',
  }),
  tags: z.array(z.string().min(1)),
  summary: z.string(),
};

/**
 * Consumer-side schema for an already normalized document, as it appears in a
 * detail artifact.
 */
export const documentSchema: z.ZodType<Document> = z
  .object({
    ...normalizedFields,
    body: contentBodySchema,
  })
  .strict();

export const documentSummarySchema: z.ZodType<DocumentSummary> = z
  .object({
    ...normalizedFields,
    path: z.string().min(1),
  })
  .strict();
