import { z } from 'zod';

export const SLUG_PATTERN = /^[a-z0-9](?:[a-z0-9._-]*[a-z0-9])?$/;
const SLUG_MAX_LENGTH = 128;
const TAG_MAX_LENGTH = 64;

const normalizeSlug = (value: string): string => value.trim().toLowerCase();

/**
 * Document identifiers are source-assigned and compared by code unit order.
 * Integer scalars (`id: 7`) become their decimal string; front matter reads
 * them as `bigint`, so large ids keep every digit.
 */
export const documentIdSchema = z
  .union([
    z.string(),
    z.bigint().nonnegative(),
    z
      .number()
      .int()
      .nonnegative()
      .refine((value) => Number.isSafeInteger(value), {
        message: 'Numeric document ids above 2^53 - 1 must be quoted.',
      }),
  ])
  .transform((value) => (typeof value === 'string' ? value.trim() : value.toString(10)))
  .pipe(
    z.string().min(1, { message: 'Document id must contain at least one character.' }),
  );

/**
 * Slugs double as file names for detail artifacts and as URL path segments.
 */
export const slugSchema = z
  .string()
  .transform(normalizeSlug)
  .pipe(
    z
      .string()
      .min(1, { message: 'Slug must contain at least one character.' })
      .max(SLUG_MAX_LENGTH, {
        message: `Slug must contain at most ${SLUG_MAX_LENGTH} characters.`,
      })
      .regex(SLUG_PATTERN, {
        message:
          'Slug must use lowercase letters, digits, ".", "_" or "-" and start and end with a letter or digit.',
      }),
  );

export const titleSchema = z
  .string()
  .trim()
  .min(1, { message: 'Title must contain at least one character.' });

// Tags become keys of the manifest's tag index object.
const RESERVED_TAGS: ReadonlySet<string> = new Set(['__proto__']);

const tagSchema = z
  .string()
  .trim()
  .max(TAG_MAX_LENGTH, {
    message: `Tags must contain at most ${TAG_MAX_LENGTH} characters.`,
  })
  .refine((tag) => !RESERVED_TAGS.has(tag), {
    message: 'Tag "__proto__" is reserved.',
  });

export const dedupeTags = (tags: readonly string[]): string[] => {
  const seen = new Set<string>();
  const result: string[] = [];
  for (const tag of tags) {
    if (tag.length === 0 || seen.has(tag)) {
      continue;
    }
    seen.add(tag);
    result.push(tag);
  }
  return result;
};

export const tagListSchema = z
  .array(tagSchema)
  .nullish()
  .transform((value) => dedupeTags(value ?? []));

export const summarySchema = z
  .string()
  .nullish()
  .transform((value) => value ?? '');

export type DocumentId = z.infer<typeof documentIdSchema>;
export type Slug = z.infer<typeof slugSchema>;
