import { z } from 'zod';

export const DIAGNOSTIC_CODES = {
  unreadable: 'document.unreadable',
  missingFrontMatter: 'document.missingFrontMatter',
  malformedFrontMatter: 'document.malformedFrontMatter',
  unparsable: 'document.unparsable',
  missingField: 'document.missingField',
  invalidDate: 'document.invalidDate',
  invalidField: 'document.invalidField',
  duplicateKey: 'document.duplicateKey',
} as const;

export type DiagnosticCode = (typeof DIAGNOSTIC_CODES)[keyof typeof DIAGNOSTIC_CODES];

export interface DiagnosticIssue {
  readonly path: readonly (string | number)[];
  readonly message: string;
}

/**
 * One rejected source unit. `source` is the unit's posix path relative to the
 * source root.
 */
export interface Diagnostic {
  readonly source: string;
  readonly code: DiagnosticCode;
  readonly message: string;
  readonly field?: string;
  readonly issues?: readonly DiagnosticIssue[];
}

const diagnosticCodeSchema = z.enum([
  DIAGNOSTIC_CODES.unreadable,
  DIAGNOSTIC_CODES.missingFrontMatter,
  DIAGNOSTIC_CODES.malformedFrontMatter,
  DIAGNOSTIC_CODES.unparsable,
  DIAGNOSTIC_CODES.missingField,
  DIAGNOSTIC_CODES.invalidDate,
  DIAGNOSTIC_CODES.invalidField,
  DIAGNOSTIC_CODES.duplicateKey,
]);

export const diagnosticSchema: z.ZodType<Diagnostic> = z
  .object({
    source: z.string(),
    code: diagnosticCodeSchema,
    message: z.string(),
    field: z.string().optional(),
    issues: z
      .array(
        z
          .object({
            path: z.array(z.union([z.string(), z.number()])),
            message: z.string(),
          })
          .strict(),
      )
      .optional(),
  })
  .strict();

export function compareDiagnostics(left: Diagnostic, right: Diagnostic): number {
  if (left.source !== right.source) {
    return left.source < right.source ? -1 : 1;
  }
  if (left.code !== right.code) {
    return left.code < right.code ? -1 : 1;
  }
  return 0;
}
