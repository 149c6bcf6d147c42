import { z } from 'zod';

import { diagnosticSchema, type Diagnostic } from './diagnostics.js';
import {
  documentSchema,
  documentSummarySchema,
  type Document,
  type DocumentSummary,
} from './document/document.js';

export const ARTIFACT_FORMAT_VERSION = 1;

export const MANIFEST_PATH = 'manifest.json';
export const DIAGNOSTICS_REPORT_PATH = 'diagnostics.json';
export const PAGES_DIRECTORY = 'pages';
export const DETAILS_DIRECTORY = 'posts';

/**
 * Shard keys depend on the page number alone, never on page content.
 */
export function getPageArtifactPath(page: number): string {
  return `${PAGES_DIRECTORY}/page_${page}.json`;
}

export function getDetailArtifactPath(slug: string): string {
  return `${DETAILS_DIRECTORY}/${slug}.json`;
}

const formatVersionSchema = z.literal(ARTIFACT_FORMAT_VERSION);

export interface PageArtifact {
  readonly formatVersion: typeof ARTIFACT_FORMAT_VERSION;
  readonly page: number;
  readonly totalPages: number;
  readonly documents: readonly DocumentSummary[];
}

export const pageArtifactSchema: z.ZodType<PageArtifact> = z
  .object({
    formatVersion: formatVersionSchema,
    page: z.number().int().positive(),
    totalPages: z.number().int().positive(),
    documents: z.array(documentSummarySchema),
  })
  .strict();

export interface DetailArtifact {
  readonly formatVersion: typeof ARTIFACT_FORMAT_VERSION;
  readonly document: Document;
}

export const detailArtifactSchema: z.ZodType<DetailArtifact> = z
  .object({
    formatVersion: formatVersionSchema,
    document: documentSchema,
  })
  .strict();

export interface SiteMetadata {
  readonly title: string;
  readonly subtitle?: string;
  readonly description?: string;
}

export const siteMetadataSchema: z.ZodType<SiteMetadata> = z
  .object({
    title: z.string().trim().min(1),
    subtitle: z.string().optional(),
    description: z.string().optional(),
  })
  .strict();

export interface ManifestPageEntry {
  readonly page: number;
  readonly path: string;
  readonly count: number;
  readonly artifactHash: string;
}

export interface ManifestArtifact {
  readonly formatVersion: typeof ARTIFACT_FORMAT_VERSION;
  readonly site?: SiteMetadata;
  readonly totalDocuments: number;
  readonly pageSize: number;
  readonly totalPages: number;
  readonly pages: readonly ManifestPageEntry[];
  readonly tags: Readonly<Record<string, readonly string[]>>;
}

export const manifestArtifactSchema: z.ZodType<ManifestArtifact> = z
  .object({
    formatVersion: formatVersionSchema,
    site: siteMetadataSchema.optional(),
    totalDocuments: z.number().int().nonnegative(),
    pageSize: z.number().int().positive(),
    totalPages: z.number().int().nonnegative(),
    pages: z.array(
      z
        .object({
          page: z.number().int().positive(),
          path: z.string(),
          count: z.number().int().positive(),
          artifactHash: z.string().regex(/^[0-9a-f]{64}$/),
        })
        .strict(),
    ),
    tags: z.record(z.array(z.string())),
  })
  .strict()
  .superRefine((manifest, ctx) => {
    if (manifest.pages.length !== manifest.totalPages) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `Manifest declares ${manifest.totalPages} pages but lists ${manifest.pages.length}.`,
        path: ['pages'],
      });
    }
  });

export interface DiagnosticsReport {
  readonly formatVersion: typeof ARTIFACT_FORMAT_VERSION;
  readonly totalSources: number;
  readonly rejected: number;
  readonly diagnostics: readonly Diagnostic[];
}

export const diagnosticsReportSchema: z.ZodType<DiagnosticsReport> = z
  .object({
    formatVersion: formatVersionSchema,
    totalSources: z.number().int().nonnegative(),
    rejected: z.number().int().nonnegative(),
    diagnostics: z.array(diagnosticSchema),
  })
  .strict();
