import { promises as fs } from 'node:fs';
import path from 'node:path';

import { siteMetadataSchema } from '@folio/content-schema';
import JSON5 from 'json5';
import { z } from 'zod';

export const DEFAULT_CONFIG_FILENAME = 'folio.config.json5';

export const cliConfigFileSchema = z
  .object({
    source: z.string().min(1).optional(),
    output: z.string().min(1).optional(),
    pageSize: z.number().int().positive().optional(),
    requireDocuments: z.boolean().optional(),
    site: siteMetadataSchema.optional(),
  })
  .strict();

export type CliConfigFile = z.infer<typeof cliConfigFileSchema>;

export interface LoadedConfigFile {
  /** Absolute path of the file that was read. */
  readonly path: string;
  /** Relative `source` and `output` entries resolve against this directory. */
  readonly directory: string;
  readonly config: CliConfigFile;
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

export function parseConfigFile(raw: string, configPath: string): CliConfigFile {
  let parsed: unknown;
  try {
    parsed = JSON5.parse(raw);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new Error(`Config file ${configPath} is not valid JSON5: ${message}`, { cause: error });
  }

  const result = cliConfigFileSchema.safeParse(parsed);
  if (!result.success) {
    const details = result.error.issues
      .map((issue) => `${issue.path.length > 0 ? issue.path.join('.') : '<root>'}: ${issue.message}`)
      .join('; ');
    throw new Error(`Config file ${configPath} is invalid: ${details}`);
  }
  return result.data;
}

/**
 * Reads `explicitPath` when given, otherwise `folio.config.json5` in `cwd`.
 * Only the implicit file may be absent.
 */
export async function loadConfigFile(
  cwd: string,
  explicitPath?: string,
): Promise<LoadedConfigFile | undefined> {
  const configPath = path.resolve(cwd, explicitPath ?? DEFAULT_CONFIG_FILENAME);

  let raw: string;
  try {
    raw = await fs.readFile(configPath, 'utf8');
  } catch (error) {
    if (explicitPath === undefined && isMissingFile(error)) {
      return undefined;
    }
    throw error;
  }

  return {
    path: configPath,
    directory: path.dirname(configPath),
    config: parseConfigFile(raw, configPath),
  };
}
