import {
  ARTIFACT_FORMAT_VERSION,
  DIAGNOSTICS_REPORT_PATH,
  compareDiagnostics,
  type Diagnostic,
  type DiagnosticsReport,
} from '@folio/content-schema';

import type { EmittedArtifact } from '../types.js';
import { serializeArtifact } from './json.js';

export interface DiagnosticsReportInput {
  readonly totalSources: number;
  readonly diagnostics: readonly Diagnostic[];
}

export function createDiagnosticsReport(input: DiagnosticsReportInput): DiagnosticsReport {
  return {
    formatVersion: ARTIFACT_FORMAT_VERSION,
    totalSources: input.totalSources,
    rejected: input.diagnostics.length,
    diagnostics: [...input.diagnostics].sort(compareDiagnostics),
  };
}

export function createDiagnosticsArtifact(input: DiagnosticsReportInput): EmittedArtifact {
  return serializeArtifact({
    kind: 'diagnostics',
    key: 'diagnostics',
    path: DIAGNOSTICS_REPORT_PATH,
    payload: createDiagnosticsReport(input),
  });
}
