export {
  frontMatterSchema,
  documentSchema,
  documentSummarySchema,
  REQUIRED_FRONT_MATTER_FIELDS,
  type Document,
  type DocumentSummary,
  type FrontMatter,
  type RequiredFrontMatterField,
} from './document/document.js';

export {
  contentBodySchema,
  contentNodeSchema,
  type BlockQuoteNode,
  type CodeBlockNode,
  type ContentNode,
  type ContentNodeType,
  type EmphasisNode,
  type HeadingLevel,
  type HeadingNode,
  type HtmlNode,
  type ImageNode,
  type InlineCodeNode,
  type LinkNode,
  type ListItemNode,
  type ListNode,
  type MathNode,
  type ParagraphNode,
  type StrikethroughNode,
  type StrongNode,
  type TableAlign,
  type TableCellNode,
  type TableHeadNode,
  type TableNode,
  type TableRowNode,
  type TaskListMarkerNode,
  type TextNode,
  type ThematicBreakNode,
} from './document/content-node.js';

export {
  compareDiagnostics,
  diagnosticSchema,
  DIAGNOSTIC_CODES,
  type Diagnostic,
  type DiagnosticCode,
  type DiagnosticIssue,
} from './diagnostics.js';

export {
  ARTIFACT_FORMAT_VERSION,
  DETAILS_DIRECTORY,
  DIAGNOSTICS_REPORT_PATH,
  MANIFEST_PATH,
  PAGES_DIRECTORY,
  detailArtifactSchema,
  diagnosticsReportSchema,
  getDetailArtifactPath,
  getPageArtifactPath,
  manifestArtifactSchema,
  pageArtifactSchema,
  siteMetadataSchema,
  type DetailArtifact,
  type DiagnosticsReport,
  type ManifestArtifact,
  type ManifestPageEntry,
  type PageArtifact,
  type SiteMetadata,
} from './artifacts.js';

export * from './base/ids.js';
export * from './base/dates.js';
