import { z } from 'zod';

export type HeadingLevel = 1 | 2 | 3 | 4 | 5 | 6;

export type TableAlign = 'left' | 'right' | 'center' | null;

interface ContainerNode<Type extends string> {
  readonly type: Type;
  readonly children: readonly ContentNode[];
}

export type ParagraphNode = ContainerNode<'paragraph'>;
export type ListItemNode = ContainerNode<'listItem'>;
export type BlockQuoteNode = ContainerNode<'blockQuote'>;
export type EmphasisNode = ContainerNode<'emphasis'>;
export type StrongNode = ContainerNode<'strong'>;
export type StrikethroughNode = ContainerNode<'strikethrough'>;
export type TableHeadNode = ContainerNode<'tableHead'>;
export type TableRowNode = ContainerNode<'tableRow'>;
export type TableCellNode = ContainerNode<'tableCell'>;

export interface HeadingNode extends ContainerNode<'heading'> {
  readonly level: HeadingLevel;
  readonly id?: string;
  readonly classes?: readonly string[];
}

export interface ListNode extends ContainerNode<'list'> {
  readonly ordered: boolean;
  readonly start: number | null;
}

export interface TableNode extends ContainerNode<'table'> {
  readonly align: readonly TableAlign[];
}

export interface LinkNode extends ContainerNode<'link'> {
  readonly url: string;
  readonly title: string | null;
}

export interface CodeBlockNode {
  readonly type: 'codeBlock';
  readonly lang: string | null;
  readonly code: string;
}

export interface TextNode {
  readonly type: 'text';
  readonly value: string;
}

export interface InlineCodeNode {
  readonly type: 'inlineCode';
  readonly value: string;
}

export interface HtmlNode {
  readonly type: 'html';
  readonly value: string;
}

/** TeX source; `display` is true for `$$` blocks, false for inline `$...$`. */
export interface MathNode {
  readonly type: 'math';
  readonly value: string;
  readonly display: boolean;
}

export interface TaskListMarkerNode {
  readonly type: 'taskListMarker';
  readonly checked: boolean;
}

export interface ThematicBreakNode {
  readonly type: 'thematicBreak';
}

export interface ImageNode {
  readonly type: 'image';
  readonly url: string;
  readonly title: string | null;
  readonly alt: string;
}

/**
 * Structured body block. The compiler never renders these; the client walks
 * the tree with its own rendering primitives.
 */
export type ContentNode =
  | ParagraphNode
  | HeadingNode
  | ListNode
  | ListItemNode
  | TaskListMarkerNode
  | BlockQuoteNode
  | CodeBlockNode
  | TextNode
  | InlineCodeNode
  | HtmlNode
  | MathNode
  | ThematicBreakNode
  | EmphasisNode
  | StrongNode
  | StrikethroughNode
  | LinkNode
  | ImageNode
  | TableNode
  | TableHeadNode
  | TableRowNode
  | TableCellNode;

export type ContentNodeType = ContentNode['type'];

const childrenSchema = z.array(z.lazy(() => contentNodeSchema));

const containerSchema = <Type extends string>(type: Type) =>
  z.object({ type: z.literal(type), children: childrenSchema }).strict();

const headingLevelSchema = z.union([
  z.literal(1),
  z.literal(2),
  z.literal(3),
  z.literal(4),
  z.literal(5),
  z.literal(6),
]);

export const contentNodeSchema: z.ZodType<ContentNode> = z.discriminatedUnion(
  'type',
  [
    containerSchema('paragraph'),
    z
      .object({
        type: z.literal('heading'),
        level: headingLevelSchema,
        id: z.string().optional(),
        classes: z.array(z.string()).optional(),
        children: childrenSchema,
      })
      .strict(),
    z
      .object({
        type: z.literal('list'),
        ordered: z.boolean(),
        start: z.number().int().nullable(),
        children: childrenSchema,
      })
      .strict(),
    containerSchema('listItem'),
    z.object({ type: z.literal('taskListMarker'), checked: z.boolean() }).strict(),
    containerSchema('blockQuote'),
    z
      .object({
        type: z.literal('codeBlock'),
        lang: z.string().nullable(),
        code: z.string(),
      })
      .strict(),
    z.object({ type: z.literal('text'), value: z.string() }).strict(),
    z.object({ type: z.literal('inlineCode'), value: z.string() }).strict(),
    z.object({ type: z.literal('html'), value: z.string() }).strict(),
    z
      .object({ type: z.literal('math'), value: z.string(), display: z.boolean() })
      .strict(),
    z.object({ type: z.literal('thematicBreak') }).strict(),
    containerSchema('emphasis'),
    containerSchema('strong'),
    containerSchema('strikethrough'),
    z
      .object({
        type: z.literal('link'),
        url: z.string(),
        title: z.string().nullable(),
        children: childrenSchema,
      })
      .strict(),
    z
      .object({
        type: z.literal('image'),
        url: z.string(),
        title: z.string().nullable(),
        alt: z.string(),
      })
      .strict(),
    z
      .object({
        type: z.literal('table'),
        align: z.array(z.enum(['left', 'right', 'center']).nullable()),
        children: childrenSchema,
      })
      .strict(),
    containerSchema('tableHead'),
    containerSchema('tableRow'),
    containerSchema('tableCell'),
  ],
);

export const contentBodySchema = z.array(contentNodeSchema);
