import type { ContentNode, HeadingNode, MathNode, TableNode } from '@folio/content-schema';
import type { Definition, Heading, Nodes, RootContent, Table } from 'mdast';
import type { InlineMath, Math as DisplayMath } from 'mdast-util-math';
import remarkGfm from 'remark-gfm';
import remarkMath from 'remark-math';
import remarkParse from 'remark-parse';
import { unified } from 'unified';

const processor = unified().use(remarkParse).use(remarkGfm).use(remarkMath).freeze();

type DefinitionMap = ReadonlyMap<string, Definition>;

const SOFT_LINE_BREAK = /[ \t]*\r?\n[ \t]*/g;
const HEADING_ATTRIBUTES = /\s*\{([^{}]*)\}\s*$/;

/**
 * Converts a Markdown body (CommonMark plus tables, strikethrough, task lists,
 * autolinks and `$`/`$$` math) into the structured block tree carried by detail artifacts.
 *
 * Reference-style links and images are resolved against their definitions.
 * Definitions, footnotes and raw front matter nodes are dropped.
 */
export function parseMarkdownBody(markdown: string): ContentNode[] {
  const tree = processor.parse(markdown);
  const definitions = new Map<string, Definition>();
  collectDefinitions(tree, definitions);
  return convertNodes(tree.children, definitions);
}

function collectDefinitions(node: Nodes, into: Map<string, Definition>): void {
  // CommonMark: the first definition of a label wins.
  if (node.type === 'definition' && !into.has(node.identifier)) {
    into.set(node.identifier, node);
  }
  if ('children' in node) {
    for (const child of node.children) {
      collectDefinitions(child, into);
    }
  }
}

function convertNodes(nodes: readonly RootContent[], definitions: DefinitionMap): ContentNode[] {
  return nodes.flatMap((node) => convertNode(node, definitions));
}

function convertNode(node: RootContent, definitions: DefinitionMap): ContentNode[] {
  switch (node.type) {
    case 'paragraph':
      return [{ type: 'paragraph', children: convertNodes(node.children, definitions) }];
    case 'heading':
      return [convertHeading(node, definitions)];
    case 'thematicBreak':
      return [{ type: 'thematicBreak' }];
    case 'blockquote':
      return [{ type: 'blockQuote', children: convertNodes(node.children, definitions) }];
    case 'list': {
      const ordered = node.ordered === true;
      return [
        {
          type: 'list',
          ordered,
          start: ordered ? (node.start ?? 1) : null,
          children: convertNodes(node.children, definitions),
        },
      ];
    }
    case 'listItem': {
      const children = convertNodes(node.children, definitions);
      if (typeof node.checked === 'boolean') {
        children.unshift({ type: 'taskListMarker', checked: node.checked });
      }
      return [{ type: 'listItem', children }];
    }
    case 'code':
      return [{ type: 'codeBlock', lang: node.lang ?? null, code: node.value }];
    case 'html':
      return [{ type: 'html', value: node.value }];
    case 'text':
      return [{ type: 'text', value: node.value.replace(SOFT_LINE_BREAK, ' ') }];
    case 'inlineCode':
      return [{ type: 'inlineCode', value: node.value }];
    case 'math':
    case 'inlineMath':
      return [convertMath(node)];
    case 'break':
      return [{ type: 'text', value: '\n' }];
    case 'emphasis':
      return [{ type: 'emphasis', children: convertNodes(node.children, definitions) }];
    case 'strong':
      return [{ type: 'strong', children: convertNodes(node.children, definitions) }];
    case 'delete':
      return [{ type: 'strikethrough', children: convertNodes(node.children, definitions) }];
    case 'link':
      return [
        {
          type: 'link',
          url: node.url,
          title: node.title ?? null,
          children: convertNodes(node.children, definitions),
        },
      ];
    case 'image':
      return [{ type: 'image', url: node.url, title: node.title ?? null, alt: node.alt ?? '' }];
    case 'linkReference': {
      const children = convertNodes(node.children, definitions);
      const definition = definitions.get(node.identifier);
      if (definition === undefined) {
        return children;
      }
      return [{ type: 'link', url: definition.url, title: definition.title ?? null, children }];
    }
    case 'imageReference': {
      const alt = node.alt ?? '';
      const definition = definitions.get(node.identifier);
      if (definition === undefined) {
        return alt.length > 0 ? [{ type: 'text', value: alt }] : [];
      }
      return [{ type: 'image', url: definition.url, title: definition.title ?? null, alt }];
    }
    case 'table':
      return [convertTable(node, definitions)];
    case 'tableRow':
      return [{ type: 'tableRow', children: convertNodes(node.children, definitions) }];
    case 'tableCell':
      return [{ type: 'tableCell', children: convertNodes(node.children, definitions) }];
    default:
      return [];
  }
}

interface HeadingAttributes {
  readonly children: ContentNode[];
  readonly id?: string;
  readonly classes: string[];
}

/**
 * Lifts a trailing `{#id .class}` block off the heading text.
 */
function extractHeadingAttributes(children: ContentNode[]): HeadingAttributes {
  const unchanged: HeadingAttributes = { children, classes: [] };
  const last = children[children.length - 1];
  if (last === undefined || last.type !== 'text') {
    return unchanged;
  }

  const match = HEADING_ATTRIBUTES.exec(last.value);
  const tokens = (match?.[1] ?? '').trim().split(/\s+/).filter((token) => token.length > 0);
  if (match === null || tokens.length === 0) {
    return unchanged;
  }

  let id: string | undefined;
  const classes: string[] = [];
  for (const token of tokens) {
    const name = token.slice(1);
    if (token.startsWith('#') && name.length > 0) {
      id = name;
    } else if (token.startsWith('.') && name.length > 0) {
      classes.push(name);
    } else {
      return unchanged;
    }
  }

  const remaining = last.value.slice(0, match.index);
  const head = children.slice(0, -1);
  return {
    children: remaining.length > 0 ? [...head, { type: 'text', value: remaining }] : head,
    ...(id !== undefined ? { id } : {}),
    classes,
  };
}

function convertMath(node: DisplayMath | InlineMath): MathNode {
  return { type: 'math', value: node.value, display: node.type === 'math' };
}

function convertHeading(node: Heading, definitions: DefinitionMap): HeadingNode {
  const attributes = extractHeadingAttributes(convertNodes(node.children, definitions));
  return {
    type: 'heading',
    level: node.depth,
    ...(attributes.id !== undefined ? { id: attributes.id } : {}),
    ...(attributes.classes.length > 0 ? { classes: attributes.classes } : {}),
    children: attributes.children,
  };
}

function convertTable(node: Table, definitions: DefinitionMap): TableNode {
  const [head, ...rows] = node.children;
  const children: ContentNode[] = [];
  if (head !== undefined) {
    children.push({ type: 'tableHead', children: convertNodes(head.children, definitions) });
  }
  for (const row of rows) {
    children.push({ type: 'tableRow', children: convertNodes(row.children, definitions) });
  }
  return {
    type: 'table',
    align: (node.align ?? []).map((align) => align ?? null),
    children,
  };
}
