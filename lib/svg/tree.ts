import { DOMParser as XmldomParser } from '@xmldom/xmldom';
import { ParseError } from '@/lib/errors';

/**
 * Arena representation of a parsed SVG document.
 *
 * Elements live in one array in document (pre-order) order and point at each
 * other through integer indices. A tree is never edited: transforms go through
 * {@link toDraft} / {@link fromDraft} and yield a new arena.
 */

export type SvgContent = { kind: 'element'; index: number } | { kind: 'text'; value: string };

export interface SvgElementNode {
  readonly index: number;
  /** Qualified name as written in the source. */
  readonly name: string;
  /** Local name, lower-cased; used for every tag comparison. */
  readonly tag: string;
  readonly attrs: ReadonlyArray<readonly [string, string]>;
  readonly parent: number | null;
  readonly content: ReadonlyArray<SvgContent>;
}

export interface SvgTree {
  readonly nodes: ReadonlyArray<SvgElementNode>;
  readonly root: number;
}

export interface DraftElement {
  name: string;
  attrs: Array<[string, string]>;
  content: Array<DraftElement | string>;
}

const IGNORABLE_CONTENT = new Set([7, 8, 10]); // processing instruction, comment, doctype

function isElement(node: Node): node is Element {
  return node.nodeType === 1;
}

export function localName(qualified: string): string {
  const idx = qualified.indexOf(':');
  return (idx >= 0 ? qualified.slice(idx + 1) : qualified).toLowerCase();
}

function failOnError(message: unknown): never {
  throw new ParseError(`Invalid SVG XML: ${String(message).trim()}`);
}

/** Index just past `terminator`, or the end of input when it never appears. */
function skipPast(text: string, from: number, terminator: string): number {
  const at = text.indexOf(terminator, from);
  return at === -1 ? text.length : at + terminator.length;
}

/** Index just past the `>` that closes the markup starting at `from`, skipping quoted values and `[...]` subsets. */
function markupEnd(text: string, from: number): number {
  let quote = '';
  let depth = 0;
  for (let i = from; i < text.length; i += 1) {
    const ch = text[i];
    if (quote) {
      if (ch === quote) quote = '';
    } else if (ch === '"' || ch === "'") {
      quote = ch;
    } else if (ch === '[') {
      depth += 1;
    } else if (ch === ']') {
      depth -= 1;
    } else if (ch === '>' && depth <= 0) {
      return i + 1;
    }
  }
  return text.length;
}

/**
 * xmldom recovers from unclosed and mismatched end tags without reporting them,
 * so nesting is checked on the source text once the parser has accepted it.
 */
function assertWellNested(text: string): void {
  const open: string[] = [];
  let i = text.indexOf('<');
  while (i !== -1 && i < text.length) {
    if (text.startsWith('<!--', i)) {
      i = skipPast(text, i + 4, '-->');
    } else if (text.startsWith('<![CDATA[', i)) {
      i = skipPast(text, i + 9, ']]>');
    } else if (text.startsWith('<?', i)) {
      i = skipPast(text, i + 2, '?>');
    } else if (text.startsWith('<!', i)) {
      i = markupEnd(text, i + 2);
    } else {
      const closing = text[i + 1] === '/';
      const nameStart = i + (closing ? 2 : 1);
      const name = /^[^\s/>]+/.exec(text.slice(nameStart))?.[0] ?? '';
      const end = markupEnd(text, nameStart);
      if (closing) {
        const expected = open.pop();
        if (expected !== name) {
          throw new ParseError(
            expected === undefined
              ? `Invalid SVG XML: end tag </${name}> has no open element`
              : `Invalid SVG XML: end tag </${name}> does not match <${expected}>`
          );
        }
      } else if (text[end - 2] !== '/') {
        open.push(name);
      }
      i = end;
    }
    i = text.indexOf('<', i);
  }
  const unclosed = open.pop();
  if (unclosed !== undefined) {
    throw new ParseError(`Invalid SVG XML: element <${unclosed}> is never closed`);
  }
}

export function parseSvgTree(svgText: string): SvgTree {
  if (typeof svgText !== 'string' || svgText.trim() === '') {
    throw new ParseError('Invalid SVG XML: empty document');
  }
  const parser = new XmldomParser({
    errorHandler: {
      warning: () => undefined,
      error: failOnError,
      fatalError: failOnError
    }
  });
  const doc = parser.parseFromString(svgText, 'image/svg+xml');
  const rootEl = doc.documentElement;
  if (!rootEl) {
    throw new ParseError('Invalid SVG XML: no root element');
  }
  assertWellNested(svgText);

  const nodes: SvgElementNode[] = [];

  const visit = (el: Element, parent: number | null): number => {
    const index = nodes.length;
    const attrs: Array<readonly [string, string]> = [];
    for (let i = 0; i < el.attributes.length; i += 1) {
      const attr = el.attributes.item(i);
      if (attr) attrs.push([attr.name, attr.value]);
    }
    const content: SvgContent[] = [];
    nodes.push({ index, name: el.tagName, tag: localName(el.tagName), attrs, parent, content });
    for (let i = 0; i < el.childNodes.length; i += 1) {
      const child = el.childNodes.item(i);
      if (!child || IGNORABLE_CONTENT.has(child.nodeType)) continue;
      if (isElement(child)) {
        content.push({ kind: 'element', index: visit(child, index) });
      } else if (child.nodeType === 3 || child.nodeType === 4) {
        content.push({ kind: 'text', value: child.nodeValue ?? '' });
      }
    }
    return index;
  };

  visit(rootEl, null);
  return { nodes, root: 0 };
}

export function attr(tree: SvgTree, index: number, name: string): string | undefined {
  const node = tree.nodes[index];
  if (!node) return undefined;
  const exact = node.attrs.find(([key]) => key === name);
  if (exact) return exact[1];
  const wanted = name.toLowerCase();
  const loose = node.attrs.find(([key]) => localName(key) === wanted && !key.toLowerCase().startsWith('xmlns'));
  return loose?.[1];
}

export function childElements(tree: SvgTree, index: number): number[] {
  const node = tree.nodes[index];
  if (!node) return [];
  const out: number[] = [];
  for (const part of node.content) {
    if (part.kind === 'element') out.push(part.index);
  }
  return out;
}

export function descendants(tree: SvgTree, index: number): number[] {
  const out: number[] = [];
  const walk = (idx: number) => {
    for (const child of childElements(tree, idx)) {
      out.push(child);
      walk(child);
    }
  };
  walk(index);
  return out;
}

export function ancestors(tree: SvgTree, index: number): number[] {
  const out: number[] = [];
  let cursor = tree.nodes[index]?.parent ?? null;
  while (cursor !== null) {
    out.push(cursor);
    cursor = tree.nodes[cursor]?.parent ?? null;
  }
  return out;
}

/** Trimmed text of the element and all of its descendants, joined by single spaces. */
export function textContent(tree: SvgTree, index: number): string {
  const parts: string[] = [];
  const walk = (idx: number) => {
    const node = tree.nodes[idx];
    if (!node) return;
    for (const part of node.content) {
      if (part.kind === 'text') {
        const trimmed = part.value.trim();
        if (trimmed) parts.push(trimmed);
      } else {
        walk(part.index);
      }
    }
  };
  walk(index);
  return parts.join(' ');
}

export function findFirst(tree: SvgTree, predicate: (node: SvgElementNode) => boolean): SvgElementNode | undefined {
  return tree.nodes.find(predicate);
}

function escapeText(value: string): string {
  return value.replace(/&/g, '&amp;').replace(/</g, '&lt;').replace(/>/g, '&gt;');
}

function escapeAttr(value: string): string {
  return escapeText(value).replace(/"/g, '&quot;');
}

export function serializeTree(tree: SvgTree): string {
  const write = (idx: number): string => {
    const node = tree.nodes[idx];
    if (!node) return '';
    const attrs = node.attrs.map(([key, value]) => ` ${key}="${escapeAttr(value)}"`).join('');
    if (node.content.length === 0) return `<${node.name}${attrs}/>`;
    const inner = node.content
      .map((part) => (part.kind === 'text' ? escapeText(part.value) : write(part.index)))
      .join('');
    return `<${node.name}${attrs}>${inner}</${node.name}>`;
  };
  return write(tree.root);
}

export function toDraft(tree: SvgTree, index: number = tree.root): DraftElement {
  const node = tree.nodes[index];
  if (!node) throw new RangeError(`No element at index ${index}`);
  return {
    name: node.name,
    attrs: node.attrs.map(([key, value]): [string, string] => [key, value]),
    content: node.content.map((part) => (part.kind === 'text' ? part.value : toDraft(tree, part.index)))
  };
}

export function fromDraft(draft: DraftElement): SvgTree {
  const nodes: SvgElementNode[] = [];
  const visit = (el: DraftElement, parent: number | null): number => {
    const index = nodes.length;
    const content: SvgContent[] = [];
    nodes.push({
      index,
      name: el.name,
      tag: localName(el.name),
      attrs: el.attrs.map(([key, value]) => [key, value] as const),
      parent,
      content
    });
    for (const part of el.content) {
      if (typeof part === 'string') content.push({ kind: 'text', value: part });
      else content.push({ kind: 'element', index: visit(part, index) });
    }
    return index;
  };
  visit(draft, null);
  return { nodes, root: 0 };
}

export function element(name: string, attrs: Record<string, string> = {}, content: Array<DraftElement | string> = []): DraftElement {
  return { name, attrs: Object.entries(attrs), content };
}
