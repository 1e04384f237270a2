/**
 * Typed view of a rendered calendar page.
 *
 * The row parser and detail resolver only see PageNode values, so any markup
 * source (static HTML, a browser snapshot, a test fixture) can feed them.
 * cheerio is used here and nowhere else.
 */
import * as cheerio from 'cheerio';
import { isTag, type AnyNode } from 'domhandler';

export interface PageNode {
  tag: string;
  attributes: Readonly<Record<string, string>>;
  /** Concatenated text content of the node and its descendants, untrimmed. */
  text: string;
  children: readonly PageNode[];
}

export function parsePageTree(html: string): PageNode {
  const $ = cheerio.load(html);

  const convert = (node: AnyNode): PageNode | null => {
    if (!isTag(node)) return null;
    const children: PageNode[] = [];
    for (const child of node.children) {
      const converted = convert(child);
      if (converted) children.push(converted);
    }
    return {
      tag: node.tagName.toLowerCase(),
      attributes: { ...node.attribs },
      text: $(node).text(),
      children,
    };
  };

  const root = $.root();
  const children: PageNode[] = [];
  for (const child of root.contents().toArray()) {
    const converted = convert(child);
    if (converted) children.push(converted);
  }
  return { tag: '#root', attributes: {}, text: root.text(), children };
}

export function classList(node: PageNode): string[] {
  return (node.attributes.class ?? '').split(/\s+/).filter(Boolean);
}

export function hasClass(node: PageNode, className: string): boolean {
  return classList(node).includes(className);
}

/** Class attribute contains the fragment anywhere (XPath `contains(@class, ...)`). */
export function classContains(node: PageNode, fragment: string): boolean {
  return (node.attributes.class ?? '').includes(fragment);
}

/** All descendants matching the predicate, in document order. */
export function findAll(node: PageNode, predicate: (n: PageNode) => boolean): PageNode[] {
  const found: PageNode[] = [];
  const walk = (current: PageNode) => {
    for (const child of current.children) {
      if (predicate(child)) found.push(child);
      walk(child);
    }
  };
  walk(node);
  return found;
}

export function findFirst(node: PageNode, predicate: (n: PageNode) => boolean): PageNode | undefined {
  for (const child of node.children) {
    if (predicate(child)) return child;
    const nested = findFirst(child, predicate);
    if (nested) return nested;
  }
  return undefined;
}

export function byTag(tag: string): (n: PageNode) => boolean {
  return (n) => n.tag === tag;
}

export function byClass(className: string): (n: PageNode) => boolean {
  return (n) => hasClass(n, className);
}

export function cleanText(value: string): string {
  return value.replace(/\s+/g, ' ').trim();
}
