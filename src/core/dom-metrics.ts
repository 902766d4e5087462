/**
 * DOM Metrics
 *
 * One bounded pass over a parsed tree that records, per element, its
 * visible text length, the part of it inside links, whether it contains
 * block-level descendants, and its document-order index. Everything is
 * kept in per-call Maps; the tree itself is never annotated.
 */

import type { CheerioAPI } from 'cheerio';
import { isTag, isText, type AnyNode, type Document, type Element } from 'domhandler';
import { BLOCK_LEVEL_TAGS, NON_CONTENT_TAGS } from './policy-tables.js';

export interface NodeStats {
  /** Sum of whitespace-collapsed text lengths */
  textLength: number;
  /** Part of textLength that lies inside <a> elements */
  linkLength: number;
  hasBlockDescendant: boolean;
  order: number;
  depth: number;
}

const EMPTY_STATS: NodeStats = Object.freeze({
  textLength: 0,
  linkLength: 0,
  hasBlockDescendant: false,
  order: -1,
  depth: -1,
});

/**
 * Collapse runs of whitespace and trim.
 */
export function collapseWhitespace(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}

export function isBlockLevel(el: Element): boolean {
  return BLOCK_LEVEL_TAGS.has(el.name);
}

export class DomMetrics {
  private readonly stats = new Map<Element, NodeStats>();
  private nextOrder = 0;
  private truncated = false;

  /**
   * Measure every element under `root` down to `maxDepth` levels.
   */
  constructor(root: AnyNode, readonly maxDepth: number) {
    if (isTag(root)) {
      this.visit(root, 0, false);
    } else if ('children' in root) {
      for (const child of root.children) {
        if (isTag(child)) this.visit(child, 0, false);
      }
    }
  }

  /** Whether some elements lay beyond the depth cap */
  get wasTruncated(): boolean {
    return this.truncated;
  }

  get(el: Element): NodeStats {
    return this.stats.get(el) ?? EMPTY_STATS;
  }

  has(el: Element): boolean {
    return this.stats.has(el);
  }

  textLength(el: Element): number {
    return this.get(el).textLength;
  }

  linkDensity(el: Element): number {
    const { textLength, linkLength } = this.get(el);
    return linkLength / Math.max(textLength, 1);
  }

  /**
   * Measured elements in document order.
   */
  elements(): Element[] {
    return [...this.stats.keys()];
  }

  private visit(el: Element, depth: number, inLink: boolean): NodeStats {
    const entry: NodeStats = {
      textLength: 0,
      linkLength: 0,
      hasBlockDescendant: false,
      order: this.nextOrder++,
      depth,
    };
    this.stats.set(el, entry);

    if (NON_CONTENT_TAGS.has(el.name)) {
      return entry;
    }

    const linked = inLink || el.name === 'a';

    for (const child of el.children) {
      if (isText(child)) {
        const length = collapseWhitespace(child.data).length;
        entry.textLength += length;
        if (linked) entry.linkLength += length;
      } else if (isTag(child)) {
        if (depth + 1 > this.maxDepth) {
          this.truncated = true;
          continue;
        }
        const childStats = this.visit(child, depth + 1, linked);
        entry.textLength += childStats.textLength;
        entry.linkLength += childStats.linkLength;
        if (isBlockLevel(child) || childStats.hasBlockDescendant) {
          entry.hasBlockDescendant = true;
        }
      }
    }

    return entry;
  }
}

export interface TextLayout {
  /** Raw visible text, block boundaries marked by spaces */
  text: string;
  /** Offsets of each visited element's own text within `text` */
  ranges: Map<Element, { start: number; end: number }>;
}

/**
 * Visible text under a node with each element's span in it, bounded by depth.
 * Block boundaries and line breaks sit outside the element spans.
 */
export function layoutText(node: Element | Document, maxDepth: number): TextLayout {
  let text = '';
  const ranges = new Map<Element, { start: number; end: number }>();

  const walk = (parent: Element | Document, depth: number): void => {
    if (isTag(parent) && NON_CONTENT_TAGS.has(parent.name)) return;
    for (const child of parent.children) {
      if (isText(child)) {
        text += child.data;
      } else if (isTag(child) && depth < maxDepth) {
        const separated = isBlockLevel(child) || child.name === 'br';
        if (separated) text += ' ';
        const start = text.length;
        walk(child, depth + 1);
        ranges.set(child, { start, end: text.length });
        if (separated) text += ' ';
      }
    }
  };

  walk(node, 0);
  return { text, ranges };
}

/**
 * Visible text under a node, whitespace-collapsed, bounded by depth.
 * Block boundaries and line breaks separate words.
 */
export function collectText(node: Element | Document, maxDepth: number): string {
  return collapseWhitespace(layoutText(node, maxDepth).text);
}

/**
 * Element ancestors, nearest first, excluding the element itself.
 */
export function ancestorsOf(el: Element): Element[] {
  const result: Element[] = [];
  let current = el.parent;
  while (current && isTag(current)) {
    result.push(current);
    current = current.parent;
  }
  return result;
}

/**
 * True when `ancestor` contains `node` (or is it).
 */
export function contains(ancestor: Element, node: Element): boolean {
  let current: AnyNode | null = node;
  while (current) {
    if (current === ancestor) return true;
    current = current.parent;
  }
  return false;
}

/**
 * Deepest element containing every node in the list.
 */
export function lowestCommonAncestor(nodes: readonly Element[]): Element | null {
  if (nodes.length === 0) return null;
  const [first, ...rest] = nodes;
  const chain = [first, ...ancestorsOf(first)];
  return chain.find(candidate => rest.every(node => contains(candidate, node))) ?? null;
}

const SIMPLE_ID = /^[A-Za-z][\w-]*$/;

/**
 * CSS path from the top element to `el`, e.g.
 * `html > body:nth-child(2) > div#content > article:nth-child(1)`.
 */
export function buildNodePath(el: Element): string {
  const segments: string[] = [];
  let current: Element | null = el;

  while (current) {
    const parent: AnyNode | null = current.parent;
    const id = current.attribs.id;

    if (id && SIMPLE_ID.test(id)) {
      segments.push(`${current.name}#${id}`);
    } else if (parent && isTag(parent)) {
      const index = parent.children.filter(isTag).indexOf(current) + 1;
      segments.push(`${current.name}:nth-child(${index})`);
    } else {
      segments.push(current.name);
    }

    current = parent && isTag(parent) ? parent : null;
  }

  return segments.reverse().join(' > ');
}

/**
 * Run a selector, returning null instead of throwing when it does not
 * parse. With a context, only descendants of the context are searched.
 */
export function trySelect($: CheerioAPI, selector: string, context?: Element): Element[] | null {
  try {
    const selection = context ? $(context).find(selector) : $<Element, string>(selector);
    return selection.toArray();
  } catch {
    return null;
  }
}
