/**
 * Semantic Locator
 *
 * Finds the content root from standards-based markers, in priority order:
 * a JSON-LD `articleBody` cross-checked against the DOM (widened to its
 * enclosing semantic container), the microdata
 * `articleBody` property, the `main` landmark role, a single `<main>`,
 * and a single `<article>`.
 */

import type { CheerioAPI } from 'cheerio';
import { isTag, type Element } from 'domhandler';
import type { SemanticSource } from '../types/extraction.js';
import { isBlockLevel, layoutText, type DomMetrics } from './dom-metrics.js';
import { getArticleBodies, type JsonLdItem } from './structured-data.js';
import { tokenize, tokenizeWithOffsets } from './text-analysis.js';
import { logger } from '../utils/logger.js';

export const SEMANTIC_CONFIDENCE: Readonly<Record<SemanticSource, number>> = {
  'jsonld-article-body': 0.85,
  'itemprop-article-body': 0.8,
  'role-main': 0.75,
  'main-element': 0.7,
  'article-element': 0.65,
};

export interface SemanticLocatorOptions {
  language: string;
  minSemanticTextLength: number;
  structuredCoverageThreshold: number;
  maxTraversalDepth: number;
}

export type SemanticResult =
  | { status: 'located'; root: Element; source: SemanticSource; confidence: number }
  | { status: 'undetermined' };

/**
 * Nearest block-level descendants: block children, plus block elements
 * reached through inline wrappers.
 */
function blockDescendants(el: Element, depth: number, maxDepth: number): Element[] {
  const result: Element[] = [];
  if (depth >= maxDepth) return result;
  for (const child of el.children) {
    if (!isTag(child)) continue;
    if (isBlockLevel(child)) {
      result.push(child);
    } else {
      result.push(...blockDescendants(child, depth + 1, maxDepth));
    }
  }
  return result;
}

/** Share of the current node's text a block must hold to be descended into */
const DESCENT_TEXT_SHARE = 0.9;

const CONTAINER_SELECTOR = '[itemprop~="articleBody"], [role="main"], main, article';

/**
 * Distinct reference tokens present in a shrinking window of token occurrences.
 */
class CoverageWindow {
  private readonly counts = new Map<string, number>();
  private covered = 0;
  private lo = 0;
  private hi: number;

  constructor(
    private readonly reference: ReadonlySet<string>,
    private readonly tokens: readonly string[]
  ) {
    this.hi = tokens.length;
    for (const token of tokens) this.add(token);
  }

  get coverage(): number {
    return this.covered / this.reference.size;
  }

  /** Shrink to `[lo, hi)`; the new window must lie inside the current one. */
  narrow(lo: number, hi: number): void {
    while (this.lo < lo) this.remove(this.tokens[this.lo++]);
    while (this.hi > hi) this.remove(this.tokens[--this.hi]);
  }

  private add(token: string): void {
    if (!this.reference.has(token)) return;
    const count = this.counts.get(token) ?? 0;
    if (count === 0) this.covered++;
    this.counts.set(token, count + 1);
  }

  private remove(token: string): void {
    if (!this.reference.has(token)) return;
    const count = this.counts.get(token) ?? 0;
    if (count === 1) this.covered--;
    this.counts.set(token, count - 1);
  }
}

function lowerBound(sorted: readonly number[], value: number): number {
  let lo = 0;
  let hi = sorted.length;
  while (lo < hi) {
    const mid = (lo + hi) >>> 1;
    if (sorted[mid] < value) lo = mid + 1;
    else hi = mid;
  }
  return lo;
}

/**
 * Block container under `top` whose tokens cover the declared article body.
 *
 * Descends only into a block that still covers the body and holds at least
 * 90% of the current node's text, so a body declaring part of the content
 * does not narrow the root to that part. The text under `top` is tokenized
 * once; each step shrinks a coverage window to the child's token span.
 */
export function findCoveringNode(
  top: Element,
  articleBody: string,
  metrics: DomMetrics,
  options: SemanticLocatorOptions
): Element | null {
  const { language, structuredCoverageThreshold, maxTraversalDepth } = options;
  const reference = new Set(tokenize(articleBody, language));
  if (reference.size === 0) return null;

  const layout = layoutText(top, maxTraversalDepth);
  const occurrences = tokenizeWithOffsets(layout.text, language);
  const offsets = occurrences.map(occurrence => occurrence.index);
  const window = new CoverageWindow(reference, occurrences.map(occurrence => occurrence.token));
  if (window.coverage < structuredCoverageThreshold) return null;

  let current = top;
  for (let step = 0; step < maxTraversalDepth; step++) {
    const minLength = metrics.textLength(current) * DESCENT_TEXT_SHARE;
    const next = blockDescendants(current, 0, maxTraversalDepth).find(el => {
      const length = metrics.textLength(el);
      return length > 0 && length >= minLength;
    });
    const span = next && layout.ranges.get(next);
    if (!next || !span) break;

    window.narrow(lowerBound(offsets, span.start), lowerBound(offsets, span.end));
    if (window.coverage < structuredCoverageThreshold) break;
    current = next;
  }
  return current;
}

/**
 * Nearest semantic container holding `node` (itself included), or `node`.
 */
function enclosingContainer($: CheerioAPI, node: Element): Element {
  return $(node).closest(CONTAINER_SELECTOR).get(0) ?? node;
}

function single($: CheerioAPI, selector: string): Element | null {
  const matches = $<Element, string>(selector).toArray();
  return matches.length === 1 ? matches[0] : null;
}

/**
 * Try each semantic marker in order. A candidate is accepted only when
 * its text is longer than `minSemanticTextLength`.
 */
export function locateSemanticRoot(
  $: CheerioAPI,
  metrics: DomMetrics,
  jsonLd: readonly JsonLdItem[],
  options: SemanticLocatorOptions,
  warnings: string[]
): SemanticResult {
  const top = $('body').get(0) ?? $('html').get(0);

  const candidates: Array<[SemanticSource, () => Element | null]> = [
    ['jsonld-article-body', () => {
      if (!top) return null;
      for (const body of getArticleBodies(jsonLd)) {
        const node = findCoveringNode(top, body, metrics, options);
        if (node) return enclosingContainer($, node);
      }
      if (getArticleBodies(jsonLd).length > 0) {
        warnings.push('Structured data declares an article body that no element contains');
      }
      return null;
    }],
    ['itemprop-article-body', () => $('[itemprop~="articleBody"]').get(0) ?? null],
    ['role-main', () => $('[role="main"]').get(0) ?? null],
    ['main-element', () => single($, 'main')],
    ['article-element', () => single($, 'article')],
  ];

  for (const [source, find] of candidates) {
    const root = find();
    if (!root) continue;

    const textLength = metrics.textLength(root);
    if (textLength > options.minSemanticTextLength) {
      logger.semantic.debug('Semantic root located', { source, textLength });
      return { status: 'located', root, source, confidence: SEMANTIC_CONFIDENCE[source] };
    }

    logger.semantic.debug('Semantic candidate too short', { source, textLength });
  }

  return { status: 'undetermined' };
}
