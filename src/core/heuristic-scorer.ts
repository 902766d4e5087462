/**
 * Heuristic Scorer
 *
 * Last-resort root discovery from text and link distribution. Every
 * paragraph-like node gets a base score from its length, punctuation and
 * class/id names, damped by link density and by how little it reads like
 * prose. The score is then added to a bounded number of ancestors with a
 * per-level decay.
 *
 * Scores live in a Map built per call. Nothing is written to the tree.
 */

import type { Element } from 'domhandler';
import type { ScoreEntry } from '../types/extraction.js';
import type { ClassWeightPatterns } from './policy-tables.js';
import { ancestorsOf, collectText, type DomMetrics } from './dom-metrics.js';
import { measureProse } from './text-analysis.js';
import { logger } from '../utils/logger.js';

export interface HeuristicOptions {
  language: string;
  /** Stopword set of the content language; undefined disables the prose factor */
  stopwords: ReadonlySet<string> | undefined;
  classWeights: ClassWeightPatterns;
  linkDensityThreshold: number;
  minParagraphLength: number;
  propagationDecay: number;
  propagationDepth: number;
  classWeight: number;
  stopwordDensityThreshold: number;
  lowProseFactor: number;
  maxTraversalDepth: number;
}

export type HeuristicResult =
  | {
      status: 'located';
      root: Element;
      entry: ScoreEntry;
      confidence: number;
      rerouted: boolean;
      warnings: string[];
    }
  | { status: 'undetermined' };

/** Tags that are always scored */
const PARAGRAPH_TAGS = new Set(['p', 'pre']);

/** Tags scored when they hold no block-level descendants */
const LEAF_CONTAINER_TAGS = new Set(['div', 'section', 'article', 'td', 'blockquote']);

const COMMA_PATTERN = /[,،、，]/g;

/** Minimum tokens before the prose factor applies */
const MIN_PROSE_TOKENS = 4;

/** Confidence when no candidate clears the link-density threshold */
const LINK_HEAVY_CONFIDENCE = 0.2;

export function isParagraphLike(el: Element, metrics: DomMetrics): boolean {
  if (PARAGRAPH_TAGS.has(el.name)) return true;
  return LEAF_CONTAINER_TAGS.has(el.name) && !metrics.get(el).hasBlockDescendant;
}

/**
 * Positive or negative weight from an element's class and id.
 */
export function classWeightOf(el: Element, patterns: ClassWeightPatterns, weight: number): number {
  let total = 0;
  for (const value of [el.attribs.class, el.attribs.id]) {
    if (!value) continue;
    if (patterns.negative.test(value)) total -= weight;
    if (patterns.positive.test(value)) total += weight;
  }
  return total;
}

function isBelowBody(el: Element): boolean {
  return ancestorsOf(el).some(ancestor => ancestor.name === 'body');
}

interface ProseTally {
  tokens: number;
  stopwords: number;
}

/**
 * Score every paragraph-like node and accumulate decayed contributions
 * into its ancestors. Returns one entry per node that received a score.
 */
export function scoreNodes(metrics: DomMetrics, options: HeuristicOptions): Map<Element, ScoreEntry> {
  const entries = new Map<Element, ScoreEntry>();
  const prose = new Map<Element, ProseTally>();

  const entryFor = (el: Element): ScoreEntry => {
    let entry = entries.get(el);
    if (!entry) {
      const stats = metrics.get(el);
      const rawScore = classWeightOf(el, options.classWeights, options.classWeight);
      entry = {
        node: el,
        rawScore,
        aggregateScore: rawScore,
        linkDensity: metrics.linkDensity(el),
        stopwordDensity: 0,
        textLength: stats.textLength,
        order: stats.order,
      };
      entries.set(el, entry);
    }
    return entry;
  };

  const tally = (el: Element, tokens: number, stopwords: number): void => {
    const current = prose.get(el) ?? { tokens: 0, stopwords: 0 };
    current.tokens += tokens;
    current.stopwords += stopwords;
    prose.set(el, current);
  };

  for (const el of metrics.elements()) {
    if (!isParagraphLike(el, metrics)) continue;

    const textLength = metrics.textLength(el);
    if (textLength < options.minParagraphLength) continue;

    const text = collectText(el, options.maxTraversalDepth);
    const linkDensity = metrics.linkDensity(el);
    const { tokenCount, stopwordCount, stopwordDensity } = measureProse(
      text,
      options.language,
      options.stopwords
    );

    const commas = text.match(COMMA_PATTERN)?.length ?? 0;
    const lengthBonus = Math.min(Math.floor(textLength / 100), 3);
    const baseScore = 1 + commas + lengthBonus
      + classWeightOf(el, options.classWeights, options.classWeight);

    const lowProse =
      options.stopwords !== undefined &&
      el.name !== 'pre' &&
      tokenCount >= MIN_PROSE_TOKENS &&
      stopwordDensity < options.stopwordDensityThreshold;
    const proseFactor = lowProse ? options.lowProseFactor : 1;

    const contribution = baseScore * (1 - linkDensity) * proseFactor;

    const own = entryFor(el);
    own.rawScore = baseScore;
    own.stopwordDensity = stopwordDensity;

    const ancestors = ancestorsOf(el).slice(0, options.propagationDepth);
    ancestors.forEach((ancestor, level) => {
      const entry = entryFor(ancestor);
      entry.aggregateScore += contribution * Math.pow(options.propagationDecay, level);
      tally(ancestor, tokenCount, stopwordCount);
    });
  }

  for (const [el, { tokens, stopwords }] of prose) {
    const entry = entries.get(el);
    if (entry) entry.stopwordDensity = stopwords / Math.max(tokens, 1);
  }

  return entries;
}

/**
 * Aggregate score descending, then link density ascending, then
 * document order.
 */
export function compareEntries(a: ScoreEntry, b: ScoreEntry): number {
  if (b.aggregateScore !== a.aggregateScore) return b.aggregateScore - a.aggregateScore;
  if (a.linkDensity !== b.linkDensity) return a.linkDensity - b.linkDensity;
  return a.order - b.order;
}

/**
 * Candidates eligible as a root (strictly inside <body>, positive score),
 * best first.
 */
export function rankCandidates(entries: ReadonlyMap<Element, ScoreEntry>): ScoreEntry[] {
  return [...entries.values()]
    .filter(entry => entry.aggregateScore > 0 && isBelowBody(entry.node))
    .sort(compareEntries);
}

function heuristicConfidence(chosen: ScoreEntry, ranked: readonly ScoreEntry[], rerouted: boolean): number {
  const second = ranked.find(entry => entry !== chosen);
  const margin = second
    ? Math.min(Math.max(1 - second.aggregateScore / chosen.aggregateScore, 0), 1)
    : 1;
  const confidence = 0.35 + 0.35 * margin + 0.15 * (1 - chosen.linkDensity);
  return rerouted ? confidence * 0.8 : confidence;
}

/**
 * Pick the root from ranked candidates. A link-heavy winner is rerouted
 * to its best-scoring ancestor under the threshold, then to the next
 * ranked candidate under it; failing both it is kept with low confidence.
 */
export function selectCandidate(
  ranked: readonly ScoreEntry[],
  entries: ReadonlyMap<Element, ScoreEntry>,
  linkDensityThreshold: number
): HeuristicResult {
  const best = ranked[0];
  if (!best) return { status: 'undetermined' };

  if (best.linkDensity <= linkDensityThreshold) {
    return {
      status: 'located',
      root: best.node,
      entry: best,
      confidence: heuristicConfidence(best, ranked, false),
      rerouted: false,
      warnings: [],
    };
  }

  let ancestor: ScoreEntry | null = null;
  for (const el of ancestorsOf(best.node)) {
    const entry = entries.get(el);
    if (!entry || !isBelowBody(el)) continue;
    if (entry.linkDensity > linkDensityThreshold || entry.aggregateScore <= 0) continue;
    if (!ancestor || entry.aggregateScore > ancestor.aggregateScore) ancestor = entry;
  }

  const rerouteTo = ancestor ?? ranked.find(entry => entry.linkDensity <= linkDensityThreshold);
  if (rerouteTo && rerouteTo.aggregateScore > 0) {
    logger.scorer.debug('Rerouted link-heavy candidate', {
      from: best.order,
      to: rerouteTo.order,
      linkDensity: best.linkDensity,
    });
    return {
      status: 'located',
      root: rerouteTo.node,
      entry: rerouteTo,
      confidence: heuristicConfidence(rerouteTo, ranked, true),
      rerouted: true,
      warnings: [],
    };
  }

  return {
    status: 'located',
    root: best.node,
    entry: best,
    confidence: LINK_HEAVY_CONFIDENCE,
    rerouted: false,
    warnings: [
      `Best candidate has link density ${best.linkDensity.toFixed(2)} and no alternative under the threshold`,
    ],
  };
}

/**
 * Score the measured tree and select a root.
 */
export function locateHeuristicRoot(metrics: DomMetrics, options: HeuristicOptions): HeuristicResult {
  const startTime = Date.now();
  const entries = scoreNodes(metrics, options);
  const ranked = rankCandidates(entries);
  const result = selectCandidate(ranked, entries, options.linkDensityThreshold);

  logger.scorer.timed('Heuristic scoring complete', startTime, {
    scored: entries.size,
    candidates: ranked.length,
    located: result.status === 'located',
  });
  return result;
}
