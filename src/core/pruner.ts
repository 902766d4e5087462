/**
 * Pruner
 *
 * Removes boilerplate subtrees from inside the chosen root (never the root
 * itself, never anything outside it). Runs on a detached clone.
 *
 * Pass 1 drops descendants matching the static exclusion rules and the
 * matched framework's own exclude selectors. Pass 2 drops link-heavy,
 * shorter-than-average block children of the root, repeating until none
 * qualifies, so a second run removes nothing.
 */

import type { CheerioAPI } from 'cheerio';
import { isTag, type Element } from 'domhandler';
import { DomMetrics, contains, isBlockLevel, trySelect } from './dom-metrics.js';
import { matchesAny, type ElementPredicate } from './rule-matcher.js';
import { logger } from '../utils/logger.js';

export interface PrunerOptions {
  exclusionPredicates: readonly ElementPredicate[];
  /** Exclude selectors of the matched framework profile, if any */
  profileExcludes: readonly string[];
  linkDensityThreshold: number;
  maxTraversalDepth: number;
}

export interface PruneResult {
  /** Top-most removed nodes */
  removedSubtrees: number;
  warnings: string[];
}

function removeMatchingDescendants(
  $: CheerioAPI,
  root: Element,
  predicates: readonly ElementPredicate[],
  maxDepth: number
): number {
  const doomed: Element[] = [];

  const walk = (el: Element, depth: number): void => {
    if (depth >= maxDepth) return;
    for (const child of el.children) {
      if (!isTag(child)) continue;
      if (matchesAny(child, predicates)) {
        doomed.push(child);
      } else {
        walk(child, depth + 1);
      }
    }
  };

  walk(root, 0);
  for (const el of doomed) $(el).remove();
  return doomed.length;
}

function removeSelectorMatches(
  $: CheerioAPI,
  root: Element,
  selectors: readonly string[],
  warnings: string[]
): number {
  let removed = 0;
  for (const selector of selectors) {
    const matches = trySelect($, selector, root);
    if (matches === null) {
      warnings.push(`Ignored invalid exclude selector "${selector}"`);
      continue;
    }
    for (const el of matches) {
      // an earlier match may already have taken this one with it
      if (!contains(root, el)) continue;
      $(el).remove();
      removed++;
    }
  }
  return removed;
}

function removeLinkHeavyChildren(
  $: CheerioAPI,
  root: Element,
  linkDensityThreshold: number,
  maxDepth: number
): number {
  let removed = 0;

  for (;;) {
    const metrics = new DomMetrics(root, maxDepth);
    const blocks = root.children.filter(isTag).filter(isBlockLevel);
    if (blocks.length === 0) break;

    const average = blocks.reduce((sum, el) => sum + metrics.textLength(el), 0) / blocks.length;
    const doomed = blocks.filter(el =>
      metrics.linkDensity(el) > linkDensityThreshold && metrics.textLength(el) < average
    );
    if (doomed.length === 0) break;

    for (const el of doomed) $(el).remove();
    removed += doomed.length;
  }

  return removed;
}

/**
 * Prune the subtree under `root` in place.
 */
export function prune($: CheerioAPI, root: Element, options: PrunerOptions): PruneResult {
  const warnings: string[] = [];

  const byRule = removeMatchingDescendants(
    $,
    root,
    options.exclusionPredicates,
    options.maxTraversalDepth
  );
  const bySelector = removeSelectorMatches($, root, options.profileExcludes, warnings);
  const byDensity = removeLinkHeavyChildren(
    $,
    root,
    options.linkDensityThreshold,
    options.maxTraversalDepth
  );

  const removedSubtrees = byRule + bySelector + byDensity;
  logger.pruner.debug('Pruning complete', { byRule, bySelector, byDensity });

  return { removedSubtrees, warnings };
}
