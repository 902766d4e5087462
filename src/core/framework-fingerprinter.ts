/**
 * Framework Fingerprinter
 *
 * Identifies the publishing framework that rendered a page by evaluating
 * the detection predicates of every registered profile, then resolves the
 * profile's container and content selectors to a candidate root.
 *
 * Detection is data-driven: adding a framework means registering a
 * profile in the policy tables, not adding a branch here.
 */

import type { CheerioAPI } from 'cheerio';
import type { Element } from 'domhandler';
import type {
  DetectionPredicate,
  DetectionPredicateType,
  FrameworkProfile,
} from '../types/extraction.js';
import type { PolicyTables } from './policy-tables.js';
import { lowestCommonAncestor, trySelect } from './dom-metrics.js';
import { getClassTokens } from './rule-matcher.js';
import { getItemTypes, type JsonLdItem } from './structured-data.js';
import { logger } from '../utils/logger.js';

/**
 * Predicate strength, strongest first.
 */
export const PREDICATE_STRENGTH: Readonly<Record<DetectionPredicateType, number>> = {
  generator: 0,
  element: 1,
  classPrefix: 2,
  attributePrefix: 2,
  structuredType: 3,
};

const STRENGTH_CONFIDENCE: readonly number[] = [0.95, 0.9, 0.8, 0.7];

export function confidenceForStrength(strength: number): number {
  return STRENGTH_CONFIDENCE[strength] ?? STRENGTH_CONFIDENCE[STRENGTH_CONFIDENCE.length - 1];
}

export type FingerprintResult =
  | {
      status: 'matched';
      profile: FrameworkProfile;
      /** Strongest predicate of the profile that matched */
      predicate: DetectionPredicate;
      strength: number;
    }
  | { status: 'undetermined' };

/**
 * Document-wide signals gathered once and shared by every profile.
 */
export interface DocumentSignals {
  generators: string[];
  classTokens: ReadonlySet<string>;
  attributeNames: ReadonlySet<string>;
  schemaTypes: ReadonlySet<string>;
}

/**
 * Collect generator meta values, class tokens, attribute names and
 * JSON-LD types from the measured elements.
 */
export function collectSignals(
  $: CheerioAPI,
  elements: readonly Element[],
  jsonLd: readonly JsonLdItem[]
): DocumentSignals {
  const generators: string[] = [];
  $('meta[name="generator" i]').each((_, el) => {
    const content = $(el).attr('content');
    if (content) generators.push(content.trim());
  });

  const classTokens = new Set<string>();
  const attributeNames = new Set<string>();
  for (const el of elements) {
    for (const name of Object.keys(el.attribs)) attributeNames.add(name);
    for (const token of getClassTokens(el)) classTokens.add(token);
  }

  const schemaTypes = new Set<string>();
  for (const item of jsonLd) {
    for (const type of getItemTypes(item)) schemaTypes.add(type);
  }

  return { generators, classTokens, attributeNames, schemaTypes };
}

function someStartsWith(values: ReadonlySet<string>, prefix: string): boolean {
  for (const value of values) {
    if (value.startsWith(prefix)) return true;
  }
  return false;
}

/**
 * Evaluate a single detection predicate.
 */
export function evaluatePredicate(
  $: CheerioAPI,
  predicate: DetectionPredicate,
  signals: DocumentSignals
): boolean {
  switch (predicate.type) {
    case 'generator': {
      const pattern = new RegExp(predicate.pattern, 'i');
      return signals.generators.some(value => pattern.test(value));
    }
    case 'element': {
      const matches = trySelect($, predicate.selector);
      return matches !== null && matches.length > 0;
    }
    case 'classPrefix':
      return someStartsWith(signals.classTokens, predicate.prefix);
    case 'attributePrefix':
      return someStartsWith(signals.attributeNames, predicate.prefix);
    case 'structuredType':
      return signals.schemaTypes.has(predicate.schemaType);
  }
}

/**
 * Find the registered framework that best explains the document.
 * Ties on strength go to the lower priority rank, then table order.
 */
export function fingerprint(
  $: CheerioAPI,
  signals: DocumentSignals,
  tables: PolicyTables
): FingerprintResult {
  let best: Extract<FingerprintResult, { status: 'matched' }> | null = null;

  for (const profile of tables.frameworks) {
    let strongest: { predicate: DetectionPredicate; strength: number } | null = null;

    for (const predicate of profile.detect) {
      const strength = PREDICATE_STRENGTH[predicate.type];
      if (strongest && strongest.strength <= strength) continue;
      if (evaluatePredicate($, predicate, signals)) {
        strongest = { predicate, strength };
      }
    }

    if (!strongest) continue;

    if (
      !best ||
      strongest.strength < best.strength ||
      (strongest.strength === best.strength && profile.priority < best.profile.priority)
    ) {
      best = { status: 'matched', profile, ...strongest };
    }
  }

  if (!best) {
    logger.fingerprinter.debug('No framework matched');
    return { status: 'undetermined' };
  }

  logger.fingerprinter.debug('Framework matched', {
    framework: best.profile.id,
    predicate: best.predicate.type,
  });
  return best;
}

export type FrameworkRootResult =
  | { status: 'located'; root: Element; selector: string }
  | { status: 'unresolved'; reason: string };

/**
 * Resolve a matched profile's selectors. The container must resolve;
 * the first content selector with matches inside it (or matching the
 * container itself) gives the root. Several matches resolve to their
 * lowest common ancestor.
 */
export function locateFrameworkRoot($: CheerioAPI, profile: FrameworkProfile): FrameworkRootResult {
  const containers = trySelect($, profile.container);
  if (containers === null) {
    return { status: 'unresolved', reason: `invalid container selector "${profile.container}"` };
  }
  if (containers.length === 0) {
    return { status: 'unresolved', reason: `container "${profile.container}" not found` };
  }
  const container = containers[0];

  for (const selector of profile.content) {
    const inside = trySelect($, selector, container);
    if (inside === null) {
      logger.fingerprinter.warn('Invalid content selector in framework profile', {
        framework: profile.id,
        selector,
      });
      continue;
    }

    const matches = $(container).is(selector) ? [container, ...inside] : inside;
    if (matches.length === 0) continue;

    const root = matches.length === 1 ? matches[0] : lowestCommonAncestor(matches);
    if (root) {
      return { status: 'located', root, selector };
    }
  }

  return {
    status: 'unresolved',
    reason: `no content selector of ${profile.id} resolved inside "${profile.container}"`,
  };
}
