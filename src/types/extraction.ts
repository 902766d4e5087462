/**
 * Extraction Types
 *
 * Shared types for the boilerplate-removal pipeline: framework profiles,
 * score entries, orchestrator states and the extraction result.
 */

import type { Element } from 'domhandler';

// ============================================
// FRAMEWORK PROFILES
// ============================================

/**
 * Signature predicates used to fingerprint a publishing framework.
 */
export type DetectionPredicate =
  | { type: 'generator'; pattern: string }
  | { type: 'element'; selector: string }
  | { type: 'classPrefix'; prefix: string }
  | { type: 'attributePrefix'; prefix: string }
  | { type: 'structuredType'; schemaType: string };

export type DetectionPredicateType = DetectionPredicate['type'];

/**
 * Exact structural knowledge about one publishing framework.
 * Immutable once loaded into the policy tables.
 */
export interface FrameworkProfile {
  readonly id: string;
  readonly name: string;
  /** Lower rank wins when two profiles match with equal strength */
  readonly priority: number;
  readonly detect: readonly DetectionPredicate[];
  /** Selector that must resolve for the profile to apply */
  readonly container: string;
  /** Content selectors, tried in order */
  readonly content: readonly string[];
  /** Profile-specific exclusion selectors, applied by the pruner */
  readonly exclude: readonly string[];
}

// ============================================
// EXCLUSION RULES
// ============================================

/**
 * Declarative element predicates. Globs support `*` and `?` and are
 * matched case-insensitively against the whole value.
 */
export type ExclusionRule =
  | { kind: 'tag'; names: readonly string[] }
  | { kind: 'role'; values: readonly string[] }
  | { kind: 'attribute'; attribute: string; glob: string; tags?: readonly string[] }
  | { kind: 'classToken'; glob: string }
  | { kind: 'attributeName'; glob: string };

// ============================================
// SCORING
// ============================================

/**
 * Per-node scoring record. Transient: built for one extraction call.
 */
export interface ScoreEntry {
  node: Element;
  /** Own score: paragraph base score, or class/id weight for containers */
  rawScore: number;
  /** Own score plus every decayed descendant contribution */
  aggregateScore: number;
  linkDensity: number;
  stopwordDensity: number;
  textLength: number;
  /** Position in document order, used for tie-breaking */
  order: number;
}

// ============================================
// ORCHESTRATION
// ============================================

export type ExtractionTier = 'framework' | 'semantic' | 'heuristic';

export type ExtractionState =
  | 'Init'
  | 'FrameworkMatch'
  | 'SemanticMatch'
  | 'HeuristicMatch'
  | 'Pruned'
  | 'Sanitized'
  | 'Failed';

export type SemanticSource =
  | 'jsonld-article-body'
  | 'itemprop-article-body'
  | 'role-main'
  | 'main-element'
  | 'article-element';

/**
 * Metadata supplied alongside the rendered document.
 */
export interface PageMetadata {
  /** URL the document was rendered from; base for relative links */
  sourceUrl?: string;
  /** Detected content language (BCP 47), overrides the document's declaration */
  language?: string;
}

/**
 * Reference to the node chosen as candidate root.
 */
export interface RootReference {
  /** CSS selector path from <html> to the root */
  path: string;
  tagName: string;
}

export interface ExtractionResult {
  root: RootReference;
  tier: ExtractionTier;
  /** Framework id, semantic source, or 'scoring' */
  source: string;
  /** 0..1, rounded to two decimals */
  confidence: number;
  /** Sanitized HTML fragment */
  html: string;
  /** Whitespace-collapsed plain text of the fragment */
  text: string;
  title: string;
  language: string;
  removedSubtrees: number;
  warnings: string[];
  tiersAttempted: ExtractionTier[];
  trace: ExtractionState[];
}
