/**
 * Content Distiller - isolate the main content of a rendered page
 *
 * Runs the discovery tiers in order and stops at the first that yields a
 * root:
 * 1. Framework fingerprint (exact structural knowledge of the publisher)
 * 2. Semantic markers (structured data, landmarks, <main>, <article>)
 * 3. Heuristic scoring (text and link distribution)
 *
 * The chosen root is cloned, pruned and sanitized. The caller's tree is
 * only read.
 *
 * States: Init → FrameworkMatch → SemanticMatch → HeuristicMatch → Failed,
 * with the first successful tier moving on to Pruned → Sanitized.
 */

import * as cheerio from 'cheerio';
import type { CheerioAPI } from 'cheerio';
import { cloneNode, isDocument, isTag, type Document, type Element } from 'domhandler';
import type {
  ExtractionResult,
  ExtractionState,
  ExtractionTier,
  FrameworkProfile,
  PageMetadata,
} from '../types/extraction.js';
import { getPolicyTables, type PolicyTables } from './policy-tables.js';
import { DomMetrics, buildNodePath, collapseWhitespace } from './dom-metrics.js';
import { getStopwords, resolveLanguage } from './text-analysis.js';
import { readJsonLdItems, type JsonLdItem } from './structured-data.js';
import {
  collectSignals,
  confidenceForStrength,
  fingerprint,
  locateFrameworkRoot,
} from './framework-fingerprinter.js';
import { locateSemanticRoot } from './semantic-locator.js';
import { locateHeuristicRoot } from './heuristic-scorer.js';
import { prune } from './pruner.js';
import { sanitizeDocument } from './sanitizer.js';
import { MalformedInputError, NoContentFoundError } from './extraction-errors.js';
import { getMergedExtractionConfig, resolveExtractionConfig } from '../utils/config-loader.js';
import type { ExtractionConfig, ExtractionConfigInput } from '../utils/config-schemas.js';
import { logger } from '../utils/logger.js';

const log = logger.distiller;

export interface ContentDistillerOptions {
  /** Overrides applied on top of environment, config file and defaults */
  config?: Partial<ExtractionConfigInput>;
  /** Policy tables; defaults to the bundled ones */
  policy?: PolicyTables;
}

/**
 * A root proposed by one of the tiers
 */
interface Candidate {
  root: Element;
  tier: ExtractionTier;
  source: string;
  confidence: number;
  profile?: FrameworkProfile;
}

/**
 * Per-call state shared by the tiers
 */
interface ExtractionContext {
  $: CheerioAPI;
  metrics: DomMetrics;
  jsonLd: JsonLdItem[];
  config: ExtractionConfig;
  language: string;
  stopwords: ReadonlySet<string> | undefined;
  warnings: string[];
  trace: ExtractionState[];
  tiersAttempted: ExtractionTier[];
}

const MARKUP_PATTERN = /<[a-z!]/i;

function roundConfidence(value: number): number {
  return Math.round(Math.min(Math.max(value, 0), 1) * 100) / 100;
}

/**
 * Load the caller's input, rejecting anything that is not a document.
 */
function loadInput(input: string | Document): CheerioAPI {
  if (typeof input === 'string') {
    if (input.trim().length === 0) {
      throw new MalformedInputError('input is empty');
    }
    if (!MARKUP_PATTERN.test(input)) {
      throw new MalformedInputError('input contains no markup');
    }
    return cheerio.load(input);
  }

  // Untyped callers can pass anything here.
  if (typeof input !== 'object' || input === null || !isDocument(input)) {
    throw new MalformedInputError('expected serialized HTML or a parsed Document');
  }
  if (!input.children.some(isTag)) {
    throw new MalformedInputError('document contains no elements');
  }
  return cheerio.load(input);
}

/**
 * Title from page metadata, else the first heading left in the pruned root.
 */
function findTitle($: CheerioAPI, $pruned: CheerioAPI, prunedRoot: Element): string {
  const candidates = [
    $('meta[property="og:title"]').first().attr('content'),
    $('title').first().text(),
    $pruned(prunedRoot).find('h1').first().text(),
  ];
  for (const candidate of candidates) {
    const title = collapseWhitespace(candidate ?? '');
    if (title) return title;
  }
  return '';
}

export class ContentDistiller {
  private readonly baseConfig: ExtractionConfig;
  private readonly policy: PolicyTables;

  constructor(options: ContentDistillerOptions = {}) {
    this.baseConfig = resolveExtractionConfig(getMergedExtractionConfig(), options.config);
    this.policy = options.policy ?? getPolicyTables();
  }

  /**
   * Effective configuration before per-call overrides
   */
  get config(): Readonly<ExtractionConfig> {
    return this.baseConfig;
  }

  /**
   * Extract the main content of a rendered document.
   *
   * @throws MalformedInputError when the input is not a document
   * @throws NoContentFoundError when no tier yields a root
   */
  extract(
    input: string | Document,
    metadata: PageMetadata = {},
    overrides: Partial<ExtractionConfigInput> = {}
  ): ExtractionResult {
    const startTime = Date.now();
    const $ = loadInput(input);
    const config = resolveExtractionConfig(this.baseConfig, overrides);

    const ctx = this.createContext($, metadata, config);

    const candidate =
      this.tryFramework(ctx) ??
      this.trySemantic(ctx) ??
      this.tryHeuristic(ctx);

    if (!candidate) {
      ctx.trace.push('Failed');
      log.info('No content found', {
        url: metadata.sourceUrl,
        tiersAttempted: ctx.tiersAttempted,
      });
      throw new NoContentFoundError({
        sourceUrl: metadata.sourceUrl,
        warnings: ctx.warnings,
        tiersAttempted: ctx.tiersAttempted,
        trace: ctx.trace,
      });
    }

    const clone = cloneNode(candidate.root, true);
    const $clone = cheerio.load(clone);

    const pruned = prune($clone, clone, {
      exclusionPredicates: this.policy.exclusionPredicates,
      profileExcludes: candidate.profile?.exclude ?? [],
      linkDensityThreshold: config.linkDensityThreshold,
      maxTraversalDepth: config.maxTraversalDepth,
    });
    ctx.warnings.push(...pruned.warnings);
    ctx.trace.push('Pruned');
    const title = findTitle($, $clone, clone);

    const sanitized = sanitizeDocument($clone, {
      keepClassAndId: config.keepClassAndId,
      resolveRelativeUrls: config.resolveRelativeUrls,
      baseUrl: metadata.sourceUrl,
      maxTraversalDepth: config.maxTraversalDepth,
    });
    ctx.warnings.push(...sanitized.warnings);
    ctx.trace.push('Sanitized');

    const result: ExtractionResult = {
      root: { path: buildNodePath(candidate.root), tagName: candidate.root.name },
      tier: candidate.tier,
      source: candidate.source,
      confidence: roundConfidence(candidate.confidence),
      html: sanitized.html,
      text: sanitized.text,
      title,
      language: ctx.language,
      removedSubtrees: pruned.removedSubtrees,
      warnings: ctx.warnings,
      tiersAttempted: ctx.tiersAttempted,
      trace: ctx.trace,
    };

    log.timed('Extraction complete', startTime, {
      url: metadata.sourceUrl,
      tier: result.tier,
      source: result.source,
      confidence: result.confidence,
      removedSubtrees: result.removedSubtrees,
    });

    return result;
  }

  private createContext(
    $: CheerioAPI,
    metadata: PageMetadata,
    config: ExtractionConfig
  ): ExtractionContext {
    const warnings: string[] = [];

    const metrics = new DomMetrics($.root()[0], config.maxTraversalDepth);
    if (metrics.wasTruncated) {
      warnings.push(`Elements nested deeper than ${config.maxTraversalDepth} levels were ignored`);
    }

    const { language, source } = resolveLanguage($, metadata.language, config.defaultLanguage);
    const stopwords = getStopwords(this.policy, language);
    if (!stopwords) {
      warnings.push(`No stopword list for language "${language}"; prose weighting disabled`);
    }
    log.debug('Resolved content language', { language, source });

    return {
      $,
      metrics,
      jsonLd: readJsonLdItems($),
      config,
      language,
      stopwords,
      warnings,
      trace: ['Init'],
      tiersAttempted: [],
    };
  }

  private tryFramework(ctx: ExtractionContext): Candidate | null {
    ctx.trace.push('FrameworkMatch');
    ctx.tiersAttempted.push('framework');

    const signals = collectSignals(ctx.$, ctx.metrics.elements(), ctx.jsonLd);
    const match = fingerprint(ctx.$, signals, this.policy);
    if (match.status === 'undetermined') return null;

    const located = locateFrameworkRoot(ctx.$, match.profile);
    if (located.status === 'unresolved') {
      ctx.warnings.push(`Framework ${match.profile.id} detected but ${located.reason}`);
      log.warn('Framework selectors did not resolve', {
        framework: match.profile.id,
        reason: located.reason,
      });
      return null;
    }

    return {
      root: located.root,
      tier: 'framework',
      source: match.profile.id,
      confidence: confidenceForStrength(match.strength),
      profile: match.profile,
    };
  }

  private trySemantic(ctx: ExtractionContext): Candidate | null {
    ctx.trace.push('SemanticMatch');
    ctx.tiersAttempted.push('semantic');

    const result = locateSemanticRoot(
      ctx.$,
      ctx.metrics,
      ctx.jsonLd,
      {
        language: ctx.language,
        minSemanticTextLength: ctx.config.minSemanticTextLength,
        structuredCoverageThreshold: ctx.config.structuredCoverageThreshold,
        maxTraversalDepth: ctx.config.maxTraversalDepth,
      },
      ctx.warnings
    );
    if (result.status === 'undetermined') return null;

    return {
      root: result.root,
      tier: 'semantic',
      source: result.source,
      confidence: result.confidence,
    };
  }

  private tryHeuristic(ctx: ExtractionContext): Candidate | null {
    ctx.trace.push('HeuristicMatch');
    ctx.tiersAttempted.push('heuristic');

    const { config } = ctx;
    const result = locateHeuristicRoot(ctx.metrics, {
      language: ctx.language,
      stopwords: ctx.stopwords,
      classWeights: this.policy.classWeights,
      linkDensityThreshold: config.linkDensityThreshold,
      minParagraphLength: config.minParagraphLength,
      propagationDecay: config.propagationDecay,
      propagationDepth: config.propagationDepth,
      classWeight: config.classWeight,
      stopwordDensityThreshold: config.stopwordDensityThreshold,
      lowProseFactor: config.lowProseFactor,
      maxTraversalDepth: config.maxTraversalDepth,
    });
    if (result.status === 'undetermined') return null;

    ctx.warnings.push(...result.warnings);
    return {
      root: result.root,
      tier: 'heuristic',
      source: 'scoring',
      confidence: result.confidence,
    };
  }
}

let defaultDistiller: ContentDistiller | null = null;

/**
 * Extract with a shared instance built from environment and config file.
 */
export function distill(
  input: string | Document,
  metadata?: PageMetadata,
  options?: Partial<ExtractionConfigInput>
): ExtractionResult {
  if (!defaultDistiller) {
    defaultDistiller = new ContentDistiller();
  }
  return defaultDistiller.extract(input, metadata, options);
}
