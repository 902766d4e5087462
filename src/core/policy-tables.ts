/**
 * Policy Tables
 *
 * Static, read-only extraction policy: framework profiles, exclusion
 * rules, class/id weight patterns, stopword sets, and the sanitizer's
 * tag/attribute/scheme allow-lists.
 *
 * The JSON data under `data/` is validated once, compiled, deep-frozen,
 * and shared by every extraction call. Registering more frameworks
 * builds a new table set; an existing one is never mutated.
 */

import { readFileSync } from 'fs';
import { join } from 'path';
import { z } from 'zod';
import type { ExclusionRule, FrameworkProfile } from '../types/extraction.js';
import { compileRule, type ElementPredicate } from './rule-matcher.js';
import { ConfigValidationError } from '../utils/config-schemas.js';
import { findPackageRoot } from '../utils/package-root.js';
import { logger } from '../utils/logger.js';

// ============================================
// TAG AND ATTRIBUTE TABLES
// ============================================

/**
 * Block-level elements: scoring units, pruning units, and the boundary
 * that decides whether a container is "paragraph-like".
 */
export const BLOCK_LEVEL_TAGS: ReadonlySet<string> = new Set([
  'address', 'article', 'aside', 'blockquote', 'details', 'dialog', 'dd', 'div',
  'dl', 'dt', 'fieldset', 'figcaption', 'figure', 'footer', 'form', 'h1', 'h2',
  'h3', 'h4', 'h5', 'h6', 'header', 'hgroup', 'hr', 'li', 'main', 'nav', 'ol',
  'p', 'pre', 'section', 'table', 'ul',
]);

/**
 * Elements whose text is never content (skipped when measuring text).
 */
export const NON_CONTENT_TAGS: ReadonlySet<string> = new Set([
  'script', 'style', 'noscript', 'template', 'head', 'title', 'meta', 'link',
  'svg', 'math', 'iframe', 'object', 'embed', 'canvas',
]);

/**
 * Tags the sanitizer keeps.
 */
export const ALLOWED_TAGS: ReadonlySet<string> = new Set([
  // containers
  'div', 'span', 'p', 'section', 'article', 'main',
  // headings
  'h1', 'h2', 'h3', 'h4', 'h5', 'h6',
  // lists
  'ul', 'ol', 'li', 'dl', 'dt', 'dd',
  // tables
  'table', 'caption', 'colgroup', 'col', 'thead', 'tbody', 'tfoot', 'tr', 'th', 'td',
  // quotations
  'blockquote', 'q', 'cite',
  // code
  'pre', 'code', 'kbd', 'samp', 'var',
  // links and images
  'a', 'img', 'figure', 'figcaption',
  // emphasis
  'em', 'strong', 'b', 'i', 'u', 's', 'mark', 'small', 'sub', 'sup', 'del', 'ins', 'abbr', 'time',
  // breaks
  'br', 'hr',
]);

/**
 * Tags removed together with their content.
 */
export const DROP_WITH_CONTENT_TAGS: ReadonlySet<string> = new Set([
  'script', 'style', 'noscript', 'template',
  'iframe', 'frame', 'frameset', 'object', 'embed', 'applet', 'param',
  'svg', 'math', 'canvas', 'audio', 'video', 'source', 'track',
  'input', 'button', 'select', 'option', 'optgroup', 'textarea', 'datalist', 'output',
  'link', 'meta', 'base', 'title', 'head',
]);

/**
 * Per-tag attribute allow-list. `*` applies to every allowed tag.
 */
export const ALLOWED_ATTRIBUTES: Readonly<Record<string, readonly string[]>> = {
  a: ['href', 'title', 'name', 'rel'],
  img: ['src', 'alt', 'title'],
  td: ['colspan', 'rowspan'],
  th: ['colspan', 'rowspan', 'scope'],
  '*': ['class', 'id'],
};

/**
 * Attributes holding URL references, validated against the scheme allow-set.
 */
export const URL_ATTRIBUTES: Readonly<Record<string, readonly string[]>> = {
  a: ['href'],
  img: ['src'],
};

export const ALLOWED_URL_SCHEMES: readonly string[] = ['http', 'https', 'mailto'];

/**
 * Attributes that are only kept when class/id retention is enabled.
 */
export const CLASS_AND_ID_ATTRIBUTES: readonly string[] = ['class', 'id'];

// ============================================
// DATA SCHEMAS
// ============================================

function isValidPattern(source: string): boolean {
  try {
    new RegExp(source, 'i');
    return true;
  } catch {
    return false;
  }
}

const patternSchema = z.string().min(1).refine(isValidPattern, 'Invalid regular expression');

const detectionPredicateSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('generator'), pattern: patternSchema }),
  z.object({ type: z.literal('element'), selector: z.string().min(1) }),
  z.object({ type: z.literal('classPrefix'), prefix: z.string().min(1) }),
  z.object({ type: z.literal('attributePrefix'), prefix: z.string().min(1) }),
  z.object({ type: z.literal('structuredType'), schemaType: z.string().min(1) }),
]);

export const frameworkProfileSchema = z.object({
  id: z.string().regex(/^[a-z0-9-]+$/),
  name: z.string().min(1),
  priority: z.number().int(),
  detect: z.array(detectionPredicateSchema).min(1),
  container: z.string().min(1),
  content: z.array(z.string().min(1)).min(1),
  exclude: z.array(z.string().min(1)).default([]),
});

const exclusionRuleSchema = z.discriminatedUnion('kind', [
  z.object({ kind: z.literal('tag'), names: z.array(z.string().min(1)).min(1) }),
  z.object({ kind: z.literal('role'), values: z.array(z.string().min(1)).min(1) }),
  z.object({
    kind: z.literal('attribute'),
    attribute: z.string().min(1),
    glob: z.string().min(1),
    tags: z.array(z.string().min(1)).optional(),
  }),
  z.object({ kind: z.literal('classToken'), glob: z.string().min(1) }),
  z.object({ kind: z.literal('attributeName'), glob: z.string().min(1) }),
]);

const frameworkDataSchema = z.object({
  version: z.literal(1),
  profiles: z.array(frameworkProfileSchema),
});

const exclusionDataSchema = z.object({
  version: z.literal(1),
  exclusions: z.array(exclusionRuleSchema),
  weights: z.object({
    positive: patternSchema,
    negative: patternSchema,
  }),
});

const stopwordDataSchema = z.object({
  version: z.literal(1),
  languages: z.record(z.string().regex(/^[a-z]{2,3}$/), z.array(z.string().min(1))),
});

export const policyDataSchema = z.object({
  frameworks: frameworkDataSchema,
  exclusions: exclusionDataSchema,
  stopwords: stopwordDataSchema,
});

export type PolicyData = z.input<typeof policyDataSchema>;

// ============================================
// COMPILED TABLES
// ============================================

export interface ClassWeightPatterns {
  readonly positive: RegExp;
  readonly negative: RegExp;
}

export interface PolicyTables {
  readonly frameworks: readonly FrameworkProfile[];
  readonly exclusionRules: readonly ExclusionRule[];
  readonly exclusionPredicates: readonly ElementPredicate[];
  readonly classWeights: ClassWeightPatterns;
  readonly stopwords: ReadonlyMap<string, ReadonlySet<string>>;
}

function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === 'object' && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
  }
  return value;
}

/**
 * Validate, compile and freeze raw policy data.
 */
export function buildPolicyTables(data: unknown): PolicyTables {
  const result = policyDataSchema.safeParse(data);
  if (!result.success) {
    throw new ConfigValidationError('policy tables', result.error);
  }
  const parsed = result.data;

  const ids = new Set<string>();
  for (const profile of parsed.frameworks.profiles) {
    if (ids.has(profile.id)) {
      throw new Error(`Duplicate framework profile id: ${profile.id}`);
    }
    ids.add(profile.id);
  }

  const stopwords = new Map<string, ReadonlySet<string>>();
  for (const [language, words] of Object.entries(parsed.stopwords.languages)) {
    stopwords.set(language, new Set(words.map(w => w.toLowerCase())));
  }

  const exclusionRules: ExclusionRule[] = parsed.exclusions.exclusions;

  const tables: PolicyTables = {
    frameworks: deepFreeze(parsed.frameworks.profiles),
    exclusionRules: deepFreeze(exclusionRules),
    exclusionPredicates: Object.freeze(exclusionRules.map(compileRule)),
    classWeights: Object.freeze({
      positive: new RegExp(parsed.exclusions.weights.positive, 'i'),
      negative: new RegExp(parsed.exclusions.weights.negative, 'i'),
    }),
    stopwords,
  };

  return Object.freeze(tables);
}

/**
 * Return new tables with additional framework profiles registered.
 * A profile whose id already exists replaces the existing one.
 */
export function withFrameworkProfiles(
  tables: PolicyTables,
  profiles: readonly z.input<typeof frameworkProfileSchema>[]
): PolicyTables {
  const added = profiles.map((profile) => {
    const result = frameworkProfileSchema.safeParse(profile);
    if (!result.success) {
      throw new ConfigValidationError(`framework profile ${profile.id}`, result.error);
    }
    return deepFreeze(result.data);
  });

  const addedIds = new Set(added.map(p => p.id));
  const frameworks = [
    ...tables.frameworks.filter(p => !addedIds.has(p.id)),
    ...added,
  ];

  return Object.freeze({ ...tables, frameworks: Object.freeze(frameworks) });
}

// ============================================
// LOADING
// ============================================

const DATA_FILES = {
  frameworks: 'framework-profiles.json',
  exclusions: 'exclusion-rules.json',
  stopwords: 'stopwords.json',
} as const;

/**
 * Directory holding the bundled policy JSON files.
 */
export function getPolicyDataDir(): string {
  const root = findPackageRoot();
  if (!root) {
    throw new Error('Cannot locate package root to load policy data');
  }
  return join(root, 'data');
}

/**
 * Read the raw policy JSON files.
 */
export function loadPolicyData(dataDir: string = getPolicyDataDir()): unknown {
  const read = (file: string): unknown => JSON.parse(readFileSync(join(dataDir, file), 'utf-8'));

  return {
    frameworks: read(DATA_FILES.frameworks),
    exclusions: read(DATA_FILES.exclusions),
    stopwords: read(DATA_FILES.stopwords),
  };
}

let defaultTables: PolicyTables | null = null;

/**
 * Process-wide policy tables, loaded on first use.
 */
export function getPolicyTables(): PolicyTables {
  if (!defaultTables) {
    const startTime = Date.now();
    defaultTables = buildPolicyTables(loadPolicyData());
    logger.policy.timed('Policy tables loaded', startTime, {
      frameworks: defaultTables.frameworks.length,
      exclusions: defaultTables.exclusionRules.length,
      languages: [...defaultTables.stopwords.keys()],
    });
  }
  return defaultTables;
}
