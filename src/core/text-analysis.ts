/**
 * Text Analysis
 *
 * Language resolution, word tokenization and stopword density.
 * Scripts written without spaces (Chinese, Japanese, Thai) are split
 * with Intl.Segmenter; everything else uses a Unicode letter/number run.
 */

import type { CheerioAPI } from 'cheerio';
import type { PolicyTables } from './policy-tables.js';

export type LanguageSource =
  | 'metadata'
  | 'html-lang'
  | 'meta-content-language'
  | 'og-locale'
  | 'default';

export interface LanguageResolution {
  /** Primary language subtag, lowercased (e.g. 'en' for 'en-US') */
  language: string;
  source: LanguageSource;
}

const SEGMENTED_LANGUAGES = new Set(['zh', 'ja', 'th']);

const WORD_PATTERN = /[\p{L}\p{N}']+/gu;

/**
 * Extract the primary language code from a locale string
 * ('en-US', 'pt_BR', 'ZH-hant' → 'en', 'pt', 'zh').
 */
export function extractLanguageCode(locale: string): string {
  return locale.trim().split(/[-_]/)[0].toLowerCase();
}

/**
 * Pick the content language: caller metadata, then the document's own
 * declarations, then the configured default.
 */
export function resolveLanguage(
  $: CheerioAPI,
  declared: string | undefined,
  defaultLanguage: string
): LanguageResolution {
  const candidates: Array<[LanguageSource, string | undefined]> = [
    ['metadata', declared],
    ['html-lang', $('html').first().attr('lang')],
    ['meta-content-language', $('meta[http-equiv="content-language" i]').first().attr('content')],
    ['og-locale', $('meta[property="og:locale"]').first().attr('content')],
  ];

  for (const [source, value] of candidates) {
    if (value && value.trim()) {
      const language = extractLanguageCode(value);
      if (/^[a-z]{2,3}$/.test(language)) {
        return { language, source };
      }
    }
  }

  return { language: extractLanguageCode(defaultLanguage), source: 'default' };
}

const segmenters = new Map<string, Intl.Segmenter>();

function getSegmenter(language: string): Intl.Segmenter {
  let segmenter = segmenters.get(language);
  if (!segmenter) {
    segmenter = new Intl.Segmenter(language, { granularity: 'word' });
    segmenters.set(language, segmenter);
  }
  return segmenter;
}

export interface TokenOccurrence {
  token: string;
  /** Character offset of the token within the tokenized text */
  index: number;
}

/**
 * Split text into lowercased word tokens, keeping their offsets.
 */
export function tokenizeWithOffsets(text: string, language: string): TokenOccurrence[] {
  const occurrences: TokenOccurrence[] = [];

  if (SEGMENTED_LANGUAGES.has(language)) {
    for (const segment of getSegmenter(language).segment(text)) {
      if (segment.isWordLike) {
        occurrences.push({ token: segment.segment.toLowerCase(), index: segment.index });
      }
    }
    return occurrences;
  }

  for (const match of text.matchAll(WORD_PATTERN)) {
    occurrences.push({ token: match[0].toLowerCase(), index: match.index ?? 0 });
  }
  return occurrences;
}

/**
 * Split text into lowercased word tokens.
 */
export function tokenize(text: string, language: string): string[] {
  return tokenizeWithOffsets(text, language).map(occurrence => occurrence.token);
}

/**
 * Stopword set for a language, or undefined when none is bundled.
 */
export function getStopwords(
  tables: PolicyTables,
  language: string
): ReadonlySet<string> | undefined {
  return tables.stopwords.get(language);
}

export interface ProseStats {
  tokenCount: number;
  stopwordCount: number;
  stopwordDensity: number;
}

/**
 * Count tokens and stopwords. Without a stopword set the density is 0.
 */
export function measureProse(
  text: string,
  language: string,
  stopwords: ReadonlySet<string> | undefined
): ProseStats {
  const tokens = tokenize(text, language);
  let stopwordCount = 0;
  if (stopwords) {
    for (const token of tokens) {
      if (stopwords.has(token)) stopwordCount++;
    }
  }
  return {
    tokenCount: tokens.length,
    stopwordCount,
    stopwordDensity: stopwordCount / Math.max(tokens.length, 1),
  };
}

