/**
 * Tests for JSON-LD reading
 */

import { describe, it, expect } from 'vitest';
import * as cheerio from 'cheerio';
import { getArticleBodies, getItemTypes, readJsonLdItems } from '../../src/core/structured-data.js';

function jsonLd(...blocks: string[]): string {
  const scripts = blocks.map(block => `<script type="application/ld+json">${block}</script>`).join('');
  return `<html><head>${scripts}</head><body></body></html>`;
}

describe('readJsonLdItems', () => {
  it('should read a single typed item', () => {
    const $ = cheerio.load(jsonLd('{"@type":"Article","headline":"Tides"}'));
    expect(readJsonLdItems($)).toEqual([{ '@type': 'Article', headline: 'Tides' }]);
  });

  it('should flatten arrays and @graph containers', () => {
    const $ = cheerio.load(jsonLd(
      '[{"@type":"WebSite"},{"@type":"Person","name":"Ada"}]',
      '{"@context":"https://schema.org","@graph":[{"@type":"BlogPosting"},{"name":"untyped"}]}'
    ));

    expect(readJsonLdItems($).map(item => item['@type'])).toEqual(['WebSite', 'Person', 'BlogPosting']);
  });

  it('should skip blocks that do not parse', () => {
    const $ = cheerio.load(jsonLd('{"@type": "Article",', '   ', '{"@type":"NewsArticle"}'));
    expect(readJsonLdItems($)).toEqual([{ '@type': 'NewsArticle' }]);
  });

  it('should ignore other script types', () => {
    const $ = cheerio.load('<html><head><script>var x = {"@type":"Article"};</script></head></html>');
    expect(readJsonLdItems($)).toEqual([]);
  });
});

describe('getItemTypes', () => {
  it('should accept a string or an array', () => {
    expect(getItemTypes({ '@type': 'Article' })).toEqual(['Article']);
    expect(getItemTypes({ '@type': ['Article', 3, 'TechArticle'] })).toEqual(['Article', 'TechArticle']);
    expect(getItemTypes({ '@type': { nested: true } })).toEqual([]);
  });
});

describe('getArticleBodies', () => {
  it('should return non-empty string bodies', () => {
    expect(getArticleBodies([
      { '@type': 'Article', articleBody: 'First body.' },
      { '@type': 'Article', articleBody: '   ' },
      { '@type': 'Article', articleBody: 42 },
      { '@type': 'Article', articleBody: 'Second body.' },
    ])).toEqual(['First body.', 'Second body.']);
  });
});
