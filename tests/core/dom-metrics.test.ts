/**
 * Tests for bounded DOM measurement helpers
 */

import { describe, it, expect } from 'vitest';
import * as cheerio from 'cheerio';
import type { Element } from 'domhandler';
import {
  DomMetrics,
  ancestorsOf,
  buildNodePath,
  collapseWhitespace,
  collectText,
  contains,
  layoutText,
  lowestCommonAncestor,
  trySelect,
} from '../../src/core/dom-metrics.js';

const PAGE =
  '<html><body><div id="main"><p>Hello <a href="/x">world</a></p>' +
  '<script>var x = 1;</script></div></body></html>';

function first($: cheerio.CheerioAPI, selector: string): Element {
  const el = $<Element, string>(selector).get(0);
  if (!el) throw new Error(`no match for ${selector}`);
  return el;
}

describe('collapseWhitespace', () => {
  it('should collapse runs and trim', () => {
    expect(collapseWhitespace('  a \n\t b  ')).toBe('a b');
  });
});

describe('DomMetrics', () => {
  it('should measure text and link lengths', () => {
    const $ = cheerio.load(PAGE);
    const metrics = new DomMetrics($.root()[0], 512);
    const div = first($, '#main');

    expect(metrics.textLength(div)).toBe(10);
    expect(metrics.get(div).linkLength).toBe(5);
    expect(metrics.linkDensity(div)).toBe(0.5);
  });

  it('should ignore script text', () => {
    const $ = cheerio.load(PAGE);
    const metrics = new DomMetrics($.root()[0], 512);
    expect(metrics.textLength(first($, 'script'))).toBe(0);
  });

  it('should record block-level descendants', () => {
    const $ = cheerio.load(PAGE);
    const metrics = new DomMetrics($.root()[0], 512);

    expect(metrics.get(first($, '#main')).hasBlockDescendant).toBe(true);
    expect(metrics.get(first($, 'p')).hasBlockDescendant).toBe(false);
  });

  it('should number elements in document order', () => {
    const $ = cheerio.load(PAGE);
    const metrics = new DomMetrics($.root()[0], 512);

    expect(metrics.elements().map(el => el.name)).toEqual(['html', 'head', 'body', 'div', 'p', 'a', 'script']);
    expect(metrics.get(first($, 'p')).order).toBe(4);
  });

  it('should stop at the depth cap', () => {
    const $ = cheerio.load(PAGE);
    const metrics = new DomMetrics($.root()[0], 2);

    expect(metrics.wasTruncated).toBe(true);
    expect(metrics.has(first($, 'p'))).toBe(false);
    expect(metrics.textLength(first($, '#main'))).toBe(0);
  });

  it('should report zero density for empty elements', () => {
    const $ = cheerio.load('<div id="empty"></div>');
    const metrics = new DomMetrics($.root()[0], 512);
    expect(metrics.linkDensity(first($, '#empty'))).toBe(0);
  });
});

describe('collectText', () => {
  it('should separate block text and skip scripts', () => {
    const $ = cheerio.load(PAGE);
    expect(collectText(first($, '#main'), 512)).toBe('Hello world');
  });

  it('should not split inline markup', () => {
    const $ = cheerio.load('<p id="t">He<b>llo</b></p>');
    expect(collectText(first($, '#t'), 512)).toBe('Hello');
  });

  it('should put a space between adjacent blocks', () => {
    const $ = cheerio.load('<div id="t"><p>one</p><p>two</p></div>');
    expect(collectText(first($, '#t'), 512)).toBe('one two');
  });
});

describe('layoutText', () => {
  it('should record each element span inside its block separators', () => {
    const $ = cheerio.load('<div id="t"><p id="a">one</p><p id="b">two</p></div>');
    const layout = layoutText(first($, '#t'), 512);

    expect(layout.text).toBe(' one  two ');
    expect(layout.ranges.get(first($, '#a'))).toEqual({ start: 1, end: 4 });
    expect(layout.ranges.get(first($, '#b'))).toEqual({ start: 6, end: 9 });
  });
});

describe('tree helpers', () => {
  it('should list ancestors nearest first', () => {
    const $ = cheerio.load(PAGE);
    expect(ancestorsOf(first($, 'a')).map(el => el.name)).toEqual(['p', 'div', 'body', 'html']);
  });

  it('should test containment inclusively', () => {
    const $ = cheerio.load(PAGE);
    const div = first($, '#main');
    expect(contains(div, first($, 'a'))).toBe(true);
    expect(contains(div, div)).toBe(true);
    expect(contains(first($, 'p'), div)).toBe(false);
  });

  it('should find the lowest common ancestor', () => {
    const $ = cheerio.load('<div id="outer"><div id="inner"><p>a</p><p>b</p></div><p>c</p></div>');
    const paragraphs = $('p').toArray();

    expect(lowestCommonAncestor(paragraphs.slice(0, 2))?.attribs.id).toBe('inner');
    expect(lowestCommonAncestor(paragraphs)?.attribs.id).toBe('outer');
    expect(lowestCommonAncestor([paragraphs[2]])).toBe(paragraphs[2]);
    expect(lowestCommonAncestor([])).toBeNull();
  });

  it('should build a CSS path from the top element', () => {
    const $ = cheerio.load(PAGE);
    expect(buildNodePath(first($, 'p'))).toBe('html > body:nth-child(2) > div#main > p:nth-child(1)');
  });

  it('should return null for a selector that does not parse', () => {
    const $ = cheerio.load(PAGE);
    expect(trySelect($, 'div[[')).toBeNull();
    expect(trySelect($, 'p')).toHaveLength(1);
    expect(trySelect($, 'a', first($, 'p'))).toHaveLength(1);
  });
});
