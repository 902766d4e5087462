/**
 * Tests for boilerplate pruning inside the chosen root
 */

import { describe, it, expect } from 'vitest';
import * as cheerio from 'cheerio';
import type { Element } from 'domhandler';
import { prune, type PrunerOptions } from '../../src/core/pruner.js';
import { getPolicyTables } from '../../src/core/policy-tables.js';

const PROSE =
  'The harbor was quiet, the boats were tied up, and the crews had gone home for the night after a long day on the pier.';

function setup(html: string) {
  const $ = cheerio.load(html, null, false);
  const root = $('#root').get(0);
  if (!root) throw new Error('no #root');
  return { $, root };
}

function options(overrides: Partial<PrunerOptions> = {}): PrunerOptions {
  return {
    exclusionPredicates: getPolicyTables().exclusionPredicates,
    profileExcludes: [],
    linkDensityThreshold: 0.5,
    maxTraversalDepth: 512,
    ...overrides,
  };
}

function ids($: cheerio.CheerioAPI, root: Element): string[] {
  return $(root).children().toArray().map(el => el.attribs.id ?? el.name);
}

describe('prune', () => {
  it('should remove descendants matching static exclusion rules', () => {
    const { $, root } = setup(
      '<div id="root"><nav><a href="/">Home</a></nav><p id="body">Body text here.</p>' +
      '<div class="ad"><p>Buy now</p></div><section id="sec"><aside>Side</aside><p>More</p></section>' +
      '<footer>Footer</footer></div>'
    );

    const result = prune($, root, options());

    expect(result).toEqual({ removedSubtrees: 4, warnings: [] });
    expect(ids($, root)).toEqual(['body', 'sec']);
    expect($('#sec').html()).toBe('<p>More</p>');
  });

  it('should remove consent and share widgets by attribute globs', () => {
    const { $, root } = setup(
      `<div id="root"><p id="text">${PROSE}</p><div id="cookie-banner">We use cookies</div>` +
      '<div class="post-share-tools">Share</div><span data-ad-slot="1">ad</span></div>'
    );

    expect(prune($, root, options()).removedSubtrees).toBe(3);
    expect(ids($, root)).toEqual(['text']);
  });

  it('should never remove the root itself', () => {
    const { $, root } = setup('<div id="root" class="ad"><p>kept</p></div>');

    expect(prune($, root, options()).removedSubtrees).toBe(0);
    expect($.html()).toBe('<div id="root" class="ad"><p>kept</p></div>');
  });

  it('should not touch anything outside the root', () => {
    const { $, root } = setup(`<nav id="outside"><a href="/">x</a></nav><div id="root"><p>${PROSE}</p></div>`);

    prune($, root, options());
    expect($('#outside').length).toBe(1);
  });

  it('should apply framework exclude selectors and report invalid ones', () => {
    const { $, root } = setup(
      `<div id="root"><p id="text">${PROSE}</p><div class="pagination-nav"><div class="pagination-nav">Next</div></div></div>`
    );

    const result = prune($, root, options({ profileExcludes: ['.pagination-nav', 'p[['] }));

    expect(result.removedSubtrees).toBe(1);
    expect(result.warnings).toEqual(['Ignored invalid exclude selector "p[["']);
    expect(ids($, root)).toEqual(['text']);
  });

  it('should drop short link-heavy children until none qualifies', () => {
    const tiny = Array.from({ length: 5 }, (_, i) => `<div id="t${i}"><a href="#${i}">x</a></div>`).join('');
    const { $, root } = setup(
      `<div id="root"><p id="text">${PROSE}</p>` +
      `<div id="more"><a href="/archive">Read more coverage from our harbor desk.</a></div>${tiny}</div>`
    );

    // the five one-character links go first; without them the average
    // rises above the 40-character link block, which goes next
    expect(prune($, root, options()).removedSubtrees).toBe(6);
    expect(ids($, root)).toEqual(['text']);
  });

  it('should keep link-heavy children longer than the average', () => {
    const { $, root } = setup(
      '<div id="root"><p id="short">Tiny.</p><div id="links"><a href="/a">A fairly long list of links</a></div></div>'
    );

    expect(prune($, root, options()).removedSubtrees).toBe(0);
    expect(ids($, root)).toEqual(['short', 'links']);
  });

  it('should remove nothing on a second run', () => {
    const { $, root } = setup(
      `<div id="root"><nav>n</nav><p>${PROSE}</p><div><a href="/x">Next page</a></div></div>`
    );

    prune($, root, options());
    const after = $.html();

    expect(prune($, root, options()).removedSubtrees).toBe(0);
    expect($.html()).toBe(after);
  });
});
