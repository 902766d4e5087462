/**
 * Tests for framework fingerprinting and framework root location
 */

import { describe, it, expect } from 'vitest';
import * as cheerio from 'cheerio';
import {
  collectSignals,
  confidenceForStrength,
  evaluatePredicate,
  fingerprint,
  locateFrameworkRoot,
} from '../../src/core/framework-fingerprinter.js';
import { DomMetrics } from '../../src/core/dom-metrics.js';
import { readJsonLdItems } from '../../src/core/structured-data.js';
import { buildPolicyTables, getPolicyTables } from '../../src/core/policy-tables.js';
import type { FrameworkProfile } from '../../src/types/extraction.js';

const DOCUSAURUS_PAGE = `
<html>
  <head><meta name="generator" content="Docusaurus v3.1.0"></head>
  <body>
    <div id="__docusaurus">
      <nav class="navbar"><a href="/">Home</a></nav>
      <main class="docMainContainer">
        <aside class="theme-doc-sidebar-container"><a href="/a">A</a></aside>
        <article>
          <div class="theme-doc-markdown markdown"><h1>Install</h1><p>Run the installer.</p></div>
          <nav class="pagination-nav"><a href="/next">Next</a></nav>
        </article>
      </main>
    </div>
  </body>
</html>`;

function signalsFor($: cheerio.CheerioAPI) {
  const metrics = new DomMetrics($.root()[0], 512);
  return collectSignals($, metrics.elements(), readJsonLdItems($));
}

function profile(overrides: Partial<FrameworkProfile> & Pick<FrameworkProfile, 'id'>): FrameworkProfile {
  return {
    name: overrides.id,
    priority: 50,
    detect: [{ type: 'classPrefix', prefix: 'x-' }],
    container: 'body',
    content: ['body'],
    exclude: [],
    ...overrides,
  };
}

function tablesWith(profiles: FrameworkProfile[]) {
  return buildPolicyTables({
    frameworks: { version: 1, profiles },
    exclusions: { version: 1, exclusions: [], weights: { positive: 'content', negative: 'sidebar' } },
    stopwords: { version: 1, languages: {} },
  });
}

describe('collectSignals', () => {
  it('should gather generators, class tokens, attribute names and schema types', () => {
    const $ = cheerio.load(`
      <html><head>
        <meta name="generator" content=" Hugo 0.120 ">
        <script type="application/ld+json">{"@graph":[{"@type":["Article","CreativeWork"]}]}</script>
      </head>
      <body><div class="md-grid wide" data-md-component="content"></div></body></html>`);
    const signals = signalsFor($);

    expect(signals.generators).toEqual(['Hugo 0.120']);
    expect([...signals.classTokens]).toEqual(['md-grid', 'wide']);
    expect(signals.attributeNames.has('data-md-component')).toBe(true);
    expect([...signals.schemaTypes]).toEqual(['Article', 'CreativeWork']);
  });
});

describe('evaluatePredicate', () => {
  const $ = cheerio.load(DOCUSAURUS_PAGE);
  const signals = signalsFor($);

  it('should match generator patterns case-insensitively', () => {
    expect(evaluatePredicate($, { type: 'generator', pattern: '^docusaurus' }, signals)).toBe(true);
    expect(evaluatePredicate($, { type: 'generator', pattern: '^Hugo' }, signals)).toBe(false);
  });

  it('should match element selectors', () => {
    expect(evaluatePredicate($, { type: 'element', selector: '#__docusaurus' }, signals)).toBe(true);
    expect(evaluatePredicate($, { type: 'element', selector: '#missing' }, signals)).toBe(false);
  });

  it('should treat an unparseable selector as no match', () => {
    expect(evaluatePredicate($, { type: 'element', selector: 'div[[' }, signals)).toBe(false);
  });

  it('should match class prefixes', () => {
    expect(evaluatePredicate($, { type: 'classPrefix', prefix: 'theme-doc-' }, signals)).toBe(true);
    expect(evaluatePredicate($, { type: 'classPrefix', prefix: 'md-' }, signals)).toBe(false);
  });
});

describe('fingerprint', () => {
  it('should recognize Docusaurus from the generator meta', () => {
    const $ = cheerio.load(DOCUSAURUS_PAGE);
    const result = fingerprint($, signalsFor($), getPolicyTables());

    expect(result.status).toBe('matched');
    if (result.status !== 'matched') return;
    expect(result.profile.id).toBe('docusaurus');
    expect(result.predicate.type).toBe('generator');
    expect(result.strength).toBe(0);
  });

  it('should be undetermined for plain markup', () => {
    const $ = cheerio.load('<html><body><div class="c1"><p>Text</p></div></body></html>');
    expect(fingerprint($, signalsFor($), getPolicyTables())).toEqual({ status: 'undetermined' });
  });

  it('should prefer the stronger predicate over priority', () => {
    const $ = cheerio.load(
      '<html><head><script type="application/ld+json">{"@type":"TechArticle"}</script></head>' +
      '<body><div id="shell"></div></body></html>'
    );
    const tables = tablesWith([
      profile({ id: 'typed', priority: 1, detect: [{ type: 'structuredType', schemaType: 'TechArticle' }] }),
      profile({ id: 'shell', priority: 9, detect: [{ type: 'element', selector: '#shell' }] }),
    ]);

    const result = fingerprint($, signalsFor($), tables);
    expect(result.status === 'matched' && result.profile.id).toBe('shell');
  });

  it('should break strength ties by priority rank', () => {
    const $ = cheerio.load('<html><body><div class="x-a"></div></body></html>');
    const tables = tablesWith([
      profile({ id: 'late', priority: 5 }),
      profile({ id: 'early', priority: 1 }),
    ]);

    const result = fingerprint($, signalsFor($), tables);
    expect(result.status === 'matched' && result.profile.id).toBe('early');
  });

  it('should break full ties by table order', () => {
    const $ = cheerio.load('<html><body><div class="x-a"></div></body></html>');
    const tables = tablesWith([profile({ id: 'first' }), profile({ id: 'second' })]);

    const result = fingerprint($, signalsFor($), tables);
    expect(result.status === 'matched' && result.profile.id).toBe('first');
  });
});

describe('confidenceForStrength', () => {
  it('should map strengths to confidence', () => {
    expect([0, 1, 2, 3].map(confidenceForStrength)).toEqual([0.95, 0.9, 0.8, 0.7]);
  });
});

describe('locateFrameworkRoot', () => {
  it('should resolve the first content selector inside the container', () => {
    const $ = cheerio.load(DOCUSAURUS_PAGE);
    const docusaurus = getPolicyTables().frameworks.find(p => p.id === 'docusaurus');
    if (!docusaurus) throw new Error('docusaurus profile missing');

    const result = locateFrameworkRoot($, docusaurus);
    expect(result.status).toBe('located');
    if (result.status !== 'located') return;
    expect(result.selector).toBe('.theme-doc-markdown');
    expect(result.root.attribs.class).toBe('theme-doc-markdown markdown');
  });

  it('should fail when the container is missing', () => {
    const $ = cheerio.load('<html><body><p>x</p></body></html>');
    expect(locateFrameworkRoot($, profile({ id: 'p', container: '#nope' }))).toEqual({
      status: 'unresolved',
      reason: 'container "#nope" not found',
    });
  });

  it('should fail when no content selector resolves', () => {
    const $ = cheerio.load('<html><body><main><p>x</p></main></body></html>');
    const result = locateFrameworkRoot($, profile({ id: 'p', container: 'main', content: ['.body'] }));
    expect(result).toEqual({
      status: 'unresolved',
      reason: 'no content selector of p resolved inside "main"',
    });
  });

  it('should resolve several matches to their common ancestor', () => {
    const $ = cheerio.load(
      '<html><body><div class="story"><section id="s"><p class="para">a</p><div><p class="para">b</p></div></section></div></body></html>'
    );
    const result = locateFrameworkRoot($, profile({ id: 'p', container: '.story', content: ['.para'] }));
    expect(result.status === 'located' && result.root.attribs.id).toBe('s');
  });

  it('should accept the container itself as content', () => {
    const $ = cheerio.load('<html><body><div class="body" id="b"><p>x</p></div></body></html>');
    const result = locateFrameworkRoot($, profile({ id: 'p', container: 'div.body', content: ['div.body'] }));
    expect(result.status === 'located' && result.root.attribs.id).toBe('b');
  });

  it('should skip content selectors that do not parse', () => {
    const $ = cheerio.load('<html><body><main><div class="inner" id="i">x</div></main></body></html>');
    const result = locateFrameworkRoot($, profile({ id: 'p', container: 'main', content: ['p[[', '.inner'] }));
    expect(result.status === 'located' && result.root.attribs.id).toBe('i');
  });
});
