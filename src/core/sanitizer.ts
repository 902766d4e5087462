/**
 * Allow-list Sanitizer
 *
 * Reduces a subtree to a safe, link-preserving fragment:
 * - disallowed tags are unwrapped, keeping their permitted content
 * - executable, embedded and interactive tags go with their content
 * - attributes are filtered per tag
 * - href/src must be relative or use an allowed scheme
 * - every link gets `rel="nofollow"`
 *
 * A verification pass re-walks the output. Anything that still violates
 * the allow-list is removed and logged as an error.
 */

import * as cheerio from 'cheerio';
import type { CheerioAPI } from 'cheerio';
import { isComment, isTag, isText, type AnyNode, type Document, type Element } from 'domhandler';
import {
  ALLOWED_ATTRIBUTES,
  ALLOWED_TAGS,
  ALLOWED_URL_SCHEMES,
  CLASS_AND_ID_ATTRIBUTES,
  DROP_WITH_CONTENT_TAGS,
  URL_ATTRIBUTES,
} from './policy-tables.js';
import { collectText } from './dom-metrics.js';
import { checkUrl, resolveUrl } from '../utils/url-safety.js';
import { DEFAULT_EXTRACTION_CONFIG } from '../utils/config-schemas.js';
import { logger } from '../utils/logger.js';

export interface SanitizeOptions {
  keepClassAndId: boolean;
  /** Base for resolving relative references */
  baseUrl?: string;
  resolveRelativeUrls: boolean;
  maxTraversalDepth: number;
  allowedSchemes?: readonly string[];
}

export interface SanitizeResult {
  html: string;
  text: string;
  warnings: string[];
}

const NOFOLLOW = 'nofollow';

function allowedAttributesFor(tag: string, keepClassAndId: boolean): ReadonlySet<string> {
  const names = [...(ALLOWED_ATTRIBUTES[tag] ?? [])];
  if (keepClassAndId) names.push(...CLASS_AND_ID_ATTRIBUTES);
  return new Set(names);
}

function isUrlAttribute(tag: string, attribute: string): boolean {
  return (URL_ATTRIBUTES[tag] ?? []).includes(attribute);
}

/**
 * Merge `nofollow` into a rel value, keeping existing tokens in order.
 */
export function withNofollow(rel: string | undefined): string {
  const tokens = (rel ?? '').split(/\s+/).filter(Boolean);
  if (!tokens.some(token => token.toLowerCase() === NOFOLLOW)) tokens.push(NOFOLLOW);
  return tokens.join(' ');
}

class SanitizePass {
  readonly warnings: string[] = [];
  private droppedUrls = 0;
  private truncated = false;
  private readonly schemes: readonly string[];

  constructor(private readonly $: CheerioAPI, private readonly options: SanitizeOptions) {
    this.schemes = options.allowedSchemes ?? ALLOWED_URL_SCHEMES;
  }

  run(doc: Document): void {
    this.sanitizeChildren(doc, 0);

    if (this.droppedUrls > 0) {
      this.warnings.push(`Dropped ${this.droppedUrls} URL attribute(s) with a disallowed scheme`);
    }
    if (this.truncated) {
      this.warnings.push(
        `Dropped content nested deeper than ${this.options.maxTraversalDepth} levels`
      );
    }
  }

  private sanitizeChildren(parent: Document | Element, depth: number): void {
    for (const child of [...parent.children]) {
      if (isText(child)) continue;

      if (!isTag(child)) {
        // comments, doctype, processing instructions, CDATA
        this.$(child).remove();
        continue;
      }

      if (depth >= this.options.maxTraversalDepth) {
        this.truncated = true;
        this.$(child).remove();
        continue;
      }

      if (DROP_WITH_CONTENT_TAGS.has(child.name)) {
        this.$(child).remove();
        continue;
      }

      this.sanitizeChildren(child, depth + 1);

      if (ALLOWED_TAGS.has(child.name)) {
        this.sanitizeAttributes(child);
      } else {
        this.unwrap(child);
      }
    }
  }

  private unwrap(el: Element): void {
    const $el = this.$(el);
    $el.replaceWith($el.contents());
  }

  private sanitizeAttributes(el: Element): void {
    const $el = this.$(el);
    const allowed = allowedAttributesFor(el.name, this.options.keepClassAndId);

    for (const [name, value] of Object.entries(el.attribs)) {
      if (!allowed.has(name)) {
        $el.removeAttr(name);
        continue;
      }
      if (isUrlAttribute(el.name, name)) {
        const url = this.safeUrl(value);
        if (url === null) {
          $el.removeAttr(name);
          this.droppedUrls++;
        } else {
          $el.attr(name, url);
        }
      }
    }

    if (el.name === 'a') {
      $el.attr('rel', withNofollow(el.attribs.rel));
    }
  }

  private safeUrl(value: string): string | null {
    const check = checkUrl(value, this.schemes);
    if (!check.safe) return null;

    const { baseUrl, resolveRelativeUrls } = this.options;
    if (check.kind === 'relative' && resolveRelativeUrls && baseUrl) {
      const resolved = checkUrl(resolveUrl(check.url, baseUrl), this.schemes);
      if (resolved.safe) return resolved.url;
    }
    return check.url;
  }
}

/**
 * Walk a sanitized tree and remove anything the allow-list forbids.
 * Returns one message per violation. An empty list is the expected outcome.
 */
export function verifyFragment(
  $: CheerioAPI,
  options: Pick<SanitizeOptions, 'keepClassAndId' | 'allowedSchemes'>
): string[] {
  const violations: string[] = [];
  const schemes = options.allowedSchemes ?? ALLOWED_URL_SCHEMES;

  const report = (message: string): void => {
    violations.push(message);
    logger.sanitizer.error('Sanitization violation', { violation: message });
  };

  const walk = (parent: Document | Element): void => {
    for (const child of [...parent.children]) {
      if (isText(child)) continue;

      if (!isTag(child)) {
        report(`${isComment(child) ? 'comment' : child.type} node in output`);
        $(child).remove();
        continue;
      }

      if (!ALLOWED_TAGS.has(child.name)) {
        report(`disallowed tag <${child.name}> in output`);
        $(child).remove();
        continue;
      }

      const allowed = allowedAttributesFor(child.name, options.keepClassAndId);
      for (const [name, value] of Object.entries(child.attribs)) {
        if (!allowed.has(name)) {
          report(`disallowed attribute ${name} on <${child.name}>`);
          $(child).removeAttr(name);
        } else if (isUrlAttribute(child.name, name) && !checkUrl(value, schemes).safe) {
          report(`disallowed URL in ${name} on <${child.name}>`);
          $(child).removeAttr(name);
        }
      }

      walk(child);
    }
  };

  walk($.root()[0]);
  return violations;
}

function finish($: CheerioAPI, pass: SanitizePass, options: SanitizeOptions): SanitizeResult {
  const violations = verifyFragment($, options);
  const warnings = [
    ...pass.warnings,
    ...violations.map(violation => `Sanitization violation removed: ${violation}`),
  ];
  const doc = $.root()[0];

  return {
    html: ($.root().html() ?? '').trim(),
    text: collectText(doc, options.maxTraversalDepth),
    warnings,
  };
}

/**
 * Sanitize every node of a loaded document in place and serialize it.
 */
export function sanitizeDocument($: CheerioAPI, options: SanitizeOptions): SanitizeResult {
  const pass = new SanitizePass($, options);
  pass.run($.root()[0]);
  return finish($, pass, options);
}

/**
 * Sanitize a detached node. The node is moved into a fresh document;
 * pass a clone when the original tree must stay intact.
 */
export function sanitizeNode(node: AnyNode, options: SanitizeOptions): SanitizeResult {
  return sanitizeDocument(cheerio.load(node), options);
}

/**
 * Sanitize serialized markup. Sanitizing the output again yields the same
 * markup.
 */
export function sanitizeFragment(
  html: string,
  options: Partial<SanitizeOptions> = {}
): SanitizeResult {
  const resolved: SanitizeOptions = {
    keepClassAndId: options.keepClassAndId ?? DEFAULT_EXTRACTION_CONFIG.keepClassAndId,
    resolveRelativeUrls: options.resolveRelativeUrls ?? DEFAULT_EXTRACTION_CONFIG.resolveRelativeUrls,
    maxTraversalDepth: options.maxTraversalDepth ?? DEFAULT_EXTRACTION_CONFIG.maxTraversalDepth,
    baseUrl: options.baseUrl,
    allowedSchemes: options.allowedSchemes,
  };
  return sanitizeDocument(cheerio.load(html, null, false), resolved);
}
