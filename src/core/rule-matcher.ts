/**
 * Rule Matcher
 *
 * Evaluates declarative element predicates (tag name, ARIA role,
 * attribute glob, class-token glob, attribute-name glob). The matcher
 * knows nothing about which rules exist; the policy tables supply them.
 */

import type { Element } from 'domhandler';
import type { ExclusionRule } from '../types/extraction.js';

export type ElementPredicate = (el: Element) => boolean;

/**
 * Convert a glob (`*` any run, `?` one character) into an anchored,
 * case-insensitive regular expression.
 */
export function globToRegExp(glob: string): RegExp {
  let source = '';
  for (const char of glob) {
    if (char === '*') {
      source += '.*';
    } else if (char === '?') {
      source += '.';
    } else {
      source += char.replace(/[.+^${}()|[\]\\/-]/g, '\\$&');
    }
  }
  return new RegExp(`^${source}$`, 'i');
}

/**
 * Whitespace-separated class tokens of an element.
 */
export function getClassTokens(el: Element): string[] {
  const value = el.attribs.class;
  return value ? value.split(/\s+/).filter(Boolean) : [];
}

/**
 * Whitespace-separated ARIA role tokens, lowercased.
 */
export function getRoles(el: Element): string[] {
  const value = el.attribs.role;
  return value ? value.toLowerCase().split(/\s+/).filter(Boolean) : [];
}

/**
 * Compile one rule into a predicate. Globs are compiled once here.
 */
export function compileRule(rule: ExclusionRule): ElementPredicate {
  switch (rule.kind) {
    case 'tag': {
      const names = new Set(rule.names.map(n => n.toLowerCase()));
      return (el) => names.has(el.name.toLowerCase());
    }

    case 'role': {
      const values = new Set(rule.values.map(v => v.toLowerCase()));
      return (el) => getRoles(el).some(role => values.has(role));
    }

    case 'attribute': {
      const pattern = globToRegExp(rule.glob);
      const attribute = rule.attribute.toLowerCase();
      const tags = rule.tags ? new Set(rule.tags.map(t => t.toLowerCase())) : null;
      return (el) => {
        if (tags && !tags.has(el.name.toLowerCase())) return false;
        const value = el.attribs[attribute];
        return value !== undefined && pattern.test(value);
      };
    }

    case 'classToken': {
      const pattern = globToRegExp(rule.glob);
      return (el) => getClassTokens(el).some(token => pattern.test(token));
    }

    case 'attributeName': {
      const pattern = globToRegExp(rule.glob);
      return (el) => Object.keys(el.attribs).some(name => pattern.test(name));
    }
  }
}

/**
 * True when any predicate matches the element.
 */
export function matchesAny(el: Element, predicates: readonly ElementPredicate[]): boolean {
  for (const predicate of predicates) {
    if (predicate(el)) return true;
  }
  return false;
}
