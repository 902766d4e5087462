/**
 * Tests for URL scheme allow-listing
 */

import { describe, it, expect } from 'vitest';
import {
  DEFAULT_ALLOWED_SCHEMES,
  checkUrl,
  getUrlScheme,
  isSafeUrl,
  normalizeUrlValue,
  resolveUrl,
} from '../../src/utils/url-safety.js';

describe('normalizeUrlValue', () => {
  it('should remove whitespace and control characters', () => {
    expect(normalizeUrlValue(' java\tscript:\nalert(1)')).toBe('javascript:alert(1)');
    expect(normalizeUrlValue('\u0001https://example.com/')).toBe('https://example.com/');
  });
});

describe('getUrlScheme', () => {
  it('should return the lowercased scheme', () => {
    expect(getUrlScheme('HTTPS://example.com')).toBe('https');
    expect(getUrlScheme('mailto:desk@example.com')).toBe('mailto');
  });

  it('should return null for relative references', () => {
    expect(getUrlScheme('/docs/intro')).toBeNull();
    expect(getUrlScheme('../up')).toBeNull();
    expect(getUrlScheme('#section')).toBeNull();
    expect(getUrlScheme('?page=2')).toBeNull();
    expect(getUrlScheme('//cdn.example.com/a.png')).toBeNull();
  });
});

describe('checkUrl', () => {
  it('should allow http, https and mailto by default', () => {
    expect(DEFAULT_ALLOWED_SCHEMES).toEqual(['http', 'https', 'mailto']);
    expect(checkUrl('https://example.com/a')).toEqual({ safe: true, kind: 'absolute', url: 'https://example.com/a' });
    expect(checkUrl('http://example.com/')).toEqual({ safe: true, kind: 'absolute', url: 'http://example.com/' });
    expect(checkUrl('mailto:desk@example.com').safe).toBe(true);
  });

  it('should mark relative references and trim them', () => {
    expect(checkUrl('  /docs/intro ')).toEqual({ safe: true, kind: 'relative', url: '/docs/intro' });
  });

  it('should reject script-executing and data schemes', () => {
    expect(checkUrl('javascript:alert(1)')).toEqual({ safe: false, reason: 'disallowed-scheme', scheme: 'javascript' });
    expect(checkUrl('VBScript:msgbox(1)')).toEqual({ safe: false, reason: 'disallowed-scheme', scheme: 'vbscript' });
    expect(checkUrl('data:text/html;base64,PHA+')).toEqual({ safe: false, reason: 'disallowed-scheme', scheme: 'data' });
    expect(checkUrl('file:///etc/hosts')).toEqual({ safe: false, reason: 'disallowed-scheme', scheme: 'file' });
  });

  it('should see through obfuscated schemes', () => {
    expect(checkUrl('java\tscript:alert(1)').safe).toBe(false);
    expect(checkUrl(' \u0000javascript:alert(1)').safe).toBe(false);
  });

  it('should reject empty values', () => {
    expect(checkUrl('')).toEqual({ safe: false, reason: 'empty' });
    expect(checkUrl(' \t ')).toEqual({ safe: false, reason: 'empty' });
  });

  it('should honor a custom allow-set', () => {
    expect(checkUrl('ftp://files.example.com/a', ['ftp']).safe).toBe(true);
    expect(checkUrl('mailto:desk@example.com', ['https']).safe).toBe(false);
  });
});

describe('resolveUrl', () => {
  it('should resolve against the base', () => {
    expect(resolveUrl('/a', 'https://example.com/post/')).toBe('https://example.com/a');
    expect(resolveUrl('b.png', 'https://example.com/post/')).toBe('https://example.com/post/b.png');
    expect(resolveUrl('#top', 'https://example.com/post')).toBe('https://example.com/post#top');
  });

  it('should return the reference when the base is missing or invalid', () => {
    expect(resolveUrl('/a', undefined)).toBe('/a');
    expect(resolveUrl('/a', 'not a url')).toBe('/a');
  });
});

describe('isSafeUrl', () => {
  it('should agree with checkUrl', () => {
    expect(isSafeUrl('https://example.com')).toBe(true);
    expect(isSafeUrl('javascript:void(0)')).toBe(false);
  });
});
