/**
 * Structured Data
 *
 * Reads JSON-LD items from `<script type="application/ld+json">` blocks,
 * flattening `@graph` containers and top-level arrays.
 */

import type { CheerioAPI } from 'cheerio';
import { logger } from '../utils/logger.js';

export type JsonLdItem = Record<string, unknown>;

function isRecord(value: unknown): value is JsonLdItem {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function collectItems(data: unknown, items: JsonLdItem[]): void {
  if (Array.isArray(data)) {
    for (const entry of data) collectItems(entry, items);
    return;
  }
  if (!isRecord(data)) return;

  const graph = data['@graph'];
  if (Array.isArray(graph)) {
    for (const entry of graph) collectItems(entry, items);
  }
  if (data['@type'] !== undefined) {
    items.push(data);
  }
}

/**
 * All typed JSON-LD items in the document. Blocks that fail to parse are
 * skipped.
 */
export function readJsonLdItems($: CheerioAPI): JsonLdItem[] {
  const items: JsonLdItem[] = [];

  $('script[type="application/ld+json"]').each((index, el) => {
    const content = $(el).html();
    if (!content || !content.trim()) return;

    try {
      collectItems(JSON.parse(content), items);
    } catch (error) {
      logger.semantic.debug('Skipping unparseable JSON-LD block', {
        index,
        error: error instanceof Error ? error.message : String(error),
      });
    }
  });

  return items;
}

/**
 * `@type` values of an item (a string or an array of strings).
 */
export function getItemTypes(item: JsonLdItem): string[] {
  const type = item['@type'];
  if (typeof type === 'string') return [type];
  if (Array.isArray(type)) {
    return type.filter((entry): entry is string => typeof entry === 'string');
  }
  return [];
}

/**
 * Non-empty `articleBody` strings declared by any item.
 */
export function getArticleBodies(items: readonly JsonLdItem[]): string[] {
  const bodies: string[] = [];
  for (const item of items) {
    const body = item.articleBody;
    if (typeof body === 'string' && body.trim()) {
      bodies.push(body);
    }
  }
  return bodies;
}
