import { vi } from 'vitest';
import { parseHtml } from '../src/html/cheerio-document';
import type { ListingSelectors, Logger, ParsedElement } from '../src/crawl/types';

export const selectors: ListingSelectors = {
  listing: { tag: 'li', className: 'job-listing' },
  location: { tag: 'span', className: 'job-location' },
  postDate: { tag: 'div', className: 'job-posted' },
  subtitle: { tag: 'div', className: 'job-subtitle' },
};

export function silentLogger() {
  return {
    debug: vi.fn<Logger['debug']>(),
    info: vi.fn<Logger['info']>(),
    warn: vi.fn<Logger['warn']>(),
    error: vi.fn<Logger['error']>(),
  } satisfies Logger;
}

export function listingNodes(itemsHtml: string): ParsedElement[] {
  return parseHtml(`<ul>${itemsHtml}</ul>`).findAll('li', 'job-listing');
}

export function listingNode(itemHtml: string): ParsedElement {
  const [node] = listingNodes(itemHtml);
  if (!node) throw new Error('fixture has no li.job-listing');
  return node;
}

/** Bare element exposing only text, for subtitle scans. */
export function textElement(text: string): ParsedElement {
  return {
    find: () => null,
    findAll: () => [],
    text: () => text,
    attr: () => undefined,
  };
}
