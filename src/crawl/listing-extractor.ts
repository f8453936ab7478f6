import { clean } from './text-normalizer';
import { FieldExtractionError } from './errors';
import type { JobMetadata, ListingFields, ListingSelectors, ParsedElement } from './types';

export const DEFAULT_LOCATION = 'Global';

export interface FieldResult<T> {
  value: T;
  source: 'extracted' | 'default';
}

export interface ExtractOptions {
  siteBase: string;
  currentDate: string;
  selectors: ListingSelectors;
}

function extracted<T>(value: T): FieldResult<T> {
  return { value, source: 'extracted' };
}

function fallback<T>(value: T): FieldResult<T> {
  return { value, source: 'default' };
}

export function extractTitleAndUrl(node: ParsedElement, siteBase: string): { title: string; url: string } {
  const anchor = node.find('a');
  if (!anchor) throw new FieldExtractionError('title', 'listing has no anchor');

  const title = anchor.text().trim();
  if (!title) throw new FieldExtractionError('title', 'anchor text is empty');

  const href = anchor.attr('href')?.trim();
  if (!href) throw new FieldExtractionError('url', `anchor "${title}" has no href`);

  return { title, url: siteBase + href };
}

/** Text of the first match, or '' when nothing matches or the lookup throws. */
function findText(node: ParsedElement, selector: { tag: string; className: string }): string {
  try {
    return node.find(selector.tag, selector.className)?.text() ?? '';
  } catch {
    return '';
  }
}

export function extractLocation(node: ParsedElement, selectors: ListingSelectors): FieldResult<string> {
  const location = clean(findText(node, selectors.location), ['%']).replace(/'/g, '"');
  return location ? extracted(location) : fallback(DEFAULT_LOCATION);
}

export function extractPostDate(
  node: ParsedElement,
  selectors: ListingSelectors,
  currentDate: string,
): FieldResult<string> {
  const postDate = findText(node, selectors.postDate).trim();
  return postDate ? extracted(postDate) : fallback(currentDate);
}

/**
 * Category and employment type from "Category | Workplace | Type" subtitles.
 * The first subtitle with at least three parts wins; later ones are ignored.
 */
export function extractMetadata(subtitles: ParsedElement[]): FieldResult<JobMetadata> {
  for (const subtitle of subtitles) {
    const parts = subtitle.text().trim().split(/\s*\|\s*/);
    if (parts.length >= 3) {
      return extracted({ category: parts[0].trim(), employmentType: parts[2].trim() });
    }
  }
  return fallback({ category: '', employmentType: '' });
}

/** Throws FieldExtractionError when the title or URL cannot be read. */
export function extractListing(node: ParsedElement, options: ExtractOptions): ListingFields {
  const { title, url } = extractTitleAndUrl(node, options.siteBase);
  return {
    title,
    url,
    location: extractLocation(node, options.selectors).value,
    postDate: extractPostDate(node, options.selectors, options.currentDate).value,
  };
}

export function extractListingMetadata(node: ParsedElement, selectors: ListingSelectors): JobMetadata {
  let subtitles: ParsedElement[];
  try {
    subtitles = node.findAll(selectors.subtitle.tag, selectors.subtitle.className);
  } catch {
    subtitles = [];
  }
  return extractMetadata(subtitles).value;
}
