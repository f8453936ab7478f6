import type {
  HtmlParser,
  HttpClient,
  ListingSelectors,
  Logger,
  ParsedElement,
  SiteAdapter,
} from '../crawl/types';

export interface AdapterDeps {
  http: HttpClient;
  parser: HtmlParser;
  logger: Logger;
  userAgent: string;
  timeoutMs: number;
}

export class ListingPageError extends Error {
  constructor(readonly url: string, readonly status: number) {
    super(`Listing page ${url} returned HTTP ${status}`);
    this.name = 'ListingPageError';
  }
}

export abstract class BaseSiteAdapter implements SiteAdapter {
  abstract readonly resource: string;
  abstract readonly selectors: ListingSelectors;

  constructor(protected readonly deps: AdapterDeps) {}

  async fetchListings(listingUrl: string): Promise<ParsedElement[]> {
    const { http, parser, logger, userAgent, timeoutMs } = this.deps;
    logger.debug(`Fetching listing page ${listingUrl}`);

    const { status, body } = await http.get(listingUrl, {
      headers: { 'User-Agent': userAgent },
      verifyTls: false,
      timeoutMs,
    });
    if (status < 200 || status >= 300) {
      throw new ListingPageError(listingUrl, status);
    }

    const { tag, className } = this.selectors.listing;
    return parser.parse(body).findAll(tag, className);
  }
}
