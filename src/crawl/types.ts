import type { Logger } from '../logger';

export type { Logger };

/** One parsed HTML element, as far as the extractors need it. */
export interface ParsedElement {
  /** First descendant with the given tag name and class. */
  find(tag: string, className?: string): ParsedElement | null;
  findAll(tag: string, className?: string): ParsedElement[];
  text(): string;
  attr(name: string): string | undefined;
}

export interface ParsedDocument extends ParsedElement {
  byId(id: string): ParsedElement | null;
}

export interface HtmlParser {
  parse(body: string): ParsedDocument;
}

export interface HttpRequestOptions {
  headers: Record<string, string>;
  verifyTls: boolean;
  timeoutMs: number;
}

export interface HttpResponse {
  status: number;
  body: string;
}

export interface HttpClient {
  get(url: string, options: HttpRequestOptions): Promise<HttpResponse>;
}

export interface Clock {
  now(): Date;
}

export interface CompanyContext {
  id: number;
  name: string;
  /** Raw job-listing URL; may end in a feed suffix. */
  url: string;
  resource: string;
}

export interface JobRecord {
  title: string;
  url: string;
  location: string;
  postDate: string;
  description: string;
  category: string;
  employmentType: string;
  outputTable: string;
}

export type ListingFields = Pick<JobRecord, 'title' | 'url' | 'location' | 'postDate'>;

export interface JobMetadata {
  category: string;
  employmentType: string;
}

export interface InsertResult {
  ok: boolean;
  errorMessage: string;
}

export interface JobStore {
  insertJob(companyRowId: number, record: JobRecord): InsertResult | Promise<InsertResult>;
}

export interface DescriptionBackfill {
  /** Returns the number of stored jobs whose description was filled in. */
  updateDescriptions(companyRowId: number, outputTable: string): Promise<number>;
}

export interface ListingSource {
  fetchListings(listingUrl: string): Promise<ParsedElement[]>;
}

export type CrawlStatus = 'Success' | 'Failed';

export interface CrawlResult {
  readonly status: CrawlStatus;
  readonly successCount: number;
  readonly failedCount: number;
  readonly errorLog: string;
}

export interface CrawlStatusRecord {
  companyId: number;
  status: CrawlStatus;
  successCount: number;
  failedCount: number;
  errorLog: string;
  startedAt: string;
  finishedAt: string;
}

export interface JobOutcome {
  successCount: 0 | 1;
  failedCount: 0 | 1;
  errors: string[];
}

/** Tag + class pairs locating the fields of one job-board layout. */
export interface ListingSelectors {
  listing: { tag: string; className?: string };
  location: { tag: string; className: string };
  postDate: { tag: string; className: string };
  subtitle: { tag: string; className: string };
}

/** A job-board layout: where listings live on the page and how to read them. */
export interface SiteAdapter extends ListingSource {
  readonly resource: string;
  readonly selectors: ListingSelectors;
}
