import { clean } from './text-normalizer';
import type { HtmlParser, HttpClient, Logger } from './types';

const DESCRIPTION_NOISE = ['\n', '\t', '\r', '\u00a0', '"'];

export interface DescriptionFetcherOptions {
  http: HttpClient;
  parser: HtmlParser;
  logger: Logger;
  userAgent: string;
  timeoutMs: number;
  descriptionElementId?: string;
}

export class DescriptionFetcher {
  private readonly elementId: string;

  constructor(private readonly options: DescriptionFetcherOptions) {
    this.elementId = options.descriptionElementId ?? 'js-job-description';
  }

  /** Resolves to an empty string on any failure; never rejects. */
  async fetch(jobUrl: string): Promise<string> {
    try {
      // Some boards serve broken certificate chains, so TLS verification is off here.
      // TODO: make verifyTls a per-company setting once the store carries site options.
      const { status, body } = await this.options.http.get(jobUrl, {
        headers: { 'User-Agent': this.options.userAgent },
        verifyTls: false,
        timeoutMs: this.options.timeoutMs,
      });
      if (status < 200 || status >= 300) {
        this.options.logger.debug(`Description fetch for ${jobUrl} returned HTTP ${status}`);
        return '';
      }

      const element = this.options.parser.parse(body).byId(this.elementId);
      if (!element) {
        this.options.logger.debug(`No #${this.elementId} element at ${jobUrl}`);
        return '';
      }

      const collapsed = element.text().split(/\s+/).filter(Boolean).join(' ');
      return clean(collapsed, DESCRIPTION_NOISE);
    } catch (err) {
      this.options.logger.debug(`Description fetch failed for ${jobUrl}`, err instanceof Error ? err.message : err);
      return '';
    }
  }
}
