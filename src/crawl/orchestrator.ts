import { canonicalListingUrl, siteBaseOf } from './company-url';
import { emptyTally, finalizeCrawlResult, foldOutcomes, type CrawlTally } from './crawl-result';
import type { DescriptionFetcher } from './description-fetcher';
import { describeError, errorStack } from './errors';
import { JobProcessor } from './job-processor';
import { mapWithConcurrency } from './pool';
import type {
  Clock,
  CompanyContext,
  CrawlResult,
  CrawlStatusRecord,
  DescriptionBackfill,
  JobStore,
  Logger,
  SiteAdapter,
} from './types';

export interface CrawlOrchestratorOptions {
  fetcher: Pick<DescriptionFetcher, 'fetch'>;
  store: JobStore;
  backfill: DescriptionBackfill;
  clock: Clock;
  logger: Logger;
  concurrency: number;
  maxErrorLogLength: number;
}

export interface CrawlInput {
  company: CompanyContext;
  adapter: SiteAdapter;
  outputTable: string;
  priorStatus: CrawlStatusRecord | null;
  callDescriptionOnly: boolean;
}

/** YYYY-MM-DD of the clock's local calendar day. */
export function currentDateString(now: Date): string {
  const month = String(now.getMonth() + 1).padStart(2, '0');
  const day = String(now.getDate()).padStart(2, '0');
  return `${now.getFullYear()}-${month}-${day}`;
}

export class CrawlOrchestrator {
  constructor(private readonly options: CrawlOrchestratorOptions) {}

  /** Always resolves; failures end up in the result's error log. */
  async run(input: CrawlInput): Promise<CrawlResult> {
    const { clock, logger, maxErrorLogLength } = this.options;
    const { company, outputTable, callDescriptionOnly } = input;
    const startedAt = clock.now();

    let tally: CrawlTally = emptyTally();
    let crashed = false;

    try {
      const listingUrl = canonicalListingUrl(company.url);
      logger.info(`Crawling ${company.name} (#${company.id}) at ${listingUrl}`);

      if (callDescriptionOnly) {
        tally = emptyTally(input.priorStatus?.successCount ?? 0, input.priorStatus?.failedCount ?? 0);
        logger.info(`Description-only run, carrying forward ${tally.successCount} saved / ${tally.failedCount} failed`);
      } else {
        tally = await this.crawlListings(input, listingUrl, startedAt);
      }

      const filled = await this.options.backfill.updateDescriptions(company.id, outputTable);
      logger.info(`Backfilled ${filled} descriptions for ${company.name}`);
    } catch (err) {
      crashed = true;
      tally.errors.add(describeError(err));
      logger.error(`Crawl of ${company.name} aborted`, errorStack(err));
    }

    const result = finalizeCrawlResult(tally, maxErrorLogLength, crashed);
    const elapsedMs = clock.now().getTime() - startedAt.getTime();
    logger.info(
      `Crawl of ${company.name} finished in ${(elapsedMs / 1000).toFixed(1)}s: ` +
        `${result.status}, saved ${result.successCount}, failed ${result.failedCount}`,
    );
    return result;
  }

  private async crawlListings(
    input: CrawlInput,
    listingUrl: string,
    startedAt: Date,
  ): Promise<CrawlTally> {
    const { fetcher, store, logger, concurrency } = this.options;
    const { company, adapter, outputTable } = input;

    const processor = new JobProcessor({
      fetcher,
      store,
      logger,
      selectors: adapter.selectors,
      siteBase: siteBaseOf(listingUrl),
      currentDate: currentDateString(startedAt),
    });

    const nodes = await adapter.fetchListings(listingUrl);
    logger.info(`Found ${nodes.length} listings for ${company.name}`);

    const outcomes = await mapWithConcurrency(nodes, concurrency, node =>
      processor.process(node, company, outputTable),
    );
    return foldOutcomes(outcomes);
  }
}
