import type { DescriptionFetcher } from './description-fetcher';
import { describeError, errorStack } from './errors';
import { extractListing, extractListingMetadata } from './listing-extractor';
import type {
  CompanyContext,
  JobOutcome,
  JobRecord,
  JobStore,
  ListingSelectors,
  Logger,
  ParsedElement,
} from './types';

export interface JobProcessorOptions {
  fetcher: Pick<DescriptionFetcher, 'fetch'>;
  store: JobStore;
  logger: Logger;
  selectors: ListingSelectors;
  siteBase: string;
  currentDate: string;
}

export class JobProcessor {
  constructor(private readonly options: JobProcessorOptions) {}

  /** Exactly one of the two counts is 1. Never rejects. */
  async process(node: ParsedElement, company: CompanyContext, outputTable: string): Promise<JobOutcome> {
    const { fetcher, store, logger, selectors, siteBase, currentDate } = this.options;

    try {
      const fields = extractListing(node, { siteBase, currentDate, selectors });
      const metadata = extractListingMetadata(node, selectors);
      const description = await fetcher.fetch(fields.url);

      const record: JobRecord = {
        ...fields,
        ...metadata,
        description,
        outputTable,
      };

      const { ok, errorMessage } = await store.insertJob(company.id, record);
      if (ok) {
        logger.debug(`Saved "${record.title}" for ${company.name}`);
        return { successCount: 1, failedCount: 0, errors: [] };
      }

      logger.warn(`Could not save "${record.title}" for ${company.name}: ${errorMessage}`);
      return { successCount: 0, failedCount: 1, errors: [errorMessage] };
    } catch (err) {
      logger.error(`Failed to process listing for ${company.name}`, errorStack(err));
      return { successCount: 0, failedCount: 1, errors: [describeError(err)] };
    }
  }
}
