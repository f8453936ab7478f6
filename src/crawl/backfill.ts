import type { DescriptionFetcher } from './description-fetcher';
import { mapWithConcurrency } from './pool';
import type { DescriptionBackfill, Logger } from './types';

export interface StoredJobRef {
  id: number;
  url: string;
}

export interface DescriptionRepository {
  getJobsMissingDescription(companyRowId: number, outputTable: string): StoredJobRef[];
  updateJobDescription(jobId: number, description: string): void;
}

export interface FetchingBackfillOptions {
  repository: DescriptionRepository;
  fetcher: Pick<DescriptionFetcher, 'fetch'>;
  logger: Logger;
  concurrency: number;
}

/**
 * Re-fetches descriptions for stored jobs that have none. A fetch that
 * comes back empty leaves the row untouched for the next run.
 */
export class FetchingDescriptionBackfill implements DescriptionBackfill {
  constructor(private readonly options: FetchingBackfillOptions) {}

  async updateDescriptions(companyRowId: number, outputTable: string): Promise<number> {
    const { repository, fetcher, logger, concurrency } = this.options;
    const pending = repository.getJobsMissingDescription(companyRowId, outputTable);
    if (pending.length === 0) return 0;

    logger.info(`Backfilling ${pending.length} descriptions for company #${companyRowId} (${outputTable})`);

    const fetched = await mapWithConcurrency(pending, concurrency, async job => ({
      id: job.id,
      description: await fetcher.fetch(job.url),
    }));

    let updated = 0;
    for (const { id, description } of fetched) {
      if (!description) continue;
      repository.updateJobDescription(id, description);
      updated++;
    }
    return updated;
  }
}
