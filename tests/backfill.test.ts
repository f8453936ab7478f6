import { describe, it, expect, vi } from 'vitest';
import { FetchingDescriptionBackfill, type DescriptionRepository, type StoredJobRef } from '../src/crawl/backfill';
import { silentLogger } from './helpers';

function createBackfill(pending: StoredJobRef[], descriptions: Record<string, string>) {
  const repository = {
    getJobsMissingDescription: vi.fn<DescriptionRepository['getJobsMissingDescription']>(() => pending),
    updateJobDescription: vi.fn<DescriptionRepository['updateJobDescription']>(),
  };
  const fetcher = { fetch: vi.fn(async (url: string) => descriptions[url] ?? '') };
  const backfill = new FetchingDescriptionBackfill({ repository, fetcher, logger: silentLogger(), concurrency: 2 });
  return { backfill, repository, fetcher };
}

describe('FetchingDescriptionBackfill', () => {
  it('fills descriptions that could be fetched', async () => {
    const { backfill, repository } = createBackfill(
      [
        { id: 10, url: 'https://careers.example.com/jobs/1' },
        { id: 11, url: 'https://careers.example.com/jobs/2' },
        { id: 12, url: 'https://careers.example.com/jobs/3' },
      ],
      {
        'https://careers.example.com/jobs/1': 'First',
        'https://careers.example.com/jobs/3': 'Third',
      },
    );

    await expect(backfill.updateDescriptions(1, 'jobs')).resolves.toBe(2);
    expect(repository.getJobsMissingDescription).toHaveBeenCalledWith(1, 'jobs');
    expect(repository.updateJobDescription).toHaveBeenCalledTimes(2);
    expect(repository.updateJobDescription).toHaveBeenCalledWith(10, 'First');
    expect(repository.updateJobDescription).toHaveBeenCalledWith(12, 'Third');
  });

  it('does nothing when no job is missing a description', async () => {
    const { backfill, fetcher } = createBackfill([], {});
    await expect(backfill.updateDescriptions(1, 'jobs')).resolves.toBe(0);
    expect(fetcher.fetch).not.toHaveBeenCalled();
  });
});
