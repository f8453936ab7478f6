import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { describe, it, expect, vi, beforeEach, afterEach, type Mock } from 'vitest';
import { reloadConfig } from '../src/config';
import {
  formatReport,
  runCrawlCycle,
  runScheduledCycle,
  type CycleDeps,
  type CycleReport,
} from '../src/scheduler';
import { closeDatabase, getCrawlStatus, getJobsForCompany, initDatabase } from '../src/db/database';
import { cheerioParser } from '../src/html/cheerio-document';
import type { HttpClient } from '../src/crawl/types';

// Company #1 in config.json points at https://careers.example.com/jobs/feed.atom
const pages: Record<string, string> = {
  'https://careers.example.com/jobs': `
    <ul>
      <li class="job-listing">
        <a href="/jobs/1-backend">Backend Engineer</a>
        <div class="job-subtitle">Engineering | Remote | Full-time</div>
        <span class="job-location">Berlin</span>
        <div class="job-posted">2024-05-02</div>
      </li>
      <li class="job-listing"><a href="/jobs/2-designer">Designer</a></li>
    </ul>`,
  'https://careers.example.com/jobs/1-backend': '<div id="js-job-description"><p>Build   APIs.</p></div>',
};

const now = new Date(2024, 5, 1, 12, 0, 0);

function createDeps(): { deps: CycleDeps; get: Mock<HttpClient['get']> } {
  const get = vi.fn<HttpClient['get']>(async (url: string) =>
    url in pages ? { status: 200, body: pages[url] } : { status: 404, body: '' },
  );
  return {
    deps: { http: { get }, parser: cheerioParser, clock: { now: () => now } },
    get,
  };
}

describe('runCrawlCycle', () => {
  beforeEach(() => {
    initDatabase(':memory:');
  });

  afterEach(() => {
    closeDatabase();
  });

  it('crawls configured companies, saves jobs and records the crawl status', async () => {
    const { deps } = createDeps();

    const report = await runCrawlCycle({}, deps);

    expect(report.companies).toHaveLength(1);
    expect(report.companies[0]).toMatchObject({
      companyId: 1,
      company: 'Example Co',
      resource: 'careersite',
      result: { status: 'Success', successCount: 2, failedCount: 0, errorLog: '' },
    });
    expect(report.totalSaved).toBe(2);

    const jobs = getJobsForCompany(1, 'jobs');
    expect(jobs.map(job => [job.url, job.description, job.location, job.post_date])).toEqual([
      ['https://careers.example.com/jobs/1-backend', 'Build APIs.', 'Berlin', '2024-05-02'],
      ['https://careers.example.com/jobs/2-designer', '', 'Global', '2024-06-01'],
    ]);

    expect(getCrawlStatus(1)).toEqual({
      companyId: 1,
      status: 'Success',
      successCount: 2,
      failedCount: 0,
      errorLog: '',
      startedAt: now.toISOString(),
      finishedAt: now.toISOString(),
    });
  });

  it('only backfills descriptions in description-only mode', async () => {
    const { deps, get } = createDeps();
    await runCrawlCycle({}, deps);
    get.mockClear();

    const report = await runCrawlCycle({ callDescriptionOnly: true }, deps);

    expect(report.companies[0].result).toEqual({ status: 'Success', successCount: 2, failedCount: 0, errorLog: '' });
    expect(get.mock.calls.map(([url]) => url)).toEqual(['https://careers.example.com/jobs/2-designer']);
  });

  it('skips companies that are not selected', async () => {
    const { deps, get } = createDeps();

    const report = await runCrawlCycle({ companyId: 42 }, deps);

    expect(report.companies).toEqual([]);
    expect(get).not.toHaveBeenCalled();
  });
});

describe('runScheduledCycle', () => {
  beforeEach(() => {
    initDatabase(':memory:');
  });

  afterEach(() => {
    closeDatabase();
    vi.unstubAllEnvs();
    reloadConfig();
  });

  it('reloads the config file before each crawl', async () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'crawler-config-'));
    const file = path.join(dir, 'config.json');
    const writeCompany = (id: number, name: string) =>
      fs.writeFileSync(
        file,
        JSON.stringify({
          companies: [{ id, name, url: 'https://careers.example.com/jobs/feed.atom', resource: 'careersite' }],
        }),
      );
    vi.stubEnv('CONFIG_PATH', file);
    const { deps } = createDeps();

    writeCompany(5, 'First Co');
    const first = await runScheduledCycle(deps);
    writeCompany(6, 'Second Co');
    const second = await runScheduledCycle(deps);

    expect(first.companies.map(c => [c.companyId, c.company])).toEqual([[5, 'First Co']]);
    expect(second.companies.map(c => [c.companyId, c.company])).toEqual([
      [5, 'First Co'],
      [6, 'Second Co'],
    ]);
  });

  it('crawls with the previous config when the file no longer parses', async () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'crawler-config-'));
    const file = path.join(dir, 'config.json');
    fs.writeFileSync(
      file,
      JSON.stringify({
        companies: [{ id: 5, name: 'First Co', url: 'https://careers.example.com/jobs', resource: 'careersite' }],
      }),
    );
    vi.stubEnv('CONFIG_PATH', file);
    const { deps } = createDeps();
    await runScheduledCycle(deps);

    fs.writeFileSync(file, 'not json');
    const report = await runScheduledCycle(deps);

    expect(report.companies.map(c => [c.companyId, c.result.successCount])).toEqual([[5, 2]]);
  });
});

describe('formatReport', () => {
  it('renders one block per company and the totals', () => {
    const report: CycleReport = {
      companies: [
        {
          companyId: 1,
          company: 'Example Co',
          resource: 'careersite',
          result: { status: 'Failed', successCount: 2, failedCount: 1, errorLog: 'duplicate job;\nbad title' },
        },
      ],
      totalSaved: 2,
      totalFailed: 1,
      durationMs: 1500,
    };

    expect(formatReport(report)).toBe(
      [
        'Crawl Report',
        '',
        '[Failed] Example Co (careersite)',
        '   Saved: 2 | Failed: 1',
        '   Error: duplicate job;',
        '',
        'Total saved: 2',
        'Total failed: 1',
        'Duration: 1.5s',
      ].join('\n'),
    );
  });

  it('says when nothing was crawled', () => {
    expect(formatReport({ companies: [], totalSaved: 0, totalFailed: 0, durationMs: 0 })).toContain('No companies crawled');
  });
});
