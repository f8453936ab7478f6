import cron from 'node-cron';
import type { ScheduledTask } from 'node-cron';
import { getConfig, reloadConfig, type AppConfig } from './config';
import { getAdapter, getAvailableAdapters } from './adapters';
import {
  getCompanies,
  getCrawlStatus,
  saveCrawlStatus,
  sqliteDescriptionRepository,
  sqliteJobStore,
  upsertCompany,
} from './db/database';
import { FetchingDescriptionBackfill } from './crawl/backfill';
import { DescriptionFetcher } from './crawl/description-fetcher';
import { describeError } from './crawl/errors';
import { CrawlOrchestrator } from './crawl/orchestrator';
import type { Clock, CrawlResult, HtmlParser, HttpClient } from './crawl/types';
import { cheerioParser } from './html/cheerio-document';
import { AxiosHttpClient } from './http/http-client';
import { createLogger } from './logger';

const log = createLogger('Scheduler');

let task: ScheduledTask | null = null;

export interface CompanyReport {
  companyId: number;
  company: string;
  resource: string;
  result: CrawlResult;
}

export interface CycleReport {
  companies: CompanyReport[];
  totalSaved: number;
  totalFailed: number;
  durationMs: number;
}

export interface CycleDeps {
  http: HttpClient;
  parser: HtmlParser;
  clock: Clock;
}

const defaultDeps: CycleDeps = {
  http: new AxiosHttpClient(),
  parser: cheerioParser,
  clock: { now: () => new Date() },
};

function seedCompanies(config: AppConfig): void {
  for (const company of config.companies) {
    upsertCompany(company);
  }
}

export async function runCrawlCycle(
  options: { companyId?: number; callDescriptionOnly?: boolean } = {},
  deps: CycleDeps = defaultDeps,
): Promise<CycleReport> {
  const config = getConfig();
  const settings = config.crawl;
  const callDescriptionOnly = options.callDescriptionOnly ?? settings.callDescriptionOnly;
  const startTime = Date.now();
  log.info('=== Crawl cycle started ===');

  seedCompanies(config);
  const outputTables = new Map(config.companies.map(c => [c.id, c.outputTable]));

  const fetcher = new DescriptionFetcher({
    http: deps.http,
    parser: deps.parser,
    logger: createLogger('Description'),
    userAgent: settings.userAgent,
    timeoutMs: settings.fetchTimeoutMs,
    descriptionElementId: settings.descriptionElementId,
  });

  const orchestrator = new CrawlOrchestrator({
    fetcher,
    store: sqliteJobStore,
    backfill: new FetchingDescriptionBackfill({
      repository: sqliteDescriptionRepository,
      fetcher,
      logger: createLogger('Backfill'),
      concurrency: settings.concurrency,
    }),
    clock: deps.clock,
    logger: createLogger('Crawl'),
    concurrency: settings.concurrency,
    maxErrorLogLength: settings.maxErrorLogLength,
  });

  const report: CycleReport = { companies: [], totalSaved: 0, totalFailed: 0, durationMs: 0 };

  for (const resource of getAvailableAdapters()) {
    const adapter = getAdapter(resource, {
      http: deps.http,
      parser: deps.parser,
      logger: createLogger(resource),
      userAgent: settings.userAgent,
      timeoutMs: settings.fetchTimeoutMs,
    });
    if (!adapter) continue;

    const companies = getCompanies(options.companyId ?? null, config.excludedUrlIds, resource);
    for (const company of companies) {
      const startedAt = deps.clock.now().toISOString();
      const result = await orchestrator.run({
        company,
        adapter,
        outputTable: outputTables.get(company.id) ?? 'jobs',
        priorStatus: getCrawlStatus(company.id),
        callDescriptionOnly,
      });

      saveCrawlStatus({
        companyId: company.id,
        ...result,
        startedAt,
        finishedAt: deps.clock.now().toISOString(),
      });

      report.companies.push({ companyId: company.id, company: company.name, resource, result });
      report.totalSaved += result.successCount;
      report.totalFailed += result.failedCount;
    }
  }

  report.durationMs = Date.now() - startTime;
  log.info(`=== Crawl cycle complete in ${(report.durationMs / 1000).toFixed(1)}s ===`);
  return report;
}

export function formatReport(report: CycleReport): string {
  const lines: string[] = ['Crawl Report', ''];

  for (const entry of report.companies) {
    const { result } = entry;
    lines.push(`[${result.status}] ${entry.company} (${entry.resource})`);
    lines.push(`   Saved: ${result.successCount} | Failed: ${result.failedCount}`);
    if (result.errorLog) {
      const firstError = result.errorLog.split('\n')[0];
      lines.push(`   Error: ${firstError}`);
    }
  }

  if (report.companies.length === 0) {
    lines.push('No companies crawled');
  }

  lines.push('');
  lines.push(`Total saved: ${report.totalSaved}`);
  lines.push(`Total failed: ${report.totalFailed}`);
  lines.push(`Duration: ${(report.durationMs / 1000).toFixed(1)}s`);

  return lines.join('\n');
}

/** One cron tick: pick up edits to the config file, then crawl. */
export async function runScheduledCycle(deps: CycleDeps = defaultDeps): Promise<CycleReport> {
  try {
    reloadConfig();
  } catch (err) {
    log.warn(`Keeping the previous config: ${describeError(err)}`);
  }

  const report = await runCrawlCycle({}, deps);
  log.info(formatReport(report));
  return report;
}

export function startScheduler(): boolean {
  const expression = getConfig().crawl.cronExpression;

  if (!cron.validate(expression)) {
    log.error(`Invalid cron expression: ${expression}`);
    return false;
  }

  task = cron.schedule(expression, async () => {
    try {
      await runScheduledCycle();
    } catch (err) {
      log.error('Crawl cycle failed', err);
    }
  });

  log.info(`Scheduler started with cron: ${expression}`);
  return true;
}

export function stopScheduler(): void {
  if (task) {
    task.stop();
    task = null;
    log.info('Scheduler stopped');
  }
}
