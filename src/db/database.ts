import Database from 'better-sqlite3';
import { getDatabasePath } from '../config';
import { createLogger } from '../logger';
import type { DescriptionRepository, StoredJobRef } from '../crawl/backfill';
import type {
  CompanyContext,
  CrawlStatus,
  CrawlStatusRecord,
  InsertResult,
  JobRecord,
  JobStore,
} from '../crawl/types';

const log = createLogger('DB');

export interface CompanyRow {
  id: number;
  name: string;
  url: string;
  resource: string;
  output_table: string;
  enabled: number;
}

export interface JobRow {
  id: number;
  company_id: number;
  output_table: string;
  title: string;
  url: string;
  location: string;
  post_date: string;
  description: string;
  category: string;
  employment_type: string;
  created_at: string;
  updated_at: string;
}

interface CrawlStatusRow {
  company_id: number;
  status: string;
  success_count: number;
  failed_count: number;
  error_log: string;
  started_at: string;
  finished_at: string;
}

export interface CompanyInput {
  id: number;
  name: string;
  url: string;
  resource: string;
  outputTable: string;
  enabled: boolean;
}

export interface GetCompaniesOptions {
  includeDisabled?: boolean;
}

let db: Database.Database | null = null;

function getDb(): Database.Database {
  if (!db) throw new Error('Database is not initialized; call initDatabase() first');
  return db;
}

export function initDatabase(dbPath: string = getDatabasePath()): void {
  db = new Database(dbPath);
  db.pragma('journal_mode = WAL');
  db.pragma('foreign_keys = ON');

  db.exec(`
    CREATE TABLE IF NOT EXISTS companies (
      id INTEGER PRIMARY KEY,
      name TEXT NOT NULL,
      url TEXT NOT NULL,
      resource TEXT NOT NULL,
      output_table TEXT NOT NULL DEFAULT 'jobs',
      enabled INTEGER NOT NULL DEFAULT 1
    );

    CREATE TABLE IF NOT EXISTS jobs (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      company_id INTEGER NOT NULL REFERENCES companies(id),
      output_table TEXT NOT NULL,
      title TEXT NOT NULL,
      url TEXT NOT NULL,
      location TEXT NOT NULL,
      post_date TEXT NOT NULL,
      description TEXT NOT NULL DEFAULT '',
      category TEXT NOT NULL DEFAULT '',
      employment_type TEXT NOT NULL DEFAULT '',
      created_at TEXT DEFAULT (datetime('now')),
      updated_at TEXT DEFAULT (datetime('now')),
      UNIQUE(company_id, output_table, url)
    );

    CREATE TABLE IF NOT EXISTS crawl_status (
      company_id INTEGER PRIMARY KEY REFERENCES companies(id),
      status TEXT NOT NULL,
      success_count INTEGER NOT NULL,
      failed_count INTEGER NOT NULL,
      error_log TEXT NOT NULL DEFAULT '',
      started_at TEXT NOT NULL,
      finished_at TEXT NOT NULL
    );
  `);

  log.info(`Database initialized at ${dbPath}`);
}

export function upsertCompany(company: CompanyInput): void {
  getDb().prepare(`
    INSERT INTO companies (id, name, url, resource, output_table, enabled)
    VALUES (@id, @name, @url, @resource, @outputTable, @enabled)
    ON CONFLICT(id) DO UPDATE SET
      name = excluded.name,
      url = excluded.url,
      resource = excluded.resource,
      output_table = excluded.output_table,
      enabled = excluded.enabled
  `).run({ ...company, enabled: company.enabled ? 1 : 0 });
}

export function getCompanyRows(resourceName: string): CompanyRow[] {
  return getDb()
    .prepare<[string], CompanyRow>('SELECT * FROM companies WHERE resource = ? ORDER BY id')
    .all(resourceName);
}

export function getCompanies(
  companyId: number | null,
  excludedUrlIds: number[],
  resourceName: string,
  opts: GetCompaniesOptions = {},
): CompanyContext[] {
  const excluded = new Set(excludedUrlIds);
  return getCompanyRows(resourceName)
    .filter(row => companyId === null || row.id === companyId)
    .filter(row => opts.includeDisabled || row.enabled === 1)
    .filter(row => !excluded.has(row.id))
    .map(row => ({ id: row.id, name: row.name, url: row.url, resource: row.resource }));
}

export function insertJob(companyRowId: number, record: JobRecord): InsertResult {
  if (!record.title.trim() || !record.url.trim()) {
    return { ok: false, errorMessage: `Job for company #${companyRowId} is missing a title or URL` };
  }

  try {
    getDb().prepare(`
      INSERT INTO jobs (company_id, output_table, title, url, location, post_date, description, category, employment_type)
      VALUES (@companyId, @outputTable, @title, @url, @location, @postDate, @description, @category, @employmentType)
      ON CONFLICT(company_id, output_table, url) DO UPDATE SET
        title = excluded.title,
        location = excluded.location,
        post_date = excluded.post_date,
        description = CASE WHEN excluded.description <> '' THEN excluded.description ELSE jobs.description END,
        category = excluded.category,
        employment_type = excluded.employment_type,
        updated_at = datetime('now')
    `).run({ companyId: companyRowId, ...record });
    return { ok: true, errorMessage: '' };
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    return { ok: false, errorMessage: `Failed to save ${record.url}: ${message}` };
  }
}

export function getJobsForCompany(companyRowId: number, outputTable: string): JobRow[] {
  return getDb()
    .prepare<[number, string], JobRow>('SELECT * FROM jobs WHERE company_id = ? AND output_table = ? ORDER BY id')
    .all(companyRowId, outputTable);
}

export function getJobsMissingDescription(companyRowId: number, outputTable: string): StoredJobRef[] {
  return getDb()
    .prepare<[number, string], StoredJobRef>(
      "SELECT id, url FROM jobs WHERE company_id = ? AND output_table = ? AND description = '' ORDER BY id",
    )
    .all(companyRowId, outputTable);
}

export function updateJobDescription(jobId: number, description: string): void {
  getDb()
    .prepare("UPDATE jobs SET description = ?, updated_at = datetime('now') WHERE id = ?")
    .run(description, jobId);
}

function toCrawlStatus(value: string): CrawlStatus {
  return value === 'Failed' ? 'Failed' : 'Success';
}

export function getCrawlStatus(companyId: number): CrawlStatusRecord | null {
  const row = getDb()
    .prepare<[number], CrawlStatusRow>('SELECT * FROM crawl_status WHERE company_id = ?')
    .get(companyId);
  if (!row) return null;

  return {
    companyId: row.company_id,
    status: toCrawlStatus(row.status),
    successCount: row.success_count,
    failedCount: row.failed_count,
    errorLog: row.error_log,
    startedAt: row.started_at,
    finishedAt: row.finished_at,
  };
}

export function saveCrawlStatus(record: CrawlStatusRecord): void {
  getDb().prepare(`
    INSERT INTO crawl_status (company_id, status, success_count, failed_count, error_log, started_at, finished_at)
    VALUES (@companyId, @status, @successCount, @failedCount, @errorLog, @startedAt, @finishedAt)
    ON CONFLICT(company_id) DO UPDATE SET
      status = excluded.status,
      success_count = excluded.success_count,
      failed_count = excluded.failed_count,
      error_log = excluded.error_log,
      started_at = excluded.started_at,
      finished_at = excluded.finished_at
  `).run(record);
}

export const sqliteJobStore: JobStore = { insertJob };

export const sqliteDescriptionRepository: DescriptionRepository = {
  getJobsMissingDescription,
  updateJobDescription,
};

export function closeDatabase(): void {
  if (db) {
    db.close();
    db = null;
  }
}
