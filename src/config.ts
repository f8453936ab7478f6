import * as path from 'path';
import * as fs from 'fs';
import * as dotenv from 'dotenv';
import { z } from 'zod';
import { ConfigError } from './crawl/errors';

dotenv.config();

const DEFAULT_USER_AGENT =
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36';

const crawlSettingsSchema = z.object({
  cronExpression: z.string().default('0 */6 * * *'),
  concurrency: z.number().int().min(1).max(16).default(4),
  fetchTimeoutMs: z.number().int().positive().default(15000),
  maxErrorLogLength: z.number().int().positive().default(2000),
  userAgent: z.string().min(1).default(DEFAULT_USER_AGENT),
  descriptionElementId: z.string().min(1).default('js-job-description'),
  callDescriptionOnly: z.boolean().default(false),
});

const companyConfigSchema = z.object({
  id: z.number().int().positive(),
  name: z.string().min(1),
  url: z.string().url(),
  resource: z.string().min(1),
  outputTable: z.string().min(1).default('jobs'),
  enabled: z.boolean().default(true),
});

const appConfigSchema = z.object({
  crawl: crawlSettingsSchema.default({}),
  companies: z.array(companyConfigSchema),
  excludedUrlIds: z.array(z.number().int()).default([]),
});

export type CrawlSettings = z.infer<typeof crawlSettingsSchema>;
export type CompanyConfig = z.infer<typeof companyConfigSchema>;
export type AppConfig = z.infer<typeof appConfigSchema>;

export function getConfigPath(): string {
  return path.resolve(process.cwd(), process.env.CONFIG_PATH || 'config.json');
}

export function parseConfig(raw: string): AppConfig {
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (err) {
    throw new ConfigError(`config.json is not valid JSON: ${err instanceof Error ? err.message : String(err)}`);
  }

  const result = appConfigSchema.safeParse(json);
  if (!result.success) {
    const issues = result.error.issues
      .map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new ConfigError(`Invalid config.json: ${issues}`);
  }
  return result.data;
}

function loadConfigFromDisk(): AppConfig {
  const configPath = getConfigPath();
  if (!fs.existsSync(configPath)) {
    throw new ConfigError(`config.json not found at ${configPath}`);
  }
  return parseConfig(fs.readFileSync(configPath, 'utf-8'));
}

let currentConfig: AppConfig | null = null;

export function getConfig(): AppConfig {
  if (!currentConfig) {
    currentConfig = loadConfigFromDisk();
  }
  return currentConfig;
}

/** Re-reads the config file. On error the previous config stays in effect. */
export function reloadConfig(): AppConfig {
  currentConfig = loadConfigFromDisk();
  return currentConfig;
}

export function getDatabasePath(): string {
  return path.resolve(process.cwd(), process.env.DATABASE_PATH || 'jobs.db');
}
