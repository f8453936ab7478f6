import { initDatabase, closeDatabase } from './db/database';
import { startScheduler, stopScheduler, runCrawlCycle, formatReport } from './scheduler';
import { createLogger } from './logger';

const log = createLogger('Main');

function parseCompanyId(args: string[]): number | undefined {
  const flag = args.find(arg => arg.startsWith('--company='));
  if (!flag) return undefined;
  const id = Number(flag.slice('--company='.length));
  if (!Number.isInteger(id) || id <= 0) {
    throw new Error(`Invalid --company value: ${flag}`);
  }
  return id;
}

async function main(): Promise<void> {
  const args = process.argv.slice(2);
  log.info('Career site crawler starting...');

  initDatabase();

  if (args.includes('--once')) {
    const report = await runCrawlCycle({
      companyId: parseCompanyId(args),
      callDescriptionOnly: args.includes('--descriptions-only') || undefined,
    });
    console.log(formatReport(report));
    closeDatabase();
    return;
  }

  if (!startScheduler()) {
    closeDatabase();
    process.exitCode = 1;
    return;
  }

  const shutdown = () => {
    log.info('Shutting down...');
    stopScheduler();
    closeDatabase();
    process.exit(0);
  };

  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);
}

main().catch((err) => {
  log.error('Fatal error', err);
  closeDatabase();
  process.exit(1);
});
