#!/usr/bin/env node
/**
 * Government Notice Watch
 *
 * Crawls configured notice listings and keeps an incremental record of what
 * each source has published.
 *
 * Usage:
 *   node dist/src/index.js                         - Crawl all enabled sources once
 *   node dist/src/index.js --mode crawl --no-report
 *   node dist/src/index.js --mode status           - Show stored sources (-m status also works)
 *   node dist/src/index.js --mode export --index 1 [--out export_1.csv]
 *   node dist/src/index.js --service               - Crawl now, then on CRON_SCHEDULE
 */

import { parseCliArgs, type CliOptions } from './args.js';
import { config } from './config/index.js';
import { runFromConfigFile } from './pipeline.js';
import { runService } from './scheduler.js';
import { NoticeStore } from './storage/index.js';
import { logger } from './utils/logger.js';

async function crawl(options: CliOptions): Promise<boolean> {
  const result = await runFromConfigFile({ generateReport: options.report });
  if (!result) {
    return false;
  }

  logger.info('');
  logger.info('Crawl Complete:');
  logger.info(`  ✓ Sources:   ${result.totalConfigs}`);
  logger.info(`  ✓ Total:     ${result.totalAllItems} items`);
  logger.info(`  ✓ New:       ${result.totalNewItems} items`);
  for (const failed of result.results.filter((r) => r.error)) {
    logger.info(`  ⚠ ${failed.key}: ${failed.error}`);
  }
  if (result.reportPath) {
    logger.info(`  ✎ Report:    ${result.reportPath}`);
  }
  return result.totalConfigs > 0;
}

async function showStatus(store: NoticeStore): Promise<void> {
  const summaries = await store.getAllSummaries();
  if (summaries.length === 0) {
    logger.info('No stored sources found');
    return;
  }

  logger.info('=== Stored sources ===');
  summaries.forEach((summary, index) => {
    logger.info(`${index + 1}. [${summary.sourceKey ?? '-'}] ${summary.sourceName ?? summary.url}`);
    logger.info(`   URL: ${summary.url}`);
    logger.info(`   Total: ${summary.totalItems} items`);
    logger.info(`   Last updated: ${summary.lastUpdated ?? 'never'}`);
  });
}

async function exportData(store: NoticeStore, options: CliOptions): Promise<boolean> {
  const summaries = await store.getAllSummaries();
  if (summaries.length === 0) {
    logger.info('No stored sources found');
    return false;
  }

  const index = parseInt(options.index ?? '', 10);
  const summary = summaries[index - 1];
  if (isNaN(index) || !summary) {
    logger.error({ index: options.index, available: summaries.length }, 'Pass --index N from the status listing');
    return false;
  }

  const outputPath = options.out ?? `export_${index}.csv`;
  const count = await store.exportCsv(summary.url, outputPath, summary.sourceName);
  logger.info({ outputPath, count }, 'Export complete');
  return true;
}

async function main(): Promise<void> {
  const options = parseCliArgs(process.argv.slice(2));
  logger.info({ env: config.app.env, version: config.app.version }, 'Government notice watch');

  if (options.service) {
    await runService();
    return;
  }

  const store = new NoticeStore();
  let ok = true;

  switch (options.mode) {
    case 'crawl':
      ok = await crawl(options);
      break;
    case 'status':
      await showStatus(store);
      break;
    case 'export':
      ok = await exportData(store, options);
      break;
  }

  if (!ok) {
    process.exitCode = 1;
  }
}

main().catch((error: unknown) => {
  logger.fatal({ err: error }, 'Application failed');
  process.exit(1);
});
