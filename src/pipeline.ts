/**
 * Crawl Pipeline
 *
 * For each enabled source, in configured order:
 * 1. Build the extractor for its crawler type
 * 2. Crawl the listing and its pagination
 * 3. Save incrementally and collect the new notices
 *
 * A failing source is recorded and the run moves on to the next one.
 */

import { config } from './config/index.js';
import { loadSourcesConfig } from './config/sources.js';
import {
  crawlListing,
  createDefaultRegistry,
  createHttpFetcher,
  type ExtractorRegistry,
  type FetcherFactory,
} from './scraper/index.js';
import { NoticeStore } from './storage/index.js';
import { saveMarkdownReport } from './report/index.js';
import { logger } from './utils/logger.js';
import type { CrawlRunResult, SourceConfig, SourceRunResult } from './types/index.js';

/**
 * Pipeline options
 */
export interface PipelineOptions {
  sources: SourceConfig[];
  maxPages?: number;
  pageDelayMs?: number;
  generateReport?: boolean;
  reportDir?: string;
  registry?: ExtractorRegistry;
  store?: NoticeStore;
  createFetcher?: FetcherFactory;
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Crawl, save and summarize a single source
 */
async function processSource(
  source: SourceConfig,
  deps: {
    registry: ExtractorRegistry;
    store: NoticeStore;
    createFetcher: FetcherFactory;
    maxPages: number;
    pageDelayMs: number;
  }
): Promise<SourceRunResult> {
  const result: SourceRunResult = {
    key: source.key,
    name: source.name,
    url: source.url,
    crawlerType: source.crawlerType,
    crawledCount: 0,
    newCount: 0,
    totalCount: 0,
    newItems: [],
    error: null,
  };

  if (source.configError) {
    result.error = source.configError;
    logger.error({ source: source.key, error: result.error }, 'Source processing failed');
    return result;
  }

  try {
    const extractor = deps.registry.create(source.crawlerType, source);
    const overrides = extractor.getSessionOverrides?.() ?? {};
    const fetcher = deps.createFetcher({
      ...overrides,
      ...(source.encoding ? { encoding: source.encoding } : {}),
    });

    const records = await crawlListing(fetcher, extractor, source.url, {
      maxPages: deps.maxPages,
      pageDelayMs: deps.pageDelayMs,
    });
    result.crawledCount = records.length;
    logger.info({ source: source.key, crawled: records.length }, 'Crawled source');

    if (records.length === 0) {
      logger.warn({ source: source.key }, 'No results retrieved');
      return result;
    }

    const { allItems, newItems } = await deps.store.save(
      source.url,
      records,
      source.key,
      source.name
    );
    result.newCount = newItems.length;
    result.totalCount = allItems.length;
    result.newItems = newItems;

    if (newItems.length > 0) {
      logger.info(
        {
          source: source.key,
          newCount: newItems.length,
          sample: newItems.slice(0, 5).map((item) => item.title),
        },
        'New notices found'
      );
    } else {
      logger.info({ source: source.key }, 'No new notices');
    }

    const summary = await deps.store.getSummary(source.url, source.name);
    logger.info(
      { source: source.key, total: summary.totalItems, lastUpdated: summary.lastUpdated },
      'Source summary'
    );
  } catch (error) {
    result.error = errorMessage(error);
    logger.error({ source: source.key, error: result.error }, 'Source processing failed');
  }

  return result;
}

/**
 * Run the crawl over every given source
 */
export async function runPipeline(options: PipelineOptions): Promise<CrawlRunResult> {
  const {
    sources,
    maxPages = config.crawler.defaultMaxPages,
    pageDelayMs = config.crawler.pageDelayMs,
    generateReport = true,
    reportDir = config.report.outputDir,
    registry = createDefaultRegistry(),
    store = new NoticeStore(),
    createFetcher = createHttpFetcher,
  } = options;

  const startedAt = new Date();
  const run: CrawlRunResult = {
    startedAt,
    finishedAt: startedAt,
    totalConfigs: sources.length,
    totalAllItems: 0,
    totalNewItems: 0,
    results: [],
    reportPath: null,
  };

  if (sources.length === 0) {
    logger.error('No enabled sources configured');
    return run;
  }

  logger.info(
    { count: sources.length, sources: sources.map((s) => `${s.key}: ${s.name}`) },
    'Starting crawl run'
  );

  for (const [index, source] of sources.entries()) {
    logger.info(
      {
        progress: `${index + 1}/${sources.length}`,
        key: source.key,
        name: source.name,
        crawlerType: source.crawlerType,
        url: source.url,
      },
      'Processing source'
    );

    const result = await processSource(source, {
      registry,
      store,
      createFetcher,
      maxPages,
      pageDelayMs,
    });

    run.totalAllItems += result.totalCount;
    run.totalNewItems += result.newCount;
    run.results.push(result);
  }

  run.finishedAt = new Date();

  logger.info(
    {
      configs: run.totalConfigs,
      totalItems: run.totalAllItems,
      newItems: run.totalNewItems,
      failed: run.results.filter((r) => r.error).map((r) => ({ key: r.key, error: r.error })),
      finishedAt: run.finishedAt.toISOString(),
    },
    'Crawl run complete'
  );

  for (const summary of await store.getAllSummaries()) {
    logger.info(
      {
        key: summary.sourceKey,
        name: summary.sourceName,
        total: summary.totalItems,
        lastUpdated: summary.lastUpdated,
      },
      'Stored source'
    );
  }

  if (generateReport) {
    run.reportPath = await saveMarkdownReport(run, reportDir);
  }

  return run;
}

/**
 * Load the sources file and run the pipeline; null when the file cannot be used
 */
export async function runFromConfigFile(
  options: Omit<PipelineOptions, 'sources' | 'maxPages'> & { configPath?: string } = {}
): Promise<CrawlRunResult | null> {
  const { configPath = config.sources.configPath, ...rest } = options;

  const sourcesConfig = await loadSourcesConfig(configPath);
  if (!sourcesConfig) {
    logger.error({ configPath }, 'Cannot load sources config, aborting');
    return null;
  }

  return runPipeline({
    ...rest,
    sources: sourcesConfig.sources,
    maxPages: config.crawler.maxPagesOverride ?? sourcesConfig.settings.maxPages,
  });
}
