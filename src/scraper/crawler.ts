/**
 * Paginated listing crawl for one source
 */

import { config } from '../config/index.js';
import { logger } from '../utils/logger.js';
import { sleep } from '../utils/retry.js';
import type { NoticeRecord } from '../types/index.js';
import type { Extractor, PageFetcher } from './types.js';

export interface CrawlOptions {
  maxPages?: number;
  /** Pause between successive page fetches */
  pageDelayMs?: number;
}

/**
 * Fetch the start page and follow pagination until the extractor has no next
 * address, a fetch fails, a page yields nothing, or `maxPages` pages were read.
 *
 * Results keep page order then document order. Deduplication across pages is
 * left to the store.
 */
export async function crawlListing(
  fetcher: PageFetcher,
  extractor: Extractor,
  startUrl: string,
  options: CrawlOptions = {}
): Promise<NoticeRecord[]> {
  const { maxPages = config.crawler.defaultMaxPages, pageDelayMs = config.crawler.pageDelayMs } =
    options;

  logger.info({ url: startUrl, maxPages }, 'Starting crawl');

  const firstPage = await fetcher.fetchPage(startUrl);
  if (!firstPage) {
    logger.warn({ url: startUrl }, 'Start page unavailable, nothing crawled');
    return [];
  }

  const results = [...extractor.extract(firstPage)];
  let pagesRead = 1;

  for (let pageIndex = 1; pageIndex < maxPages; pageIndex++) {
    const nextUrl = extractor.buildNextPageUrl(startUrl, pageIndex);
    if (!nextUrl) {
      break;
    }

    await sleep(pageDelayMs);

    logger.info({ url: nextUrl, page: pageIndex + 1 }, 'Fetching next page');
    const page = await fetcher.fetchPage(nextUrl);
    if (!page) {
      logger.warn({ url: nextUrl, page: pageIndex + 1 }, 'Page fetch failed, stopping pagination');
      break;
    }

    const pageResults = extractor.extract(page);
    if (pageResults.length === 0) {
      logger.debug({ page: pageIndex + 1 }, 'Empty page, end of results');
      break;
    }

    results.push(...pageResults);
    pagesRead++;
  }

  logger.info({ url: startUrl, pagesRead, found: results.length }, 'Crawl completed');
  return results;
}
