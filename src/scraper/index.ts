/**
 * Scraper Module
 *
 * Fetcher, pagination loop and the per-site extractors
 */

export { HttpFetcher, createHttpFetcher, DEFAULT_HEADERS, type HttpFetcherOptions } from './fetcher.js';
export { crawlListing, type CrawlOptions } from './crawler.js';
export {
  ExtractorRegistry,
  UnsupportedCrawlerTypeError,
  createDefaultRegistry,
  type ExtractorInfo,
} from './registry.js';
export { SichuanFgwExtractor, SICHUAN_FGW_TYPE } from './extractors/sichuan-fgw.js';
export {
  GenericListingExtractor,
  GENERIC_LISTING_TYPE,
  createGenericListingExtractor,
} from './extractors/generic-listing.js';

export type {
  Extractor,
  ExtractorFactory,
  FetcherFactory,
  LinkFilterRules,
  PageDocument,
  PageFetcher,
  SessionConfig,
} from './types.js';
