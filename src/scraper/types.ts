/**
 * Scraper Types
 */

import type { CheerioAPI } from 'cheerio';
import type { NoticeRecord, SourceConfig } from '../types/index.js';

/**
 * Parsed listing page handed to extractors
 */
export type PageDocument = CheerioAPI;

/**
 * HTTP session settings shared by every request of one fetcher.
 * Fixed at construction.
 */
export interface SessionConfig {
  headers: Record<string, string>;
  timeoutMs: number;
  /** Label understood by TextDecoder, e.g. 'utf-8' or 'gbk' */
  encoding: string;
}

/**
 * Fetches a listing page, or null once retries are exhausted
 */
export interface PageFetcher {
  fetchPage(url: string): Promise<PageDocument | null>;
}

export type FetcherFactory = (session: Partial<SessionConfig>) => PageFetcher;

/**
 * Site-specific extraction strategy
 */
export interface Extractor {
  /**
   * Records in document order, deduplicated by (title, url)
   */
  extract(page: PageDocument): NoticeRecord[];

  /**
   * Address of page `pageIndex` (0-based) derived from the first page's address,
   * or null when there is no further page
   */
  buildNextPageUrl(baseUrl: string, pageIndex: number): string | null;

  /**
   * Origin used to resolve relative links
   */
  getBaseUrl(): string;

  getCrawlerName(): string;

  /**
   * Session settings this site needs on top of the defaults
   */
  getSessionOverrides?(): Partial<SessionConfig>;
}

export type ExtractorFactory = (source: SourceConfig) => Extractor;

/**
 * Acceptance rules for a candidate (title, href) pair
 */
export interface LinkFilterRules {
  minTitleLength: number;
  blockedHrefParts: readonly string[];
  blockedTitleParts: readonly string[];
  contentHrefParts: readonly string[];
}
