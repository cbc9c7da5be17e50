/**
 * Generic listing layout
 *
 * For portals built on the common CMS templates: result rows in `.result-item`,
 * `.search-result` or `.content-item` containers, `page=` or `p=` pagination.
 * Relative links resolve against the origin of the configured listing URL.
 */

import { logger } from '../../utils/logger.js';
import type { NoticeRecord, SourceConfig } from '../../types/index.js';
import type { Extractor, LinkFilterRules, PageDocument, SessionConfig } from '../types.js';
import {
  cleanTitle,
  deduplicateRecords,
  isValidResultLink,
  normalizeUrl,
  scanAllLinks,
  withPageParam,
} from './links.js';

export const GENERIC_LISTING_TYPE = 'generic_listing';

const CONTAINER_SELECTOR = '.result-item, .search-result, .content-item';

const LINK_RULES: LinkFilterRules = {
  minTitleLength: 5,
  blockedHrefParts: ['javascript', '#', 'mailto'],
  blockedTitleParts: ['首页', '返回', '上一页', '下一页', '更多', '导航'],
  contentHrefParts: ['/article/', '/news/', '/detail/', '.html'],
};

export class GenericListingExtractor implements Extractor {
  private readonly baseUrl: string;

  constructor(listingUrl: string) {
    this.baseUrl = new URL(listingUrl).origin;
  }

  getBaseUrl(): string {
    return this.baseUrl;
  }

  getCrawlerName(): string {
    return GENERIC_LISTING_TYPE;
  }

  getSessionOverrides(): Partial<SessionConfig> {
    return { headers: { Referer: this.baseUrl } };
  }

  extract($: PageDocument): NoticeRecord[] {
    let results: NoticeRecord[] = [];

    const containers = $(CONTAINER_SELECTOR);
    if (containers.length > 0) {
      logger.debug({ count: containers.length }, 'Found result containers');

      containers.each((_, container) => {
        const link = $(container).find('a[href]').first();
        if (link.length === 0) {
          return;
        }

        const href = link.attr('href') ?? '';
        const title = cleanTitle(link.attr('title') || link.text().trim());

        if (isValidResultLink(title, href, LINK_RULES)) {
          results.push({ title, url: normalizeUrl(href, this.baseUrl) });
        }
      });
    }

    if (results.length === 0) {
      logger.debug('No result containers matched, scanning all links');
      results = scanAllLinks($, this.baseUrl, LINK_RULES);
    }

    return deduplicateRecords(results);
  }

  buildNextPageUrl(baseUrl: string, pageIndex: number): string | null {
    if (/[?&]page=\d+/.test(baseUrl)) {
      return withPageParam(baseUrl, 'page', pageIndex);
    }
    if (/[?&]p=\d+/.test(baseUrl)) {
      return withPageParam(baseUrl, 'p', pageIndex);
    }
    return withPageParam(baseUrl, 'page', pageIndex);
  }
}

export function createGenericListingExtractor(source: SourceConfig): GenericListingExtractor {
  return new GenericListingExtractor(source.url);
}
