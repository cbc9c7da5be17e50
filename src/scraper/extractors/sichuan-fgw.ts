/**
 * Sichuan Development and Reform Commission (fgw.sc.gov.cn)
 *
 * Search result pages list each hit in a `.wordGuide` block whose `.bigTit a`
 * carries the notice link. Pages are addressed with a `pageNum` query parameter.
 */

import { logger } from '../../utils/logger.js';
import type { NoticeRecord } from '../../types/index.js';
import type { Extractor, LinkFilterRules, PageDocument } from '../types.js';
import {
  cleanTitle,
  deduplicateRecords,
  normalizeUrl,
  scanAllLinks,
  withPageParam,
} from './links.js';

export const SICHUAN_FGW_TYPE = 'sichuan_fgw';

const BASE_URL = 'https://fgw.sc.gov.cn';

const LINK_RULES: LinkFilterRules = {
  minTitleLength: 10,
  blockedHrefParts: ['javascript', '#', 'mailto'],
  blockedTitleParts: ['首页', '返回', '上一页', '下一页', '更多', '导航', '搜索'],
  contentHrefParts: ['.shtml', 'detail'],
};

export class SichuanFgwExtractor implements Extractor {
  getBaseUrl(): string {
    return BASE_URL;
  }

  getCrawlerName(): string {
    return SICHUAN_FGW_TYPE;
  }

  extract($: PageDocument): NoticeRecord[] {
    let results: NoticeRecord[] = [];

    const items = $('.wordGuide');
    if (items.length > 0) {
      logger.debug({ count: items.length }, 'Found search result items');

      items.each((_, item) => {
        const link = $(item).find('.bigTit a').first();
        if (link.length === 0) {
          return;
        }

        const href = link.attr('href') ?? '';
        const title = cleanTitle(link.attr('title') || link.text().trim());

        if (title && href) {
          results.push({ title, url: normalizeUrl(href, BASE_URL) });
        }
      });
    }

    if (results.length === 0) {
      logger.debug('No .wordGuide results, scanning all links');
      results = scanAllLinks($, BASE_URL, LINK_RULES);
    }

    const unique = deduplicateRecords(results);
    logger.debug({ count: unique.length }, 'Extracted unique results');
    return unique;
  }

  buildNextPageUrl(baseUrl: string, pageIndex: number): string | null {
    return withPageParam(baseUrl, 'pageNum', pageIndex);
  }
}
