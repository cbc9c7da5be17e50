/**
 * HTTP Page Fetcher
 *
 * Single GET with retry/backoff, decoded and parsed with cheerio.
 */

import * as cheerio from 'cheerio';
import { config } from '../config/index.js';
import { logger } from '../utils/logger.js';
import { withRetry } from '../utils/retry.js';
import type { RetryConfig } from '../types/index.js';
import type { PageDocument, PageFetcher, SessionConfig } from './types.js';

export const DEFAULT_HEADERS: Readonly<Record<string, string>> = {
  'User-Agent': config.crawler.userAgent,
  Accept: 'text/html,application/xhtml+xml,application/xml;q=0.9,image/webp,*/*;q=0.8',
  'Accept-Language': 'zh-CN,zh;q=0.8,zh-TW;q=0.7,zh-HK;q=0.5,en-US;q=0.3,en;q=0.2',
  'Accept-Encoding': 'gzip, deflate',
  Connection: 'keep-alive',
  'Upgrade-Insecure-Requests': '1',
};

export interface HttpFetcherOptions {
  retry?: Partial<RetryConfig>;
  fetchImpl?: typeof fetch;
}

export class HttpFetcher implements PageFetcher {
  private readonly session: Readonly<SessionConfig>;
  private readonly retry: Partial<RetryConfig>;
  private readonly fetchImpl: typeof fetch;

  constructor(session: Partial<SessionConfig> = {}, options: HttpFetcherOptions = {}) {
    this.session = Object.freeze({
      headers: Object.freeze({ ...DEFAULT_HEADERS, ...session.headers }),
      timeoutMs: session.timeoutMs ?? config.crawler.timeoutMs,
      encoding: session.encoding ?? 'utf-8',
    });
    this.retry = { ...config.retry, ...options.retry };
    this.fetchImpl = options.fetchImpl ?? fetch;
  }

  getSession(): Readonly<SessionConfig> {
    return this.session;
  }

  async fetchPage(url: string): Promise<PageDocument | null> {
    try {
      return await withRetry(() => this.fetchOnce(url), this.retry, url);
    } catch (error) {
      logger.error({ url, error: error instanceof Error ? error.message : String(error) }, 'Failed to fetch page');
      return null;
    }
  }

  private async fetchOnce(url: string): Promise<PageDocument> {
    logger.debug({ url }, 'Fetching page');

    const response = await this.fetchImpl(url, {
      method: 'GET',
      headers: this.session.headers,
      signal: AbortSignal.timeout(this.session.timeoutMs),
    });

    if (!response.ok) {
      throw new Error(`HTTP ${response.status}: ${response.statusText}`);
    }

    const body = await response.arrayBuffer();
    const html = new TextDecoder(this.session.encoding).decode(body);

    return cheerio.load(html);
  }
}

/**
 * Default fetcher factory used by the runner
 */
export function createHttpFetcher(session: Partial<SessionConfig>): PageFetcher {
  return new HttpFetcher(session);
}
