import * as cheerio from 'cheerio';
import { mkdtemp, readdir, rm } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { runPipeline } from '../pipeline.js';
import { ExtractorRegistry } from '../scraper/registry.js';
import type { Extractor, FetcherFactory, PageFetcher } from '../scraper/types.js';
import { NoticeStore } from '../storage/store.js';
import type { NoticeRecord, SourceConfig } from '../types/index.js';

/**
 * Extractor reading `<li data-url>` items, paginating with `?page=N`
 */
const listExtractor: Extractor = {
  extract: ($) =>
    $('li')
      .toArray()
      .map((el) => ({ title: $(el).text(), url: $(el).attr('data-url') ?? '' })),
  buildNextPageUrl: (baseUrl, pageIndex) => `${baseUrl}?page=${pageIndex}`,
  getBaseUrl: () => 'https://a.gov.cn',
  getCrawlerName: () => 'list',
};

function page(records: NoticeRecord[]): string {
  return `<ul>${records.map((r) => `<li data-url="${r.url}">${r.title}</li>`).join('')}</ul>`;
}

function fetcherFactory(pages: Record<string, string>) {
  const requested: string[] = [];
  const fetcher: PageFetcher = {
    async fetchPage(url) {
      requested.push(url);
      const body = pages[url];
      return body === undefined ? null : cheerio.load(body);
    },
  };
  const createFetcher = vi.fn<FetcherFactory>(() => fetcher);
  return { createFetcher, requested };
}

function source(overrides: Partial<SourceConfig> & Pick<SourceConfig, 'key'>): SourceConfig {
  return {
    name: overrides.key,
    url: `https://${overrides.key}.gov.cn/list`,
    description: '',
    crawlerType: 'list',
    ...overrides,
  };
}

describe('runPipeline', () => {
  let dataDir: string;
  let store: NoticeStore;
  let registry: ExtractorRegistry;

  beforeEach(async () => {
    dataDir = await mkdtemp(join(tmpdir(), 'pipeline-'));
    store = new NoticeStore({ dataDir });
    registry = new ExtractorRegistry().register('list', () => listExtractor);
  });

  afterEach(async () => {
    await rm(dataDir, { recursive: true, force: true });
  });

  it('does no network or store work without sources', async () => {
    const { createFetcher } = fetcherFactory({});

    const run = await runPipeline({
      sources: [],
      registry,
      store,
      createFetcher,
      generateReport: false,
    });

    expect(run.totalConfigs).toBe(0);
    expect(run.results).toEqual([]);
    expect(createFetcher).not.toHaveBeenCalled();
    await expect(readdir(dataDir)).resolves.toEqual([]);
  });

  it('records an unsupported crawler type and carries on with the next source', async () => {
    const { createFetcher, requested } = fetcherFactory({
      'https://good.gov.cn/list': page([{ title: '通知一', url: 'https://good.gov.cn/1' }]),
    });

    const run = await runPipeline({
      sources: [source({ key: 'odd', crawlerType: 'unknown_site' }), source({ key: 'good' })],
      registry,
      store,
      createFetcher,
      maxPages: 1,
      pageDelayMs: 0,
      generateReport: false,
    });

    expect(run.results.map((r) => [r.key, r.error])).toEqual([
      ['odd', 'unsupported crawler type: unknown_site, available: [list]'],
      ['good', null],
    ]);
    expect(createFetcher).toHaveBeenCalledTimes(1);
    expect(requested).toEqual(['https://good.gov.cn/list']);
  });

  it('records an invalid source entry without fetching it', async () => {
    const { createFetcher, requested } = fetcherFactory({
      'https://good.gov.cn/list': page([{ title: '通知一', url: 'https://good.gov.cn/1' }]),
    });

    const run = await runPipeline({
      sources: [
        source({ key: 'broken', url: '', configError: 'invalid source config: url: Invalid url' }),
        source({ key: 'good' }),
      ],
      registry,
      store,
      createFetcher,
      maxPages: 1,
      pageDelayMs: 0,
      generateReport: false,
    });

    expect(run.results.map((r) => [r.key, r.error])).toEqual([
      ['broken', 'invalid source config: url: Invalid url'],
      ['good', null],
    ]);
    expect(requested).toEqual(['https://good.gov.cn/list']);
  });

  it('isolates an exception thrown while crawling one source', async () => {
    const failing: Extractor = {
      ...listExtractor,
      extract: () => {
        throw new Error('selector exploded');
      },
    };
    registry.register('failing', () => failing);
    const { createFetcher } = fetcherFactory({
      'https://bad.gov.cn/list': '<ul></ul>',
      'https://good.gov.cn/list': page([{ title: '通知一', url: 'https://good.gov.cn/1' }]),
    });

    const run = await runPipeline({
      sources: [source({ key: 'bad', crawlerType: 'failing' }), source({ key: 'good' })],
      registry,
      store,
      createFetcher,
      maxPages: 1,
      pageDelayMs: 0,
      generateReport: false,
    });

    expect(run.results[0]?.error).toBe('selector exploded');
    expect(run.results[1]).toMatchObject({ key: 'good', newCount: 1, totalCount: 1, error: null });
  });

  it('aggregates totals across runs and reports only new items', async () => {
    const { createFetcher } = fetcherFactory({
      'https://a.gov.cn/list': page([
        { title: 'A1', url: 'https://a.gov.cn/1' },
        { title: 'A2', url: 'https://a.gov.cn/2' },
      ]),
      'https://a.gov.cn/list?page=1': page([{ title: 'A3', url: 'https://a.gov.cn/3' }]),
      'https://b.gov.cn/list': page([{ title: 'B1', url: 'https://b.gov.cn/1' }]),
    });
    const sources = [source({ key: 'a', name: '来源A' }), source({ key: 'b', name: '来源B' })];
    const options = { sources, registry, store, createFetcher, maxPages: 5, pageDelayMs: 0, generateReport: false };

    const first = await runPipeline(options);

    expect(first.totalAllItems).toBe(4);
    expect(first.totalNewItems).toBe(4);
    expect(first.results.map((r) => [r.key, r.crawledCount, r.newCount, r.totalCount])).toEqual([
      ['a', 3, 3, 3],
      ['b', 1, 1, 1],
    ]);

    const second = await runPipeline(options);

    expect(second.totalAllItems).toBe(4);
    expect(second.totalNewItems).toBe(0);
    expect(second.results.every((r) => r.newItems.length === 0)).toBe(true);
  });

  it('does not save a source whose crawl returned nothing', async () => {
    const { createFetcher } = fetcherFactory({});

    const run = await runPipeline({
      sources: [source({ key: 'down' })],
      registry,
      store,
      createFetcher,
      pageDelayMs: 0,
      generateReport: false,
    });

    expect(run.results[0]).toMatchObject({ crawledCount: 0, newCount: 0, totalCount: 0, error: null });
    await expect(readdir(dataDir)).resolves.toEqual([]);
  });

  it('passes extractor session overrides and the source encoding to the fetcher', async () => {
    const withReferer: Extractor = {
      ...listExtractor,
      getSessionOverrides: () => ({ headers: { Referer: 'https://a.gov.cn' }, encoding: 'utf-8' }),
    };
    registry.register('referer', () => withReferer);
    const { createFetcher } = fetcherFactory({});

    await runPipeline({
      sources: [source({ key: 'gbk', crawlerType: 'referer', encoding: 'gbk' })],
      registry,
      store,
      createFetcher,
      pageDelayMs: 0,
      generateReport: false,
    });

    expect(createFetcher).toHaveBeenCalledWith({
      headers: { Referer: 'https://a.gov.cn' },
      encoding: 'gbk',
    });
  });

  it('writes a markdown report when asked', async () => {
    const reportDir = join(dataDir, 'reports');
    const { createFetcher } = fetcherFactory({
      'https://a.gov.cn/list': page([{ title: 'A1', url: 'https://a.gov.cn/1' }]),
    });

    const run = await runPipeline({
      sources: [source({ key: 'a' })],
      registry,
      store,
      createFetcher,
      maxPages: 1,
      pageDelayMs: 0,
      generateReport: true,
      reportDir,
    });

    expect(run.reportPath).not.toBeNull();
    await expect(readdir(reportDir)).resolves.toHaveLength(1);
  });
});
