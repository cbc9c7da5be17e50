import * as cheerio from 'cheerio';
import { describe, expect, it } from 'vitest';
import { SichuanFgwExtractor } from '../extractors/sichuan-fgw.js';

const extractor = new SichuanFgwExtractor();

describe('SichuanFgwExtractor.extract', () => {
  it('reads .wordGuide results in document order', () => {
    const $ = cheerio.load(`
      <div class="wordGuide"><div class="bigTit"><a href="/sfgw/c106035/2024/5/1/a1.shtml" title="关于开展2024年价格监督检查的通知">短标题</a></div></div>
      <div class="wordGuide"><div class="bigTit"><a href="https://fgw.sc.gov.cn/sfgw/c106035/2024/5/2/a2.shtml">关于<em>监督</em>信息公开的公告</a></div></div>
    `);

    expect(extractor.extract($)).toEqual([
      {
        title: '关于开展2024年价格监督检查的通知',
        url: 'https://fgw.sc.gov.cn/sfgw/c106035/2024/5/1/a1.shtml',
      },
      {
        title: '关于监督信息公开的公告',
        url: 'https://fgw.sc.gov.cn/sfgw/c106035/2024/5/2/a2.shtml',
      },
    ]);
  });

  it('keeps the rest of the page when one href is malformed', () => {
    const $ = cheerio.load(`
      <div class="wordGuide"><div class="bigTit"><a href="/x/1.shtml">关于价格监督检查的通知</a></div></div>
      <div class="wordGuide"><div class="bigTit"><a href="//">空地址链接</a></div></div>
      <div class="wordGuide"><div class="bigTit"><a href="/x/通知2.shtml">关于监督信息公开的公告</a></div></div>
    `);

    expect(extractor.extract($)).toEqual([
      { title: '关于价格监督检查的通知', url: 'https://fgw.sc.gov.cn/x/1.shtml' },
      { title: '空地址链接', url: 'https://fgw.sc.gov.cn' },
      { title: '关于监督信息公开的公告', url: 'https://fgw.sc.gov.cn/x/通知2.shtml' },
    ]);
  });

  it('strips markup left inside title attributes', () => {
    const $ = cheerio.load(
      `<div class="wordGuide"><div class="bigTit"><a href="/x/1.shtml" title="&lt;font color=red&gt;监督&lt;/font&gt;检查结果公示">x</a></div></div>`
    );

    expect(extractor.extract($)).toEqual([
      { title: '监督检查结果公示', url: 'https://fgw.sc.gov.cn/x/1.shtml' },
    ]);
  });

  it('collapses identical title and url pairs within a page', () => {
    const item = `<div class="wordGuide"><div class="bigTit"><a href="/x/1.shtml">四川省发展和改革委员会监督公告</a></div></div>`;
    const $ = cheerio.load(item + item);

    expect(extractor.extract($)).toHaveLength(1);
  });

  it('keeps same url with different titles as separate records', () => {
    const $ = cheerio.load(`
      <div class="wordGuide"><div class="bigTit"><a href="/x/1.shtml">四川省发展和改革委员会监督公告</a></div></div>
      <div class="wordGuide"><div class="bigTit"><a href="/x/1.shtml">四川省发展和改革委员会监督公告（更正）</a></div></div>
    `);

    expect(extractor.extract($).map((r) => r.title)).toEqual([
      '四川省发展和改革委员会监督公告',
      '四川省发展和改革委员会监督公告（更正）',
    ]);
  });

  it('falls back to a filtered scan of all links without result containers', () => {
    const $ = cheerio.load(`
      <a href="/index.shtml">首页</a>
      <a href="/list.shtml">返回上一级栏目列表页面入口</a>
      <a href="javascript:void(0)">关于印发监督管理办法的通知全文</a>
      <a href="/x/detail?id=9">关于印发监督管理办法的通知全文</a>
      <a href="/x/2.shtml#top">关于公布第二批监督检查结果的通告</a>
      <a href="/x/3.shtml">太短的标题</a>
      <a href="/x/4.htm">关于调整部分价格监督事项的说明</a>
      <a href="https://www.sc.gov.cn/x/5.shtml">关于公布第三批监督检查结果的通告</a>
    `);

    expect(extractor.extract($)).toEqual([
      { title: '关于印发监督管理办法的通知全文', url: 'https://fgw.sc.gov.cn/x/detail?id=9' },
      { title: '关于公布第三批监督检查结果的通告', url: 'https://www.sc.gov.cn/x/5.shtml' },
    ]);
  });

  it('returns nothing for a page without matching links', () => {
    expect(extractor.extract(cheerio.load('<p>暂无数据</p>'))).toEqual([]);
  });
});

describe('SichuanFgwExtractor.buildNextPageUrl', () => {
  it('replaces an existing pageNum parameter', () => {
    expect(
      extractor.buildNextPageUrl('https://fgw.sc.gov.cn/search.shtml?keyword=jd&pageNum=1', 3)
    ).toBe('https://fgw.sc.gov.cn/search.shtml?keyword=jd&pageNum=3');
  });

  it('appends pageNum with & when a query exists', () => {
    expect(extractor.buildNextPageUrl('https://fgw.sc.gov.cn/search.shtml?keyword=jd', 2)).toBe(
      'https://fgw.sc.gov.cn/search.shtml?keyword=jd&pageNum=2'
    );
  });

  it('appends pageNum with ? when there is no query', () => {
    expect(extractor.buildNextPageUrl('https://fgw.sc.gov.cn/search.shtml', 1)).toBe(
      'https://fgw.sc.gov.cn/search.shtml?pageNum=1'
    );
  });
});
