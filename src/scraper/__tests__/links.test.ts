import { describe, expect, it } from 'vitest';
import {
  cleanTitle,
  deduplicateRecords,
  isValidResultLink,
  normalizeUrl,
  withPageParam,
} from '../extractors/links.js';

describe('normalizeUrl', () => {
  it('resolves root-relative and relative hrefs against the base', () => {
    expect(normalizeUrl('/a/b.shtml', 'https://fgw.sc.gov.cn')).toBe('https://fgw.sc.gov.cn/a/b.shtml');
    expect(normalizeUrl('c/d.html', 'https://fgw.sc.gov.cn')).toBe('https://fgw.sc.gov.cn/c/d.html');
  });

  it('keeps non-ASCII paths as written', () => {
    expect(normalizeUrl('/a/通知.shtml', 'https://fgw.sc.gov.cn')).toBe('https://fgw.sc.gov.cn/a/通知.shtml');
    expect(normalizeUrl('/search?keyword=监督', 'https://fgw.sc.gov.cn')).toBe(
      'https://fgw.sc.gov.cn/search?keyword=监督'
    );
  });

  it('resolves dot segments, query-only and protocol-relative hrefs', () => {
    const base = 'https://x.gov.cn/a/list/index.html?page=1';
    expect(normalizeUrl('../b/c.html', base)).toBe('https://x.gov.cn/a/b/c.html');
    expect(normalizeUrl('./d.html', base)).toBe('https://x.gov.cn/a/list/d.html');
    expect(normalizeUrl('?page=2', base)).toBe('https://x.gov.cn/a/list/index.html?page=2');
    expect(normalizeUrl('//cdn.gov.cn/x.shtml', base)).toBe('https://cdn.gov.cn/x.shtml');
  });

  it('never throws on malformed hrefs', () => {
    expect(normalizeUrl('//', 'https://fgw.sc.gov.cn')).toBe('https://fgw.sc.gov.cn');
    expect(normalizeUrl('// bad host/x', 'https://fgw.sc.gov.cn')).toBe('https:// bad host/x');
    expect(normalizeUrl('javascript:void(0)', 'https://fgw.sc.gov.cn')).toBe('javascript:void(0)');
  });

  it('passes absolute links through unchanged', () => {
    expect(normalizeUrl('http://other.gov.cn/X?id=1', 'https://fgw.sc.gov.cn')).toBe(
      'http://other.gov.cn/X?id=1'
    );
  });
});

describe('cleanTitle', () => {
  it('removes tags and surrounding whitespace', () => {
    expect(cleanTitle('  <b>重要</b>通知 ')).toBe('重要通知');
  });
});

describe('isValidResultLink', () => {
  const rules = {
    minTitleLength: 4,
    blockedHrefParts: ['javascript'],
    blockedTitleParts: ['更多'],
    contentHrefParts: ['.shtml'],
  };

  it('applies length, blacklist and content rules', () => {
    expect(isValidResultLink('关于通知事项', '/a.shtml', rules)).toBe(true);
    expect(isValidResultLink('通知', '/a.shtml', rules)).toBe(false);
    expect(isValidResultLink('关于通知事项', 'JavaScript:go(1).shtml', rules)).toBe(false);
    expect(isValidResultLink('查看更多通知', '/a.shtml', rules)).toBe(false);
    expect(isValidResultLink('关于通知事项', '/a.html', rules)).toBe(false);
  });

  it('counts title length in characters, not UTF-16 units', () => {
    expect(isValidResultLink('𠮷𠮷𠮷', '/a.shtml', rules)).toBe(false);
    expect(isValidResultLink('𠮷𠮷𠮷𠮷', '/a.shtml', rules)).toBe(true);
  });
});

describe('deduplicateRecords', () => {
  it('keeps the first of identical pairs in order', () => {
    const a = { title: 'A', url: 'u1' };
    const b = { title: 'B', url: 'u1' };
    expect(deduplicateRecords([a, b, { ...a }, b])).toEqual([a, b]);
  });
});

describe('withPageParam', () => {
  it('replaces every occurrence of the parameter', () => {
    expect(withPageParam('https://x.gov.cn/s?pageNum=1&q=a&pageNum=1', 'pageNum', 7)).toBe(
      'https://x.gov.cn/s?pageNum=7&q=a&pageNum=7'
    );
  });

  it('does not match a parameter that only ends with the name', () => {
    expect(withPageParam('https://x.gov.cn/s?ap=3', 'p', 2)).toBe('https://x.gov.cn/s?ap=3&p=2');
  });
});
