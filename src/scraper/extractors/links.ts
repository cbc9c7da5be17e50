/**
 * Link helpers shared by extractors
 */

import type { NoticeRecord } from '../../types/index.js';
import type { LinkFilterRules, PageDocument } from '../types.js';

/**
 * Strip markup that some sites leave inside title attributes
 */
export function cleanTitle(title: string): string {
  return title.replace(/<[^>]+>/g, '').trim();
}

interface UrlParts {
  scheme?: string;
  authority?: string;
  path: string;
  query?: string;
  fragment?: string;
}

const URL_PARTS = /^(?:([a-zA-Z][a-zA-Z0-9+.-]*):)?(?:\/\/([^/?#]*))?([^?#]*)(?:\?([^#]*))?(?:#([\s\S]*))?$/;

function splitUrl(value: string): UrlParts {
  const match = URL_PARTS.exec(value);
  if (!match) {
    return { path: value };
  }
  const [, scheme, authority, path = '', query, fragment] = match;
  return {
    scheme,
    // `//` with nothing after it names no host
    authority: authority || undefined,
    path,
    query,
    fragment,
  };
}

function joinUrl(parts: UrlParts): string {
  let url = parts.scheme ? `${parts.scheme}:` : '';
  if (parts.authority !== undefined) {
    url += `//${parts.authority}`;
  }
  url += parts.path;
  if (parts.query !== undefined) {
    url += `?${parts.query}`;
  }
  if (parts.fragment !== undefined) {
    url += `#${parts.fragment}`;
  }
  return url;
}

function removeDotSegments(path: string): string {
  const segments = path.split('/');
  const output: string[] = [];

  segments.forEach((segment, index) => {
    const isLast = index === segments.length - 1;
    if (segment === '.' || segment === '..') {
      if (segment === '..' && output.length > 1) {
        output.pop();
      }
      if (isLast) {
        output.push('');
      }
      return;
    }
    output.push(segment);
  });

  return output.join('/');
}

function mergePaths(base: UrlParts, path: string): string {
  if (base.authority !== undefined && base.path === '') {
    return `/${path}`;
  }
  return base.path.slice(0, base.path.lastIndexOf('/') + 1) + path;
}

/**
 * Resolve a relative href against the site origin; absolute http(s) links pass through as-is.
 *
 * Resolution works on the strings themselves: characters are kept as the page
 * wrote them (no percent-encoding) and a malformed href never throws.
 */
export function normalizeUrl(href: string, baseUrl: string): string {
  if (href.startsWith('http')) {
    return href;
  }

  const ref = splitUrl(href);
  if (ref.scheme) {
    return href;
  }

  const base = splitUrl(baseUrl);
  const resolved: UrlParts = { scheme: base.scheme, authority: base.authority, path: '', fragment: ref.fragment };

  if (ref.authority !== undefined) {
    resolved.authority = ref.authority;
    resolved.path = removeDotSegments(ref.path);
    resolved.query = ref.query;
  } else if (ref.path === '') {
    resolved.path = base.path;
    resolved.query = ref.query ?? base.query;
  } else {
    const path = ref.path.startsWith('/') ? ref.path : mergePaths(base, ref.path);
    resolved.path = removeDotSegments(path);
    resolved.query = ref.query;
  }

  return joinUrl(resolved);
}

export function isValidResultLink(title: string, href: string, rules: LinkFilterRules): boolean {
  // Length in code points, so characters outside the BMP count once
  if (!title || [...title].length < rules.minTitleLength) {
    return false;
  }

  const lowerHref = href.toLowerCase();
  if (rules.blockedHrefParts.some((part) => lowerHref.includes(part))) {
    return false;
  }

  if (rules.blockedTitleParts.some((part) => title.includes(part))) {
    return false;
  }

  return rules.contentHrefParts.some((part) => href.includes(part));
}

/**
 * Collapse identical (title, url) pairs, keeping first occurrence order
 */
export function deduplicateRecords(records: NoticeRecord[]): NoticeRecord[] {
  const seen = new Set<string>();
  const unique: NoticeRecord[] = [];

  for (const record of records) {
    const identifier = JSON.stringify([record.title, record.url]);
    if (!seen.has(identifier)) {
      seen.add(identifier);
      unique.push(record);
    }
  }

  return unique;
}

/**
 * Broad scan over every anchor in the page, used when a site's result container is missing
 */
export function scanAllLinks(
  $: PageDocument,
  baseUrl: string,
  rules: LinkFilterRules
): NoticeRecord[] {
  const results: NoticeRecord[] = [];

  $('a[href]').each((_, element) => {
    const link = $(element);
    const href = link.attr('href') ?? '';
    const title = link.attr('title') || link.text().trim();

    if (isValidResultLink(title, href, rules)) {
      results.push({ title, url: normalizeUrl(href, baseUrl) });
    }
  });

  return results;
}

/**
 * Set `name=pageIndex` in the query, replacing every existing occurrence or appending one
 */
export function withPageParam(baseUrl: string, name: string, pageIndex: number): string {
  const pattern = new RegExp(`([?&])${name}=\\d+`, 'g');
  if (pattern.test(baseUrl)) {
    return baseUrl.replace(pattern, `$1${name}=${pageIndex}`);
  }

  const separator = baseUrl.includes('?') ? '&' : '?';
  return `${baseUrl}${separator}${name}=${pageIndex}`;
}
