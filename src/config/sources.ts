/**
 * Source list loading (urls_config.json)
 *
 * Entries are checked one by one. A disabled entry is skipped before anything
 * else is read from it; an enabled entry that fails validation is still listed,
 * carrying its `configError`, so the run records it against that source alone.
 */

import { readFile } from 'fs/promises';
import { z } from 'zod';
import { logger } from '../utils/logger.js';
import type { CrawlerSettings, SourceConfig } from '../types/index.js';

const DEFAULT_CRAWLER_TYPE = 'sichuan_fgw';
const DEFAULT_MAX_PAGES = 20;

const enabledFlagSchema = z.object({ enabled: z.unknown() });

const sourceEntrySchema = z.object({
  name: z.string().optional(),
  url: z.string().url(),
  description: z.string().default(''),
  crawler_type: z.string().default(DEFAULT_CRAWLER_TYPE),
  encoding: z.string().optional(),
});

// Whatever can be salvaged from an entry that failed validation
const entryLabelSchema = z
  .object({
    name: z.string().optional().catch(undefined),
    url: z.string().catch(''),
    crawler_type: z.string().catch(DEFAULT_CRAWLER_TYPE),
  })
  .catch({ name: undefined, url: '', crawler_type: DEFAULT_CRAWLER_TYPE });

const sourcesFileSchema = z.object({
  search_urls: z.record(z.string(), z.unknown()).default({}),
  crawler_settings: z
    .object({
      max_pages: z.number().int().positive().default(DEFAULT_MAX_PAGES),
    })
    .default({}),
});

export interface SourcesConfig {
  sources: SourceConfig[];
  settings: CrawlerSettings;
}

function isDisabled(entry: unknown): boolean {
  const flag = enabledFlagSchema.safeParse(entry);
  return flag.success && flag.data.enabled === false;
}

function describeIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}

/**
 * Enabled sources with crawler settings
 *
 * Sources follow the key order of the parsed object. JavaScript lists
 * integer-like keys (`"2024"`) first in ascending order, ahead of all other
 * keys, so such sources run before the rest regardless of their position in
 * the file.
 */
export function parseSourcesConfig(raw: unknown): SourcesConfig {
  const parsed = sourcesFileSchema.parse(raw);

  const sources: SourceConfig[] = [];
  for (const [key, value] of Object.entries(parsed.search_urls)) {
    if (isDisabled(value)) {
      continue;
    }

    const entry = sourceEntrySchema.safeParse(value);
    if (!entry.success) {
      const label = entryLabelSchema.parse(value);
      const configError = `invalid source config: ${describeIssues(entry.error)}`;
      logger.error({ source: key, error: configError }, 'Invalid source entry');
      sources.push({
        key,
        name: label.name || key,
        url: label.url,
        description: '',
        crawlerType: label.crawler_type,
        configError,
      });
      continue;
    }

    sources.push({
      key,
      name: entry.data.name || key,
      url: entry.data.url,
      description: entry.data.description,
      crawlerType: entry.data.crawler_type,
      ...(entry.data.encoding ? { encoding: entry.data.encoding } : {}),
    });
  }

  if (Object.keys(parsed.search_urls).some((key) => /^(0|[1-9]\d*)$/.test(key))) {
    logger.warn('Numeric source keys run before all other sources');
  }

  return {
    sources,
    settings: { maxPages: parsed.crawler_settings.max_pages },
  };
}

/**
 * Read and validate the sources file; null when it is missing or invalid
 */
export async function loadSourcesConfig(filePath: string): Promise<SourcesConfig | null> {
  let raw: string;
  try {
    raw = await readFile(filePath, 'utf-8');
  } catch (error) {
    logger.error({ filePath, err: error }, 'Sources config file not found');
    return null;
  }

  try {
    return parseSourcesConfig(JSON.parse(raw));
  } catch (error) {
    logger.error({ filePath, err: error }, 'Failed to load sources config');
    return null;
  }
}
