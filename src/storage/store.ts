/**
 * File-backed notice store
 *
 * One JSON data file per source plus a sibling `_history.json` log. Every save
 * reads the whole file, appends the unseen records and writes it back in place.
 * There is no locking: two processes saving the same source race and the last
 * writer wins.
 */

import crypto from 'crypto';
import { mkdir, readFile, readdir, writeFile } from 'fs/promises';
import { dirname, join } from 'path';
import type { ZodType, ZodTypeDef } from 'zod';
import { config } from '../config/index.js';
import { logger } from '../utils/logger.js';
import type {
  HistoryEntry,
  NoticeRecord,
  SaveResult,
  SourceRecordSet,
  SourceSummary,
  StoredSourceSummary,
} from '../types/index.js';
import { toCsv } from './csv.js';
import { historyLogSchema, sourceRecordSetSchema } from './schema.js';

const DATA_SUFFIX = '.json';
const HISTORY_SUFFIX = '_history.json';

export const CSV_HEADER = ['标题', '链接地址', '发现时间'] as const;

export interface NoticeStoreOptions {
  dataDir?: string;
  historyLimit?: number;
  now?: () => Date;
}

/**
 * File identity of a source: its display name with every character other than
 * a Unicode letter, digit, `_` or `-` replaced, or the MD5 of the listing URL
 * when there is no name.
 * Sources sharing a display name share a file.
 */
export function deriveStoreName(url: string, sourceName?: string | null): string {
  if (sourceName) {
    return sourceName.replace(/[^\p{L}\p{N}_-]/gu, '_');
  }
  return crypto.createHash('md5').update(url, 'utf8').digest('hex');
}

export class NoticeStore {
  readonly dataDir: string;
  private readonly historyLimit: number;
  private readonly now: () => Date;

  constructor(options: NoticeStoreOptions = {}) {
    this.dataDir = options.dataDir ?? config.storage.dataDir;
    this.historyLimit = options.historyLimit ?? config.storage.historyLimit;
    this.now = options.now ?? (() => new Date());
  }

  dataFilePath(url: string, sourceName?: string | null): string {
    return join(this.dataDir, `${deriveStoreName(url, sourceName)}${DATA_SUFFIX}`);
  }

  historyFilePath(url: string, sourceName?: string | null): string {
    return join(this.dataDir, `${deriveStoreName(url, sourceName)}${HISTORY_SUFFIX}`);
  }

  /**
   * Stored record set, or null when absent or unreadable
   */
  async load(url: string, sourceName?: string | null): Promise<SourceRecordSet | null> {
    return readJsonFile(this.dataFilePath(url, sourceName), sourceRecordSetSchema);
  }

  async loadHistory(url: string, sourceName?: string | null): Promise<HistoryEntry[]> {
    return (await readJsonFile(this.historyFilePath(url, sourceName), historyLogSchema)) ?? [];
  }

  /**
   * Append the records whose url has not been stored yet.
   *
   * An already stored url keeps its first title. New records are stamped with
   * `discovered_at` unless they carry one.
   */
  async save(
    url: string,
    records: NoticeRecord[],
    sourceKey?: string | null,
    sourceName?: string | null
  ): Promise<SaveResult> {
    const existing = await this.load(url, sourceName);
    const existingItems = existing?.items ?? [];
    const timestamp = this.now().toISOString();

    const seenUrls = new Set(existingItems.map((item) => item.url));
    const newItems: NoticeRecord[] = [];

    for (const record of records) {
      if (seenUrls.has(record.url)) {
        continue;
      }
      seenUrls.add(record.url);
      newItems.push({ ...record, discovered_at: record.discovered_at ?? timestamp });
    }

    const allItems = [...existingItems, ...newItems];

    const updated: SourceRecordSet = {
      url,
      source_key: sourceKey ?? null,
      source_name: sourceName ?? null,
      last_updated: timestamp,
      total_count: allItems.length,
      items: allItems,
    };

    await writeJsonFile(this.dataFilePath(url, sourceName), updated);

    if (newItems.length > 0) {
      await this.appendHistory(url, {
        timestamp,
        source_key: sourceKey ?? null,
        source_name: sourceName ?? null,
        new_items_count: newItems.length,
        new_items: newItems,
      });
    }

    logger.info(
      { source: sourceKey ?? url, total: allItems.length, new: newItems.length },
      'Saved source data'
    );

    return { allItems, newItems };
  }

  async getSummary(url: string, sourceName?: string | null): Promise<SourceSummary> {
    const data = await this.load(url, sourceName);
    const history = await this.loadHistory(url, sourceName);
    const latest = history.at(-1);

    return {
      url,
      sourceKey: data?.source_key ?? null,
      sourceName: data?.source_name ?? null,
      totalItems: data?.total_count ?? 0,
      lastUpdated: data?.last_updated ?? null,
      historyEntries: history.length,
      latestNewItems: latest?.new_items_count ?? 0,
    };
  }

  /**
   * One summary per data file in the store directory, ordered by file name
   */
  async getAllSummaries(): Promise<StoredSourceSummary[]> {
    let fileNames: string[];
    try {
      fileNames = await readdir(this.dataDir);
    } catch (error) {
      if (isNotFound(error)) {
        return [];
      }
      throw error;
    }

    const dataFiles = fileNames
      .filter((name) => name.endsWith(DATA_SUFFIX) && !name.endsWith(HISTORY_SUFFIX))
      .sort();

    const summaries: StoredSourceSummary[] = [];
    for (const fileName of dataFiles) {
      const data = await readJsonFile(join(this.dataDir, fileName), sourceRecordSetSchema);
      if (!data) {
        continue;
      }

      summaries.push({
        url: data.url,
        sourceKey: data.source_key,
        sourceName: data.source_name,
        totalItems: data.total_count,
        lastUpdated: data.last_updated,
      });
    }

    return summaries;
  }

  /**
   * Write every stored record of a source as CSV; returns the row count
   */
  async exportCsv(url: string, outputPath: string, sourceName?: string | null): Promise<number> {
    const data = await this.load(url, sourceName);
    const items = data?.items ?? [];

    const rows = [
      [...CSV_HEADER],
      ...items.map((item) => [item.title, item.url, item.discovered_at ?? '']),
    ];

    await mkdir(dirname(outputPath), { recursive: true });
    await writeFile(outputPath, toCsv(rows), 'utf-8');

    logger.info({ count: items.length, outputPath }, 'Exported records to CSV');
    return items.length;
  }

  private async appendHistory(url: string, entry: HistoryEntry): Promise<void> {
    const history = await this.loadHistory(url, entry.source_name);
    history.push(entry);

    const bounded = history.length > this.historyLimit ? history.slice(-this.historyLimit) : history;
    await writeJsonFile(this.historyFilePath(url, entry.source_name), bounded);
  }
}

async function readJsonFile<T>(
  filePath: string,
  schema: ZodType<T, ZodTypeDef, unknown>
): Promise<T | null> {
  let raw: string;
  try {
    raw = await readFile(filePath, 'utf-8');
  } catch (error) {
    if (isNotFound(error)) {
      return null;
    }
    logger.error({ filePath, err: error }, 'Failed to read data file');
    return null;
  }

  try {
    const parsed = schema.safeParse(JSON.parse(raw));
    if (!parsed.success) {
      logger.error({ filePath, issues: parsed.error.issues }, 'Data file does not match expected shape');
      return null;
    }
    return parsed.data;
  } catch (error) {
    logger.error({ filePath, err: error }, 'Failed to parse data file');
    return null;
  }
}

async function writeJsonFile(filePath: string, data: unknown): Promise<void> {
  await mkdir(dirname(filePath), { recursive: true });
  await writeFile(filePath, JSON.stringify(data, null, 2), 'utf-8');
}

function isNotFound(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}
