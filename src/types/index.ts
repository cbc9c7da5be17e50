/**
 * Core types for the notice crawler
 */

/**
 * One discovered notice. Identity is `url`, compared exactly as fetched.
 * Field names mirror the persisted JSON files.
 */
export interface NoticeRecord {
  title: string;
  url: string;
  discovered_at?: string;
}

/**
 * A configured listing page, already filtered to enabled entries
 */
export interface SourceConfig {
  key: string;
  name: string;
  url: string;
  description: string;
  crawlerType: string;
  encoding?: string;
  /** Set when the entry failed validation; the run records it instead of crawling */
  configError?: string;
}

export interface CrawlerSettings {
  maxPages: number;
}

/**
 * Persisted per-source data file
 */
export interface SourceRecordSet {
  url: string;
  source_key: string | null;
  source_name: string | null;
  last_updated: string;
  total_count: number;
  items: NoticeRecord[];
}

/**
 * One entry of the per-source history file (newest last)
 */
export interface HistoryEntry {
  timestamp: string;
  source_key: string | null;
  source_name: string | null;
  new_items_count: number;
  new_items: NoticeRecord[];
}

export interface SaveResult {
  allItems: NoticeRecord[];
  newItems: NoticeRecord[];
}

export interface SourceSummary {
  url: string;
  sourceKey: string | null;
  sourceName: string | null;
  totalItems: number;
  lastUpdated: string | null;
  historyEntries: number;
  latestNewItems: number;
}

export type StoredSourceSummary = Omit<SourceSummary, 'historyEntries' | 'latestNewItems'>;

export interface SourceRunResult {
  key: string;
  name: string;
  url: string;
  crawlerType: string;
  crawledCount: number;
  newCount: number;
  totalCount: number;
  newItems: NoticeRecord[];
  error: string | null;
}

export interface CrawlRunResult {
  startedAt: Date;
  finishedAt: Date;
  totalConfigs: number;
  totalAllItems: number;
  totalNewItems: number;
  results: SourceRunResult[];
  reportPath: string | null;
}

export interface RetryConfig {
  maxAttempts: number;
  initialDelayMs: number;
  maxDelayMs: number;
  factor: number;
}
