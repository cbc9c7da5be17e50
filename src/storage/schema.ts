/**
 * Shapes of the persisted JSON files
 */

import { z } from 'zod';

export const noticeRecordSchema = z
  .object({
    title: z.string(),
    url: z.string(),
    discovered_at: z.string().optional(),
  })
  .passthrough();

export const sourceRecordSetSchema = z.object({
  url: z.string(),
  source_key: z.string().nullable().default(null),
  source_name: z.string().nullable().default(null),
  last_updated: z.string(),
  total_count: z.number().int().nonnegative(),
  items: z.array(noticeRecordSchema),
});

export const historyEntrySchema = z.object({
  timestamp: z.string(),
  source_key: z.string().nullable().default(null),
  source_name: z.string().nullable().default(null),
  new_items_count: z.number().int().nonnegative(),
  new_items: z.array(noticeRecordSchema),
});

export const historyLogSchema = z.array(historyEntrySchema);
