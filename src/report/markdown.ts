/**
 * Markdown run report
 *
 * Lists per source what was crawled and which notices are new since the last run.
 */

import { mkdir, writeFile } from 'fs/promises';
import { join } from 'path';
import { config } from '../config/index.js';
import { logger } from '../utils/logger.js';
import type { CrawlRunResult } from '../types/index.js';

function pad(value: number): string {
  return String(value).padStart(2, '0');
}

export function formatDateTime(date: Date): string {
  return `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ${formatTime(date)}`;
}

function formatTime(date: Date): string {
  return `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`;
}

function fileTimestamp(date: Date): string {
  return (
    `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}` +
    `_${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`
  );
}

export function generateMarkdownReport(run: CrawlRunResult): string {
  const lines: string[] = [
    '# 爬虫运行报告',
    '',
    `**运行时间**: ${formatDateTime(run.startedAt)} - ${formatTime(run.finishedAt)}`,
    `**处理配置**: ${run.totalConfigs} 个`,
    `**总计数据项**: ${run.totalAllItems}`,
    `**本次新增**: ${run.totalNewItems}`,
    '',
    '---',
    '',
  ];

  run.results.forEach((result, index) => {
    lines.push(`## ${index + 1}. ${result.name} (${result.key})`, '');
    lines.push(`- **URL**: ${result.url}`);
    lines.push(`- **爬虫类型**: ${result.crawlerType}`);
    lines.push(`- **爬取结果数**: ${result.crawledCount}`);
    lines.push(`- **新增数量**: ${result.newCount}`);
    lines.push(`- **总计数据项**: ${result.totalCount}`);
    if (result.error) {
      lines.push(`- **错误**: ${result.error}`);
    }
    lines.push('');

    if (result.newItems.length > 0) {
      lines.push(`### 本次新增项目 (${result.newItems.length} 项)`, '');
      result.newItems.forEach((item, itemIndex) => {
        lines.push(`${itemIndex + 1}. [${item.title}](${item.url})`);
      });
      lines.push('');
    } else {
      lines.push('*本次运行未发现新项目*', '');
    }

    lines.push('---', '');
  });

  return lines.join('\n');
}

/**
 * Write the report as `result_YYYYMMDD_HHmmss.md` and return its path
 */
export async function saveMarkdownReport(
  run: CrawlRunResult,
  outputDir: string = config.report.outputDir
): Promise<string> {
  await mkdir(outputDir, { recursive: true });

  const filePath = join(outputDir, `result_${fileTimestamp(run.finishedAt)}.md`);
  await writeFile(filePath, generateMarkdownReport(run), 'utf-8');

  logger.info({ filePath }, 'Run report saved');
  return filePath;
}
