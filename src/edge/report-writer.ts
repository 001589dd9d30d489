/**
 * Text reports for batch conversions and TID mappings
 */

import { mkdir, writeFile } from 'fs/promises';
import { extname, join } from 'path';
import type { BatchReport } from './batch-converter.js';
import type { TidMapping } from './tid-image-mapper.js';
import { GliffyToolError, createToolError } from '../api/errors.js';

const RULE_WIDTH = 80;
const HEAVY_RULE = '='.repeat(RULE_WIDTH);
const LIGHT_RULE = '-'.repeat(RULE_WIDTH);

function pad(value: number): string {
  return String(value).padStart(2, '0');
}

/**
 * Local time as YYYY-MM-DD_HH-MM-SS
 */
export function formatTimestamp(date: Date): string {
  const day = `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}`;
  const time = `${pad(date.getHours())}-${pad(date.getMinutes())}-${pad(date.getSeconds())}`;
  return `${day}_${time}`;
}

function formatDateTime(date: Date): string {
  return formatTimestamp(date).replace('_', ' ').replace(/-(\d\d)-(\d\d)$/, ':$1:$2');
}

/**
 * report.txt → report_2024-05-01_09-30-00.txt
 */
export function addTimestampToFilename(filename: string, date: Date): string {
  const extension = extname(filename);
  const stem = extension ? filename.slice(0, -extension.length) : filename;
  return `${stem}_${formatTimestamp(date)}${extension}`;
}

export function formatBatchReportText(report: BatchReport): string {
  const lines = [
    HEAVY_RULE,
    'GLIFFY CONVERSION REPORT',
    HEAVY_RULE,
    '',
    `Date: ${formatDateTime(report.startedAt)}`,
    `Input directory: ${report.inputDir}`,
    `Output directory: ${report.outputDir}`,
    '',
    'TOTALS',
    LIGHT_RULE,
    `Files: ${report.totals.files}`,
    `Converted: ${report.totals.converted}`,
    `Failed: ${report.totals.failed}`,
    `Elements: ${report.totals.elements}`,
    `Skipped nodes: ${report.totals.skipped}`,
    '',
    HEAVY_RULE,
    '',
  ];

  report.files.forEach((entry, i) => {
    lines.push(`FILE ${i + 1}/${report.files.length}: ${entry.file}`);
    lines.push(LIGHT_RULE);
    if (entry.status === 'converted') {
      lines.push(`  Output: ${entry.output ?? ''}`);
      lines.push(`  Elements: ${entry.elements}`);
      lines.push(`  Skipped nodes: ${entry.skipped}`);
    } else {
      lines.push(`  Error (${entry.errorCode ?? 'UNKNOWN'}): ${entry.error ?? ''}`);
    }
    lines.push('');
  });

  return lines.join('\n');
}

export function formatTidMappingText(mapping: TidMapping, generatedAt: Date): string {
  const entries = Object.entries(mapping).sort(([, a], [, b]) => b.count - a.count);
  const total = entries.reduce((sum, [, entry]) => sum + entry.count, 0);

  const lines = [
    HEAVY_RULE,
    'GLIFFY TID MAPPING',
    HEAVY_RULE,
    '',
    `Date: ${formatDateTime(generatedAt)}`,
    `Unique TIDs: ${entries.length}`,
    `Total occurrences: ${total}`,
    '',
    HEAVY_RULE,
    '',
  ];

  for (const [tid, entry] of entries) {
    lines.push(`TID: ${tid}`);
    lines.push(LIGHT_RULE);
    lines.push(`  Occurrences: ${entry.count}`);
    lines.push(`  Image: ${entry.image_path ?? 'not set'}`);
    const description = entry.description.trim();
    if (description) {
      lines.push(`  Description: ${description}`);
    }
    lines.push('');
  }

  return lines.join('\n');
}

/**
 * Write a report under `dir` with a timestamped name
 *
 * @returns The written path
 */
export async function writeReport(
  dir: string,
  filename: string,
  content: string,
  date = new Date()
): Promise<string> {
  const path = join(dir, addTimestampToFilename(filename, date));
  try {
    await mkdir(dir, { recursive: true });
    await writeFile(path, content, 'utf-8');
  } catch (error) {
    throw new GliffyToolError(`Cannot write report ${path}`, 'WRITE_ERROR', {
      path,
      originalMessage: createToolError(error).message,
    });
  }
  console.error(`[report] Saved ${path}`);
  return path;
}
