/**
 * TID extraction - inventory of the stencils used across .gliffy files
 */

import { readFile } from 'fs/promises';
import { glob } from 'glob';
import { transformDocument } from '../api/transformers.js';
import type { GliffyObject } from '../api/types.js';
import { createToolError } from '../api/errors.js';
import type { TidMapping } from './tid-image-mapper.js';

export interface TidExtractionResult {
  /** TID → number of files it occurs in */
  counts: Map<string, number>;
  filesScanned: number;
  errors: Array<{ file: string; message: string }>;
}

function collectTids(objects: readonly GliffyObject[], tids: Set<string>): void {
  for (const object of objects) {
    const tid = object.graphic?.Shape?.tid;
    if (tid) tids.add(tid);
    collectTids(object.children, tids);
  }
}

/**
 * Every Shape tid in a parsed .gliffy document, hidden objects included
 */
export function extractTids(document: unknown): Set<string> {
  const tids = new Set<string>();
  const diagram = transformDocument(document);
  if (!diagram) return tids;

  for (const scene of diagram.scenes) {
    collectTids(scene, tids);
  }
  return tids;
}

/**
 * Scan `dir` recursively for .gliffy files and count TID occurrences per file
 *
 * Unreadable or invalid files are reported and skipped.
 */
export async function extractTidsFromDirectory(dir: string): Promise<TidExtractionResult> {
  const files = (await glob('**/*.gliffy', { cwd: dir, absolute: true, nodir: true })).sort();
  const counts = new Map<string, number>();
  const errors: TidExtractionResult['errors'] = [];

  for (const file of files) {
    try {
      const raw: unknown = JSON.parse(await readFile(file, 'utf-8'));
      for (const tid of extractTids(raw)) {
        counts.set(tid, (counts.get(tid) ?? 0) + 1);
      }
    } catch (error) {
      const message = createToolError(error).message;
      console.error(`[tid-extractor] ${file}: ${message}`);
      errors.push({ file, message });
    }
  }

  return { counts, filesScanned: files.length, errors };
}

function compareStrings(a: string, b: string): number {
  if (a === b) return 0;
  return a < b ? -1 : 1;
}

/**
 * Build a mapping sorted by count (descending, ties by TID), keeping the
 * image and description of entries already present in `existing`
 */
export function buildTidMapping(counts: ReadonlyMap<string, number>, existing: TidMapping = {}): TidMapping {
  const sorted = [...counts.entries()].sort(
    ([tidA, countA], [tidB, countB]) => countB - countA || compareStrings(tidA, tidB)
  );

  const mapping: TidMapping = {};
  for (const [tid, count] of sorted) {
    mapping[tid] = {
      count,
      image_path: existing[tid]?.image_path ?? null,
      description: existing[tid]?.description ?? '',
    };
  }
  return mapping;
}
