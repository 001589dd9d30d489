/**
 * Batch converter - .gliffy files on disk to .excalidraw files
 */

import { mkdir, readFile, writeFile } from 'fs/promises';
import { basename, extname, join } from 'path';
import { glob } from 'glob';
import { convertWithReport } from '../core/pipeline.js';
import type { ConversionResult, ConvertOptions, ImageResolver } from '../core/types.js';
import { GliffyToolError, createToolError, type GliffyErrorCode } from '../api/errors.js';

export const EXCALIDRAW_EXTENSION = '.excalidraw';
const FALLBACK_NAME = 'diagram';

/**
 * Outcome for one input file
 */
export interface FileReport {
  /** Input file name */
  file: string;
  status: 'converted' | 'error';
  /** Written .excalidraw path */
  output?: string;
  elements: number;
  skipped: number;
  error?: string;
  errorCode?: GliffyErrorCode;
}

export interface BatchReport {
  inputDir: string;
  outputDir: string;
  startedAt: Date;
  files: FileReport[];
  totals: {
    files: number;
    converted: number;
    failed: number;
    elements: number;
    skipped: number;
  };
}

export interface BatchOptions {
  inputDir: string;
  outputDir: string;
  resolver?: ImageResolver;
  convertOptions?: ConvertOptions;
}

/**
 * File-system safe name: drop everything but letters, digits, `_`, whitespace
 * and `-`, then collapse whitespace/dash runs into `_`
 */
export function safeName(name: string): string {
  const cleaned = name
    .replace(/[^\p{L}\p{N}_\s-]/gu, '')
    .trim()
    .replace(/[-\s]+/g, '_');
  return cleaned || FALLBACK_NAME;
}

export function outputPathFor(inputPath: string, outputDir: string): string {
  const stem = basename(inputPath, extname(inputPath));
  return join(outputDir, `${safeName(stem)}${EXCALIDRAW_EXTENSION}`);
}

/**
 * Read and parse a .gliffy file
 *
 * @throws {GliffyToolError} FILE_NOT_FOUND, READ_ERROR or INVALID_JSON
 */
export async function readGliffyFile(path: string): Promise<unknown> {
  let content: string;
  try {
    content = await readFile(path, 'utf-8');
  } catch (error) {
    const toolError = createToolError(error);
    throw toolError.is('UNKNOWN')
      ? new GliffyToolError(toolError.message, 'READ_ERROR', { path })
      : toolError;
  }

  try {
    const parsed: unknown = JSON.parse(content);
    return parsed;
  } catch (error) {
    throw new GliffyToolError(`Invalid JSON in ${path}`, 'INVALID_JSON', {
      path,
      originalMessage: createToolError(error).message,
    });
  }
}

export interface FileConversion {
  output: string;
  result: ConversionResult;
}

/**
 * Convert one file and write compact JSON next to the other outputs
 */
export async function convertFile(
  inputPath: string,
  outputDir: string,
  resolver?: ImageResolver,
  options?: ConvertOptions
): Promise<FileConversion> {
  const raw = await readGliffyFile(inputPath);
  const result = convertWithReport(raw, resolver, options);
  const output = outputPathFor(inputPath, outputDir);

  try {
    await mkdir(outputDir, { recursive: true });
    await writeFile(output, JSON.stringify(result.document), 'utf-8');
  } catch (error) {
    throw new GliffyToolError(`Cannot write ${output}`, 'WRITE_ERROR', {
      path: output,
      originalMessage: createToolError(error).message,
    });
  }

  return { output, result };
}

/**
 * Convert every *.gliffy file directly inside `inputDir`
 *
 * Files are processed one at a time; a failing file is recorded and the
 * batch continues.
 */
export async function convertDirectory(options: BatchOptions): Promise<BatchReport> {
  const { inputDir, outputDir, resolver, convertOptions } = options;
  const startedAt = new Date();
  const inputs = (await glob('*.gliffy', { cwd: inputDir, absolute: true, nodir: true })).sort();

  const files: FileReport[] = [];
  for (const input of inputs) {
    const file = basename(input);
    try {
      const { output, result } = await convertFile(input, outputDir, resolver, convertOptions);
      files.push({
        file,
        status: 'converted',
        output,
        elements: result.stats.elements,
        skipped: result.stats.skipped,
      });
      console.error(`[batch] ${file}: ${result.stats.elements} element(s)`);
    } catch (error) {
      const toolError = createToolError(error);
      files.push({
        file,
        status: 'error',
        elements: 0,
        skipped: 0,
        error: toolError.message,
        errorCode: toolError.code,
      });
      console.error(`[batch] ${file}: ${toolError.message}`);
    }
  }

  const converted = files.filter(entry => entry.status === 'converted');
  return {
    inputDir,
    outputDir,
    startedAt,
    files,
    totals: {
      files: files.length,
      converted: converted.length,
      failed: files.length - converted.length,
      elements: converted.reduce((sum, entry) => sum + entry.elements, 0),
      skipped: converted.reduce((sum, entry) => sum + entry.skipped, 0),
    },
  };
}
