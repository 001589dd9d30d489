/**
 * TID Image Mapper - which Gliffy stencils are drawn as images, and with what
 *
 * The mapping file is JSON keyed by TID:
 *   { "<tid>": { "count": 12, "image_path": "server.png", "description": "" } }
 * Relative image paths resolve against the images directory.
 *
 * Reads are synchronous: the converter consumes this through the synchronous
 * ImageResolver interface.
 */

import { existsSync, mkdirSync, readFileSync, writeFileSync } from 'fs';
import { dirname, isAbsolute, join } from 'path';
import { isRecord, readNumber, readString } from '../api/transformers.js';
import { GliffyToolError, createToolError } from '../api/errors.js';
import type { ImageResolver } from '../core/types.js';

export interface TidMappingEntry {
  /** Number of files the TID was found in */
  count: number;
  image_path: string | null;
  description: string;
}

export type TidMapping = Record<string, TidMappingEntry>;

/**
 * Parse a mapping document; malformed entries are dropped
 *
 * @throws {GliffyToolError} INVALID_MAPPING when the root is not an object
 */
export function parseTidMapping(raw: unknown): TidMapping {
  if (!isRecord(raw)) {
    throw new GliffyToolError('TID mapping must be a JSON object', 'INVALID_MAPPING');
  }

  const mapping: TidMapping = {};
  for (const [tid, entry] of Object.entries(raw)) {
    if (!isRecord(entry)) continue;
    mapping[tid] = {
      count: readNumber(entry.count) ?? 0,
      image_path: readString(entry.image_path) || null,
      description: readString(entry.description) ?? '',
    };
  }
  return mapping;
}

export class TidImageMapper implements ImageResolver {
  private mapping: TidMapping;

  constructor(
    readonly mappingFile: string,
    readonly imagesDir: string,
    mapping: TidMapping = {}
  ) {
    this.mapping = mapping;
  }

  /**
   * Load the mapping file; a missing file is an empty mapping, a malformed
   * one is logged and treated as empty
   */
  static load(mappingFile: string, imagesDir: string): TidImageMapper {
    if (!existsSync(mappingFile)) {
      return new TidImageMapper(mappingFile, imagesDir);
    }

    try {
      const raw: unknown = JSON.parse(readFileSync(mappingFile, 'utf-8'));
      return new TidImageMapper(mappingFile, imagesDir, parseTidMapping(raw));
    } catch (error) {
      const toolError = createToolError(error);
      console.error(`[tid-mapper] Ignoring mapping ${mappingFile}: ${toolError.message}`);
      return new TidImageMapper(mappingFile, imagesDir);
    }
  }

  getMapping(): TidMapping {
    return { ...this.mapping };
  }

  getEntry(tid: string): TidMappingEntry | undefined {
    return this.mapping[tid];
  }

  shouldUseImage(tid: string): boolean {
    return Boolean(this.mapping[tid]?.image_path);
  }

  /**
   * Absolute path of the TID's image, if it is mapped and exists on disk
   */
  getImagePath(tid: string): string | null {
    const imagePath = this.mapping[tid]?.image_path;
    if (!imagePath) return null;

    const resolved = isAbsolute(imagePath) ? imagePath : join(this.imagesDir, imagePath);
    return existsSync(resolved) ? resolved : null;
  }

  getImageBytes(tid: string): Uint8Array | null {
    const path = this.getImagePath(tid);
    if (!path) return null;

    try {
      return readFileSync(path);
    } catch (error) {
      console.error(`[tid-mapper] Cannot read image for TID ${tid}: ${createToolError(error).message}`);
      return null;
    }
  }

  /**
   * Map a TID to an image and save the mapping
   */
  setImageForTid(tid: string, imagePath: string, description = ''): TidMappingEntry {
    const existing = this.mapping[tid] ?? { count: 0, image_path: null, description: '' };
    const entry: TidMappingEntry = {
      ...existing,
      image_path: imagePath,
      description: description || existing.description,
    };
    this.mapping[tid] = entry;
    this.save();
    return entry;
  }

  /**
   * @throws {GliffyToolError} WRITE_ERROR when the file cannot be written
   */
  save(): void {
    try {
      mkdirSync(dirname(this.mappingFile), { recursive: true });
      writeFileSync(this.mappingFile, `${JSON.stringify(this.mapping, null, 2)}\n`, 'utf-8');
    } catch (error) {
      throw new GliffyToolError(`Cannot write ${this.mappingFile}`, 'WRITE_ERROR', {
        path: this.mappingFile,
        originalMessage: createToolError(error).message,
      });
    }
  }
}
