/**
 * Shared helpers for the MCP tools
 */

import { resolve } from 'path';
import { GliffyToolError } from '../../api/errors.js';
import { isRecord } from '../../api/transformers.js';
import type { ConverterConfig } from '../../config-schema.js';
import type { ConvertOptions } from '../../core/types.js';
import { TidImageMapper } from '../tid-image-mapper.js';

/**
 * What every tool execution gets from the server
 */
export interface ToolContext {
  config: ConverterConfig;
  /** Base for relative paths in tool arguments */
  cwd: string;
}

export type ToolArgs = Record<string, unknown>;

/**
 * @throws {GliffyToolError} INVALID_ARGUMENTS when arguments are not an object
 */
export function toArgs(raw: unknown): ToolArgs {
  if (raw === undefined) return {};
  if (!isRecord(raw)) {
    throw new GliffyToolError('Tool arguments must be an object', 'INVALID_ARGUMENTS');
  }
  return raw;
}

/**
 * @throws {GliffyToolError} INVALID_ARGUMENTS when missing or empty
 */
export function requireString(args: ToolArgs, key: string): string {
  const value = args[key];
  if (typeof value !== 'string' || value.trim() === '') {
    throw new GliffyToolError(`Missing required argument: ${key}`, 'INVALID_ARGUMENTS', { key });
  }
  return value;
}

export function optionalString(args: ToolArgs, key: string): string | undefined {
  const value = args[key];
  return typeof value === 'string' && value.trim() !== '' ? value : undefined;
}

export function optionalBoolean(args: ToolArgs, key: string, fallback: boolean): boolean {
  const value = args[key];
  return typeof value === 'boolean' ? value : fallback;
}

export function resolvePath(context: ToolContext, path: string): string {
  return resolve(context.cwd, path);
}

export function loadMapper(config: ConverterConfig): TidImageMapper {
  return TidImageMapper.load(config.tidMappingFile, config.tidImagesDir);
}

/**
 * Image resolver for conversions, or none when substitution is disabled
 */
export function createResolver(config: ConverterConfig): TidImageMapper | undefined {
  return config.useTidImages ? loadMapper(config) : undefined;
}

export function convertOptionsFor(config: ConverterConfig): ConvertOptions {
  return { source: config.source };
}
