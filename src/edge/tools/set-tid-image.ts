/**
 * set_tid_image MCP Tool
 */

import type { Tool } from '@modelcontextprotocol/sdk/types.js';
import { createToolError } from '../../api/errors.js';
import type { TidMappingEntry } from '../tid-image-mapper.js';
import { type ToolArgs, type ToolContext, loadMapper, optionalString, requireString } from './shared.js';

export const setTidImageTool: Tool = {
  name: 'set_tid_image',
  description: `Map a Gliffy stencil (TID) to an image.

Converted diagrams then embed the image in place of the stencil's shape.
Relative image paths are resolved against the TID images directory.`,
  inputSchema: {
    type: 'object',
    properties: {
      tid: { type: 'string', description: 'Stencil type id, e.g. com.gliffy.stencil.server' },
      imagePath: { type: 'string', description: 'PNG, JPEG or SVG file' },
      description: { type: 'string', description: 'Optional note kept in the mapping' },
    },
    required: ['tid', 'imagePath'],
  },
};

export interface SetTidImageArgs {
  tid: string;
  imagePath: string;
  description?: string;
}

export interface SetTidImageResult {
  success: boolean;
  tid?: string;
  entry?: TidMappingEntry;
  /** Whether the image file could be found */
  imageFound?: boolean;
  error?: string;
}

export function parseSetTidImageArgs(args: ToolArgs): SetTidImageArgs {
  return {
    tid: requireString(args, 'tid'),
    imagePath: requireString(args, 'imagePath'),
    description: optionalString(args, 'description'),
  };
}

export async function executeSetTidImage(
  args: SetTidImageArgs,
  context: ToolContext
): Promise<SetTidImageResult> {
  try {
    const mapper = loadMapper(context.config);
    const entry = mapper.setImageForTid(args.tid, args.imagePath, args.description);
    return { success: true, tid: args.tid, entry, imageFound: mapper.getImagePath(args.tid) !== null };
  } catch (error) {
    return { success: false, error: createToolError(error).message };
  }
}

export function formatSetTidImageResponse(result: SetTidImageResult): string {
  if (!result.success || !result.entry) {
    return `# Error\n\n${result.error ?? 'No result generated'}`;
  }

  let text = `# TID ${result.tid ?? ''} → ${result.entry.image_path ?? ''}\n`;
  if (!result.imageFound) {
    text += `\nWarning: the image file does not exist yet; the stencil keeps its shape until it does.\n`;
  }
  return text;
}
