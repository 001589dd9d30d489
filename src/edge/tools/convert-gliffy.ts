/**
 * convert_gliffy MCP Tool
 *
 * One .gliffy file → one .excalidraw file
 */

import type { Tool } from '@modelcontextprotocol/sdk/types.js';
import { createToolError } from '../../api/errors.js';
import type { ConversionStats, SkippedNode } from '../../core/types.js';
import { convertFile } from '../batch-converter.js';
import {
  type ToolArgs,
  type ToolContext,
  convertOptionsFor,
  createResolver,
  optionalString,
  requireString,
  resolvePath,
} from './shared.js';

/**
 * Tool definition for MCP server
 */
export const convertGliffyTool: Tool = {
  name: 'convert_gliffy',
  description: `Convert a Gliffy diagram (.gliffy JSON) to an Excalidraw document.

Writes <name>.excalidraw to the output directory and returns conversion statistics.
Stencils mapped to images in the TID mapping are embedded as images.`,
  inputSchema: {
    type: 'object',
    properties: {
      inputPath: {
        type: 'string',
        description: 'Path to the .gliffy file',
      },
      outputDir: {
        type: 'string',
        description: 'Output directory (default: "outputDir" from the configuration)',
      },
    },
    required: ['inputPath'],
  },
};

/**
 * Input arguments for convert_gliffy tool
 */
export interface ConvertGliffyArgs {
  inputPath: string;
  outputDir?: string;
}

/**
 * Result from convert_gliffy tool
 */
export interface ConvertGliffyResult {
  success: boolean;
  output?: string;
  stats?: ConversionStats;
  skipped?: SkippedNode[];
  error?: string;
}

export function parseConvertGliffyArgs(args: ToolArgs): ConvertGliffyArgs {
  return {
    inputPath: requireString(args, 'inputPath'),
    outputDir: optionalString(args, 'outputDir'),
  };
}

/**
 * Execute the convert_gliffy tool
 */
export async function executeConvertGliffy(
  args: ConvertGliffyArgs,
  context: ToolContext
): Promise<ConvertGliffyResult> {
  const { config } = context;
  const inputPath = resolvePath(context, args.inputPath);
  const outputDir = args.outputDir ? resolvePath(context, args.outputDir) : config.outputDir;

  try {
    const { output, result } = await convertFile(
      inputPath,
      outputDir,
      createResolver(config),
      convertOptionsFor(config)
    );
    return { success: true, output, stats: result.stats, skipped: result.skipped };
  } catch (error) {
    return { success: false, error: createToolError(error).message };
  }
}

/**
 * Format the result for MCP response
 */
export function formatConvertGliffyResponse(result: ConvertGliffyResult): string {
  if (!result.success || !result.stats) {
    return `# Error\n\n${result.error ?? 'No result generated'}`;
  }

  const { stats } = result;
  let text = `# Converted\n\n`;
  text += `Output: \`${result.output ?? ''}\`\n\n`;
  text += `| Metric | Value |\n|--------|-------|\n`;
  text += `| Source objects | ${stats.sourceNodes} |\n`;
  text += `| Hidden objects | ${stats.hiddenNodes} |\n`;
  text += `| Elements | ${stats.elements} |\n`;
  text += `| Images | ${stats.images} |\n`;
  text += `| Skipped | ${stats.skipped} |\n`;

  const skipped = result.skipped ?? [];
  if (skipped.length > 0) {
    text += `\n## Skipped objects\n\n`;
    for (const node of skipped) {
      text += `- ${node.sourceId ?? '(no id)'} (${node.detectedType ?? 'unknown'}): ${node.reason}\n`;
    }
  }
  return text;
}
