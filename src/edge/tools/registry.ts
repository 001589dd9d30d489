/**
 * Tool registry - definitions and dispatch for the MCP server
 */

import type { Tool } from '@modelcontextprotocol/sdk/types.js';
import { createToolError } from '../../api/errors.js';
import {
  convertGliffyTool,
  executeConvertGliffy,
  formatConvertGliffyResponse,
  parseConvertGliffyArgs,
} from './convert-gliffy.js';
import {
  convertDirectoryTool,
  executeConvertDirectory,
  formatConvertDirectoryResponse,
  parseConvertDirectoryArgs,
} from './convert-directory.js';
import {
  executeExtractTids,
  extractTidsTool,
  formatExtractTidsResponse,
  parseExtractTidsArgs,
} from './extract-tids.js';
import {
  executeSetTidImage,
  formatSetTidImageResponse,
  parseSetTidImageArgs,
  setTidImageTool,
} from './set-tid-image.js';
import { type ToolContext, toArgs } from './shared.js';

export const tools: Tool[] = [convertGliffyTool, convertDirectoryTool, extractTidsTool, setTidImageTool];

/**
 * MCP tool response
 */
export interface ToolResponse {
  [key: string]: unknown;
  content: Array<{ type: 'text'; text: string }>;
  isError: boolean;
}

function textResponse(text: string, isError: boolean): ToolResponse {
  return { content: [{ type: 'text', text }], isError };
}

/**
 * Run a tool by name
 *
 * Never throws: failures come back as `isError` responses.
 */
export async function callTool(name: string, rawArgs: unknown, context: ToolContext): Promise<ToolResponse> {
  try {
    const args = toArgs(rawArgs);

    switch (name) {
      case convertGliffyTool.name: {
        const result = await executeConvertGliffy(parseConvertGliffyArgs(args), context);
        return textResponse(formatConvertGliffyResponse(result), !result.success);
      }

      case convertDirectoryTool.name: {
        const result = await executeConvertDirectory(parseConvertDirectoryArgs(args), context);
        return textResponse(formatConvertDirectoryResponse(result), !result.success);
      }

      case extractTidsTool.name: {
        const result = await executeExtractTids(parseExtractTidsArgs(args), context);
        return textResponse(formatExtractTidsResponse(result), !result.success);
      }

      case setTidImageTool.name: {
        const result = await executeSetTidImage(parseSetTidImageArgs(args), context);
        return textResponse(formatSetTidImageResponse(result), !result.success);
      }

      default:
        return textResponse(
          `Unknown tool: ${name}\n\nAvailable tools:\n${tools.map(tool => `- ${tool.name}`).join('\n')}`,
          true
        );
    }
  } catch (error) {
    const toolError = createToolError(error);
    console.error('[tools] Tool error:', toolError.message);
    return textResponse(`Error: ${toolError.message}`, true);
  }
}
