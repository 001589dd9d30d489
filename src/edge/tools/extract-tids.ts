/**
 * extract_tids MCP Tool
 *
 * Builds (or refreshes) the TID mapping file from a directory of diagrams
 */

import type { Tool } from '@modelcontextprotocol/sdk/types.js';
import { createToolError } from '../../api/errors.js';
import { buildTidMapping, extractTidsFromDirectory } from '../tid-extractor.js';
import { TidImageMapper, type TidMapping } from '../tid-image-mapper.js';
import { formatTidMappingText, writeReport } from '../report-writer.js';
import {
  type ToolArgs,
  type ToolContext,
  optionalString,
  requireString,
  resolvePath,
} from './shared.js';

export const TID_REPORT_NAME = 'tids_mapping.txt';
const TOP_TIDS = 10;

export const extractTidsTool: Tool = {
  name: 'extract_tids',
  description: `Inventory the Gliffy stencils (TIDs) used in a directory of .gliffy files.

Searches recursively, counts in how many files each TID occurs and writes the
TID mapping file. Image paths and descriptions already set are kept.`,
  inputSchema: {
    type: 'object',
    properties: {
      inputDir: {
        type: 'string',
        description: 'Directory to scan (recursively) for .gliffy files',
      },
      mappingFile: {
        type: 'string',
        description: 'Mapping file to write (default: "tidMappingFile" from the configuration)',
      },
    },
    required: ['inputDir'],
  },
};

export interface ExtractTidsArgs {
  inputDir: string;
  mappingFile?: string;
}

export interface ExtractTidsResult {
  success: boolean;
  mappingFile?: string;
  mapping?: TidMapping;
  filesScanned?: number;
  failedFiles?: number;
  reportPath?: string;
  error?: string;
}

export function parseExtractTidsArgs(args: ToolArgs): ExtractTidsArgs {
  return {
    inputDir: requireString(args, 'inputDir'),
    mappingFile: optionalString(args, 'mappingFile'),
  };
}

export async function executeExtractTids(
  args: ExtractTidsArgs,
  context: ToolContext
): Promise<ExtractTidsResult> {
  const { config } = context;
  const mappingFile = args.mappingFile ? resolvePath(context, args.mappingFile) : config.tidMappingFile;

  try {
    const extraction = await extractTidsFromDirectory(resolvePath(context, args.inputDir));
    const existing = TidImageMapper.load(mappingFile, config.tidImagesDir).getMapping();
    const mapping = buildTidMapping(extraction.counts, existing);

    new TidImageMapper(mappingFile, config.tidImagesDir, mapping).save();
    const reportPath = await writeReport(
      config.reportsDir,
      TID_REPORT_NAME,
      formatTidMappingText(mapping, new Date())
    );

    return {
      success: true,
      mappingFile,
      mapping,
      filesScanned: extraction.filesScanned,
      failedFiles: extraction.errors.length,
      reportPath,
    };
  } catch (error) {
    return { success: false, error: createToolError(error).message };
  }
}

export function formatExtractTidsResponse(result: ExtractTidsResult): string {
  if (!result.success || !result.mapping) {
    return `# Error\n\n${result.error ?? 'No result generated'}`;
  }

  const entries = Object.entries(result.mapping);
  let text = `# ${entries.length} unique TID(s) in ${result.filesScanned ?? 0} file(s)\n\n`;
  if (result.failedFiles) {
    text += `Files that could not be read: ${result.failedFiles}\n\n`;
  }
  text += `Mapping: \`${result.mappingFile ?? ''}\`\n\n`;

  if (entries.length > 0) {
    text += `## Most used\n\n`;
    for (const [tid, entry] of entries.slice(0, TOP_TIDS)) {
      text += `- \`${tid}\`: ${entry.count} file(s)${entry.image_path ? ` → ${entry.image_path}` : ''}\n`;
    }
  }
  if (result.reportPath) {
    text += `\nReport: \`${result.reportPath}\`\n`;
  }
  return text;
}
