/**
 * convert_gliffy_directory MCP Tool
 */

import type { Tool } from '@modelcontextprotocol/sdk/types.js';
import { createToolError } from '../../api/errors.js';
import { type BatchReport, convertDirectory } from '../batch-converter.js';
import { formatBatchReportText, writeReport } from '../report-writer.js';
import {
  type ToolArgs,
  type ToolContext,
  convertOptionsFor,
  createResolver,
  optionalBoolean,
  optionalString,
  requireString,
  resolvePath,
} from './shared.js';

export const BATCH_REPORT_NAME = 'conversion_report.txt';

/**
 * Tool definition for MCP server
 */
export const convertDirectoryTool: Tool = {
  name: 'convert_gliffy_directory',
  description: `Convert every .gliffy file in a directory to .excalidraw.

Files that fail (invalid JSON, unreadable) are reported and do not stop the batch.
A text report is written to the reports directory.`,
  inputSchema: {
    type: 'object',
    properties: {
      inputDir: {
        type: 'string',
        description: 'Directory containing .gliffy files (not searched recursively)',
      },
      outputDir: {
        type: 'string',
        description: 'Output directory (default: "outputDir" from the configuration)',
      },
      writeReport: {
        type: 'boolean',
        description: 'Write a text report (default: true)',
      },
    },
    required: ['inputDir'],
  },
};

export interface ConvertDirectoryArgs {
  inputDir: string;
  outputDir?: string;
  writeReport: boolean;
}

export interface ConvertDirectoryResult {
  success: boolean;
  report?: BatchReport;
  reportPath?: string;
  error?: string;
}

export function parseConvertDirectoryArgs(args: ToolArgs): ConvertDirectoryArgs {
  return {
    inputDir: requireString(args, 'inputDir'),
    outputDir: optionalString(args, 'outputDir'),
    writeReport: optionalBoolean(args, 'writeReport', true),
  };
}

export async function executeConvertDirectory(
  args: ConvertDirectoryArgs,
  context: ToolContext
): Promise<ConvertDirectoryResult> {
  const { config } = context;

  try {
    const report = await convertDirectory({
      inputDir: resolvePath(context, args.inputDir),
      outputDir: args.outputDir ? resolvePath(context, args.outputDir) : config.outputDir,
      resolver: createResolver(config),
      convertOptions: convertOptionsFor(config),
    });

    const reportPath = args.writeReport
      ? await writeReport(config.reportsDir, BATCH_REPORT_NAME, formatBatchReportText(report), report.startedAt)
      : undefined;

    return { success: true, report, reportPath };
  } catch (error) {
    return { success: false, error: createToolError(error).message };
  }
}

export function formatConvertDirectoryResponse(result: ConvertDirectoryResult): string {
  if (!result.success || !result.report) {
    return `# Error\n\n${result.error ?? 'No result generated'}`;
  }

  const { totals, files } = result.report;
  if (totals.files === 0) {
    return `# Nothing to convert\n\nNo .gliffy files in \`${result.report.inputDir}\`.`;
  }

  let text = `# Converted ${totals.converted}/${totals.files} file(s)\n\n`;
  text += `Elements: ${totals.elements}, skipped objects: ${totals.skipped}\n\n`;

  for (const entry of files) {
    text +=
      entry.status === 'converted'
        ? `- ${entry.file} → \`${entry.output ?? ''}\` (${entry.elements} elements)\n`
        : `- ${entry.file}: **${entry.errorCode ?? 'UNKNOWN'}** ${entry.error ?? ''}\n`;
  }

  if (result.reportPath) {
    text += `\nReport: \`${result.reportPath}\`\n`;
  }
  return text;
}
