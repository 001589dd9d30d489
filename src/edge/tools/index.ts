/**
 * Edge Tools - MCP tool implementations
 */

export {
  convertGliffyTool,
  parseConvertGliffyArgs,
  executeConvertGliffy,
  formatConvertGliffyResponse,
  type ConvertGliffyArgs,
  type ConvertGliffyResult,
} from './convert-gliffy.js';

export {
  convertDirectoryTool,
  parseConvertDirectoryArgs,
  executeConvertDirectory,
  formatConvertDirectoryResponse,
  BATCH_REPORT_NAME,
  type ConvertDirectoryArgs,
  type ConvertDirectoryResult,
} from './convert-directory.js';

export {
  extractTidsTool,
  parseExtractTidsArgs,
  executeExtractTids,
  formatExtractTidsResponse,
  TID_REPORT_NAME,
  type ExtractTidsArgs,
  type ExtractTidsResult,
} from './extract-tids.js';

export {
  setTidImageTool,
  parseSetTidImageArgs,
  executeSetTidImage,
  formatSetTidImageResponse,
  type SetTidImageArgs,
  type SetTidImageResult,
} from './set-tid-image.js';

export { toArgs, type ToolContext } from './shared.js';

export { tools, callTool, type ToolResponse } from './registry.js';
