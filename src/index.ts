#!/usr/bin/env node
/**
 * Gliffy → Excalidraw MCP Server
 *
 * Converts Gliffy diagrams to Excalidraw documents and manages the TID image
 * mapping used to render stencils as images.
 */

import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { CallToolRequestSchema, ListToolsRequestSchema } from '@modelcontextprotocol/sdk/types.js';
import { config as loadEnv } from 'dotenv';
import { resolve } from 'path';
import { ConfigValidationError, formatValidationErrors, loadConverterConfigOrDefault } from './config-loader.js';
import { callTool, tools } from './edge/tools/index.js';
import type { ToolContext } from './edge/tools/index.js';

loadEnv();

const server = new Server(
  {
    name: 'gliffy-excalidraw',
    version: '1.0.0',
  },
  {
    capabilities: {
      tools: {},
    },
  }
);

async function createToolContext(): Promise<ToolContext> {
  const cwd = process.cwd();
  const searchFrom = resolve(cwd, process.env.GLIFFY_CONFIG_DIR ?? '.');
  const { config, filepath } = await loadConverterConfigOrDefault(searchFrom);
  console.error(`[config] ${filepath ?? 'defaults'}`);
  return { config, cwd };
}

// Start the server
async function main() {
  let context: ToolContext;
  try {
    context = await createToolContext();
  } catch (error) {
    if (error instanceof ConfigValidationError) {
      console.error(formatValidationErrors(error));
      process.exit(1);
    }
    throw error;
  }

  // Handle list_tools request
  server.setRequestHandler(ListToolsRequestSchema, async () => {
    return { tools };
  });

  // Handle call_tool request
  server.setRequestHandler(CallToolRequestSchema, async (request) => {
    const { name, arguments: args } = request.params;
    console.error(`[server] ${name}`);
    return callTool(name, args, context);
  });

  const transport = new StdioServerTransport();
  await server.connect(transport);
  console.error('');
  console.error('═══════════════════════════════════════════════════════════════════');
  console.error('  Gliffy → Excalidraw MCP Server');
  console.error('═══════════════════════════════════════════════════════════════════');
  console.error('');
  console.error('  convert_gliffy            .gliffy file → .excalidraw');
  console.error('  convert_gliffy_directory  every .gliffy in a folder + report');
  console.error('  extract_tids              stencil inventory → TID mapping');
  console.error('  set_tid_image             render a stencil as an image');
  console.error('');
  console.error(`  Output:  ${context.config.outputDir}`);
  console.error(`  Mapping: ${context.config.tidMappingFile}`);
  console.error('');
}

main().catch((error) => {
  console.error('Fatal error:', error);
  process.exit(1);
});
