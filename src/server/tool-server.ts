/**
 * Pricing Tool Server
 *
 * MCP server exposing the scrape and extract tools. Handlers are looked
 * up by tool name; every result is a single JSON text item, and failures
 * come back as isError results carrying "Error: <message>".
 */

import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { CallToolResult } from '@modelcontextprotocol/sdk/types.js';

import {
  TOOL_DESCRIPTIONS,
  extractArgsShape,
  parseToolArgs,
  scrapeArgsShape,
} from '../tools/catalog.js';
import type { ContentStore } from '../tools/scrape/content-store.js';
import type {
  PricingExtractor,
  Scraper,
  ToolHandler,
  ToolHandlers,
} from '../tools/types.js';
import { errorMessage } from '../types/index.js';
import type { ToolName } from '../types/index.js';

export const TOOL_SERVER_NAME = 'pricing-tools';
export const TOOL_SERVER_VERSION = '0.1.0';

export interface ToolServerDeps {
  scraper: Scraper;
  extractor: PricingExtractor;
  contentStore: ContentStore;
}

export function createToolHandlers(deps: ToolServerDeps): ToolHandlers {
  const { scraper, extractor, contentStore } = deps;

  return {
    scrape: (args) => scraper.scrape(args),

    extract: async (args) => {
      const content =
        args.content !== undefined && args.content.trim() !== ''
          ? args.content
          : await contentStore.readContent(args.source ?? '', 'markdown');

      return extractor.extract({
        content,
        ...(args.hint !== undefined && { hint: args.hint }),
      });
    },
  };
}

async function runTool<K extends ToolName>(
  name: K,
  input: unknown,
  handlers: ToolHandlers
): Promise<CallToolResult> {
  const startTime = Date.now();
  try {
    const args = parseToolArgs(name, input);
    const handler: ToolHandler<K> = handlers[name];
    const result = await handler(args);

    console.error(`[tool-server] ${name} ok in ${Date.now() - startTime}ms`);
    return {
      content: [{ type: 'text' as const, text: JSON.stringify(result) }],
    };
  } catch (error) {
    const message = errorMessage(error, 'Tool execution failed');
    console.error(`[tool-server] ${name} failed: ${message}`);
    return {
      content: [{ type: 'text' as const, text: `Error: ${message}` }],
      isError: true,
    };
  }
}

/**
 * Create the MCP server with both tools registered
 */
export function createToolServer(deps: ToolServerDeps): McpServer {
  const handlers = createToolHandlers(deps);

  const server = new McpServer(
    { name: TOOL_SERVER_NAME, version: TOOL_SERVER_VERSION },
    { capabilities: { tools: {} } }
  );

  server.tool('scrape', TOOL_DESCRIPTIONS.scrape, scrapeArgsShape, (args) =>
    runTool('scrape', args, handlers)
  );

  server.tool('extract', TOOL_DESCRIPTIONS.extract, extractArgsShape, (args) =>
    runTool('extract', args, handlers)
  );

  return server;
}
