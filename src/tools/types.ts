/**
 * Tool Layer Types
 *
 * SCOPE: Internal types for the tool server and its MCP client
 */

import type {
  ExtractResult,
  ScrapeArgs,
  ScrapeResult,
  ToolArgs,
  ToolDescriptor,
  ToolName,
  ToolResults,
} from '../types/index.js';

export type ToolErrorCode =
  | 'UNKNOWN_TOOL'
  | 'INVALID_ARGUMENTS'
  | 'SCRAPE_FAILED'
  | 'EXTRACTION_FAILED'
  | 'NOT_FOUND'
  | 'CONTENT_STORE_ERROR';

/**
 * Tool error for controlled failures
 */
export class ToolError extends Error {
  constructor(
    public readonly code: ToolErrorCode,
    message: string
  ) {
    super(message);
    this.name = 'ToolError';
  }
}

/**
 * Typed handler for one tool
 */
export type ToolHandler<K extends ToolName> = (
  args: ToolArgs[K]
) => Promise<ToolResults[K]>;

/**
 * Lookup table of handlers, one per tool name
 */
export type ToolHandlers = { [K in ToolName]: ToolHandler<K> };

/**
 * Scraping capability
 */
export interface Scraper {
  scrape(args: ScrapeArgs): Promise<ScrapeResult>;
}

/**
 * Structured extraction capability (raw content only)
 */
export interface PricingExtractor {
  extract(args: { content: string; hint?: string }): Promise<ExtractResult>;
}

/**
 * MCP server launch configuration
 */
export interface MCPServerConfig {
  command: string;
  args: string[];
  env?: Record<string, string>;
  cwd?: string;
}

/**
 * MCP client interface
 */
export interface MCPClient {
  /**
   * List tools advertised by the server
   */
  listTools(): Promise<ToolDescriptor[]>;

  /**
   * Call a tool on the server
   */
  callTool(
    toolName: string,
    input: Record<string, unknown>,
    timeout: number
  ): Promise<MCPToolResult>;

  /**
   * Check if the connection is up
   */
  isHealthy(): boolean;

  /**
   * Close the connection (and the server process, for stdio)
   */
  close(): Promise<void>;
}

/**
 * MCP tool call result
 */
export interface MCPToolResult {
  success: boolean;
  output: Record<string, unknown>;
  errorMessage?: string;
}
