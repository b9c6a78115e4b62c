/**
 * Tool Layer Exports
 */

export {
  TOOL_DESCRIPTIONS,
  extractArgsShape,
  isToolName,
  parseToolArgs,
  parseToolCall,
  scrapeArgsShape,
} from './catalog.js';
export { createToolExecutor } from './executor.js';
export type { CreateToolExecutorDeps } from './executor.js';
export { connectMCPClient, createMCPClient, toToolResult } from './mcp/client.js';
export {
  createContentStore,
  METADATA_FILE,
} from './scrape/content-store.js';
export type {
  ContentStore,
  ScrapeEntry,
  ScrapeMetadata,
} from './scrape/content-store.js';
export {
  createFirecrawlScraper,
  providerFromUrl,
  SCRAPE_FORMATS,
} from './scrape/firecrawl.js';
export type { FirecrawlScraperConfig } from './scrape/firecrawl.js';
export {
  createPricingExtractor,
  EXTRACTION_INSTRUCTIONS,
  stripCodeFence,
} from './extract/extractor.js';
export type { PricingExtractorDeps } from './extract/extractor.js';
export { extractResultSchema, toCost } from './extract/schema.js';
export { ToolError } from './types.js';
export type {
  MCPClient,
  MCPServerConfig,
  MCPToolResult,
  PricingExtractor,
  Scraper,
  ToolErrorCode,
  ToolHandler,
  ToolHandlers,
} from './types.js';
