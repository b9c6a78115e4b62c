#!/usr/bin/env node
/**
 * Pricing Tool Server Entrypoint
 *
 * Runs the MCP tool server over stdio. stdout carries the protocol, so
 * all diagnostics go to stderr.
 */

import 'dotenv/config';

import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';

import { ConfigError, loadToolServerConfig } from '../lib/config.js';
import { createLLMClient } from '../orchestrator/llm-client.js';
import { createContentStore } from '../tools/scrape/content-store.js';
import { createFirecrawlScraper } from '../tools/scrape/firecrawl.js';
import { createPricingExtractor } from '../tools/extract/extractor.js';
import { errorMessage } from '../types/index.js';

import { createToolServer } from './tool-server.js';

async function main(): Promise<void> {
  const config = loadToolServerConfig();

  const contentStore = createContentStore(config.scrapeDir);
  const scraper = createFirecrawlScraper({
    apiKey: config.firecrawlApiKey,
    baseUrl: config.firecrawlBaseUrl,
    timeoutMs: config.scrapeTimeoutMs,
    maxContentChars: config.maxContentChars,
    contentStore,
  });
  const extractor = createPricingExtractor({
    llmClient: createLLMClient({
      apiKey: config.apiKey,
      baseURL: config.baseURL,
    }),
    model: config.extractionModel,
    maxContentChars: config.maxContentChars,
  });

  const server = createToolServer({ scraper, extractor, contentStore });
  const transport = new StdioServerTransport();

  const shutdown = async (): Promise<void> => {
    try {
      await server.close();
    } catch (error) {
      console.error(`[tool-server] Shutdown error: ${errorMessage(error)}`);
    }
    process.exit(0);
  };
  process.on('SIGINT', () => void shutdown());
  process.on('SIGTERM', () => void shutdown());

  await server.connect(transport);
  console.error(
    `[tool-server] Ready (scrape dir: ${config.scrapeDir}, model: ${config.extractionModel})`
  );
}

main().catch((error: unknown) => {
  if (error instanceof ConfigError) {
    console.error(`[tool-server] ${error.message}`);
  } else {
    console.error(`[tool-server] Fatal: ${errorMessage(error)}`);
  }
  process.exit(1);
});
