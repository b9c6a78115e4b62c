#!/usr/bin/env node
/**
 * Pricing Scout Entry Point
 *
 * Wires configuration, the SQLite store, the MCP tool server client and
 * the orchestrator, then runs the interactive chat loop.
 */

import 'dotenv/config';
import { Command, InvalidArgumentError } from 'commander';

import { createReadlineIO, runChat } from './cli/chat.js';
import { ConfigError, loadChatConfig } from './lib/config.js';
import type { ChatConfig } from './lib/config.js';
import { openDatabase } from './lib/database.js';
import type { DatabaseHandle } from './lib/database.js';
import { createLLMClient, createOrchestrator } from './orchestrator/index.js';
import { createPricingService, createPricingServiceDb } from './services/index.js';
import { createMCPClient, createToolExecutor } from './tools/index.js';
import { DEFAULT_ORCHESTRATOR_CONFIG, errorMessage } from './types/index.js';

interface CliOptions {
  db?: string;
  model?: string;
  limit?: number;
  maxIterations?: number;
}

function parsePositiveInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new InvalidArgumentError('Must be a positive integer.');
  }
  return parsed;
}

function applyOverrides(config: ChatConfig, options: CliOptions): ChatConfig {
  return {
    ...config,
    ...(options.db !== undefined && { databasePath: options.db }),
    ...(options.model !== undefined && { model: options.model }),
    ...(options.limit !== undefined && { showDataLimit: options.limit }),
    ...(options.maxIterations !== undefined && {
      maxIterations: options.maxIterations,
    }),
  };
}

async function main(options: CliOptions): Promise<void> {
  let config: ChatConfig;
  try {
    config = applyOverrides(loadChatConfig(), options);
  } catch (error) {
    if (error instanceof ConfigError) {
      console.error(error.message);
      process.exit(1);
    }
    throw error;
  }

  let database: DatabaseHandle;
  try {
    database = openDatabase({ databasePath: config.databasePath });
  } catch (error) {
    console.error(
      `Error: could not open database at ${config.databasePath}: ${errorMessage(error)}`
    );
    process.exit(1);
  }

  const pricingService = createPricingService({
    db: createPricingServiceDb(database.db),
  });
  const mcpClient = createMCPClient({
    command: config.toolServer.command,
    args: config.toolServer.args,
  });
  const orchestrator = createOrchestrator({
    llmClient: createLLMClient({
      apiKey: config.apiKey,
      baseURL: config.baseURL,
      siteName: 'pricing-scout',
    }),
    toolExecutor: createToolExecutor({
      mcpClient,
      defaultTimeout: config.toolCallTimeoutMs,
    }),
    pricingService,
    config: {
      ...DEFAULT_ORCHESTRATOR_CONFIG,
      model: config.model,
      maxIterations: config.maxIterations,
      maxToolCalls: config.maxToolCalls,
      toolCallDelayMs: config.toolCallDelayMs,
    },
  });

  try {
    await runChat({
      io: createReadlineIO(),
      orchestrator,
      pricingService,
      showDataLimit: config.showDataLimit,
    });
  } finally {
    try {
      await mcpClient.close();
    } catch (error) {
      console.error(`[chat] Tool server shutdown failed: ${errorMessage(error)}`);
    }
    database.close();
  }
}

const program = new Command();

program
  .name('pricing-scout')
  .description('Chat about LLM inference pricing; scraped plans are cached in SQLite')
  .version('0.1.0')
  .option('--db <path>', 'SQLite database file (default: DATABASE_PATH or ./pricing.db)')
  .option('--model <id>', 'completion model (default: LLM_MODEL)')
  .option('--limit <n>', 'rows listed by "show data"', parsePositiveInt)
  .option('--max-iterations <n>', 'completion calls allowed per question', parsePositiveInt)
  .action(async () => {
    await main(program.opts<CliOptions>());
  });

program.parseAsync(process.argv).catch((error: unknown) => {
  console.error(`Fatal: ${errorMessage(error)}`);
  process.exit(1);
});
