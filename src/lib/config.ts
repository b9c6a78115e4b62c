/**
 * Environment configuration
 *
 * Variables are read from process.env (populated from .env by dotenv in the
 * entry points) and validated with zod. Empty strings count as unset.
 */

import { z } from 'zod';

export const OPENROUTER_BASE_URL = 'https://openrouter.ai/api/v1';
export const FIRECRAWL_BASE_URL = 'https://api.firecrawl.dev/v1';
export const DEFAULT_MODEL = 'openai/gpt-4o-mini';

/**
 * Raised when one or more environment variables are missing or invalid
 */
export class ConfigError extends Error {
  constructor(public readonly issues: string[]) {
    super(
      `Invalid configuration:\n${issues.map((issue) => `  - ${issue}`).join('\n')}`
    );
    this.name = 'ConfigError';
  }
}

function positiveInt(defaultValue: number) {
  return z.coerce.number().int().positive().default(defaultValue);
}

const requiredKey = z.string({ required_error: 'is required' }).min(1);

const chatEnvSchema = z.object({
  OPENROUTER_API_KEY: requiredKey,
  OPENROUTER_BASE_URL: z.string().url().default(OPENROUTER_BASE_URL),
  LLM_MODEL: z.string().default(DEFAULT_MODEL),
  DATABASE_PATH: z.string().default('./pricing.db'),
  TOOL_SERVER_COMMAND: z.string().default(process.execPath),
  TOOL_SERVER_ARGS: z.string().default('dist/server/index.js'),
  MAX_ITERATIONS: positiveInt(8),
  MAX_TOOL_CALLS: positiveInt(12),
  TOOL_CALL_DELAY_MS: z.coerce.number().int().min(0).default(1000),
  TOOL_CALL_TIMEOUT_MS: positiveInt(120000),
  SHOW_DATA_LIMIT: positiveInt(10),
});

const toolServerEnvSchema = z.object({
  OPENROUTER_API_KEY: requiredKey,
  OPENROUTER_BASE_URL: z.string().url().default(OPENROUTER_BASE_URL),
  LLM_MODEL: z.string().default(DEFAULT_MODEL),
  EXTRACTION_MODEL: z.string().optional(),
  FIRECRAWL_API_KEY: requiredKey,
  FIRECRAWL_BASE_URL: z.string().url().default(FIRECRAWL_BASE_URL),
  SCRAPE_DIR: z.string().default('./scraped_content'),
  MAX_CONTENT_CHARS: positiveInt(20000),
  SCRAPE_TIMEOUT_MS: positiveInt(60000),
});

/**
 * Configuration for the interactive chat client
 */
export interface ChatConfig {
  apiKey: string;
  baseURL: string;
  model: string;
  databasePath: string;
  toolServer: {
    command: string;
    args: string[];
  };
  maxIterations: number;
  maxToolCalls: number;
  toolCallDelayMs: number;
  toolCallTimeoutMs: number;
  showDataLimit: number;
}

/**
 * Configuration for the MCP tool server process
 */
export interface ToolServerConfig {
  apiKey: string;
  baseURL: string;
  extractionModel: string;
  firecrawlApiKey: string;
  firecrawlBaseUrl: string;
  scrapeDir: string;
  maxContentChars: number;
  scrapeTimeoutMs: number;
}

/**
 * Copy the environment, dropping unset and blank values
 */
function cleanEnv(env: NodeJS.ProcessEnv): Record<string, string> {
  const cleaned: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value.trim() !== '') {
      cleaned[key] = value.trim();
    }
  }
  return cleaned;
}

function parseEnv<T extends z.ZodTypeAny>(
  schema: T,
  env: NodeJS.ProcessEnv
): z.infer<T> {
  const parsed = schema.safeParse(cleanEnv(env));
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map(
        (issue) => `${issue.path.join('.')} ${issue.message}`
      )
    );
  }
  return parsed.data;
}

/**
 * Load chat client configuration
 */
export function loadChatConfig(
  env: NodeJS.ProcessEnv = process.env
): ChatConfig {
  const vars = parseEnv(chatEnvSchema, env);

  return {
    apiKey: vars.OPENROUTER_API_KEY,
    baseURL: vars.OPENROUTER_BASE_URL,
    model: vars.LLM_MODEL,
    databasePath: vars.DATABASE_PATH,
    toolServer: {
      command: vars.TOOL_SERVER_COMMAND,
      args: vars.TOOL_SERVER_ARGS.split(/\s+/).filter(Boolean),
    },
    maxIterations: vars.MAX_ITERATIONS,
    maxToolCalls: vars.MAX_TOOL_CALLS,
    toolCallDelayMs: vars.TOOL_CALL_DELAY_MS,
    toolCallTimeoutMs: vars.TOOL_CALL_TIMEOUT_MS,
    showDataLimit: vars.SHOW_DATA_LIMIT,
  };
}

/**
 * Load tool server configuration
 */
export function loadToolServerConfig(
  env: NodeJS.ProcessEnv = process.env
): ToolServerConfig {
  const vars = parseEnv(toolServerEnvSchema, env);

  return {
    apiKey: vars.OPENROUTER_API_KEY,
    baseURL: vars.OPENROUTER_BASE_URL,
    extractionModel: vars.EXTRACTION_MODEL ?? vars.LLM_MODEL,
    firecrawlApiKey: vars.FIRECRAWL_API_KEY,
    firecrawlBaseUrl: vars.FIRECRAWL_BASE_URL,
    scrapeDir: vars.SCRAPE_DIR,
    maxContentChars: vars.MAX_CONTENT_CHARS,
    scrapeTimeoutMs: vars.SCRAPE_TIMEOUT_MS,
  };
}
