/**
 * Configuration Loader Tests
 */

import { describe, it, expect } from 'vitest';

import {
  ConfigError,
  FIRECRAWL_BASE_URL,
  OPENROUTER_BASE_URL,
  loadChatConfig,
  loadToolServerConfig,
} from '@/lib/config.js';

function captureConfigError(load: () => unknown): ConfigError {
  try {
    load();
  } catch (error) {
    if (error instanceof ConfigError) {
      return error;
    }
    throw error;
  }
  throw new Error('Expected a ConfigError');
}

describe('loadChatConfig', () => {
  it('applies defaults when only the API key is set', () => {
    const config = loadChatConfig({ OPENROUTER_API_KEY: 'test-secret' });

    expect(config).toEqual({
      apiKey: 'test-secret',
      baseURL: OPENROUTER_BASE_URL,
      model: 'openai/gpt-4o-mini',
      databasePath: './pricing.db',
      toolServer: {
        command: process.execPath,
        args: ['dist/server/index.js'],
      },
      maxIterations: 8,
      maxToolCalls: 12,
      toolCallDelayMs: 1000,
      toolCallTimeoutMs: 120000,
      showDataLimit: 10,
    });
  });

  it('reads overrides and coerces numbers', () => {
    const config = loadChatConfig({
      OPENROUTER_API_KEY: 'test-secret',
      LLM_MODEL: 'anthropic/claude-3.5-haiku',
      DATABASE_PATH: '/tmp/prices.db',
      TOOL_SERVER_COMMAND: 'npx',
      TOOL_SERVER_ARGS: 'tsx  src/server/index.ts',
      MAX_ITERATIONS: '3',
      TOOL_CALL_DELAY_MS: '0',
      SHOW_DATA_LIMIT: '25',
    });

    expect(config.model).toBe('anthropic/claude-3.5-haiku');
    expect(config.databasePath).toBe('/tmp/prices.db');
    expect(config.toolServer).toEqual({
      command: 'npx',
      args: ['tsx', 'src/server/index.ts'],
    });
    expect(config.maxIterations).toBe(3);
    expect(config.toolCallDelayMs).toBe(0);
    expect(config.showDataLimit).toBe(25);
  });

  it('rejects a missing or blank API key', () => {
    const error = captureConfigError(() =>
      loadChatConfig({ OPENROUTER_API_KEY: '   ' })
    );

    expect(error.issues).toEqual(['OPENROUTER_API_KEY is required']);
    expect(error.message).toBe(
      'Invalid configuration:\n  - OPENROUTER_API_KEY is required'
    );
  });

  it('reports invalid numeric settings by variable name', () => {
    const error = captureConfigError(() =>
      loadChatConfig({ OPENROUTER_API_KEY: 'test-secret', MAX_TOOL_CALLS: '0' })
    );

    expect(error.issues).toHaveLength(1);
    expect(error.issues[0]).toMatch(/^MAX_TOOL_CALLS /);
  });
});

describe('loadToolServerConfig', () => {
  it('falls back to LLM_MODEL for extraction', () => {
    const config = loadToolServerConfig({
      OPENROUTER_API_KEY: 'test-secret',
      FIRECRAWL_API_KEY: 'test-firecrawl-key',
      LLM_MODEL: 'openai/gpt-4o',
    });

    expect(config).toEqual({
      apiKey: 'test-secret',
      baseURL: OPENROUTER_BASE_URL,
      extractionModel: 'openai/gpt-4o',
      firecrawlApiKey: 'test-firecrawl-key',
      firecrawlBaseUrl: FIRECRAWL_BASE_URL,
      scrapeDir: './scraped_content',
      maxContentChars: 20000,
      scrapeTimeoutMs: 60000,
    });
  });

  it('prefers EXTRACTION_MODEL when set', () => {
    const config = loadToolServerConfig({
      OPENROUTER_API_KEY: 'test-secret',
      FIRECRAWL_API_KEY: 'test-firecrawl-key',
      EXTRACTION_MODEL: 'openai/gpt-4o-mini',
      LLM_MODEL: 'openai/gpt-4o',
    });

    expect(config.extractionModel).toBe('openai/gpt-4o-mini');
  });

  it('lists every missing key', () => {
    const error = captureConfigError(() => loadToolServerConfig({}));

    expect(error.issues).toEqual([
      'OPENROUTER_API_KEY is required',
      'FIRECRAWL_API_KEY is required',
    ]);
  });
});
