/**
 * Tool Catalog Tests
 */

import { describe, it, expect } from 'vitest';

import {
  isToolName,
  parseToolArgs,
  parseToolCall,
} from '@/tools/catalog.js';
import { ToolError } from '@/tools/types.js';

function captureToolError(run: () => unknown): ToolError {
  try {
    run();
  } catch (error) {
    if (error instanceof ToolError) {
      return error;
    }
    throw error;
  }
  throw new Error('Expected a ToolError');
}

describe('isToolName', () => {
  it('knows exactly the two tools', () => {
    expect(isToolName('scrape')).toBe(true);
    expect(isToolName('extract')).toBe(true);
    expect(isToolName('search')).toBe(false);
  });
});

describe('parseToolCall', () => {
  it('builds a typed scrape call', () => {
    const call = parseToolCall('scrape', {
      url: 'https://www.cloudrift.ai/pricing',
    });

    expect(call).toEqual({
      name: 'scrape',
      args: { url: 'https://www.cloudrift.ai/pricing' },
    });
  });

  it('builds a typed extract call from a source', () => {
    const call = parseToolCall('extract', {
      source: 'cloudrift_ai',
      hint: 'DeepSeek V3',
    });

    expect(call).toEqual({
      name: 'extract',
      args: { source: 'cloudrift_ai', hint: 'DeepSeek V3' },
    });
  });

  it('rejects unknown tools', () => {
    const error = captureToolError(() => parseToolCall('search', {}));

    expect(error.code).toBe('UNKNOWN_TOOL');
    expect(error.message).toBe('Unknown tool: search');
  });

  it('rejects a scrape call without a valid URL', () => {
    const error = captureToolError(() =>
      parseToolCall('scrape', { url: 'cloudrift pricing' })
    );

    expect(error.code).toBe('INVALID_ARGUMENTS');
    expect(error.message).toBe('Invalid arguments for scrape: url: Invalid url');
  });

  it('rejects an extract call with neither content nor source', () => {
    const error = captureToolError(() =>
      parseToolArgs('extract', { content: '  ', hint: 'DeepSeek' })
    );

    expect(error.code).toBe('INVALID_ARGUMENTS');
    expect(error.message).toBe(
      'Invalid arguments for extract: Either content or source is required'
    );
  });

  it('rejects wrongly typed arguments', () => {
    const error = captureToolError(() =>
      parseToolArgs('scrape', { url: 42 })
    );

    expect(error.message).toBe(
      'Invalid arguments for scrape: url: Expected string, received number'
    );
  });
});
